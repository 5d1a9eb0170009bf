/**
 * Sync Engine
 *
 * Orchestrates synchronization of users and attendance from a fleet of
 * ZKTeco devices. Devices are visited one at a time; a failing device is
 * recorded in the run report and never stops the run.
 */

import { ZKTecoClient } from '../device/zkteco-client.js';
import { upsertUsers } from '../repositories/user.repository.js';
import { appendAttendance, DEFAULT_ATTENDANCE_CHUNK_SIZE } from '../repositories/attendance-log.repository.js';
import { DEFAULT_CONFIG, type AppConfig } from '../config.js';
import {
  formatDeviceError,
  withDeviceSession,
  type DeviceResult,
} from './device-communication.js';
import { consumeLiveCapture, type LiveCaptureOptions } from './live-capture.js';
import { NameResolver } from './name-resolver.js';
import { normalizeAttendanceBatch, normalizeUser } from './record-normalizer.js';
import type {
  AttributedEvent,
  DeviceConnector,
  DeviceDescriptor,
  DeviceSession,
  DeviceSyncTally,
  DeviceTarget,
  DeviceUserInput,
  FailedDevice,
  FleetReport,
  FleetSyncMode,
  LiveCaptureSummary,
  UserRecord,
} from '../../types/index.js';

export type SyncEngineConfig = Pick<AppConfig, 'device' | 'attendanceChunkSize' | 'liveReadTimeoutMs'>;

export interface SyncEngineOptions {
  /** Opens device sessions; defaults to the node-zklib client */
  connect?: DeviceConnector;
  config?: SyncEngineConfig;
}

export interface DeviceSyncOutcome<T> {
  records: T[];
  tally: DeviceSyncTally;
}

export type DeviceSyncResult<T> = DeviceResult<DeviceSyncOutcome<T>>;

export interface CaptureLiveOptions extends LiveCaptureOptions {
  /** Resolver built elsewhere; otherwise built from the session's users */
  resolver?: NameResolver;
}

/**
 * Merge a descriptor's per-device overrides with the configured defaults
 */
export function toTarget(device: DeviceDescriptor, defaults: AppConfig['device']): DeviceTarget {
  return {
    ip: device.ip,
    port: device.port ?? defaults.port,
    timeoutMs: defaults.timeoutMs,
    inport: defaults.inport,
    password: device.password ?? defaults.password,
  };
}

async function fetchNormalizedUsers(session: DeviceSession): Promise<UserRecord[]> {
  const raws = await session.getUsers();
  return raws.map(normalizeUser);
}

export class SyncEngine {
  private readonly connect: DeviceConnector;
  private readonly config: SyncEngineConfig;

  constructor(options: SyncEngineOptions = {}) {
    this.connect = options.connect ?? ZKTecoClient.connect;
    this.config = options.config ?? {
      device: DEFAULT_CONFIG.device,
      attendanceChunkSize: DEFAULT_ATTENDANCE_CHUNK_SIZE,
      liveReadTimeoutMs: DEFAULT_CONFIG.liveReadTimeoutMs,
    };
  }

  private target(device: DeviceDescriptor): DeviceTarget {
    return toTarget(device, this.config.device);
  }

  /**
   * Fetch a device's users and upsert them, keyed by (device ip, uid)
   */
  async syncUsers(device: DeviceDescriptor): Promise<DeviceSyncResult<UserRecord>> {
    return withDeviceSession(this.connect, this.target(device), async (session) => {
      console.log('[SyncEngine]   Fetching users...');
      const users = await fetchNormalizedUsers(session);
      console.log(`[SyncEngine]   Found ${users.length} users`);

      const summary = upsertUsers(users.map((user) => ({ ...user, deviceIp: device.ip })));

      return {
        records: users,
        tally: {
          fetched: users.length,
          inserted: summary.upsertedCount,
          duplicates: 0,
          skipped: 0,
          errors: summary.errorCount,
        },
      };
    });
  }

  /**
   * Fetch a device's attendance and append it, ignoring punches already
   * stored. Without a resolver, names come from the users on the same
   * session.
   */
  async syncAttendance(
    device: DeviceDescriptor,
    resolver?: NameResolver
  ): Promise<DeviceSyncResult<AttributedEvent>> {
    return withDeviceSession(this.connect, this.target(device), async (session) => {
      let names = resolver;
      if (!names) {
        console.log('[SyncEngine]   Fetching users...');
        names = NameResolver.build(await fetchNormalizedUsers(session));
      }

      console.log('[SyncEngine]   Fetching attendance logs...');
      const raws = await session.getAttendance();
      console.log(`[SyncEngine]   Found ${raws.length} records`);

      // The whole fetch is normalized before anything is written
      const batch = normalizeAttendanceBatch(raws);
      const nameIndex = names;
      const events = batch.events.map((event) => nameIndex.attribute(event));
      const rows = events.map((event) => ({ ...event, deviceIp: device.ip }));

      const summary = appendAttendance(rows, { chunkSize: this.config.attendanceChunkSize });
      console.log(
        `[SyncEngine]   Inserted ${summary.insertedCount}, duplicates ${summary.duplicateCount}, ` +
        `skipped ${batch.skipped + summary.skippedCount}, errors ${batch.errored + summary.errorCount}`
      );

      return {
        records: events,
        tally: {
          fetched: raws.length,
          inserted: summary.insertedCount,
          duplicates: summary.duplicateCount,
          skipped: batch.skipped + summary.skippedCount,
          errors: batch.errored + summary.errorCount,
        },
      };
    });
  }

  /**
   * Sync every device in order. Never throws: each device's failure is
   * captured in the report. A device that answers with no records still
   * counts as succeeded; only a connection or fetch failure counts against it.
   */
  async runFleet(devices: DeviceDescriptor[], mode: FleetSyncMode = 'attendance'): Promise<FleetReport> {
    const startedAt = new Date().toISOString();
    const failedDevices: FailedDevice[] = [];
    let succeeded = 0;
    let totalRecords = 0;

    console.log(`[SyncEngine] Syncing ${mode} from ${devices.length} devices`);

    for (const [index, device] of devices.entries()) {
      console.log(`[SyncEngine] [${index + 1}/${devices.length}] Connecting to ${device.name || 'N/A'} (${device.ip})...`);

      const result: DeviceResult<{ tally: DeviceSyncTally }> =
        mode === 'users' ? await this.syncUsers(device) : await this.syncAttendance(device);

      if (result.success) {
        succeeded++;
        totalRecords += result.value.tally.fetched;
        console.log('[SyncEngine]   Done');
      } else {
        const error = formatDeviceError(result.error);
        failedDevices.push({ name: device.name, ip: device.ip, error });
        console.error(`[SyncEngine]   Failed: ${error}`);
      }
    }

    const report: FleetReport = {
      mode,
      attempted: devices.length,
      succeeded,
      failedDevices,
      totalRecords,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    console.log(`[SyncEngine] ${mode} sync: ${succeeded}/${devices.length} devices, ${totalRecords} records`);
    return report;
  }

  /**
   * Read a device's users without storing them
   */
  async fetchUsers(device: DeviceDescriptor): Promise<DeviceResult<UserRecord[]>> {
    return withDeviceSession(this.connect, this.target(device), fetchNormalizedUsers);
  }

  /**
   * Create or overwrite a user on the device; resolves to the refreshed roster
   */
  async writeUser(device: DeviceDescriptor, input: DeviceUserInput): Promise<DeviceResult<UserRecord[]>> {
    return withDeviceSession(this.connect, this.target(device), async (session) => {
      await session.setUser(input);
      console.log(`[SyncEngine] Wrote user ${input.uid} (${input.name}) to ${device.ip}`);
      return fetchNormalizedUsers(session);
    });
  }

  /**
   * Remove a user from the device; resolves to the refreshed roster
   */
  async deleteUser(device: DeviceDescriptor, uid: number): Promise<DeviceResult<UserRecord[]>> {
    return withDeviceSession(this.connect, this.target(device), async (session) => {
      await session.deleteUser(uid);
      console.log(`[SyncEngine] Deleted user ${uid} from ${device.ip}`);
      return fetchNormalizedUsers(session);
    });
  }

  /**
   * Stream live punches from one device until `options.signal` aborts or
   * the device closes the feed
   */
  async captureLive(
    device: DeviceDescriptor,
    options: CaptureLiveOptions = {}
  ): Promise<DeviceResult<LiveCaptureSummary>> {
    const { resolver, ...consumerOptions } = options;

    return withDeviceSession(
      this.connect,
      this.target(device),
      async (session) => {
        const names = resolver ?? NameResolver.build(await fetchNormalizedUsers(session));
        const stream = await session.liveCapture(this.config.liveReadTimeoutMs);
        console.log(`[SyncEngine] Waiting for live data from ${device.ip}...`);
        return consumeLiveCapture(stream, names, consumerOptions);
      },
      { lockDevice: false }
    );
  }
}
