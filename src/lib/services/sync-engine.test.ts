/**
 * Tests for Sync Engine
 * Property 4: A failing device never stops the rest of the fleet
 * Property 5: Sessions are released on every path
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import * as fc from 'fast-check';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  FakeDeviceSession,
  createFakeFleet,
  fakeDescriptor,
} from '../test-utils/index.js';
import { listAttendance } from '../repositories/attendance-log.repository.js';
import { getUser, getUserCount, listUsers } from '../repositories/user.repository.js';
import { DeviceErrorCodes } from './device-communication.js';
import { NameResolver } from './name-resolver.js';
import { SyncEngine, toTarget, type SyncEngineConfig } from './sync-engine.js';
import type { DeviceConnector } from '../../types/index.js';
import type { LiveCaptureEvent } from './live-capture.js';

initTestDatabase();

const config: SyncEngineConfig = {
  device: { port: 4370, timeoutMs: 1000, inport: 4000, password: 0 },
  attendanceChunkSize: 1000,
  liveReadTimeoutMs: 10,
};

function engineFor(connect: DeviceConnector): SyncEngine {
  return new SyncEngine({ connect, config });
}

const alice = { uid: 1, userId: '1001', name: 'Alice', privilege: 14, password: '', card: 0 };
const bob = { uid: 2, userId: '1002', name: 'Bob', privilege: 0, password: '', card: 777 };
const roster = [alice, bob];

describe('SyncEngine', () => {
  beforeEach(() => {
    resetTestDatabase();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  describe('syncUsers', () => {
    it('persists every fetched user, defaulting a malformed uid to 0', async () => {
      const device = new FakeDeviceSession({
        users: [
          { uid: 1, userId: '1001', name: 'Alice' },
          { uid: 'abc', userId: '1003', name: 'Carol' },
          { uid: 2, userId: '1002', name: 'Bob' },
        ],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncUsers(fakeDescriptor('10.0.0.5', 'Gate-A'));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.tally).toEqual({ fetched: 3, inserted: 3, duplicates: 0, skipped: 0, errors: 0 });
      expect(listUsers({ deviceIp: '10.0.0.5' }).map((u) => [u.uid, u.name])).toEqual([
        [0, 'Carol'],
        [1, 'Alice'],
        [2, 'Bob'],
      ]);
    });

    it('keeps one row with the new name after two syncs', async () => {
      const device = new FakeDeviceSession({ users: roster });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);
      const descriptor = fakeDescriptor('10.0.0.5');

      await engine.syncUsers(descriptor);
      device.users = [{ ...alice, name: 'Alice Smith' }, bob];
      await engine.syncUsers(descriptor);

      expect(getUserCount('10.0.0.5')).toBe(2);
      expect(getUser('10.0.0.5', 1)?.name).toBe('Alice Smith');
      expect(getUser('10.0.0.5', 1)?.privilege).toBe('Admin');
    });
  });

  describe('syncAttendance', () => {
    it('locks the device, resolves names from the same session and releases it', async () => {
      const device = new FakeDeviceSession({
        users: roster,
        attendance: [
          { uid: 1, userId: '1001', timestamp: '2024-03-01 08:00:00', status: 0, punch: 0 },
          { userId: '1002', timestamp: '2024-03-01 08:05:00', status: 1, punch: 1 },
          { uid: 3, userId: '', timestamp: '2024-03-01 08:10:00' },
        ],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncAttendance(fakeDescriptor('10.0.0.5'));

      expect(device.calls).toEqual(['disable', 'getUsers', 'getAttendance', 'enable', 'disconnect']);
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.tally).toEqual({ fetched: 3, inserted: 2, duplicates: 0, skipped: 1, errors: 0 });
      expect(listAttendance().map((a) => [a.userId, a.name])).toEqual([
        ['1002', 'Bob'],
        ['1001', 'Alice'],
      ]);
    });

    it('names punches without a uid by user id, even when a user was stored at uid 0', async () => {
      const device = new FakeDeviceSession({
        users: [
          { uid: 'abc', userId: '1003', name: 'Carol' },
          { uid: 2, userId: '1002', name: 'Bob' },
        ],
        attendance: [
          { userId: '1002', timestamp: '2024-03-01 08:00:00' },
          { userId: '1009', timestamp: '2024-03-01 08:05:00' },
        ],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncAttendance(fakeDescriptor('10.0.0.5'));

      expect(result.success && result.value.records.map((r) => [r.uid, r.userId, r.name])).toEqual([
        [2, '1002', 'Bob'],
        [0, '1009', ''],
      ]);
      expect(listAttendance().map((a) => [a.uid, a.userId, a.name])).toEqual([
        [0, '1009', ''],
        [2, '1002', 'Bob'],
      ]);
    });

    it('uses a supplied resolver without fetching users', async () => {
      const device = new FakeDeviceSession({
        attendance: [{ uid: 9, userId: '9', timestamp: '2024-03-01 08:00:00' }],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);
      const resolver = NameResolver.build([
        { uid: 9, userId: '9', name: 'Ivan', privilege: 'Default', password: '', groupId: '', card: 0 },
      ]);

      await engine.syncAttendance(fakeDescriptor('10.0.0.5'), resolver);

      expect(device.calls).not.toContain('getUsers');
      expect(listAttendance()[0]?.name).toBe('Ivan');
    });

    it('is idempotent across re-syncs', async () => {
      const device = new FakeDeviceSession({
        users: roster,
        attendance: [
          { uid: 1, userId: '1001', timestamp: '2024-03-01 08:00:00' },
          { uid: 1, userId: '1001', timestamp: '2024-03-01 17:00:00' },
        ],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      await engine.syncAttendance(fakeDescriptor('10.0.0.5'));
      const second = await engine.syncAttendance(fakeDescriptor('10.0.0.5'));

      expect(second.success && second.value.tally).toEqual({
        fetched: 2,
        inserted: 0,
        duplicates: 2,
        skipped: 0,
        errors: 0,
      });
      expect(listAttendance()).toHaveLength(2);
    });

    it('counts a device with no records as a success', async () => {
      const engine = engineFor(createFakeFleet({ '10.0.0.5': new FakeDeviceSession() }).connect);

      const report = await engine.runFleet([fakeDescriptor('10.0.0.5')]);

      expect(report.succeeded).toBe(1);
      expect(report.totalRecords).toBe(0);
      expect(report.failedDevices).toEqual([]);
    });
  });

  describe('Property 5: Session release', () => {
    it('re-enables and disconnects when a fetch fails', async () => {
      const device = new FakeDeviceSession({ users: roster, failures: { getAttendance: new Error('socket hang up') } });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncAttendance(fakeDescriptor('10.0.0.5'));

      expect(device.calls.slice(-2)).toEqual(['enable', 'disconnect']);
      expect(result).toEqual({
        success: false,
        error: {
          code: DeviceErrorCodes.PROTOCOL_ERROR,
          message: 'Communication error with the device.',
          details: { originalError: 'socket hang up' },
        },
      });
      expect(listAttendance()).toEqual([]);
    });

    it('still tries to re-enable when disabling fails', async () => {
      const device = new FakeDeviceSession({ failures: { disable: new Error('disable timeout') } });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncUsers(fakeDescriptor('10.0.0.5'));

      expect(device.calls).toEqual(['disable', 'enable', 'disconnect']);
      expect(!result.success && result.error.code).toBe(DeviceErrorCodes.CONNECTION_TIMEOUT);
    });

    it('never lets a release failure mask a successful fetch', async () => {
      const device = new FakeDeviceSession({
        users: roster,
        failures: { enable: new Error('enable failed'), disconnect: { code: 'EPIPE' } },
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.syncUsers(fakeDescriptor('10.0.0.5'));

      expect(result.success).toBe(true);
      expect(device.calls).toEqual(['disable', 'getUsers', 'enable', 'disconnect']);
      expect(console.warn).toHaveBeenCalledWith('[DeviceCommunication] Could not disconnect 10.0.0.5: {"code":"EPIPE"}');
    });
  });

  describe('Property 4: Fault isolation', () => {
    it('attempts every device after a connection failure and reports it', async () => {
      const first = new FakeDeviceSession({ users: roster });
      const third = new FakeDeviceSession({ users: [alice] });
      const fleet = createFakeFleet({ '10.0.0.5': first, '10.0.0.7': third });
      const engine = engineFor(fleet.connect);

      const report = await engine.runFleet(
        [fakeDescriptor('10.0.0.5', 'Gate-A'), fakeDescriptor('10.0.0.6', 'Gate-B'), fakeDescriptor('10.0.0.7', 'Gate-C')],
        'users'
      );

      expect(fleet.targets.map((t) => t.ip)).toEqual(['10.0.0.5', '10.0.0.6', '10.0.0.7']);
      expect(report).toMatchObject({ mode: 'users', attempted: 3, succeeded: 2, totalRecords: 3 });
      expect(report.failedDevices).toEqual([
        {
          name: 'Gate-B',
          ip: '10.0.0.6',
          error: 'Device is unreachable. Check the network connection and IP address. (connect ECONNREFUSED 10.0.0.6:4370)',
        },
      ]);
      expect(getUserCount('10.0.0.7')).toBe(1);
    });

    it('reports exactly the failing devices for any failure pattern', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.boolean(), { minLength: 1, maxLength: 6 }), async (reachable) => {
          resetTestDatabase();
          const sessions: Record<string, FakeDeviceSession> = {};
          const devices = reachable.map((ok, i) => {
            const ip = `10.0.1.${i + 1}`;
            if (ok) {
              sessions[ip] = new FakeDeviceSession({
                users: roster,
                attendance: [{ uid: 1, userId: '1001', timestamp: `2024-03-0${i + 1} 08:00:00` }],
              });
            }
            return fakeDescriptor(ip);
          });
          const fleet = createFakeFleet(sessions);

          const report = await engineFor(fleet.connect).runFleet(devices, 'attendance');

          expect(fleet.targets).toHaveLength(reachable.length);
          expect(report.succeeded).toBe(reachable.filter(Boolean).length);
          expect(report.failedDevices.map((d) => d.ip)).toEqual(
            devices.filter((_, i) => !reachable[i]).map((d) => d.ip)
          );
          expect(report.totalRecords).toBe(report.succeeded);
        }),
        { numRuns: 30 }
      );
    });
  });

  describe('device user management', () => {
    it('writes a user and returns the refreshed roster', async () => {
      const device = new FakeDeviceSession({ users: roster });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.writeUser(fakeDescriptor('10.0.0.5'), {
        uid: 3,
        userId: '1003',
        name: 'Carol',
        privilege: 'Admin',
      });

      expect(device.calls).toEqual(['disable', 'setUser', 'getUsers', 'enable', 'disconnect']);
      expect(result.success && result.value.map((u) => u.name)).toEqual(['Alice', 'Bob', 'Carol']);
      expect(result.success && result.value[2]?.privilege).toBe('Admin');
    });

    it('deletes a user and returns the refreshed roster', async () => {
      const device = new FakeDeviceSession({ users: roster });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);

      const result = await engine.deleteUser(fakeDescriptor('10.0.0.5'), 1);

      expect(result.success && result.value.map((u) => u.uid)).toEqual([2]);
    });

    it('fetches users without storing them', async () => {
      const engine = engineFor(createFakeFleet({ '10.0.0.5': new FakeDeviceSession({ users: roster }) }).connect);

      const result = await engine.fetchUsers(fakeDescriptor('10.0.0.5'));

      expect(result.success && result.value).toHaveLength(2);
      expect(getUserCount()).toBe(0);
    });
  });

  describe('captureLive', () => {
    it('streams without locking the device and enriches events', async () => {
      const device = new FakeDeviceSession({
        users: roster,
        liveItems: [
          { kind: 'timeout' },
          { kind: 'event', record: { userId: '1002', timestamp: '2024-03-01 08:00:00', status: 1 } },
        ],
      });
      const engine = engineFor(createFakeFleet({ '10.0.0.5': device }).connect);
      const events: LiveCaptureEvent[] = [];

      const result = await engine.captureLive(fakeDescriptor('10.0.0.5'), { onEvent: (e) => events.push(e) });

      expect(device.calls).toEqual(['getUsers', 'liveCapture', 'disconnect']);
      expect(result).toEqual({ success: true, value: { captured: 1, timeouts: 1, skipped: 0, stoppedBy: 'closed' } });
      expect(events).toEqual([
        {
          sequence: 1,
          uid: 2,
          userId: '1002',
          name: 'Bob',
          timestamp: '2024-03-01 08:00:00',
          status: 1,
          punch: 0,
          statusLabel: 'Check-Out',
        },
      ]);
      expect(device.liveStream?.closeCount).toBe(1);
    });
  });

  describe('toTarget', () => {
    it('applies per-device overrides over defaults', () => {
      expect(toTarget({ ...fakeDescriptor('10.0.0.5'), port: 5005, password: 123 }, config.device)).toEqual({
        ip: '10.0.0.5',
        port: 5005,
        timeoutMs: 1000,
        inport: 4000,
        password: 123,
      });
      expect(toTarget(fakeDescriptor('10.0.0.6'), config.device).port).toBe(4370);
    });
  });
});
