/**
 * Command dispatch for the `zk-fleet` CLI. `main` never throws; it
 * resolves to the process exit code.
 */

import { emitKeypressEvents } from 'node:readline';
import type { AppConfig } from './lib/config.js';
import { closeDatabase, initDatabase } from './lib/database.js';
import { findDevice, loadDeviceRegistry, RegistryError } from './lib/services/device-registry.js';
import { describeError, formatDeviceError } from './lib/services/device-communication.js';
import type { LiveCaptureEvent } from './lib/services/live-capture.js';
import { SyncEngine } from './lib/services/sync-engine.js';
import { writeUsersCsv } from './lib/services/user-export.js';
import type { DeviceConnector, DeviceDescriptor, FleetReport } from './types/index.js';

export const ExitCodes = {
  OK: 0,
  DEVICE_FAILED: 1,
  REGISTRY_ERROR: 2,
  USAGE: 64,
} as const;

export interface CommandContext {
  config: AppConfig;
  /** Device connector override, mainly for tests */
  connect?: DeviceConnector;
  /** Cancels a live capture; when absent the CLI wires `q` and Ctrl+C */
  signal?: AbortSignal;
}

const USAGE = `Usage: zk-fleet <command>

Commands:
  devices                 List the device registry
  sync-users              Sync users from every device
  sync-attendance         Sync attendance from every device
  export-users <ip>       Export one device's users to CSV
  live <ip>               Stream live punches (q or Ctrl+C to stop)`;

function printDevices(devices: DeviceDescriptor[]): void {
  if (devices.length === 0) {
    console.log('No attendance devices in the list.');
    return;
  }
  devices.forEach((device, index) => {
    const fields = [device.name, device.location, device.status, device.dateInstalled, device.dateExpired, device.notes]
      .map((value) => value || 'N/A');
    console.log(`${index + 1}. ${device.ip} | ${fields.join(' | ')}`);
  });
}

function printReport(report: FleetReport): void {
  console.log(`${report.mode === 'users' ? 'User' : 'Attendance'} sync results`);
  console.log(`Success: ${report.succeeded}/${report.attempted} devices`);
  console.log(`Total records: ${report.totalRecords}`);
  if (report.failedDevices.length > 0) {
    console.log('Failed devices:');
    for (const failed of report.failedDevices) {
      console.log(`  - ${failed.name || 'N/A'} (${failed.ip}): ${failed.error}`);
    }
  }
}

function printLiveEvent(event: LiveCaptureEvent): void {
  console.log(
    [event.sequence, event.uid, event.userId, event.name, event.timestamp, event.statusLabel].join(' | ')
  );
}

/**
 * Abort on `q` or Ctrl+C from a TTY stdin, or on SIGINT. Returns the
 * signal and a teardown that restores the terminal.
 */
function keyboardAbort(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const stdin = process.stdin;

  const onKeypress = (_text: string | undefined, key: { name?: string; ctrl?: boolean } | undefined): void => {
    if (key?.name === 'q' || (key?.ctrl && key.name === 'c')) {
      controller.abort();
    }
  };
  const onSigint = (): void => controller.abort();

  process.on('SIGINT', onSigint);
  if (stdin.isTTY) {
    emitKeypressEvents(stdin);
    stdin.setRawMode(true);
    stdin.on('keypress', onKeypress);
    stdin.resume();
  }

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSigint);
      if (stdin.isTTY) {
        stdin.off('keypress', onKeypress);
        stdin.setRawMode(false);
        stdin.pause();
      }
    },
  };
}

function resolveDevice(devices: DeviceDescriptor[], ip: string): DeviceDescriptor {
  return findDevice(devices, ip) ?? {
    ip,
    name: '',
    location: '',
    status: '',
    dateInstalled: '',
    dateExpired: '',
    notes: '',
  };
}

async function runCommand(command: string, args: string[], context: CommandContext): Promise<number> {
  const { config } = context;
  const devices = await loadDeviceRegistry(config.devicesFile);

  if (command === 'devices') {
    printDevices(devices);
    return ExitCodes.OK;
  }

  const engine = new SyncEngine({
    config,
    ...(context.connect ? { connect: context.connect } : {}),
  });

  switch (command) {
    case 'sync-users':
    case 'sync-attendance': {
      initDatabase(config.dbFile);
      try {
        const report = await engine.runFleet(devices, command === 'sync-users' ? 'users' : 'attendance');
        printReport(report);
        return report.failedDevices.length > 0 ? ExitCodes.DEVICE_FAILED : ExitCodes.OK;
      } finally {
        closeDatabase();
      }
    }

    case 'export-users': {
      const device = resolveDevice(devices, args[0] ?? '');
      const result = await engine.fetchUsers(device);
      if (!result.success) {
        console.error(`Export failed: ${formatDeviceError(result.error)}`);
        return ExitCodes.DEVICE_FAILED;
      }
      await writeUsersCsv(result.value, device.ip, { dir: config.exportDir });
      return ExitCodes.OK;
    }

    case 'live': {
      const device = resolveDevice(devices, args[0] ?? '');
      const keyboard = context.signal ? null : keyboardAbort();
      const signal = context.signal ?? keyboard?.signal;
      console.log(`Live capture from ${device.ip} (press 'q' to quit)`);
      try {
        const result = await engine.captureLive(device, {
          onEvent: printLiveEvent,
          ...(signal ? { signal } : {}),
        });
        if (!result.success) {
          console.error(`Live capture failed: ${formatDeviceError(result.error)}`);
          return ExitCodes.DEVICE_FAILED;
        }
        console.log(`Live capture stopped. Events captured: ${result.value.captured}`);
        return ExitCodes.OK;
      } finally {
        keyboard?.dispose();
      }
    }

    default:
      console.error(USAGE);
      return ExitCodes.USAGE;
  }
}

export async function main(argv: string[], context: CommandContext): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === 'help' || command === '--help') {
    console.log(USAGE);
    return command ? ExitCodes.OK : ExitCodes.USAGE;
  }
  if ((command === 'export-users' || command === 'live') && !args[0]) {
    console.error(`${command} needs a device ip\n\n${USAGE}`);
    return ExitCodes.USAGE;
  }

  try {
    return await runCommand(command, args, context);
  } catch (error) {
    if (error instanceof RegistryError) {
      console.error(`[registry] ${error.message}`);
      return ExitCodes.REGISTRY_ERROR;
    }
    console.error(`[zk-fleet] ${describeError(error)}`);
    return ExitCodes.DEVICE_FAILED;
  }
}
