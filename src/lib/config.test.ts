import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({
      dbFile: 'zkteco.db',
      devicesFile: 'devices.json',
      device: { port: 4370, timeoutMs: 30000, inport: 4000, password: 0 },
      attendanceChunkSize: 1000,
      liveReadTimeoutMs: 10000,
      exportDir: 'Output',
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        ZK_DB_FILE: '/var/lib/zk/fleet.db',
        ZK_DEVICES_FILE: 'fleet.json',
        ZK_PORT: '5005',
        ZK_TIMEOUT_MS: '15000',
        ZK_INPORT: '5200',
        ZK_PASSWORD: '123',
        ZK_ATTENDANCE_CHUNK_SIZE: '250',
        ZK_LIVE_READ_TIMEOUT_MS: '2000',
        ZK_EXPORT_DIR: 'exports',
      })
    ).toEqual({
      dbFile: '/var/lib/zk/fleet.db',
      devicesFile: 'fleet.json',
      device: { port: 5005, timeoutMs: 15000, inport: 5200, password: 123 },
      attendanceChunkSize: 250,
      liveReadTimeoutMs: 2000,
      exportDir: 'exports',
    });
  });

  it('falls back with a warning on invalid numbers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = loadConfig({ ZK_PORT: 'http', ZK_ATTENDANCE_CHUNK_SIZE: '0', ZK_PASSWORD: '-1' });

    expect(config.device.port).toBe(4370);
    expect(config.attendanceChunkSize).toBe(1000);
    expect(config.device.password).toBe(0);
    expect(warn).toHaveBeenCalledWith('[config] Invalid ZK_PORT="http", using 4370');
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ ZK_DB_FILE: '  ', ZK_PORT: '' })).toEqual(DEFAULT_CONFIG);
  });
});
