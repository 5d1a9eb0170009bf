import dotenv from 'dotenv';

export interface AppConfig {
  dbFile: string;
  devicesFile: string;
  device: {
    port: number;
    timeoutMs: number;
    inport: number;
    password: number;
  };
  attendanceChunkSize: number;
  liveReadTimeoutMs: number;
  exportDir: string;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: AppConfig = {
  dbFile: 'zkteco.db',
  devicesFile: 'devices.json',
  device: {
    port: 4370,
    timeoutMs: 30000,
    inport: 4000,
    password: 0,
  },
  attendanceChunkSize: 1000,
  liveReadTimeoutMs: 10000,
  exportDir: 'Output',
};

/**
 * Read an integer variable, falling back to the default (with a warning)
 * when it is not an integer of at least `min`
 */
function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    console.warn(`[config] Invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

/**
 * Build the typed configuration from an environment map
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    dbFile: readString(env, 'ZK_DB_FILE', DEFAULT_CONFIG.dbFile),
    devicesFile: readString(env, 'ZK_DEVICES_FILE', DEFAULT_CONFIG.devicesFile),
    device: {
      port: readInteger(env, 'ZK_PORT', DEFAULT_CONFIG.device.port, 1),
      timeoutMs: readInteger(env, 'ZK_TIMEOUT_MS', DEFAULT_CONFIG.device.timeoutMs, 1),
      inport: readInteger(env, 'ZK_INPORT', DEFAULT_CONFIG.device.inport, 1),
      password: readInteger(env, 'ZK_PASSWORD', DEFAULT_CONFIG.device.password, 0),
    },
    attendanceChunkSize: readInteger(env, 'ZK_ATTENDANCE_CHUNK_SIZE', DEFAULT_CONFIG.attendanceChunkSize, 1),
    liveReadTimeoutMs: readInteger(env, 'ZK_LIVE_READ_TIMEOUT_MS', DEFAULT_CONFIG.liveReadTimeoutMs, 1),
    exportDir: readString(env, 'ZK_EXPORT_DIR', DEFAULT_CONFIG.exportDir),
  };
}

/**
 * Load `.env` into process.env (existing variables win), then build the config
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
