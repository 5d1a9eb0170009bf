/**
 * Service interface and result types
 */

import type {
  AttendanceEventRaw,
  DeviceTarget,
  DeviceUserInput,
  UserRecordRaw,
} from './models.js';

// ============================================================================
// Device Session (protocol client boundary)
// ============================================================================

export type LiveCaptureItem =
  | { kind: 'event'; record: AttendanceEventRaw }
  | { kind: 'timeout' }
  | { kind: 'closed' };

/**
 * Pull-based view of a device's real-time event feed. Not restartable:
 * once closed, `next()` keeps yielding `closed`.
 */
export interface LiveCaptureStream {
  next(): Promise<LiveCaptureItem>;
  close(): Promise<void>;
}

/**
 * An open connection to one device
 */
export interface DeviceSession {
  /** Put the device into maintenance mode (keypad and sensor locked) */
  disable(): Promise<void>;
  /** Restore normal operation */
  enable(): Promise<void>;
  getUsers(): Promise<UserRecordRaw[]>;
  getAttendance(): Promise<AttendanceEventRaw[]>;
  liveCapture(readTimeoutMs: number): Promise<LiveCaptureStream>;
  setUser(user: DeviceUserInput): Promise<void>;
  deleteUser(uid: number): Promise<void>;
  disconnect(): Promise<void>;
}

export type DeviceConnector = (target: DeviceTarget) => Promise<DeviceSession>;

// ============================================================================
// Store Results
// ============================================================================

export interface UserWriteSummary {
  upsertedCount: number;
  errorCount: number;
}

export interface AttendanceWriteSummary {
  insertedCount: number;
  duplicateCount: number;
  skippedCount: number;
  errorCount: number;
}

// ============================================================================
// Sync Results
// ============================================================================

export type FleetSyncMode = 'users' | 'attendance';

export interface DeviceSyncTally {
  fetched: number;
  inserted: number;
  duplicates: number;
  skipped: number;
  errors: number;
}

export interface FailedDevice {
  name: string;
  ip: string;
  error: string;
}

export interface FleetReport {
  mode: FleetSyncMode;
  attempted: number;
  succeeded: number;
  failedDevices: FailedDevice[];
  totalRecords: number;
  startedAt: string;
  finishedAt: string;
}

export interface LiveCaptureSummary {
  captured: number;
  timeouts: number;
  skipped: number;
  stoppedBy: 'cancelled' | 'closed';
}
