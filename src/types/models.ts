/**
 * Data model types for ZK fleet sync
 */

// ============================================================================
// Device Types
// ============================================================================

/**
 * Static descriptor of one fleet member, as listed in the device registry.
 * `ip` is the fleet-unique key.
 */
export interface DeviceDescriptor {
  ip: string;
  name: string;
  location: string;
  status: string;
  dateInstalled: string;
  dateExpired: string;
  notes: string;
  /** Overrides the configured device port */
  port?: number;
  /** Per-device comm key (shared secret); overrides the configured default */
  password?: number;
}

/**
 * Everything the device connector needs to open a session
 */
export interface DeviceTarget {
  ip: string;
  port: number;
  timeoutMs: number;
  inport: number;
  password: number;
}

// ============================================================================
// User Types
// ============================================================================

export type UserPrivilege = 'Admin' | 'Default';

/**
 * User record as it arrives from a device. Devices are loose about types,
 * so members are optional and untyped until normalized.
 */
export interface UserRecordRaw {
  uid?: unknown;
  userId?: unknown;
  name?: string | null;
  privilege?: unknown;
  password?: string | null;
  groupId?: unknown;
  card?: unknown;
}

export interface UserRecord {
  uid: number;
  userId: string;
  name: string;
  privilege: UserPrivilege;
  password: string;
  groupId: string;
  card: number;
}

/**
 * Input for writing a user onto a device
 */
export interface DeviceUserInput {
  uid: number;
  userId: string;
  name: string;
  privilege: UserPrivilege;
  password?: string;
  groupId?: string;
  card?: number;
}

// ============================================================================
// Attendance Types
// ============================================================================

export const AttendanceStatusCodes = {
  CHECK_IN: 0,
  CHECK_OUT: 1,
  BREAK_OUT: 2,
  BREAK_IN: 3,
  OT_IN: 4,
  OT_OUT: 5,
} as const;

export type AttendanceStatusCode = typeof AttendanceStatusCodes[keyof typeof AttendanceStatusCodes];

export type AttendanceStatus =
  | 'CheckIn'
  | 'CheckOut'
  | 'BreakOut'
  | 'BreakIn'
  | 'OTIn'
  | 'OTOut'
  | 'Unknown';

export interface AttendanceEventRaw {
  uid?: unknown;
  userId?: unknown;
  timestamp?: unknown;
  status?: unknown;
  punch?: unknown;
}

/**
 * Normalized attendance punch. `timestamp` is device-local time rendered as
 * text; devices carry no timezone. `uid` is null when the device sent none.
 */
export interface AttendanceEvent {
  uid: number | null;
  userId: string;
  timestamp: string;
  status: number;
  punch: number;
}

// ============================================================================
// Persisted Rows
// ============================================================================

export interface PersistedUserRow extends UserRecord {
  deviceIp: string;
}

/**
 * A punch with its uid settled against the roster and its name resolved
 */
export interface AttributedEvent extends Omit<AttendanceEvent, 'uid'> {
  uid: number;
  name: string;
}

export interface PersistedAttendanceRow extends AttributedEvent {
  deviceIp: string;
}

export interface StoredUser extends PersistedUserRow {
  id: number;
  syncedAt: string;
}

export interface StoredAttendance extends PersistedAttendanceRow {
  id: number;
  importedAt: string;
}
