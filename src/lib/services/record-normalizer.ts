/**
 * Record Normalizer
 *
 * Turns loosely-typed device records into canonical ones. Type mismatches on
 * numeric fields are silently defaulted to 0; a record without a user id or
 * timestamp is skipped; anything else that cannot be coerced is an error.
 */

import type {
  AttendanceEvent,
  AttendanceEventRaw,
  AttendanceStatus,
  UserPrivilege,
  UserRecord,
  UserRecordRaw,
} from '../../types/index.js';

/** Raw privilege level at or above which a device user is an administrator */
export const ADMIN_PRIVILEGE_LEVEL = 14;

/** Only this many normalization errors are reported in full per batch */
export const MAX_VERBOSE_ERRORS = 3;

export type SkipReason = 'missing-user-id' | 'missing-timestamp';

export type NormalizedAttendance =
  | { kind: 'event'; event: AttendanceEvent }
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'errored'; error: string };

export interface AttendanceBatch {
  events: AttendanceEvent[];
  skipped: number;
  errored: number;
  /** Messages for the first few errors only */
  errors: string[];
}

/**
 * Raised when a field holds a value that has no sensible text form
 */
export class CoercionError extends Error {
  constructor(field: string, detail: string) {
    super(`Cannot coerce ${field}: ${detail}`);
    this.name = 'CoercionError';
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Cast a device value to an integer, falling back to `fallback` for anything
 * that is not integral.
 */
export function toInteger(value: unknown, fallback = 0): number {
  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? Math.trunc(value) : fallback;
    case 'string': {
      const trimmed = value.trim();
      if (!INTEGER_PATTERN.test(trimmed)) return fallback;
      const parsed = Number.parseInt(trimmed, 10);
      return Number.isSafeInteger(parsed) ? parsed : fallback;
    }
    case 'boolean':
      return value ? 1 : 0;
    case 'bigint':
      return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value)
        : fallback;
    default:
      return fallback;
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render a Date as device-local `YYYY-MM-DD HH:mm:ss`
 */
export function formatDeviceTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Cast a device value to trimmed text. `null`/`undefined` become ''.
 * Throws CoercionError for values with no meaningful text form.
 */
export function toText(field: string, value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new CoercionError(field, 'invalid date');
    }
    return formatDeviceTime(value);
  }
  switch (typeof value) {
    case 'string':
      return value.trim();
    case 'number':
    case 'bigint':
    case 'boolean':
      return String(value).trim();
    default:
      throw new CoercionError(field, `unsupported ${typeof value} value`);
  }
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Normalize one raw attendance record. A uid the device did not send stays
 * null; a malformed one defaults to 0.
 */
export function normalizeAttendance(raw: AttendanceEventRaw): NormalizedAttendance {
  try {
    const uid = isAbsent(raw.uid) ? null : toInteger(raw.uid);
    const status = toInteger(raw.status);
    const punch = toInteger(raw.punch);
    const userId = toText('user_id', raw.userId);
    const timestamp = toText('timestamp', raw.timestamp);

    if (!userId) {
      return { kind: 'skipped', reason: 'missing-user-id' };
    }
    if (!timestamp) {
      return { kind: 'skipped', reason: 'missing-timestamp' };
    }

    return { kind: 'event', event: { uid, userId, timestamp, status, punch } };
  } catch (error) {
    return { kind: 'errored', error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Normalize a whole fetch. Every record is processed before the caller sees
 * any of them.
 */
export function normalizeAttendanceBatch(raws: AttendanceEventRaw[]): AttendanceBatch {
  const batch: AttendanceBatch = { events: [], skipped: 0, errored: 0, errors: [] };

  raws.forEach((raw, index) => {
    const result = normalizeAttendance(raw);
    switch (result.kind) {
      case 'event':
        batch.events.push(result.event);
        break;
      case 'skipped':
        batch.skipped++;
        break;
      case 'errored':
        batch.errored++;
        if (batch.errored <= MAX_VERBOSE_ERRORS) {
          const message = `Record ${index}: ${result.error}`;
          batch.errors.push(message);
          console.warn(`[normalizer] ${message}`);
        }
        break;
    }
  });

  if (batch.errored > MAX_VERBOSE_ERRORS) {
    console.warn(`[normalizer] ${batch.errored - MAX_VERBOSE_ERRORS} further record errors not shown`);
  }

  return batch;
}

/**
 * Map a raw privilege level to the two-level model
 */
export function toPrivilege(value: unknown): UserPrivilege {
  return toInteger(value) >= ADMIN_PRIVILEGE_LEVEL ? 'Admin' : 'Default';
}

function safeText(field: string, value: unknown): string {
  try {
    return toText(field, value);
  } catch {
    return '';
  }
}

/**
 * Normalize one raw user record. Never fails: missing or odd fields get
 * their documented defaults.
 */
export function normalizeUser(raw: UserRecordRaw): UserRecord {
  return {
    uid: toInteger(raw.uid),
    userId: safeText('user_id', raw.userId),
    name: safeText('name', raw.name),
    privilege: toPrivilege(raw.privilege),
    password: safeText('password', raw.password),
    groupId: safeText('group_id', raw.groupId),
    card: toInteger(raw.card),
  };
}

const STATUS_NAMES: Record<number, AttendanceStatus> = {
  0: 'CheckIn',
  1: 'CheckOut',
  2: 'BreakOut',
  3: 'BreakIn',
  4: 'OTIn',
  5: 'OTOut',
};

const STATUS_LABELS: Record<AttendanceStatus, string> = {
  CheckIn: 'Check-In',
  CheckOut: 'Check-Out',
  BreakOut: 'Break-Out',
  BreakIn: 'Break-In',
  OTIn: 'OT-In',
  OTOut: 'OT-Out',
  Unknown: 'Unknown',
};

export function toAttendanceStatus(code: number): AttendanceStatus {
  return STATUS_NAMES[code] ?? 'Unknown';
}

/**
 * Display label for a status code; unknown codes show the raw number
 */
export function describeStatus(code: number): string {
  const status = toAttendanceStatus(code);
  return status === 'Unknown' ? String(code) : STATUS_LABELS[status];
}
