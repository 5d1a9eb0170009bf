/**
 * Services exports
 */

export {
  SyncEngine,
  toTarget,
} from './sync-engine.js';

export type {
  SyncEngineConfig,
  SyncEngineOptions,
  DeviceSyncOutcome,
  DeviceSyncResult,
  CaptureLiveOptions,
} from './sync-engine.js';

export {
  DeviceErrorCodes,
  parseErrorCode,
  describeError,
  createDeviceError,
  formatDeviceError,
  withDeviceSession,
} from './device-communication.js';

export type {
  DeviceErrorCode,
  DeviceError,
  DeviceResult,
  SessionOptions,
} from './device-communication.js';

export {
  ADMIN_PRIVILEGE_LEVEL,
  MAX_VERBOSE_ERRORS,
  CoercionError,
  toInteger,
  toText,
  formatDeviceTime,
  normalizeAttendance,
  normalizeAttendanceBatch,
  normalizeUser,
  toPrivilege,
  toAttendanceStatus,
  describeStatus,
} from './record-normalizer.js';

export type {
  SkipReason,
  NormalizedAttendance,
  AttendanceBatch,
} from './record-normalizer.js';

export { NameResolver } from './name-resolver.js';

export { consumeLiveCapture } from './live-capture.js';
export type { LiveCaptureEvent, LiveCaptureOptions } from './live-capture.js';

export {
  RegistryError,
  parseDeviceRegistry,
  loadDeviceRegistry,
  findDevice,
} from './device-registry.js';

export {
  USERS_CSV_HEADERS,
  escapeCSVValue,
  exportUsersToCSV,
  defaultUsersExportFilename,
  writeUsersCsv,
} from './user-export.js';

export type { WriteUsersCsvOptions } from './user-export.js';

export {
  findUsersByUserId,
  searchUsersByName,
  listAdmins,
} from './user-directory.js';
