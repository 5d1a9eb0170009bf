/**
 * Type exports for ZK fleet sync
 */

// Data models
export type {
  DeviceDescriptor,
  DeviceTarget,
  UserPrivilege,
  UserRecordRaw,
  UserRecord,
  DeviceUserInput,
  AttendanceStatusCode,
  AttendanceStatus,
  AttendanceEventRaw,
  AttendanceEvent,
  AttributedEvent,
  PersistedUserRow,
  PersistedAttendanceRow,
  StoredUser,
  StoredAttendance,
} from './models.js';

export { AttendanceStatusCodes } from './models.js';

// Service interfaces
export type {
  LiveCaptureItem,
  LiveCaptureStream,
  DeviceSession,
  DeviceConnector,
  UserWriteSummary,
  AttendanceWriteSummary,
  FleetSyncMode,
  DeviceSyncTally,
  FailedDevice,
  FleetReport,
  LiveCaptureSummary,
} from './services.js';

// Row and query types
export type {
  UserRow,
  AttendanceRow,
  UserQuery,
  AttendanceQuery,
} from './api.js';
