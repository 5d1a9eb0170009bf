/**
 * Public API
 */

export * from './lib/services/index.js';
export * from './types/index.js';

export {
  initDatabase,
  getDatabase,
  closeDatabase,
  ensureSchema,
} from './lib/database.js';

export { userRepository, upsertUsers, listUsers, getUser, getUserCount } from './lib/repositories/user.repository.js';
export {
  attendanceRepository,
  appendAttendance,
  listAttendance,
  getAttendanceCount,
  DEFAULT_ATTENDANCE_CHUNK_SIZE,
} from './lib/repositories/attendance-log.repository.js';
export type { AppendAttendanceOptions } from './lib/repositories/attendance-log.repository.js';

export { ZKTecoClient, ZKCommands, makeCommKey, encodeUserPacket } from './lib/device/zkteco-client.js';
export { PushLiveCaptureStream } from './lib/device/live-capture-stream.js';

export { loadConfig, loadConfigFromEnvironment, DEFAULT_CONFIG } from './lib/config.js';
export type { AppConfig, Env } from './lib/config.js';

export { main, ExitCodes } from './commands.js';
export type { CommandContext } from './commands.js';
