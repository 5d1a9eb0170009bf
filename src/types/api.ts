/**
 * Database row and query types
 */

// ============================================================================
// Database Row Types (snake_case as stored in SQLite)
// ============================================================================

export interface UserRow {
  id: number;
  device_ip: string;
  uid: number;
  name: string | null;
  privilege: string | null;
  password: string | null;
  group_id: string | null;
  user_id: string | null;
  card: string | null;
  synced_at: string;
}

export interface AttendanceRow {
  id: number;
  device_ip: string;
  uid: number | null;
  user_id: string;
  name: string | null;
  timestamp: string;
  status: number | null;
  punch: number | null;
  imported_at: string;
}

// ============================================================================
// Query Types
// ============================================================================

export interface UserQuery {
  deviceIp?: string;
}

export interface AttendanceQuery {
  deviceIp?: string;
  userId?: string;
  limit?: number;
}
