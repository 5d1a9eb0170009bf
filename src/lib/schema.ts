/**
 * Store schema. Additive only: every statement is create-if-absent, nothing
 * here drops or truncates existing data.
 */

export const SCHEMA = `
-- Users synced from each device; latest sync supersedes the previous row
CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    device_ip TEXT NOT NULL,
    uid INTEGER,
    name TEXT,
    privilege TEXT,
    password TEXT,
    group_id TEXT,
    user_id TEXT,
    card TEXT,
    synced_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(device_ip, uid)
);

-- Attendance punches; immutable once observed
CREATE TABLE IF NOT EXISTS attendance (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    device_ip TEXT NOT NULL,
    uid INTEGER,
    user_id TEXT NOT NULL,
    name TEXT,
    timestamp TIMESTAMP,
    status INTEGER,
    punch INTEGER,
    imported_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    UNIQUE(device_ip, user_id, timestamp)
);

CREATE INDEX IF NOT EXISTS idx_users_user_id ON users(user_id);
CREATE INDEX IF NOT EXISTS idx_attendance_timestamp ON attendance(timestamp);
CREATE INDEX IF NOT EXISTS idx_attendance_user_id ON attendance(device_ip, user_id);
`;
