/**
 * DDL for the two relations the tracker persists. Applied on every open;
 * each statement is idempotent.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT UNIQUE NOT NULL,
  password_hash TEXT NOT NULL,
  created_at TEXT NOT NULL
)`,
  `CREATE TABLE IF NOT EXISTS bmi_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users (id),
  weight REAL NOT NULL,
  height REAL NOT NULL,
  bmi REAL NOT NULL,
  category TEXT NOT NULL,
  recorded_at TEXT NOT NULL
)`,
  `CREATE INDEX IF NOT EXISTS idx_bmi_records_user_recorded
  ON bmi_records (user_id, recorded_at)`,
];
