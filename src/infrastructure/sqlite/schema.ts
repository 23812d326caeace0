export const SCHEMA_VERSION = 1;

export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS command_history (
  history_id INTEGER PRIMARY KEY,
  command TEXT NOT NULL,
  session_id TEXT NOT NULL,
  executed_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS bookmarked_commands (
  bookmark_id TEXT PRIMARY KEY,
  command TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  tags_json TEXT NOT NULL DEFAULT '[]',
  is_favorite INTEGER NOT NULL DEFAULT 0 CHECK(is_favorite IN (0, 1)),
  use_count INTEGER NOT NULL DEFAULT 0,
  last_used INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_history_session ON command_history(session_id);
CREATE INDEX IF NOT EXISTS idx_history_executed_at ON command_history(executed_at);
CREATE INDEX IF NOT EXISTS idx_bookmarks_favorite ON bookmarked_commands(is_favorite);
`;
