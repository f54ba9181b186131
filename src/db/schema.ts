/**
 * SQLite schema for mimic.
 *
 * Two tables: sessions and messages. Deleting a session takes its
 * messages with it (foreign_keys is switched on per connection).
 */

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS sessions (
    id         TEXT PRIMARY KEY,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS messages (
    id         TEXT PRIMARY KEY,
    session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    role       TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content    TEXT NOT NULL DEFAULT '',
    status     TEXT NOT NULL DEFAULT 'complete' CHECK (status IN ('complete', 'pending', 'error')),
    metadata   TEXT NOT NULL DEFAULT '{}',  -- JSON object
    created_at TEXT NOT NULL
  );

  -- Turns of a session in order
  CREATE INDEX IF NOT EXISTS idx_messages_session
    ON messages(session_id, created_at);

  -- Admin list and cleanup: stalest sessions
  CREATE INDEX IF NOT EXISTS idx_sessions_updated
    ON sessions(updated_at);
`;
