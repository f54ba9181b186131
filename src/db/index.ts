import initSqlJs from 'sql.js';
import type { Database, SqlValue } from 'sql.js';
import { randomUUID } from 'node:crypto';
import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { SCHEMA } from './schema.js';
import type {
  Message,
  MessageMetadata,
  MessageRole,
  MessageStatus,
  Session,
  SessionPreview,
  SessionSummary,
} from '../types/index.js';

let db: Database | undefined;
/** Backing file; null for ':memory:' */
let file: string | null = null;

/**
 * Open (or create) the database. sql.js keeps it in memory; every write
 * is flushed back to `path`. Pass ':memory:' for a throwaway database.
 */
export async function initDatabase(path: string = 'mimic.db'): Promise<Database> {
  closeDatabase();
  // CommonJS package: the callable sits on .default under NodeNext
  const SQL = await initSqlJs.default();
  const target = path === ':memory:' ? null : path;
  const database = new SQL.Database(target && existsSync(target) ? readFileSync(target) : undefined);
  database.exec('PRAGMA foreign_keys = ON');
  database.exec(SCHEMA);

  db = database;
  file = target;
  save();
  return database;
}

export function getDatabase(): Database {
  if (!db) throw new Error('Database not initialized. Call initDatabase() first.');
  return db;
}

export function closeDatabase(): void {
  db?.close();
  db = undefined;
  file = null;
}

// ── Statements ─────────────────────────────────────────────

function all(sql: string, params: SqlValue[] = []): unknown[] {
  const stmt = getDatabase().prepare(sql);
  try {
    stmt.bind(params);
    const rows: unknown[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

function get(sql: string, params: SqlValue[] = []): unknown {
  return all(sql, params)[0];
}

/** Execute a write and flush it to disk. Returns the changed row count. */
function run(sql: string, params: SqlValue[] = []): number {
  const database = getDatabase();
  database.run(sql, params);
  const changes = database.getRowsModified();
  save();
  return changes;
}

function save(): void {
  if (!db || !file) return;
  const tmp = `${file}.tmp`;
  writeFileSync(tmp, db.export());
  renameSync(tmp, file);
  // export() reopens the connection, which resets per-connection pragmas
  db.exec('PRAGMA foreign_keys = ON');
}

// ── Row shapes ─────────────────────────────────────────────

const sessionRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const previewRowSchema = sessionRowSchema.extend({
  message_count: z.number(),
  last_message: z.string().nullable(),
});

const snapshotSchema = z.object({
  communicationStyle: z.array(z.string()),
  technicalExpertise: z.array(z.string()),
  decisionPatterns: z.array(z.string()),
  personalityTraits: z.array(z.string()),
  chunks: z.array(z.object({
    id: z.string(),
    speaker: z.string(),
    fileSource: z.string(),
    content: z.string(),
  })),
});

const metadataSchema = z.object({
  source: z.enum(['llm', 'fallback', 'error']).optional(),
  error: z.string().optional(),
  personaContext: snapshotSchema.optional(),
});

const messageRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  status: z.enum(['complete', 'pending', 'error']),
  metadata: z.string(),
  created_at: z.string(),
});

const countRowSchema = z.object({ role: z.enum(['user', 'assistant']), count: z.number() });

// ── Sessions ───────────────────────────────────────────────

export function createSession(): Session {
  const id = randomUUID();
  const now = new Date().toISOString();

  run('INSERT INTO sessions (id, created_at, updated_at) VALUES (?, ?, ?)', [id, now, now]);

  return { id, createdAt: now, updatedAt: now };
}

export function getSession(id: string): Session | null {
  const row = get('SELECT * FROM sessions WHERE id = ?', [id]);
  return row ? rowToSession(sessionRowSchema.parse(row)) : null;
}

/** Most recently active first */
export function listSessions(opts: { limit?: number; offset?: number } = {}): SessionPreview[] {
  const limit = opts.limit ?? 50;
  const offset = opts.offset ?? 0;

  const rows = all(`
    SELECT s.*,
      (SELECT COUNT(*) FROM messages m WHERE m.session_id = s.id) AS message_count,
      (SELECT substr(m.content, 1, 100) FROM messages m
        WHERE m.session_id = s.id
        ORDER BY m.created_at DESC, m.rowid DESC LIMIT 1) AS last_message
    FROM sessions s
    ORDER BY s.updated_at DESC, s.rowid DESC
    LIMIT ? OFFSET ?
  `, [limit, offset]);

  return rows.map(raw => {
    const row = previewRowSchema.parse(raw);
    return {
      ...rowToSession(row),
      messageCount: row.message_count,
      lastMessage: row.last_message,
    };
  });
}

/** Returns false when there was no such session */
export function deleteSession(id: string): boolean {
  return run('DELETE FROM sessions WHERE id = ?', [id]) > 0;
}

/** Delete sessions idle for longer than `olderThanDays`. Returns how many went. */
export function cleanupSessions(olderThanDays: number): number {
  const cutoff = new Date(Date.now() - olderThanDays * 24 * 60 * 60 * 1000).toISOString();
  return run('DELETE FROM sessions WHERE updated_at < ?', [cutoff]);
}

function touchSession(sessionId: string, now: string): void {
  run('UPDATE sessions SET updated_at = ? WHERE id = ?', [now, sessionId]);
}

// ── Messages ───────────────────────────────────────────────

export function addMessage(
  sessionId: string,
  role: MessageRole,
  content: string,
  opts: { status?: MessageStatus; metadata?: MessageMetadata } = {},
): Message {
  const id = randomUUID();
  const now = new Date().toISOString();
  const status = opts.status ?? 'complete';
  const metadata = opts.metadata ?? {};

  run(`
    INSERT INTO messages (id, session_id, role, content, status, metadata, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `, [id, sessionId, role, content, status, JSON.stringify(metadata), now]);
  touchSession(sessionId, now);

  return { id, sessionId, role, content, status, createdAt: now, metadata };
}

/** Placeholder for an assistant turn that is still being generated */
export function addPendingMessage(sessionId: string): Message {
  return addMessage(sessionId, 'assistant', '', { status: 'pending' });
}

/** Write the final content of a pending turn. Returns false if it is gone. */
export function resolvePendingMessage(
  id: string,
  content: string,
  status: Exclude<MessageStatus, 'pending'> = 'complete',
  metadata: MessageMetadata = {},
): boolean {
  const changes = run(
    "UPDATE messages SET content = ?, status = ?, metadata = ? WHERE id = ? AND status = 'pending'",
    [content, status, JSON.stringify(metadata), id],
  );

  if (changes > 0) {
    const row = get('SELECT session_id FROM messages WHERE id = ?', [id]);
    const parsed = z.object({ session_id: z.string() }).safeParse(row);
    if (parsed.success) touchSession(parsed.data.session_id, new Date().toISOString());
  }
  return changes > 0;
}

export function deleteMessage(id: string): boolean {
  return run('DELETE FROM messages WHERE id = ?', [id]) > 0;
}

export function getMessage(id: string): Message | null {
  const row = get('SELECT * FROM messages WHERE id = ?', [id]);
  return row ? rowToMessage(row) : null;
}

/** Oldest first */
export function getMessages(sessionId: string, limit = 100): Message[] {
  return all(`
    SELECT * FROM messages
    WHERE session_id = ?
    ORDER BY created_at ASC, rowid ASC
    LIMIT ?
  `, [sessionId, limit]).map(rowToMessage);
}

export function getMessagesSince(sessionId: string, since: string, limit = 50): Message[] {
  return all(`
    SELECT * FROM messages
    WHERE session_id = ? AND created_at > ?
    ORDER BY created_at ASC, rowid ASC
    LIMIT ?
  `, [sessionId, since, limit]).map(rowToMessage);
}

/**
 * The last `limit` complete turns, oldest first.
 * Pending and error turns never reach the model.
 */
export function getHistory(sessionId: string, limit: number): Message[] {
  if (limit <= 0) return [];
  const newestFirst = all(`
    SELECT * FROM messages
    WHERE session_id = ? AND status = 'complete'
    ORDER BY created_at DESC, rowid DESC
    LIMIT ?
  `, [sessionId, limit]).map(rowToMessage);
  return newestFirst.reverse();
}

export function getPendingMessage(sessionId: string): Message | null {
  const row = get(`
    SELECT * FROM messages
    WHERE session_id = ? AND status = 'pending'
    ORDER BY created_at DESC, rowid DESC
    LIMIT 1
  `, [sessionId]);
  return row ? rowToMessage(row) : null;
}

/** Keep only the newest `max` turns. Pending turns are never trimmed. Returns how many went. */
export function trimHistory(sessionId: string, max: number): number {
  return run(`
    DELETE FROM messages
    WHERE status != 'pending' AND id IN (
      SELECT id FROM messages
      WHERE session_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT -1 OFFSET ?
    )
  `, [sessionId, Math.max(0, max)]);
}

export function getSessionSummary(sessionId: string): SessionSummary | null {
  const session = getSession(sessionId);
  if (!session) return null;

  const counts = all(
    'SELECT role, COUNT(*) AS count FROM messages WHERE session_id = ? GROUP BY role',
    [sessionId],
  ).map(row => countRowSchema.parse(row));

  const userMessages = counts.find(c => c.role === 'user')?.count ?? 0;
  const assistantMessages = counts.find(c => c.role === 'assistant')?.count ?? 0;
  const durationMs = Date.parse(session.updatedAt) - Date.parse(session.createdAt);

  return {
    sessionId,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    totalMessages: userMessages + assistantMessages,
    userMessages,
    assistantMessages,
    durationMinutes: Math.round(durationMs / 600) / 100,
  };
}

// ── Row Mappers ────────────────────────────────────────────

function rowToSession(row: z.infer<typeof sessionRowSchema>): Session {
  return {
    id: row.id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToMessage(raw: unknown): Message {
  const row = messageRowSchema.parse(raw);
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    status: row.status,
    createdAt: row.created_at,
    metadata: parseMetadata(row.metadata),
  };
}

function parseMetadata(json: string): MessageMetadata {
  try {
    const parsed = metadataSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}
