import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as db from '../src/db/index.js';
import { tempDir } from './helpers.js';

const T0 = new Date('2026-03-01T10:00:00.000Z');

function at(offsetMs: number): void {
  vi.setSystemTime(new Date(T0.getTime() + offsetMs));
}

beforeEach(async () => {
  vi.useFakeTimers({ toFake: ['Date'] });
  at(0);
  await db.initDatabase(':memory:');
});

afterEach(() => {
  db.closeDatabase();
  vi.useRealTimers();
});

describe('sessions', () => {
  it('creates and reads back a session', () => {
    const session = db.createSession();

    expect(db.getSession(session.id)).toEqual({
      id: session.id,
      createdAt: T0.toISOString(),
      updatedAt: T0.toISOString(),
    });
    expect(db.getSession('missing')).toBeNull();
  });

  it('lists the most recently active first, with previews', () => {
    const older = db.createSession();
    at(1000);
    const newer = db.createSession();
    at(2000);
    db.addMessage(older.id, 'user', 'x'.repeat(150));

    const list = db.listSessions();

    expect(list.map(s => s.id)).toEqual([older.id, newer.id]);
    expect(list[0].messageCount).toBe(1);
    expect(list[0].lastMessage).toBe('x'.repeat(100));
    expect(list[1]).toMatchObject({ messageCount: 0, lastMessage: null });
    expect(db.listSessions({ limit: 1, offset: 1 }).map(s => s.id)).toEqual([newer.id]);
  });

  it('deletes a session with its messages', () => {
    const session = db.createSession();
    const message = db.addMessage(session.id, 'user', 'hello');

    expect(db.deleteSession(session.id)).toBe(true);
    expect(db.getMessage(message.id)).toBeNull();
    expect(db.deleteSession(session.id)).toBe(false);
  });

  it('cleans up idle sessions', () => {
    const stale = db.createSession();
    at(10 * 24 * 60 * 60 * 1000);
    const fresh = db.createSession();

    expect(db.cleanupSessions(7)).toBe(1);
    expect(db.getSession(stale.id)).toBeNull();
    expect(db.getSession(fresh.id)).not.toBeNull();
  });

  it('summarises a session', () => {
    const session = db.createSession();
    db.addMessage(session.id, 'assistant', 'Hi');
    at(90_000);
    db.addMessage(session.id, 'user', 'Question');

    expect(db.getSessionSummary(session.id)).toEqual({
      sessionId: session.id,
      createdAt: T0.toISOString(),
      updatedAt: new Date(T0.getTime() + 90_000).toISOString(),
      totalMessages: 2,
      userMessages: 1,
      assistantMessages: 1,
      durationMinutes: 1.5,
    });
    expect(db.getSessionSummary('missing')).toBeNull();
  });
});

describe('messages', () => {
  it('stores metadata and touches the session', () => {
    const session = db.createSession();
    at(5000);
    const message = db.addMessage(session.id, 'assistant', 'Hello', { metadata: { source: 'llm' } });

    expect(db.getMessage(message.id)).toEqual({
      id: message.id,
      sessionId: session.id,
      role: 'assistant',
      content: 'Hello',
      status: 'complete',
      createdAt: new Date(T0.getTime() + 5000).toISOString(),
      metadata: { source: 'llm' },
    });
    expect(db.getSession(session.id)?.updatedAt).toBe(new Date(T0.getTime() + 5000).toISOString());
  });

  it('reads unparseable metadata as empty', () => {
    const session = db.createSession();
    const message = db.addMessage(session.id, 'user', 'hi');
    db.getDatabase().run('UPDATE messages SET metadata = ? WHERE id = ?', ['{broken', message.id]);

    expect(db.getMessage(message.id)?.metadata).toEqual({});
  });

  it('resolves a pending turn exactly once', () => {
    const session = db.createSession();
    const pending = db.addPendingMessage(session.id);

    expect(pending).toMatchObject({ role: 'assistant', content: '', status: 'pending' });
    expect(db.getPendingMessage(session.id)?.id).toBe(pending.id);

    expect(db.resolvePendingMessage(pending.id, 'Done', 'complete', { source: 'llm' })).toBe(true);
    expect(db.resolvePendingMessage(pending.id, 'Again')).toBe(false);
    expect(db.getMessage(pending.id)).toMatchObject({ content: 'Done', status: 'complete', metadata: { source: 'llm' } });
    expect(db.getPendingMessage(session.id)).toBeNull();
  });

  it('does not resolve a deleted pending turn', () => {
    const session = db.createSession();
    const pending = db.addPendingMessage(session.id);

    expect(db.deleteMessage(pending.id)).toBe(true);
    expect(db.resolvePendingMessage(pending.id, 'late')).toBe(false);
    expect(db.getMessages(session.id)).toEqual([]);
  });

  it('builds history from complete turns only', () => {
    const session = db.createSession();
    db.addMessage(session.id, 'assistant', 'greeting');
    db.addMessage(session.id, 'user', 'first');
    db.addMessage(session.id, 'assistant', 'sorry', { status: 'error' });
    db.addMessage(session.id, 'user', 'second');
    db.addPendingMessage(session.id);

    expect(db.getHistory(session.id, 10).map(m => m.content)).toEqual(['greeting', 'first', 'second']);
    expect(db.getHistory(session.id, 2).map(m => m.content)).toEqual(['first', 'second']);
    expect(db.getHistory(session.id, 0)).toEqual([]);
  });

  it('returns messages newer than a timestamp', () => {
    const session = db.createSession();
    db.addMessage(session.id, 'user', 'old');
    at(1000);
    db.addMessage(session.id, 'user', 'new');

    expect(db.getMessagesSince(session.id, T0.toISOString()).map(m => m.content)).toEqual(['new']);
  });

  it('trims old turns but never a pending one', () => {
    const session = db.createSession();
    for (const content of ['m1', 'm2', 'm3', 'm4']) db.addMessage(session.id, 'user', content);
    db.addPendingMessage(session.id);

    expect(db.trimHistory(session.id, 2)).toBe(3);
    expect(db.getMessages(session.id).map(m => m.content || m.status)).toEqual(['m4', 'pending']);
  });
});

describe('database file', () => {
  it('is written on open and survives a restart', async () => {
    const path = join(tempDir(), 'chat.db');
    await db.initDatabase(path);
    expect(existsSync(path)).toBe(true);

    const session = db.createSession();
    db.addMessage(session.id, 'user', 'remember me');
    db.closeDatabase();

    await db.initDatabase(path);
    expect(db.getSession(session.id)?.id).toBe(session.id);
    expect(db.getMessages(session.id).map(m => m.content)).toEqual(['remember me']);
  });

  it('still cascades deletes after writes were flushed', async () => {
    await db.initDatabase(join(tempDir(), 'chat.db'));
    const session = db.createSession();
    const message = db.addMessage(session.id, 'user', 'hello');

    expect(db.deleteSession(session.id)).toBe(true);
    expect(db.getMessage(message.id)).toBeNull();
  });
});
