/**
 * API routes for mimic.
 *
 * Two audiences, two prefixes:
 *   /api/chat/*   — user-facing (public)
 *   /api/admin/*  — operator-facing (token-protected)
 */

import { Hono, type Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import * as db from '../db/index.js';
import type { HistoryConfig } from '../types/index.js';
import type { Responder } from '../core/responder.js';
import type { RetrievalEngine } from '../core/retrieval.js';
import { errorMessage } from '../core/errors.js';
import type { LLMAdapter } from '../llm/index.js';
import {
  addListener,
  cancelJob,
  hasActiveJob,
  processInBackground,
  replyInForeground,
} from './jobs.js';

export const VERSION = '0.1.0';

export interface APIDeps {
  responder: Responder;
  llm: LLMAdapter;
  retrieval: Pick<RetrievalEngine, 'info' | 'rebuild'>;
  history: HistoryConfig;
  adminToken: string;
  /** Embedding model name, for /api/admin/info */
  embeddingModel: string;
}

const startSchema = z.object({
  sessionId: z.string().min(1).optional(),
});

const messageSchema = z.object({
  message: z.string().trim().min(1, 'Message is required').max(4000, 'Message is too long'),
});

const cleanupSchema = z.object({
  days: z.number().int().min(0),
});

type Parsed<T> = { ok: true; data: T } | { ok: false; error: string };

/** Read and validate a JSON body; a missing body counts as {} */
async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Parsed<T>> {
  const raw: unknown = await c.req.json().catch(() => ({}));
  const result = schema.safeParse(raw);
  if (result.success) return { ok: true, data: result.data };
  return { ok: false, error: result.error.issues[0]?.message ?? 'Invalid request body' };
}

export function createAPI(deps: APIDeps) {
  const { responder, llm, retrieval, history } = deps;
  const api = new Hono();

  // ── Visitor routes ─────────────────────────────────────

  /** Start a new session, or resume a known one */
  api.post('/api/chat/start', async (c) => {
    const body = await readBody(c, startSchema);
    if (!body.ok) return c.json({ error: body.error }, 400);

    const existing = body.data.sessionId ? db.getSession(body.data.sessionId) : null;
    if (existing) {
      return c.json({ sessionId: existing.id, greeting: responder.greeting(), resumed: true });
    }

    const session = db.createSession();
    const greeting = responder.greeting();
    db.addMessage(session.id, 'assistant', greeting);

    return c.json({ sessionId: session.id, greeting, resumed: false });
  });

  api.get('/api/chat/starters', (c) => {
    return c.json({ starters: responder.starters() });
  });

  /** Send a message; the response streams over /events.
   *  One response in flight per session. */
  api.post('/api/chat/:sessionId/message', async (c) => {
    const { sessionId } = c.req.param();
    const body = await readBody(c, messageSchema);
    if (!body.ok) return c.json({ error: body.error }, 400);

    if (!db.getSession(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }
    if (hasActiveJob(sessionId)) {
      return c.json({ error: 'A response is already in progress' }, 409);
    }

    const userMessage = db.addMessage(sessionId, 'user', body.data.message);
    const pending = db.addPendingMessage(sessionId);

    void processInBackground(pending.id, userMessage, { responder, history });

    return c.json({ messageId: pending.id, status: 'pending' }, 202);
  });

  /** Send a message and wait for the whole reply */
  api.post('/api/chat/:sessionId/reply', async (c) => {
    const { sessionId } = c.req.param();
    const body = await readBody(c, messageSchema);
    if (!body.ok) return c.json({ error: body.error }, 400);

    if (!db.getSession(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }
    if (hasActiveJob(sessionId)) {
      return c.json({ error: 'A response is already in progress' }, 409);
    }

    const userMessage = db.addMessage(sessionId, 'user', body.data.message);
    const pending = db.addPendingMessage(sessionId);
    const outcome = await replyInForeground(pending.id, userMessage, { responder, history }, c.req.raw.signal);

    if (!outcome) {
      return c.json({ messageId: pending.id, status: 'cancelled' });
    }
    return c.json(outcome);
  });

  /** SSE stream for real-time updates on a session */
  api.get('/api/chat/:sessionId/events', (c) => {
    const { sessionId } = c.req.param();
    if (!db.getSession(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }

    return streamSSE(c, async (stream) => {
      const removeListener = addListener(sessionId, stream);

      await stream.writeSSE({
        event: 'connected',
        data: JSON.stringify({ sessionId }),
      });

      // Heartbeat every 30s to keep connection alive
      const heartbeat = setInterval(() => {
        stream.writeSSE({ event: 'heartbeat', data: '' }).catch(() => clearInterval(heartbeat));
      }, 30_000);

      try {
        await new Promise<void>((resolve) => {
          stream.onAbort(() => resolve());
        });
      } finally {
        clearInterval(heartbeat);
        removeListener();
      }
    });
  });

  /** Cancel the in-flight response and abort generation */
  api.delete('/api/chat/:sessionId/pending', (c) => {
    const { sessionId } = c.req.param();
    if (!db.getSession(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }

    const messageId = cancelJob(sessionId);
    if (!messageId) {
      return c.json({ error: 'No pending message' }, 404);
    }

    return c.json({ ok: true, messageId });
  });

  /** Poll for messages (fallback, or catch-up after reconnect) */
  api.get('/api/chat/:sessionId/messages', (c) => {
    const { sessionId } = c.req.param();
    if (!db.getSession(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }

    const after = c.req.query('after');
    const messages = after
      ? db.getMessagesSince(sessionId, after)
      : db.getMessages(sessionId);

    return c.json({ messages });
  });

  /** Get a session with its messages (for reconnecting users) */
  api.get('/api/chat/:sessionId', (c) => {
    const session = db.getSession(c.req.param('sessionId'));
    if (!session) {
      return c.json({ error: 'Session not found' }, 404);
    }

    return c.json({ session, messages: db.getMessages(session.id) });
  });

  // ── Admin routes ───────────────────────────────────────

  /** Middleware: check admin token. No token configured, no admin. */
  const adminAuth = createMiddleware(async (c, next) => {
    const token = c.req.header('Authorization')?.replace(/^Bearer\s+/i, '');
    if (!deps.adminToken || token !== deps.adminToken) {
      return c.json({ error: 'Unauthorized' }, 401);
    }
    await next();
  });

  api.get('/api/admin/sessions', adminAuth, (c) => {
    const limit = Number(c.req.query('limit') ?? 50);
    const offset = Number(c.req.query('offset') ?? 0);
    if (!Number.isInteger(limit) || !Number.isInteger(offset) || limit < 1 || offset < 0) {
      return c.json({ error: 'limit and offset must be non-negative integers' }, 400);
    }
    return c.json({ sessions: db.listSessions({ limit, offset }) });
  });

  api.get('/api/admin/sessions/:id', adminAuth, (c) => {
    const summary = db.getSessionSummary(c.req.param('id'));
    if (!summary) return c.json({ error: 'Not found' }, 404);

    return c.json({ summary, messages: db.getMessages(summary.sessionId, history.maxMessages) });
  });

  api.delete('/api/admin/sessions/:id', adminAuth, (c) => {
    const id = c.req.param('id');
    cancelJob(id);
    if (!db.deleteSession(id)) return c.json({ error: 'Not found' }, 404);
    return c.json({ ok: true });
  });

  api.post('/api/admin/sessions/cleanup', adminAuth, async (c) => {
    const body = await readBody(c, cleanupSchema);
    if (!body.ok) return c.json({ error: body.error }, 400);

    const deleted = db.cleanupSessions(body.data.days);
    console.log(`[mimic] Cleaned up ${deleted} session(s) older than ${body.data.days} days`);
    return c.json({ deleted });
  });

  /** Rebuild the vector index in the background */
  api.post('/api/admin/index/rebuild', adminAuth, (c) => {
    if (retrieval.info().rebuilding || retrieval.info().state === 'loading') {
      return c.json({ error: 'Index build already in progress' }, 409);
    }

    void retrieval.rebuild().catch((err: unknown) => {
      console.error(`[mimic] Index rebuild failed: ${errorMessage(err)}`);
    });
    return c.json({ status: 'rebuilding' }, 202);
  });

  api.get('/api/admin/info', adminAuth, (c) => {
    return c.json({
      persona: responder.persona.name,
      speakers: responder.persona.speakers,
      llm: llm.name,
      embedding: deps.embeddingModel,
      index: retrieval.info(),
      history,
      version: VERSION,
    });
  });

  /** Health check */
  api.get('/api/health', async (c) => {
    const llmHealthy = await llm.health();
    const index = retrieval.info();
    return c.json({
      status: llmHealthy && index.state === 'ready' ? 'ok' : 'degraded',
      llm: llmHealthy ? 'connected' : 'unreachable',
      index: index.state,
      version: VERSION,
    });
  });

  return api;
}
