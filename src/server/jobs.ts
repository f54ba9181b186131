/**
 * Background job processor for streamed persona responses.
 *
 * One job per session at a time. The job retrieves context, streams
 * the LLM response to SSE listeners as 'token' events, and writes the
 * assistant turn once, when the stream is done:
 *
 *   finished   → pending turn resolved as 'complete', 'message' event
 *   cancelled  → pending turn deleted, 'cancelled' event
 *   failed     → partial text dropped, persona error copy stored with
 *                status 'error', 'error' event
 *
 * Jobs can be cancelled via cancelJob(); this aborts the provider
 * fetch, which stops generation server-side. A blocking /reply call
 * registers as a job too (replyInForeground), so a session never has
 * two responses in flight.
 */

import type { HistoryConfig, Message, PersonaSnapshot, ResponseSource } from '../types/index.js';
import { toPersonaSnapshot } from '../types/index.js';
import type { HistoryTurn, PreparedResponse, Responder, RespondResult } from '../core/responder.js';
import { errorMessage } from '../core/errors.js';
import * as db from '../db/index.js';

/** Anything events can be written to; hono's SSEStreamingApi fits */
export interface EventSink {
  writeSSE(message: { event?: string; data: string; id?: string }): Promise<void>;
}

export interface JobContext {
  responder: Responder;
  history: HistoryConfig;
}

export interface ReplyOutcome {
  messageId: string;
  content: string;
  status: 'complete' | 'error';
  source: ResponseSource;
  personaContext: PersonaSnapshot;
}

interface ActiveJob {
  pendingMessageId: string;
  controller: AbortController;
  done: Promise<void>;
}

/** Active SSE connections per session */
const listeners = new Map<string, Set<EventSink>>();

/** The in-flight job per session */
const activeJobs = new Map<string, ActiveJob>();

/**
 * Register an SSE stream for a session.
 * Returns a cleanup function to call when the stream closes.
 */
export function addListener(sessionId: string, stream: EventSink): () => void {
  const set = listeners.get(sessionId) ?? new Set<EventSink>();
  set.add(stream);
  listeners.set(sessionId, set);

  return () => {
    const current = listeners.get(sessionId);
    if (current) {
      current.delete(stream);
      if (current.size === 0) listeners.delete(sessionId);
    }
  };
}

export function hasActiveJob(sessionId: string): boolean {
  return activeJobs.has(sessionId);
}

/** Resolves when the session's current job (if any) has settled */
export function whenIdle(sessionId: string): Promise<void> {
  return activeJobs.get(sessionId)?.done ?? Promise.resolve();
}

/**
 * Cancel the session's in-flight job.
 * Returns the pending message id, or null if nothing was running.
 */
export function cancelJob(sessionId: string): string | null {
  const job = activeJobs.get(sessionId);
  if (!job) return null;
  job.controller.abort();
  return job.pendingMessageId;
}

/**
 * Notify all SSE listeners for a session.
 */
async function notifyListeners(sessionId: string, event: string, data: unknown): Promise<void> {
  const set = listeners.get(sessionId);
  if (!set || set.size === 0) return;

  const payload = JSON.stringify(data);
  for (const stream of [...set]) {
    try {
      await stream.writeSSE({ event, data: payload });
    } catch {
      // Closed connection
      set.delete(stream);
    }
  }
}

/** Complete turns before the triggering user message, for the prompt */
export function historyFor(sessionId: string, excludeId: string, limit: number): HistoryTurn[] {
  if (limit <= 0) return [];
  return db.getHistory(sessionId, limit + 1)
    .filter(m => m.id !== excludeId)
    .slice(-limit)
    .map(m => ({ role: m.role, content: m.content }));
}

/**
 * Generate and stream the response to `userMessage` in the background.
 * The returned promise settles when the job is over and never rejects.
 */
export function processInBackground(
  pendingMessageId: string,
  userMessage: Message,
  ctx: JobContext,
): Promise<void> {
  const { sessionId } = userMessage;
  const controller = new AbortController();
  const { signal } = controller;

  const run = async (): Promise<void> => {
    const startTime = Date.now();
    const elapsed = () => ((Date.now() - startTime) / 1000).toFixed(1);
    let prepared: PreparedResponse | null = null;

    try {
      const history = historyFor(sessionId, userMessage.id, ctx.history.contextMessages);

      try {
        prepared = await ctx.responder.prepare(userMessage.content, history);
      } catch (err) {
        if (signal.aborted) throw err;
        console.warn(`[mimic] Retrieval failed for ${pendingMessageId}: ${errorMessage(err)}`);
        await commitFailure(ctx.responder.degraded('context', err));
        return;
      }

      console.log(`[mimic] Streaming ${pendingMessageId} (${prepared.context.relevantChunks.length} chunks)...`);
      let text = '';
      for await (const token of ctx.responder.stream(prepared, signal)) {
        text += token;
        await notifyListeners(sessionId, 'token', { id: pendingMessageId, token });
      }

      if (signal.aborted) {
        await commitCancel();
        return;
      }

      const content = text.trim() || ctx.responder.persona.fallback;
      const source: ResponseSource = text.trim() ? 'llm' : 'fallback';
      const personaContext = toPersonaSnapshot(prepared.context);

      if (!db.resolvePendingMessage(pendingMessageId, content, 'complete', { source, personaContext })) {
        console.warn(`[mimic] Pending message ${pendingMessageId} vanished before commit`);
        return;
      }
      db.trimHistory(sessionId, ctx.history.maxMessages);
      console.log(`[mimic] Responded in ${elapsed()}s (source: ${source})`);

      await notifyListeners(sessionId, 'message', {
        id: pendingMessageId,
        role: 'assistant',
        content,
        status: 'complete',
        source,
        personaContext,
      });
    } catch (error) {
      if (signal.aborted) {
        await commitCancel();
        return;
      }

      const errorType = error instanceof Error && error.name === 'TimeoutError' ? 'timeout' : 'error';
      console.error(`[mimic] Background job failed after ${elapsed()}s (${errorType}):`, error);
      await commitFailure(ctx.responder.degraded('generation', error, prepared?.context));
    }

    async function commitCancel(): Promise<void> {
      db.deleteMessage(pendingMessageId);
      console.log(`[mimic] Job ${pendingMessageId} cancelled after ${elapsed()}s`);
      await notifyListeners(sessionId, 'cancelled', { id: pendingMessageId });
    }

    async function commitFailure(result: ReturnType<Responder['degraded']>): Promise<void> {
      db.resolvePendingMessage(pendingMessageId, result.content, 'error', {
        source: 'error',
        error: result.error,
        personaContext: toPersonaSnapshot(result.context),
      });
      db.trimHistory(sessionId, ctx.history.maxMessages);
      await notifyListeners(sessionId, 'error', {
        id: pendingMessageId,
        role: 'assistant',
        content: result.content,
        status: 'error',
        error: 'Failed to generate response',
      });
    }
  };

  const done = run()
    .catch((err: unknown) => {
      console.error(`[mimic] Job ${pendingMessageId} crashed:`, err);
    })
    .finally(() => {
      activeJobs.delete(sessionId);
    });

  activeJobs.set(sessionId, { pendingMessageId, controller, done });
  return done;
}

/**
 * Generate the reply to `userMessage` while the HTTP caller waits.
 * Aborted by cancelJob() or by `requestSignal` (client gone); the
 * pending turn is then deleted and the result is null.
 */
export async function replyInForeground(
  pendingMessageId: string,
  userMessage: Message,
  ctx: JobContext,
  requestSignal: AbortSignal,
): Promise<ReplyOutcome | null> {
  const { sessionId } = userMessage;
  const controller = new AbortController();
  const signal = AbortSignal.any([controller.signal, requestSignal]);

  let settle = (): void => {};
  const done = new Promise<void>(resolve => { settle = resolve; });
  activeJobs.set(sessionId, { pendingMessageId, controller, done });

  try {
    const history = historyFor(sessionId, userMessage.id, ctx.history.contextMessages);
    let result: RespondResult;
    try {
      result = await ctx.responder.respond(userMessage.content, history, signal);
    } catch (err) {
      db.deleteMessage(pendingMessageId);
      if (!signal.aborted) throw err;
      console.log(`[mimic] Reply ${pendingMessageId} aborted`);
      return null;
    }

    const status = result.source === 'error' ? 'error' : 'complete';
    const personaContext = toPersonaSnapshot(result.context);
    const committed = db.resolvePendingMessage(pendingMessageId, result.content, status, {
      source: result.source,
      personaContext,
      ...(result.error ? { error: result.error } : {}),
    });
    if (!committed) {
      console.warn(`[mimic] Pending message ${pendingMessageId} vanished before commit`);
      return null;
    }
    db.trimHistory(sessionId, ctx.history.maxMessages);

    return { messageId: pendingMessageId, content: result.content, status, source: result.source, personaContext };
  } finally {
    activeJobs.delete(sessionId);
    settle();
  }
}
