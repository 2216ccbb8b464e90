/**
 * Chat routes
 *
 * POST /api/v1/chat
 * Request: { query: string }
 * Response: { response: string, sources: string[], cached: boolean }
 *
 * POST /api/v1/chat/stream
 * Request: { query: string }
 * Response: text/event-stream of `data: <fragment>` frames ending in
 * `data: [DONE]`; a failure sends `data: [ERROR] <message>` before it.
 *
 * Checks run in this order: API key, per-minute rate limit, origin budget,
 * global budget (all as middleware), then body validation, size ceilings
 * and the injection check inside the chat service.
 */

import { Hono, type Context, type MiddlewareHandler } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { GatewayError, InvalidRequestError, toError } from '../../lib/src/errors/index.js';
import { MIN_QUERY_LENGTH, normalizeQuery } from '../../lib/src/guard/index.js';
import { ChatOutcomeKind, type ChatService } from '../../lib/src/rag/index.js';
import type { GatewayEnv } from '../types.js';

export const STREAM_DONE = '[DONE]';
export const STREAM_ERROR_PREFIX = '[ERROR]';

// =============================================================================
// Request Schema
// =============================================================================

/**
 * The query is normalized before the length check, so whitespace padding
 * cannot satisfy the minimum.
 */
export const ChatRequestSchema = z.object({
  query: z
    .string({
      required_error: 'query is required',
      invalid_type_error: 'query must be a string',
    })
    .transform(normalizeQuery)
    .pipe(z.string().min(MIN_QUERY_LENGTH, 'Query is too short after sanitization.')),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

async function readChatRequest(c: Context<GatewayEnv>): Promise<ChatRequest> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (error) {
    if (error instanceof Error && error.name === 'BodyLimitError') {
      throw error;
    }
    throw new InvalidRequestError([{ field: 'body', message: 'Request body must be JSON' }], error);
  }

  const result = ChatRequestSchema.safeParse(body);
  if (!result.success) {
    throw new InvalidRequestError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || 'body',
        message: issue.message,
      }))
    );
  }
  return result.data;
}

// =============================================================================
// Routes
// =============================================================================

export interface ChatAdmission {
  auth: MiddlewareHandler<GatewayEnv>;
  rateLimit: MiddlewareHandler<GatewayEnv>;
  dailyBudget: MiddlewareHandler<GatewayEnv>;
}

export function createChatRoutes(chat: ChatService, admission: ChatAdmission): Hono<GatewayEnv> {
  const router = new Hono<GatewayEnv>();

  router.use(admission.auth, admission.rateLimit, admission.dailyBudget);

  router.post('/', async (c) => {
    const { query } = await readChatRequest(c);
    const reply = await chat.answer(query, { signal: c.req.raw.signal });

    c.get('logger').info('Chat response sent', {
      client: c.get('clientId'),
      cached: reply.cached,
      sources: reply.sources.length,
    });
    c.header('X-Cache', reply.cached ? 'HIT' : 'MISS');
    return c.json(reply);
  });

  router.post('/stream', async (c) => {
    const { query } = await readChatRequest(c);
    const logger = c.get('logger');
    const cancel = new AbortController();

    const opened = await chat.openStream(query, { signal: cancel.signal });
    if (opened.kind === ChatOutcomeKind.REFUSED) {
      return c.json(opened.reply);
    }

    c.header('X-Cache', opened.cached ? 'HIT' : 'MISS');

    return streamSSE(c, async (stream) => {
      stream.onAbort(() => {
        cancel.abort();
        logger.info('Client disconnected, stream abandoned');
      });

      try {
        for await (const fragment of opened.fragments) {
          if (stream.aborted) {
            break;
          }
          await stream.writeSSE({ data: fragment });
        }
        if (!stream.aborted) {
          await stream.writeSSE({ data: STREAM_DONE });
        }
      } catch (error) {
        const failure = GatewayError.fromError(error);
        logger.error('Stream failed', toError(error), { code: failure.code });
        if (stream.aborted) {
          return;
        }
        await stream.writeSSE({ data: `${STREAM_ERROR_PREFIX} ${failure.publicMessage}` });
        await stream.writeSSE({ data: STREAM_DONE });
      }
    });
  });

  return router;
}
