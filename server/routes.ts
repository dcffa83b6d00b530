// ABOUTME: API route handlers for toggling post AI chat, asking questions over SSE and classifying messages.
// ABOUTME: The caller's identity comes from the x-user-id header set by the upstream auth layer.
import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import { encodeFragment } from './ai/generation.js';
import { parseAskPayload, type AIService } from './ai/service.js';
import type { AuthUser, Logger } from './ai/types.js';
import {
  NotAvailableError,
  PartialFailureError,
  UnknownIntentError,
  UpstreamError,
  ValidationError,
} from './errors.js';

type Env = { Variables: { user: AuthUser } };

const classifySchema = z.object({ message: z.string() });

export function statusFor(error: unknown): ContentfulStatusCode {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotAvailableError) return 404;
  if (error instanceof UnknownIntentError) return 422;
  if (error instanceof UpstreamError) return 502;
  return 500;
}

function errorBody(error: unknown): { error: string; step?: string } {
  const message = error instanceof Error ? error.message : 'Request failed';
  if (error instanceof PartialFailureError) {
    return { error: message, step: error.step };
  }
  return { error: message };
}

async function readJson(c: Context<Env>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError('request body must be JSON', 'body');
  }
}

export function createAIRoutes(service: AIService, logger: Logger = console) {
  const app = new Hono<Env>();

  app.use('*', async (c, next) => {
    const userId = c.req.header('x-user-id')?.trim();
    if (!userId) {
      return c.json({ error: 'missing user identity' }, 401);
    }
    c.set('user', { id: userId });
    await next();
  });

  app.onError((error, c) => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error(`[api] ${c.req.method} ${c.req.path} failed:`, error);
    }
    return c.json(errorBody(error), status);
  });

  app.post('/posts/:postId/ai/enable', async (c) => {
    const enabled = await service.enableChat(c.req.param('postId'), c.get('user'));
    return c.json({ enabled });
  });

  app.post('/posts/:postId/ai/disable', async (c) => {
    const disabled = await service.disableChat(c.req.param('postId'), c.get('user'));
    return c.json({ disabled });
  });

  app.post('/posts/:postId/ai/ask', async (c) => {
    const postId = c.req.param('postId');
    const user = c.get('user');
    // Rejected before the stream opens so bad input gets a plain 400
    const question = parseAskPayload(await c.req.text());

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());

      let answer = '';
      try {
        for await (const fragment of service.answer(postId, user, question, controller.signal)) {
          answer += fragment.text;
          await stream.writeSSE({ event: 'fragment', data: encodeFragment(fragment) });
        }
      } catch (error) {
        if (statusFor(error) >= 500) {
          logger.error(`[api] answer for post ${postId} failed:`, error);
        }
        await stream.writeSSE({ event: 'error', data: JSON.stringify(errorBody(error)) });
        return;
      }

      if (controller.signal.aborted) {
        return;
      }

      if (answer.trim() !== '') {
        try {
          await service.recordExchange({ postId, userId: user.id, prompt: question, response: answer });
        } catch (error) {
          // The reader already has the answer; only the transcript is lost
          logger.error(`[api] failed to record exchange for post ${postId}:`, error);
        }
      }
      await stream.writeSSE({ event: 'done', data: '{}' });
    });
  });

  app.post('/ai/classify', async (c) => {
    const parsed = classifySchema.safeParse(await readJson(c));
    if (!parsed.success) {
      throw new ValidationError('message must be a string', 'message');
    }
    return c.json({ intent: service.classify(parsed.data.message) });
  });

  return app;
}
