// ABOUTME: AIService: the post chat state machine plus the ask pipeline (retrieve, then stream generation).
// ABOUTME: Toggle no-ops are modelled as ToggleOutcome internally and surface only as `false` to callers.
import { z } from 'zod';
import {
  NotAvailableError,
  PartialFailureError,
  UnknownIntentError,
  ValidationError,
} from '../errors.js';
import { embeddingJobId, type EmbeddingJobQueue } from '../queue/types.js';
import { encodeFragment, type AnswerGenerator } from './generation.js';
import { IntentUnknown, classifyIntent, smallTalkReply } from './intent.js';
import type { PostLocks } from './post-lock.js';
import type { RetrievalEngine } from './retrieval.js';
import type {
  AnswerFragment,
  AuthUser,
  ChatExchange,
  ChatExchangeRepository,
  Logger,
  NewChatExchange,
  Post,
  PostRepository,
} from './types.js';

export type ToggleOutcome = 'ok' | 'not_found' | 'forbidden' | 'already_in_state';

export type ChatState = 'disabled' | 'pending' | 'ready';

export interface AIServiceDeps {
  posts: PostRepository;
  exchanges: ChatExchangeRepository;
  queue: EmbeddingJobQueue;
  retrieval: Pick<RetrievalEngine, 'retrieve'>;
  generation: AnswerGenerator;
  locks: PostLocks;
  options: {
    shortCircuitSmallTalk: boolean;
  };
  logger?: Logger;
}

const askPayloadSchema = z.object({
  question: z.string().trim().min(1, 'question cannot be empty'),
});

/**
 * Parse a raw `{ "question": "..." }` request body.
 * @throws ValidationError when the body is not JSON or has no usable question
 */
export function parseAskPayload(raw: string): string {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError('request body must be JSON', 'body');
  }

  const parsed = askPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'invalid question', 'question');
  }
  return parsed.data.question;
}

export class AIService {
  private readonly logger: Logger;

  constructor(private readonly deps: AIServiceDeps) {
    this.logger = deps.logger ?? console;
  }

  async getChatState(post: Post): Promise<ChatState> {
    if (post.chatEnabled && post.embeddingsReady) {
      return 'ready';
    }
    const pending = await this.deps.queue.isPending(embeddingJobId(post.id, post.revision));
    return pending ? 'pending' : 'disabled';
  }

  async enableChat(postId: string, user: AuthUser): Promise<boolean> {
    return (await this.requestEnable(postId, user)) === 'ok';
  }

  async disableChat(postId: string, user: AuthUser): Promise<boolean> {
    return (await this.requestDisable(postId, user)) === 'ok';
  }

  /**
   * Queue embedding of the post so its chat can open. Flags are flipped by the worker.
   */
  async requestEnable(postId: string, user: AuthUser): Promise<ToggleOutcome> {
    return this.deps.locks.runExclusive<ToggleOutcome>(postId, async () => {
      const post = await this.deps.posts.getById(postId);
      if (!post) return 'not_found';
      if (post.authorId !== user.id) return 'forbidden';
      if ((await this.getChatState(post)) !== 'disabled') return 'already_in_state';

      const { jobId, duplicate } = await this.deps.queue.enqueue({
        postId: post.id,
        userId: user.id,
        revision: post.revision,
      });
      if (duplicate) return 'already_in_state';

      this.logger.info(`[ai] queued ${jobId} for post ${post.id}`);
      return 'ok';
    });
  }

  /**
   * Close the post's chat and drop its chunks. The flag update commits first; a failed
   * chunk deletion is reported as PartialFailureError and is safe to retry.
   */
  async requestDisable(postId: string, user: AuthUser): Promise<ToggleOutcome> {
    return this.deps.locks.runExclusive<ToggleOutcome>(postId, async () => {
      const post = await this.deps.posts.getById(postId);
      if (!post) return 'not_found';
      if (post.authorId !== user.id) return 'forbidden';
      if ((await this.getChatState(post)) === 'disabled') return 'already_in_state';

      // The revision bump also turns any queued job for this post stale
      await this.deps.posts.update({ ...post, chatEnabled: false, embeddingsReady: false });

      try {
        await this.deps.posts.deleteEmbeddingsByPostId(postId);
      } catch (error) {
        throw new PartialFailureError('delete-embeddings', error);
      }
      return 'ok';
    });
  }

  /**
   * Stream the answer to `question` about the post as a lazy sequence of fragments.
   * Availability is checked on the first pull, before anything is yielded.
   */
  async *answer(
    postId: string,
    user: AuthUser,
    question: string,
    signal?: AbortSignal,
  ): AsyncGenerator<AnswerFragment> {
    const post = await this.deps.posts.getById(postId);
    if (!post || !post.chatEnabled || !post.embeddingsReady) {
      throw new NotAvailableError();
    }

    if (this.deps.options.shortCircuitSmallTalk) {
      const reply = smallTalkReply(classifyIntent(question));
      if (reply) {
        yield { text: reply };
        return;
      }
    }

    const context = await this.deps.retrieval.retrieve(postId, question);
    this.logger.info(`[ai] user ${user.id} asked post ${postId}, context ${context.length} chars`);
    yield* this.deps.generation.streamAnswer(context, question, signal);
  }

  /**
   * Callback form of {@link answer}: parses the raw payload and hands each encoded
   * `{"text":...}` fragment to `onFragment` in order.
   */
  async ask(
    postId: string,
    user: AuthUser,
    rawPayload: string,
    onFragment: (encoded: string) => void,
    signal?: AbortSignal,
  ): Promise<void> {
    const question = parseAskPayload(rawPayload);
    for await (const fragment of this.answer(postId, user, question, signal)) {
      onFragment(encodeFragment(fragment));
    }
  }

  async recordExchange(exchange: NewChatExchange | null | undefined): Promise<ChatExchange> {
    if (!exchange) {
      throw new ValidationError('chat cannot be empty', 'exchange');
    }
    if (!exchange.userId) {
      throw new ValidationError('chat must have a user id', 'userId');
    }
    if (!exchange.postId) {
      throw new ValidationError('chat must have a post id', 'postId');
    }
    if (exchange.prompt.trim() === '') {
      throw new ValidationError('chat must have a prompt', 'prompt');
    }
    if (exchange.response.trim() === '') {
      throw new ValidationError('chat must have a response', 'response');
    }
    return this.deps.exchanges.create(exchange);
  }

  classify(message: string): string {
    if (message.trim() === '') {
      throw new ValidationError('message cannot be empty', 'message');
    }
    const intent = classifyIntent(message);
    if (intent === IntentUnknown) {
      throw new UnknownIntentError(`unknown message type: ${intent}`);
    }
    return intent;
  }
}
