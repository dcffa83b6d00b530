// ABOUTME: Tests for AIService: the enable/disable state machine, the ask pipeline, exchanges and classification.
// ABOUTME: Runs against in-memory repositories, the local queue and a keyword embedder.
import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { NotAvailableError, PartialFailureError, UnknownIntentError, ValidationError } from '../errors.js';
import { LocalEmbeddingQueue } from '../queue/local-queue.js';
import { KeywordEmbedder, ScriptedGenerator, silentLogger } from '../testing/fakes.js';
import { MemoryChatExchangeRepository, MemoryChunkStore, MemoryPostRepository } from '../testing/memory-stores.js';
import { EmbeddingWorker } from './embedding-worker.js';
import { PostLocks } from './post-lock.js';
import { NO_CONTEXT_FALLBACK, RetrievalEngine } from './retrieval.js';
import { AIService, parseAskPayload } from './service.js';

const AUTHOR = { id: 'author-1' };
const READER = { id: 'reader-1' };
const POST = 'post-1';

interface Harness {
  service: AIService;
  posts: MemoryPostRepository;
  chunks: MemoryChunkStore;
  exchanges: MemoryChatExchangeRepository;
  queue: LocalEmbeddingQueue;
  embedder: KeywordEmbedder;
  generator: ScriptedGenerator;
}

function createHarness(options: { startWorker?: boolean; shortCircuitSmallTalk?: boolean } = {}): Harness {
  const chunks = new MemoryChunkStore();
  const posts = new MemoryPostRepository(chunks);
  const exchanges = new MemoryChatExchangeRepository();
  const embedder = new KeywordEmbedder();
  const generator = new ScriptedGenerator(['Dogs ', 'are loyal.']);
  const locks = new PostLocks();
  const queue = new LocalEmbeddingQueue({
    concurrency: 2,
    retry: { attempts: 3, backoffMs: 1 },
    logger: silentLogger,
  });

  if (options.startWorker ?? true) {
    const worker = new EmbeddingWorker({
      posts,
      chunks,
      embedder,
      locks,
      chunking: { chunkSize: 20, chunkOverlap: 0 },
      logger: silentLogger,
    });
    queue.process((job) => worker.handle(job));
  }

  const service = new AIService({
    posts,
    exchanges,
    queue,
    locks,
    retrieval: new RetrievalEngine(embedder, chunks, { topK: 3 }),
    generation: generator,
    options: { shortCircuitSmallTalk: options.shortCircuitSmallTalk ?? true },
    logger: silentLogger,
  });

  return { service, posts, chunks, exchanges, queue, embedder, generator };
}

describe('parseAskPayload', () => {
  it('should return the trimmed question', () => {
    assert.strictEqual(parseAskPayload('{"question":"  what is a dog "}'), 'what is a dog');
  });

  it('should reject malformed payloads', () => {
    assert.throws(() => parseAskPayload('what is a dog'), ValidationError);
    assert.throws(() => parseAskPayload('{"question":42}'), ValidationError);
    assert.throws(() => parseAskPayload('{"question":"   "}'), /question cannot be empty/);
    assert.throws(() => parseAskPayload('null'), ValidationError);
  });
});

describe('AIService enable/disable', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.posts.add({ id: POST, authorId: AUTHOR.id, content: 'cats are mammals\n\ndogs are loyal' });
  });

  it('should queue embedding and let the worker open the chat', async () => {
    assert.strictEqual(await h.service.enableChat(POST, AUTHOR), true);

    const pendingPost = await h.posts.getById(POST);
    assert.ok(pendingPost);
    assert.strictEqual(pendingPost.chatEnabled, false, 'flags flip only after embedding');

    await h.queue.onIdle();

    const post = await h.posts.getById(POST);
    assert.ok(post);
    assert.strictEqual(post.chatEnabled, true);
    assert.strictEqual(post.embeddingsReady, true);
    assert.strictEqual(await h.service.getChatState(post), 'ready');
    assert.strictEqual((await h.chunks.getChunksByPost(POST)).length, 2);
  });

  it('should report pending while the job waits', async () => {
    const idle = createHarness({ startWorker: false });
    const post = idle.posts.add({ id: POST, authorId: AUTHOR.id, content: 'dogs are loyal' });

    assert.strictEqual(await idle.service.requestEnable(POST, AUTHOR), 'ok');
    assert.strictEqual(await idle.service.getChatState(post), 'pending');
    assert.strictEqual(await idle.service.requestEnable(POST, AUTHOR), 'already_in_state');
    assert.strictEqual(idle.queue.getPendingCount(), 1);
  });

  it('should be a no-op to enable an already enabled chat', async () => {
    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();
    const calls = h.embedder.calls.length;

    assert.strictEqual(await h.service.requestEnable(POST, AUTHOR), 'already_in_state');
    assert.strictEqual(await h.service.enableChat(POST, AUTHOR), false);
    await h.queue.onIdle();
    assert.strictEqual(h.embedder.calls.length, calls);
  });

  it('should ignore toggles from someone other than the author', async () => {
    assert.strictEqual(await h.service.requestEnable(POST, READER), 'forbidden');
    assert.strictEqual(await h.service.enableChat(POST, READER), false);
    assert.strictEqual(h.queue.getPendingCount(), 0);
    await h.queue.onIdle();
    assert.deepStrictEqual(h.embedder.calls, []);

    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();
    assert.strictEqual(await h.service.requestDisable(POST, READER), 'forbidden');
    assert.strictEqual((await h.posts.getById(POST))?.chatEnabled, true);
  });

  it('should ignore toggles for a missing post', async () => {
    assert.strictEqual(await h.service.requestEnable('missing', AUTHOR), 'not_found');
    assert.strictEqual(await h.service.requestDisable('missing', AUTHOR), 'not_found');
    assert.strictEqual(await h.service.disableChat('missing', AUTHOR), false);
  });

  it('should be a no-op to disable a chat that is not enabled', async () => {
    assert.strictEqual(await h.service.requestDisable(POST, AUTHOR), 'already_in_state');
    assert.strictEqual(await h.service.disableChat(POST, AUTHOR), false);
  });

  it('should clear both flags and all chunks on disable', async () => {
    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();

    assert.strictEqual(await h.service.disableChat(POST, AUTHOR), true);

    const post = await h.posts.getById(POST);
    assert.strictEqual(post?.chatEnabled, false);
    assert.strictEqual(post?.embeddingsReady, false);
    assert.deepStrictEqual(await h.chunks.getChunksByPost(POST), []);
  });

  it('should cancel a pending enable when the author disables', async () => {
    const idle = createHarness({ startWorker: false });
    idle.posts.add({ id: POST, authorId: AUTHOR.id, content: 'dogs are loyal' });
    await idle.service.enableChat(POST, AUTHOR);

    assert.strictEqual(await idle.service.requestDisable(POST, AUTHOR), 'ok');

    const post = await idle.posts.getById(POST);
    assert.ok(post);
    assert.strictEqual(post.revision, 1);
    assert.strictEqual(await idle.service.getChatState(post), 'disabled');
  });

  it('should report a failed chunk deletion after committing the flags', async () => {
    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();
    h.chunks.failNextDelete = new Error('storage offline');

    await assert.rejects(h.service.disableChat(POST, AUTHOR), (error: unknown) => {
      assert.ok(error instanceof PartialFailureError);
      assert.strictEqual(error.step, 'delete-embeddings');
      return true;
    });

    const post = await h.posts.getById(POST);
    assert.strictEqual(post?.chatEnabled, false);
    assert.strictEqual(post?.embeddingsReady, false);
    assert.strictEqual((await h.chunks.getChunksByPost(POST)).length, 2, 'cleanup is left for a retry');
  });

  it('should rebuild a fresh chunk set when re-enabled after disabling', async () => {
    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();
    const before = await h.chunks.getChunksByPost(POST);

    await h.service.disableChat(POST, AUTHOR);
    const row = h.posts.rows.get(POST);
    assert.ok(row);
    h.posts.rows.set(POST, { ...row, content: 'birds sing' });
    assert.strictEqual(await h.service.enableChat(POST, AUTHOR), true);
    await h.queue.onIdle();

    const after = await h.chunks.getChunksByPost(POST);
    assert.deepStrictEqual(after.map((c) => c.content), ['birds sing']);
    assert.ok(after.every((c) => !before.includes(c)));
    assert.strictEqual((await h.posts.getById(POST))?.embeddingsReady, true);
  });

  it('should leave the chat disabled when embedding keeps failing', async () => {
    h.embedder.failTimes(10);

    assert.strictEqual(await h.service.enableChat(POST, AUTHOR), true);
    await h.queue.onIdle();

    const post = await h.posts.getById(POST);
    assert.ok(post);
    assert.strictEqual(post.embeddingsReady, false);
    assert.strictEqual(await h.service.getChatState(post), 'disabled');
    assert.deepStrictEqual(await h.chunks.getChunksByPost(POST), []);
    assert.strictEqual(h.embedder.calls.length, 3);
  });
});

describe('AIService ask', () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    h.posts.add({ id: POST, authorId: AUTHOR.id, content: 'cats are mammals\n\ndogs are loyal' });
  });

  async function openChat() {
    await h.service.enableChat(POST, AUTHOR);
    await h.queue.onIdle();
  }

  it('should ground the answer in the best matching chunk and stream fragments in order', async () => {
    await openChat();
    const fragments: string[] = [];

    await h.service.ask(POST, READER, '{"question":"what is a dog"}', (f) => fragments.push(f));

    assert.deepStrictEqual(fragments, ['{"text":"Dogs "}', '{"text":"are loyal."}']);
    assert.strictEqual(h.generator.requests.length, 1);
    const [request] = h.generator.requests;
    assert.strictEqual(request.question, 'what is a dog');
    assert.strictEqual(request.context.split('\n\n')[0], 'dogs are loyal');
    assert.strictEqual(request.context, 'dogs are loyal\n\ncats are mammals');
  });

  it('should fail without fragments when the chat is not enabled', async () => {
    const fragments: string[] = [];

    await assert.rejects(
      h.service.ask(POST, READER, '{"question":"what is a dog"}', (f) => fragments.push(f)),
      NotAvailableError,
    );
    assert.deepStrictEqual(fragments, []);
    assert.strictEqual(h.generator.requests.length, 0);
  });

  it('should fail for a missing post', async () => {
    await assert.rejects(
      h.service.ask('missing', READER, '{"question":"what is a dog"}', () => undefined),
      NotAvailableError,
    );
  });

  it('should refuse to answer while embeddings are still pending', async () => {
    const row = h.posts.rows.get(POST);
    assert.ok(row);
    h.posts.rows.set(POST, { ...row, chatEnabled: true, embeddingsReady: false });

    await assert.rejects(h.service.ask(POST, READER, '{"question":"what is a dog"}', () => undefined), NotAvailableError);
  });

  it('should reject a malformed payload before touching the post', async () => {
    await openChat();
    await assert.rejects(h.service.ask(POST, READER, '{"q":"what"}', () => undefined), ValidationError);
    assert.strictEqual(h.generator.requests.length, 0);
  });

  it('should answer small talk without retrieval or generation', async () => {
    await openChat();
    const embedCalls = h.embedder.calls.length;
    const fragments: string[] = [];

    await h.service.ask(POST, READER, '{"question":"hello"}', (f) => fragments.push(f));

    assert.deepStrictEqual(fragments, ['{"text":"Hi! Ask me anything about this post."}']);
    assert.strictEqual(h.embedder.calls.length, embedCalls);
    assert.strictEqual(h.generator.requests.length, 0);
  });

  it('should send a real request to the model even when it opens or closes with small talk', async () => {
    await openChat();

    await h.service.ask(POST, READER, '{"question":"Hey, I do not understand the dogs part"}', () => undefined);
    await h.service.ask(POST, READER, '{"question":"Tell me about the dogs, thanks"}', () => undefined);

    assert.deepStrictEqual(
      h.generator.requests.map((r) => r.question),
      ['Hey, I do not understand the dogs part', 'Tell me about the dogs, thanks'],
    );
  });

  it('should send small talk to the model when the short-circuit is off', async () => {
    h = createHarness({ shortCircuitSmallTalk: false });
    h.posts.add({ id: POST, authorId: AUTHOR.id, content: 'dogs are loyal' });
    await openChat();

    await h.service.ask(POST, READER, '{"question":"hello"}', () => undefined);

    assert.strictEqual(h.generator.requests.length, 1);
  });

  it('should expose the same pipeline as an async generator', async () => {
    await openChat();
    const texts: string[] = [];
    for await (const fragment of h.service.answer(POST, READER, 'what is a dog')) {
      texts.push(fragment.text);
    }
    assert.strictEqual(texts.join(''), 'Dogs are loyal.');
  });

  it('should pass the fallback context when the post has no chunks left', async () => {
    await openChat();
    h.chunks.byPost.delete(POST);

    await h.service.ask(POST, READER, '{"question":"what is a dog"}', () => undefined);

    assert.strictEqual(h.generator.requests[0].context, NO_CONTEXT_FALLBACK);
  });
});

describe('AIService recordExchange', () => {
  const valid = { postId: POST, userId: READER.id, prompt: 'what is a dog', response: 'A loyal mammal.' };

  it('should persist a complete exchange', async () => {
    const h = createHarness({ startWorker: false });
    const saved = await h.service.recordExchange(valid);

    assert.strictEqual(saved.prompt, 'what is a dog');
    assert.strictEqual(h.exchanges.saved.length, 1);
    assert.ok(saved.id);
  });

  it('should reject each missing field with its own error', async () => {
    const h = createHarness({ startWorker: false });
    const fieldOf = async (exchange: Parameters<AIService['recordExchange']>[0]) => {
      try {
        await h.service.recordExchange(exchange);
      } catch (error) {
        assert.ok(error instanceof ValidationError);
        return error.field;
      }
      assert.fail('expected a ValidationError');
    };

    assert.strictEqual(await fieldOf(null), 'exchange');
    assert.strictEqual(await fieldOf({ ...valid, userId: '' }), 'userId');
    assert.strictEqual(await fieldOf({ ...valid, postId: '' }), 'postId');
    assert.strictEqual(await fieldOf({ ...valid, prompt: '' }), 'prompt');
    assert.strictEqual(await fieldOf({ ...valid, response: ' ' }), 'response');
    assert.strictEqual(h.exchanges.saved.length, 0);
  });
});

describe('AIService classify', () => {
  const h = createHarness({ startWorker: false });

  it('should reject an empty message', () => {
    assert.throws(() => h.service.classify(''), ValidationError);
  });

  it('should reject a message with no recognisable intent', () => {
    assert.throws(() => h.service.classify('asdf qwerty'), UnknownIntentError);
  });

  it('should return the label of a known intent', () => {
    assert.strictEqual(h.service.classify('what is a dog'), 'question');
    assert.strictEqual(h.service.classify('thanks!'), 'thanks');
  });
});
