// ABOUTME: Per-post mutual exclusion for async critical sections within one process.
// ABOUTME: Publishing chunks and disabling chat for the same post never interleave.

export class PostLocks {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier section for `postId` has settled.
   * Sections for different posts run concurrently.
   */
  async runExclusive<T>(postId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(postId) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(postId, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(postId) === tail) {
        this.tails.delete(postId);
      }
    }
  }
}
