/**
 * Runs async tasks one at a time per key, in submission order.
 * Tasks under different keys do not wait for each other.
 */
export class KeyedSerializer {
  private tails = new Map<string, Promise<void>>();
  private depths = new Map<string, number>();

  /** Queue `task` behind every earlier task for `key`; settles with it */
  run(key: string, task: () => Promise<void>): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    this.depths.set(key, (this.depths.get(key) ?? 0) + 1);

    const result = previous.then(task).finally(() => {
      const depth = (this.depths.get(key) ?? 1) - 1;
      if (depth > 0) {
        this.depths.set(key, depth);
      } else {
        this.depths.delete(key);
        this.tails.delete(key);
      }
    });

    // A failed task must not stall the ones behind it; the failure still
    // reaches the caller through `result`.
    this.tails.set(
      key,
      result.then(
        () => undefined,
        () => undefined,
      ),
    );
    return result;
  }

  /** Resolves once every task queued so far for `key` has settled */
  whenIdle(key: string): Promise<void> {
    return this.tails.get(key) ?? Promise.resolve();
  }

  /** Tasks queued or running for `key` */
  depth(key: string): number {
    return this.depths.get(key) ?? 0;
  }

  /** Keys with work in flight */
  get size(): number {
    return this.tails.size;
  }
}
