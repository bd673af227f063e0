export type Settlement<T> =
  | { status: 'pending' }
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

/**
 * One-shot result slot shared by a pool of workers. The first resolve or
 * reject wins; later calls are ignored. `signal` aborts on settlement so
 * blocked senders can stop waiting.
 */
export class Completion<T> {
  private state: Settlement<T> = { status: 'pending' };
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  resolve(value: T): boolean {
    return this.settle({ status: 'fulfilled', value });
  }

  reject(reason: unknown): boolean {
    return this.settle({ status: 'rejected', reason });
  }

  peek(): Settlement<T> {
    return this.state;
  }

  private settle(next: Settlement<T>): boolean {
    if (this.state.status !== 'pending') return false;
    this.state = next;
    this.controller.abort();
    return true;
  }
}
