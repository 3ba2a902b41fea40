/**
 * Auth State Channel
 *
 * Buffers auth state notifications so a consumer can read them at its own
 * pace with `for await`. Closing the channel unregisters from the SDK.
 *
 * The buffer is unbounded unless `maxPending` is set, and the channel stays
 * registered until it is closed, drained after a stream error, or left
 * through `break` / `return` in a `for await` loop.
 */

import type { AuthError } from "../errors.js";
import type { Unsubscribe } from "../providers/auth-sdk.js";

export interface AuthStateChannelOptions {
  /**
   * Maximum number of unread notifications; the oldest is dropped when a
   * new one arrives beyond it
   *
   * Default: unbounded
   */
  maxPending?: number;
}

interface QueuedState<TUser> {
  user: TUser | null;
}

interface Waiter<TUser> {
  resolve: (result: IteratorResult<TUser | null>) => void;
  reject: (error: AuthError) => void;
}

export class AuthStateChannel<TUser> implements AsyncIterable<TUser | null> {
  private readonly queue: QueuedState<TUser>[] = [];
  private waiters: Waiter<TUser>[] = [];
  private closed = false;
  private failure: AuthError | null = null;
  private readonly maxPending: number;
  private unsubscribe: Unsubscribe | null = null;

  /**
   * @param subscribe - Registers `push` and `fail` with the notification
   *   source and returns the matching unsubscribe function
   */
  constructor(
    subscribe: (
      push: (user: TUser | null) => void,
      fail: (error: AuthError) => void,
    ) => Unsubscribe,
    options: AuthStateChannelOptions = {},
  ) {
    this.maxPending = options.maxPending ?? Infinity;
    const unsubscribe = subscribe(
      (user) => this.push(user),
      (error) => this.fail(error),
    );
    // The source may already have failed during registration
    if (this.closed) {
      unsubscribe();
    } else {
      this.unsubscribe = unsubscribe;
    }
  }

  /**
   * Number of notifications waiting to be read
   */
  get pending(): number {
    return this.queue.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Read the next notification
   *
   * Resolves with `done: true` once the channel is closed and drained. If
   * the stream failed, the error is thrown once after the buffered
   * notifications have been read.
   */
  async next(): Promise<IteratorResult<TUser | null>> {
    const entry = this.queue.shift();
    if (entry) {
      return { value: entry.user, done: false };
    }
    const failure = this.failure;
    if (failure) {
      this.failure = null;
      throw failure;
    }
    if (this.closed) {
      return { value: undefined, done: true };
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Stop receiving notifications
   *
   * Already-buffered notifications can still be read.
   */
  close(): void {
    if (this.closed) return;
    this.shutdown();

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<TUser | null> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private push(user: TUser | null): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: user, done: false });
      return;
    }
    this.queue.push({ user });
    if (this.queue.length > this.maxPending) {
      this.queue.shift();
    }
  }

  private fail(error: AuthError): void {
    if (this.closed) return;
    this.shutdown();

    // Waiters only exist while the queue is empty
    const [first, ...rest] = this.waiters;
    this.waiters = [];
    if (first) {
      first.reject(error);
    } else {
      this.failure = error;
    }
    for (const waiter of rest) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  private shutdown(): void {
    this.closed = true;
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    unsubscribe?.();
  }
}
