/**
 * In-process mutual exclusion keyed by resource.
 *
 * Mutating operations on one escrow (or one factory) are queued behind each
 * other so every transition observes the state the previous one left.
 */

import { Logger } from "../utils/logger.ts";

export interface LockInfo {
  resource: string;
  acquiredAt: number;
  waiting: number;
}

export class ResourceLock {
  private tails = new Map<string, Promise<void>>();
  private held = new Map<string, number>(); // resource -> acquiredAt
  private waiting = new Map<string, number>();
  private logger: Logger;

  constructor(instanceId: string = "local", logger?: Logger) {
    this.logger = logger ?? new Logger(`Locks:${instanceId}`);
  }

  /**
   * Execute a function while holding the lock for `resource`.
   * Callers queue in arrival order; the lock is released even if `fn` throws.
   */
  async withLock<T>(resource: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(resource) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(resource, tail);

    this.waiting.set(resource, (this.waiting.get(resource) ?? 0) + 1);
    await previous;
    const stillWaiting = (this.waiting.get(resource) ?? 1) - 1;
    if (stillWaiting > 0) {
      this.waiting.set(resource, stillWaiting);
    } else {
      this.waiting.delete(resource);
    }

    this.held.set(resource, Date.now());
    this.logger.trace(`acquired ${resource}`);

    try {
      return await fn();
    } finally {
      this.held.delete(resource);
      release();
      if (this.tails.get(resource) === tail) {
        this.tails.delete(resource);
      }
      this.logger.trace(`released ${resource}`);
    }
  }

  isLocked(resource: string): boolean {
    return this.held.has(resource);
  }

  listLocks(): LockInfo[] {
    return [...this.held.entries()].map(([resource, acquiredAt]) => ({
      resource,
      acquiredAt,
      waiting: this.waiting.get(resource) ?? 0,
    }));
  }
}
