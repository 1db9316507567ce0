/**
 * KEYED LOCK - one writer per subject
 *
 * Each key owns a FIFO of waiters. A waiter that is not handed the lock
 * within its timeout leaves the queue and rejects with LockTimeoutError.
 * Keys never block each other.
 */

import { LockTimeoutError } from "../errors.js";

export type Release = () => void;

type Waiter = {
  grant: (release: Release) => void;
  timer: NodeJS.Timeout;
};

type KeyState = {
  held: boolean;
  waiters: Waiter[];
};

export class KeyedLock {
  private keys = new Map<string, KeyState>();

  async acquire(key: string, timeoutMs: number): Promise<Release> {
    const state = this.keys.get(key) ?? { held: false, waiters: [] };
    this.keys.set(key, state);

    if (!state.held) {
      state.held = true;
      return this.releaser(key, state);
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          const index = state.waiters.indexOf(waiter);
          if (index !== -1) state.waiters.splice(index, 1);
          reject(new LockTimeoutError(key, timeoutMs));
        }, timeoutMs),
      };
      state.waiters.push(waiter);
    });
  }

  async withLock<T>(key: string, timeoutMs: number, operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.keys.get(key)?.held ?? false;
  }

  pending(key: string): number {
    return this.keys.get(key)?.waiters.length ?? 0;
  }

  private releaser(key: string, state: KeyState): Release {
    let released = false;

    return () => {
      if (released) return;
      released = true;

      const next = state.waiters.shift();
      if (next) {
        clearTimeout(next.timer);
        next.grant(this.releaser(key, state));
        return;
      }

      state.held = false;
      this.keys.delete(key);
    };
  }
}
