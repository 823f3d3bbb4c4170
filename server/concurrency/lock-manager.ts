/**
 * Concurrency Lock Manager
 * Serializes lesson runs that share a fingerprint within this process.
 * Storage-level fingerprint uniqueness remains the cross-process guarantee.
 */

import type { FingerprintLock } from '../../lesson-engine/fsm/src/types.js';

/**
 * Promise-chain mutex per key: each task starts once the previous holder settles
 */
export class InProcessLockManager implements FingerprintLock {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);

    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
