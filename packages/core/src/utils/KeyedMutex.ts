/**
 * KeyedMutex - one async-mutex Mutex per key, created on demand
 */

import { Mutex } from 'async-mutex';

export class KeyedMutex {
  private readonly mutexes = new Map<string, Mutex>();

  /**
   * Run `callback` while holding the lock for `key`. Callers with
   * different keys never wait on each other.
   */
  runExclusive<T>(key: string, callback: () => Promise<T> | T): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex.runExclusive(callback);
  }

  isLocked(key: string): boolean {
    return this.mutexes.get(key)?.isLocked() ?? false;
  }
}
