/**
 * Async utilities for ticketplan
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Mutual exclusion for async critical sections
 */
export interface Mutex {
  acquire(): Promise<void>;
  release(): void;
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Run a function with a lock (mutex)
 */
export function createMutex(): Mutex {
  let locked = false;
  const queue: (() => void)[] = [];

  async function acquire(): Promise<void> {
    if (!locked) {
      locked = true;
      return;
    }

    return new Promise((resolve) => {
      queue.push(resolve);
    });
  }

  function release(): void {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      locked = false;
    }
  }

  async function withLock<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  return { acquire, release, withLock };
}

/**
 * Truncate text to a maximum length, marking the cut
 */
export function truncate(text: string, maxLength: number, marker = "\n...[truncated]"): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + marker;
}
