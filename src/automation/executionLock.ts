// src/automation/executionLock.ts - Serializes access to the AppleScript interpreter

/**
 * Mutual exclusion handle shared by everything that talks to Mail.
 * Mail misbehaves when two automation scripts run against it at once, so
 * the server owns exactly one of these and hands it to the engine.
 */
export interface ExecutionLock {
  /** Runs `task` once every earlier holder has released the lock. */
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
  /** True while a task holds the lock. */
  readonly isLocked: boolean;
}

/**
 * Promise-chained mutex. Each acquirer waits on the tail of the chain and
 * installs its own release as the new tail.
 */
export class PromiseChainLock implements ExecutionLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.holders++;
    try {
      return await task();
    } finally {
      this.holders--;
      release();
    }
  }
}

/** Lock that never blocks. For unit tests that don't exercise exclusion. */
export class NoopLock implements ExecutionLock {
  readonly isLocked = false;

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return task();
  }
}
