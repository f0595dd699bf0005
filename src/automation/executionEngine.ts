// src/automation/executionEngine.ts - Serialized, retrying AppleScript execution
import { setTimeout as delay } from 'timers/promises';
import { type ExecutionLock } from './executionLock.js';
import { type AttemptResult, type ScriptRunner } from './osascriptRunner.js';
import { type Logger, logger as defaultLogger } from '../logger.js';

export const DEFAULT_TIMEOUT_MS = 120_000;
export const MAX_ATTEMPTS = 3;
export const INITIAL_BACKOFF_MS = 2_000;

export type ExecutionFailure =
  | { kind: 'InterpreterMissing'; message: string }
  | { kind: 'ScriptError'; code: number; stderr: string; message: string }
  | { kind: 'Timeout'; attempts: number; message: string }
  | { kind: 'Unknown'; message: string };

export type FailureKind = ExecutionFailure['kind'];

export type ExecutionOutcome =
  | { ok: true; stdout: string }
  | { ok: false; failure: ExecutionFailure };

/** Thrown by {@link ExecutionEngine.run} so tool handlers can use try/catch. */
export class AutomationError extends Error {
  readonly failure: ExecutionFailure;

  constructor(failure: ExecutionFailure) {
    super(failure.message);
    this.name = 'AutomationError';
    this.failure = failure;
  }

  get kind(): FailureKind {
    return this.failure.kind;
  }
}

export interface ExecutionEngineOptions {
  lock: ExecutionLock;
  runner: ScriptRunner;
  timeoutMs?: number;
  maxAttempts?: number;
  initialBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type EngineState =
  | { name: 'attempting'; attempt: number }
  | { name: 'backoff'; attempt: number }
  | { name: 'succeeded'; stdout: string }
  | { name: 'failed'; failure: ExecutionFailure };

/** Backoff before the attempt after `attempt` (0-based): 2s, 4s, 8s... */
export function backoffDelayMs(attempt: number, initialBackoffMs: number = INITIAL_BACKOFF_MS): number {
  return initialBackoffMs * 2 ** attempt;
}

export class ExecutionEngine {
  private readonly lock: ExecutionLock;
  private readonly runner: ScriptRunner;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly initialBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ExecutionEngineOptions) {
    this.lock = options.lock;
    this.runner = options.runner;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS);
    this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Executes a script with the lock held for the whole retry sequence.
   * Never rejects: every failure comes back as an outcome.
   */
  execute(script: string): Promise<ExecutionOutcome> {
    return this.lock.runExclusive(() => this.runAttempts(script));
  }

  /** Like {@link execute} but returns stdout or throws an AutomationError. */
  async run(script: string): Promise<string> {
    const outcome = await this.execute(script);
    if (!outcome.ok) {
      throw new AutomationError(outcome.failure);
    }
    return outcome.stdout;
  }

  private async runAttempts(script: string): Promise<ExecutionOutcome> {
    let state: EngineState = { name: 'attempting', attempt: 0 };

    for (;;) {
      switch (state.name) {
        case 'attempting': {
          this.logger.debug(
            `AppleScript execution attempt ${state.attempt + 1}/${this.maxAttempts}`
          );
          const result = await this.invoke(script);
          state = this.transition(state.attempt, result);
          break;
        }
        case 'backoff': {
          const waitMs = backoffDelayMs(state.attempt, this.initialBackoffMs);
          this.logger.warn(
            `AppleScript timeout on attempt ${state.attempt + 1}/${this.maxAttempts}. Retrying in ${waitMs / 1000}s...`
          );
          await this.sleep(waitMs);
          state = { name: 'attempting', attempt: state.attempt + 1 };
          break;
        }
        case 'succeeded':
          return { ok: true, stdout: state.stdout };
        case 'failed':
          return { ok: false, failure: state.failure };
      }
    }
  }

  private async invoke(script: string): Promise<AttemptResult> {
    try {
      return await this.runner(script, this.timeoutMs);
    } catch (error: unknown) {
      // Runners report failures as results; a rejection is a runner bug.
      return { status: 'crashed', message: error instanceof Error ? error.message : String(error) };
    }
  }

  private transition(attempt: number, result: AttemptResult): EngineState {
    switch (result.status) {
      case 'completed':
        if (attempt > 0) {
          this.logger.info(`AppleScript succeeded on attempt ${attempt + 1}`);
        }
        return { name: 'succeeded', stdout: result.stdout.trim() };
      case 'scriptError': {
        const stderr = result.stderr.trim();
        return {
          name: 'failed',
          failure: {
            kind: 'ScriptError',
            code: result.exitCode,
            stderr,
            message: `AppleScript error (code ${result.exitCode}): ${stderr || 'Unknown AppleScript error'}`,
          },
        };
      }
      case 'timedOut':
        if (attempt + 1 < this.maxAttempts) {
          return { name: 'backoff', attempt };
        }
        return {
          name: 'failed',
          failure: {
            kind: 'Timeout',
            attempts: attempt + 1,
            message: `AppleScript execution timed out after ${attempt + 1} attempts. Apple Mail may be unresponsive.`,
          },
        };
      case 'interpreterMissing':
        return {
          name: 'failed',
          failure: {
            kind: 'InterpreterMissing',
            message: 'osascript not found. This tool requires macOS with AppleScript support.',
          },
        };
      case 'crashed':
        return {
          name: 'failed',
          failure: { kind: 'Unknown', message: `AppleScript execution failed: ${result.message}` },
        };
    }
  }
}
