/**
 * Automation layer
 *
 * Runs AppleScript against Mail one script at a time, retrying only timeouts,
 * and reports every outcome as a classified value.
 */

export {
  type ExecutionLock,
  NoopLock,
  PromiseChainLock,
} from './executionLock.js';
export {
  type AttemptResult,
  type ScriptRunner,
  OSASCRIPT_BINARY,
  createOsascriptRunner,
  getErrnoCode,
} from './osascriptRunner.js';
export {
  type ExecutionEngineOptions,
  type ExecutionFailure,
  type ExecutionOutcome,
  type FailureKind,
  AutomationError,
  DEFAULT_TIMEOUT_MS,
  ExecutionEngine,
  INITIAL_BACKOFF_MS,
  MAX_ATTEMPTS,
  backoffDelayMs,
} from './executionEngine.js';
