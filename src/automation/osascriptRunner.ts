// src/automation/osascriptRunner.ts - Single osascript invocation, classified
import { execa } from 'execa';

/** Outcome of one interpreter invocation, before any retry decision. */
export type AttemptResult =
  | { status: 'completed'; stdout: string }
  | { status: 'scriptError'; exitCode: number; stderr: string }
  | { status: 'timedOut' }
  | { status: 'interpreterMissing' }
  | { status: 'crashed'; message: string };

/**
 * Runs one script to completion. Implementations never throw: every way the
 * invocation can end is reported as an AttemptResult.
 */
export type ScriptRunner = (script: string, timeoutMs: number) => Promise<AttemptResult>;

export const OSASCRIPT_BINARY = 'osascript';

/** Reads a Node errno code (e.g. ENOENT) off an error or its cause. */
export function getErrnoCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  if ('code' in value && typeof value.code === 'string') {
    return value.code;
  }
  if ('cause' in value) {
    return getErrnoCode(value.cause);
  }
  return undefined;
}

function asText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function describeFailure(result: object): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage;
  }
  if ('signal' in result && typeof result.signal === 'string') {
    return `terminated by ${result.signal}`;
  }
  return 'process failed';
}

/**
 * Creates a runner that spawns the interpreter as a child process.
 * The child runs outside the event loop; the returned promise settles when it
 * exits or when execa kills it at the timeout.
 */
export function createOsascriptRunner(binary: string = OSASCRIPT_BINARY): ScriptRunner {
  return async (script, timeoutMs) => {
    try {
      const result = await execa(binary, ['-e', script], {
        timeout: timeoutMs,
        reject: false,
        stdin: 'ignore',
      });

      if (result.timedOut) {
        return { status: 'timedOut' };
      }
      if (getErrnoCode(result) === 'ENOENT') {
        return { status: 'interpreterMissing' };
      }
      if (typeof result.exitCode === 'number' && result.exitCode !== 0) {
        return { status: 'scriptError', exitCode: result.exitCode, stderr: asText(result.stderr) };
      }
      if (result.failed) {
        return { status: 'crashed', message: describeFailure(result) };
      }
      return { status: 'completed', stdout: asText(result.stdout) };
    } catch (error: unknown) {
      if (getErrnoCode(error) === 'ENOENT') {
        return { status: 'interpreterMissing' };
      }
      return {
        status: 'crashed',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  };
}
