/**
 * Unit tests for the execution engine: retry policy, failure classification
 * and process-wide serialization. The interpreter is replaced by a scripted runner.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  AutomationError,
  ExecutionEngine,
  NoopLock,
  PromiseChainLock,
  backoffDelayMs,
  type AttemptResult,
  type ScriptRunner,
} from '../../src/automation/index.js';
import { createLogger } from '../../src/logger.js';

const silentLogger = createLogger('error', () => {});

/** Runner that replays the given results in order and records each call. */
function scriptedRunner(results: AttemptResult[]) {
  const calls: { script: string; timeoutMs: number }[] = [];
  const runner: ScriptRunner = async (script, timeoutMs) => {
    calls.push({ script, timeoutMs });
    const next = results.shift();
    if (!next) {
      throw new Error('runner called more often than expected');
    }
    return next;
  };
  return { runner, calls };
}

function createEngine(runner: ScriptRunner) {
  const sleeps: number[] = [];
  const engine = new ExecutionEngine({
    lock: new NoopLock(),
    runner,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    logger: silentLogger,
  });
  return { engine, sleeps };
}

describe('ExecutionEngine', () => {
  it('returns trimmed stdout after a single invocation on success', async () => {
    const { runner, calls } = scriptedRunner([{ status: 'completed', stdout: '  Work|iCloud\n' }]);
    const { engine, sleeps } = createEngine(runner);

    const outcome = await engine.execute('tell application "Mail" to name');

    expect(outcome).toEqual({ ok: true, stdout: 'Work|iCloud' });
    expect(calls).toHaveLength(1);
    expect(calls[0]).toEqual({ script: 'tell application "Mail" to name', timeoutMs: 120_000 });
    expect(sleeps).toEqual([]);
  });

  it('does not retry a script error', async () => {
    const { runner, calls } = scriptedRunner([
      { status: 'scriptError', exitCode: 1, stderr: 'execution error: Can’t get account "Nope". (-1728)\n' },
    ]);
    const { engine } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(calls).toHaveLength(1);
    expect(outcome).toEqual({
      ok: false,
      failure: {
        kind: 'ScriptError',
        code: 1,
        stderr: 'execution error: Can’t get account "Nope". (-1728)',
        message: 'AppleScript error (code 1): execution error: Can’t get account "Nope". (-1728)',
      },
    });
  });

  it('uses a placeholder message when stderr is empty', async () => {
    const { runner } = scriptedRunner([{ status: 'scriptError', exitCode: 2, stderr: '   ' }]);
    const { engine } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.message).toBe('AppleScript error (code 2): Unknown AppleScript error');
    }
  });

  it('retries timeouts with 2s then 4s backoff and succeeds on the third attempt', async () => {
    const { runner, calls } = scriptedRunner([
      { status: 'timedOut' },
      { status: 'timedOut' },
      { status: 'completed', stdout: 'done' },
    ]);
    const { engine, sleeps } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(outcome).toEqual({ ok: true, stdout: 'done' });
    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([2_000, 4_000]);
  });

  it('gives up with a Timeout after three timed-out attempts', async () => {
    const { runner, calls } = scriptedRunner([
      { status: 'timedOut' },
      { status: 'timedOut' },
      { status: 'timedOut' },
    ]);
    const { engine, sleeps } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(calls).toHaveLength(3);
    expect(sleeps).toEqual([2_000, 4_000]);
    expect(outcome).toEqual({
      ok: false,
      failure: {
        kind: 'Timeout',
        attempts: 3,
        message: 'AppleScript execution timed out after 3 attempts. Apple Mail may be unresponsive.',
      },
    });
  });

  it('stops retrying when a retry ends in a script error', async () => {
    const { runner, calls } = scriptedRunner([
      { status: 'timedOut' },
      { status: 'scriptError', exitCode: 1, stderr: 'boom' },
    ]);
    const { engine, sleeps } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(calls).toHaveLength(2);
    expect(sleeps).toEqual([2_000]);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure.kind).toBe('ScriptError');
    }
  });

  it('reports a missing interpreter without retrying', async () => {
    const { runner, calls } = scriptedRunner([{ status: 'interpreterMissing' }]);
    const { engine } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(calls).toHaveLength(1);
    expect(outcome).toEqual({
      ok: false,
      failure: {
        kind: 'InterpreterMissing',
        message: 'osascript not found. This tool requires macOS with AppleScript support.',
      },
    });
  });

  it('maps a crashed invocation to Unknown', async () => {
    const { runner } = scriptedRunner([{ status: 'crashed', message: 'terminated by SIGKILL' }]);
    const { engine } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'Unknown', message: 'AppleScript execution failed: terminated by SIGKILL' },
    });
  });

  it('maps a rejecting runner to Unknown instead of rejecting', async () => {
    const runner: ScriptRunner = () => Promise.reject(new Error('spawn failed'));
    const { engine } = createEngine(runner);

    const outcome = await engine.execute('script');

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'Unknown', message: 'AppleScript execution failed: spawn failed' },
    });
  });

  it('passes a custom timeout to the runner', async () => {
    const { runner, calls } = scriptedRunner([{ status: 'completed', stdout: '' }]);
    const engine = new ExecutionEngine({ lock: new NoopLock(), runner, timeoutMs: 5_000, logger: silentLogger });

    await engine.execute('script');

    expect(calls[0]?.timeoutMs).toBe(5_000);
  });

  it('logs a warning before each retry', async () => {
    const lines: string[] = [];
    const { runner } = scriptedRunner([{ status: 'timedOut' }, { status: 'completed', stdout: 'ok' }]);
    const engine = new ExecutionEngine({
      lock: new NoopLock(),
      runner,
      sleep: async () => {},
      logger: createLogger('info', (line) => lines.push(line)),
    });

    await engine.execute('script');

    expect(lines).toEqual([
      '[apple-mail-mcp] WARN AppleScript timeout on attempt 1/3. Retrying in 2s...',
      '[apple-mail-mcp] INFO AppleScript succeeded on attempt 2',
    ]);
  });

  describe('run', () => {
    it('returns stdout on success', async () => {
      const { runner } = scriptedRunner([{ status: 'completed', stdout: 'hello\n' }]);
      const { engine } = createEngine(runner);

      await expect(engine.run('script')).resolves.toBe('hello');
    });

    it('throws an AutomationError carrying the failure', async () => {
      const { runner } = scriptedRunner([{ status: 'interpreterMissing' }]);
      const { engine } = createEngine(runner);

      const error = await engine.run('script').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AutomationError);
      if (error instanceof AutomationError) {
        expect(error.kind).toBe('InterpreterMissing');
        expect(error.message).toBe('osascript not found. This tool requires macOS with AppleScript support.');
      }
    });
  });

  describe('serialization', () => {
    it('never overlaps two interpreter invocations', async () => {
      const events: string[] = [];
      let active = 0;
      let maxActive = 0;
      const runner: ScriptRunner = async (script) => {
        active++;
        maxActive = Math.max(maxActive, active);
        events.push(`start ${script}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`end ${script}`);
        active--;
        return { status: 'completed', stdout: script };
      };
      const engine = new ExecutionEngine({ lock: new PromiseChainLock(), runner, logger: silentLogger });

      const outcomes = await Promise.all([engine.execute('a'), engine.execute('b'), engine.execute('c')]);

      expect(maxActive).toBe(1);
      expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
      expect(outcomes.map((o) => (o.ok ? o.stdout : null))).toEqual(['a', 'b', 'c']);
    });

    it('holds the lock across the backoff of a retry sequence', async () => {
      const events: string[] = [];
      const results: Record<string, AttemptResult[]> = {
        first: [{ status: 'timedOut' }, { status: 'completed', stdout: 'first' }],
        second: [{ status: 'completed', stdout: 'second' }],
      };
      const runner: ScriptRunner = async (script) => {
        events.push(script);
        return results[script]?.shift() ?? { status: 'crashed', message: 'unexpected' };
      };
      const sleep = vi.fn(async () => {
        events.push('sleep');
      });
      const engine = new ExecutionEngine({ lock: new PromiseChainLock(), runner, sleep, logger: silentLogger });

      await Promise.all([engine.execute('first'), engine.execute('second')]);

      expect(events).toEqual(['first', 'sleep', 'first', 'second']);
      expect(sleep).toHaveBeenCalledWith(2_000);
    });
  });
});

describe('backoffDelayMs', () => {
  it('doubles from the initial delay', () => {
    expect([0, 1, 2].map((attempt) => backoffDelayMs(attempt))).toEqual([2_000, 4_000, 8_000]);
  });
});
