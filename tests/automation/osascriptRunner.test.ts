import { describe, it, expect, vi, beforeEach } from 'vitest';

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<(file: string, args: string[], options: object) => Promise<Record<string, unknown>>>(),
}));

vi.mock('execa', () => ({
  execa: execaMock,
}));

import { createOsascriptRunner, getErrnoCode } from '../../src/automation/index.js';

/** Shapes a settled execa result; only the fields the runner reads matter. */
function settle(fields: Record<string, unknown>) {
  execaMock.mockResolvedValueOnce({
    stdout: '',
    stderr: '',
    exitCode: 0,
    failed: false,
    timedOut: false,
    ...fields,
  });
}

describe('createOsascriptRunner', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('invokes osascript with -e and the timeout', async () => {
    settle({ stdout: 'ok' });
    const run = createOsascriptRunner();

    await run('return 1', 1_500);

    expect(execaMock).toHaveBeenCalledWith('osascript', ['-e', 'return 1'], {
      timeout: 1_500,
      reject: false,
      stdin: 'ignore',
    });
  });

  it('reports completed output untrimmed', async () => {
    settle({ stdout: 'Inbox\n' });
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({
      status: 'completed',
      stdout: 'Inbox\n',
    });
  });

  it('reports a timeout before anything else', async () => {
    settle({ timedOut: true, failed: true, exitCode: undefined });
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({ status: 'timedOut' });
  });

  it('reports a non-zero exit as a script error', async () => {
    settle({ exitCode: 1, failed: true, stderr: '0:5: syntax error' });
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({
      status: 'scriptError',
      exitCode: 1,
      stderr: '0:5: syntax error',
    });
  });

  it('reports ENOENT as a missing interpreter', async () => {
    settle({ failed: true, exitCode: undefined, code: 'ENOENT' });
    await expect(createOsascriptRunner('/nowhere/osascript')('script', 100)).resolves.toEqual({
      status: 'interpreterMissing',
    });
  });

  it('reports other failures as crashed', async () => {
    settle({ failed: true, exitCode: undefined, signal: 'SIGTERM' });
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({
      status: 'crashed',
      message: 'terminated by SIGTERM',
    });
  });

  it('prefers the short message when execa gives one', async () => {
    settle({ failed: true, exitCode: undefined, shortMessage: 'Command was killed with SIGKILL' });
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({
      status: 'crashed',
      message: 'Command was killed with SIGKILL',
    });
  });

  it('classifies a thrown spawn error', async () => {
    execaMock.mockRejectedValueOnce(Object.assign(new Error('spawn osascript ENOENT'), { code: 'ENOENT' }));
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({ status: 'interpreterMissing' });

    execaMock.mockRejectedValueOnce(new Error('EPERM'));
    await expect(createOsascriptRunner()('script', 100)).resolves.toEqual({ status: 'crashed', message: 'EPERM' });
  });
});

describe('getErrnoCode', () => {
  it('reads the code from the error or its cause', () => {
    expect(getErrnoCode({ code: 'ENOENT' })).toBe('ENOENT');
    expect(getErrnoCode({ cause: { code: 'EACCES' } })).toBe('EACCES');
    expect(getErrnoCode(new Error('plain'))).toBeUndefined();
    expect(getErrnoCode('ENOENT')).toBeUndefined();
  });
});
