import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import * as os from 'os';

const { realpathFailure } = vi.hoisted(() => ({ realpathFailure: { code: '' } }));

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return {
    ...actual,
    realpathSync: (target: string) => {
      if (realpathFailure.code) {
        throw Object.assign(new Error(`${realpathFailure.code}: cannot resolve ${target}`), {
          code: realpathFailure.code,
        });
      }
      return actual.realpathSync(target);
    },
  };
});

import {
  checkThirdPartyAction,
  expandHomeDir,
  matchGlobPattern,
  validateWritePath,
  type PathSecurityConfig,
} from '../src/securityHelpers.js';

const config: PathSecurityConfig = {
  allowedWritePaths: ['/Users/test/Downloads'],
  forbiddenPathPatterns: ['**/.ssh/**', '**/*.pem', '/etc/**'],
  followSymlinks: false,
};

describe('validateWritePath', () => {
  it('accepts a file inside an allowed directory', () => {
    expect(validateWritePath('/Users/test/Downloads/report.pdf', config)).toEqual({
      valid: true,
      resolvedPath: '/Users/test/Downloads/report.pdf',
    });
  });

  it('accepts the allowed directory itself', () => {
    expect(validateWritePath('/Users/test/Downloads', config).valid).toBe(true);
  });

  it('rejects relative paths', () => {
    expect(validateWritePath('Downloads/report.pdf', config)).toEqual({
      valid: false,
      resolvedPath: 'Downloads/report.pdf',
      error: 'Path must be absolute',
    });
  });

  it('rejects forbidden patterns even inside an allowed directory', () => {
    const result = validateWritePath('/Users/test/Downloads/server.pem', config);
    expect(result.valid).toBe(false);
    expect(result.error).toBe('Path matches forbidden pattern: **/*.pem. Writing to this path is not allowed.');
  });

  it('rejects paths outside the allowed directories', () => {
    const result = validateWritePath('/Users/test/Music/a.txt', config);
    expect(result.error).toBe('Path is not in an allowed directory. Allowed write directories: /Users/test/Downloads');
  });

  it('does not treat a sibling prefix as inside', () => {
    expect(validateWritePath('/Users/test/Downloads-old/a.txt', config).valid).toBe(false);
  });

  it('resolves .. before checking the allowed directories', () => {
    expect(validateWritePath('/Users/test/Downloads/../.ssh/id', config).valid).toBe(false);
  });
});

describe('validateWritePath when real paths cannot be read', () => {
  const followingConfig: PathSecurityConfig = {
    allowedWritePaths: [os.tmpdir()],
    forbiddenPathPatterns: ['**/.ssh/**'],
    followSymlinks: true,
  };

  afterEach(() => {
    realpathFailure.code = '';
  });

  it('checks the resolved path instead of throwing', () => {
    realpathFailure.code = 'EACCES';
    const target = path.join(os.tmpdir(), 'export.txt');
    expect(validateWritePath(target, followingConfig)).toEqual({ valid: true, resolvedPath: target });
  });

  it('still applies forbidden patterns', () => {
    realpathFailure.code = 'ELOOP';
    const result = validateWritePath(path.join(os.tmpdir(), '.ssh', 'id_test'), followingConfig);
    expect(result.valid).toBe(false);
    expect(result.error).toBe('Path matches forbidden pattern: **/.ssh/**. Writing to this path is not allowed.');
  });
});

describe('matchGlobPattern', () => {
  it('matches ** across segments and * within one', () => {
    expect(matchGlobPattern('/Users/test/.ssh/id_rsa', '**/.ssh/**')).toBe(true);
    expect(matchGlobPattern('/Users/test/key.pem', '**/*.pem')).toBe(true);
    expect(matchGlobPattern('/Users/test/pem/notes.txt', '**/*.pem')).toBe(false);
    expect(matchGlobPattern('/etc/hosts', '/etc/**')).toBe(true);
  });
});

describe('expandHomeDir', () => {
  it('expands a leading tilde only', () => {
    expect(expandHomeDir('~/Desktop', '/Users/test')).toBe(path.join('/Users/test', 'Desktop'));
    expect(expandHomeDir('~', '/Users/test')).toBe('/Users/test');
    expect(expandHomeDir('/tmp/~/x', '/Users/test')).toBe('/tmp/~/x');
    expect(expandHomeDir('~/x')).toBe(path.join(os.homedir(), 'x'));
  });
});

describe('checkThirdPartyAction', () => {
  it('allows previews of outgoing mail', () => {
    expect(checkThirdPartyAction('composeEmail', { confirm: false })).toEqual({ blocked: false });
    expect(checkThirdPartyAction('manageDrafts', { action: 'send', confirm: false })).toEqual({ blocked: false });
  });

  it('blocks confirmed sends', () => {
    expect(checkThirdPartyAction('replyToEmail', { confirm: true })).toEqual({
      blocked: true,
      reason:
        'Tool "replyToEmail" with parameter "confirm=true" is blocked in no-third-party mode: Sends a reply to external recipients',
    });
    expect(checkThirdPartyAction('manageDrafts', { action: 'send', confirm: true })).toEqual({
      blocked: true,
      reason: 'Tool "manageDrafts" with action "send" is blocked in no-third-party mode: Sends a saved draft to its recipients',
    });
  });

  it('ignores draft actions that stay local and unrelated tools', () => {
    expect(checkThirdPartyAction('manageDrafts', { action: 'delete', confirm: true })).toEqual({ blocked: false });
    expect(checkThirdPartyAction('listInboxEmails', { confirm: true })).toEqual({ blocked: false });
  });
});
