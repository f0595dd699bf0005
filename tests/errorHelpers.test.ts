import { describe, it, expect } from 'vitest';
import {
  formatToolError,
  getErrorDetails,
  getErrorMessage,
  isScriptReportedError,
} from '../src/errorHelpers.js';
import { AutomationError } from '../src/automation/index.js';

describe('errorHelpers', () => {
  it('extracts messages from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('prefixes tool errors with the tool name', () => {
    const error = new AutomationError({ kind: 'Timeout', attempts: 3, message: 'timed out' });
    expect(formatToolError('listInboxEmails', error)).toBe('listInboxEmails error: timed out');
  });

  it('describes engine failures for logging', () => {
    const error = new AutomationError({ kind: 'ScriptError', code: 1, stderr: 'bad', message: 'AppleScript error (code 1): bad' });
    expect(getErrorDetails(error)).toEqual({
      kind: 'ScriptError',
      code: 1,
      stderr: 'bad',
      message: 'AppleScript error (code 1): bad',
    });
    expect(getErrorDetails(new Error('plain'))).toEqual({ message: 'plain' });
  });

  it('recognises errors printed by a script', () => {
    expect(isScriptReportedError('Error: Can’t get account "Nope".')).toBe(true);
    expect(isScriptReportedError('✉ Error: in subject')).toBe(false);
  });
});
