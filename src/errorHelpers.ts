// src/errorHelpers.ts - Error handling utilities
import { AutomationError, type ExecutionFailure } from './automation/index.js';

/**
 * Type guard for errors with a message property
 */
export function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard for failures coming out of the execution engine
 */
export function isAutomationError(error: unknown): error is AutomationError {
  return error instanceof AutomationError;
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (!isAutomationError(error)) {
    return { message: getErrorMessage(error) };
  }
  return describeFailure(error.failure);
}

function describeFailure(failure: ExecutionFailure): Record<string, unknown> {
  switch (failure.kind) {
    case 'ScriptError':
      return { kind: failure.kind, code: failure.code, stderr: failure.stderr, message: failure.message };
    case 'Timeout':
      return { kind: failure.kind, attempts: failure.attempts, message: failure.message };
    case 'InterpreterMissing':
    case 'Unknown':
      return { kind: failure.kind, message: failure.message };
  }
}

/**
 * Format error for tool response. Engine failures already carry a readable
 * message, so it is passed through unchanged.
 */
export function formatToolError(toolName: string, error: unknown): string {
  return `${toolName} error: ${getErrorMessage(error)}`;
}

/**
 * Scripts catch their own AppleScript errors and print "Error: …" instead of
 * failing, so a successful run can still carry a failure.
 */
export function isScriptReportedError(output: string): boolean {
  return output.startsWith('Error: ');
}
