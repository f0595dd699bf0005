/**
 * Script generation layer
 *
 * Pure functions that assemble AppleScript bodies for each tool. Every value
 * that came from a caller goes through the literal helpers in
 * appleScriptHelpers before it reaches a script.
 */

export * from './appleScriptHelpers.js';
export * from './inbox.scripts.js';
export * from './search.scripts.js';
export * from './organize.scripts.js';
export * from './compose.scripts.js';
export * from './attachments.scripts.js';
export * from './analytics.scripts.js';
