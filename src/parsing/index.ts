/**
 * Parsing layer for AppleScript output
 *
 * Listing scripts print a line-oriented record format; status scripts print
 * '|'-joined items. Both are turned into typed values here.
 */

export { EmailRecordBuilder, parseEmailList } from './EmailListParser.js';
export { formatEmailList, formatEmailRecord } from './EmailListFormatter.js';
export { parseAccountNames, parseUnreadCounts } from './StatusParsers.js';
export * from './types.js';
