// src/securityHelpers.ts - Path validation for files written by Mail, and third-party action detection

import * as path from 'path';
import * as os from 'os';
import { realpathSync, existsSync } from 'fs';

// --- File System Path Security ---

/** Configuration for allowed and forbidden paths */
export interface PathSecurityConfig {
  /** Directories where attachments and exports may be written (absolute paths) */
  allowedWritePaths: string[];
  /** Path patterns that are always forbidden */
  forbiddenPathPatterns: string[];
  /** Whether to follow symlinks when validating paths */
  followSymlinks: boolean;
}

/** Default security configuration */
export const DEFAULT_PATH_SECURITY_CONFIG: PathSecurityConfig = {
  allowedWritePaths: [
    path.join(os.homedir(), 'Downloads'),
    path.join(os.homedir(), 'Documents'),
    path.join(os.homedir(), 'Desktop'),
    os.tmpdir(),
  ],
  forbiddenPathPatterns: [
    // SSH and GPG keys
    '**/.ssh/**',
    '**/.gnupg/**',
    // Cloud credentials
    '**/.aws/**',
    '**/.config/**',
    '**/.kube/**',
    // Shell startup files
    '**/.bashrc',
    '**/.zshrc',
    '**/.profile',
    '**/.bash_profile',
    '**/.zprofile',
    '**/.env',
    '**/.env.*',
    // Login items and agents
    '**/LaunchAgents/**',
    '**/LaunchDaemons/**',
    // Mail's own store and the keychains
    '**/Library/Mail/**',
    '**/Library/Keychains/**',
    // Private keys
    '**/*.pem',
    '**/*.key',
    '**/*_rsa',
    '**/*_ed25519',
    // System files
    '/etc/**',
    '/usr/**',
    '/bin/**',
    '/sbin/**',
    '/System/**',
    '/Library/**',
    '/Applications/**',
  ],
  followSymlinks: true,
};

/**
 * Checks if a path matches any of the forbidden patterns.
 * Returns the first matching pattern, or null.
 */
function matchesForbiddenPattern(filePath: string, patterns: string[]): string | null {
  const normalizedPath = path.normalize(filePath);
  return patterns.find((pattern) => matchGlobPattern(normalizedPath, pattern)) ?? null;
}

/**
 * Simple glob pattern matching.
 * Supports ** for any path segments and * for any characters within a segment.
 */
export function matchGlobPattern(filePath: string, pattern: string): boolean {
  const normalizedPath = filePath.toLowerCase();
  const normalizedPattern = pattern.toLowerCase();

  let regexPattern = normalizedPattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*/g, '{{DOUBLESTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\{\{DOUBLESTAR\}\}/g, '.*');

  if (!regexPattern.startsWith('.*')) {
    regexPattern = '(^|/)' + regexPattern;
  }

  return new RegExp(regexPattern).test(normalizedPath);
}

function isPathInAllowedDirs(filePath: string, allowedDirs: string[]): boolean {
  const normalizedPath = path.normalize(filePath);
  return allowedDirs.some((allowedDir) => {
    const normalizedAllowed = path.normalize(allowedDir);
    return normalizedPath === normalizedAllowed || normalizedPath.startsWith(normalizedAllowed + path.sep);
  });
}

/**
 * Resolves a path, following symlinks if configured.
 * Falls back to the parent's real path for files that don't exist yet,
 * and to the plain resolved path when the real path cannot be read.
 */
function resolveRealPath(filePath: string, followSymlinks: boolean): string {
  if (!followSymlinks) {
    return path.resolve(filePath);
  }
  try {
    if (existsSync(filePath)) {
      return realpathSync(filePath);
    }
    const parentDir = path.dirname(filePath);
    if (existsSync(parentDir)) {
      return path.join(realpathSync(parentDir), path.basename(filePath));
    }
    return path.resolve(filePath);
  } catch {
    // Unreadable or looping links: validate the normalized path instead
    return path.resolve(filePath);
  }
}

/** Expands a leading `~` to the home directory. */
export function expandHomeDir(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}

export interface PathValidationResult {
  valid: boolean;
  resolvedPath: string;
  error?: string;
}

/**
 * Validates a file path for write operations (attachment saves and exports).
 */
export function validateWritePath(
  filePath: string,
  config: PathSecurityConfig = DEFAULT_PATH_SECURITY_CONFIG
): PathValidationResult {
  if (!path.isAbsolute(filePath)) {
    return {
      valid: false,
      resolvedPath: filePath,
      error: 'Path must be absolute',
    };
  }

  const resolvedPath = resolveRealPath(filePath, config.followSymlinks);

  // Check forbidden patterns on both original and resolved paths
  const forbiddenMatch =
    matchesForbiddenPattern(filePath, config.forbiddenPathPatterns) ??
    matchesForbiddenPattern(resolvedPath, config.forbiddenPathPatterns);

  if (forbiddenMatch) {
    return {
      valid: false,
      resolvedPath,
      error: `Path matches forbidden pattern: ${forbiddenMatch}. Writing to this path is not allowed.`,
    };
  }

  if (!isPathInAllowedDirs(resolvedPath, config.allowedWritePaths)) {
    return {
      valid: false,
      resolvedPath,
      error: `Path is not in an allowed directory. Allowed write directories: ${config.allowedWritePaths.join(', ')}`,
    };
  }

  return { valid: true, resolvedPath };
}

// --- Third-Party Action Detection ---

interface ThirdPartyRule {
  /** Blocks when any of these parameters is truthy */
  params?: string[];
  /** Blocks when the action parameter has one of these values and confirm is true */
  actions?: string[];
  description: string;
}

/**
 * Tools that deliver mail to other people. A preview (confirm=false) never
 * leaves the machine, so only the sending form is blocked.
 */
export const THIRD_PARTY_TOOLS: Record<string, ThirdPartyRule> = {
  composeEmail: { params: ['confirm'], description: 'Sends email to external recipients' },
  replyToEmail: { params: ['confirm'], description: 'Sends a reply to external recipients' },
  forwardEmail: { params: ['confirm'], description: 'Forwards email to external recipients' },
  manageDrafts: { actions: ['send'], description: 'Sends a saved draft to its recipients' },
};

/**
 * Checks if a tool call would send mail to third parties.
 */
export function checkThirdPartyAction(
  toolName: string,
  args: Record<string, unknown>
): { blocked: boolean; reason?: string } {
  const rule = THIRD_PARTY_TOOLS[toolName];
  if (!rule) {
    return { blocked: false };
  }

  const action = args['action'];
  if (rule.actions && typeof action === 'string' && rule.actions.includes(action) && args['confirm'] === true) {
    return {
      blocked: true,
      reason: `Tool "${toolName}" with action "${action}" is blocked in no-third-party mode: ${rule.description}`,
    };
  }

  for (const param of rule.params ?? []) {
    const value = args[param];
    if (value !== undefined && value !== null && value !== false && value !== '') {
      return {
        blocked: true,
        reason: `Tool "${toolName}" with parameter "${param}=${String(value)}" is blocked in no-third-party mode: ${rule.description}`,
      };
    }
  }

  return { blocked: false };
}
