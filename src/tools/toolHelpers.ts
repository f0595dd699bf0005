// src/tools/toolHelpers.ts - Shared plumbing for Mail tool modules
import * as path from 'path';
import { UserError } from 'fastmcp';
import { type ExecutionEngine } from '../automation/index.js';
import { isScriptReportedError } from '../errorHelpers.js';
import { expandHomeDir, validateWritePath, type PathSecurityConfig } from '../securityHelpers.js';

const SCRIPT_ERROR_PREFIX = 'Error: ';

/**
 * Runs a generated script and returns its output. A script that caught its
 * own error and printed "Error: ..." is turned back into a failure.
 */
export async function runMailScript(engine: ExecutionEngine, script: string): Promise<string> {
  const output = await engine.run(script);
  if (isScriptReportedError(output)) {
    throw new Error(output.slice(SCRIPT_ERROR_PREFIX.length));
  }
  return output;
}

/**
 * Expands `~` and checks the path against the write policy.
 * Returns the resolved absolute path.
 */
export function resolveWritablePath(filePath: string, pathSecurity: PathSecurityConfig): string {
  const validation = validateWritePath(path.normalize(expandHomeDir(filePath)), pathSecurity);
  if (!validation.valid) {
    throw new UserError(`Invalid path "${filePath}": ${validation.error ?? 'not allowed'}`);
  }
  return validation.resolvedPath;
}

/** Throws a UserError naming the parameters a given action needs. */
export function requireParameters(
  action: string,
  values: Record<string, string | undefined>
): void {
  const missing = Object.entries(values)
    .filter(([, value]) => value === undefined || value.trim() === '')
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new UserError(`Action "${action}" requires: ${missing.join(', ')}`);
  }
}
