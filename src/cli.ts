#!/usr/bin/env node
// src/cli.ts - CLI entrypoint for Apple Mail MCP Server
import { Command } from 'commander';
import * as fs from 'fs/promises';
import { buildListAccountsScript } from './scripts/index.js';
import { parseAccountNames } from './parsing/index.js';
import { getServerConfigFromEnv } from './serverWrapper.js';
import { createExecutionEngine, startServer } from './server.js';
import type { ExecutionFailure } from './automation/index.js';

interface PackageJson {
  version: string;
  name?: string;
  description?: string;
}

const program = new Command();

// Version from package.json
const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson: PackageJson = JSON.parse(await fs.readFile(packageJsonPath, 'utf8'));

/** What to do about each way the test script can fail. */
function doctorHint(failure: ExecutionFailure): string {
  switch (failure.kind) {
    case 'InterpreterMissing':
      return 'osascript is only available on macOS.';
    case 'ScriptError':
      return (
        'Mail refused the script. Open Mail once, then allow this terminal under ' +
        'System Settings > Privacy & Security > Automation > Mail.'
      );
    case 'Timeout':
      return 'Mail did not answer. Check that it is running and not showing a dialog.';
    case 'Unknown':
      return 'Unexpected failure while running osascript.';
  }
}

program
  .name('apple-mail-mcp')
  .description('Apple Mail MCP Server - Read, search, organise and send Apple Mail through AppleScript')
  .version(packageJson.version);

// === MCP Server Command ===
program
  .command('serve')
  .alias('mcp')
  .description('Start the MCP server over stdio (for use with Claude Desktop, VS Code, etc.)')
  .option('--read-only', 'Run in read-only mode (block all tools that modify mail)')
  .option('--no-third-party', 'Block tools that send mail to other people')
  .action(async (options: { readOnly?: boolean; thirdParty: boolean }) => {
    // Set env vars so the config reads the same way from flags and environment
    if (options.readOnly) {
      process.env.APPLE_MAIL_MCP_READ_ONLY = 'true';
    }
    if (!options.thirdParty) {
      process.env.APPLE_MAIL_MCP_NO_THIRD_PARTY = 'true';
    }
    await startServer(getServerConfigFromEnv());
  });

// === Doctor Command ===
program
  .command('doctor')
  .description('Check that osascript is available and that Mail can be automated')
  .action(async () => {
    console.log('\n🔍 Checking Apple Mail automation...\n');

    if (process.platform !== 'darwin') {
      console.log(`⚠️  Running on ${process.platform}; Apple Mail automation needs macOS.`);
    }

    const outcome = await createExecutionEngine().execute(buildListAccountsScript());
    if (!outcome.ok) {
      console.log(`❌ ${outcome.failure.message}`);
      console.log(`   ${doctorHint(outcome.failure)}`);
      process.exitCode = 1;
      return;
    }

    const accounts = parseAccountNames(outcome.stdout);
    console.log('✅ osascript can talk to Mail');
    if (accounts.length === 0) {
      console.log('⚠️  No Mail accounts configured');
    } else {
      console.log(`✅ ${accounts.length} account(s):`);
      accounts.forEach((name) => console.log(`   - ${name}`));
    }
    console.log('');
    console.log('Start the server with:');
    console.log('  apple-mail-mcp serve');
  });

// === Config Command ===
program
  .command('config')
  .description('Show the configuration the server would start with')
  .action(() => {
    const config = getServerConfigFromEnv();
    console.log('\nApple Mail MCP Server Configuration\n');
    console.log(`Read-only mode:      ${config.readOnly ? 'on' : 'off'}`);
    console.log(`No-third-party mode: ${config.noThirdParty ? 'on' : 'off'}`);
    console.log('Allowed write directories:');
    config.pathSecurity.allowedWritePaths.forEach((dir) => console.log(`  - ${dir}`));
    console.log(`User preferences:    ${config.userPreferences ?? '(none)'}`);
  });

// Show help if no command is specified
program.action(() => {
  program.help();
});

await program.parseAsync();
