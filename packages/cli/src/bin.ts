#!/usr/bin/env node
/**
 * branch-gate CLI Entry Point
 *
 * Main executable for the branch-gate server-side hook.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { policyCommand } from './commands/policy.js';
import { showUpdateVerboseHelp, updateCommand } from './commands/update.js';

// Read version from package.json at runtime
// Source layout: packages/cli/src/bin.ts; build layout: dist/cli/src/bin.js
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPaths = [
  join(__dirname, '../package.json'),
  join(__dirname, '../../../packages/cli/package.json'),
];

function readVersion(): string {
  const packageJsonPath = packageJsonPaths.find(path => existsSync(path));
  if (packageJsonPath === undefined) {
    console.warn('Warning: Could not find package.json, using fallback version');
    return '0.0.0';
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    // If package.json can't be read (shouldn't happen in production), use fallback
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('branch-gate')
  .description('Server-side git update hook enforcing per-branch merge-only and signed-commit policies')
  .version(readVersion());

// Register commands
updateCommand(program);   // branch-gate update <ref> <old> <new>
policyCommand(program);   // branch-gate policy <ref>

// --help --verbose on update shows the installation reference
const args = process.argv;
if ((args.includes('--help') || args.includes('-h')) && args.includes('--verbose') && args.includes('update')) {
  showUpdateVerboseHelp();
  process.exit(0);
}

await program.parseAsync();
