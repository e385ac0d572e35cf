#!/usr/bin/env tsx
/**
 * cupsmith CLI Entry Point
 *
 * Lifecycle, derivation, packaging and merge tooling for custom cups on a
 * PvPoke deployment.
 *
 * @module cupsmith-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { initializeContext, type GlobalOptions } from '../src/cli/context.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { registerArchiveCommands } from '../src/cli/commands/archive/index.js';
import { registerCupCommands } from '../src/cli/commands/cup/index.js';
import { registerDeriveCommands } from '../src/cli/commands/derive/index.js';
import { registerFormatsCommands } from '../src/cli/commands/formats/index.js';
import { registerMergeCommands } from '../src/cli/commands/merge/index.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // bin/ under the source tree, dist/bin/ once built
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch {
      // try the next candidate
    }
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('cupsmith')
    .description('cupsmith - create, package and maintain custom PvPoke cups')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--root <path>', 'PvPoke data directory (default: /var/www/pvpoke/src/data)')
    .option('--config <path>', 'Path to config file (default: .cupsmithrc)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'JSON log lines and JSON results')
    .option('--dry-run', 'Show the steps without executing them')
    .option('--no-rollback', 'Leave completed steps in place when a step fails')
    .hook('preAction', () => {
      try {
        initializeContext(program.opts<GlobalOptions>());
      } catch (error) {
        process.stderr.write(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}\n`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCupCommands(program);
  registerFormatsCommands(program);
  registerArchiveCommands(program);
  registerDeriveCommands(program);
  registerMergeCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

try {
  createProgram().parse(process.argv);
} catch (error) {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = exitCodeFor(error);
}
