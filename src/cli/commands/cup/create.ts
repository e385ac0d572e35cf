/**
 * Create Command
 *
 * Usage:
 *   cupsmith create <codename> --cp <tier> [--title <title>]
 *                   [--definition <file>] [--template <cup>]
 *
 * Writes an empty cup: definition, registry entry, group, overrides for the
 * tier and an empty ranking per category.
 */

import type { Command } from 'commander';
import { defaultTitle } from '../../../core/types.js';
import { createLifecycleManager, runCommand } from '../../context.js';
import { parseCpTier, readTextFile } from '../../lib/args.js';
import { printLifecycleResult } from './print-result.js';

interface CreateOptions {
  readonly cp: string;
  readonly title?: string;
  readonly definition?: string;
  readonly template?: string;
}

export function registerCreateCommand(program: Command): void {
  program
    .command('create <codename>')
    .description('Create a new cup with empty overrides and rankings')
    .requiredOption('--cp <tier>', 'CP tier: 500|1500|2500|10000')
    .option('--title <title>', 'Display title (default: capitalized codename)')
    .option('--definition <file>', 'JSON object to start the definition from')
    .option('--template <cup>', 'Cup whose registry entry the new entry copies')
    .action((codename: string, options: CreateOptions) => {
      runCommand('create', { codename }, (context) => {
        const cpTier = parseCpTier(options.cp);
        const definitionBody = options.definition ? readTextFile(options.definition) : undefined;

        const result = createLifecycleManager(context).create({
          codename,
          title: options.title ?? defaultTitle(codename),
          cpTier,
          definitionBody,
          template: options.template,
        });
        printLifecycleResult(result, context.config.json);
      });
    });
}
