/**
 * Delete Command
 *
 * Usage:
 *   cupsmith delete <codename>
 *
 * Artifacts that are already gone are skipped, so deleting twice is fine.
 */

import type { Command } from 'commander';
import { createLifecycleManager, runCommand } from '../../context.js';
import { printLifecycleResult } from './print-result.js';

export function registerDeleteCommand(program: Command): void {
  program
    .command('delete <codename>')
    .description('Remove every artifact of a cup')
    .action((codename: string) => {
      runCommand('delete', { codename }, (context) => {
        const result = createLifecycleManager(context).delete(codename);
        printLifecycleResult(result, context.config.json);
      });
    });
}
