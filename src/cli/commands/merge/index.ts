/**
 * Resolve Conflicts Command
 *
 * Usage:
 *   cupsmith resolve-conflicts [workingTree]
 *
 * Run inside a PvPoke checkout after a merge from upstream stopped on
 * conflicts. Nothing is committed.
 */

import type { Command } from 'commander';
import { GitWorkingTree } from '../../../merge/git-working-tree.js';
import { MergeConflictResolver } from '../../../merge/conflict-resolver.js';
import { runCommand } from '../../context.js';
import { formatTable, printJson, printOutput } from '../../lib/output.js';

export function registerMergeCommands(program: Command): void {
  program
    .command('resolve-conflicts [workingTree]')
    .description('Settle merge conflicts: keep local formats, take upstream data')
    .action((workingTree: string | undefined) => {
      const root = workingTree ?? process.cwd();
      runCommand('resolve-conflicts', { workingTree: root }, (context) => {
        if (context.config.dryRun) {
          context.logger.warn('--dry-run is not supported by resolve-conflicts; nothing was changed');
          return;
        }
        const resolver = new MergeConflictResolver(new GitWorkingTree(root), { logger: context.logger });
        const resolutions = resolver.resolve();
        if (context.config.json) {
          printJson(resolutions);
        } else {
          printOutput(
            formatTable(
              resolutions.map((resolution) => ({ ...resolution })),
              [
                { key: 'path', header: 'Path' },
                { key: 'rule', header: 'Rule' },
                { key: 'backupPath', header: 'Backup' },
              ]
            )
          );
        }
      });
    });
}
