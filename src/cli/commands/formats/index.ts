/**
 * Formats Registry Commands
 *
 * Usage:
 *   cupsmith formats list
 *   cupsmith formats get <codename>
 */

import type { Command } from 'commander';
import { FormatsRegistry } from '../../../registry/formats-registry.js';
import { openStore, runCommand } from '../../context.js';
import { formatTable, printJson, printOutput, type TableColumn } from '../../lib/output.js';

const COLUMNS: readonly TableColumn[] = [
  { key: 'cup', header: 'Cup' },
  { key: 'title', header: 'Title' },
  { key: 'cp', header: 'CP', align: 'right' },
  { key: 'meta', header: 'Meta' },
];

export function registerFormatsCommands(program: Command): void {
  const formats = program.command('formats').description('Read the formats registry');

  formats
    .command('list')
    .description('List registry entries in file order')
    .action(() => {
      runCommand('formats list', {}, (context) => {
        const entries = FormatsRegistry.forStore(openStore(context)).list();
        if (context.config.json) {
          printJson(entries);
        } else {
          printOutput(formatTable(entries, COLUMNS));
        }
      });
    });

  formats
    .command('get <codename>')
    .description('Show one registry entry')
    .action((codename: string) => {
      runCommand('formats get', { codename }, (context) => {
        printJson(FormatsRegistry.forStore(openStore(context)).findByCup(codename));
      });
    });
}
