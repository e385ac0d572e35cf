/**
 * Derivation Commands
 *
 * Usage:
 *   cupsmith threat-group <listFile> <recordsFile>
 *   cupsmith zygarde <codename> [--source rankings|overrides] [--archive <zip>]
 *   cupsmith overrides import <codename> [--league <tier>] [--write]
 *
 * Results are printed as JSON on standard output.
 */

import type { Command } from 'commander';
import { ParseError } from '../../../core/errors.js';
import { importMovesetOverrides } from '../../../derive/overrides-importer.js';
import { filterThreatGroupFiles } from '../../../derive/threat-group.js';
import { generateZygardeConfig, type ZygardeSource } from '../../../derive/zygarde-config.js';
import type { SnapshotKind } from '../../../distribution/cup-archive.js';
import { openStore, runCommand } from '../../context.js';
import { parseCpTier } from '../../lib/args.js';
import { printJson } from '../../lib/output.js';

interface ZygardeOptions {
  readonly source: string;
  readonly archive?: string;
}

interface ImportOptions {
  readonly league?: string;
  readonly write?: boolean;
}

function parseSnapshotKind(value: string): SnapshotKind {
  if (value === 'rankings' || value === 'overrides') {
    return value;
  }
  throw new ParseError(`Invalid --source '${value}': expected rankings or overrides`);
}

export function registerDeriveCommands(program: Command): void {
  program
    .command('threat-group <listFile> <recordsFile>')
    .description('Records of the species listed one per line in listFile, sorted by id')
    .action((listFile: string, recordsFile: string) => {
      runCommand('threat-group', { listFile, recordsFile }, (context) => {
        printJson(filterThreatGroupFiles(listFile, recordsFile, context.logger));
      });
    });

  program
    .command('zygarde <codename>')
    .description('Team-builder configuration for a cup')
    .option('--source <kind>', 'Snapshot to list species from: rankings|overrides', 'rankings')
    .option('--archive <zip>', 'Read the cup from a packaged archive instead of the data root')
    .action((codename: string, options: ZygardeOptions) => {
      runCommand('zygarde', { codename, source: options.source }, (context) => {
        const source: ZygardeSource = options.archive
          ? { kind: 'archive', archivePath: options.archive, codename }
          : { kind: 'live', store: openStore(context), codename };
        const config = generateZygardeConfig(source, {
          snapshot: parseSnapshotKind(options.source),
          nameSuffix: context.config.zygarde.nameSuffix,
          logger: context.logger,
        });
        printJson(config);
      });
    });

  const overrides = program.command('overrides').description('Moveset overrides');

  overrides
    .command('import <codename>')
    .description('Build overrides from the recommended movesets of the overall ranking')
    .option('--league <tier>', "CP tier (default: the definition's league)")
    .option('--write', 'Write the result to the overrides file')
    .action((codename: string, options: ImportOptions) => {
      runCommand('overrides import', { codename }, (context) => {
        const result = importMovesetOverrides(openStore(context), codename, {
          league: options.league ? parseCpTier(options.league, '--league') : undefined,
          write: options.write,
          logger: context.logger,
        });
        printJson(result.overrides);
      });
    });
}
