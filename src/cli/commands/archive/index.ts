/**
 * Archive Commands
 *
 * Usage:
 *   cupsmith package <codename>
 *   cupsmith archive inspect <zip>
 */

import type { Command } from 'commander';
import { ArchivePackager } from '../../../distribution/archive-packager.js';
import { CupArchive } from '../../../distribution/cup-archive.js';
import { openStore, runCommand } from '../../context.js';
import { EXIT_CODES } from '../../lib/exit-codes.js';
import { printJson, printOutput } from '../../lib/output.js';

export function registerArchiveCommands(program: Command): void {
  program
    .command('package <codename>')
    .description('Stage and zip a cup into the filedrop directory')
    .action((codename: string) => {
      runCommand('package', { codename }, (context) => {
        const packager = new ArchivePackager(openStore(context), {
          filedrop: context.config.paths.filedrop,
          baseUri: context.config.filedropUri,
          logger: context.logger,
        });
        const result = packager.package(codename);
        if (context.config.json) {
          printJson(result);
        } else {
          printOutput(`${result.archivePath}\n${result.url}`);
        }
      });
    });

  const archive = program.command('archive').description('Packaged cup archives');

  archive
    .command('inspect <zip>')
    .description('Check the file structure of a packaged cup')
    .action((zipPath: string) => {
      runCommand('archive inspect', { zipPath }, (context) => {
        const inspection = CupArchive.open(zipPath).inspect();
        if (context.config.json) {
          printJson(inspection);
        } else {
          const lines = [
            `Archive:  ${inspection.archivePath}`,
            `Cup:      ${inspection.shortname}`,
            `League:   ${inspection.league ?? '-'}`,
            `Rankings: ${inspection.categories.join(', ') || '-'}`,
            ...inspection.issues.map((issue) => `${issue.severity.toUpperCase()}: ${issue.message}`),
            inspection.valid ? 'Structure OK' : 'Structure INVALID',
          ];
          printOutput(lines.join('\n'));
        }
        if (!inspection.valid) {
          process.exitCode = EXIT_CODES.DATA_INTEGRITY_ERROR;
        }
      });
    });
}
