/**
 * Clone and Rename Commands
 *
 * Usage:
 *   cupsmith clone <old> <new> [--title <title>]
 *   cupsmith rename <old> <new> [--title <title>]
 */

import type { Command } from 'commander';
import { defaultTitle } from '../../../core/types.js';
import { createLifecycleManager, runCommand } from '../../context.js';
import { printLifecycleResult } from './print-result.js';

interface RelabelOptions {
  readonly title?: string;
}

export function registerCloneCommand(program: Command): void {
  program
    .command('clone <old> <new>')
    .description('Copy every artifact of a cup to a new codename')
    .option('--title <title>', 'Display title (default: capitalized new codename)')
    .action((oldCodename: string, newCodename: string, options: RelabelOptions) => {
      runCommand('clone', { from: oldCodename, to: newCodename }, (context) => {
        const result = createLifecycleManager(context).clone(
          oldCodename,
          newCodename,
          options.title ?? defaultTitle(newCodename)
        );
        printLifecycleResult(result, context.config.json);
      });
    });
}

export function registerRenameCommand(program: Command): void {
  program
    .command('rename <old> <new>')
    .description('Move every artifact of a cup to a new codename')
    .option('--title <title>', 'Display title (default: capitalized new codename)')
    .action((oldCodename: string, newCodename: string, options: RelabelOptions) => {
      runCommand('rename', { from: oldCodename, to: newCodename }, (context) => {
        const result = createLifecycleManager(context).rename(
          oldCodename,
          newCodename,
          options.title ?? defaultTitle(newCodename)
        );
        printLifecycleResult(result, context.config.json);
      });
    });
}
