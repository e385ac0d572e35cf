/**
 * Cup Lifecycle Commands Index
 *
 * Registers the top-level lifecycle commands:
 * - create: New cup with empty artifacts
 * - clone: Copy a cup to a new codename
 * - rename: Move a cup to a new codename
 * - delete: Remove a cup
 */

import type { Command } from 'commander';
import { registerCreateCommand } from './create.js';
import { registerDeleteCommand } from './delete.js';
import { registerCloneCommand, registerRenameCommand } from './relabel.js';

export function registerCupCommands(program: Command): void {
  registerCreateCommand(program);
  registerCloneCommand(program);
  registerRenameCommand(program);
  registerDeleteCommand(program);
}
