/**
 * CLI Global Context
 *
 * Resolved configuration and logger shared by every command, plus the
 * wrapper that logs command start/end and turns errors into exit codes.
 *
 * @module cli/context
 */

import { isCupError } from '../core/errors.js';
import { CupLifecycleManager } from '../lifecycle/cup-lifecycle-manager.js';
import { FormatsRegistry } from '../registry/formats-registry.js';
import { CupStore } from '../store/cup-store.js';
import { loadConfig, type CLIConfig } from './lib/config.js';
import { exitCodeFor } from './lib/exit-codes.js';
import { createCLILogger, type CLILogger, type LogMetadata } from './lib/logger.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

/**
 * Global options as commander parses them
 */
export type GlobalOptions = {
  readonly root?: string;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly dryRun?: boolean;
  readonly rollback?: boolean;
};

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function initializeContext(options: GlobalOptions): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      root: options.root,
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
      rollback: options.rollback,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });
  logger.debug('Loaded configuration', {
    configPath: config.configPath,
    root: config.paths.root,
    filedrop: config.paths.filedrop,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

// ============================================================================
// Component factories
// ============================================================================

export function openStore(context: GlobalContext): CupStore {
  return new CupStore(context.config.paths.root);
}

export function createLifecycleManager(context: GlobalContext): CupLifecycleManager {
  const store = openStore(context);
  const { config, logger } = context;
  return new CupLifecycleManager(store, FormatsRegistry.forStore(store), {
    rollback: config.rollback,
    dryRun: config.dryRun,
    templateCup: config.templateCup ?? undefined,
    backupFormats: config.formats.backup,
    logger,
  });
}

// ============================================================================
// Command runner
// ============================================================================

/**
 * Run a command body with start/end logging. Failures are logged to
 * standard error and set the process exit code.
 */
export function runCommand(name: string, metadata: LogMetadata, body: (context: GlobalContext) => void): void {
  const context = getGlobalContext();
  const { logger } = context;
  logger.commandStart(name, metadata);

  try {
    body(context);
    logger.commandEnd(true);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message, isCupError(error) ? error.details() : {});
    logger.commandEnd(false);
    process.exitCode = exitCodeFor(error);
  }
}
