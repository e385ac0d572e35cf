/**
 * cupsmith CLI Configuration Management
 *
 * Loads configuration from .cupsmithrc (YAML) with environment variable
 * overrides and defaults matching a stock PvPoke deployment.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CUPSMITH_*)
 * 3. Config file (.cupsmithrc or --config path)
 * 4. Default values
 *
 * Relative paths in a config file resolve against the file's directory;
 * relative paths from flags or the environment resolve against the cwd.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CodenameSchema, formatIssues } from '../../core/schemas.js';
import { DEFAULT_NAME_SUFFIX } from '../../derive/zygarde-config.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** PvPoke data directory (src/data) */
  readonly root: string;
  /** Directory archives are staged and published in */
  readonly filedrop: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  /** Public URI of the filedrop directory */
  readonly filedropUri: string;
  /** Registry entry new cups are derived from; null uses the built-in template */
  readonly templateCup: string | null;
  readonly zygarde: {
    readonly nameSuffix: string;
  };
  readonly formats: {
    /** Back up formats.json before create */
    readonly backup: boolean;
  };

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly dryRun: boolean;
  readonly rollback: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        root: z.string().min(1).optional(),
        filedrop: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    filedrop_uri: z.string().min(1).optional(),
    template_cup: CodenameSchema.optional(),
    zygarde: z
      .object({ name_suffix: z.string().optional() })
      .strict()
      .optional(),
    formats: z
      .object({ backup: z.boolean().optional() })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Configuration could not be loaded or is invalid
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';

  constructor(
    message: string,
    public readonly configPath?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG = {
  version: 1,
  root: '/var/www/pvpoke/src/data',
  filedropUri: 'http://localhost/filedrop',
  nameSuffix: DEFAULT_NAME_SUFFIX,
  backupFormats: false,
} as const;

/**
 * Filedrop sits beside the PvPoke checkout: <root>/../../filedrop
 */
export function defaultFiledrop(root: string): string {
  return resolve(root, '..', '..', 'filedrop');
}

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.cupsmithrc', '.cupsmithrc.yaml', '.cupsmithrc.yml', '.cupsmithrc.json'];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate a config file
 *
 * @throws ConfigError on unreadable, malformed or unknown settings
 */
export function parseConfigFile(filePath: string): ConfigFile {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, filePath);
  }

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse config file ${filePath}: ${reason}`, filePath);
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`, filePath);
  }
  if (result.data.version !== undefined && result.data.version !== DEFAULT_CONFIG.version) {
    throw new ConfigError(
      `Unsupported config version: ${result.data.version}. Expected ${DEFAULT_CONFIG.version}.`,
      filePath
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly root?: string;
    readonly filedrop?: string;
    readonly filedropUri?: string;
    readonly templateCup?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly dryRun?: boolean;
    readonly rollback?: boolean;
  };
  /** Defaults to process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Defaults to process.cwd() */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError if a config file is missing or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  const getEnvVar = (name: string): string | undefined => {
    const value = env[`CUPSMITH_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicit = options.configPath ?? getEnvVar('CONFIG');
  if (explicit) {
    configPath = resolve(cwd, explicit);
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileDir = configPath ? dirname(configPath) : cwd;
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(fileDir, path);
  const fromCwd = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(cwd, path);

  const root =
    fromCwd(overrides.root) ??
    fromCwd(getEnvVar('ROOT')) ??
    fromFile(fileConfig.paths?.root) ??
    DEFAULT_CONFIG.root;

  const filedrop =
    fromCwd(overrides.filedrop) ??
    fromCwd(getEnvVar('FILEDROP')) ??
    fromFile(fileConfig.paths?.filedrop) ??
    defaultFiledrop(root);

  const templateCup = overrides.templateCup ?? getEnvVar('TEMPLATE_CUP') ?? fileConfig.template_cup ?? null;
  if (templateCup !== null && !CodenameSchema.safeParse(templateCup).success) {
    throw new ConfigError(`Invalid template cup '${templateCup}'`, configPath ?? undefined);
  }

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,
    paths: { root, filedrop },
    filedropUri:
      overrides.filedropUri ?? getEnvVar('FILEDROP_URI') ?? fileConfig.filedrop_uri ?? DEFAULT_CONFIG.filedropUri,
    templateCup,
    zygarde: {
      nameSuffix: fileConfig.zygarde?.name_suffix ?? DEFAULT_CONFIG.nameSuffix,
    },
    formats: {
      backup: fileConfig.formats?.backup ?? DEFAULT_CONFIG.backupFormats,
    },

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    dryRun: overrides.dryRun ?? false,
    rollback: overrides.rollback ?? true,
    configPath,
  };
}
