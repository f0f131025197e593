/**
 * Health ETL CLI Configuration Management
 *
 * Loads configuration from .health-etlrc (YAML) with environment variable
 * overrides and sensible defaults. Provides typed configuration interface
 * for all CLI operations.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (HEALTH_ETL_*)
 * 3. Config file (.health-etlrc or --config path)
 * 4. Default values
 *
 * Store credentials are NOT configuration: see storage/credentials.
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_PREFIXES } from '../../acquisition/measure-loader.js';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import { AGES, isAge } from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Object store connection settings
 */
export interface StoreConfig {
  /** Endpoint URL template; `{account}` is replaced by --account */
  readonly endpoint: string;
  readonly region: string;
  readonly forcePathStyle: boolean;
}

/**
 * Raw extract selection
 */
export interface SourceConfig {
  readonly ages: readonly number[];
  readonly activityPrefix: string;
  readonly obesityPrefix: string;
}

/**
 * Local directories
 */
export interface PathsConfig {
  /** Root holding raw/ when reading locally */
  readonly input: string;
  /** Root receiving processed/ and curated/ in write-local mode */
  readonly output: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly store: StoreConfig;
  readonly source: SourceConfig;
  readonly paths: PathsConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    store: z
      .object({
        endpoint: z.string().min(1).optional(),
        region: z.string().min(1).optional(),
        force_path_style: z.boolean().optional(),
      })
      .strict()
      .optional(),
    source: z
      .object({
        ages: z.array(z.number().int()).min(1).optional(),
        activity_prefix: z.string().min(1).optional(),
        obesity_prefix: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    paths: z
      .object({
        input: z.string().min(1).optional(),
        output: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  store: {
    endpoint: 'https://{account}.r2.cloudflarestorage.com',
    region: 'auto',
    forcePathStyle: false,
  },

  source: {
    ages: AGES,
    activityPrefix: DEFAULT_PREFIXES.activity,
    obesityPrefix: DEFAULT_PREFIXES.obesity,
  },

  paths: {
    input: './data',
    output: './data',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.health-etlrc',
  '.health-etlrc.yaml',
  '.health-etlrc.yml',
  '.health-etlrc.json',
];

const ENV_PREFIX = 'HEALTH_ETL_';

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and shape-check a config file
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Typed readers over an environment map
 */
function envReader(env: NodeJS.ProcessEnv) {
  const get = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    get,
    bool(name: string): boolean | undefined {
      const value = get(name);
      if (value === undefined) return undefined;
      return value.toLowerCase() === 'true' || value === '1';
    },
  };
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment map (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError on an unreadable or malformed file
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = envReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.get('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    store: {
      endpoint:
        env.get('ENDPOINT') ?? fileConfig.store?.endpoint ?? DEFAULT_CONFIG.store.endpoint,
      region: env.get('REGION') ?? fileConfig.store?.region ?? DEFAULT_CONFIG.store.region,
      forcePathStyle:
        env.bool('FORCE_PATH_STYLE') ??
        fileConfig.store?.force_path_style ??
        DEFAULT_CONFIG.store.forcePathStyle,
    },

    source: {
      ages: fileConfig.source?.ages ?? DEFAULT_CONFIG.source.ages,
      activityPrefix:
        fileConfig.source?.activity_prefix ?? DEFAULT_CONFIG.source.activityPrefix,
      obesityPrefix:
        fileConfig.source?.obesity_prefix ?? DEFAULT_CONFIG.source.obesityPrefix,
    },

    paths: {
      input: env.get('INPUT_DIR') ?? fileConfig.paths?.input ?? DEFAULT_CONFIG.paths.input,
      output: env.get('OUTPUT_DIR') ?? fileConfig.paths?.output ?? DEFAULT_CONFIG.paths.output,
    },

    // Runtime flags
    verbose: options.overrides?.verbose ?? env.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? env.bool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve a configured path against the config file's directory (or cwd)
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig, cwd = process.cwd()): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : cwd;
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * Check that an age list is a non-empty subset of the survey ages
 *
 * @throws ConfigurationError
 */
export function validateAges(ages: readonly number[]): void {
  if (ages.length === 0) {
    throw new ConfigurationError('At least one age group is required');
  }
  const invalid = ages.filter((age) => !isAge(age));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Invalid age group(s): ${invalid.join(', ')}. Must be among: ${AGES.join(', ')}`
    );
  }
  if (new Set(ages).size !== ages.length) {
    throw new ConfigurationError(`Duplicate age groups: ${ages.join(', ')}`);
  }
}

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!config.store.endpoint.includes('{account}') && !/^https?:\/\//.test(config.store.endpoint)) {
    throw new ConfigurationError(
      `Invalid store endpoint: ${config.store.endpoint}. Must be an http(s) URL or contain {account}`
    );
  }

  validateAges(config.source.ages);
}
