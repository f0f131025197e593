/**
 * CLI Global Context
 *
 * Configuration, logger and store credential resolved once per invocation
 * by the entry point's preAction hook, then read by every command.
 */

import { EnvCredentialProvider } from '../storage/credentials.js';
import type { CredentialProvider } from '../storage/credentials.js';
import { loadConfig } from './lib/config.js';
import type { CLIConfig } from './lib/config.js';
import { createCLILogger } from './lib/logger.js';
import type { CLILogger } from './lib/logger.js';

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  credentials: CredentialProvider;
  startTime: number;
}

/**
 * Global flags shared by every command
 */
export interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Context if initialized, without throwing
 */
export function peekGlobalContext(): GlobalContext | null {
  return globalContext;
}

/**
 * Load configuration and build the logger and credential provider
 *
 * @throws ConfigurationError on an invalid config file or setting
 */
export function initializeContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    env,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = {
    config,
    logger,
    credentials: new EnvCredentialProvider(env),
    startTime,
  };
  return globalContext;
}
