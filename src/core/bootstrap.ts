import { ConfigManager } from './config.js';
import { createLogger, setLogger } from './logger.js';
import type { CovenantConfig, CovenantConfigInput } from './types.js';
import { configureEnforcement } from '../verification/mode.js';

export interface BootstrapOptions {
  projectDir?: string;
  overrides?: CovenantConfigInput;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration and apply it process-wide. Meant to run once, at start-up,
 * before any wrapped unit is called.
 */
export function bootstrap(options: BootstrapOptions = {}): CovenantConfig {
  const config = new ConfigManager(options.projectDir, options.env).load(options.overrides);

  setLogger(createLogger('covenant', config.logging));
  configureEnforcement(config.enforcement);

  return config;
}
