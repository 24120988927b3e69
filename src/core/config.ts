import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { CovenantConfigSchema, type CovenantConfig, type CovenantConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.covenant.yaml';

export class ConfigManager {
  private config: CovenantConfig | null = null;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: CovenantConfigInput): CovenantConfig {
    let raw: Record<string, unknown> = {};

    // 1. Load project config
    const projectConfigPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(`Failed to parse project config at ${projectConfigPath}`, err);
      }
      if (isPlainRecord(parsed)) {
        raw = this.deepMerge(raw, parsed);
      }
    }

    // 2. Apply environment variables
    raw = this.applyEnvVars(raw);

    // 3. Apply overrides
    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    // 4. Validate with Zod
    const result = CovenantConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): CovenantConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const enforcement: Record<string, unknown> = isPlainRecord(raw.enforcement)
      ? { ...raw.enforcement }
      : {};
    const logging: Record<string, unknown> = isPlainRecord(raw.logging) ? { ...raw.logging } : {};

    // A production build strips checks unless something more specific says otherwise
    if (this.env.NODE_ENV === 'production' && enforcement.mode === undefined) {
      enforcement.mode = 'unchecked';
    }
    if (this.env.COVENANT_ENFORCEMENT) {
      enforcement.mode = this.env.COVENANT_ENFORCEMENT;
    }
    if (this.env.COVENANT_MERGE_CHECKS) {
      enforcement.mergeChecks = parseFlag(this.env.COVENANT_MERGE_CHECKS, 'COVENANT_MERGE_CHECKS');
    }
    if (this.env.COVENANT_ON_VIOLATION) {
      enforcement.onViolation = this.env.COVENANT_ON_VIOLATION;
    }
    if (this.env.COVENANT_LOG_LEVEL) {
      logging.level = this.env.COVENANT_LOG_LEVEL;
    }

    return { ...raw, enforcement, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) {
        continue;
      }
      if (isPlainRecord(incoming) && isPlainRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFlag(value: string, name: string): boolean {
  const normalised = value.trim().toLowerCase();
  if (normalised === '1' || normalised === 'true') return true;
  if (normalised === '0' || normalised === 'false') return false;
  throw new ConfigError(`${name} must be one of true, false, 1, 0 (got "${value}")`);
}
