import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager, PROJECT_CONFIG_FILE } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';
import { bootstrap } from '../../../src/core/bootstrap.js';
import { getEnforcementSettings } from '../../../src/verification/mode.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'covenant-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    const config = new ConfigManager(dir, {}).load();

    expect(config).toEqual({
      enforcement: { mode: 'checked', mergeChecks: true, onViolation: 'throw' },
      logging: { level: 'warn', pretty: false },
    });
  });

  it('should read the project config file', () => {
    writeFileSync(join(dir, PROJECT_CONFIG_FILE), 'enforcement:\n  mergeChecks: false\nlogging:\n  level: debug\n');

    const config = new ConfigManager(dir, {}).load();

    expect(config.enforcement.mergeChecks).toBe(false);
    expect(config.logging.level).toBe('debug');
  });

  it('should let environment variables win over the file', () => {
    writeFileSync(join(dir, PROJECT_CONFIG_FILE), 'enforcement:\n  mode: checked\n');

    const config = new ConfigManager(dir, {
      COVENANT_ENFORCEMENT: 'unchecked',
      COVENANT_MERGE_CHECKS: '0',
      COVENANT_ON_VIOLATION: 'exit',
      COVENANT_LOG_LEVEL: 'error',
    }).load();

    expect(config.enforcement).toEqual({ mode: 'unchecked', mergeChecks: false, onViolation: 'exit' });
    expect(config.logging.level).toBe('error');
  });

  it('should let overrides win over everything', () => {
    const config = new ConfigManager(dir, { COVENANT_ENFORCEMENT: 'unchecked' }).load({
      enforcement: { mode: 'checked' },
    });
    expect(config.enforcement.mode).toBe('checked');
  });

  it('should turn checks off in production unless the file says otherwise', () => {
    expect(new ConfigManager(dir, { NODE_ENV: 'production' }).load().enforcement.mode).toBe('unchecked');

    writeFileSync(join(dir, PROJECT_CONFIG_FILE), 'enforcement:\n  mode: checked\n');
    expect(new ConfigManager(dir, { NODE_ENV: 'production' }).load().enforcement.mode).toBe('checked');
  });

  it('should reject invalid values', () => {
    expect(() => new ConfigManager(dir, { COVENANT_ENFORCEMENT: 'sometimes' }).load()).toThrow(ConfigError);
    expect(() => new ConfigManager(dir, { COVENANT_MERGE_CHECKS: 'maybe' }).load()).toThrow(
      'COVENANT_MERGE_CHECKS must be one of true, false, 1, 0 (got "maybe")',
    );
  });

  it('should reject a malformed config file', () => {
    writeFileSync(join(dir, PROJECT_CONFIG_FILE), 'enforcement: [unclosed\n');
    expect(() => new ConfigManager(dir, {}).load()).toThrow(ConfigError);
  });

  it('should cache the loaded config', () => {
    const manager = new ConfigManager(dir, {});
    expect(manager.get()).toBe(manager.get());
    expect(manager.getProjectDir()).toBe(dir);
  });
});

describe('bootstrap', () => {
  it('should apply the enforcement section process-wide', () => {
    const config = bootstrap({ env: {}, overrides: { enforcement: { mergeChecks: false }, logging: { level: 'silent' } } });

    expect(config.enforcement.mergeChecks).toBe(false);
    expect(getEnforcementSettings()).toEqual({ mode: 'checked', mergeChecks: false, onViolation: 'throw' });
  });
});
