/**
 * Enforcement mode: the process-wide switch every wrapper and enforcer reads.
 *
 * Settings live in a single frozen object that is swapped whole, and each
 * invocation reads it once on entry. A change made while a call is in flight
 * therefore takes effect on the next call, never halfway through one.
 */

export type EnforcementMode = 'checked' | 'unchecked';

export type ViolationPolicy = 'throw' | 'exit';

export interface EnforcementSettings {
  readonly mode: EnforcementMode;
  readonly mergeChecks: boolean;
  readonly onViolation: ViolationPolicy;
}

export function resolveModeFromEnv(env: NodeJS.ProcessEnv): EnforcementMode {
  const explicit = env.COVENANT_ENFORCEMENT;
  if (explicit === 'checked' || explicit === 'unchecked') {
    return explicit;
  }
  return env.NODE_ENV === 'production' ? 'unchecked' : 'checked';
}

function initialSettings(env: NodeJS.ProcessEnv): EnforcementSettings {
  return Object.freeze({
    mode: resolveModeFromEnv(env),
    mergeChecks: true,
    onViolation: 'throw',
  });
}

let settings: EnforcementSettings = initialSettings(process.env);

export function getEnforcementSettings(): EnforcementSettings {
  return settings;
}

export function getEnforcementMode(): EnforcementMode {
  return settings.mode;
}

export function setEnforcementMode(mode: EnforcementMode): void {
  settings = Object.freeze({ ...settings, mode });
}

export function configureEnforcement(partial: Partial<EnforcementSettings>): EnforcementSettings {
  settings = Object.freeze({ ...settings, ...partial });
  return settings;
}

/** Restore the start-of-process defaults. */
export function resetEnforcement(env: NodeJS.ProcessEnv = process.env): EnforcementSettings {
  settings = initialSettings(env);
  return settings;
}
