import { z } from 'zod';
import type { ContractViolation, InvariantViolation } from './errors.js';

// ===== Configuration =====

export const CovenantConfigSchema = z.object({
  enforcement: z.object({
    mode: z.enum(['checked', 'unchecked']).default('checked'),
    /** Skip post-operation invariants already proven by the method's postconditions. */
    mergeChecks: z.boolean().default(true),
    onViolation: z.enum(['throw', 'exit']).default('throw'),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type CovenantConfig = z.infer<typeof CovenantConfigSchema>;

/** Partial form accepted as overrides and read from `.covenant.yaml`. */
export type CovenantConfigInput = z.input<typeof CovenantConfigSchema>;

// ===== Events =====

export interface ObjectLifecycleEvent {
  unitId: string;
  instanceId: string;
}

export interface CovenantEvents {
  'contract:violated': ContractViolation;
  'invariant:broken': InvariantViolation;
  'object:poisoned': ObjectLifecycleEvent & { violation: InvariantViolation };
  'object:destroyed': ObjectLifecycleEvent;
}
