/**
 * Contract enforcement: conditions, contract-wrapped callables, invariant
 * specs and class invariant enforcement.
 *
 * @example
 * ```typescript
 * import { defineContract, condition, wrap, type PreContext, type PostContext } from 'covenant';
 *
 * const sqrt = wrap(
 *   (x: number) => Math.sqrt(x),
 *   defineContract<[number], number>({
 *     params: ['x'],
 *     preconditions: [condition('x is non-negative', (c: PreContext<[number]>) => c.args[0] >= 0)],
 *     postconditions: [condition('result squares back', (c: PostContext<[number], number>) =>
 *       Math.abs(c.result * c.result - c.args[0]) < 1e-9)],
 *   }),
 * );
 * ```
 */

export { condition, invariant, evaluateConditions, isReceiverOnly } from './condition.js';
export { guardContext, bindArguments } from './context.js';
export { defineContract, wrap, contractOf, runContract } from './contract-checker.js';
export { defineInvariants, extend } from './invariant-spec.js';
export { buildMergedCheckPlan, getMergedCheckPlan, EMPTY_PLAN } from './merge-plan.js';
export { enforce, lifecycleOf } from './invariant-enforcer.js';
export { raise, VIOLATION_EXIT_CODE } from './failure.js';
export { takeSnapshot } from './receiver.js';
export {
  getEnforcementMode,
  setEnforcementMode,
  getEnforcementSettings,
  configureEnforcement,
  resetEnforcement,
  resolveModeFromEnv,
  type EnforcementMode,
  type EnforcementSettings,
  type ViolationPolicy,
} from './mode.js';
export type {
  Condition,
  ContextField,
  ContractSpec,
  ContractInit,
  EnforceOptions,
  FailurePermit,
  InvariantCondition,
  InvariantContext,
  InvariantSpec,
  MergedCheckPlan,
  MethodContracts,
  PostContext,
  Postcondition,
  PreContext,
  Precondition,
  RegisteredContract,
  Snapshot,
  WrapOptions,
} from './types.js';
