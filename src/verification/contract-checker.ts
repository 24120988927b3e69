/**
 * Contract Wrapper — Design-by-Contract Function Wrappers
 *
 * Wraps a callable with ordered pre- and postcondition lists. Preconditions
 * are checked against the bound arguments before the call; postconditions
 * against the arguments, the result and the receiver after it. In unchecked
 * mode the wrapper calls straight through without building any context.
 */

import {
  ContractViolation,
  CovenantError,
  EvaluationError,
  InternalFailure,
} from '../core/errors.js';
import { assertConditionFields, evaluateConditions } from './condition.js';
import { bindArguments, guardContext } from './context.js';
import { raise } from './failure.js';
import { getEnforcementSettings, type EnforcementSettings } from './mode.js';
import { isObjectLike, takeSnapshot } from './receiver.js';
import type {
  ContextField,
  ContractInit,
  ContractSpec,
  PostContext,
  PreContext,
  RegisteredContract,
  Snapshot,
  WrapOptions,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// DECLARATION
// ═══════════════════════════════════════════════════════════════

/**
 * Validate and freeze a contract. Malformed conditions, and preconditions
 * that declare a read of `result` or `old`, fail here rather than on first use.
 */
export function defineContract<
  TArgs extends readonly unknown[] = readonly unknown[],
  TResult = unknown,
  TReceiver = unknown,
>(init: ContractInit<TArgs, TResult, TReceiver>): ContractSpec<TArgs, TResult, TReceiver> {
  const unitId = init.name ?? 'contract';
  const preconditions = Object.freeze([...(init.preconditions ?? [])]);
  const postconditions = Object.freeze([...(init.postconditions ?? [])]);

  assertConditionFields(preconditions, ['result', 'old'], { phase: 'precondition', unitId });
  assertConditionFields(postconditions, [], { phase: 'postcondition', unitId });

  if (init.params) {
    const seen = new Set<string>();
    for (const param of init.params) {
      if (seen.has(param)) {
        throw new EvaluationError(`Parameter "${param}" is declared twice in ${unitId}`, { unitId });
      }
      seen.add(param);
    }
  }

  for (const permit of init.permits ?? []) {
    if (typeof permit !== 'function') {
      throw new EvaluationError(`Failure permits of ${unitId} must be functions`, { unitId });
    }
  }

  return Object.freeze({
    name: init.name,
    params: init.params ? Object.freeze([...init.params]) : undefined,
    preconditions,
    postconditions,
    permits: init.permits ? Object.freeze([...init.permits]) : undefined,
  });
}

// ═══════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════

export interface ContractInvocation<TResult> {
  spec: ContractSpec;
  unitId: string;
  args: readonly unknown[];
  /** Calls the underlying logic exactly once. */
  invoke: () => TResult;
  /** Reads the current receiver state; absent for free functions. Called before and after the call. */
  readReceiver?: () => unknown;
}

/**
 * Run one checked invocation: preconditions, the call, postconditions.
 * The caller has already decided that checking is on.
 */
export function runContract<TResult>(call: ContractInvocation<TResult>, settings: EnforcementSettings): TResult {
  const { spec, unitId, args, readReceiver } = call;
  const named = bindArguments(spec.params, args);
  const missing: ContextField[] = readReceiver ? [] : ['receiver', 'old'];

  const before = readReceiver ? readReceiver() : undefined;
  if (spec.preconditions.length > 0) {
    const pre: PreContext = guardContext(
      { args, arguments: named, receiver: before },
      'precondition',
      unitId,
      missing,
    );
    const failed = evaluateConditions(spec.preconditions, pre, { phase: 'precondition', unitId });
    if (failed >= 0) {
      raise(
        new ContractViolation('precondition', failed, unitId, spec.preconditions[failed].description),
        settings,
      );
    }
  }

  let result: TResult;
  try {
    result = call.invoke();
  } catch (err) {
    throw toPropagatedFailure(err, spec, unitId);
  }

  const after = readReceiver ? readReceiver() : undefined;
  if (spec.postconditions.length > 0) {
    const post: PostContext = guardContext(
      { args, arguments: named, receiver: after, old: before, result },
      'postcondition',
      unitId,
      missing,
    );
    const failed = evaluateConditions(spec.postconditions, post, { phase: 'postcondition', unitId });
    if (failed >= 0) {
      raise(
        new ContractViolation('postcondition', failed, unitId, spec.postconditions[failed].description),
        settings,
      );
    }
  }

  return result;
}

/**
 * Failures from the wrapped logic: contract signals and permitted failure
 * shapes pass through untouched, anything else becomes an InternalFailure.
 */
function toPropagatedFailure(err: unknown, spec: ContractSpec, unitId: string): unknown {
  if (err instanceof CovenantError) {
    return err;
  }
  if (spec.permits?.some((permit) => permit(err))) {
    return err;
  }
  return new InternalFailure(unitId, err);
}

// ═══════════════════════════════════════════════════════════════
// WRAPPING
// ═══════════════════════════════════════════════════════════════

const registry = new WeakMap<object, RegisteredContract>();

/**
 * Wrap a function with its contract.
 *
 * When the wrapper is called as a method, `receiver` in the condition context
 * is a snapshot of `this` and `old` the snapshot taken before the call.
 */
export function wrap<TArgs extends unknown[], TResult, TThis = unknown>(
  fn: (this: TThis, ...args: TArgs) => TResult,
  spec: ContractSpec<TArgs, TResult, Snapshot<TThis>>,
  options: WrapOptions = {},
): (this: TThis, ...args: TArgs) => TResult {
  if (options.enabled === false) {
    return fn;
  }

  const unitId = spec.name ?? options.name ?? (fn.name || 'anonymous');

  const wrapped = function (this: TThis, ...args: TArgs): TResult {
    const settings = getEnforcementSettings();
    if (settings.mode === 'unchecked') {
      return fn.apply(this, args);
    }

    const self = this;
    return runContract(
      {
        spec,
        unitId,
        args,
        invoke: () => fn.apply(self, args),
        readReceiver: isObjectLike(self) ? () => takeSnapshot(self) : undefined,
      },
      settings,
    );
  };

  Object.defineProperty(wrapped, 'name', { value: fn.name, configurable: true });
  registry.set(wrapped, { spec, target: fn, unitId });
  return wrapped;
}

/** The contract a wrapper was created with, or undefined for unwrapped callables. */
export function contractOf(fn: unknown): RegisteredContract | undefined {
  return isObjectLike(fn) ? registry.get(fn) : undefined;
}
