/**
 * InvariantEnforcer — Class Invariant Enforcement
 *
 * `enforce` decorates a class so its invariants are checked right after
 * construction, around every public operation and right before teardown.
 * Each instance moves through uninitialized → valid → destroyed; an invariant
 * failure moves it to the terminal invalid state instead, after which every
 * operation is refused.
 *
 * Public operations are the string-named methods and accessors of the
 * prototype chain, plus assignments to the instance's own public fields.
 * Names starting with `_` are internal. Calls an operation makes on its own
 * receiver are nested: they run their contracts but skip invariant checks,
 * since the object may legitimately be mid-update.
 *
 * The enforcer takes no locks. When an instance is shared between concurrent
 * flows, the caller must keep writers from interleaving with an operation,
 * otherwise the before/after snapshots may observe a half-applied change.
 */

import { nanoid } from 'nanoid';
import {
  EvaluationError,
  InvariantViolation,
  LifecycleError,
  type InvariantPhase,
  type LifecycleState,
} from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { evaluateConditions } from './condition.js';
import { guardContext } from './context.js';
import { contractOf, runContract } from './contract-checker.js';
import { publish, raise } from './failure.js';
import { EMPTY_PLAN, getMergedCheckPlan } from './merge-plan.js';
import { getEnforcementSettings, type EnforcementSettings } from './mode.js';
import { isObjectLike, takeSnapshot } from './receiver.js';
import type {
  ContractSpec,
  EnforceOptions,
  InvariantContext,
  InvariantSpec,
  MergedCheckPlan,
  Snapshot,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

interface InstanceState {
  lifecycle: LifecycleState;
  /** Operations currently running on this instance; above zero means nested. */
  depth: number;
  readonly fields: Map<string, unknown>;
  readonly instanceId: string;
  violation?: InvariantViolation;
}

interface MethodContract {
  spec: ContractSpec;
  target: Function;
  unitId: string;
}

interface Operation {
  name: string;
  args: readonly unknown[];
  invoke: () => unknown;
  contract?: MethodContract;
}

const states = new WeakMap<object, InstanceState>();

function isPublicName(name: string): boolean {
  return !name.startsWith('_');
}

/** Lifecycle state of an enforced instance, or undefined for anything else. */
export function lifecycleOf(instance: object): LifecycleState | undefined {
  return states.get(instance)?.lifecycle;
}

// ═══════════════════════════════════════════════════════════════
// DECLARATION HELPERS
// ═══════════════════════════════════════════════════════════════

/** First descriptor of every public method or accessor along the prototype chain. */
function collectSurface(proto: object, excluded: ReadonlySet<string>): Map<string, PropertyDescriptor> {
  const surface = new Map<string, PropertyDescriptor>();
  for (let current: object | null = proto; current && current !== Object.prototype; current = Object.getPrototypeOf(current)) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name === 'constructor' || !isPublicName(name) || excluded.has(name) || surface.has(name)) {
        continue;
      }
      const descriptor = Object.getOwnPropertyDescriptor(current, name);
      if (descriptor && (typeof descriptor.value === 'function' || descriptor.get || descriptor.set)) {
        surface.set(name, descriptor);
      }
    }
  }
  return surface;
}

function isContractSpec(value: unknown): value is ContractSpec {
  return (
    isObjectLike(value) &&
    Array.isArray(Reflect.get(value, 'preconditions')) &&
    Array.isArray(Reflect.get(value, 'postconditions'))
  );
}

function resolveContracts<T>(
  surface: Map<string, PropertyDescriptor>,
  declared: EnforceOptions<T>['contracts'],
  unitId: string,
): Map<string, MethodContract> {
  const contracts = new Map<string, MethodContract>();

  for (const name of Object.keys(declared ?? {})) {
    const method: unknown = surface.get(name)?.value;
    if (typeof method !== 'function') {
      throw new EvaluationError(`${unitId} declares a contract for "${name}", which is not a public method`, { unitId });
    }
  }

  for (const [name, descriptor] of surface) {
    const method: unknown = descriptor.value;
    if (typeof method !== 'function') {
      continue;
    }

    const explicit: unknown = declared ? Reflect.get(declared, name) : undefined;
    const registered = contractOf(method);

    if (explicit !== undefined && registered) {
      throw new EvaluationError(`${unitId}.${name} has a contract both from wrap() and from enforce()`, { unitId });
    }
    if (explicit !== undefined) {
      if (!isContractSpec(explicit)) {
        throw new EvaluationError(`Contract for ${unitId}.${name} is not a ContractSpec`, { unitId });
      }
      contracts.set(name, { spec: explicit, target: method, unitId: explicit.name ?? `${unitId}.${name}` });
    } else if (registered) {
      contracts.set(name, {
        spec: registered.spec,
        target: registered.target,
        unitId: registered.spec.name ?? `${unitId}.${name}`,
      });
    }
  }

  return contracts;
}

// ═══════════════════════════════════════════════════════════════
// ENFORCE
// ═══════════════════════════════════════════════════════════════

/**
 * Decorate `type` so its instances uphold `spec`.
 *
 * Subtypes do not inherit enforcement through `extends` on the decorated
 * class: derive from the undecorated class and enforce the subclass with
 * `extend(baseSpec, ...)`.
 */
export function enforce<T extends object, C extends new (...args: never[]) => T>(
  type: C,
  spec: InvariantSpec<T>,
  options: EnforceOptions<T> = {},
): C {
  if (options.enabled === false) {
    return type;
  }

  const baseProto: unknown = Reflect.get(type, 'prototype');
  if (!isObjectLike(baseProto)) {
    throw new EvaluationError(`${type.name || 'anonymous'} has no prototype to enforce`);
  }

  const unitId = options.name ?? spec.name ?? (type.name || 'anonymous');
  const teardown = options.teardown ?? 'dispose';
  const excluded = new Set(options.exclude ?? []);
  const surface = collectSurface(baseProto, excluded);
  const contracts = resolveContracts(surface, options.contracts, unitId);
  const accessorKeys = [...surface].filter(([, d]) => d.get !== undefined).map(([name]) => name);

  // Built while checking was off; they carry no state and are never checked.
  const unmanaged = new WeakSet<object>();
  // Constructors of this type currently running. The instance under
  // construction has no state yet, so its own calls go straight through.
  let constructing = 0;

  // ---------------------------------------------------------------------------
  // Checks
  // ---------------------------------------------------------------------------

  function withDepth<R>(state: InstanceState, fn: () => R): R {
    state.depth++;
    try {
      return fn();
    } finally {
      state.depth--;
    }
  }

  function snapshotOf(self: T, state: InstanceState): Snapshot<T> {
    return withDepth(state, () => takeSnapshot(self, accessorKeys));
  }

  /** Index of the first broken invariant, or -1. */
  function evaluate(
    self: T,
    state: InstanceState,
    phase: InvariantPhase,
    plan: MergedCheckPlan,
    receiver?: Snapshot<T>,
  ): number {
    const context: InvariantContext<T> = guardContext(
      { receiver: receiver ?? snapshotOf(self, state) },
      phase,
      unitId,
    );
    return evaluateConditions(spec.conditions, context, { phase, unitId, skip: plan.skip });
  }

  function violationAt(phase: InvariantPhase, index: number, operation: string): InvariantViolation {
    return new InvariantViolation(phase, index, unitId, spec.conditions[index].description, { operation });
  }

  function poison(state: InstanceState, violation: InvariantViolation): void {
    state.lifecycle = 'invalid';
    state.violation = violation;
    publish('object:poisoned', { unitId, instanceId: state.instanceId, violation });
  }

  function check(
    self: T,
    state: InstanceState,
    phase: InvariantPhase,
    operation: string,
    settings: EnforcementSettings,
    plan: MergedCheckPlan = EMPTY_PLAN,
    receiver?: Snapshot<T>,
  ): void {
    const failed = evaluate(self, state, phase, plan, receiver);
    if (failed >= 0) {
      const violation = violationAt(phase, failed, operation);
      poison(state, violation);
      raise(violation, settings);
    }
  }

  /** After a failed operation: poison the instance if it was left broken, without raising. */
  function audit(self: T, state: InstanceState, operation: string): void {
    let failed: number;
    try {
      failed = evaluate(self, state, 'post-operation', EMPTY_PLAN);
    } catch (err) {
      getLogger().warn({ err, unitId, operation }, 'invariants could not be evaluated after a failed operation');
      return;
    }
    if (failed >= 0) {
      const violation = violationAt('post-operation', failed, operation);
      getLogger().error({ violation: violation.toJSON() }, 'operation failed and left the object invalid');
      poison(state, violation);
    }
  }

  function refuseIfUnusable(state: InstanceState, operation: string, settings: EnforcementSettings): void {
    if (state.lifecycle === 'uninitialized') {
      throw new LifecycleError(
        `${unitId} never finished construction; ${operation} is not allowed`,
        unitId,
        'uninitialized',
      );
    }
    if (state.lifecycle === 'invalid' && state.violation) {
      const original = state.violation;
      raise(
        new InvariantViolation(original.phase, original.conditionIndex, unitId, original.description, {
          operation,
          poisoned: true,
          cause: original,
        }),
        settings,
      );
    }
    if (state.lifecycle === 'destroyed') {
      throw new LifecycleError(`${unitId} has been destroyed; ${operation} is not allowed`, unitId, 'destroyed');
    }
  }

  /** State of `self`, or undefined when the call should go straight through. */
  function stateFor(self: T, operation: string): InstanceState | undefined {
    const state = states.get(self);
    if (state) {
      return state;
    }
    if (unmanaged.has(self) || constructing > 0) {
      return undefined;
    }
    // Only a constructor that threw leaves an instance without state behind.
    throw new LifecycleError(
      `${unitId} failed during construction; ${operation} is not allowed`,
      unitId,
      'uninitialized',
    );
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  function execute(self: T, state: InstanceState, op: Operation, settings: EnforcementSettings): unknown {
    if (!op.contract) {
      return op.invoke();
    }
    return runContract(
      {
        spec: op.contract.spec,
        unitId: op.contract.unitId,
        args: op.args,
        invoke: op.invoke,
        readReceiver: () => snapshotOf(self, state),
      },
      settings,
    );
  }

  function operate(self: T, op: Operation): unknown {
    const settings = getEnforcementSettings();
    if (settings.mode === 'unchecked') {
      return op.invoke();
    }

    const state = stateFor(self, op.name);
    if (!state) {
      return op.invoke();
    }
    if (state.depth > 0) {
      return execute(self, state, op, settings);
    }

    refuseIfUnusable(state, op.name, settings);
    check(self, state, 'pre-operation', op.name, settings);

    // The post-call snapshot the postconditions saw; merged invariants must be judged on it.
    const observed: { after?: Snapshot<T> } = {};
    const contract = op.contract;
    let result: unknown;
    try {
      result = withDepth(state, () => {
        if (!contract) {
          return op.invoke();
        }
        return runContract(
          {
            spec: contract.spec,
            unitId: contract.unitId,
            args: op.args,
            invoke: op.invoke,
            readReceiver: () => {
              observed.after = snapshotOf(self, state);
              return observed.after;
            },
          },
          settings,
        );
      });
    } catch (err) {
      audit(self, state, op.name);
      throw err;
    }

    const plan =
      contract && settings.mergeChecks && options.merge !== false
        ? getMergedCheckPlan(spec, contract.spec)
        : EMPTY_PLAN;
    check(self, state, 'post-operation', op.name, settings, plan, plan === EMPTY_PLAN ? undefined : observed.after);
    return result;
  }

  function tearDown(self: T, op: Operation): unknown {
    const settings = getEnforcementSettings();
    if (settings.mode === 'unchecked') {
      return op.invoke();
    }
    const state = stateFor(self, op.name);
    if (!state || state.depth > 0) {
      return op.invoke();
    }
    if (state.lifecycle === 'destroyed') {
      throw new LifecycleError(`${unitId} has already been destroyed`, unitId, 'destroyed');
    }
    if (state.lifecycle === 'uninitialized') {
      throw new LifecycleError(
        `${unitId} never finished construction; ${op.name} is not allowed`,
        unitId,
        'uninitialized',
      );
    }

    // A broken invariant is reported, but only once resources are released.
    let deferred: unknown;
    if (state.lifecycle === 'valid') {
      try {
        const failed = evaluate(self, state, 'pre-destruction', EMPTY_PLAN);
        if (failed >= 0) {
          deferred = violationAt('pre-destruction', failed, op.name);
        }
      } catch (err) {
        deferred = err;
      }
    }

    let result: unknown;
    try {
      result = withDepth(state, () => execute(self, state, op, settings));
    } catch (err) {
      if (deferred !== undefined) {
        getLogger().error({ err: deferred, unitId }, 'invariant broken at teardown');
      }
      throw err;
    } finally {
      state.lifecycle = 'destroyed';
      publish('object:destroyed', { unitId, instanceId: state.instanceId });
    }

    if (deferred instanceof InvariantViolation) {
      raise(deferred, settings);
    }
    if (deferred !== undefined) {
      throw deferred;
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Enforced prototype
  // ---------------------------------------------------------------------------

  const enforcedProto: object = Object.create(baseProto);

  for (const [name, descriptor] of surface) {
    const method: unknown = descriptor.value;

    if (typeof method === 'function') {
      const contract = contracts.get(name);
      const target = contract ? contract.target : method;
      const run = name === teardown ? tearDown : operate;
      const wrapped = function (this: T, ...args: unknown[]): unknown {
        const self = this;
        return run(self, { name, args, contract, invoke: () => Reflect.apply(target, self, args) });
      };
      Object.defineProperty(wrapped, 'name', { value: name, configurable: true });
      Object.defineProperty(enforcedProto, name, {
        configurable: true,
        enumerable: descriptor.enumerable,
        writable: true,
        value: wrapped,
      });
      continue;
    }

    const { get, set } = descriptor;
    Object.defineProperty(enforcedProto, name, {
      configurable: true,
      enumerable: descriptor.enumerable,
      get: get
        ? function (this: T): unknown {
            const self = this;
            return operate(self, { name: `get ${name}`, args: [], invoke: () => Reflect.apply(get, self, []) });
          }
        : undefined,
      set: set
        ? function (this: T, value: unknown): void {
            const self = this;
            operate(self, { name: `set ${name}`, args: [value], invoke: () => Reflect.apply(set, self, [value]) });
          }
        : undefined,
    });
  }

  // Stand-in constructor whose only job is to give new instances the enforced prototype.
  const instancePrototype = function () {};
  instancePrototype.prototype = enforcedProto;

  /** Move public own fields behind accessors so assignments become operations. */
  function manage(instance: T): InstanceState {
    const state: InstanceState = {
      lifecycle: 'uninitialized',
      depth: 0,
      fields: new Map(),
      instanceId: nanoid(10),
    };
    states.set(instance, state);

    for (const key of Object.keys(instance)) {
      if (!isPublicName(key) || excluded.has(key)) {
        continue;
      }
      const descriptor = Object.getOwnPropertyDescriptor(instance, key);
      if (!descriptor || !('value' in descriptor) || !descriptor.writable || !descriptor.configurable) {
        continue;
      }
      state.fields.set(key, descriptor.value);
      Object.defineProperty(instance, key, {
        configurable: true,
        enumerable: descriptor.enumerable,
        get: () => state.fields.get(key),
        set: (value: unknown) => {
          operate(instance, {
            name: `set ${key}`,
            args: [value],
            invoke: () => state.fields.set(key, value),
          });
        },
      });
    }
    return state;
  }

  const enforced: C = new Proxy(type, {
    construct(target, args, newTarget) {
      if (newTarget !== enforced) {
        throw new LifecycleError(
          `${unitId} is enforced; subclass the undecorated class and enforce it with an extended invariant spec`,
          unitId,
          'uninitialized',
        );
      }

      const settings = getEnforcementSettings();
      if (settings.mode === 'unchecked') {
        const plain: T = Reflect.construct(target, args, instancePrototype);
        unmanaged.add(plain);
        return plain;
      }

      let instance: T;
      constructing++;
      try {
        instance = Reflect.construct(target, args, instancePrototype);
      } finally {
        constructing--;
      }

      const state = manage(instance);
      check(instance, state, 'post-construction', 'constructor', settings);
      state.lifecycle = 'valid';
      return instance;
    },
  });

  return enforced;
}
