/**
 * Contract Types
 *
 * Design-by-contract primitives: conditions, the context records they read,
 * contract specs for callables and invariant specs for stateful types.
 */

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export type ContextField = 'args' | 'arguments' | 'result' | 'receiver' | 'old';

/**
 * A single named predicate. `check` is declared as a method so a condition
 * written against a narrow context can sit in a list typed by a wider one.
 */
export interface Condition<TContext> {
  readonly description: string;
  /** Context fields the check reads, when declared. Used for declaration-time validation and merging. */
  readonly uses?: readonly ContextField[];
  check(context: TContext): boolean;
}

/** Public data of an instance, copied at a point in time. Methods are left out. */
export type Snapshot<T> = {
  readonly [K in keyof T as T[K] extends (...args: never[]) => unknown ? never : K]: T[K];
};

export interface PreContext<TArgs extends readonly unknown[] = readonly unknown[], TReceiver = unknown> {
  readonly args: Readonly<TArgs>;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly receiver: TReceiver;
}

export interface PostContext<
  TArgs extends readonly unknown[] = readonly unknown[],
  TResult = unknown,
  TReceiver = unknown,
> extends PreContext<TArgs, TReceiver> {
  readonly result: TResult;
  /** Receiver as it was before the call. */
  readonly old: TReceiver;
}

export interface InvariantContext<T> {
  readonly receiver: Snapshot<T>;
}

export type Precondition<TArgs extends readonly unknown[] = readonly unknown[], TReceiver = unknown> =
  Condition<PreContext<TArgs, TReceiver>>;

export type Postcondition<
  TArgs extends readonly unknown[] = readonly unknown[],
  TResult = unknown,
  TReceiver = unknown,
> = Condition<PostContext<TArgs, TResult, TReceiver>>;

export type InvariantCondition<T> = Condition<InvariantContext<T>>;

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

export type FailurePermit = (error: unknown) => boolean;

export interface ContractSpec<
  TArgs extends readonly unknown[] = readonly unknown[],
  TResult = unknown,
  TReceiver = unknown,
> {
  readonly name?: string;
  /** Parameter names, by position, used to build `arguments`. */
  readonly params?: readonly string[];
  readonly preconditions: readonly Precondition<TArgs, TReceiver>[];
  readonly postconditions: readonly Postcondition<TArgs, TResult, TReceiver>[];
  /** Failures of the wrapped logic that are valid outcomes and propagate untouched. */
  readonly permits?: readonly FailurePermit[];
}

export interface ContractInit<TArgs extends readonly unknown[], TResult, TReceiver> {
  name?: string;
  params?: readonly string[];
  preconditions?: readonly Precondition<TArgs, TReceiver>[];
  postconditions?: readonly Postcondition<TArgs, TResult, TReceiver>[];
  permits?: readonly FailurePermit[];
}

export interface WrapOptions {
  /** `false` returns the callable untouched. */
  enabled?: boolean;
  name?: string;
}

export interface RegisteredContract {
  spec: ContractSpec;
  target: (...args: never[]) => unknown;
  unitId: string;
}

// ---------------------------------------------------------------------------
// Invariants
// ---------------------------------------------------------------------------

export interface InvariantSpec<T> {
  readonly name?: string;
  /** Inherited conditions followed by this level's own, in declaration order. */
  readonly conditions: readonly InvariantCondition<T>[];
  readonly own: readonly InvariantCondition<T>[];
  readonly inheritedFrom?: InvariantSpec<T>;
}

export interface MergedCheckPlan {
  /** Invariant indices already proven by the method's postconditions. */
  readonly skip: ReadonlySet<number>;
}

/** Per-method contracts, typed from each method's own signature. */
export type MethodContracts<T> = {
  readonly [K in keyof T]?: T[K] extends (...args: infer A) => infer R
    ? ContractSpec<A, R, Snapshot<T>>
    : never;
};

export interface EnforceOptions<T> {
  enabled?: boolean;
  /** Unit identifier used in reports. Defaults to the invariant spec's name, then the class name. */
  name?: string;
  contracts?: MethodContracts<T>;
  /** Public members left outside enforcement. */
  exclude?: readonly string[];
  /** Method that releases the instance. Defaults to `dispose`. */
  teardown?: string;
  /** `false` re-evaluates every invariant after every operation. */
  merge?: boolean;
}
