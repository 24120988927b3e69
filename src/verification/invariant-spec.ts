import { assertConditionFields } from './condition.js';
import type { InvariantCondition, InvariantSpec } from './types.js';

function assertReceiverOnly<T>(conditions: readonly InvariantCondition<T>[], unitId: string): void {
  assertConditionFields(conditions, ['args', 'arguments', 'result', 'old'], {
    phase: 'pre-operation',
    unitId,
  });
}

/** Declare the invariants of a root type. */
export function defineInvariants<T>(
  conditions: readonly InvariantCondition<T>[],
  options: { name?: string } = {},
): InvariantSpec<T> {
  const own = Object.freeze([...conditions]);
  assertReceiverOnly(own, options.name ?? 'invariants');

  return Object.freeze({
    name: options.name,
    conditions: own,
    own,
    inheritedFrom: undefined,
  });
}

/**
 * Extend a type's invariants for a subtype. The result evaluates the base's
 * conditions first, then `additional`, in order. The base is left untouched,
 * so a subtype can never drop what it inherited.
 */
export function extend<T>(
  base: InvariantSpec<T>,
  additional: readonly InvariantCondition<T>[],
  options: { name?: string } = {},
): InvariantSpec<T> {
  const own = Object.freeze([...additional]);
  assertReceiverOnly(own, options.name ?? base.name ?? 'invariants');

  return Object.freeze({
    name: options.name,
    conditions: Object.freeze([...base.conditions, ...own]),
    own,
    inheritedFrom: base,
  });
}
