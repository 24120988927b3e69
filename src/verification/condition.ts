/**
 * Conditions — declaration and ordered evaluation.
 *
 * A condition is a pure predicate over a read-only context record. Lists of
 * conditions are evaluated in declaration order and stop at the first failure;
 * the failing condition is identified by its index in the list.
 */

import { EvaluationError, type CheckPhase } from '../core/errors.js';
import type { Condition, ContextField, InvariantCondition, Snapshot } from './types.js';

const KNOWN_FIELDS: ReadonlySet<string> = new Set<ContextField>([
  'args',
  'arguments',
  'result',
  'receiver',
  'old',
]);

/**
 * Declare a condition. `uses` lists the context fields the check reads; when
 * given, it lets contract and invariant declarations reject a condition that
 * reads a field its phase will never provide.
 */
export function condition<TContext>(
  description: string,
  check: (context: TContext) => boolean,
  uses?: readonly ContextField[],
): Condition<TContext> {
  if (typeof description !== 'string' || description.trim() === '') {
    throw new EvaluationError('Condition description must be a non-empty string');
  }
  if (typeof check !== 'function') {
    throw new EvaluationError(`Condition "${description}" has no check function`);
  }
  if (uses) {
    for (const field of uses) {
      if (!KNOWN_FIELDS.has(field)) {
        throw new EvaluationError(`Condition "${description}" declares unknown context field "${field}"`);
      }
    }
  }

  return Object.freeze({
    description,
    uses: uses ? Object.freeze([...uses]) : undefined,
    check,
  });
}

/** Declare a condition over the receiver's state alone. */
export function invariant<T>(
  description: string,
  check: (receiver: Snapshot<T>) => boolean,
): InvariantCondition<T> {
  return condition<{ readonly receiver: Snapshot<T> }>(
    description,
    (context) => check(context.receiver),
    ['receiver'],
  );
}

/** True when the condition declares that it reads nothing but the receiver. */
export function isReceiverOnly<TContext>(cond: Condition<TContext>): boolean {
  return cond.uses !== undefined && cond.uses.length === 1 && cond.uses[0] === 'receiver';
}

/**
 * Reject conditions that declare a read of one of `forbidden`. Runs at
 * declaration so the defect surfaces before the first call.
 */
export function assertConditionFields<TContext>(
  conditions: readonly Condition<TContext>[],
  forbidden: readonly ContextField[],
  details: { phase: CheckPhase; unitId: string },
): void {
  conditions.forEach((cond, index) => {
    if (!cond || typeof cond.check !== 'function') {
      throw new EvaluationError(
        `${details.phase} #${index} of ${details.unitId} is not a condition`,
        { ...details, conditionIndex: index },
      );
    }
    const offending = cond.uses?.find((field) => forbidden.includes(field));
    if (offending) {
      throw new EvaluationError(
        `${details.phase} #${index} of ${details.unitId} ("${cond.description}") reads "${offending}", ` +
          `which is not available during ${details.phase}`,
        { ...details, conditionIndex: index },
      );
    }
  });
}

export interface EvaluationOptions {
  phase: CheckPhase;
  unitId: string;
  /** Indices to leave unevaluated. */
  skip?: ReadonlySet<number>;
}

/**
 * Evaluate conditions in declaration order against `context`.
 * Returns the index of the first failing condition, or -1 when all pass.
 */
export function evaluateConditions<TContext>(
  conditions: readonly Condition<TContext>[],
  context: TContext,
  options: EvaluationOptions,
): number {
  for (let index = 0; index < conditions.length; index++) {
    if (options.skip?.has(index)) {
      continue;
    }

    const cond = conditions[index];
    let verdict: unknown;
    try {
      verdict = cond.check(context);
    } catch (err) {
      if (err instanceof EvaluationError) {
        throw new EvaluationError(
          `${options.phase} #${index} of ${options.unitId} ("${cond.description}"): ${err.message}`,
          { phase: options.phase, conditionIndex: index, unitId: options.unitId },
          err,
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new EvaluationError(
        `${options.phase} #${index} of ${options.unitId} ("${cond.description}") threw: ${reason}`,
        { phase: options.phase, conditionIndex: index, unitId: options.unitId },
        err,
      );
    }

    if (typeof verdict !== 'boolean') {
      throw new EvaluationError(
        `${options.phase} #${index} of ${options.unitId} ("${cond.description}") returned ${typeof verdict}, expected boolean`,
        { phase: options.phase, conditionIndex: index, unitId: options.unitId },
      );
    }
    if (!verdict) {
      return index;
    }
  }
  return -1;
}
