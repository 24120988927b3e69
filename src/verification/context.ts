import { EvaluationError, type CheckPhase } from '../core/errors.js';
import type { ContextField } from './types.js';

const CONTEXT_FIELDS: ReadonlySet<PropertyKey> = new Set<ContextField>([
  'args',
  'arguments',
  'result',
  'receiver',
  'old',
]);

/**
 * Freeze a context record and guard it: reading a context field the record
 * does not carry (`result` during the precondition phase, `args` during an
 * invariant phase), or one listed in `absent`, fails with an EvaluationError
 * instead of yielding undefined.
 */
export function guardContext<T extends object>(
  record: T,
  phase: CheckPhase,
  unitId: string,
  absent: readonly ContextField[] = [],
): T {
  Object.freeze(record);
  const unavailable = new Set<PropertyKey>(absent);
  return new Proxy(record, {
    get(target, prop, receiver) {
      if (CONTEXT_FIELDS.has(prop) && (unavailable.has(prop) || !Reflect.has(target, prop))) {
        throw new EvaluationError(
          `${String(prop)} is not available during ${phase} of ${unitId}`,
          { phase, unitId },
        );
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

/** Map positional arguments to their declared parameter names. */
export function bindArguments(
  params: readonly string[] | undefined,
  args: readonly unknown[],
): Readonly<Record<string, unknown>> {
  const named: Record<string, unknown> = {};
  if (params) {
    params.forEach((name, index) => {
      named[name] = args[index];
    });
  }
  return Object.freeze(named);
}
