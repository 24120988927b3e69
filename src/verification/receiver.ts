import type { Snapshot } from './types.js';

export function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Copy the receiver's state into a frozen plain object: every own enumerable
 * string-keyed property, plus the values of `accessorKeys` (getters that live
 * on the prototype). The copy is shallow.
 */
export function takeSnapshot<T>(instance: T, accessorKeys: readonly string[] = []): Snapshot<T> {
  const copy: Record<string, unknown> = {};
  if (isObjectLike(instance)) {
    for (const key of Object.keys(instance)) {
      copy[key] = Reflect.get(instance, key);
    }
    for (const key of accessorKeys) {
      if (!(key in copy)) {
        copy[key] = Reflect.get(instance, key);
      }
    }
  }
  const frozen: object = Object.freeze(copy);
  // Snapshot<T> is exactly the shape copied above; the compiler cannot follow reflection.
  return frozen as Snapshot<T>;
}
