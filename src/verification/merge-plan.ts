/**
 * Merged check plans: which invariant conditions a method's own postconditions
 * have already established, so the enforcer can skip them after the call.
 *
 * Only identity is trusted. An invariant index is merged when the very same
 * condition object is one of the method's postconditions and reads nothing but
 * the receiver: the postcondition ran against the post-call snapshot the
 * invariant would see, so evaluating it again cannot change the outcome.
 * Plans are a cache; an empty plan is always correct.
 */

import { isReceiverOnly } from './condition.js';
import type { ContractSpec, InvariantSpec, MergedCheckPlan } from './types.js';

export const EMPTY_PLAN: MergedCheckPlan = Object.freeze({ skip: new Set<number>() });

export function buildMergedCheckPlan<T>(
  invariants: InvariantSpec<T>,
  contract: ContractSpec,
): MergedCheckPlan {
  const proven = new Set<object>(contract.postconditions);
  const skip = new Set<number>();

  invariants.conditions.forEach((cond, index) => {
    if (proven.has(cond) && isReceiverOnly(cond)) {
      skip.add(index);
    }
  });

  return skip.size === 0 ? EMPTY_PLAN : Object.freeze({ skip });
}

const cache = new WeakMap<object, WeakMap<ContractSpec, MergedCheckPlan>>();

export function getMergedCheckPlan<T>(
  invariants: InvariantSpec<T>,
  contract: ContractSpec,
): MergedCheckPlan {
  let byContract = cache.get(invariants);
  if (!byContract) {
    byContract = new WeakMap();
    cache.set(invariants, byContract);
  }

  let plan = byContract.get(contract);
  if (!plan) {
    plan = buildMergedCheckPlan(invariants, contract);
    byContract.set(contract, plan);
  }
  return plan;
}
