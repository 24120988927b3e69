import { ContractViolation, type Violation } from '../core/errors.js';
import { getEventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { CovenantEvents } from '../core/types.js';
import type { EnforcementSettings } from './mode.js';

/** Exit status used when the violation policy terminates the process (EX_SOFTWARE). */
export const VIOLATION_EXIT_CODE = 70;

/**
 * Emit on the process bus. A listener that throws is logged; the caller's
 * own outcome (a violation, a teardown result) still reaches its caller.
 */
export function publish<K extends keyof CovenantEvents>(event: K, data: CovenantEvents[K]): void {
  try {
    getEventBus().emit(event, data);
  } catch (err) {
    getLogger().warn({ err, event }, 'event listener threw');
  }
}

/**
 * Surface a violation: log it, publish it, then throw it or terminate the
 * process according to the violation policy. Never returns.
 */
export function raise(violation: Violation, settings: EnforcementSettings): never {
  const logger = getLogger();
  logger.error({ violation: violation.toJSON() }, violation.message);

  if (violation instanceof ContractViolation) {
    publish('contract:violated', violation);
  } else {
    publish('invariant:broken', violation);
  }

  if (settings.onViolation === 'exit') {
    logger.fatal({ violation: violation.toJSON() }, 'terminating on contract violation');
    process.exit(VIOLATION_EXIT_CODE);
  }
  throw violation;
}
