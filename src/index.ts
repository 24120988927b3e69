/**
 * Covenant — runtime contracts and class invariants
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { bootstrap, defineInvariants, invariant, enforce } from 'covenant';
 *
 * bootstrap();
 *
 * class Account {
 *   constructor(public balance: number) {}
 *   withdraw(amount: number): void { this.balance -= amount; }
 * }
 *
 * const SafeAccount = enforce(Account, defineInvariants<Account>([
 *   invariant('balance is never negative', (a) => a.balance >= 0),
 * ]));
 *
 * new SafeAccount(10).withdraw(20); // throws InvariantViolation at post-operation
 * ```
 */

// Core
export { bootstrap, type BootstrapOptions } from './core/bootstrap.js';
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { EventBus, getEventBus } from './core/events.js';
export { createLogger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './core/logger.js';
export {
  CovenantError,
  ConfigError,
  EvaluationError,
  ContractViolation,
  InvariantViolation,
  InternalFailure,
  LifecycleError,
  type CheckPhase,
  type ContractPhase,
  type InvariantPhase,
  type LifecycleState,
  type Violation,
  type ViolationReport,
} from './core/errors.js';
export {
  CovenantConfigSchema,
  type CovenantConfig,
  type CovenantConfigInput,
  type CovenantEvents,
  type ObjectLifecycleEvent,
} from './core/types.js';

// Verification
export * from './verification/index.js';
