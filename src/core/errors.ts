export type ContractPhase = 'precondition' | 'postcondition';

export type InvariantPhase =
  | 'post-construction'
  | 'pre-operation'
  | 'post-operation'
  | 'pre-destruction';

export type CheckPhase = ContractPhase | InvariantPhase;

export type LifecycleState = 'uninitialized' | 'valid' | 'invalid' | 'destroyed';

export class CovenantError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CovenantError';
  }
}

export class ConfigError extends CovenantError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * A condition that could not produce a verdict: it threw, returned something
 * other than a boolean, read a context field its phase does not provide, or was
 * malformed at declaration.
 */
export class EvaluationError extends CovenantError {
  public readonly phase?: CheckPhase;
  public readonly conditionIndex?: number;
  public readonly unitId?: string;

  constructor(
    message: string,
    details: { phase?: CheckPhase; conditionIndex?: number; unitId?: string } = {},
    cause?: unknown,
  ) {
    super(message, 'EVALUATION_ERROR', details.phase ?? 'declare', cause);
    this.name = 'EvaluationError';
    this.phase = details.phase;
    this.conditionIndex = details.conditionIndex;
    this.unitId = details.unitId;
  }
}

export interface ViolationReport {
  kind: 'contract' | 'invariant';
  phase: CheckPhase;
  conditionIndex: number;
  unitId: string;
  description: string;
}

export class ContractViolation extends CovenantError {
  public readonly kind = 'contract' as const;

  constructor(
    public readonly phase: ContractPhase,
    public readonly conditionIndex: number,
    public readonly unitId: string,
    public readonly description: string,
  ) {
    super(
      `${phase} #${conditionIndex} of ${unitId} violated: ${description}`,
      'CONTRACT_VIOLATION',
      phase,
    );
    this.name = 'ContractViolation';
  }

  toJSON(): ViolationReport {
    return {
      kind: this.kind,
      phase: this.phase,
      conditionIndex: this.conditionIndex,
      unitId: this.unitId,
      description: this.description,
    };
  }
}

export class InvariantViolation extends CovenantError {
  public readonly kind = 'invariant' as const;
  public readonly operation?: string;
  public readonly poisoned: boolean;

  constructor(
    public readonly phase: InvariantPhase,
    public readonly conditionIndex: number,
    public readonly unitId: string,
    public readonly description: string,
    details: { operation?: string; poisoned?: boolean; cause?: unknown } = {},
  ) {
    const where = details.operation ? ` around ${details.operation}` : '';
    const prefix = details.poisoned ? 'object is poisoned: ' : '';
    super(
      `${prefix}invariant #${conditionIndex} of ${unitId} violated at ${phase}${where}: ${description}`,
      'INVARIANT_VIOLATION',
      phase,
      details.cause,
    );
    this.name = 'InvariantViolation';
    this.operation = details.operation;
    this.poisoned = details.poisoned ?? false;
  }

  toJSON(): ViolationReport & { operation?: string; poisoned: boolean } {
    return {
      kind: this.kind,
      phase: this.phase,
      conditionIndex: this.conditionIndex,
      unitId: this.unitId,
      description: this.description,
      operation: this.operation,
      poisoned: this.poisoned,
    };
  }
}

/** The wrapped logic itself failed, for reasons unrelated to its contract. */
export class InternalFailure extends CovenantError {
  constructor(public readonly unitId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${unitId} failed: ${reason}`, 'INTERNAL_FAILURE', 'execute', cause);
    this.name = 'InternalFailure';
  }
}

export class LifecycleError extends CovenantError {
  constructor(
    message: string,
    public readonly unitId: string,
    public readonly state: LifecycleState,
  ) {
    super(message, 'LIFECYCLE_ERROR', state);
    this.name = 'LifecycleError';
  }
}

export type Violation = ContractViolation | InvariantViolation;
