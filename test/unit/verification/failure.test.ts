import { describe, it, expect, vi, afterEach } from 'vitest';
import { raise, VIOLATION_EXIT_CODE } from '../../../src/verification/failure.js';
import { getEventBus } from '../../../src/core/events.js';
import { ContractViolation, InvariantViolation } from '../../../src/core/errors.js';
import type { EnforcementSettings } from '../../../src/verification/mode.js';

const throwing: EnforcementSettings = { mode: 'checked', mergeChecks: true, onViolation: 'throw' };
const exiting: EnforcementSettings = { ...throwing, onViolation: 'exit' };

describe('raise', () => {
  afterEach(() => {
    getEventBus().removeAllListeners();
    vi.restoreAllMocks();
  });

  it('should throw the violation itself', () => {
    const violation = new ContractViolation('postcondition', 0, 'sqrt', 'result squared is x');
    expect(() => raise(violation, throwing)).toThrow(violation);
  });

  it('should publish contract and invariant violations on separate events', () => {
    const contracts: ContractViolation[] = [];
    const invariants: InvariantViolation[] = [];
    getEventBus().on('contract:violated', (v) => contracts.push(v));
    getEventBus().on('invariant:broken', (v) => invariants.push(v));

    const contract = new ContractViolation('precondition', 0, 'f', 'x > 0');
    const invariant = new InvariantViolation('pre-operation', 0, 'T', 'ok');
    expect(() => raise(contract, throwing)).toThrow(contract);
    expect(() => raise(invariant, throwing)).toThrow(invariant);

    expect(contracts).toEqual([contract]);
    expect(invariants).toEqual([invariant]);
  });

  it('should still throw the violation when a listener fails', () => {
    getEventBus().on('contract:violated', () => {
      throw new Error('listener bug');
    });
    const violation = new ContractViolation('precondition', 0, 'f', 'x > 0');

    expect(() => raise(violation, throwing)).toThrow(violation);
  });

  it('should terminate the process under the exit policy', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    expect(() => raise(new ContractViolation('precondition', 0, 'f', 'x > 0'), exiting)).toThrow(
      'process.exit called',
    );
    expect(exit).toHaveBeenCalledWith(VIOLATION_EXIT_CODE);
    expect(VIOLATION_EXIT_CODE).toBe(70);
  });
});
