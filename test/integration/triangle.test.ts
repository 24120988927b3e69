import { describe, it, expect, afterEach } from 'vitest';
import {
  condition,
  ContractViolation,
  defineContract,
  defineInvariants,
  enforce,
  extend,
  getEventBus,
  invariant,
  InvariantViolation,
  lifecycleOf,
  setEnforcementMode,
  type PreContext,
  type Snapshot,
} from '../../src/index.js';

// ─── Helpers ────────────────────────────────────────────────────

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

class Triangle {
  constructor(
    public a: number,
    public b: number,
    public c: number,
  ) {}

  perimeter(): number {
    return this.a + this.b + this.c;
  }

  scale(factor: number): void {
    this.a *= factor;
    this.b *= factor;
    this.c *= factor;
  }
}

class Equilateral extends Triangle {
  constructor(side: number) {
    super(side, side, side);
  }

  stretch(by: number): void {
    this.a += by;
  }
}

const sidesPositive = invariant<Triangle>('sides are positive', (t) => t.a > 0 && t.b > 0 && t.c > 0);
const triangleInequality = invariant<Triangle>(
  'each side is shorter than the other two together',
  (t) => t.a < t.b + t.c && t.b < t.a + t.c && t.c < t.a + t.b,
);

const triangleInvariants = defineInvariants<Triangle>([sidesPositive, triangleInequality], { name: 'Triangle' });

const CheckedTriangle = enforce(Triangle, triangleInvariants, {
  contracts: {
    scale: defineContract<[number], void, Snapshot<Triangle>>({
      params: ['factor'],
      preconditions: [
        condition('factor is positive', (c: PreContext<[number], Snapshot<Triangle>>) => c.args[0] > 0),
      ],
      postconditions: [sidesPositive],
    }),
  },
});

const CheckedEquilateral = enforce(
  Equilateral,
  extend<Equilateral>(triangleInvariants, [invariant<Equilateral>('all sides equal', (t) => t.a === t.b && t.b === t.c)], {
    name: 'Equilateral',
  }),
);

// ─── Tests ──────────────────────────────────────────────────────

describe('Triangle', () => {
  afterEach(() => {
    getEventBus().removeAllListeners();
  });

  it('should construct a valid triangle', () => {
    const t = new CheckedTriangle(3, 4, 5);

    expect(t.perimeter()).toBe(12);
    expect(lifecycleOf(t)).toBe('valid');
  });

  it('should reject a degenerate triangle at construction', () => {
    const err = captureError(() => new CheckedTriangle(1, 1, 5));

    expect(err).toBeInstanceOf(InvariantViolation);
    expect(err).toMatchObject({ phase: 'post-construction', conditionIndex: 1, unitId: 'Triangle' });
  });

  it('should report the first broken invariant in order', () => {
    // -1 breaks both; positivity is declared first
    expect(captureError(() => new CheckedTriangle(-1, 1, 1))).toMatchObject({ conditionIndex: 0 });
  });

  it('should poison a triangle whose side assignment breaks it', () => {
    const t = new CheckedTriangle(3, 4, 5);
    const broken: InvariantViolation[] = [];
    getEventBus().on('invariant:broken', (v) => broken.push(v));

    const err = captureError(() => {
      t.a = 10;
    });

    expect(err).toMatchObject({ phase: 'post-operation', conditionIndex: 1, operation: 'set a' });
    expect(lifecycleOf(t)).toBe('invalid');
    expect(() => t.perimeter()).toThrow(
      'object is poisoned: invariant #1 of Triangle violated at post-operation around perimeter: ' +
        'each side is shorter than the other two together',
    );
    expect(broken.map((v) => v.poisoned)).toEqual([false, true]);
  });

  it('should scale through the method contract', () => {
    const t = new CheckedTriangle(3, 4, 5);
    t.scale(2);

    expect([t.a, t.b, t.c]).toEqual([6, 8, 10]);
    expect(captureError(() => t.scale(0))).toBeInstanceOf(ContractViolation);
    expect(lifecycleOf(t)).toBe('valid');
  });

  it('should check inherited invariants before the subtype ones', () => {
    const eq = new CheckedEquilateral(2);
    expect(eq.perimeter()).toBe(6);

    expect(captureError(() => eq.stretch(1))).toMatchObject({
      phase: 'post-operation',
      conditionIndex: 2,
      unitId: 'Equilateral',
      operation: 'stretch',
    });
    expect(captureError(() => new CheckedEquilateral(0))).toMatchObject({ conditionIndex: 0 });
  });

  it('should behave as the plain class when unchecked', () => {
    setEnforcementMode('unchecked');

    const t = new CheckedTriangle(1, 1, 5);
    t.a = -3;

    expect(t.perimeter()).toBe(3);
    expect(lifecycleOf(t)).toBeUndefined();
  });
});
