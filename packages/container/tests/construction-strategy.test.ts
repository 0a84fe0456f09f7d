import { beforeEach, describe, expect, it } from 'vitest';

import {
  peekConstructionPlan,
  planFor,
  selectConstructionPlan,
} from '../src/core/construction-strategy.js';
import { createDescriptor } from '../src/core/descriptor.js';
import { FLAG_HAS_NO_DEPS } from '../src/core/flags.js';
import { contract } from '../src/core/token.js';
import { Constructs, Inject } from '../src/decorators/index.js';
import { NoSuitableConstructorError } from '../src/errors/errors.js';
import { StaticInjectionRegistry } from '../src/registry/static-registry.js';
import { Lifetime } from '../src/types/types.js';

const AC = contract<string>('A');
const BC = contract<string>('B');
const CC = contract<string>('C');

describe('selectConstructionPlan()', () => {
  beforeEach(() => {
    StaticInjectionRegistry.resetForTests();
  });

  it('plans a zero-argument class with no parameters', () => {
    class Leaf {}

    const plan = selectConstructionPlan(Leaf);
    expect(plan.signature).toBe('Leaf.constructor');
    expect(plan.parameters).toEqual([]);
    expect(plan.invoke([])).toBeInstanceOf(Leaf);
  });

  it('lists decorated constructor parameters in declaration order', () => {
    class Pair {
      constructor(
        @Inject(AC) readonly a: string,
        @Inject(BC) readonly b: string
      ) {}
    }

    const plan = selectConstructionPlan(Pair);
    expect(plan.parameters.map((p) => p.label)).toEqual(['A', 'B']);

    const built = plan.invoke(['x', 'y']);
    expect(built).toEqual(new Pair('x', 'y'));
  });

  it('picks the richest usable signature', () => {
    class Service {
      constructor(
        readonly a: string,
        readonly b: string = 'default-b',
        readonly c: string = 'default-c'
      ) {}

      @Constructs()
      static withA(@Inject(AC) a: string) {
        return new Service(a);
      }

      @Constructs()
      static withAll(@Inject(AC) a: string, @Inject(BC) b: string, @Inject(CC) c: string) {
        return new Service(a, b, c);
      }
    }

    const plan = selectConstructionPlan(Service);
    expect(plan.signature).toBe('Service.withAll');
    expect(plan.parameters.map((p) => p.label)).toEqual(['A', 'B', 'C']);
    expect(plan.invoke(['1', '2', '3'])).toEqual(new Service('1', '2', '3'));
  });

  it('keeps declaration order on ties, constructor first', () => {
    class Tied {
      constructor(@Inject(AC) readonly a: string) {}

      @Constructs()
      static other(@Inject(BC) b: string) {
        return new Tied(b);
      }
    }

    expect(selectConstructionPlan(Tied).signature).toBe('Tied.constructor');
  });

  it('skips a signature with an undecorated parameter', () => {
    class Partial {
      constructor(
        @Inject(AC) readonly a: string,
        readonly b: number
      ) {}

      @Constructs()
      static create(@Inject(AC) a: string) {
        return new Partial(a, 1);
      }
    }

    const plan = selectConstructionPlan(Partial);
    expect(plan.signature).toBe('Partial.create');
    expect(plan.invoke(['a'])).toEqual(new Partial('a', 1));
  });

  it('throws NoSuitableConstructorError with a reason per rejected signature', () => {
    class Hopeless {
      constructor(
        readonly a: string,
        readonly b: string
      ) {}
    }

    let caught: unknown;
    try {
      selectConstructionPlan(Hopeless);
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(NoSuitableConstructorError);
    const err = caught instanceof NoSuitableConstructorError ? caught : undefined;
    expect(err?.className).toBe('Hopeless');
    expect(err?.reasons).toEqual(['Hopeless.constructor: parameters 0, 1 missing @Inject']);
    expect(peekConstructionPlan(Hopeless)).toBeUndefined();
  });

  it('inherits constructor parameters from the nearest decorated ancestor', () => {
    class Base {
      constructor(@Inject(AC) readonly a: string) {}
    }
    class Derived extends Base {}

    const plan = selectConstructionPlan(Derived);
    expect(plan.signature).toBe('Derived.constructor');
    expect(plan.parameters.map((p) => p.label)).toEqual(['A']);
    expect(plan.invoke(['inherited'])).toEqual(new Derived('inherited'));
  });

  it('prefers the class own decorations over an ancestor', () => {
    class Base {
      constructor(@Inject(AC) readonly a: string) {}
    }
    class Derived extends Base {
      constructor(@Inject(BC) b: string) {
        super(b);
      }
    }

    expect(selectConstructionPlan(Derived).parameters.map((p) => p.label)).toEqual(['B']);
  });
});

describe('planFor()', () => {
  beforeEach(() => {
    StaticInjectionRegistry.resetForTests();
  });

  it('memoises the plan and flags dependency-free classes', () => {
    class Leaf {}
    const descriptor = createDescriptor(
      contract('Leaf').id,
      'Leaf',
      { kind: 'class', useClass: Leaf },
      Lifetime.Singleton
    );

    expect(descriptor.flags & FLAG_HAS_NO_DEPS).toBe(0);
    const plan = planFor(descriptor);
    expect(planFor(descriptor)).toBe(plan);
    expect(descriptor.flags & FLAG_HAS_NO_DEPS).toBe(FLAG_HAS_NO_DEPS);
  });

  it('uses the explicit dependency list of a factory', () => {
    const descriptor = createDescriptor(
      contract('Joined').id,
      'Joined',
      {
        kind: 'factory',
        useFactory: (a: string, b: string) => `${a}+${b}`,
        deps: [
          { contract: AC.id, label: 'A', optional: false, fallback: undefined },
          { contract: BC.id, label: 'B', optional: true, fallback: 'fb' },
        ],
      },
      Lifetime.Transient
    );

    const plan = planFor(descriptor);
    expect(plan.signature).toBe('Joined factory');
    expect(plan.parameters.map((p) => p.label)).toEqual(['A', 'B']);
    expect(plan.invoke(['x', 'y'])).toBe('x+y');
  });
});
