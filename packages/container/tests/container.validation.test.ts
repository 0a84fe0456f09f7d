import { beforeEach, describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import { contract } from '../src/core/token.js';
import { Injectable } from '../src/decorators/index.js';
import {
  DuplicateRegistrationError,
  InvalidContainerConfigError,
  InvalidContractError,
  InvalidProviderError,
  MissingInjectableDecoratorError,
} from '../src/errors/errors.js';
import { StaticInjectionRegistry } from '../src/registry/static-registry.js';

describe('Container configuration validation', () => {
  beforeEach(() => {
    StaticInjectionRegistry.resetForTests();
  });

  it('rejects malformed configuration fields', () => {
    expect(() => new Container('app' as never)).toThrow('config must be an object.');
    expect(() => new Container({ name: 42 as never })).toThrow(`'name' must be a string.`);
    expect(() => new Container({ providers: 'all' as never })).toThrow(`'providers' must be an array.`);
    expect(() => new Container({ overwritePolicy: 'sometimes' as never })).toThrow(
      `'overwritePolicy' must be one of 'allow', 'warn', 'error'.`
    );
    expect(() => new Container({ onInstantiate: 1 as never })).toThrow(`'onInstantiate' must be a function.`);
    expect(() => new Container({ logger: {} as never })).toThrow(`'logger' must provide a warn() method.`);
    expect(() => new Container({ name: 42 as never })).toThrow(InvalidContainerConfigError);
  });

  it('rejects provider entries that are neither classes nor providers', () => {
    expect(() => new Container({ providers: [null as never] })).toThrow('providers[0] must be');
    expect(() => new Container({ providers: [{ useValue: 1 } as never] })).toThrow(InvalidContainerConfigError);
  });

  it('requires @Injectable() on classes registered without a contract', () => {
    class Undecorated {}

    expect(() => new Container({ providers: [Undecorated] })).toThrow(MissingInjectableDecoratorError);
    expect(() => new Container().register(Undecorated)).toThrow(
      'Class Undecorated is not decorated with @Injectable().'
    );
  });

  it('rejects values that are not contracts', () => {
    class Thing {}
    const container = new Container();

    expect(() => container.registerSingleton('Thing' as never, Thing)).toThrow(InvalidContractError);
    expect(() => container.registerInstance({ id: 'ctr_1' } as never, 1)).toThrow(InvalidContractError);
    expect(() => container.resolve({} as never)).toThrow(InvalidContractError);
    expect(() => container.canResolve(null as never)).toThrow(InvalidContractError);
    expect(() => container.describe('ctr_1' as never)).toThrow(InvalidContractError);
    expect(() => container.register({ provide: 'Thing', useValue: 1 } as never)).toThrow(InvalidContractError);
  });

  it('rejects malformed providers', () => {
    const ThingC = contract('Thing');
    const container = new Container();

    expect(() => container.register({ provide: ThingC } as never)).toThrow(InvalidProviderError);
    expect(() => container.register({ provide: ThingC, useClass: 'Thing' } as never)).toThrow(InvalidProviderError);
    expect(() => container.registerFactory(ThingC, 'make' as never)).toThrow(InvalidProviderError);
    expect(() => container.register({ provide: ThingC, useFactory: () => 1, deps: 'none' } as never)).toThrow(
      InvalidProviderError
    );
    expect(() => container.registerFactory(ThingC, () => 1, { deps: ['Dep' as never] })).toThrow(
      InvalidContractError
    );
    expect(() =>
      container.register({ provide: ThingC, useClass: class {}, lifetime: 'scoped' } as never)
    ).toThrow(InvalidProviderError);
    expect(container.isRegistered(ThingC.id)).toBe(false);
  });

  it('rejects @Injectable() without a contract', () => {
    expect(() => Injectable({ provide: 'Thing' } as never)).toThrow(InvalidContractError);
  });
});

describe('Container overwrite policies', () => {
  const ClockC = contract<{ source: string }>('Clock');

  it('replaces registrations silently by default', () => {
    const warn = vi.fn();
    const container = new Container({ logger: { warn } })
      .registerInstance(ClockC, { source: 'first' })
      .registerInstance(ClockC, { source: 'second' });

    expect(container.resolve(ClockC).source).toBe('second');
    expect(warn).not.toHaveBeenCalled();
  });

  it('replaces and warns under the warn policy', () => {
    const warn = vi.fn();
    const container = new Container({ name: 'App', overwritePolicy: 'warn', logger: { warn } })
      .registerInstance(ClockC, { source: 'first' })
      .registerInstance(ClockC, { source: 'second' });

    expect(container.resolve(ClockC).source).toBe('second');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      `[linchpin] Contract 'Clock [${ClockC.id}]' re-registered in container 'App'; the previous registration was replaced.`
    );
  });

  it('keeps the first registration under the error policy', () => {
    const container = new Container({ name: 'App', overwritePolicy: 'error' }).registerInstance(ClockC, {
      source: 'first',
    });

    expect(() => container.registerInstance(ClockC, { source: 'second' })).toThrow(DuplicateRegistrationError);
    expect(() => container.registerInstance(ClockC, { source: 'second' })).toThrow(
      `Contract 'Clock [${ClockC.id}]' is already registered in container 'App'.`
    );
    expect(container.resolve(ClockC).source).toBe('first');
  });
});
