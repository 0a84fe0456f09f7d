import { describe, expect, it } from 'vitest';

import {
  CircularDependencyError,
  DuplicateRegistrationError,
  InstanceCreationError,
  InvalidContainerConfigError,
  InvalidContractError,
  InvalidProviderError,
  isContainerError,
  MissingInjectableDecoratorError,
  NoSuitableConstructorError,
  ServiceNotRegisteredError,
  SingletonPendingError,
} from '../src/errors/errors.js';

describe('error classes', () => {
  it('keeps structured fields and names', () => {
    const circular = new CircularDependencyError(['A', 'B', 'A']);
    expect(circular.cycle).toEqual(['A', 'B', 'A']);
    expect(circular.name).toBe('CircularDependencyError');
    expect(circular.message).toContain('A → B → A');

    const notFound = new ServiceNotRegisteredError('Mailer [ctr_9]', ['Alpha', 'Beta'], ['Foo', 'Bar']);
    expect(notFound.contract).toBe('Mailer [ctr_9]');
    expect(notFound.availableContracts).toEqual(['Alpha', 'Beta']);
    expect(notFound.dependencyChain).toEqual(['Foo', 'Bar']);
    expect(notFound.message).toContain('Foo → Bar → Mailer [ctr_9]');
    expect(notFound.message).toContain('  - Alpha');

    const many = new ServiceNotRegisteredError('Huge', new Array(11).fill('X'));
    expect(many.message).toContain('11 contracts are registered.');
    expect(many.dependencyChain).toBeUndefined();

    const noCtor = new NoSuitableConstructorError('Report', ['Report.constructor: parameter 1 missing @Inject']);
    expect(noCtor.className).toBe('Report');
    expect(noCtor.reasons).toHaveLength(1);
    expect(noCtor.message).toContain('  - Report.constructor: parameter 1 missing @Inject');

    const pending = new SingletonPendingError('Db [ctr_2]');
    expect(pending.contract).toBe('Db [ctr_2]');

    const duplicate = new DuplicateRegistrationError('Clock [ctr_3]', 'App');
    expect(duplicate.containerName).toBe('App');
    expect(duplicate.message).toContain("already registered in container 'App'");

    const invalidContract = new InvalidContractError('not-a-contract');
    expect(invalidContract.contract).toBe('not-a-contract');
    expect(invalidContract.message).toContain('"not-a-contract"');

    const invalidProvider = new InvalidProviderError({ foo: 'bar' });
    expect(invalidProvider.provider).toEqual({ foo: 'bar' });

    const missing = new MissingInjectableDecoratorError('Plain');
    expect(missing.message).toContain('Class Plain is not decorated with @Injectable().');

    const config = new InvalidContainerConfigError('bad');
    expect(config.reason).toBe('bad');
    expect(config.message).toContain('Invalid container configuration: bad');
  });

  it('wraps creation failures with the original cause', () => {
    const cause = new Error('boom');
    const err = new InstanceCreationError('Service [ctr_1]', cause);

    expect(err.contract).toBe('Service [ctr_1]');
    expect(err.cause).toBe(cause);
    expect(err.message).toContain("Creating 'Service [ctr_1]' failed: boom");

    const fromString = new InstanceCreationError('Service [ctr_1]', 'plain failure');
    expect(fromString.message).toContain('failed: plain failure');
  });

  it('describes values that cannot be serialised', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const err = new InvalidProviderError(circular);
    expect(err.message).toContain('[object Object]');
  });

  it('tells container errors from user errors', () => {
    expect(isContainerError(new CircularDependencyError(['A', 'A']))).toBe(true);
    expect(isContainerError(new SingletonPendingError('A'))).toBe(true);
    expect(isContainerError(new Error('user'))).toBe(false);
    expect(isContainerError('text')).toBe(false);
  });
});
