const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeValue = (value: unknown): string => {
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
};

/**
 * No registration exists for the requested contract.
 */
export class ServiceNotRegisteredError extends Error {
  constructor(
    public contract: string,
    public availableContracts: string[],
    public dependencyChain?: string[]
  ) {
    const parts: string[] = [`Service '${contract}' is not registered.`, ''];

    if (dependencyChain && dependencyChain.length > 0) {
      const chain = dependencyChain.join(' → ');
      parts.push('Dependency chain:', `  ${chain} → ${contract}`, '');
    }

    if (availableContracts.length > 0 && availableContracts.length <= 10) {
      parts.push('Registered contracts:');
      availableContracts.forEach((c) => parts.push(`  - ${c}`));
      parts.push('');
    } else if (availableContracts.length > 10) {
      parts.push(`${availableContracts.length} contracts are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register '${contract}' with registerSingleton(), registerTransient() or registerFactory()`);
    parts.push(`  2. Or mark the consuming parameter @Inject(contract, { optional: true })`, '');

    super(format(`Service '${contract}' is not registered.`, parts));
    this.name = 'ServiceNotRegisteredError';
  }
}

/**
 * The construction strategy found no usable signature on a concrete type.
 */
export class NoSuitableConstructorError extends Error {
  constructor(
    public className: string,
    public reasons: string[]
  ) {
    const dev = [
      `No suitable construction signature for ${className}.`,
      '',
      ...(reasons.length > 0
        ? ['Rejected signatures:', ...reasons.map((r) => `  - ${r}`)]
        : [`${className} exposes no construction signature.`]),
      '',
      'Fix:',
      `  - Decorate every constructor parameter with @Inject(SomeContract)`,
      `  - Or add a @Constructs() static method whose parameters are all decorated`,
      `  - Or register ${className} through registerFactory() with explicit deps`,
    ];
    super(format(`No suitable construction signature for ${className}.`, dev));
    this.name = 'NoSuitableConstructorError';
  }
}

/**
 * A dependency chain revisits a contract that is already being resolved.
 */
export class CircularDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Circular dependency detected: ${cycleStr}`, [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other services.`,
      '',
      'Solutions:',
      `  1. Extract the shared logic into a separate service`,
      `  2. Use events or a mediator instead of direct dependencies`,
      `  3. Mark one side @Inject(contract, { optional: true }) and wire it later`,
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

/**
 * The constructor or factory of a service threw. The original error is kept
 * as `cause`; nothing produced by the failed attempt is cached.
 */
export class InstanceCreationError extends Error {
  constructor(
    public contract: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const dev = [
      `Creating '${contract}' failed: ${reason}`,
      '',
      `The constructor or factory for '${contract}' threw. See 'cause' for details.`,
    ];
    super(format(`Creating '${contract}' failed.`, dev), { cause });
    this.name = 'InstanceCreationError';
  }
}

/**
 * Synchronous resolution reached a singleton whose asynchronous construction
 * has not finished yet.
 */
export class SingletonPendingError extends Error {
  constructor(public contract: string) {
    const dev = [
      `Singleton '${contract}' is still being constructed asynchronously.`,
      '',
      `Use resolveAsync() to wait for it, or resolve it before calling resolve().`,
    ];
    super(format(`Singleton '${contract}' is still being constructed.`, dev));
    this.name = 'SingletonPendingError';
  }
}

export class DuplicateRegistrationError extends Error {
  constructor(
    public contract: string,
    public containerName: string
  ) {
    const dev = [
      'Duplicate registration',
      '',
      `Contract '${contract}' is already registered in container '${containerName}'.`,
      `Set overwritePolicy: 'allow' to replace registrations instead.`,
    ];
    super(format(`Contract '${contract}' already registered in '${containerName}'.`, dev));
    this.name = 'DuplicateRegistrationError';
  }
}

export class InvalidContractError extends Error {
  constructor(public contract: unknown) {
    const dev = [
      'Invalid contract parameter',
      '',
      `Expected a Contract created with contract<T>().`,
      '',
      'Received:',
      `  ${describeValue(contract)}`,
      '',
      'Valid usage:',
      `  const LoggerC = contract<Logger>('Logger');`,
    ];
    super(format('Invalid contract parameter.', dev));
    this.name = 'InvalidContractError';
  }
}

export class InvalidProviderError extends Error {
  constructor(public provider: unknown) {
    const dev = [
      'Invalid provider configuration',
      '',
      'Valid provider shapes:',
      `  - A class decorated with @Injectable()`,
      `  - An object with 'provide' and 'useClass'`,
      `  - An object with 'provide' and 'useValue'`,
      `  - An object with 'provide' and 'useFactory'`,
      '',
      'Received:',
      describeValue(provider),
    ];
    super(format('Invalid provider configuration.', dev));
    this.name = 'InvalidProviderError';
  }
}

export class MissingInjectableDecoratorError extends Error {
  constructor(public className: string) {
    const dev = [
      'Missing @Injectable decorator',
      '',
      `Class ${className} is not decorated with @Injectable().`,
      `Decorate it with @Injectable({ provide }) or register it under an explicit contract.`,
    ];
    super(format(`Class ${className} must be decorated with @Injectable().`, dev));
    this.name = 'MissingInjectableDecoratorError';
  }
}

export class InvalidContainerConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid container configuration', '', `Invalid container configuration: ${reason}`];
    super(format(`Invalid container configuration: ${reason}`, dev));
    this.name = 'InvalidContainerConfigError';
  }
}

const CONTAINER_ERRORS = [
  ServiceNotRegisteredError,
  NoSuitableConstructorError,
  CircularDependencyError,
  InstanceCreationError,
  SingletonPendingError,
  DuplicateRegistrationError,
  InvalidContractError,
  InvalidProviderError,
  MissingInjectableDecoratorError,
  InvalidContainerConfigError,
];

/**
 * True for errors raised by the container itself rather than by user code.
 */
export function isContainerError(e: unknown): boolean {
  return CONTAINER_ERRORS.some((ErrorClass) => e instanceof ErrorClass);
}
