export { createContractGroup } from './api/contract-utils.js';
export { optional } from './api/optional.js';

export { Constructs, Inject, Injectable } from './decorators/index.js';
export { StaticInjectionRegistry } from './registry/static-registry.js';

export { Lifetime } from './types/types.js';
export type {
  ClassProvider,
  ConstructionPlan,
  Constructor,
  ContainerConfig,
  ContainerLogger,
  Dependency,
  FactoryFn,
  FactoryProvider,
  InjectableOptions,
  InjectOptions,
  LifetimeType,
  OptionalDependency,
  OverwritePolicy,
  ParameterSpec,
  Provider,
  ServiceDescription,
  ValueProvider,
} from './types/types.js';

export * from './core/token.js';

export { Container, type FactoryOptions } from './core/container.js';
export { selectConstructionPlan } from './core/construction-strategy.js';

// Errors
export {
  CircularDependencyError,
  DuplicateRegistrationError,
  InstanceCreationError,
  InvalidContainerConfigError,
  InvalidContractError,
  InvalidProviderError,
  MissingInjectableDecoratorError,
  NoSuitableConstructorError,
  ServiceNotRegisteredError,
  SingletonPendingError,
} from './errors/errors.js';
