import type { Contract, ContractId } from '../core/token.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Factory signature accepted by factory registrations. Receives the resolved
 * dependencies in the order of its `deps` list.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type FactoryFn<T = unknown> = (...deps: any[]) => T | Promise<T>;

/**
 * Supported lifetimes for registered services.
 *
 *   - **Singleton**: at most one instance per descriptor, built on first use
 *   - **Transient**: a new instance for every resolution, never cached
 *
 * String values at the API boundary; converted to a bit flag at registration
 * time (see `core/flags.ts`).
 */
export const Lifetime = {
  Singleton: 'singleton',
  Transient: 'transient',
} as const;

export type LifetimeType = (typeof Lifetime)[keyof typeof Lifetime];
export type Lifetime = LifetimeType;

/**
 * Convert a lifetime string to its bit flag.
 * @internal
 */
export function lifetimeToFlag(lifetime: LifetimeType): number {
  return lifetime === Lifetime.Transient ? 0b1 : 0b0;
}

/**
 * Options accepted by the `@Injectable()` class decorator.
 */
export interface InjectableOptions {
  provide: Contract;
  lifetime?: LifetimeType;
  name?: string;
}

/**
 * Frozen metadata produced by `@Injectable()`.
 */
export interface InjectableMetadata {
  contract: Contract;
  label: string;
  lifetime: LifetimeType;
}

/**
 * Options accepted by the `@Inject()` parameter decorator.
 */
export interface InjectOptions {
  /** Bind the fallback instead of failing when the contract is not registered. */
  optional?: boolean;
  /**
   * Value passed for an optional parameter whose contract is not registered.
   * When omitted, `undefined` is passed so a JavaScript default parameter applies.
   */
  fallback?: unknown;
}

/**
 * One parameter of a construction plan.
 */
export interface ParameterSpec {
  readonly contract: ContractId;
  readonly label: string;
  readonly optional: boolean;
  /** Bound when `optional` and the contract is not registered. */
  readonly fallback: unknown;
}

/**
 * Ordered dependencies of a concrete type plus the call that builds it.
 */
export interface ConstructionPlan {
  /** Human-readable signature name, e.g. `ReportBuilder.constructor`. */
  readonly signature: string;
  readonly parameters: readonly ParameterSpec[];
  readonly invoke: (args: unknown[]) => unknown;
}

/**
 * Factory dependency that binds a fallback when its contract is not registered.
 * Create with {@link optional}.
 */
export interface OptionalDependency<T = unknown> {
  readonly kind: 'optional';
  readonly contract: Contract<T>;
  readonly fallback: T | undefined;
}

export type Dependency = Contract | OptionalDependency;

/**
 * Register a class constructor.
 *
 * @example
 * ```typescript
 * { provide: RepositoryC, useClass: InMemoryRepository, lifetime: Lifetime.Transient }
 * ```
 */
export interface ClassProvider {
  provide: Contract;
  useClass: Constructor;
  lifetime?: LifetimeType;
}

/**
 * Register a pre-built instance.
 *
 * @example
 * ```typescript
 * { provide: ConfigC, useValue: { retries: 3 } }
 * ```
 */
export interface ValueProvider {
  provide: Contract;
  useValue: unknown;
}

/**
 * Register a factory function with an explicit dependency list.
 *
 * @example
 * ```typescript
 * {
 *   provide: LoggerC,
 *   useFactory: (config: Config) => new Logger(config.level),
 *   deps: [ConfigC],
 * }
 * ```
 */
export interface FactoryProvider {
  provide: Contract;
  useFactory: FactoryFn;
  deps?: Dependency[];
  lifetime?: LifetimeType;
}

export type Provider = ClassProvider | ValueProvider | FactoryProvider;

/**
 * What happens when a contract is registered a second time.
 *   - 'allow': replace the previous registration silently (default)
 *   - 'warn': replace it and log a warning
 *   - 'error': throw DuplicateRegistrationError
 */
export type OverwritePolicy = 'allow' | 'warn' | 'error';

/**
 * Sink for container diagnostics. `console` satisfies it.
 */
export interface ContainerLogger {
  warn(message: string, ...meta: unknown[]): void;
}

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerConfig {
  /**
   * Optional name for diagnostics and error messages.
   *
   * @default 'Container'
   */
  name?: string;

  /**
   * Initial registrations, processed in order. Each item is either a class
   * decorated with @Injectable() or a provider object.
   */
  providers?: Array<Constructor | Provider>;

  /**
   * Policy for a contract registered more than once.
   *
   * @default 'allow'
   */
  overwritePolicy?: OverwritePolicy;

  /**
   * Optional hook invoked after every constructor or factory invocation.
   *
   * Receives the contract id and the invocation duration in nanoseconds.
   */
  onInstantiate?: (contract: string, durationNs: number) => void;

  /**
   * Diagnostics sink.
   *
   * @default console
   */
  logger?: ContainerLogger;
}

/**
 * Snapshot returned by `Container.describe()`.
 */
export interface ServiceDescription {
  contract: ContractId;
  label: string;
  lifetime: LifetimeType;
  kind: 'class' | 'value' | 'factory';
  constructed: boolean;
}
