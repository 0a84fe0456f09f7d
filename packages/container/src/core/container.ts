import { isOptionalDependency } from '../api/optional.js';
import {
  DuplicateRegistrationError,
  InvalidContainerConfigError,
  InvalidContractError,
  InvalidProviderError,
  MissingInjectableDecoratorError,
  ServiceNotRegisteredError,
} from '../errors/errors.js';
import { StaticInjectionRegistry } from '../registry/static-registry.js';
import {
  Lifetime,
  type ClassProvider,
  type Constructor,
  type ContainerConfig,
  type ContainerLogger,
  type Dependency,
  type FactoryFn,
  type FactoryProvider,
  type LifetimeType,
  type OverwritePolicy,
  type ParameterSpec,
  type Provider,
  type ServiceDescription,
  type ValueProvider,
} from '../types/types.js';
import { Activator } from './activator.js';
import { peekPlanFor } from './construction-strategy.js';
import {
  createDescriptor,
  describeDescriptor,
  formatContract,
  hasCachedInstance,
  type Implementation,
} from './descriptor.js';
import { ResolverAsync } from './resolver-async.js';
import { ResolverSync } from './resolver-sync.js';
import { ServiceRegistry } from './service-registry.js';
import { isContract, type Contract, type ContractId } from './token.js';

/**
 * In production contract validation on the resolve path is skipped.
 */
const IS_DEV = process.env.NODE_ENV !== 'production';

const OVERWRITE_POLICIES: readonly OverwritePolicy[] = ['allow', 'warn', 'error'];
const LIFETIMES: readonly string[] = Object.values(Lifetime);

function assertValidContract(contract: unknown): asserts contract is Contract {
  if (!IS_DEV) return;
  if (!isContract(contract)) throw new InvalidContractError(contract);
}

function requireContract(contract: unknown): asserts contract is Contract {
  if (!isContract(contract)) throw new InvalidContractError(contract);
}

/** A function with a prototype object: a class or a plain constructor function. */
function isClass(value: unknown): value is Constructor {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

function isProvider(value: unknown): value is Provider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'provide' in value &&
    ('useClass' in value || 'useValue' in value || 'useFactory' in value)
  );
}

function toParameterSpec(dep: Dependency): ParameterSpec {
  if (isContract(dep)) {
    return { contract: dep.id, label: dep.label, optional: false, fallback: undefined };
  }
  return {
    contract: dep.contract.id,
    label: dep.contract.label,
    optional: true,
    fallback: dep.fallback,
  };
}

/**
 * Options for `registerFactory()`.
 */
export interface FactoryOptions {
  /** Resolved in order and passed to the factory as arguments. */
  deps?: Dependency[];
  /** @default Lifetime.Singleton */
  lifetime?: LifetimeType;
}

/*
 * Container: an explicitly owned registry of contracts plus the resolver
 * that builds object graphs from it.
 *
 * There is no global container. Collaborators receive a container by
 * reference, and independent containers never share registrations or
 * instances. Registration is expected to happen before resolution.
 */
export class Container {
  readonly registry: ServiceRegistry;
  readonly activator: Activator;
  readonly resolverSync: ResolverSync;
  readonly resolverAsync: ResolverAsync;

  private readonly name: string;
  private readonly overwritePolicy: OverwritePolicy;
  private readonly logger: ContainerLogger;
  private readonly instantiateHook?: (contract: string, durationNs: number) => void;

  constructor(config?: ContainerConfig) {
    const cfg = this._validateConfig(config);

    this.registry = new ServiceRegistry();
    this.activator = new Activator(this);
    this.resolverSync = new ResolverSync(this, this.activator);
    this.resolverAsync = new ResolverAsync(this, this.activator);

    this.name = cfg.name ?? 'Container';
    this.overwritePolicy = cfg.overwritePolicy ?? 'allow';
    this.logger = cfg.logger ?? console;
    this.instantiateHook = cfg.onInstantiate;

    const providers = cfg.providers ?? [];
    for (let i = 0; i < providers.length; i++) {
      const item = providers[i];
      if (!isClass(item) && !isProvider(item)) {
        throw new InvalidContainerConfigError(
          `providers[${i}] must be an @Injectable class or a provider object with 'provide' and one of 'useClass'/'useValue'/'useFactory'`
        );
      }
      this.register(item);
    }
  }

  /**
   * Name used in diagnostics and error messages.
   */
  getName(): string {
    return this.name;
  }

  // ----- registration -----

  /**
   * Register a class built anew for every resolution.
   *
   * @example
   * ```typescript
   * container.registerTransient(RequestC, Request);
   * ```
   */
  registerTransient<T>(contract: Contract<T>, concreteType: Constructor<T>): this {
    return this._registerClass(contract, concreteType, Lifetime.Transient);
  }

  /**
   * Register a singleton. A class is built once, on first resolution; any
   * other value is registered as a pre-built instance.
   *
   * Use `registerInstance()` to register a function value.
   *
   * @example
   * ```typescript
   * container.registerSingleton(LoggerC, ConsoleLogger);
   * container.registerSingleton(ConfigC, { retries: 3 });
   * ```
   */
  registerSingleton<T>(contract: Contract<T>, implementation: Constructor<T> | T): this {
    if (isClass(implementation)) {
      return this._registerClass(contract, implementation, Lifetime.Singleton);
    }
    return this.registerInstance(contract, implementation);
  }

  /**
   * Register a pre-built instance. It is returned as-is by every resolution.
   */
  registerInstance<T>(contract: Contract<T>, value: T): this {
    requireContract(contract);
    this._add(contract, { kind: 'value', useValue: value }, Lifetime.Singleton);
    return this;
  }

  /**
   * Register a factory with an explicit, ordered dependency list. Async
   * factories need `resolveAsync()`.
   *
   * @example
   * ```typescript
   * container.registerFactory(
   *   ReportC,
   *   (repo: Repository, clock?: Clock) => new Report(repo, clock ?? systemClock),
   *   { deps: [RepositoryC, optional(ClockC)], lifetime: Lifetime.Transient }
   * );
   * ```
   */
  registerFactory<T>(
    contract: Contract<T>,
    factory: FactoryFn<T>,
    options?: FactoryOptions
  ): this {
    return this.register({
      provide: contract,
      useFactory: factory,
      deps: options?.deps,
      lifetime: options?.lifetime,
    });
  }

  /**
   * Register a provider object or a class decorated with `@Injectable()`.
   */
  register(provider: Constructor | Provider): this {
    if (isClass(provider)) return this._registerInjectable(provider);
    if (!isProvider(provider)) throw new InvalidProviderError(provider);

    requireContract(provider.provide);
    if ('useClass' in provider) return this._registerClassProvider(provider);
    if ('useValue' in provider) return this._registerValueProvider(provider);
    return this._registerFactoryProvider(provider);
  }

  // ----- resolution -----

  /**
   * Resolve a contract synchronously.
   *
   * @throws {ServiceNotRegisteredError} If the contract or a required dependency is not registered
   * @throws {NoSuitableConstructorError} If a class has no usable construction signature
   * @throws {CircularDependencyError} If the dependency chain revisits a contract
   * @throws {InstanceCreationError} If a constructor or factory throws, or a factory is async
   * @throws {SingletonPendingError} If the singleton is being built by `resolveAsync()`
   *
   * @example
   * ```typescript
   * const service = container.resolve(ServiceC);
   * ```
   */
  resolve<T>(contract: Contract<T>): T {
    assertValidContract(contract); // Dev-only
    const descriptor = this.registry.lookup(contract.id);
    if (descriptor !== undefined && hasCachedInstance(descriptor)) return descriptor.instance as T;
    return this.resolverSync.resolve(contract.id, contract.label, []) as T;
  }

  /**
   * Resolve a contract asynchronously. Required for async factories; N
   * concurrent calls for an unbuilt singleton construct it once.
   *
   * @example
   * ```typescript
   * const db = await container.resolveAsync(DatabaseC);
   * ```
   */
  async resolveAsync<T>(contract: Contract<T>): Promise<T> {
    assertValidContract(contract); // Dev-only
    return (await this.resolverAsync.resolve(contract.id, contract.label, [])) as T;
  }

  /**
   * Check, without instantiating anything, that a contract and every
   * required dependency below it are registered, that every class involved
   * has a usable construction signature, and that the graph has no cycle.
   *
   * @throws {InvalidContractError} If `contract` is not a Contract
   */
  canResolve<T>(contract: Contract<T>): boolean {
    requireContract(contract);
    return this._canResolveInternal(contract.id, new Set(), new Set());
  }

  /**
   * Check whether a contract id is registered in this container.
   */
  isRegistered(contract: string): boolean {
    return this.registry.has(contract as ContractId);
  }

  /**
   * Registered contract ids, sorted.
   */
  getRegisteredContracts(): ContractId[] {
    return Array.from(this.registry.contractIds()).sort();
  }

  /**
   * Snapshot of singletons that hold an instance: pre-built values, and
   * classes or factories resolved at least once.
   */
  getSingletons(): Map<ContractId, unknown> {
    const out = new Map<ContractId, unknown>();
    for (const descriptor of this.registry.values()) {
      if (hasCachedInstance(descriptor)) out.set(descriptor.contract, descriptor.instance);
    }
    return out;
  }

  /**
   * Describe the current registration of a contract.
   */
  describe<T>(contract: Contract<T>): ServiceDescription | undefined {
    requireContract(contract);
    const descriptor = this.registry.lookup(contract.id);
    if (!descriptor) return undefined;
    return {
      contract: descriptor.contract,
      label: descriptor.label,
      lifetime: descriptor.lifetime,
      kind: descriptor.implementation.kind,
      constructed: hasCachedInstance(descriptor),
    };
  }

  // ----- internals shared with Activator and the resolvers -----

  /** @internal */
  getInstantiateHook(): ((contract: string, durationNs: number) => void) | undefined {
    return this.instantiateHook;
  }

  /** @internal */
  getLogger(): ContainerLogger {
    return this.logger;
  }

  /** @internal */
  _resolveSync(contract: ContractId, label: string, chain: ContractId[]): unknown {
    return this.resolverSync.resolve(contract, label, chain);
  }

  /** @internal */
  _resolveAsync(contract: ContractId, label: string, chain: readonly ContractId[]): Promise<unknown> {
    return this.resolverAsync.resolve(contract, label, chain);
  }

  /**
   * @internal
   * @returns ServiceNotRegisteredError listing what is registered and the
   *          chain of contracts that led to the missing one
   */
  buildNotFoundError(
    contract: ContractId,
    label: string,
    chain: readonly ContractId[]
  ): ServiceNotRegisteredError {
    const available = this.getRegisteredContracts().map((id) => this.describeContract(id));
    const path = chain.map((id) => this.describeContract(id));
    return new ServiceNotRegisteredError(
      formatContract(label, contract),
      available,
      path.length > 0 ? path : undefined
    );
  }

  /** @internal */
  describeContract(contract: ContractId): string {
    const descriptor = this.registry.lookup(contract);
    return descriptor ? describeDescriptor(descriptor) : contract;
  }

  // ----- registration helpers -----

  private _registerClass(contract: Contract, ctor: Constructor, lifetime: LifetimeType): this {
    requireContract(contract);
    if (!isClass(ctor)) throw new InvalidProviderError({ provide: contract, useClass: ctor });
    this._add(contract, { kind: 'class', useClass: ctor }, lifetime);
    return this;
  }

  /**
   * Register a class decorated with `@Injectable()` under its own contract
   * and lifetime.
   */
  private _registerInjectable(ctor: Constructor): this {
    const metadata = StaticInjectionRegistry.getInjectable(ctor);
    if (!metadata) throw new MissingInjectableDecoratorError(ctor.name || 'AnonymousClass');
    this._add(metadata.contract, { kind: 'class', useClass: ctor }, metadata.lifetime, metadata.label);
    return this;
  }

  /**
   * Lifetime priority: provider.lifetime, then `@Injectable()` metadata,
   * then singleton.
   */
  private _registerClassProvider(provider: ClassProvider): this {
    if (!isClass(provider.useClass)) throw new InvalidProviderError(provider);
    const metadata = StaticInjectionRegistry.getInjectable(provider.useClass);
    const lifetime = provider.lifetime ?? metadata?.lifetime ?? Lifetime.Singleton;
    this._add(provider.provide, { kind: 'class', useClass: provider.useClass }, lifetime);
    return this;
  }

  private _registerValueProvider(provider: ValueProvider): this {
    this._add(provider.provide, { kind: 'value', useValue: provider.useValue }, Lifetime.Singleton);
    return this;
  }

  private _registerFactoryProvider(provider: FactoryProvider): this {
    if (typeof provider.useFactory !== 'function') throw new InvalidProviderError(provider);
    const deps = provider.deps ?? [];
    if (!Array.isArray(deps)) throw new InvalidProviderError(provider);
    for (const dep of deps) {
      if (!isContract(dep) && !isOptionalDependency(dep)) throw new InvalidContractError(dep);
    }

    this._add(
      provider.provide,
      { kind: 'factory', useFactory: provider.useFactory, deps: Object.freeze(deps.map(toParameterSpec)) },
      provider.lifetime ?? Lifetime.Singleton
    );
    return this;
  }

  /**
   * Create the descriptor and apply the overwrite policy.
   */
  private _add(
    contract: Contract,
    implementation: Implementation,
    lifetime: LifetimeType,
    label: string = contract.label
  ): void {
    if (!LIFETIMES.includes(lifetime)) {
      throw new InvalidProviderError({ provide: contract, lifetime });
    }

    const existing = this.registry.lookup(contract.id);
    if (existing && this.overwritePolicy === 'error') {
      throw new DuplicateRegistrationError(describeDescriptor(existing), this.name);
    }

    this.registry.register(createDescriptor(contract.id, label, implementation, lifetime));

    if (existing && this.overwritePolicy === 'warn') {
      this.logger.warn(
        `[linchpin] Contract '${describeDescriptor(existing)}' re-registered in container '${this.name}'; the previous registration was replaced.`
      );
    }
  }

  private _validateConfig(config?: ContainerConfig): ContainerConfig {
    if (config === undefined) return {};
    if (typeof config !== 'object' || config === null) {
      throw new InvalidContainerConfigError('config must be an object.');
    }

    const { name, providers, overwritePolicy, onInstantiate, logger } = config;
    if (name !== undefined && typeof name !== 'string') {
      throw new InvalidContainerConfigError(`'name' must be a string.`);
    }
    if (providers !== undefined && !Array.isArray(providers)) {
      throw new InvalidContainerConfigError(`'providers' must be an array.`);
    }
    if (overwritePolicy !== undefined && !OVERWRITE_POLICIES.includes(overwritePolicy)) {
      throw new InvalidContainerConfigError(
        `'overwritePolicy' must be one of ${OVERWRITE_POLICIES.map((p) => `'${p}'`).join(', ')}.`
      );
    }
    if (onInstantiate !== undefined && typeof onInstantiate !== 'function') {
      throw new InvalidContainerConfigError(`'onInstantiate' must be a function.`);
    }
    if (logger !== undefined && typeof logger?.warn !== 'function') {
      throw new InvalidContainerConfigError(`'logger' must provide a warn() method.`);
    }
    return config;
  }

  /**
   * Depth-first walk over construction plans. `path` holds the contracts on
   * the current branch; `safe` those already proven resolvable.
   */
  private _canResolveInternal(
    contract: ContractId,
    path: Set<ContractId>,
    safe: Set<ContractId>
  ): boolean {
    if (safe.has(contract)) return true;
    if (path.has(contract)) return false;

    const descriptor = this.registry.lookup(contract);
    if (!descriptor) return false;
    if (hasCachedInstance(descriptor)) return true;

    const plan = peekPlanFor(descriptor);
    if (!plan) return false;

    path.add(contract);
    try {
      for (const param of plan.parameters) {
        if (param.optional && !this.registry.has(param.contract)) continue;
        if (!this._canResolveInternal(param.contract, path, safe)) return false;
      }
    } finally {
      path.delete(contract);
    }
    safe.add(contract);
    return true;
  }
}
