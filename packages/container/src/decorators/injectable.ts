import { isContract } from '../core/token.js';
import { InvalidContractError } from '../errors/errors.js';
import { StaticInjectionRegistry } from '../registry/static-registry.js';
import { Lifetime, type InjectableMetadata, type InjectableOptions } from '../types/types.js';

const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

/**
 * Marks a class as the implementation of a contract.
 *
 * The class can then be listed directly in `ContainerConfig.providers` or
 * passed to `container.register()`. Lifetime defaults to singleton.
 *
 * @example
 * ```typescript
 * const ClockC = contract<Clock>('Clock');
 *
 * @Injectable({ provide: ClockC })
 * class SystemClock implements Clock {
 *   now() { return Date.now(); }
 * }
 *
 * @Injectable({ provide: RequestC, lifetime: Lifetime.Transient })
 * class Request {}
 * ```
 */
export function Injectable(options: InjectableOptions): ClassDecorator {
  if (!options || !isContract(options.provide)) {
    throw new InvalidContractError(options?.provide);
  }

  return (target) => {
    const metadata: InjectableMetadata = {
      contract: options.provide,
      label: options.name ?? options.provide.label,
      lifetime: options.lifetime ?? Lifetime.Singleton,
    };

    // Shared by every container that registers the class.
    if (!isProd) Object.freeze(metadata);

    StaticInjectionRegistry.registerInjectable(target, metadata);
  };
}
