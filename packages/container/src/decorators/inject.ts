import { isContract, type Contract } from '../core/token.js';
import { InvalidContractError } from '../errors/errors.js';
import { CONSTRUCTOR_KEY, StaticInjectionRegistry } from '../registry/static-registry.js';
import type { InjectOptions, ParameterSpec } from '../types/types.js';

/**
 * Declares the contract injected into one parameter of a construction
 * signature: a constructor, or a static method marked with `@Constructs()`.
 *
 * There is no runtime type reflection, so a signature is usable only when
 * every one of its parameters is decorated.
 *
 * @example
 * ```typescript
 * class ReportService {
 *   constructor(
 *     @Inject(RepositoryC) private readonly repo: Repository,
 *     @Inject(ClockC, { optional: true }) private readonly clock: Clock = systemClock
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(contract: Contract<T>, options?: InjectOptions): ParameterDecorator {
  if (!isContract(contract)) throw new InvalidContractError(contract);

  const spec: ParameterSpec = Object.freeze({
    contract: contract.id,
    label: contract.label,
    optional: options?.optional ?? false,
    fallback: options?.fallback,
  });

  return (target, propertyKey, parameterIndex) => {
    // Instance methods receive the prototype, which is not a construction signature.
    if (typeof target !== 'function') {
      throw new Error(
        `@Inject applies to constructor or static @Constructs() parameters, not to instance method '${String(propertyKey)}'.`
      );
    }
    StaticInjectionRegistry.registerParameter(
      target,
      propertyKey ?? CONSTRUCTOR_KEY,
      parameterIndex,
      spec
    );
  };
}
