import { StaticInjectionRegistry } from '../registry/static-registry.js';

/**
 * Marks a static method as an alternative construction signature. The method
 * receives its `@Inject` parameters and returns the instance.
 *
 * When a class offers several usable signatures the one with the most
 * parameters wins; ties go to the constructor, then to declaration order.
 *
 * @example
 * ```typescript
 * class HttpClient {
 *   constructor(readonly baseUrl: string, readonly retries: number) {}
 *
 *   @Constructs()
 *   static fromConfig(@Inject(ConfigC) config: Config) {
 *     return new HttpClient(config.baseUrl, config.retries);
 *   }
 * }
 * ```
 */
export function Constructs(): MethodDecorator {
  return (target, propertyKey, descriptor) => {
    const fn: unknown = descriptor.value;
    if (typeof target !== 'function' || typeof fn !== 'function') {
      throw new Error(`@Constructs applies to static methods only; '${String(propertyKey)}' is not one.`);
    }
    StaticInjectionRegistry.registerFactory(
      target,
      propertyKey,
      (...args: unknown[]): unknown => Reflect.apply(fn, target, args),
      fn.length
    );
  };
}
