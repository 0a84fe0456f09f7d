import { contract, type Contract } from '../core/token.js';

/**
 * Create multiple contracts at once with a shared label prefix.
 * Useful for organizing the contracts of one feature or module.
 *
 * @example
 * ```typescript
 * const hr = createContractGroup('Hr', {
 *   Repository: null as unknown as EmployeeRepository,
 *   Service: null as unknown as HrService,
 * });
 * // hr.Repository: Contract<EmployeeRepository>, label 'HrRepository'
 * ```
 */
export function createContractGroup<T extends Record<string, unknown>>(
  prefix: string,
  shape: T
): { [K in keyof T]: Contract<T[K]> } {
  const result = {} as { [K in keyof T]: Contract<T[K]> };

  (Object.keys(shape) as Array<keyof T>).forEach((key) => {
    result[key] = contract<T[typeof key]>(`${prefix}${String(key)}`);
  });

  return result;
}
