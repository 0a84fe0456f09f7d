import { isContract, type Contract } from '../core/token.js';
import type { OptionalDependency } from '../types/types.js';

/**
 * Mark a factory dependency optional. When its contract is not registered
 * the factory receives `fallback`, or `undefined` so a default parameter
 * applies.
 *
 * @example
 * ```typescript
 * container.registerFactory(
 *   MailerC,
 *   (transport: Transport, retries = 3) => new Mailer(transport, retries),
 *   { deps: [TransportC, optional(RetriesC)] }
 * );
 * ```
 */
export function optional<T>(contract: Contract<T>, fallback?: T): OptionalDependency<T> {
  return Object.freeze({ kind: 'optional', contract, fallback });
}

export function isOptionalDependency(value: unknown): value is OptionalDependency {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'optional' &&
    'contract' in value &&
    isContract(value.contract)
  );
}
