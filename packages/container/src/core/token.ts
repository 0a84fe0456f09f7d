/**
 * Registry key of a contract, `ctr_<n>`. Branded so a plain string is never
 * accepted where a contract id is expected.
 */
export type ContractId = string & { __brand: 'ContractId' };

declare const RESOLVES_TO: unique symbol;

/**
 * Handle for an abstract service surface.
 *
 * Consumers depend on a contract, never on the class that fulfils it. The
 * object itself is the identity: two calls to `contract()` with the same
 * label give two unrelated contracts. `T` exists only at compile time and
 * types what `resolve()` returns.
 */
export interface Contract<T = unknown> {
  readonly kind: 'contract';
  readonly id: ContractId;
  /** Shown in diagnostics next to the id. */
  readonly label: string;
  readonly sym: symbol;
  readonly [RESOLVES_TO]: T;
}

let nextContractNumber = 1;

/**
 * Declare a contract.
 *
 * @example
 * ```typescript
 * interface Clock { now(): number }
 * const ClockC = contract<Clock>('Clock');
 * ```
 */
export function contract<T = unknown>(label = 'Contract'): Contract<T> {
  const id = `ctr_${nextContractNumber++}` as ContractId;
  return Object.freeze({ kind: 'contract', id, label, sym: Symbol(label) }) as Contract<T>;
}

/**
 * Structural check used at the public API boundary.
 */
export function isContract(value: unknown): value is Contract<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'kind' in value &&
    value.kind === 'contract' &&
    'id' in value &&
    typeof value.id === 'string' &&
    'label' in value &&
    typeof value.label === 'string' &&
    'sym' in value &&
    typeof value.sym === 'symbol'
  );
}
