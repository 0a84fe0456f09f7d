import {
  Lifetime,
  lifetimeToFlag,
  type Constructor,
  type ConstructionPlan,
  type FactoryFn,
  type LifetimeType,
  type ParameterSpec,
} from '../types/types.js';
import {
  FLAG_HAS_INSTANCE,
  FLAG_HAS_NO_DEPS,
  LIFETIME_MASK,
  LIFETIME_SINGLETON,
} from './flags.js';
import { LifetimeGuard } from './lifetime-guard.js';
import type { ContractId } from './token.js';

/**
 * What a descriptor builds from. Exactly one variant per registration.
 */
export type Implementation =
  | { readonly kind: 'class'; readonly useClass: Constructor }
  | { readonly kind: 'value'; readonly useValue: unknown }
  | {
      readonly kind: 'factory';
      readonly useFactory: FactoryFn;
      readonly deps: readonly ParameterSpec[];
    };

/**
 * A registry record binding one contract to an implementation and a lifetime.
 *
 * Notes on fields:
 *  - implementation, lifetime: fixed at registration
 *  - instance: cached value; set at registration for values, at most once
 *    for singletons, never for transients. `FLAG_HAS_INSTANCE` tells an
 *    unset slot from a cached `undefined`.
 *  - guard: present only on singletons that still have to be built
 *  - plan: memoised construction plan (see construction-strategy.ts)
 *  - flags: lifetime bit + state bits (see flags.ts)
 */
export interface ServiceDescriptor {
  readonly contract: ContractId;
  readonly label: string;
  readonly implementation: Implementation;
  readonly lifetime: LifetimeType;
  readonly guard?: LifetimeGuard;
  instance: unknown;
  plan?: ConstructionPlan;
  flags: number;
}

export function createDescriptor(
  contract: ContractId,
  label: string,
  implementation: Implementation,
  lifetime: LifetimeType
): ServiceDescriptor {
  if (implementation.kind === 'value') {
    return {
      contract,
      label,
      implementation,
      lifetime: Lifetime.Singleton,
      instance: implementation.useValue,
      flags: LIFETIME_SINGLETON | FLAG_HAS_INSTANCE | FLAG_HAS_NO_DEPS,
    };
  }

  const lifetimeFlag = lifetimeToFlag(lifetime);
  const noDeps = implementation.kind === 'factory' && implementation.deps.length === 0;

  return {
    contract,
    label,
    implementation,
    lifetime,
    guard: lifetimeFlag === LIFETIME_SINGLETON ? new LifetimeGuard() : undefined,
    instance: undefined,
    flags: lifetimeFlag | (noDeps ? FLAG_HAS_NO_DEPS : 0),
  };
}

/** Singleton (or value) whose instance slot is filled. */
export function hasCachedInstance(descriptor: ServiceDescriptor): boolean {
  return (
    (descriptor.flags & LIFETIME_MASK) === LIFETIME_SINGLETON &&
    (descriptor.flags & FLAG_HAS_INSTANCE) !== 0
  );
}

/** `Label [ctr_n]`, the form contracts take in diagnostics. */
export function describeDescriptor(descriptor: ServiceDescriptor): string {
  return formatContract(descriptor.label, descriptor.contract);
}

export function formatContract(label: string, id: ContractId): string {
  return `${label} [${id}]`;
}
