/* ResolverSync
 *
 * Synchronous resolution used by Container. Responsibilities:
 *  - Return values and cached singletons without touching the guard.
 *  - Detect cycles against the resolution chain. The chain is a stack owned
 *    by one top-level resolve() call, pushed and popped around each step.
 *  - Bracket singleton construction with the descriptor's LifetimeGuard and
 *    commit the instance before leaving it.
 *  - Delegate materialization to `Activator.instantiateSync`.
 *
 * Notes:
 *  - A guard already `constructing` on this path means either an async
 *    construction is in flight (SingletonPendingError) or the constructor
 *    re-entered the container for its own contract (a cycle).
 *  - If instantiation throws, the guard returns to `unconstructed` and no
 *    state is kept, which allows retrying.
 */

import { CircularDependencyError, SingletonPendingError } from '../errors/errors.js';
import type { Activator } from './activator.js';
import type { Container } from './container.js';
import { describeDescriptor, hasCachedInstance, type ServiceDescriptor } from './descriptor.js';
import { FLAG_HAS_INSTANCE } from './flags.js';
import type { ContractId } from './token.js';

export class ResolverSync {
  constructor(
    private readonly container: Container,
    private readonly activator: Activator
  ) {}

  /**
   * Resolve a contract synchronously.
   *
   * @param chain - Contracts being resolved above this one (pushed and popped here)
   */
  resolve(contract: ContractId, label: string, chain: ContractId[]): unknown {
    const descriptor = this.container.registry.lookup(contract);
    if (!descriptor) throw this.container.buildNotFoundError(contract, label, chain);

    // Values and materialized singletons
    if (hasCachedInstance(descriptor)) return descriptor.instance;

    if (chain.includes(contract)) throw this.cycleError(chain, contract);

    const guard = descriptor.guard;
    if (guard && guard.state === 'constructing') {
      if (guard.isPending) throw new SingletonPendingError(describeDescriptor(descriptor));
      throw this.cycleError(guard.holder, contract);
    }

    chain.push(contract);
    try {
      if (!guard) return this.activator.instantiateSync(descriptor, chain);

      guard.enter(chain);
      let committed = false;
      try {
        if (!(descriptor.flags & FLAG_HAS_INSTANCE)) this.commit(descriptor, chain);
        committed = true;
        return descriptor.instance;
      } finally {
        guard.leave(committed);
      }
    } finally {
      chain.pop();
    }
  }

  private commit(descriptor: ServiceDescriptor, chain: ContractId[]): void {
    const value = this.activator.instantiateSync(descriptor, chain);
    descriptor.instance = value;
    descriptor.flags |= FLAG_HAS_INSTANCE;
  }

  private cycleError(chain: readonly ContractId[], contract: ContractId): CircularDependencyError {
    const cycle = chain.slice(chain.indexOf(contract)).concat(contract);
    return new CircularDependencyError(cycle.map((id) => this.container.describeContract(id)));
  }
}
