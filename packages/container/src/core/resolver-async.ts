/* ResolverAsync
 *
 * Asynchronous resolution used by Container. Responsibilities:
 *  - Collapse concurrent singleton creation through the descriptor's
 *    LifetimeGuard so N callers trigger one construction and receive one
 *    instance.
 *  - Detect cycles against the resolution chain. Dependencies resolve
 *    concurrently, so every branch carries its own immutable copy.
 *  - Refuse to wait on a construction in flight when that construction
 *    needs a singleton the caller itself is holding: both would wait on
 *    each other forever. This is reported as a cycle.
 *  - Delegate materialization to `Activator.instantiateAsync`, which
 *    supports async factories.
 *
 * Notes:
 *  - On success the instance is committed before the guard settles; on
 *    failure the guard resets so callers can retry. Errors reach every
 *    caller that was waiting.
 */

import { CircularDependencyError } from '../errors/errors.js';
import type { Activator } from './activator.js';
import { peekPlanFor } from './construction-strategy.js';
import type { Container } from './container.js';
import { hasCachedInstance } from './descriptor.js';
import { FLAG_HAS_INSTANCE } from './flags.js';
import type { ContractId } from './token.js';

export class ResolverAsync {
  constructor(
    private readonly container: Container,
    private readonly activator: Activator
  ) {}

  /**
   * Resolve a contract asynchronously.
   *
   * @param chain - Contracts being resolved above this one (never mutated)
   */
  async resolve(contract: ContractId, label: string, chain: readonly ContractId[]): Promise<unknown> {
    const descriptor = this.container.registry.lookup(contract);
    if (!descriptor) throw this.container.buildNotFoundError(contract, label, chain);

    if (hasCachedInstance(descriptor)) return descriptor.instance;

    if (chain.includes(contract)) throw this.cycleError(chain, contract);

    const path = chain.concat(contract);
    const guard = descriptor.guard;
    if (!guard) return this.activator.instantiateAsync(descriptor, path);

    if (guard.state === 'constructing') {
      // A synchronous constructor called back into the container.
      if (!guard.isPending) throw this.cycleError(guard.holder, contract);

      const deadlock = this.findWaitCycle(contract, chain);
      if (deadlock) {
        throw new CircularDependencyError(deadlock.map((id) => this.container.describeContract(id)));
      }
    }

    return guard.acquire(path, async () => {
      if (descriptor.flags & FLAG_HAS_INSTANCE) return descriptor.instance;
      const value = await this.activator.instantiateAsync(descriptor, path);
      descriptor.instance = value;
      descriptor.flags |= FLAG_HAS_INSTANCE;
      return value;
    });
  }

  /**
   * Walk the static dependency graph from a contract under construction.
   * Reaching a singleton that `chain` is itself constructing means waiting
   * would never finish.
   *
   * @returns The cycle, starting and ending at the held contract
   */
  private findWaitCycle(start: ContractId, chain: readonly ContractId[]): ContractId[] | undefined {
    const held = new Map<ContractId, number>();
    chain.forEach((id, index) => {
      if (this.container.registry.lookup(id)?.guard?.state === 'constructing') held.set(id, index);
    });
    if (held.size === 0) return undefined;

    const visited = new Set<ContractId>();
    const walk = (id: ContractId, route: ContractId[]): ContractId[] | undefined => {
      const hit = held.get(id);
      if (hit !== undefined) return chain.slice(hit).concat(route, id);
      if (visited.has(id)) return undefined;
      visited.add(id);

      const descriptor = this.container.registry.lookup(id);
      if (!descriptor || hasCachedInstance(descriptor)) return undefined;
      const plan = peekPlanFor(descriptor);
      if (!plan) return undefined;

      const next = route.concat(id);
      for (const param of plan.parameters) {
        if (param.optional && !this.container.registry.has(param.contract)) continue;
        const found = walk(param.contract, next);
        if (found) return found;
      }
      return undefined;
    };

    return walk(start, []);
  }

  private cycleError(chain: readonly ContractId[], contract: ContractId): CircularDependencyError {
    const cycle = chain.slice(chain.indexOf(contract)).concat(contract);
    return new CircularDependencyError(cycle.map((id) => this.container.describeContract(id)));
  }
}
