/* Activator
 *
 * Materializes a descriptor into a runtime value: picks its construction
 * plan, resolves every parameter through the container, then invokes the
 * constructor, static factory or factory.
 *
 * Goals / guarantees
 *  - Keep instantiation separate from lifetime and caching policy, which
 *    live in the resolvers.
 *  - Only what the invoked code itself throws becomes InstanceCreationError.
 *    Container errors (a missing registration, a cycle, a bad signature)
 *    reach the caller unwrapped, so the deepest actionable cause is the one
 *    reported.
 *  - The sync path never returns a promise: an async factory fails with
 *    InstanceCreationError and its discarded rejection is logged.
 */

import { InstanceCreationError, isContainerError } from '../errors/errors.js';
import type { ConstructionPlan, ParameterSpec } from '../types/types.js';
import { planFor } from './construction-strategy.js';
import type { Container } from './container.js';
import { describeDescriptor, type ServiceDescriptor } from './descriptor.js';
import { FLAG_HAS_NO_DEPS } from './flags.js';
import type { ContractId } from './token.js';

const EMPTY_ARGS: unknown[] = [];

/**
 * High-resolution timer. Prefers performance.now() when available.
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

const toNs = (ms: number) => Math.round(ms * 1_000_000);

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class Activator {
  constructor(private readonly container: Container) {}

  private instrumentSync<T>(contract: ContractId, execute: () => T): T {
    const hook = this.container.getInstantiateHook();
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(contract, toNs(nowMs() - start));
    }
  }

  private async instrumentAsync<T>(contract: ContractId, execute: () => Promise<T> | T): Promise<T> {
    const hook = this.container.getInstantiateHook();
    if (!hook) return await execute();

    const start = nowMs();
    try {
      return await execute();
    } finally {
      hook(contract, toNs(nowMs() - start));
    }
  }

  /**
   * Synchronous instantiation.
   *
   * @param chain - Resolution chain ending with the descriptor's own contract
   */
  instantiateSync(descriptor: ServiceDescriptor, chain: ContractId[]): unknown {
    const plan = planFor(descriptor);
    const args =
      descriptor.flags & FLAG_HAS_NO_DEPS
        ? EMPTY_ARGS
        : plan.parameters.map((p) => this.resolveParameterSync(p, chain));

    const result = this.invoke(descriptor, plan, args);

    if (isPromiseLike(result)) {
      const name = describeDescriptor(descriptor);
      void result.then(undefined, (err: unknown) =>
        this.container.getLogger().warn(
          `[linchpin] Async factory for '${name}' rejected after resolve() discarded it.`,
          err
        )
      );
      throw new InstanceCreationError(name, new Error('Async factory requires resolveAsync()'));
    }
    return result;
  }

  /**
   * Asynchronous instantiation. Parameters resolve concurrently; each branch
   * extends its own copy of the chain.
   *
   * @param chain - Resolution chain ending with the descriptor's own contract
   */
  async instantiateAsync(
    descriptor: ServiceDescriptor,
    chain: readonly ContractId[]
  ): Promise<unknown> {
    const plan = planFor(descriptor);
    const args =
      descriptor.flags & FLAG_HAS_NO_DEPS
        ? EMPTY_ARGS
        : await Promise.all(plan.parameters.map((p) => this.resolveParameterAsync(p, chain)));

    try {
      return await this.instrumentAsync(descriptor.contract, () => plan.invoke(args));
    } catch (e) {
      throw this.wrap(descriptor, e);
    }
  }

  private invoke(descriptor: ServiceDescriptor, plan: ConstructionPlan, args: unknown[]): unknown {
    try {
      return this.instrumentSync(descriptor.contract, () => plan.invoke(args));
    } catch (e) {
      throw this.wrap(descriptor, e);
    }
  }

  private wrap(descriptor: ServiceDescriptor, e: unknown): unknown {
    if (isContainerError(e)) return e;
    return new InstanceCreationError(describeDescriptor(descriptor), e);
  }

  /**
   * An optional parameter binds its fallback only when its contract is not
   * registered. Every other failure propagates.
   */
  private resolveParameterSync(param: ParameterSpec, chain: ContractId[]): unknown {
    if (param.optional && !this.container.registry.has(param.contract)) return param.fallback;
    return this.container._resolveSync(param.contract, param.label, chain);
  }

  private resolveParameterAsync(param: ParameterSpec, chain: readonly ContractId[]): Promise<unknown> {
    if (param.optional && !this.container.registry.has(param.contract)) {
      return Promise.resolve(param.fallback);
    }
    return this.container._resolveAsync(param.contract, param.label, chain);
  }
}
