import type { ServiceDescriptor } from './descriptor.js';
import type { ContractId } from './token.js';

/**
 * Contract → descriptor map owned by one container.
 *
 * A contract maps to exactly one descriptor at any time. Registering a
 * contract again replaces its descriptor; the replaced descriptor's cached
 * instance is not carried over. Nothing is ever removed individually.
 *
 * Registration happens before resolution. Resolutions only read the map,
 * so interleaved async resolutions share it without coordination.
 */
export class ServiceRegistry {
  private readonly descriptors = new Map<ContractId, ServiceDescriptor>();

  get size(): number {
    return this.descriptors.size;
  }

  /**
   * Insert or replace the descriptor for its contract.
   *
   * @returns The replaced descriptor, if any
   */
  register(descriptor: ServiceDescriptor): ServiceDescriptor | undefined {
    const previous = this.descriptors.get(descriptor.contract);
    this.descriptors.set(descriptor.contract, descriptor);
    return previous;
  }

  lookup(contract: ContractId): ServiceDescriptor | undefined {
    return this.descriptors.get(contract);
  }

  has(contract: ContractId): boolean {
    return this.descriptors.has(contract);
  }

  *contractIds(): IterableIterator<ContractId> {
    yield* this.descriptors.keys();
  }

  *values(): IterableIterator<ServiceDescriptor> {
    yield* this.descriptors.values();
  }
}
