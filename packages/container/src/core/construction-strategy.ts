/* Construction strategy
 *
 * Turns a concrete class into a ConstructionPlan: the ordered contracts its
 * chosen signature needs plus the call that builds it.
 *
 * Candidates, in declaration order:
 *  - the constructor, with parameters recorded by @Inject. A class that
 *    records none inherits the nearest decorated ancestor's parameters.
 *  - every static method marked @Constructs()
 *
 * A candidate's arity is max(function length, highest decorated index + 1).
 * It is usable when every index below its arity is decorated. Among usable
 * candidates the greatest arity wins; ties keep declaration order.
 */

import { NoSuitableConstructorError } from '../errors/errors.js';
import {
  StaticInjectionRegistry,
  type StaticClassDefinition,
} from '../registry/static-registry.js';
import type { ConstructionPlan, Constructor, ParameterSpec } from '../types/types.js';
import type { ServiceDescriptor } from './descriptor.js';
import { FLAG_HAS_NO_DEPS } from './flags.js';

type Candidate = {
  signature: string;
  arity: number;
  parameters: readonly (ParameterSpec | undefined)[];
  invoke: (args: unknown[]) => unknown;
};

type Selection =
  | { ok: true; plan: ConstructionPlan }
  | { ok: false; reasons: string[] };

const EMPTY_PARAMS: readonly ParameterSpec[] = Object.freeze([]);

/**
 * Select the construction plan for a class.
 *
 * @throws NoSuitableConstructorError when no candidate is usable
 */
export function selectConstructionPlan(ctor: Constructor): ConstructionPlan {
  const selection = select(ctor);
  if (!selection.ok) throw new NoSuitableConstructorError(className(ctor), selection.reasons);
  return selection.plan;
}

/**
 * Like `selectConstructionPlan`, but `undefined` instead of throwing.
 */
export function peekConstructionPlan(ctor: Constructor): ConstructionPlan | undefined {
  const selection = select(ctor);
  return selection.ok ? selection.plan : undefined;
}

/**
 * Memoised plan for a descriptor. Factories carry their plan explicitly:
 * the registered deps in order, then a call to the factory.
 *
 * @throws NoSuitableConstructorError for a class without a usable signature
 */
export function planFor(descriptor: ServiceDescriptor): ConstructionPlan {
  if (descriptor.plan) return descriptor.plan;
  return memoise(descriptor, buildPlan(descriptor, selectConstructionPlan));
}

/**
 * Like `planFor`, but `undefined` when the class has no usable signature.
 */
export function peekPlanFor(descriptor: ServiceDescriptor): ConstructionPlan | undefined {
  if (descriptor.plan) return descriptor.plan;
  const plan = buildPlan(descriptor, peekConstructionPlan);
  return plan ? memoise(descriptor, plan) : undefined;
}

function buildPlan<P extends ConstructionPlan | undefined>(
  descriptor: ServiceDescriptor,
  forClass: (ctor: Constructor) => P
): ConstructionPlan | P {
  const impl = descriptor.implementation;
  switch (impl.kind) {
    case 'class':
      return forClass(impl.useClass);
    case 'factory':
      return {
        signature: `${descriptor.label} factory`,
        parameters: impl.deps,
        invoke: (args) => impl.useFactory(...args),
      };
    case 'value':
      return {
        signature: `${descriptor.label} value`,
        parameters: EMPTY_PARAMS,
        invoke: () => impl.useValue,
      };
  }
}

function memoise(descriptor: ServiceDescriptor, plan: ConstructionPlan): ConstructionPlan {
  descriptor.plan = plan;
  if (plan.parameters.length === 0) descriptor.flags |= FLAG_HAS_NO_DEPS;
  return plan;
}

function select(ctor: Constructor): Selection {
  const candidates = collectCandidates(ctor);
  const reasons: string[] = [];
  let best: Candidate | undefined;

  for (const candidate of candidates) {
    const missing = missingIndexes(candidate);
    if (missing.length > 0) {
      reasons.push(
        `${candidate.signature}: parameter${missing.length > 1 ? 's' : ''} ${missing.join(', ')} missing @Inject`
      );
      continue;
    }
    if (!best || candidate.arity > best.arity) best = candidate;
  }

  if (!best) return { ok: false, reasons };

  const parameters: ParameterSpec[] = [];
  for (let i = 0; i < best.arity; i++) {
    const spec = best.parameters[i];
    if (spec) parameters.push(spec);
  }
  return {
    ok: true,
    plan: Object.freeze({
      signature: best.signature,
      parameters: Object.freeze(parameters),
      invoke: best.invoke,
    }),
  };
}

function collectCandidates(ctor: Constructor): Candidate[] {
  const name = className(ctor);
  const own = StaticInjectionRegistry.buildDefinition(ctor);
  const inherited = own?.constructorParameters ? undefined : findDecoratedAncestor(ctor);
  const ctorParams = own?.constructorParameters ?? inherited?.definition.constructorParameters ?? [];
  const ctorLength = Math.max(ctor.length, inherited?.length ?? 0);

  const candidates: Candidate[] = [
    {
      signature: `${name}.constructor`,
      arity: Math.max(ctorLength, ctorParams.length),
      parameters: ctorParams,
      invoke: (args) => new ctor(...args),
    },
  ];

  for (const factory of own?.factories ?? []) {
    candidates.push({
      signature: `${name}.${String(factory.key)}`,
      arity: Math.max(factory.declaredLength, factory.parameters.length),
      parameters: factory.parameters,
      invoke: (args) => factory.invoke(...args),
    });
  }

  return candidates;
}

function findDecoratedAncestor(
  ctor: Constructor
): { definition: StaticClassDefinition; length: number } | undefined {
  let current: unknown = Object.getPrototypeOf(ctor);
  while (typeof current === 'function' && current !== Function.prototype) {
    const definition = StaticInjectionRegistry.buildDefinition(current);
    if (definition?.constructorParameters) return { definition, length: current.length };
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function missingIndexes(candidate: Candidate): number[] {
  const missing: number[] = [];
  for (let i = 0; i < candidate.arity; i++) {
    if (!candidate.parameters[i]) missing.push(i);
  }
  return missing;
}

function className(ctor: Constructor): string {
  return ctor.name || 'AnonymousClass';
}
