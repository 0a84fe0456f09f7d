import type { InjectableMetadata, ParameterSpec } from '../types/types.js';

/**
 * Key under which constructor parameters are recorded. Static factory
 * parameters are recorded under the method's own property key.
 */
export const CONSTRUCTOR_KEY: unique symbol = Symbol('constructor');

export type SignatureKey = typeof CONSTRUCTOR_KEY | string | symbol;

/** Static method marked with `@Constructs()`. */
export interface StaticFactoryDefinition {
  readonly key: string | symbol;
  /** Calls the static method with the class as `this`. */
  readonly invoke: (...args: unknown[]) => unknown;
  /** `length` of the decorated method. */
  readonly declaredLength: number;
  /** Sparse by index; `undefined` marks a parameter without `@Inject`. */
  readonly parameters: readonly (ParameterSpec | undefined)[];
}

/**
 * Everything the decorators recorded for one class.
 */
export interface StaticClassDefinition {
  readonly injectable?: InjectableMetadata;
  /** Constructor parameters, or `undefined` when none carries `@Inject`. */
  readonly constructorParameters?: readonly (ParameterSpec | undefined)[];
  readonly factories: readonly StaticFactoryDefinition[];
}

type MutableClassRecord = {
  injectable?: InjectableMetadata;
  params: Map<SignatureKey, Map<number, ParameterSpec>>;
  factories: Array<{
    key: string | symbol;
    invoke: (...args: unknown[]) => unknown;
    declaredLength: number;
  }>;
  cachedDef?: StaticClassDefinition;
};

type RegistryStore = {
  classes: WeakMap<object, MutableClassRecord>;
};

/**
 * One store per process, even when this module is bundled more than once.
 */
const GLOBAL_SYMBOL = Symbol.for('linchpin.staticInjectionRegistry');

const EMPTY_PARAMS: readonly (ParameterSpec | undefined)[] = Object.freeze([]);

function createStore(): RegistryStore {
  return { classes: new WeakMap() };
}

function isRegistryStore(value: unknown): value is RegistryStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'classes' in value &&
    value.classes instanceof WeakMap
  );
}

function ensureStore(): RegistryStore {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isRegistryStore(existing)) return existing;
  const fresh = createStore();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Process-wide store of decorator metadata.
 *
 * `@Injectable()`, `@Inject()` and `@Constructs()` write here while a class is
 * being defined; the construction strategy reads it back when a container
 * first builds the class. This holds static facts about classes only.
 * Registrations live in each container's own registry.
 */
export class StaticInjectionRegistry {
  /**
   * Record `@Injectable()` metadata. Re-decoration (hot module reload)
   * replaces the previous metadata.
   */
  static registerInjectable(target: object, metadata: InjectableMetadata): void {
    const rec = this.getRecord(target);
    rec.injectable = metadata;
    rec.cachedDef = undefined;
  }

  /**
   * Record the contract of one decorated parameter.
   *
   * @param key - `CONSTRUCTOR_KEY` or the name of a static factory method
   */
  static registerParameter(
    target: object,
    key: SignatureKey,
    parameterIndex: number,
    spec: ParameterSpec
  ): void {
    const rec = this.getRecord(target);
    let params = rec.params.get(key);
    if (!params) {
      params = new Map();
      rec.params.set(key, params);
    }
    params.set(parameterIndex, spec);
    rec.cachedDef = undefined;
  }

  /**
   * Record a static factory method marked with `@Constructs()`, in
   * decoration order.
   */
  static registerFactory(
    target: object,
    key: string | symbol,
    invoke: (...args: unknown[]) => unknown,
    declaredLength: number
  ): void {
    const rec = this.getRecord(target);
    const entry = { key, invoke, declaredLength };
    const existing = rec.factories.findIndex((f) => f.key === key);
    if (existing >= 0) rec.factories[existing] = entry;
    else rec.factories.push(entry);
    rec.cachedDef = undefined;
  }

  /**
   * Definition for a class, or `undefined` when no decorator touched it.
   * Definitions are computed lazily and cached until the class is decorated again.
   */
  static buildDefinition(target: object): StaticClassDefinition | undefined {
    const rec = ensureStore().classes.get(target);
    if (!rec) return undefined;
    return rec.cachedDef ?? (rec.cachedDef = this.buildDef(rec));
  }

  static getInjectable(target: object): InjectableMetadata | undefined {
    return ensureStore().classes.get(target)?.injectable;
  }

  /**
   * Drop every recorded class.
   *
   * ⚠️ For test environments only: classes decorated before the reset lose
   * their metadata.
   */
  static resetForTests(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createStore());
  }

  // ---- internals ----

  private static getRecord(target: object): MutableClassRecord {
    const store = ensureStore();
    let rec = store.classes.get(target);
    if (!rec) {
      rec = { params: new Map(), factories: [] };
      store.classes.set(target, rec);
    }
    return rec;
  }

  private static buildDef(rec: MutableClassRecord): StaticClassDefinition {
    const ctorParams = rec.params.get(CONSTRUCTOR_KEY);
    return Object.freeze({
      injectable: rec.injectable,
      constructorParameters: ctorParams ? this.toArray(ctorParams) : undefined,
      factories: rec.factories.map((f) => ({
        key: f.key,
        invoke: f.invoke,
        declaredLength: f.declaredLength,
        parameters: this.toArray(rec.params.get(f.key)),
      })),
    });
  }

  /**
   * Index → spec map to a sparse array of length highest index + 1.
   *
   *   constructor(@Inject(A) a: A, b: B, @Inject(C) c: C)
   *   → [A, undefined, C]
   */
  private static toArray(
    params: Map<number, ParameterSpec> | undefined
  ): readonly (ParameterSpec | undefined)[] {
    if (!params || params.size === 0) return EMPTY_PARAMS;
    let max = -1;
    for (const i of params.keys()) if (i > max) max = i;
    const out = new Array<ParameterSpec | undefined>(max + 1).fill(undefined);
    for (const [i, spec] of params) out[i] = spec;
    return out;
  }
}
