import { ConfigurationError, MissingDataError } from "../errors.js";
import { Seed, keyOfValue, type SeedValue, type TypeKey } from "./typeKey.js";

export interface RegistryEntry<T = unknown> {
  key: TypeKey<T>;
  value: T;
  v: number;
}

/**
 * Type-keyed store holding at most one value per {@link TypeKey}.
 * Writing a key that already holds a value replaces it.
 */
export class Registry {
  private readonly entries = new Map<symbol, RegistryEntry>();

  static from(seeds: Iterable<SeedValue>): Registry {
    const registry = new Registry();
    for (const seed of seeds) registry.add(seed);
    return registry;
  }

  get<T>(key: TypeKey<T>): T | undefined {
    const entry = this.entries.get(key.id);
    if (!entry) return undefined;
    const value = entry.value;
    if (!key.is(value)) {
      throw new ConfigurationError(`Value registered under ${entry.key.name} does not satisfy ${key.name}`);
    }
    return value;
  }

  require<T>(key: TypeKey<T>): T {
    const value = this.get(key);
    if (value === undefined) throw new MissingDataError(key.name);
    return value;
  }

  has(key: TypeKey<unknown>): boolean {
    return this.entries.has(key.id);
  }

  set<T>(key: TypeKey<T>, value: T): RegistryEntry<T> {
    if (value === undefined) {
      throw new ConfigurationError(`Cannot register undefined under ${key.name}`);
    }
    if (!key.is(value)) {
      throw new ConfigurationError(`Value does not satisfy ${key.name}`);
    }
    const v = (this.entries.get(key.id)?.v ?? 0) + 1;
    const rec: RegistryEntry<T> = { key, value, v };
    this.entries.set(key.id, rec);
    return rec;
  }

  /** Register a seed under its explicit key, or under the key of the value's own class. */
  add(seed: SeedValue): this {
    if (seed === null || seed === undefined) return this;
    if (typeof seed !== "object") {
      throw new ConfigurationError(`Cannot register a ${typeof seed} without a key; seed it with key.seed(value)`);
    }
    if (seed instanceof Seed) {
      this.set(seed.key, seed.value);
    } else {
      this.set(keyOfValue(seed), seed);
    }
    return this;
  }

  /** Number of writes to the key so far, 0 when absent. */
  version(key: TypeKey<unknown>): number {
    return this.entries.get(key.id)?.v ?? 0;
  }

  keys(): TypeKey<unknown>[] {
    return Array.from(this.entries.values(), e => e.key);
  }

  get size(): number {
    return this.entries.size;
  }

  snapshot(): Registry {
    const copy = new Registry();
    for (const [id, entry] of this.entries) copy.entries.set(id, { ...entry });
    return copy;
  }

  toRecord(): Record<string, unknown> {
    return Object.fromEntries(Array.from(this.entries.values(), e => [e.key.name, e.value]));
  }
}

export * from "./typeKey.js";
