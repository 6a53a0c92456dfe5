import { ConfigurationError } from "../errors.js";

export type Guard<T> = (value: unknown) => value is T;

export type Constructor<T extends object = object> = abstract new (...args: never[]) => T;

/**
 * Identifies one semantic kind of data in a {@link Registry}.
 *
 * Keys compare by `id`, never by `name`: two keys created with the same name
 * address different entries. The guard narrows stored values back to `T`.
 */
export class TypeKey<T> {
  readonly id: symbol;

  constructor(
    readonly name: string,
    readonly is: Guard<T>,
    id?: symbol
  ) {
    this.id = id ?? Symbol(name);
  }

  /** Pair a value with this key, for seeding values that have no class of their own. */
  seed(value: T): Seed<T> {
    return new Seed(this, value);
  }

  equals(other: TypeKey<unknown>): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.name;
  }
}

export class Seed<T> {
  constructor(
    readonly key: TypeKey<T>,
    readonly value: T
  ) {}
}

/** Anything `Registry.from` and `addData` accept. Nullish values are skipped. */
export type SeedValue = Seed<unknown> | object | null | undefined;

export function typeKey<T>(name: string, is: Guard<T>): TypeKey<T> {
  return new TypeKey(name, is);
}

// one id per class, so every key derived from a class addresses the same entry
const classIds = new WeakMap<Function, symbol>();

function idForClass(ctor: Function): symbol {
  let id = classIds.get(ctor);
  if (!id) {
    id = Symbol(ctor.name);
    classIds.set(ctor, id);
  }
  return id;
}

export function classKey<T extends object>(ctor: Constructor<T>): TypeKey<T> {
  return new TypeKey(ctor.name, instanceOf(ctor), idForClass(ctor));
}

/** The key determined by a value's own class. */
export function keyOfValue(value: object): TypeKey<object> {
  const proto: unknown = Object.getPrototypeOf(value);
  const found: unknown = proto !== null && typeof proto === "object" ? Reflect.get(proto, "constructor") : undefined;
  if (typeof found !== "function" || found === Object || found === Array) {
    throw new ConfigurationError(
      "Cannot derive a type key from a plain object, array or primitive; seed it with key.seed(value)"
    );
  }
  const ctor: Function = found;
  return new TypeKey(ctor.name, (v): v is object => v instanceof ctor, idForClass(ctor));
}

export function isTypeKey(value: unknown): value is TypeKey<unknown> {
  return value instanceof TypeKey;
}

export const isNumber: Guard<number> = (v): v is number => typeof v === "number";
export const isString: Guard<string> = (v): v is string => typeof v === "string";
export const isBoolean: Guard<boolean> = (v): v is boolean => typeof v === "boolean";

export function instanceOf<T extends object>(ctor: Constructor<T>): Guard<T> {
  return (v): v is T => v instanceof ctor;
}

export function isArrayOf<T>(item: Guard<T>): Guard<T[]> {
  return (v): v is T[] => Array.isArray(v) && v.every(item);
}

export function isRecordOf<T>(item: Guard<T>): Guard<Record<string, T>> {
  return (v): v is Record<string, T> =>
    typeof v === "object" && v !== null && !Array.isArray(v) && Object.values(v).every(item);
}
