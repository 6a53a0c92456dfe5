import { ConfigurationError, type MissingDependency } from "../errors.js";
import { Seed, isTypeKey, type TypeKey } from "../registry/typeKey.js";
import type { Registry } from "../registry/index.js";
import type { Dependencies, Resolved, Task, TaskDefinition } from "../types/contracts.js";

/**
 * Declare a unit of work.
 *
 * `needs` maps the parameter names handed to `create` to the keys of the data
 * they are filled from; `produces` names the key the result of `execute` is
 * registered under. A task without `produces` must return nothing.
 *
 * @example
 * const double = defineTask({
 *   name: "double",
 *   needs: { n: Count },
 *   produces: Doubled,
 *   create: ({ n }) => ({ execute: () => n * 2 })
 * });
 */
export function defineTask<D extends Dependencies, O>(def: {
  name: string;
  needs: D;
  produces: TypeKey<O>;
  create(deps: Resolved<D>): Task<O>;
}): TaskDefinition<D, O>;
export function defineTask<D extends Dependencies>(def: {
  name: string;
  needs: D;
  produces?: undefined;
  create(deps: Resolved<D>): Task<void>;
}): TaskDefinition<D, void>;
export function defineTask<D extends Dependencies, O>(def: TaskDefinition<D, O>): TaskDefinition<D, O> {
  assertTaskDefinition(def);
  return def;
}

export function assertTaskDefinition(value: unknown): asserts value is TaskDefinition {
  if (typeof value !== "object" || value === null) {
    throw new ConfigurationError(`Task definition must be an object, got ${value === null ? "null" : typeof value}`);
  }
  const name = "name" in value ? value.name : undefined;
  if (typeof name !== "string" || name.trim() === "") {
    throw new ConfigurationError("Task definition needs a non-empty name");
  }
  const needs = "needs" in value ? value.needs : undefined;
  if (typeof needs !== "object" || needs === null || Array.isArray(needs)) {
    throw new ConfigurationError(`Task ${name}: needs must map parameter names to type keys`);
  }
  for (const [param, key] of Object.entries(needs)) {
    if (!isTypeKey(key)) {
      throw new ConfigurationError(`Task ${name}: dependency '${param}' is not a type key`);
    }
  }
  const produces = "produces" in value ? value.produces : undefined;
  if (produces !== undefined && !isTypeKey(produces)) {
    throw new ConfigurationError(`Task ${name}: produces is not a type key`);
  }
  if (!("create" in value) || typeof value.create !== "function") {
    throw new ConfigurationError(`Task ${name}: create must be a function`);
  }
}

export function describeTask(def: TaskDefinition): string {
  const params = Object.entries(def.needs).map(([param, key]) => `${param}: ${key.name}`);
  return `${def.name}(${params.join(", ")})${def.produces ? ` -> ${def.produces.name}` : ""}`;
}

export function missingDependencies(def: TaskDefinition, registry: Registry): MissingDependency[] {
  return Object.entries(def.needs)
    .filter(([, key]) => !registry.has(key))
    .map(([param, key]) => ({ param, key: key.name }));
}

export function resolveDependencies(def: TaskDefinition, registry: Registry): Resolved<Dependencies> {
  const deps: Resolved<Dependencies> = {};
  for (const [param, key] of Object.entries(def.needs)) {
    deps[param] = registry.require(key);
  }
  return deps;
}

export function instantiate(def: TaskDefinition, deps: Resolved<Dependencies>): Task {
  const task = def.create(deps);
  if (typeof task !== "object" || task === null || typeof task.execute !== "function") {
    throw new ConfigurationError(`Task ${def.name}: create did not return an object with execute()`);
  }
  return task;
}

/** Check what `execute` returned against the declared output. */
export function checkOutput(def: TaskDefinition, out: unknown): Seed<unknown> | undefined {
  if (!def.produces) {
    if (out !== undefined && out !== null) {
      throw new ConfigurationError(
        `Task ${def.name} returned data but declares no output, so no other task can use it`
      );
    }
    return undefined;
  }
  if (out === undefined) {
    throw new ConfigurationError(`Task ${def.name} declares output ${def.produces.name} but returned nothing`);
  }
  if (!def.produces.is(out)) {
    throw new ConfigurationError(`Task ${def.name} returned a value that is not a ${def.produces.name}`);
  }
  return new Seed(def.produces, out);
}
