import type { TypeKey } from "../registry/typeKey.js";

/** Declared dependencies of a task: constructor parameter name -> key of the data it needs. */
export type Dependencies = Record<string, TypeKey<unknown>>;

/** The values handed to `create` for a set of declared dependencies. */
export type Resolved<D extends Dependencies> = {
  [K in keyof D]: D[K] extends TypeKey<infer T> ? T : never;
};

export interface Task<O = unknown> {
  execute(): O | Promise<O>;
}

export interface TaskDefinition<D extends Dependencies = Dependencies, O = unknown> {
  readonly name: string;
  readonly needs: D;
  readonly produces?: TypeKey<O>;
  create(deps: Resolved<D>): Task<O>;
}

export type DuplicateOutputPolicy = "overwrite" | "error";

export interface StepOptions {
  /** Ready tasks of one pass that may run at once. */
  concurrency?: number;
  duplicateOutputs?: DuplicateOutputPolicy;
}
