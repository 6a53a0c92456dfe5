import { loadConfig } from "../config.js";
import { ConfigurationError, DuplicateOutputError, ScheduleError } from "../errors.js";
import { COLOR, LOG_STEPS, LOG_TASKS, fmtMs, warn } from "../log.js";
import type { Registry } from "../registry/index.js";
import type { Seed } from "../registry/typeKey.js";
import type { Dependencies, DuplicateOutputPolicy, Resolved, StepOptions, TaskDefinition } from "../types/contracts.js";
import { runBounded } from "./pool.js";
import { assertTaskDefinition, checkOutput, describeTask, instantiate, missingDependencies, resolveDependencies } from "./task.js";

/**
 * An unordered set of tasks, run against one registry.
 *
 * The execution order is derived from the data: a task runs in the first pass
 * in which every key it needs is present. Registration order only breaks ties
 * within a pass.
 */
export class Step {
  readonly tasks: TaskDefinition[] = [];

  constructor(
    readonly name: string,
    private readonly options: StepOptions = {}
  ) {
    const { concurrency } = options;
    if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
      throw new ConfigurationError(`Step '${name}': concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  addTasks(...defs: TaskDefinition[]): this {
    for (const def of defs) {
      assertTaskDefinition(def);
      if (this.tasks.includes(def)) {
        throw new ConfigurationError(`Step '${this.name}': task ${def.name} is already registered`);
      }
      if (this.tasks.some(t => t.name === def.name)) {
        throw new ConfigurationError(`Step '${this.name}': another task is already named ${def.name}`);
      }
      this.tasks.push(def);
    }
    return this;
  }

  /**
   * Run every task exactly once, extending `registry` in place.
   *
   * @throws ScheduleError when a pass finds no ready task while tasks are pending.
   * @throws DuplicateOutputError when two tasks produce the same key and the step rejects duplicates.
   * Errors thrown by a task propagate unchanged; outputs written before the failure stay.
   */
  async execute(registry: Registry): Promise<Registry> {
    const { concurrency, duplicateOutputs } = this.settings();
    this.checkDuplicateOutputs(duplicateOutputs);

    const stepStart = Date.now();
    if (LOG_STEPS) {
      console.log(`\n${COLOR.cyan("▶ step")} ${this.name} ${COLOR.gray("— " + this.tasks.length + " tasks")}`);
    }

    let pending = this.tasks.slice();
    let pass = 0;
    while (pending.length > 0) {
      pass++;
      const ready = pending.filter(def => missingDependencies(def, registry).length === 0);
      if (ready.length === 0) {
        throw new ScheduleError(
          this.name,
          pending.map(def => ({ task: def.name, missing: missingDependencies(def, registry) }))
        );
      }
      if (LOG_STEPS) console.log(COLOR.gray(`  pass ${pass} — ${ready.map(def => def.name).join(", ")}`));

      // inputs are read before anything of this pass is written
      const inputs = ready.map(def => resolveDependencies(def, registry));
      const results = await runBounded(ready, concurrency, (def, i) => this.runTask(def, inputs[i]));

      const executed = new Set<TaskDefinition>();
      let failure: { reason: unknown } | undefined;
      for (let i = 0; i < results.length; i++) {
        const result = results[i];
        if (result.status === "fulfilled") {
          if (result.value) registry.set(result.value.key, result.value.value);
          executed.add(ready[i]);
        } else if (result.status === "rejected" && !failure) {
          failure = { reason: result.reason };
        }
      }
      if (failure) throw failure.reason;

      pending = pending.filter(def => !executed.has(def));
    }

    if (LOG_STEPS) {
      console.log(`${COLOR.green("✓ done")} ${this.name} ${COLOR.gray("(" + fmtMs(Date.now() - stepStart) + ")")}`);
    }
    return registry;
  }

  private async runTask(def: TaskDefinition, deps: Resolved<Dependencies>): Promise<Seed<unknown> | undefined> {
    const t0 = Date.now();
    const task = instantiate(def, deps);
    const out: unknown = await task.execute();
    const output = checkOutput(def, out);
    if (LOG_TASKS) {
      console.log(COLOR.magenta(`    ↳ task ${describeTask(def)} ${COLOR.gray("[" + fmtMs(Date.now() - t0) + "]")}`));
    }
    return output;
  }

  private settings(): Required<StepOptions> {
    const { concurrency, duplicateOutputs } = this.options;
    if (concurrency !== undefined && duplicateOutputs !== undefined) return { concurrency, duplicateOutputs };
    const config = loadConfig();
    return {
      concurrency: concurrency ?? config.concurrency,
      duplicateOutputs: duplicateOutputs ?? config.duplicateOutputs,
    };
  }

  private checkDuplicateOutputs(policy: DuplicateOutputPolicy) {
    const producers = new Map<symbol, TaskDefinition[]>();
    for (const def of this.tasks) {
      if (!def.produces) continue;
      const list = producers.get(def.produces.id) ?? [];
      list.push(def);
      producers.set(def.produces.id, list);
    }
    for (const defs of producers.values()) {
      if (defs.length < 2) continue;
      const key = defs[0].produces?.name ?? "";
      const names = defs.map(def => def.name);
      if (policy === "error") throw new DuplicateOutputError(this.name, key, names);
      warn(`step '${this.name}': [${names.join(", ")}] all produce ${key}; the last to run wins`);
    }
  }
}
