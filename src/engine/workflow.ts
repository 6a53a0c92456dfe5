import { Registry } from "../registry/index.js";
import type { SeedValue } from "../registry/typeKey.js";
import type { Step } from "./step.js";

/** Steps executed strictly in the order they were added. */
export class Workflow {
  readonly steps: Step[] = [];

  addSteps(...steps: Step[]): this {
    this.steps.push(...steps);
    return this;
  }

  /**
   * Seed the registry. Each value is keyed by its own class unless it is an
   * explicit `key.seed(value)`; a later value of the same type replaces an
   * earlier one.
   */
  initialize(...seeds: SeedValue[]): InitializedWorkflow {
    return new InitializedWorkflow(this, Registry.from(seeds));
  }
}

export class InitializedWorkflow {
  constructor(
    readonly workflow: Workflow,
    public registry: Registry
  ) {}

  get stepCount(): number {
    return this.workflow.steps.length;
  }

  /** Add data that no task produces and that was not available at initialization. */
  addData(...seeds: SeedValue[]): this {
    for (const seed of seeds) this.registry.add(seed);
    return this;
  }

  async executeStep(index: number): Promise<Registry> {
    const step = this.workflow.steps[index];
    if (!Number.isInteger(index) || !step) {
      throw new RangeError(`No step at index ${index}; the workflow has ${this.stepCount} steps`);
    }
    this.registry = await step.execute(this.registry);
    return this.registry;
  }

  async execute(): Promise<Registry> {
    for (let i = 0; i < this.stepCount; i++) {
      await this.executeStep(i);
    }
    return this.registry;
  }
}
