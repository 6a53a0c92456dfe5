import { Step } from "../engine/step.js";
import { Workflow, type InitializedWorkflow } from "../engine/workflow.js";
import type { Registry } from "../registry/index.js";
import type { SeedValue } from "../registry/typeKey.js";
import type { StepOptions } from "../types/contracts.js";
import { PHASES, type MipBackend, type OptimizationModule, type Phase, type Sense, type Solver } from "../types/framework.js";
import { ProblemSettings, SolveSettings, createProblemTask, objectiveValueTask, solveTask } from "./defaultTasks.js";
import { PhaseFailedError, PhaseOrderError } from "./errors.js";

/**
 * Assembles optimization modules into one workflow with a step per phase.
 * The framework's own tasks (problem creation, solving, objective extraction)
 * are added to the build, solve and extraction steps.
 */
export class Optimizer<P> {
  readonly modules: OptimizationModule[] = [];

  constructor(
    readonly name: string,
    readonly sense: Sense,
    readonly backend: MipBackend<P>,
    private readonly stepOptions: StepOptions = {}
  ) {}

  addModules(...modules: OptimizationModule[]): this {
    this.modules.push(...modules);
    return this;
  }

  /** Start a run on the data describing one problem instance. */
  initialize(...seeds: SeedValue[]): OptimizerRun<P> {
    const steps = this.buildSteps();
    const workflow = new Workflow()
      .addSteps(...PHASES.map(phase => steps[phase]))
      .initialize(...seeds)
      .addData(new ProblemSettings(this.name, this.sense));
    return new OptimizerRun(workflow, this.backend);
  }

  private buildSteps(): Record<Phase, Step> {
    const opts = this.stepOptions;
    const steps: Record<Phase, Step> = {
      validation: new Step("validation", opts),
      pre_processing: new Step("pre_processing", opts),
      build: new Step("build", opts).addTasks(createProblemTask(this.backend)),
      solve: new Step("solve", opts).addTasks(solveTask(this.backend)),
      extraction: new Step("extraction", opts).addTasks(objectiveValueTask(this.backend)),
    };
    for (const module of this.modules) {
      steps.validation.addTasks(...(module.validation ?? []));
      steps.pre_processing.addTasks(...(module.preProcessing ?? []));
      steps.build.addTasks(...(module.build ?? []));
      steps.extraction.addTasks(...(module.extraction ?? []));
    }
    return steps;
  }
}

/** One problem instance moving through the phases, strictly in order. */
export class OptimizerRun<P> {
  private next = 0;
  private failed?: Phase;

  constructor(
    readonly workflow: InitializedWorkflow,
    private readonly backend: MipBackend<P>
  ) {}

  get registry(): Registry {
    return this.workflow.registry;
  }

  get completedPhases(): Phase[] {
    return PHASES.slice(0, this.next);
  }

  async validate(): Promise<this> {
    await this.runPhase("validation");
    return this;
  }

  /** Shrink or simplify the data before the model is built. */
  async preProcess(): Promise<this> {
    await this.runPhase("pre_processing");
    return this;
  }

  async buildMip(): Promise<this> {
    await this.runPhase("build");
    return this;
  }

  /**
   * Run whatever phases are still outstanding, solve with `solver` (the
   * backend's default solver when omitted) and extract the solution.
   *
   * @throws InfeasibleError when the solver reports anything but an optimal solution.
   * @throws PhaseFailedError when an earlier phase of this run threw.
   */
  async solve(solver?: Solver<P>): Promise<Registry> {
    if (this.failed) throw new PhaseFailedError(this.failed);
    const solveIndex = PHASES.indexOf("solve");
    while (this.next < solveIndex) {
      await this.runPhase(PHASES[this.next]);
    }
    if (this.next !== solveIndex) throw this.orderError("solve");
    this.workflow.addData(new SolveSettings(solver ?? this.backend.defaultSolver));
    await this.runPhase("solve");
    return this.runPhase("extraction");
  }

  /** The problem instance, once the build phase has run. */
  problem(): P {
    return this.registry.require(this.backend.problemKey);
  }

  describeProblem(lineLimit = 100): string {
    return this.backend.describe(this.problem(), lineLimit);
  }

  private async runPhase(phase: Phase): Promise<Registry> {
    const index = PHASES.indexOf(phase);
    if (this.failed) throw new PhaseFailedError(this.failed);
    if (index !== this.next) throw this.orderError(phase);
    try {
      const registry = await this.workflow.executeStep(index);
      this.next++;
      return registry;
    } catch (err) {
      this.failed = phase;
      throw err;
    }
  }

  private orderError(phase: Phase): PhaseOrderError {
    return new PhaseOrderError(phase, this.next < PHASES.length ? PHASES[this.next] : undefined);
  }
}
