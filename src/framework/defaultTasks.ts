import { defineTask } from "../engine/task.js";
import { classKey } from "../registry/typeKey.js";
import type { MipBackend, ProblemSpec, Sense, Solver } from "../types/framework.js";
import { InfeasibleError } from "./errors.js";

export class ProblemSettings implements ProblemSpec {
  constructor(
    readonly name: string,
    readonly sense: Sense
  ) {}
}

export class SolveSettings {
  constructor(readonly solver: Solver<unknown>) {}
}

export class SolutionObjValue {
  constructor(readonly objectiveValue: number) {}
}

export function createProblemTask<P>(backend: MipBackend<P>) {
  return defineTask({
    name: "create_problem",
    needs: { settings: classKey(ProblemSettings) },
    produces: backend.problemKey,
    create: ({ settings }) => ({
      execute: () => backend.createProblem(settings),
    }),
  });
}

export function solveTask<P>(backend: MipBackend<P>) {
  return defineTask({
    name: "solve",
    needs: { problem: backend.problemKey, settings: classKey(SolveSettings) },
    create: ({ problem, settings }) => ({
      async execute() {
        const status = await settings.solver.solve(problem);
        if (status !== "optimal") throw new InfeasibleError(status);
      },
    }),
  });
}

export function objectiveValueTask<P>(backend: MipBackend<P>) {
  return defineTask({
    name: "objective_value",
    needs: { problem: backend.problemKey },
    produces: classKey(SolutionObjValue),
    create: ({ problem }) => ({
      execute: () => new SolutionObjValue(backend.objectiveValue(problem)),
    }),
  });
}
