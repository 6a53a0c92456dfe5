import type { TypeKey } from "../registry/typeKey.js";
import type { Dependencies, TaskDefinition } from "./contracts.js";

export const PHASES = ["validation", "pre_processing", "build", "solve", "extraction"] as const;

export type Phase = (typeof PHASES)[number];

export type Sense = "minimize" | "maximize";

export type SolveStatus = "optimal" | "infeasible" | "unbounded" | "not_solved";

export interface Solver<P> {
  readonly name: string;
  solve(problem: P): SolveStatus | Promise<SolveStatus>;
}

export interface ProblemSpec {
  name: string;
  sense: Sense;
}

/** What the framework needs to know about a problem representation and its solvers. */
export interface MipBackend<P> {
  readonly problemKey: TypeKey<P>;
  readonly defaultSolver: Solver<P>;
  createProblem(spec: ProblemSpec): P;
  /** Objective value of a solved problem. */
  objectiveValue(problem: P): number;
  /** Human-readable listing of the problem, at most `lineLimit` lines. */
  describe(problem: P, lineLimit: number): string;
}

/** Tasks a domain package contributes to each phase. Solving is never contributed. */
export interface OptimizationModule {
  validation?: TaskDefinition<Dependencies, void>[];
  preProcessing?: TaskDefinition[];
  build?: TaskDefinition[];
  extraction?: TaskDefinition[];
}
