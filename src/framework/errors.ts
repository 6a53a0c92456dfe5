import { ConfigurationError } from "../errors.js";
import type { Phase, SolveStatus } from "../types/framework.js";

/** The data describing a problem instance violates an invariant. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function ensure(condition: unknown, message: string): asserts condition {
  if (!condition) throw new ValidationError(message);
}

export class InfeasibleError extends Error {
  constructor(readonly status: SolveStatus) {
    super(`The optimization problem does not have a solution (status: ${status})`);
    this.name = "InfeasibleError";
  }
}

/** A phase of this run threw; the run cannot continue past it. */
export class PhaseFailedError extends Error {
  constructor(readonly phase: Phase) {
    super(`Phase ${phase} failed on this run; start a new run to try again`);
    this.name = "PhaseFailedError";
  }
}

export class PhaseOrderError extends ConfigurationError {
  constructor(
    readonly phase: Phase,
    readonly expected: Phase | undefined
  ) {
    super(
      expected
        ? `Cannot run phase ${phase} now, the next phase is ${expected}`
        : `Cannot run phase ${phase}, every phase has already run`
    );
  }
}
