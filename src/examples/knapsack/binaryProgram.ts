import { classKey } from "../../registry/typeKey.js";
import type { MipBackend, Sense, SolveStatus, Solver } from "../../types/framework.js";

export type Comparison = "<=" | ">=" | "==";

export interface Constraint {
  name: string;
  coefficients: Map<string, number>;
  comparison: Comparison;
  bound: number;
}

const EPS = 1e-9;
const MAX_VARIABLES = 30;

/** A linear program over 0/1 variables, small enough to solve by enumeration. */
export class BinaryProgram {
  readonly variables: string[] = [];
  readonly constraints: Constraint[] = [];
  readonly objective = new Map<string, number>();
  private values = new Map<string, number>();
  private solveStatus: SolveStatus = "not_solved";

  constructor(
    readonly name: string,
    readonly sense: Sense
  ) {}

  get status(): SolveStatus {
    return this.solveStatus;
  }

  addVariable(name: string): string {
    if (this.variables.includes(name)) throw new Error(`Variable ${name} already exists`);
    this.variables.push(name);
    return name;
  }

  addConstraint(coefficients: Record<string, number>, comparison: Comparison, bound: number, name?: string): Constraint {
    const constraint: Constraint = {
      name: name ?? `c${this.constraints.length + 1}`,
      coefficients: this.terms(coefficients),
      comparison,
      bound,
    };
    this.constraints.push(constraint);
    return constraint;
  }

  /** Add terms to the objective; coefficients of a variable accumulate. */
  addObjective(coefficients: Record<string, number>) {
    for (const [variable, coef] of this.terms(coefficients)) {
      this.objective.set(variable, (this.objective.get(variable) ?? 0) + coef);
    }
  }

  value(variable: string): number | undefined {
    return this.values.get(variable);
  }

  objectiveValue(): number {
    if (this.solveStatus !== "optimal") throw new Error(`Program ${this.name} has no solution (${this.solveStatus})`);
    let total = 0;
    for (const [variable, coef] of this.objective) total += coef * (this.values.get(variable) ?? 0);
    return total;
  }

  setSolution(status: SolveStatus, values: Map<string, number> = new Map()) {
    this.solveStatus = status;
    this.values = values;
  }

  describe(lineLimit = 100): string {
    const lines = [
      `\\* ${this.name} *\\`,
      this.sense === "maximize" ? "Maximize" : "Minimize",
      `OBJ: ${formatTerms(this.objective)}`,
      "Subject To",
      ...this.constraints.map(c => `${c.name}: ${formatTerms(c.coefficients)} ${c.comparison === "==" ? "=" : c.comparison} ${c.bound}`),
      "Binaries",
      this.variables.join(" "),
      "End",
    ];
    return lines.slice(0, lineLimit).join("\n");
  }

  private terms(coefficients: Record<string, number>): Map<string, number> {
    for (const variable of Object.keys(coefficients)) {
      if (!this.variables.includes(variable)) throw new Error(`Unknown variable ${variable}`);
    }
    return new Map(Object.entries(coefficients));
  }
}

function formatTerms(terms: Map<string, number>): string {
  if (terms.size === 0) return "0";
  return Array.from(terms, ([variable, coef], i) =>
    i === 0 ? `${coef} ${variable}` : `${coef < 0 ? "-" : "+"} ${Math.abs(coef)} ${variable}`
  ).join(" ");
}

function satisfied(lhs: number, comparison: Comparison, bound: number): boolean {
  if (comparison === "<=") return lhs <= bound + EPS;
  if (comparison === ">=") return lhs >= bound - EPS;
  return Math.abs(lhs - bound) <= EPS;
}

/**
 * Depth-first enumeration of all assignments, pruning branches where a `<=`
 * row can no longer be satisfied. Among equally good assignments the first
 * found (variables at 0 before 1) is kept.
 */
export const exhaustiveSolver: Solver<BinaryProgram> = {
  name: "exhaustive",
  solve(program) {
    const vars = program.variables;
    const n = vars.length;
    if (n > MAX_VARIABLES) {
      throw new Error(`exhaustive solver handles at most ${MAX_VARIABLES} variables, got ${n}`);
    }
    const rows = program.constraints.map(c => {
      const coef = vars.map(v => c.coefficients.get(v) ?? 0);
      // smallest contribution the variables from i on can still add
      const minRest = new Array<number>(n + 1).fill(0);
      for (let i = n - 1; i >= 0; i--) minRest[i] = minRest[i + 1] + Math.min(0, coef[i]);
      return { c, coef, minRest };
    });
    const obj = vars.map(v => program.objective.get(v) ?? 0);
    const lhs = rows.map(() => 0);
    const assignment = new Array<number>(n).fill(0);
    const found: { best?: number[]; value: number } = { value: 0 };

    const visit = (i: number, value: number) => {
      for (let r = 0; r < rows.length; r++) {
        const { c, minRest } = rows[r];
        if (c.comparison === "<=" && lhs[r] + minRest[i] > c.bound + EPS) return;
      }
      if (i === n) {
        if (!rows.every((row, r) => satisfied(lhs[r], row.c.comparison, row.c.bound))) return;
        const better = program.sense === "maximize" ? value > found.value : value < found.value;
        if (!found.best || better) {
          found.best = assignment.slice();
          found.value = value;
        }
        return;
      }
      visit(i + 1, value);
      assignment[i] = 1;
      rows.forEach((row, r) => { lhs[r] += row.coef[i]; });
      visit(i + 1, value + obj[i]);
      rows.forEach((row, r) => { lhs[r] -= row.coef[i]; });
      assignment[i] = 0;
    };
    visit(0, 0);

    const best = found.best;
    if (!best) {
      program.setSolution("infeasible");
      return "infeasible";
    }
    program.setSolution("optimal", new Map(vars.map((v, i): [string, number] => [v, best[i]])));
    return "optimal";
  },
};

export const binaryBackend: MipBackend<BinaryProgram> = {
  problemKey: classKey(BinaryProgram),
  defaultSolver: exhaustiveSolver,
  createProblem: spec => new BinaryProgram(spec.name, spec.sense),
  objectiveValue: program => program.objectiveValue(),
  describe: (program, lineLimit) => program.describe(lineLimit),
};
