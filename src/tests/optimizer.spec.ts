import { describe, it, expect } from 'vitest';
import { defineTask } from '../engine/task.js';
import { Optimizer } from '../framework/optimizer.js';
import { ProblemSettings, SolutionObjValue } from '../framework/defaultTasks.js';
import { InfeasibleError, PhaseFailedError, PhaseOrderError, ValidationError, ensure } from '../framework/errors.js';
import { classKey, isNumber, isString, typeKey } from '../registry/typeKey.js';
import type { MipBackend, OptimizationModule, Sense, SolveStatus, Solver } from '../types/framework.js';

class Tally {
  readonly entries: string[] = [];
  solvedWith?: string;
  constructor(readonly name: string, readonly sense: Sense) {}
}

const Problem = classKey(Tally);
const Weight = typeKey('Weight', isNumber);
const Doubled = typeKey('Doubled', isNumber);
const Summary = typeKey('Summary', isString);

function tallyBackend(status: SolveStatus = 'optimal'): MipBackend<Tally> {
  return {
    problemKey: Problem,
    defaultSolver: {
      name: 'default',
      solve: tally => {
        tally.solvedWith = 'default';
        return status;
      }
    },
    createProblem: spec => new Tally(spec.name, spec.sense),
    objectiveValue: tally => tally.entries.length,
    describe: (tally, lineLimit) => tally.entries.slice(0, lineLimit).join('\n')
  };
}

const weightModule: OptimizationModule = {
  validation: [
    defineTask({
      name: 'validate_weight',
      needs: { weight: Weight },
      create: ({ weight }) => ({
        execute() {
          ensure(weight >= 0, 'Weight must not be negative');
        }
      })
    })
  ],
  preProcessing: [
    defineTask({
      name: 'double_weight',
      needs: { weight: Weight },
      produces: Doubled,
      create: ({ weight }) => ({ execute: () => weight * 2 })
    })
  ],
  build: [
    defineTask({
      name: 'record_weight',
      needs: { problem: Problem, doubled: Doubled },
      create: ({ problem, doubled }) => ({
        execute() {
          problem.entries.push(`w=${doubled}`);
        }
      })
    })
  ],
  extraction: [
    defineTask({
      name: 'summarize',
      needs: { problem: Problem },
      produces: Summary,
      create: ({ problem }) => ({ execute: () => problem.entries.join(',') })
    })
  ]
};

function optimizer(status?: SolveStatus) {
  return new Optimizer('tally', 'minimize', tallyBackend(status)).addModules(weightModule);
}

describe('optimizer', () => {
  it('runs every phase in order and extracts the objective', async () => {
    const run = optimizer().initialize(Weight.seed(3));
    const reg = await run.solve();

    expect(run.completedPhases).toEqual(['validation', 'pre_processing', 'build', 'solve', 'extraction']);
    expect(reg.require(classKey(SolutionObjValue)).objectiveValue).toBe(1);
    expect(reg.get(Summary)).toBe('w=6');
    expect(reg.require(classKey(ProblemSettings))).toEqual(new ProblemSettings('tally', 'minimize'));
    expect(run.problem().solvedWith).toBe('default');
    expect(run.problem().sense).toBe('minimize');
  });

  it('can be driven phase by phase with a custom solver', async () => {
    const custom: Solver<Tally> = {
      name: 'custom',
      solve: tally => {
        tally.solvedWith = 'custom';
        return 'optimal';
      }
    };
    const run = optimizer().initialize(Weight.seed(4));
    await run.validate();
    await run.preProcess();
    await run.buildMip();
    expect(run.describeProblem()).toBe('w=8');

    await run.solve(custom);
    expect(run.problem().solvedWith).toBe('custom');
  });

  it('refuses to run phases out of order', async () => {
    const run = optimizer().initialize(Weight.seed(1));
    await expect(run.buildMip()).rejects.toThrow(PhaseOrderError);
    await expect(run.buildMip()).rejects.toThrow('Cannot run phase build now, the next phase is validation');

    await run.solve();
    await expect(run.validate()).rejects.toThrow('Cannot run phase validation, every phase has already run');
  });

  it('reports an infeasible problem', async () => {
    const run = optimizer('infeasible').initialize(Weight.seed(1));
    const err = await run.solve().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InfeasibleError);
    if (!(err instanceof InfeasibleError)) return;
    expect(err.status).toBe('infeasible');
    expect(run.registry.has(classKey(SolutionObjValue))).toBe(false);
  });

  it('stops at the first invalid input', async () => {
    const run = optimizer().initialize(Weight.seed(-1));
    await expect(run.solve()).rejects.toThrow(ValidationError);
    expect(run.registry.has(Problem)).toBe(false);
    expect(run.registry.has(Doubled)).toBe(false);
  });

  it('does not continue past a phase that failed', async () => {
    const run = optimizer().initialize(Weight.seed(-1));
    await expect(run.solve()).rejects.toThrow(ValidationError);

    await expect(run.solve()).rejects.toThrow(PhaseFailedError);
    await expect(run.solve()).rejects.toThrow('Phase validation failed on this run; start a new run to try again');
    await expect(run.validate()).rejects.toThrow(PhaseFailedError);
    await expect(run.preProcess()).rejects.toThrow(PhaseFailedError);
    expect(run.completedPhases).toEqual([]);
    expect(run.registry.has(Doubled)).toBe(false);
    expect(run.registry.has(classKey(SolutionObjValue))).toBe(false);
  });
});
