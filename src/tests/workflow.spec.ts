import { describe, it, expect } from 'vitest';
import { defineTask } from '../engine/task.js';
import { Step } from '../engine/step.js';
import { Workflow } from '../engine/workflow.js';
import { Registry } from '../registry/index.js';
import { classKey, isNumber, isString, typeKey } from '../registry/typeKey.js';
import { ScheduleError } from '../errors.js';

class Limit {
  constructor(readonly value: number) {}
}

const X = typeKey('X', isNumber);
const Y = typeKey('Y', isNumber);
const Label = typeKey('Label', isString);

const produceX = defineTask({
  name: 'produce_x',
  needs: { limit: classKey(Limit) },
  produces: X,
  create: ({ limit }) => ({ execute: () => limit.value * 2 })
});

const consumeX = defineTask({
  name: 'consume_x',
  needs: { x: X },
  produces: Y,
  create: ({ x }) => ({ execute: () => x + 1 })
});

function twoSteps() {
  return new Workflow().addSteps(
    new Step('first').addTasks(produceX),
    new Step('second').addTasks(consumeX)
  );
}

describe('workflow', () => {
  it('threads the registry from one step to the next', async () => {
    const reg = await twoSteps().initialize(new Limit(5)).execute();
    expect(reg.get(X)).toBe(10);
    expect(reg.get(Y)).toBe(11);
  });

  it('executes one step at a time', async () => {
    const run = twoSteps().initialize(new Limit(5));
    expect(run.stepCount).toBe(2);

    const afterFirst = await run.executeStep(0);
    expect(afterFirst.get(X)).toBe(10);
    expect(afterFirst.has(Y)).toBe(false);

    const afterSecond = await run.executeStep(1);
    expect(afterSecond.get(Y)).toBe(11);
    expect(run.registry).toBe(afterSecond);
  });

  it('fails a later step run on its own with the missing key', async () => {
    const run = new Workflow().addSteps(new Step('second').addTasks(consumeX)).initialize();
    const err = await run.execute().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ScheduleError);
    if (!(err instanceof ScheduleError)) return;
    expect(err.pending).toEqual([{ task: 'consume_x', missing: [{ param: 'x', key: 'X' }] }]);
  });

  it('keeps the last of two seeds of the same type', async () => {
    const reg = await twoSteps().initialize(new Limit(1), new Limit(3)).execute();
    expect(reg.get(X)).toBe(6);
  });

  it('accepts explicit seeds and data added after initialization', async () => {
    const run = twoSteps().initialize(Label.seed('demo'), null);
    run.addData(new Limit(2));
    const reg: Registry = await run.execute();
    expect(reg.get(Label)).toBe('demo');
    expect(reg.get(Y)).toBe(5);
  });

  it('rejects an index outside the steps', async () => {
    const run = twoSteps().initialize(new Limit(1));
    await expect(run.executeStep(2)).rejects.toThrow(RangeError);
    await expect(run.executeStep(-1)).rejects.toThrow('No step at index -1; the workflow has 2 steps');
  });
});
