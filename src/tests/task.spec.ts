import { describe, it, expect } from 'vitest';
import { assertTaskDefinition, checkOutput, defineTask, describeTask } from '../engine/task.js';
import { Step } from '../engine/step.js';
import { Registry } from '../registry/index.js';
import { isNumber, typeKey } from '../registry/typeKey.js';
import { ConfigurationError } from '../errors.js';
import type { TaskDefinition } from '../types/contracts.js';

const Count = typeKey('Count', isNumber);
const Doubled = typeKey('Doubled', isNumber);

const double = defineTask({
  name: 'double',
  needs: { n: Count },
  produces: Doubled,
  create: ({ n }) => ({ execute: () => n * 2 })
});

describe('task definitions', () => {
  it('describes dependencies and output', () => {
    expect(describeTask(double)).toBe('double(n: Count) -> Doubled');
  });

  it('rejects a definition without a name', () => {
    expect(() => assertTaskDefinition({ name: ' ', needs: {}, create: () => ({}) }))
      .toThrow('Task definition needs a non-empty name');
  });

  it('rejects a dependency that is not a type key', () => {
    expect(() => assertTaskDefinition({ name: 'bad', needs: { n: 'Count' }, create: () => ({}) }))
      .toThrow("Task bad: dependency 'n' is not a type key");
  });

  it('rejects a missing create function', () => {
    expect(() => assertTaskDefinition({ name: 'bad', needs: {} })).toThrow(ConfigurationError);
  });

  it('pairs a valid output with its key', () => {
    const out = checkOutput(double, 4);
    expect(out?.key).toBe(Doubled);
    expect(out?.value).toBe(4);
  });
});

describe('output contract', () => {
  it('fails when a declared output is not returned', async () => {
    const silent: TaskDefinition = {
      name: 'silent',
      needs: {},
      produces: Count,
      create: () => ({ execute: () => undefined })
    };
    await expect(new Step('s').addTasks(silent).execute(new Registry()))
      .rejects.toThrow('Task silent declares output Count but returned nothing');
  });

  it('fails when data is returned without a declared output', async () => {
    const chatty: TaskDefinition = {
      name: 'chatty',
      needs: {},
      create: () => ({ execute: () => 5 })
    };
    await expect(new Step('s').addTasks(chatty).execute(new Registry())).rejects.toThrow(ConfigurationError);
  });

  it('treats null from a task without output as no output', async () => {
    const quiet: TaskDefinition = {
      name: 'quiet',
      needs: {},
      create: () => ({ execute: () => null })
    };
    const reg = await new Step('s').addTasks(quiet).execute(new Registry());
    expect(reg.size).toBe(0);
  });

  it('fails when the output does not match its key', async () => {
    const wrong: TaskDefinition = {
      name: 'wrong',
      needs: {},
      produces: Count,
      create: () => ({ execute: () => 'five' })
    };
    await expect(new Step('s').addTasks(wrong).execute(new Registry()))
      .rejects.toThrow('Task wrong returned a value that is not a Count');
  });

  it('builds a fresh task for every execution', async () => {
    let created = 0;
    const counted = defineTask({
      name: 'counted',
      needs: {},
      produces: Count,
      create: () => {
        created++;
        return { execute: () => created };
      }
    });
    const step = new Step('s').addTasks(counted);
    await step.execute(new Registry());
    const reg = await step.execute(new Registry());
    expect(created).toBe(2);
    expect(reg.get(Count)).toBe(2);
  });
});
