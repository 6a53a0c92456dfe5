import 'dotenv/config';
import { Optimizer } from '../../framework/optimizer.js';
import { SolutionObjValue } from '../../framework/defaultTasks.js';
import { InfeasibleError } from '../../framework/errors.js';
import { classKey } from '../../registry/typeKey.js';
import { baseModule } from './baseModule.js';
import { binaryBackend } from './binaryProgram.js';
import { conflictModule } from './conflictModule.js';
import { BaseData, ConflictData, SolutionData } from './data.js';

function getArg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.split('=')[1];
  return process.argv[ix+1] ?? fallback;
}

async function main() {
  const itemCount = Number(getArg('--items', '20'));
  const maxWeight = Number(getArg('--max-weight', '49'));
  const items = Array.from({ length: itemCount }, (_, i) => `item_${i}`);

  const baseData = new BaseData({
    items,
    weights: Object.fromEntries(items.map((item, i) => [item, i * 20 % 43])),
    profits: Object.fromEntries(items.map((item, i) => [item, i + 1])),
    maxWeight
  });
  // item i and item i + n/2 may not be packed together
  const half = Math.floor(itemCount / 2);
  const conflictData = new ConflictData(
    Array.from({ length: half }, (_, i): [string, string] => [items[i], items[i + half]])
  );

  const optimizer = new Optimizer('knapsack', 'maximize', binaryBackend).addModules(baseModule, conflictModule);

  const solution = await optimizer.initialize(baseData, conflictData).solve().catch((e: unknown) => {
    if (e instanceof InfeasibleError) {
      console.error('Failed to find a solution!');
      process.exit(1);
    }
    throw e;
  });

  console.log('\nFound a solution!');
  console.log(`Pack the following items: ${solution.require(classKey(SolutionData)).packedItems.join(', ')}`);
  console.log(`Total profit: ${solution.require(classKey(SolutionObjValue)).objectiveValue}`);
}

main().catch(e => { console.error(e); process.exit(1); });
