import { defineTask } from "../../engine/task.js";
import { ensure } from "../../framework/errors.js";
import { classKey } from "../../registry/typeKey.js";
import type { OptimizationModule } from "../../types/framework.js";
import { BinaryProgram } from "./binaryProgram.js";
import { BaseData, BaseMipData, ConflictData } from "./data.js";

const Conflicts = classKey(ConflictData);

export const validateConflictData = defineTask({
  name: "validate_conflict_data",
  needs: { data: classKey(BaseData), conflictData: Conflicts },
  create: ({ data, conflictData }) => ({
    execute() {
      for (const [a, b] of conflictData.conflicts) {
        ensure(data.items.includes(a), `Item ${a} is not defined in the base data`);
        ensure(data.items.includes(b), `Item ${b} is not defined in the base data`);
        ensure(a !== b, `Item ${a} is conflicting with itself`);
      }
    },
  }),
});

export const buildConflictMip = defineTask({
  name: "build_conflict_mip",
  needs: { mipData: classKey(BaseMipData), conflictData: Conflicts, problem: classKey(BinaryProgram) },
  create: ({ mipData, conflictData, problem }) => ({
    execute() {
      for (const [a, b] of conflictData.conflicts) {
        const va = mipData.varPackItem[a];
        const vb = mipData.varPackItem[b];
        problem.addConstraint({ [va]: 1, [vb]: 1 }, "<=", 1, `conflict(${a},${b})`);
      }
    },
  }),
});

export const conflictModule: OptimizationModule = {
  validation: [validateConflictData],
  build: [buildConflictMip],
};
