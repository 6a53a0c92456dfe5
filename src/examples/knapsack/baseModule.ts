import { defineTask } from "../../engine/task.js";
import { ensure } from "../../framework/errors.js";
import { classKey } from "../../registry/typeKey.js";
import type { OptimizationModule } from "../../types/framework.js";
import { BinaryProgram } from "./binaryProgram.js";
import { BaseData, BaseMipData, SolutionData } from "./data.js";

const Base = classKey(BaseData);
const Program = classKey(BinaryProgram);
const BaseMip = classKey(BaseMipData);

export const validateBaseData = defineTask({
  name: "validate_base_data",
  needs: { data: Base },
  create: ({ data }) => ({
    execute() {
      ensure(data.maxWeight >= 0, "The maximum weight must not be negative");
      for (const item of data.items) {
        ensure(Object.hasOwn(data.profits, item), `No profit defined for item ${item}`);
        ensure(data.profits[item] >= 0, `The profit for item ${item} must not be negative`);
        ensure(Object.hasOwn(data.weights, item), `No weight defined for item ${item}`);
        ensure(data.weights[item] >= 0, `The weight for item ${item} must not be negative`);
      }
    },
  }),
});

export const buildBaseMip = defineTask({
  name: "build_base_mip",
  needs: { data: Base, problem: Program },
  produces: BaseMip,
  create: ({ data, problem }) => ({
    execute() {
      const varPackItem: Record<string, string> = {};
      for (const item of data.items) varPackItem[item] = problem.addVariable(`pack_item(${item})`);

      const weights: Record<string, number> = {};
      const profits: Record<string, number> = {};
      for (const item of data.items) {
        weights[varPackItem[item]] = data.weights[item];
        profits[varPackItem[item]] = data.profits[item];
      }
      problem.addConstraint(weights, "<=", data.maxWeight, "respect_capacity");
      problem.addObjective(profits);

      return new BaseMipData(varPackItem);
    },
  }),
});

export const extractSolution = defineTask({
  name: "extract_solution",
  needs: { data: Base, mipData: BaseMip, problem: Program },
  produces: classKey(SolutionData),
  create: ({ data, mipData, problem }) => ({
    execute: () =>
      new SolutionData(data.items.filter(item => Math.round(problem.value(mipData.varPackItem[item]) ?? 0) === 1)),
  }),
});

export const baseModule: OptimizationModule = {
  validation: [validateBaseData],
  build: [buildBaseMip],
  extraction: [extractSolution],
};
