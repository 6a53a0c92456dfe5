export interface BaseDataInit {
  items: string[];
  /** Profit of each packed item; the total is maximized. */
  profits: Record<string, number>;
  weights: Record<string, number>;
  maxWeight: number;
}

/** One instance of the knapsack problem. */
export class BaseData {
  readonly items: string[];
  readonly profits: Record<string, number>;
  readonly weights: Record<string, number>;
  readonly maxWeight: number;

  constructor(init: BaseDataInit) {
    this.items = init.items;
    this.profits = init.profits;
    this.weights = init.weights;
    this.maxWeight = init.maxWeight;
  }
}

/** Variables the base module adds to the program. */
export class BaseMipData {
  // item -> variable "pack the item?"
  constructor(readonly varPackItem: Record<string, string>) {}
}

export class SolutionData {
  constructor(readonly packedItems: string[]) {}
}

/** Pairs of items that must not be packed together. */
export class ConflictData {
  constructor(readonly conflicts: Array<[string, string]>) {}
}
