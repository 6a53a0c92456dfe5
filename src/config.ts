import { ConfigurationError } from "./errors.js";
import type { DuplicateOutputPolicy } from "./types/contracts.js";

export interface EngineConfig {
  concurrency: number;
  duplicateOutputs: DuplicateOutputPolicy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const rawConcurrency = env.STEP_CONCURRENCY ?? "1";
  const concurrency = Number(rawConcurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`STEP_CONCURRENCY must be a positive integer, got '${rawConcurrency}'`);
  }

  const duplicateOutputs = (env.DUPLICATE_OUTPUTS || "overwrite").toLowerCase();
  if (duplicateOutputs !== "overwrite" && duplicateOutputs !== "error") {
    throw new ConfigurationError(`DUPLICATE_OUTPUTS must be 'overwrite' or 'error', got '${duplicateOutputs}'`);
  }

  return { concurrency, duplicateOutputs };
}
