export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A task definition, a seed or a setting cannot be resolved.
 * Programmer error: never retried.
 */
export class ConfigurationError extends EngineError {}

/** Two tasks of one step declare the same output while the step rejects duplicates. */
export class DuplicateOutputError extends ConfigurationError {
  constructor(
    readonly step: string,
    readonly key: string,
    readonly tasks: string[]
  ) {
    super(`Step '${step}': tasks [${tasks.join(", ")}] all produce ${key}`);
  }
}

export interface MissingDependency {
  param: string;
  key: string;
}

export interface StalledTask {
  task: string;
  missing: MissingDependency[];
}

/** A fixpoint pass made no progress while tasks were still pending. */
export class ScheduleError extends EngineError {
  constructor(
    readonly step: string,
    readonly pending: StalledTask[]
  ) {
    const names = pending.map(p => p.task);
    const lines = pending.map(p => `- ${p.task}: ${p.missing.map(m => `${m.param}: ${m.key}`).join(", ")}`);
    super(
      `Step '${step}': the tasks could not be scheduled, [${names.join(", ")}] have unfulfilled dependencies:\n` +
      lines.join("\n")
    );
  }
}

export class MissingDataError extends EngineError {
  constructor(readonly key: string) {
    super(`No data registered for ${key}`);
  }
}
