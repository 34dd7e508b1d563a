/** Thrown when the engine reaches a state its own transitions should never produce. */
export class EngineInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineInvariantError";
  }
}

/** Thrown by `createEngine` for a config it cannot pace animations with. */
export class EngineConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "EngineConfigError";
    this.field = field;
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) throw new EngineInvariantError(message);
}
