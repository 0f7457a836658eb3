/** Base class for failures reading or writing the persisted counter state. */
export class CounterStateError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The state file exists but does not hold a usable snapshot. */
export class StartupCorruptionError extends CounterStateError {}

/** The snapshot could not be encoded or written to disk. */
export class PersistenceWriteError extends CounterStateError {}
