import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistenceWriteError, StartupCorruptionError } from '../errors.js';
import { fromJson, persistedStateSchema, toJson, type PersistedState } from '../types/state.js';

export interface CounterStateStore {
  /** Returns the stored snapshot, or null when nothing has been stored yet. */
  read(): PersistedState | null;
  write(state: PersistedState): void;
}

/**
 * Keeps the counter snapshot in a JSON file. All I/O is synchronous so a
 * write finishes before any other request or timer callback runs.
 */
export class FileStateStore implements CounterStateStore {
  constructor(readonly filePath: string) {}

  read(): PersistedState | null {
    if (!existsSync(this.filePath)) return null;

    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      throw new StartupCorruptionError(`Could not open the request count file ${this.filePath}`, this.filePath, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new StartupCorruptionError(`Could not JSON decode the request count file ${this.filePath}`, this.filePath, { cause: err });
    }

    const parsed = persistedStateSchema.safeParse(data);
    if (!parsed.success) {
      throw new StartupCorruptionError(
        `Request count file ${this.filePath} has an unexpected shape`,
        this.filePath,
        { cause: parsed.error }
      );
    }
    return fromJson(parsed.data);
  }

  write(state: PersistedState): void {
    const tmp = `${this.filePath}.tmp`;
    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      writeFileSync(tmp, JSON.stringify(toJson(state)), { mode: 0o644 });
      renameSync(tmp, this.filePath);
    } catch (err) {
      throw new PersistenceWriteError(`Could not update the request count file ${this.filePath}`, this.filePath, { cause: err });
    }
  }
}
