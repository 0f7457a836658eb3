import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CounterStateStore } from '../src/db/state-file.js';
import { PersistenceWriteError } from '../src/errors.js';
import { WINDOW_BUCKETS, type PersistedState } from '../src/types/state.js';

export class MemoryStateStore implements CounterStateStore {
    saved: PersistedState | null = null;
    writes = 0;
    failWrites = false;

    constructor(initial: PersistedState | null = null) {
        this.saved = initial;
    }

    read(): PersistedState | null {
        return this.saved ? { ...this.saved, bucketHistory: [...this.saved.bucketHistory] } : null;
    }

    write(state: PersistedState): void {
        if (this.failWrites) {
            throw new PersistenceWriteError('disk full', 'memory');
        }
        this.writes++;
        this.saved = { ...state, bucketHistory: [...state.bucketHistory] };
    }
}

export const emptyBuckets = (): number[] => new Array<number>(WINDOW_BUCKETS).fill(0);

export const makeTempDir = () => {
    const dir = mkdtempSync(join(tmpdir(), 'request-window-'));
    return {
        dir,
        path: (name: string) => join(dir, name),
        cleanup: () => rmSync(dir, { recursive: true, force: true })
    };
};
