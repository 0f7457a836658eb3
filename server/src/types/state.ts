import { z } from 'zod';

/** Number of one-second buckets kept in the window. */
export const WINDOW_BUCKETS = 60;

/** Length of one bucket in seconds. */
export const BUCKET_SECONDS = 1;

const countSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/**
 * On-disk shape of the counter. Field names are kept compatible with the
 * files written by earlier releases of the server.
 */
export const persistedStateSchema = z
  .object({
    DeltaIdx: z.number().int().min(0).max(WINDOW_BUCKETS),
    Deltas: z.array(countSchema).length(WINDOW_BUCKETS),
    TimeWindowReqNo: countSchema
  })
  .refine((s) => s.Deltas.reduce((sum, d) => sum + d, 0) === s.TimeWindowReqNo, {
    message: 'TimeWindowReqNo does not match the sum of Deltas',
    path: ['TimeWindowReqNo']
  });

export type PersistedStateJson = z.infer<typeof persistedStateSchema>;

export interface PersistedState {
  cursor: number;
  bucketHistory: number[];
  windowTotal: number;
}

export function toJson(state: PersistedState): PersistedStateJson {
  return {
    DeltaIdx: state.cursor,
    Deltas: [...state.bucketHistory],
    TimeWindowReqNo: state.windowTotal
  };
}

export function fromJson(json: PersistedStateJson): PersistedState {
  return {
    cursor: json.DeltaIdx,
    bucketHistory: [...json.Deltas],
    windowTotal: json.TimeWindowReqNo
  };
}
