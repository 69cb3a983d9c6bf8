import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early (without throwing) when the signal aborts. */
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error: unknown) {
    if (signal?.aborted) return;
    throw error;
  }
};
