import cron, { type ScheduledTask } from "node-cron";
import { HEARTBEAT_CRON } from "../config/constants.js";
import type { TrackerState } from "../types/index.js";
import { fmtPrice, logger } from "./logger.js";

export function formatHeartbeat(state: Readonly<TrackerState>, now: Date = new Date()): string {
  const ath = state.ath > 0 ? fmtPrice(state.ath) : "unset";
  const last = state.lastPrice !== null ? fmtPrice(state.lastPrice) : "n/a";
  return (
    `💓 Heartbeat | ${now.toISOString()} | Cycles: ${state.cycles} | ` +
    `Buybacks: ${state.buybacks} (${state.failedBuybacks} failed) | ATH: ${ath} | Last: ${last}`
  );
}

/** Periodic liveness line; stop the returned task on shutdown. */
export function startHeartbeat(
  getState: () => Readonly<TrackerState>,
  expression: string = HEARTBEAT_CRON,
): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid heartbeat cron expression: ${expression}`);
  }
  return cron.schedule(expression, () => {
    logger.info(formatHeartbeat(getState()));
  });
}
