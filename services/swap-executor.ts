/**
 * Swap Execution — ordered venue fallback.
 *
 * Venues are tried in order (bonding curve first, AMM second). The first
 * venue to return a confirmed signature wins; when every venue fails the
 * last failure is reported and nothing else is retried this cycle.
 */

import { fail, ok, type Result, type SwapReceipt, type SwapRequest, type VenueName } from "../types/index.js";
import { describeError, logger } from "./logger.js";

export interface SwapVenue {
  readonly name: VenueName;
  /** Human label for logs */
  readonly label: string;
  buy(request: SwapRequest): Promise<Result<SwapReceipt>>;
}

export interface SwapExecutor {
  execute(request: SwapRequest): Promise<Result<SwapReceipt>>;
}

export class FallbackSwapExecutor implements SwapExecutor {
  constructor(private readonly venues: SwapVenue[]) {}

  async execute(request: SwapRequest): Promise<Result<SwapReceipt>> {
    let last: Result<SwapReceipt> = fail("SWAP_BUILD_FAILURE", "no swap venues configured");

    for (const venue of this.venues) {
      try {
        last = await venue.buy(request);
      } catch (error: unknown) {
        last = fail("SWAP_BUILD_FAILURE", describeError(error), venue.name);
      }

      if (last.ok) {
        logger.info(`  ✅ TX SENT (${venue.label}): ${last.value.signature}`);
        return last;
      }
      logger.warn(
        `${venue.label} failed [${last.failure.kind}] ${last.failure.reason} (amount ${request.spendSol.toFixed(4)} SOL)`,
      );
    }

    if (this.venues.length > 0) logger.error("All swap methods failed");
    return last;
  }
}

/** TRADING_ENABLED=false: log the buy that would have happened. */
export class DryRunSwapExecutor implements SwapExecutor {
  async execute(request: SwapRequest): Promise<Result<SwapReceipt>> {
    logger.info(`  🧪 DRY RUN: would buy with ${request.spendSol.toFixed(4)} SOL`);
    return ok({ signature: "dry-run", venue: "dry-run" });
  }
}
