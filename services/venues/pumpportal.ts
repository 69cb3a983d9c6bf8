/**
 * pump.fun bonding curve via PumpPortal's local-transaction API.
 *
 * `POST /api/trade-local` returns the raw bytes of an unsigned versioned
 * transaction sized to the SOL amount; we sign and submit it ourselves.
 */

import axios, { type AxiosInstance } from "axios";
import { MIN_TRANSACTION_BYTES } from "../../config/constants.js";
import { fail, ok, type Result, type SwapReceipt, type SwapRequest } from "../../types/index.js";
import { describeError, logger } from "../logger.js";
import type { SwapVenue } from "../swap-executor.js";
import type { TransactionSender } from "../transaction-sender.js";

export interface PumpPortalConfig {
  baseUrl: string;
  tokenMint: string;
  slippageBps: number;
  priorityFeeSol: number;
  timeoutMs: number;
}

export class PumpPortalVenue implements SwapVenue {
  readonly name = "pumpportal";
  readonly label = "pump.fun";
  private api: AxiosInstance;

  constructor(
    private readonly config: PumpPortalConfig,
    private readonly sender: TransactionSender,
    http?: AxiosInstance,
  ) {
    this.api = http ?? axios.create({ timeout: config.timeoutMs });
  }

  /** Request body; slippage is a percent on this API, not bps */
  buildTradeRequest(spendSol: number): Record<string, string | number> {
    return {
      publicKey: this.sender.publicKey,
      action: "buy",
      mint: this.config.tokenMint,
      amount: spendSol,
      denominatedInSol: "true",
      slippage: this.config.slippageBps / 100,
      priorityFee: this.config.priorityFeeSol,
      pool: "pump",
    };
  }

  async buy({ spendSol }: SwapRequest): Promise<Result<SwapReceipt>> {
    logger.info(`  🔄 Trying pump.fun bonding curve...`);

    let unsigned: Uint8Array;
    try {
      const res = await this.api.post<ArrayBuffer>(
        `${this.config.baseUrl}/api/trade-local`,
        this.buildTradeRequest(spendSol),
        { responseType: "arraybuffer", headers: { "Content-Type": "application/json" } },
      );
      unsigned = new Uint8Array(res.data);
    } catch (error: unknown) {
      return fail("SWAP_BUILD_FAILURE", describeError(error), this.name);
    }

    logger.info(`  📦 Got ${unsigned.length} bytes from PumpPortal`);
    if (unsigned.length < MIN_TRANSACTION_BYTES) {
      const preview = Buffer.from(unsigned).toString("utf-8").slice(0, 200);
      return fail("SWAP_BUILD_FAILURE", `response too short (${unsigned.length} bytes): ${preview}`, this.name);
    }

    const sent = await this.sender.send(unsigned, this.name, { skipPreflight: false });
    if (!sent.ok) return sent;
    return ok({ signature: sent.value, venue: this.name });
  }
}
