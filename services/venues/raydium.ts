/**
 * Raydium AMM swap (tokens that graduated off the bonding curve).
 *
 * Two calls against the trade API:
 *   1. GET  /compute/swap-base-in     → route for SOL → token at `amount` lamports
 *   2. POST /transaction/swap-base-in → base64 versioned transactions for that route
 * Each returned transaction is signed, submitted and confirmed in order; the
 * last signature is the receipt. When a later transaction fails, the failure
 * reason lists the signatures that already landed.
 */

import axios, { type AxiosInstance } from "axios";
import { LAMPORTS_PER_SOL, SOL_MINT } from "../../config/constants.js";
import { fail, ok, type Result, type SwapReceipt, type SwapRequest } from "../../types/index.js";
import { describeError, logger } from "../logger.js";
import type { SwapVenue } from "../swap-executor.js";
import type { TransactionSender } from "../transaction-sender.js";

export interface RaydiumConfig {
  baseUrl: string;
  tokenMint: string;
  slippageBps: number;
  computeUnitPriceMicroLamports: number;
  timeoutMs: number;
}

interface RaydiumEnvelope {
  success: boolean;
  msg?: string;
  data?: unknown;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

function readEnvelope(body: unknown): RaydiumEnvelope {
  if (!isRecord(body)) return { success: false, msg: "malformed response" };
  return {
    success: body.success === true,
    msg: typeof body.msg === "string" ? body.msg : undefined,
    data: body.data,
  };
}

export const toLamports = (sol: number): number => Math.floor(sol * LAMPORTS_PER_SOL);

export class RaydiumVenue implements SwapVenue {
  readonly name = "raydium";
  readonly label = "Raydium";
  private api: AxiosInstance;

  constructor(
    private readonly config: RaydiumConfig,
    private readonly sender: TransactionSender,
    http?: AxiosInstance,
  ) {
    this.api = http ?? axios.create({ timeout: config.timeoutMs });
  }

  async buy({ spendSol }: SwapRequest): Promise<Result<SwapReceipt>> {
    logger.info(`  🔄 Trying Raydium...`);

    const amount = toLamports(spendSol);
    if (amount < 1) return fail("SWAP_BUILD_FAILURE", `spend ${spendSol} SOL rounds to 0 lamports`, this.name);

    const quote = await this.fetchQuote(amount);
    if (!quote.ok) return quote;

    const txs = await this.fetchTransactions(quote.value);
    if (!txs.ok) return txs;

    const landed: string[] = [];
    for (const [i, unsigned] of txs.value.entries()) {
      if (txs.value.length > 1) logger.info(`  📦 Raydium transaction ${i + 1}/${txs.value.length}`);
      const sent = await this.sender.send(unsigned, this.name, { skipPreflight: true });
      if (!sent.ok) {
        if (landed.length === 0) return sent;
        const { kind, reason } = sent.failure;
        return fail(kind, `${reason}; already landed: ${landed.join(", ")}`, this.name);
      }
      landed.push(sent.value);
    }
    return ok({ signature: landed[landed.length - 1], venue: this.name });
  }

  /** Route descriptor, passed back verbatim to the transaction endpoint */
  private async fetchQuote(amount: number): Promise<Result<unknown>> {
    try {
      const res = await this.api.get<unknown>(`${this.config.baseUrl}/compute/swap-base-in`, {
        params: {
          inputMint: SOL_MINT,
          outputMint: this.config.tokenMint,
          amount,
          slippageBps: this.config.slippageBps,
          txVersion: "V0",
        },
      });
      const envelope = readEnvelope(res.data);
      if (!envelope.success || !isRecord(envelope.data)) {
        return fail("QUOTE_UNAVAILABLE", envelope.msg ?? "no route", this.name);
      }
      return ok(res.data);
    } catch (error: unknown) {
      return fail("QUOTE_UNAVAILABLE", describeError(error), this.name);
    }
  }

  private async fetchTransactions(swapResponse: unknown): Promise<Result<Uint8Array[]>> {
    let envelope: RaydiumEnvelope;
    try {
      const res = await this.api.post<unknown>(`${this.config.baseUrl}/transaction/swap-base-in`, {
        computeUnitPriceMicroLamports: String(this.config.computeUnitPriceMicroLamports),
        swapResponse,
        txVersion: "V0",
        wallet: this.sender.publicKey,
        wrapSol: true,
        unwrapSol: false,
      });
      envelope = readEnvelope(res.data);
    } catch (error: unknown) {
      return fail("SWAP_BUILD_FAILURE", describeError(error), this.name);
    }

    if (!envelope.success || !Array.isArray(envelope.data)) {
      return fail("SWAP_BUILD_FAILURE", envelope.msg ?? "no transactions returned", this.name);
    }

    const txs = envelope.data
      .map((entry: unknown) => (isRecord(entry) && typeof entry.transaction === "string" ? entry.transaction : ""))
      .filter((b64) => b64.length > 0)
      .map((b64) => new Uint8Array(Buffer.from(b64, "base64")));

    if (txs.length === 0) return fail("SWAP_BUILD_FAILURE", "no transactions returned", this.name);
    return ok(txs);
  }
}
