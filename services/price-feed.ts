/**
 * Price Feeds
 *
 * Token price in SOL from Jupiter's price API, with DexScreener as the
 * fallback source. Both are free and need no auth. A feed that answers with
 * a missing, zero or non-numeric price counts as unavailable.
 */

import axios, { type AxiosInstance } from "axios";
import { SOL_MINT } from "../config/constants.js";
import { fail, ok, type Result } from "../types/index.js";
import { describeError, logger } from "./logger.js";

// ============================================================================
// TYPES
// ============================================================================

export interface PriceSource {
  readonly name: string;
  getPrice(mint: string): Promise<Result<number>>;
}

export interface PriceFeedOptions {
  url: string;
  timeoutMs: number;
  /** Pre-built client; tests pass one with an in-process adapter */
  http?: AxiosInstance;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/** Accepts numbers and numeric strings ("0.0000123"); anything else is null */
export function parsePositivePrice(value: unknown): number | null {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isFinite(n) && n > 0 ? n : null;
}

// ============================================================================
// JUPITER
// ============================================================================

/**
 * `GET ?ids=<mint>&vsToken=<SOL>` → `{ data: { [mint]: { price } | null } }`
 */
export class JupiterPriceFeed implements PriceSource {
  readonly name = "jupiter";
  private api: AxiosInstance;

  constructor(private readonly options: PriceFeedOptions) {
    this.api = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async getPrice(mint: string): Promise<Result<number>> {
    try {
      const res = await this.api.get<unknown>(this.options.url, {
        params: { ids: mint, vsToken: SOL_MINT },
      });
      const data = isRecord(res.data) ? res.data.data : undefined;
      const entry = isRecord(data) ? data[mint] : undefined;
      const price = isRecord(entry) ? parsePositivePrice(entry.price) : null;
      if (price === null) return fail("TRANSIENT_FETCH_FAILURE", `jupiter: no price for ${mint}`);
      return ok(price);
    } catch (error: unknown) {
      return fail("TRANSIENT_FETCH_FAILURE", `jupiter: ${describeError(error)}`);
    }
  }
}

// ============================================================================
// DEXSCREENER
// ============================================================================

/**
 * `GET /latest/dex/tokens/<mint>` → `{ pairs: [{ priceNative, quoteToken }] }`.
 * Only pairs quoted in SOL count; a price in any other quote asset is a
 * different unit from Jupiter's and is reported as unavailable.
 */
export class DexScreenerPriceFeed implements PriceSource {
  readonly name = "dexscreener";
  private api: AxiosInstance;

  constructor(private readonly options: PriceFeedOptions) {
    this.api = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async getPrice(mint: string): Promise<Result<number>> {
    try {
      const res = await this.api.get<unknown>(`${this.options.url}/latest/dex/tokens/${mint}`);
      const pairs = isRecord(res.data) && Array.isArray(res.data.pairs) ? res.data.pairs.filter(isRecord) : [];
      if (pairs.length === 0) return fail("TRANSIENT_FETCH_FAILURE", `dexscreener: no pairs for ${mint}`);

      const solPair = pairs.find((p) => isRecord(p.quoteToken) && p.quoteToken.address === SOL_MINT);
      if (!solPair) return fail("TRANSIENT_FETCH_FAILURE", `dexscreener: no SOL-quoted pair for ${mint}`);
      const price = parsePositivePrice(solPair.priceNative);
      if (price === null) return fail("TRANSIENT_FETCH_FAILURE", `dexscreener: no priceNative for ${mint}`);
      return ok(price);
    } catch (error: unknown) {
      return fail("TRANSIENT_FETCH_FAILURE", `dexscreener: ${describeError(error)}`);
    }
  }
}

// ============================================================================
// COMPOSITE
// ============================================================================

/** First source with a usable price wins; sources are asked in order. */
export class CompositePriceSource implements PriceSource {
  readonly name: string;

  constructor(private readonly sources: PriceSource[]) {
    this.name = sources.map((s) => s.name).join("+");
  }

  async getPrice(mint: string): Promise<Result<number>> {
    const reasons: string[] = [];
    for (const source of this.sources) {
      const result = await source.getPrice(mint);
      if (result.ok) return result;
      reasons.push(result.failure.reason);
      logger.warn(`Price source ${source.name} unavailable: ${result.failure.reason}`);
    }
    return fail("TRANSIENT_FETCH_FAILURE", reasons.length ? reasons.join("; ") : "no price sources configured");
  }
}
