import { describe, it, expect, vi, beforeEach } from "vitest";
import { BuybackOrchestrator, computeSpend, type OrchestratorConfig } from "../services/buyback-orchestrator.js";
import type { PriceSource } from "../services/price-feed.js";
import { walletBalanceSource, type BalanceSource } from "../services/solana-chain.js";
import { DryRunSwapExecutor, FallbackSwapExecutor, type SwapExecutor } from "../services/swap-executor.js";
import { TransactionSender } from "../services/transaction-sender.js";
import { PumpPortalVenue } from "../services/venues/pumpportal.js";
import { RaydiumVenue } from "../services/venues/raydium.js";
import { fail, ok, type CycleReport, type Result, type SwapReceipt } from "../types/index.js";
import { FakeChain, StubSigner, TEST_WALLET, fakeHttp, noSleep, txBytes } from "./helpers/fakes.js";

const MINT = "TokenMint111111111111111111111111111111111";

const config: OrchestratorConfig = {
  tokenMint: MINT,
  dipThreshold: 0.25,
  buybackPercent: 0.9,
  minSolBalance: 0.01,
  pollIntervalSec: 5,
  dipLogThreshold: 0.15,
  explorerTxUrl: "https://solscan.io/tx/",
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

/** Prices in order; `null` is an unavailable feed. The last entry repeats. */
function scriptedPrices(seq: Array<number | null>): PriceSource & { calls: number } {
  return {
    name: "scripted",
    calls: 0,
    async getPrice() {
      const price = seq[Math.min(this.calls++, seq.length - 1)];
      return price === null ? fail("TRANSIENT_FETCH_FAILURE", "feed down") : ok(price);
    },
  };
}

function fixedBalance(result: Result<number>): BalanceSource & { calls: number } {
  return {
    calls: 0,
    async getBalance() {
      this.calls++;
      return result;
    },
  };
}

function recordingSwaps(outcome: Result<SwapReceipt>): SwapExecutor & { spends: number[] } {
  const spends: number[] = [];
  return {
    spends,
    async execute({ spendSol }) {
      spends.push(spendSol);
      return outcome;
    },
  };
}

const success = ok<SwapReceipt>({ signature: "5igTest", venue: "pumpportal" });

async function cycles(orchestrator: BuybackOrchestrator, n: number): Promise<CycleReport[]> {
  const reports: CycleReport[] = [];
  for (let i = 0; i < n; i++) reports.push(await orchestrator.runCycle());
  return reports;
}

// ============================================================================
// SPEND
// ============================================================================

describe("computeSpend", () => {
  it("spends the configured fraction of the balance above the reserve", () => {
    expect(computeSpend(1.0, 0.01, 0.9)).toEqual(ok(0.891));
    expect(computeSpend(2, 0.5, 0.5)).toEqual(ok(0.75));
  });

  it("refuses when the balance does not exceed the reserve", () => {
    expect(computeSpend(0.01, 0.01, 0.9)).toEqual(
      fail("INSUFFICIENT_FUNDS", "balance 0.0100 SOL does not exceed reserve 0.0100 SOL"),
    );
    expect(computeSpend(0, 0.01, 0.9).ok).toBe(false);
  });
});

// ============================================================================
// CYCLES
// ============================================================================

describe("BuybackOrchestrator.runCycle", () => {
  it("seeds, raises and holds the ATH without buying", async () => {
    const swaps = recordingSwaps(success);
    const balance = fixedBalance(ok(1));
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([10, 12, 9.5, 12]),
      balance,
      swaps,
    });

    const reports = await cycles(orchestrator, 4);

    expect(reports.map((r) => r.status)).toEqual(["OBSERVED", "OBSERVED", "OBSERVED", "OBSERVED"]);
    expect(orchestrator.getState().ath).toBe(12);
    expect(orchestrator.getState().lastPrice).toBe(12);
    expect(balance.calls).toBe(0);
    expect(swaps.spends).toEqual([]);
  });

  it("skips a cycle without touching state when the price is unavailable", async () => {
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([10, null]),
      balance: fixedBalance(ok(1)),
      swaps: recordingSwaps(success),
    });

    await orchestrator.runCycle();
    const report = await orchestrator.runCycle();

    expect(report).toEqual({ status: "PRICE_UNAVAILABLE", failure: { kind: "TRANSIENT_FETCH_FAILURE", reason: "feed down" } });
    expect(orchestrator.getState().ath).toBe(10);
    expect(orchestrator.getState().lastPrice).toBe(10);
    expect(orchestrator.getState().cycles).toBe(2);
  });

  it("buys on a dip and resets the ATH to the triggering price", async () => {
    const swaps = recordingSwaps(success);
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([10, 12, 9]),
      balance: fixedBalance(ok(1.0)),
      swaps,
    });

    const [, , report] = await cycles(orchestrator, 3);

    expect(report.status).toBe("BUYBACK_COMPLETE");
    if (report.status === "BUYBACK_COMPLETE") {
      expect(report.spendSol).toBe(0.891);
      expect(report.receipt).toEqual({ signature: "5igTest", venue: "pumpportal" });
      expect(report.observation.dipFraction).toBe(0.25);
    }
    expect(swaps.spends).toEqual([0.891]);
    expect(orchestrator.getState().ath).toBe(9);
    expect(orchestrator.getState().buybacks).toBe(1);
    expect(orchestrator.getState().lastBuybackAt).not.toBeNull();
  });

  it("does not re-trigger on residual volatility after a buyback", async () => {
    const swaps = recordingSwaps(success);
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([12, 9, 9, 8, 7.5]),
      balance: fixedBalance(ok(1)),
      swaps,
    });

    const reports = await cycles(orchestrator, 5);

    expect(reports.map((r) => r.status)).toEqual([
      "OBSERVED",
      "BUYBACK_COMPLETE",
      "OBSERVED",
      "OBSERVED",
      "OBSERVED",
    ]);
    expect(swaps.spends).toHaveLength(1);
  });

  it("leaves the ATH alone when the swap fails so the dip re-triggers", async () => {
    const swaps = recordingSwaps(fail("QUOTE_UNAVAILABLE", "ROUTE_NOT_FOUND", "raydium"));
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([12, 9]),
      balance: fixedBalance(ok(1)),
      swaps,
    });

    const reports = await cycles(orchestrator, 3);

    expect(reports.map((r) => r.status)).toEqual(["OBSERVED", "BUYBACK_FAILED", "BUYBACK_FAILED"]);
    expect(orchestrator.getState().ath).toBe(12);
    expect(orchestrator.getState().failedBuybacks).toBe(2);
    expect(swaps.spends).toEqual([0.891, 0.891]);
  });

  it("aborts the buyback when the balance cannot be read", async () => {
    const swaps = recordingSwaps(success);
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([12, 9]),
      balance: fixedBalance(fail("TRANSIENT_FETCH_FAILURE", "balance: rpc down")),
      swaps,
    });

    const [, report] = await cycles(orchestrator, 2);

    expect(report.status).toBe("BUYBACK_SKIPPED");
    if (report.status === "BUYBACK_SKIPPED") expect(report.failure.kind).toBe("TRANSIENT_FETCH_FAILURE");
    expect(swaps.spends).toEqual([]);
    expect(orchestrator.getState().ath).toBe(12);
  });

  it("aborts the buyback when only the reserve is left", async () => {
    const swaps = recordingSwaps(success);
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([12, 9]),
      balance: fixedBalance(ok(0.005)),
      swaps,
    });

    const [, report] = await cycles(orchestrator, 2);

    expect(report.status).toBe("BUYBACK_SKIPPED");
    if (report.status === "BUYBACK_SKIPPED") expect(report.failure.kind).toBe("INSUFFICIENT_FUNDS");
    expect(swaps.spends).toEqual([]);
  });

  it("resets the ATH after a dry-run buyback", async () => {
    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([12, 9]),
      balance: fixedBalance(ok(1)),
      swaps: new DryRunSwapExecutor(),
    });

    const [, report] = await cycles(orchestrator, 2);

    expect(report.status).toBe("BUYBACK_COMPLETE");
    expect(orchestrator.getState().ath).toBe(9);
  });
});

// ============================================================================
// END TO END: bonding curve times out, AMM lands
// ============================================================================

describe("venue fallback end to end", () => {
  it("falls back to Raydium when pump.fun never confirms and resets the ATH", async () => {
    const chain = new FakeChain();
    chain.balance = ok(1.0);
    // sig-1 (pump.fun) stays pending forever; sig-2 (Raydium) confirms
    chain.statuses["sig-2"] = [ok({ status: "CONFIRMED" })];
    const sender = new TransactionSender(chain, new StubSigner(), { attempts: 30, intervalMs: 1000 }, noSleep);

    const pump = fakeHttp(() => ({ status: 200, data: txBytes(1) }));
    const raydium = fakeHttp((req) =>
      req.method === "GET"
        ? { status: 200, data: { success: true, data: { outputAmount: "1" } } }
        : {
            status: 200,
            data: { success: true, data: [{ transaction: Buffer.from(txBytes(2)).toString("base64") }] },
          },
    );

    const swaps = new FallbackSwapExecutor([
      new PumpPortalVenue(
        { baseUrl: "https://pump.test", tokenMint: MINT, slippageBps: 100, priorityFeeSol: 0.005, timeoutMs: 1000 },
        sender,
        pump.http,
      ),
      new RaydiumVenue(
        {
          baseUrl: "https://raydium.test",
          tokenMint: MINT,
          slippageBps: 100,
          computeUnitPriceMicroLamports: 100_000,
          timeoutMs: 1000,
        },
        sender,
        raydium.http,
      ),
    ]);

    const orchestrator = new BuybackOrchestrator({
      config,
      prices: scriptedPrices([10, 12, 9]),
      balance: walletBalanceSource(chain, TEST_WALLET),
      swaps,
    });

    const [, , report] = await cycles(orchestrator, 3);

    expect(report).toMatchObject({
      status: "BUYBACK_COMPLETE",
      spendSol: 0.891,
      receipt: { signature: "sig-2", venue: "raydium" },
    });
    expect(chain.statusPolls).toBe(31);
    expect(chain.submitted.map((s) => s.options.skipPreflight)).toEqual([false, true]);
    expect(pump.requests[0].body).toMatchObject({ amount: 0.891 });
    expect(raydium.requests[0].params).toMatchObject({ amount: 891_000_000 });
    expect(orchestrator.getState().ath).toBe(9);
  });
});

// ============================================================================
// LOOP
// ============================================================================

describe("BuybackOrchestrator.run", () => {
  it("sleeps the poll interval between cycles and stops cleanly", async () => {
    const sleeps: number[] = [];
    let orchestrator: BuybackOrchestrator | null = null;
    const prices: PriceSource = {
      name: "stopper",
      async getPrice() {
        if (orchestrator && orchestrator.getState().cycles >= 3) orchestrator.stop();
        return ok(1);
      },
    };
    orchestrator = new BuybackOrchestrator({
      config,
      prices,
      balance: fixedBalance(ok(1)),
      swaps: recordingSwaps(success),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    await orchestrator.run();

    expect(orchestrator.getState().cycles).toBe(3);
    expect(sleeps).toEqual([5000, 5000]);
    expect(orchestrator.isRunning()).toBe(false);
  });

  it("keeps polling after a cycle throws", async () => {
    let calls = 0;
    let orchestrator: BuybackOrchestrator | null = null;
    const prices: PriceSource = {
      name: "flaky",
      async getPrice() {
        calls++;
        if (calls === 1) throw new Error("socket hang up");
        orchestrator?.stop();
        return ok(2);
      },
    };
    orchestrator = new BuybackOrchestrator({
      config,
      prices,
      balance: fixedBalance(ok(1)),
      swaps: recordingSwaps(success),
      sleep: noSleep,
    });

    await orchestrator.run();

    expect(calls).toBe(2);
    expect(orchestrator.getState().ath).toBe(2);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Cycle error: socket hang up"));
  });

  it("cuts the inter-cycle sleep short on stop()", async () => {
    const orchestrator = new BuybackOrchestrator({
      config: { ...config, pollIntervalSec: 3600 },
      prices: scriptedPrices([1]),
      balance: fixedBalance(ok(1)),
      swaps: recordingSwaps(success),
    });

    const running = orchestrator.run();
    await new Promise((resolve) => setImmediate(resolve));
    orchestrator.stop();
    await running;

    expect(orchestrator.getState().cycles).toBe(1);
  });
});
