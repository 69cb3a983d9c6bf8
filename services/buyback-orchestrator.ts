/**
 * Buyback Orchestrator
 *
 * One cycle: price → dip detector → (on trigger) balance → spend → swap →
 * ATH reset. Cycles run back to back with a poll-interval sleep between them.
 * Every collaborator failure skips the rest of the cycle; only stop() ends
 * the loop.
 */

import type { BuybackConfig, CycleReport, Observation, Result, TrackerState } from "../types/index.js";
import { fail, ok } from "../types/index.js";
import { observePrice, resetAth, shouldLogDip } from "../strategies/ath-dip.js";
import { describeError, fmtPct, fmtPrice, logger } from "./logger.js";
import type { PriceSource } from "./price-feed.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";
import type { BalanceSource } from "./solana-chain.js";
import type { SwapExecutor } from "./swap-executor.js";

export type OrchestratorConfig = Pick<
  BuybackConfig,
  | "tokenMint"
  | "dipThreshold"
  | "buybackPercent"
  | "minSolBalance"
  | "pollIntervalSec"
  | "dipLogThreshold"
  | "explorerTxUrl"
>;

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  prices: PriceSource;
  balance: BalanceSource;
  swaps: SwapExecutor;
  sleep?: Sleep;
}

const RULE = "=".repeat(50);

/**
 * SOL to spend: `(balance - reserve) * fraction`. Nothing is spent when the
 * balance does not exceed the reserve.
 */
export function computeSpend(balanceSol: number, reserveSol: number, fraction: number): Result<number> {
  const available = balanceSol - reserveSol;
  if (available <= 0) {
    return fail(
      "INSUFFICIENT_FUNDS",
      `balance ${balanceSol.toFixed(4)} SOL does not exceed reserve ${reserveSol.toFixed(4)} SOL`,
    );
  }
  return ok(available * fraction);
}

export class BuybackOrchestrator {
  private readonly state: TrackerState = {
    ath: 0,
    lastPrice: null,
    cycles: 0,
    buybacks: 0,
    failedBuybacks: 0,
    lastBuybackAt: null,
  };
  private running = false;
  private abort: AbortController | null = null;
  private readonly sleep: Sleep;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  getState(): Readonly<TrackerState> {
    return { ...this.state };
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Poll until stop(). The sleep between cycles is cut short by stop(), so
   * shutdown never waits a full interval.
   */
  async run(): Promise<void> {
    this.running = true;
    while (this.running) {
      try {
        await this.runCycle();
      } catch (error: unknown) {
        logger.error(`Cycle error: ${describeError(error)}`);
      }
      if (!this.running) break;

      this.abort = new AbortController();
      await this.sleep(this.deps.config.pollIntervalSec * 1000, this.abort.signal);
      this.abort = null;
    }
  }

  stop(): void {
    this.running = false;
    this.abort?.abort();
  }

  async runCycle(): Promise<CycleReport> {
    const { config, prices } = this.deps;
    this.state.cycles++;

    const priceResult = await prices.getPrice(config.tokenMint);
    if (!priceResult.ok) {
      logger.warn(`Could not fetch price, retrying next poll (${priceResult.failure.reason})`);
      return { status: "PRICE_UNAVAILABLE", failure: priceResult.failure };
    }

    const prevAth = this.state.ath;
    const observation = observePrice(prevAth, priceResult.value, config.dipThreshold);
    this.state.ath = observation.nextAth;
    this.state.lastPrice = observation.price;
    this.logObservation(prevAth, observation);

    if (!observation.triggered) return { status: "OBSERVED", observation };
    return this.buyback(observation);
  }

  private async buyback(observation: Observation): Promise<CycleReport> {
    const { config, balance, swaps } = this.deps;

    logger.info("");
    logger.info(RULE);
    logger.info(`🎯 TRIGGER: -${fmtPct(observation.dipFraction ?? 0)} from ATH`);
    logger.info(RULE);

    try {
      const balanceResult = await balance.getBalance();
      if (!balanceResult.ok) {
        logger.error(`Could not get balance: ${balanceResult.failure.reason}`);
        return { status: "BUYBACK_SKIPPED", observation, failure: balanceResult.failure };
      }

      const spend = computeSpend(balanceResult.value, config.minSolBalance, config.buybackPercent);
      if (!spend.ok) {
        logger.error(`Insufficient balance: ${spend.failure.reason}`);
        return { status: "BUYBACK_SKIPPED", observation, failure: spend.failure };
      }

      const spendSol = spend.value;
      logger.info(`💰 Balance: ${balanceResult.value.toFixed(4)} SOL`);
      logger.info(`🛒 Buyback: ${spendSol.toFixed(4)} SOL (${fmtPct(config.buybackPercent, 0)} of spare balance)`);

      const swap = await swaps.execute({ spendSol });
      if (!swap.ok) {
        this.state.failedBuybacks++;
        logger.error(
          `Buyback failed [${swap.failure.kind}] ${swap.failure.reason}; ATH stays at ${fmtPrice(this.state.ath)}`,
        );
        return { status: "BUYBACK_FAILED", observation, spendSol, failure: swap.failure };
      }

      this.state.ath = resetAth(observation.price);
      this.state.buybacks++;
      this.state.lastBuybackAt = new Date().toISOString();
      logger.info(`✅ BUYBACK COMPLETE via ${swap.value.venue}`);
      if (swap.value.venue !== "dry-run") logger.info(`🔗 ${config.explorerTxUrl}${swap.value.signature}`);
      logger.info(`ATH reset to ${fmtPrice(this.state.ath)}`);
      return { status: "BUYBACK_COMPLETE", observation, spendSol, receipt: swap.value };
    } finally {
      logger.info(RULE);
      logger.info("");
    }
  }

  private logObservation(prevAth: number, o: Observation): void {
    const price = fmtPrice(o.price);
    if (o.isInitial) {
      logger.info(`PRICE ${price} | ATH set`);
      return;
    }
    if (o.isNewAth) {
      logger.info(`PRICE ${price} | ATH ${fmtPrice(prevAth)} | 🚀 NEW HIGH`);
      return;
    }
    logger.info(`PRICE ${price} | ATH ${fmtPrice(o.nextAth)} | -${fmtPct(o.dipFraction ?? 0)}`);
    if (shouldLogDip(o.dipFraction, this.deps.config.dipLogThreshold)) {
      logger.info(
        `🔍 DIP CHECK: ${fmtPct(o.dipFraction ?? 0, 2)} >= ${fmtPct(this.deps.config.dipThreshold)}? ${o.triggered}`,
      );
    }
  }
}
