/**
 * ATH Dip Buyback Agent
 *
 * Watches one pump.fun token's price in SOL, tracks its all-time high, and
 * when price falls DIP_THRESHOLD below the ATH spends BUYBACK_PERCENT of the
 * wallet's spare SOL buying the token back (pump.fun bonding curve first,
 * Raydium if that fails). After a successful buyback the ATH resets to the
 * price that triggered it.
 *
 * Usage: npm start (config.json + .env, see config.example.json)
 */

import * as dotenv from "dotenv";
import { ConfigError, loadConfig } from "./config/loader.js";
import type { BuybackConfig } from "./types/index.js";
import { BuybackOrchestrator } from "./services/buyback-orchestrator.js";
import { startHeartbeat } from "./services/heartbeat.js";
import { describeError, logger } from "./services/logger.js";
import { CompositePriceSource, DexScreenerPriceFeed, JupiterPriceFeed } from "./services/price-feed.js";
import { KeypairSigner } from "./services/signer.js";
import { SolanaChainClient, walletBalanceSource } from "./services/solana-chain.js";
import { DryRunSwapExecutor, FallbackSwapExecutor, type SwapExecutor } from "./services/swap-executor.js";
import { TransactionSender } from "./services/transaction-sender.js";
import { PumpPortalVenue } from "./services/venues/pumpportal.js";
import { RaydiumVenue } from "./services/venues/raydium.js";

dotenv.config();

// ============================================================================
// GLOBAL ERROR HANDLERS: log and keep polling
// ============================================================================
process.on("unhandledRejection", (reason: unknown) => {
  logger.error(`[Unhandled Rejection] ${describeError(reason)}`);
});

process.on("uncaughtException", (error: Error) => {
  logger.error(`[Uncaught Exception] ${describeError(error)}`);
});

function displayBanner(config: BuybackConfig, wallet: string): void {
  console.log(`
╔══════════════════════════════════════════════════════╗
║          ATH DIP BUYBACK AGENT                       ║
╠══════════════════════════════════════════════════════╣
║  Token:     ${config.tokenMint.slice(0, 20)}...
║  Wallet:    ${wallet.slice(0, 20)}...
║  Threshold: ${(config.dipThreshold * 100).toFixed(1)}% dip from ATH
║  Buyback:   ${(config.buybackPercent * 100).toFixed(1)}% of spare SOL (reserve ${config.minSolBalance} SOL)
║  Slippage:  ${config.slippageBps / 100}%
║  Interval:  ${config.pollIntervalSec}s
║  Mode:      ${config.tradingEnabled ? "LIVE" : "DRY RUN"}
╚══════════════════════════════════════════════════════╝
`);
}

async function main(): Promise<void> {
  let config: BuybackConfig;
  try {
    config = loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  let signer: KeypairSigner;
  try {
    signer = KeypairSigner.fromSecret(config.walletPrivateKey);
  } catch (error: unknown) {
    console.error(`❌ DEV_WALLET_PRIVATE_KEY is not a valid Solana secret key: ${describeError(error)}`);
    process.exit(1);
  }

  const chain = new SolanaChainClient(config.rpcUrl, config.requestTimeoutMs);
  const prices = new CompositePriceSource([
    new JupiterPriceFeed({ url: config.endpoints.jupiterPrice, timeoutMs: config.requestTimeoutMs }),
    new DexScreenerPriceFeed({ url: config.endpoints.dexScreener, timeoutMs: config.requestTimeoutMs }),
  ]);
  const balance = walletBalanceSource(chain, signer.publicKey);

  let swaps: SwapExecutor;
  if (config.tradingEnabled) {
    const sender = new TransactionSender(chain, signer, config.confirmation);
    swaps = new FallbackSwapExecutor([
      new PumpPortalVenue(
        {
          baseUrl: config.endpoints.pumpPortal,
          tokenMint: config.tokenMint,
          slippageBps: config.slippageBps,
          priorityFeeSol: config.priorityFeeSol,
          timeoutMs: config.swapTimeoutMs,
        },
        sender,
      ),
      new RaydiumVenue(
        {
          baseUrl: config.endpoints.raydium,
          tokenMint: config.tokenMint,
          slippageBps: config.slippageBps,
          computeUnitPriceMicroLamports: config.computeUnitPriceMicroLamports,
          timeoutMs: config.swapTimeoutMs,
        },
        sender,
      ),
    ]);
  } else {
    swaps = new DryRunSwapExecutor();
  }

  displayBanner(config, signer.publicKey);

  const initial = await balance.getBalance();
  if (initial.ok) {
    logger.info(`Wallet balance: ${initial.value.toFixed(4)} SOL`);
  } else {
    logger.warn(`Balance check failed: ${initial.failure.reason}`);
  }

  const orchestrator = new BuybackOrchestrator({ config, prices, balance, swaps });
  const heartbeat = startHeartbeat(() => orchestrator.getState());

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Stopped (${signal}).`);
    orchestrator.stop();
    heartbeat.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  logger.info("Monitoring price...");
  logger.info("");
  await orchestrator.run();
}

main().catch((err: unknown) => {
  console.error("Fatal error:", describeError(err));
  process.exit(1);
});
