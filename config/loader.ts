/**
 * Configuration loading.
 *
 * Base values come from a JSON file (snake_case keys, `config.json` by default),
 * environment variables override them, and the merged set is validated once at
 * startup. The result is frozen; nothing reconfigures the agent at runtime.
 */

import * as fs from "fs";
import { z } from "zod";
import {
  DEFAULT_COMPUTE_UNIT_PRICE_MICRO_LAMPORTS,
  DEFAULT_CONFIRMATION,
  DEFAULT_DIP_LOG_THRESHOLD,
  DEFAULT_ENDPOINTS,
  DEFAULT_EXPLORER_TX_URL,
  DEFAULT_PRIORITY_FEE_SOL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RPC_URL,
  DEFAULT_SLIPPAGE_BPS,
  DEFAULT_SWAP_TIMEOUT_MS,
} from "./constants.js";
import type { BuybackConfig } from "../types/index.js";

export const DEFAULT_CONFIG_PATH = "config.json";

/** Config file key → environment variable that overrides it */
const ENV_OVERRIDES = {
  token_mint: "TOKEN_MINT",
  rpc_url: "RPC_URL",
  dip_threshold: "DIP_THRESHOLD",
  buyback_percent: "BUYBACK_PERCENT",
  min_sol_balance: "MIN_SOL_BALANCE",
  poll_interval: "POLL_INTERVAL_SECONDS",
  slippage_bps: "SLIPPAGE_BPS",
  priority_fee_sol: "PRIORITY_FEE_SOL",
  compute_unit_price_micro_lamports: "COMPUTE_UNIT_PRICE_MICRO_LAMPORTS",
  dev_wallet_private_key: "DEV_WALLET_PRIVATE_KEY",
  trading_enabled: "TRADING_ENABLED",
  dip_log_threshold: "DIP_LOG_THRESHOLD",
  confirm_attempts: "CONFIRM_ATTEMPTS",
  confirm_interval_ms: "CONFIRM_INTERVAL_MS",
  request_timeout_ms: "REQUEST_TIMEOUT_MS",
  swap_timeout_ms: "SWAP_TIMEOUT_MS",
  explorer_tx_url: "EXPLORER_TX_URL",
  jupiter_price_url: "JUPITER_PRICE_URL",
  dexscreener_url: "DEXSCREENER_URL",
  pumpportal_url: "PUMPPORTAL_URL",
  raydium_url: "RAYDIUM_URL",
} as const;

const flag = z
  .union([z.boolean(), z.enum(["true", "false"]).transform((v) => v === "true")])
  .default(true);

/**
 * Numbers from JSON stay numbers; only strings (env values, quoted JSON) are
 * parsed. `null`, booleans and blank strings are rejected instead of being
 * turned into 0 or 1.
 */
const numeric = (schema: z.ZodNumber) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v), schema);

const ConfigSchema = z.object({
  token_mint: z.string().min(32, "must be a base58 mint address"),
  rpc_url: z.string().url().default(DEFAULT_RPC_URL),
  dip_threshold: numeric(z.number().gt(0).lt(1)),
  buyback_percent: numeric(z.number().gt(0).lte(1)),
  min_sol_balance: numeric(z.number().nonnegative()),
  poll_interval: numeric(z.number().positive()),
  slippage_bps: numeric(z.number().int().min(0).max(10_000)).default(DEFAULT_SLIPPAGE_BPS),
  priority_fee_sol: numeric(z.number().nonnegative()).default(DEFAULT_PRIORITY_FEE_SOL),
  compute_unit_price_micro_lamports: numeric(z.number().int().nonnegative()).default(
    DEFAULT_COMPUTE_UNIT_PRICE_MICRO_LAMPORTS,
  ),
  dev_wallet_private_key: z.string().min(1, "is required"),
  trading_enabled: flag,
  dip_log_threshold: numeric(z.number().min(0).lte(1)).default(DEFAULT_DIP_LOG_THRESHOLD),
  confirm_attempts: numeric(z.number().int().positive()).default(DEFAULT_CONFIRMATION.attempts),
  confirm_interval_ms: numeric(z.number().int().nonnegative()).default(DEFAULT_CONFIRMATION.intervalMs),
  request_timeout_ms: numeric(z.number().int().positive()).default(DEFAULT_REQUEST_TIMEOUT_MS),
  swap_timeout_ms: numeric(z.number().int().positive()).default(DEFAULT_SWAP_TIMEOUT_MS),
  explorer_tx_url: z.string().url().default(DEFAULT_EXPLORER_TX_URL),
  jupiter_price_url: z.string().url().default(DEFAULT_ENDPOINTS.jupiterPrice),
  dexscreener_url: z.string().url().default(DEFAULT_ENDPOINTS.dexScreener),
  pumpportal_url: z.string().url().default(DEFAULT_ENDPOINTS.pumpPortal),
  raydium_url: z.string().url().default(DEFAULT_ENDPOINTS.raydium),
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Merge file values with environment overrides. Empty env values are ignored
 * so a blank line in `.env` does not wipe a value from the file.
 */
export function mergeSources(
  fileValues: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...fileValues };
  for (const [key, envName] of Object.entries(ENV_OVERRIDES)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== "") merged[key] = value.trim();
  }
  return merged;
}

export function parseConfig(
  fileValues: Record<string, unknown>,
  env: NodeJS.ProcessEnv = {},
): BuybackConfig {
  const parsed = ConfigSchema.safeParse(mergeSources(fileValues, env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const c = parsed.data;

  return Object.freeze({
    tokenMint: c.token_mint,
    rpcUrl: c.rpc_url,
    dipThreshold: c.dip_threshold,
    buybackPercent: c.buyback_percent,
    minSolBalance: c.min_sol_balance,
    pollIntervalSec: c.poll_interval,
    slippageBps: c.slippage_bps,
    priorityFeeSol: c.priority_fee_sol,
    computeUnitPriceMicroLamports: c.compute_unit_price_micro_lamports,
    walletPrivateKey: c.dev_wallet_private_key,
    tradingEnabled: c.trading_enabled,
    dipLogThreshold: c.dip_log_threshold,
    confirmation: Object.freeze({ attempts: c.confirm_attempts, intervalMs: c.confirm_interval_ms }),
    requestTimeoutMs: c.request_timeout_ms,
    swapTimeoutMs: c.swap_timeout_ms,
    explorerTxUrl: c.explorer_tx_url,
    endpoints: Object.freeze({
      jupiterPrice: c.jupiter_price_url,
      dexScreener: c.dexscreener_url,
      pumpPortal: c.pumpportal_url,
      raydium: c.raydium_url,
    }),
  });
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!fs.existsSync(path)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${path}: ${msg}`]);
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError([`${path}: expected a JSON object`]);
  }
  return Object.fromEntries(Object.entries(raw));
}

/**
 * Load the config file named by CONFIG_PATH (default `config.json`) and apply
 * environment overrides. A missing file is fine when env supplies everything.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BuybackConfig {
  const path = env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  return parseConfig(readConfigFile(path), env);
}
