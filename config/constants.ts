/**
 * ATH Dip Buyback Agent — Shared Constants
 */

// ============================================================================
// SOLANA
// ============================================================================

/** Wrapped SOL mint, used as the quote asset everywhere */
export const SOL_MINT = "So11111111111111111111111111111111111111112";

export const LAMPORTS_PER_SOL = 1_000_000_000;

export const DEFAULT_RPC_URL = "https://api.mainnet-beta.solana.com";

// ============================================================================
// STRATEGY DEFAULTS
// ============================================================================

export const DEFAULT_SLIPPAGE_BPS = 100; // 1%

export const DEFAULT_PRIORITY_FEE_SOL = 0.005;

export const DEFAULT_COMPUTE_UNIT_PRICE_MICRO_LAMPORTS = 100_000;

/** Dips at or above 15% are logged even when below the trigger */
export const DEFAULT_DIP_LOG_THRESHOLD = 0.15;

// ============================================================================
// TIMEOUTS & CONFIRMATION
// ============================================================================

/** Price and balance requests */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

/** Swap transaction building requests */
export const DEFAULT_SWAP_TIMEOUT_MS = 30_000;

/** 30 one-second polls before a submitted transaction counts as dropped */
export const DEFAULT_CONFIRMATION = {
  attempts: 30,
  intervalMs: 1000,
} as const;

/** PumpPortal answers errors with short JSON bodies; real transactions are larger */
export const MIN_TRANSACTION_BYTES = 100;

// ============================================================================
// ENDPOINTS
// ============================================================================

export const DEFAULT_ENDPOINTS = {
  jupiterPrice: "https://api.jup.ag/price/v2",
  dexScreener: "https://api.dexscreener.com",
  pumpPortal: "https://pumpportal.fun",
  raydium: "https://transaction-v1.raydium.io",
} as const;

export const DEFAULT_EXPLORER_TX_URL = "https://solscan.io/tx/";

// ============================================================================
// HEARTBEAT
// ============================================================================

/** Liveness line every 5 minutes */
export const HEARTBEAT_CRON = "*/5 * * * *";
