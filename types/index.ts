/**
 * ATH Dip Buyback Agent — Shared Type Definitions
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ConfirmationPolicy {
  /** Number of status polls before giving up */
  attempts: number;
  /** Delay between polls (ms) */
  intervalMs: number;
}

export interface BuybackConfig {
  tokenMint: string;
  rpcUrl: string;
  /** Fraction below ATH that triggers a buyback (0.25 = 25%) */
  dipThreshold: number;
  /** Fraction of spare SOL spent per buyback */
  buybackPercent: number;
  /** SOL always kept in the wallet for fees */
  minSolBalance: number;
  pollIntervalSec: number;
  slippageBps: number;
  priorityFeeSol: number;
  computeUnitPriceMicroLamports: number;
  walletPrivateKey: string;
  tradingEnabled: boolean;
  /** Dips at or above this fraction get a diagnostic log line */
  dipLogThreshold: number;
  confirmation: ConfirmationPolicy;
  requestTimeoutMs: number;
  swapTimeoutMs: number;
  explorerTxUrl: string;
  endpoints: {
    jupiterPrice: string;
    dexScreener: string;
    pumpPortal: string;
    raydium: string;
  };
}

// ============================================================================
// RESULTS & FAILURES
// ============================================================================

export type FailureKind =
  | "TRANSIENT_FETCH_FAILURE"
  | "INSUFFICIENT_FUNDS"
  | "QUOTE_UNAVAILABLE"
  | "SWAP_BUILD_FAILURE"
  | "SIGNING_FAILURE"
  | "SUBMISSION_REJECTED"
  | "CONFIRMATION_TIMEOUT"
  | "TRANSACTION_FAILED";

export type VenueName = "pumpportal" | "raydium" | "dry-run";

export interface Failure {
  kind: FailureKind;
  reason: string;
  venue?: VenueName;
}

export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(kind: FailureKind, reason: string, venue?: VenueName): Result<T> => ({
  ok: false,
  failure: venue ? { kind, reason, venue } : { kind, reason },
});

// ============================================================================
// ATH / DIP DETECTION
// ============================================================================

export interface Observation {
  price: number;
  /** ATH to carry into the next cycle */
  nextAth: number;
  /** First sample after start, ATH was unset */
  isInitial: boolean;
  isNewAth: boolean;
  /** null when there is no dip to measure (initial sample or new high) */
  dipFraction: number | null;
  triggered: boolean;
}

export interface TrackerState {
  ath: number;
  lastPrice: number | null;
  cycles: number;
  buybacks: number;
  failedBuybacks: number;
  lastBuybackAt: string | null;
}

// ============================================================================
// SWAPS
// ============================================================================

export interface SwapRequest {
  spendSol: number;
}

export interface SwapReceipt {
  signature: string;
  venue: VenueName;
}

export type SignatureState =
  | { status: "PENDING" }
  | { status: "CONFIRMED" }
  | { status: "FAILED"; error: string };

// ============================================================================
// CYCLE REPORTS
// ============================================================================

export type CycleReport =
  | { status: "PRICE_UNAVAILABLE"; failure: Failure }
  | { status: "OBSERVED"; observation: Observation }
  | { status: "BUYBACK_SKIPPED"; observation: Observation; failure: Failure }
  | { status: "BUYBACK_FAILED"; observation: Observation; spendSol: number; failure: Failure }
  | { status: "BUYBACK_COMPLETE"; observation: Observation; spendSol: number; receipt: SwapReceipt };
