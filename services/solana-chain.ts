/**
 * Solana RPC access: wallet balance, raw transaction submission and
 * signature status. Wraps @solana/web3.js's Connection behind a small
 * interface so swap venues and the orchestrator can be exercised without a node.
 */

import { Connection, LAMPORTS_PER_SOL, PublicKey } from "@solana/web3.js";
import { fail, ok, type Result, type SignatureState } from "../types/index.js";
import { describeError } from "./logger.js";

export interface SubmitOptions {
  skipPreflight: boolean;
}

export interface ChainClient {
  getBalanceSol(owner: string): Promise<Result<number>>;
  sendRawTransaction(signed: Uint8Array, options: SubmitOptions): Promise<Result<string>>;
  getSignatureState(signature: string): Promise<Result<SignatureState>>;
}

export interface BalanceSource {
  getBalance(): Promise<Result<number>>;
}

/** Web3.js has no per-call timeout, so every RPC call races a timer. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class SolanaChainClient implements ChainClient {
  private connection: Connection;

  constructor(rpcUrl: string, private readonly timeoutMs: number) {
    this.connection = new Connection(rpcUrl, { commitment: "confirmed" });
  }

  async getBalanceSol(owner: string): Promise<Result<number>> {
    try {
      const lamports = await withTimeout(
        this.connection.getBalance(new PublicKey(owner)),
        this.timeoutMs,
        "getBalance",
      );
      return ok(lamports / LAMPORTS_PER_SOL);
    } catch (error: unknown) {
      return fail("TRANSIENT_FETCH_FAILURE", `balance: ${describeError(error)}`);
    }
  }

  async sendRawTransaction(signed: Uint8Array, options: SubmitOptions): Promise<Result<string>> {
    try {
      const signature = await withTimeout(
        this.connection.sendRawTransaction(signed, {
          skipPreflight: options.skipPreflight,
          preflightCommitment: "confirmed",
        }),
        this.timeoutMs,
        "sendRawTransaction",
      );
      return ok(signature);
    } catch (error: unknown) {
      return fail("SUBMISSION_REJECTED", describeError(error));
    }
  }

  async getSignatureState(signature: string): Promise<Result<SignatureState>> {
    try {
      const res = await withTimeout(
        this.connection.getSignatureStatuses([signature]),
        this.timeoutMs,
        "getSignatureStatuses",
      );
      const status = res.value[0];
      if (!status) return ok({ status: "PENDING" });
      if (status.err) return ok({ status: "FAILED", error: JSON.stringify(status.err) });
      if (status.confirmationStatus === "confirmed" || status.confirmationStatus === "finalized") {
        return ok({ status: "CONFIRMED" });
      }
      return ok({ status: "PENDING" });
    } catch (error: unknown) {
      return fail("TRANSIENT_FETCH_FAILURE", `signature status: ${describeError(error)}`);
    }
  }
}

/** Balance of the funding wallet, in SOL */
export function walletBalanceSource(chain: ChainClient, owner: string): BalanceSource {
  return { getBalance: () => chain.getBalanceSol(owner) };
}
