/**
 * Sign → submit → confirm, shared by every swap venue.
 *
 * Confirmation is polled a bounded number of times. Running out of polls is
 * a CONFIRMATION_TIMEOUT failure; a dropped transaction is never assumed to
 * have landed.
 */

import { fail, ok, type ConfirmationPolicy, type Result, type VenueName } from "../types/index.js";
import { describeError, logger } from "./logger.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";
import type { ChainClient, SubmitOptions } from "./solana-chain.js";
import { MalformedTransactionError, type TransactionSigner } from "./signer.js";

export class TransactionSender {
  constructor(
    private readonly chain: ChainClient,
    private readonly signer: TransactionSigner,
    private readonly confirmation: ConfirmationPolicy,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  get publicKey(): string {
    return this.signer.publicKey;
  }

  async send(unsigned: Uint8Array, venue: VenueName, options: SubmitOptions): Promise<Result<string>> {
    let signed: Uint8Array;
    try {
      signed = this.signer.sign(unsigned);
    } catch (error: unknown) {
      const kind = error instanceof MalformedTransactionError ? "SWAP_BUILD_FAILURE" : "SIGNING_FAILURE";
      return fail(kind, describeError(error), venue);
    }
    logger.info(`  ✍️  Transaction signed, sending...`);

    const sent = await this.chain.sendRawTransaction(signed, options);
    if (!sent.ok) return fail(sent.failure.kind, sent.failure.reason, venue);
    logger.info(`  📤 TX submitted: ${sent.value}`);

    return this.waitForConfirmation(sent.value, venue);
  }

  async waitForConfirmation(signature: string, venue: VenueName): Promise<Result<string>> {
    const { attempts, intervalMs } = this.confirmation;
    logger.info(`  ⏳ Waiting for confirmation (up to ${attempts} polls)...`);

    for (let i = 0; i < attempts; i++) {
      await this.sleep(intervalMs);
      const state = await this.chain.getSignatureState(signature);
      if (!state.ok) {
        // counts against the poll budget
        logger.warn(`Status poll ${i + 1}/${attempts} failed: ${state.failure.reason}`);
        continue;
      }
      if (state.value.status === "CONFIRMED") {
        logger.info(`  ✅ TX CONFIRMED`);
        return ok(signature);
      }
      if (state.value.status === "FAILED") {
        return fail("TRANSACTION_FAILED", `${signature} failed on-chain: ${state.value.error}`, venue);
      }
    }

    return fail("CONFIRMATION_TIMEOUT", `${signature} not confirmed after ${attempts} polls`, venue);
  }
}
