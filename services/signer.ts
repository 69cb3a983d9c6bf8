/**
 * Signing capability handed to the swap venues. Key material stays inside
 * the signer; callers only see the public key and signed bytes.
 */

import { Keypair, VersionedTransaction } from "@solana/web3.js";
import bs58 from "bs58";
import { describeError } from "./logger.js";

/** The venue returned bytes that are not a versioned transaction */
export class MalformedTransactionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTransactionError";
  }
}

export interface TransactionSigner {
  /** Base58 public key of the funding wallet */
  readonly publicKey: string;
  /** Deserialize an unsigned versioned transaction, sign it, return the wire bytes */
  sign(unsigned: Uint8Array): Uint8Array;
}

export class KeypairSigner implements TransactionSigner {
  readonly publicKey: string;

  constructor(private readonly keypair: Keypair) {
    this.publicKey = keypair.publicKey.toBase58();
  }

  /**
   * Accepts a base58 secret key (Phantom export) or a JSON byte array
   * (solana-keygen file contents).
   */
  static fromSecret(secret: string): KeypairSigner {
    const trimmed = secret.trim();
    let bytes: Uint8Array;
    if (trimmed.startsWith("[")) {
      const parsed: unknown = JSON.parse(trimmed);
      if (!Array.isArray(parsed) || !parsed.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) {
        throw new Error("wallet secret JSON must be an array of bytes");
      }
      bytes = Uint8Array.from(parsed);
    } else {
      bytes = bs58.decode(trimmed);
    }
    return new KeypairSigner(Keypair.fromSecretKey(bytes));
  }

  sign(unsigned: Uint8Array): Uint8Array {
    let tx: VersionedTransaction;
    try {
      tx = VersionedTransaction.deserialize(unsigned);
    } catch (error: unknown) {
      throw new MalformedTransactionError(`cannot decode transaction: ${describeError(error)}`);
    }
    tx.sign([this.keypair]);
    return tx.serialize();
  }
}
