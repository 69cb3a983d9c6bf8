/**
 * Console logging with a UTC time prefix.
 *
 * Status lines are for humans watching the process; nothing parses them.
 */

import axios from "axios";

export function timestamp(now: Date = new Date()): string {
  return now.toISOString().slice(11, 19);
}

export const logger = {
  info(msg: string): void {
    console.log(`[${timestamp()}] ${msg}`);
  },
  warn(msg: string): void {
    console.warn(`[${timestamp()}] ⚠️ ${msg}`);
  },
  error(msg: string): void {
    console.error(`[${timestamp()}] ❌ ${msg}`);
  },
};

/**
 * One-line summary of a thrown value. Axios errors carry TLS/socket objects
 * that flood the console, so only status, code and message are kept.
 */
export function describeError(error: unknown, maxLength = 300): string {
  let msg: string;
  if (axios.isAxiosError(error)) {
    const parts: string[] = [];
    if (error.response) parts.push(`HTTP ${error.response.status}`);
    if (error.code) parts.push(error.code);
    parts.push(error.message);
    msg = parts.join(" ");
  } else if (error instanceof Error) {
    msg = error.message;
  } else {
    msg = String(error);
  }
  return msg.substring(0, maxLength);
}

/** Token prices in SOL are tiny, so ten decimals */
export const fmtPrice = (price: number): string => price.toFixed(10);

export const fmtPct = (fraction: number, digits = 1): string => `${(fraction * 100).toFixed(digits)}%`;
