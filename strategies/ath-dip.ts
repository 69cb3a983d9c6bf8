/**
 * ATH Dip Detector
 *
 * Pure state transition: given the ATH carried from the previous cycle and a
 * fresh price, report the next ATH and whether the dip from the ATH reached
 * the trigger threshold. The caller owns the ATH; nothing here is stateful.
 *
 * An ATH of 0 means "unset": the first sample seeds it and never triggers.
 */

import type { Observation } from "../types/index.js";

export function observePrice(ath: number, price: number, dipThreshold: number): Observation {
  if (!Number.isFinite(price) || price <= 0) {
    throw new RangeError(`price must be a positive number, got ${price}`);
  }

  if (ath <= 0) {
    return { price, nextAth: price, isInitial: true, isNewAth: false, dipFraction: null, triggered: false };
  }

  if (price > ath) {
    return { price, nextAth: price, isInitial: false, isNewAth: true, dipFraction: null, triggered: false };
  }

  const dipFraction = (ath - price) / ath;
  return {
    price,
    nextAth: ath,
    isInitial: false,
    isNewAth: false,
    dipFraction,
    triggered: dipFraction >= dipThreshold,
  };
}

/** ATH after a successful buyback: the triggering price, not the pre-dip high. */
export function resetAth(triggerPrice: number): number {
  return triggerPrice;
}

/** Dips close to the threshold get a diagnostic line */
export function shouldLogDip(dipFraction: number | null, dipLogThreshold: number): boolean {
  return dipFraction !== null && dipFraction > 0 && dipFraction >= dipLogThreshold;
}
