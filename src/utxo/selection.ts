/**
 * DOGE Provider — Coin Selection
 *
 * Largest-first to find the smallest input count that covers the target,
 * then the final slot takes the smallest coin that still covers, keeping
 * change small. Because the fee depends on the input count, selection and
 * fee estimation repeat until the count stops moving.
 *
 * All amounts in koinu (1 DOGE = 100,000,000 koinu).
 *
 * Much select. Very optimal. Wow. 🐕
 */

import { InsufficientFundsError } from "../errors.js";
import type { ClassifiedUtxo } from "../types.js";

export interface CoinSelectionResult {
  /** Selected UTXOs, largest first */
  selected: ClassifiedUtxo[];
  /** Total input value in koinu */
  totalInput: number;
  /** Fee estimated for the final input count */
  fee: number;
  /** Passes until the input count settled */
  iterations: number;
}

/** Fee for a transaction funded by `inputCount` selected coins */
export type FeeForInputs = (inputCount: number) => number;

/** Deterministic order: value desc, then confirmations desc, then outpoint */
export function sortLargestFirst(utxos: readonly ClassifiedUtxo[]): ClassifiedUtxo[] {
  return [...utxos].sort(
    (a, b) =>
      b.amount - a.amount ||
      b.confirmations - a.confirmations ||
      a.txid.localeCompare(b.txid) ||
      a.vout - b.vout,
  );
}

/**
 * Pick coins from a largest-first list to cover `need`.
 *
 * @returns the picked coins, or null if the whole list falls short
 */
export function pickCoins(sorted: readonly ClassifiedUtxo[], need: number): ClassifiedUtxo[] | null {
  if (need <= 0) return [];

  let sum = 0;
  let count = 0;
  while (sum < need && count < sorted.length) {
    sum += sorted[count].amount;
    count++;
  }
  if (sum < need) return null;

  // Swap the last pick for the smallest later coin that still covers
  const base = sum - sorted[count - 1].amount;
  let last = sorted[count - 1];
  for (let j = sorted.length - 1; j >= count - 1; j--) {
    if (base + sorted[j].amount >= need) {
      last = sorted[j];
      break;
    }
  }
  return [...sorted.slice(0, count - 1), last];
}

/**
 * Select coins covering `target` plus a fee that depends on the input count.
 *
 * Protected coins are dropped before selection regardless of what the
 * caller passes in.
 *
 * @param candidates - Available coins (unspent, unreserved)
 * @param target - Value to cover before network fee, in koinu
 * @param feeFor - Network fee for a given number of selected inputs
 * @throws InsufficientFundsError if the eligible coins cannot cover target + fee
 */
export function selectCoins(
  candidates: readonly ClassifiedUtxo[],
  target: number,
  feeFor: FeeForInputs,
): CoinSelectionResult {
  const eligible = sortLargestFirst(candidates.filter((u) => !u.protected));
  const available = eligible.reduce((sum, u) => sum + u.amount, 0);

  let inputCount = 1;
  // The count only ever moves one way, so this bound is never reached
  for (let iteration = 1; iteration <= eligible.length + 2; iteration++) {
    const fee = feeFor(inputCount);
    const picked = pickCoins(eligible, target + fee);
    if (!picked) {
      throw new InsufficientFundsError(target + fee, available);
    }
    if (picked.length === inputCount) {
      return {
        selected: picked,
        totalInput: picked.reduce((sum, u) => sum + u.amount, 0),
        fee,
        iterations: iteration,
      };
    }
    inputCount = picked.length;
  }

  throw new InsufficientFundsError(target, available);
}
