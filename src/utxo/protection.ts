/**
 * DOGE Provider — Inscription Protection
 *
 * A UTXO is protected when its value is below the inscription-carrier
 * threshold or when the indexer reports a doginal on it. Protected outputs
 * never fund a plain-value transaction.
 */

import { outpointKey, type ClassifiedUtxo, type Doginal, type UTXO } from "../types.js";

export function inscribedOutpoints(doginals: readonly Doginal[]): Set<string> {
  return new Set(doginals.map((d) => outpointKey(d)));
}

export function isProtected(utxo: UTXO, inscribed: ReadonlySet<string>, threshold: number): boolean {
  return utxo.amount < threshold || inscribed.has(outpointKey(utxo));
}

/**
 * Attach the derived `protected` flag to every UTXO.
 */
export function classifyUtxos(
  utxos: readonly UTXO[],
  doginals: readonly Doginal[],
  threshold: number,
): ClassifiedUtxo[] {
  const inscribed = inscribedOutpoints(doginals);
  return utxos.map((u) => ({ ...u, protected: isProtected(u, inscribed, threshold) }));
}
