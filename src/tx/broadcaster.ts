/**
 * DOGE Provider — Transaction Broadcaster
 *
 * Hands signed transactions to the network collaborator with retry.
 * Backoff is exponential: base, base×3, base×9, ...
 *
 * A node that already knows the tx counts as success; double-spend and
 * fee-too-low verdicts fail at once since retrying cannot change them.
 *
 * Much broadcast. Very network. Wow. 🐕
 */

import { createHash } from "node:crypto";
import { BroadcastFailedError, errorMessage } from "../errors.js";
import type { LogFn, NetworkCapability } from "../types.js";

// ============================================================================
// Types
// ============================================================================

export interface BroadcastResult {
  txid: string;
  /** Number of attempts made */
  attempts: number;
  /** Collaborator that accepted the tx */
  provider: string;
  /** The network already had this tx */
  alreadyKnown: boolean;
}

export interface BroadcastOptions {
  /** Maximum number of attempts (default: 3) */
  maxRetries?: number;
  /** Delay before the second attempt in ms (default: 1000), tripled each retry */
  baseDelayMs?: number;
  log?: LogFn;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Error detection helpers
// ============================================================================

export function isAlreadyBroadcast(error: string): boolean {
  const lower = error.toLowerCase();
  return (
    lower.includes("already known") ||
    lower.includes("already in the mempool") ||
    lower.includes("transaction already exists") ||
    lower.includes("txn-already-in-mempool") ||
    lower.includes("already in block chain") ||
    lower.includes("txn-already-known")
  );
}

export function isDoubleSpend(error: string): boolean {
  const lower = error.toLowerCase();
  return (
    lower.includes("double spend") ||
    lower.includes("txn-mempool-conflict") ||
    lower.includes("bad-txns-inputs-missingorspent") ||
    lower.includes("missing inputs")
  );
}

export function isFeeTooLow(error: string): boolean {
  const lower = error.toLowerCase();
  return (
    (lower.includes("fee") && lower.includes("low")) ||
    lower.includes("min relay fee not met") ||
    lower.includes("insufficient fee") ||
    lower.includes("mempool min fee not met")
  );
}

// ============================================================================
// Broadcaster
// ============================================================================

/**
 * Broadcast a signed transaction.
 *
 * @throws BroadcastFailedError on a permanent verdict or when retries run out
 */
export async function broadcastTransaction(
  signedTxHex: string,
  network: NetworkCapability,
  options: BroadcastOptions = {},
): Promise<BroadcastResult> {
  const maxRetries = Math.max(1, options.maxRetries ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const log = options.log ?? (() => {});
  const wait = options.sleep ?? sleep;

  let lastError = "unknown error";

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      const result = await network.broadcast(signedTxHex);
      log("info", `doge-provider: tx broadcast success on attempt ${attempt}: ${result.txid}`);
      return { txid: result.txid, attempts: attempt, provider: network.name, alreadyKnown: false };
    } catch (err: unknown) {
      const errMsg = errorMessage(err);
      lastError = errMsg;

      if (isAlreadyBroadcast(errMsg)) {
        const txid = computeTxid(signedTxHex);
        log("info", `doge-provider: tx ${txid} already broadcast (${errMsg})`);
        return { txid, attempts: attempt, provider: network.name, alreadyKnown: true };
      }

      if (isDoubleSpend(errMsg)) {
        throw new BroadcastFailedError(`inputs already spent (${errMsg})`, "DOUBLE_SPEND");
      }
      if (isFeeTooLow(errMsg)) {
        throw new BroadcastFailedError(`fee too low for network acceptance (${errMsg})`, "FEE_TOO_LOW");
      }

      log("warn", `doge-provider: broadcast attempt ${attempt}/${maxRetries} failed: ${errMsg}`);

      if (attempt < maxRetries) {
        await wait(baseDelayMs * Math.pow(3, attempt - 1));
      }
    }
  }

  throw new BroadcastFailedError(`gave up after ${maxRetries} attempts: ${lastError}`);
}

// ============================================================================
// Helpers
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * txid = reversed double-SHA256 of the raw tx bytes.
 */
export function computeTxid(signedTxHex: string): string {
  const raw = Buffer.from(signedTxHex, "hex");
  const hash1 = createHash("sha256").update(raw).digest();
  const hash2 = createHash("sha256").update(hash1).digest();
  return Buffer.from(hash2).reverse().toString("hex");
}
