/**
 * DOGE Provider — Network Failover
 *
 * Network capability over a primary collaborator and an optional fallback.
 * Healthy collaborators are tried first; unhealthy ones stay in the list as
 * a last resort.
 *
 * Much resilient. Very failover. Wow. 🐕
 */

import { CollaboratorHealth, type CollaboratorHealthStatus } from "./health.js";
import { ProviderUnavailableError, errorMessage } from "../errors.js";
import type { Doginal, LogFn, NetworkCapability, UTXO } from "../types.js";

export interface FailoverNetworkOptions {
  primary: NetworkCapability;
  fallback?: NetworkCapability;
  /** How long a collaborator sits out after a first failure (ms). Default: 60000 */
  unhealthyDurationMs?: number;
  /** Ceiling for the penalty as failures repeat (ms). Default: 8 × unhealthyDurationMs */
  maxUnhealthyDurationMs?: number;
  log?: LogFn;
  now?: () => number;
}

interface Member {
  network: NetworkCapability;
  health: CollaboratorHealth;
}

export class FailoverNetwork implements NetworkCapability {
  readonly name = "failover";
  /** Present only when some member reports fee rates */
  readonly fetchFeeRate?: () => Promise<number>;

  private readonly members: Member[];
  private readonly log: LogFn;

  constructor(opts: FailoverNetworkOptions) {
    const healthOpts = {
      penaltyMs: opts.unhealthyDurationMs,
      maxPenaltyMs: opts.maxUnhealthyDurationMs,
      now: opts.now,
    };
    this.members = [opts.primary, ...(opts.fallback ? [opts.fallback] : [])].map((network) => ({
      network,
      health: new CollaboratorHealth(network.name, healthOpts),
    }));
    this.log = opts.log ?? (() => {});

    if (this.members.some((m) => m.network.fetchFeeRate)) {
      this.fetchFeeRate = () =>
        this.withFailover(
          "fetchFeeRate",
          (n) => {
            if (!n.fetchFeeRate) throw new Error(`${n.name} does not report fee rates`);
            return n.fetchFeeRate();
          },
          (m) => m.network.fetchFeeRate !== undefined,
        );
    }
  }

  fetchUtxos(address: string): Promise<UTXO[]> {
    return this.withFailover("fetchUtxos", (n) => n.fetchUtxos(address));
  }

  fetchBalance(address: string): Promise<{ confirmed: number; unconfirmed: number }> {
    return this.withFailover("fetchBalance", (n) => n.fetchBalance(address));
  }

  fetchDoginals(address: string): Promise<Doginal[]> {
    return this.withFailover("fetchDoginals", (n) => n.fetchDoginals(address));
  }

  broadcast(signedTxHex: string): Promise<{ txid: string }> {
    return this.withFailover("broadcast", (n) => n.broadcast(signedTxHex));
  }

  /** Snapshot of every member's health */
  getHealthStatus(): CollaboratorHealthStatus[] {
    return this.members.map((m) => m.health.status());
  }

  private async withFailover<T>(
    method: string,
    fn: (network: NetworkCapability) => Promise<T>,
    eligible: (member: Member) => boolean = () => true,
  ): Promise<T> {
    const candidates = this.members.filter(eligible);
    // Healthy first, then the rest as last resort; order within each group is preserved
    const ordered = [
      ...candidates.filter((m) => m.health.isAvailable()),
      ...candidates.filter((m) => !m.health.isAvailable()),
    ];
    if (ordered.length === 0) {
      throw new ProviderUnavailableError(this.members.map((m) => m.network.name));
    }

    let lastError: unknown;
    for (let i = 0; i < ordered.length; i++) {
      const { network, health } = ordered[i];
      try {
        const result = await fn(network);
        health.recordSuccess();
        return result;
      } catch (err: unknown) {
        lastError = err;
        health.recordFailure(errorMessage(err));
        const more = i < ordered.length - 1;
        this.log(
          "warn",
          `doge-provider: ${network.name}.${method} failed: ${errorMessage(err)}. ${more ? "Trying next collaborator..." : "No more collaborators."}`,
        );
      }
    }
    throw lastError;
  }
}
