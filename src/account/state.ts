/**
 * DOGE Provider — Account State
 *
 * Cached address, balance, UTXO set and doginal inventory for the active
 * account. Every change installs a brand-new frozen snapshot, so a reader
 * either sees the old state or the new one, never a balance computed from
 * a half-refreshed UTXO set.
 *
 * Optimistic spends are tracked apart from the network data: a spent
 * outpoint stays hidden until the network stops reporting it. Reservations
 * for pending approvals never touch the snapshot.
 *
 * Much UTXO. Very track. Wow. 🐕
 */

import { classifyUtxos } from "../utxo/protection.js";
import { WalletError, errorMessage } from "../errors.js";
import {
  outpointKey,
  type AccountSnapshot,
  type AccountUpdate,
  type BalanceSnapshot,
  type ClassifiedUtxo,
  type Doginal,
  type LogFn,
  type NetworkCapability,
  type Outpoint,
  type UTXO,
} from "../types.js";

/** Network view of the active account before spend-hiding and classification */
interface RawAccountData {
  utxos: UTXO[];
  balance: { confirmed: number; unconfirmed: number };
  doginals: Doginal[];
}

export interface AccountStateOptions {
  network: NetworkCapability;
  /** Ordered derived addresses */
  addresses: () => string[];
  /** Inscription-carrier threshold in koinu */
  protectionThreshold: number;
  /** Called after the active account changes */
  onAccountsChanged?: (addresses: string[]) => void;
  log?: LogFn;
}

function emptyRaw(): RawAccountData {
  return { utxos: [], balance: { confirmed: 0, unconfirmed: 0 }, doginals: [] };
}

export class AccountState {
  private readonly network: NetworkCapability;
  private readonly listAddresses: () => string[];
  private readonly protectionThreshold: number;
  private readonly onAccountsChanged: (addresses: string[]) => void;
  private readonly log: LogFn;

  private activeIndex = 0;
  private raw: RawAccountData = emptyRaw();
  private current: AccountSnapshot;
  private stale = true;
  /** Bumped on account switch; late refreshes for an old generation are dropped */
  private generation = 0;
  private inflight: Promise<AccountSnapshot> | null = null;

  /** outpoint → approval id */
  private readonly reservations = new Map<string, string>();
  /** outpoint → spending txid */
  private readonly spent = new Map<string, string>();

  constructor(opts: AccountStateOptions) {
    this.network = opts.network;
    this.listAddresses = opts.addresses;
    this.protectionThreshold = opts.protectionThreshold;
    this.onAccountsChanged = opts.onAccountsChanged ?? (() => {});
    this.log = opts.log ?? (() => {});
    this.current = this.build(this.activeAddress(), this.raw, null);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  currentAddress(): string {
    return this.current.address;
  }

  activeAccountIndex(): number {
    return this.activeIndex;
  }

  balance(): Readonly<BalanceSnapshot> {
    return this.current.balance;
  }

  utxoSet(): readonly ClassifiedUtxo[] {
    return this.current.utxos;
  }

  doginals(): readonly Doginal[] {
    return this.current.doginals;
  }

  snapshot(): AccountSnapshot {
    return this.current;
  }

  isStale(): boolean {
    return this.stale;
  }

  /** Snapshot coins not held by a pending approval */
  spendableUtxos(): ClassifiedUtxo[] {
    return this.current.utxos.filter((u) => !this.reservations.has(outpointKey(u)));
  }

  reservedCount(): number {
    return this.reservations.size;
  }

  // --------------------------------------------------------------------------
  // Refresh
  // --------------------------------------------------------------------------

  /**
   * Pull UTXOs, balance and doginals for the active address and install them
   * as one snapshot. Concurrent callers share the outstanding request.
   */
  refresh(): Promise<AccountSnapshot> {
    if (this.inflight) return this.inflight;

    const run: Promise<AccountSnapshot> = this.fetchAndInstall(this.current.address, this.generation)
      .finally(() => {
        if (this.inflight === run) this.inflight = null;
      });
    this.inflight = run;
    return run;
  }

  /**
   * Refresh if the last attempt failed or none happened yet.
   *
   * @throws the collaborator's error when the refresh fails
   */
  async ensureFresh(): Promise<AccountSnapshot> {
    if (!this.stale) return this.current;
    return this.refresh();
  }

  /**
   * Best-effort refresh for read-only callers: failures are logged and the
   * cached snapshot is returned; the next access retries.
   */
  async read(): Promise<AccountSnapshot> {
    if (!this.stale) return this.current;
    try {
      return await this.refresh();
    } catch (err: unknown) {
      this.log("warn", `doge-provider: serving cached state for ${this.current.address}: ${errorMessage(err)}`);
      return this.current;
    }
  }

  /**
   * Apply a collaborator-pushed update. Updates for an inactive address are ignored.
   */
  applyUpdate(address: string, update: AccountUpdate): boolean {
    if (address !== this.current.address) {
      this.log("info", `doge-provider: ignoring update for inactive address ${address}`);
      return false;
    }
    const next: RawAccountData = {
      utxos: update.utxos ? [...update.utxos] : this.raw.utxos,
      balance: update.balance ? { ...update.balance } : this.raw.balance,
      doginals: update.doginals ? [...update.doginals] : this.raw.doginals,
    };
    if (update.utxos) this.pruneSpent(next.utxos);
    this.install(next, new Date().toISOString());
    return true;
  }

  // --------------------------------------------------------------------------
  // Account switching
  // --------------------------------------------------------------------------

  /**
   * Make another derived account active. All caches, reservations and
   * optimistic spends are dropped in one step.
   */
  switchAccount(index: number): string {
    const addresses = this.listAddresses();
    if (!Number.isInteger(index) || index < 0 || index >= addresses.length) {
      throw new WalletError("UNKNOWN_ACCOUNT", `No account at index ${index}`);
    }
    if (index === this.activeIndex) return this.current.address;

    this.activeIndex = index;
    this.generation++;
    this.inflight = null;
    this.reservations.clear();
    this.spent.clear();
    this.raw = emptyRaw();
    this.stale = true;
    this.current = this.build(addresses[index], this.raw, null);

    this.log("info", `doge-provider: switched to account ${index} (${this.current.address})`);
    this.onAccountsChanged([this.current.address]);
    return this.current.address;
  }

  // --------------------------------------------------------------------------
  // Reservations & optimistic spends
  // --------------------------------------------------------------------------

  /**
   * Hold coins for a pending approval so nothing else selects them.
   */
  reserve(outpoints: readonly Outpoint[], approvalId: string): void {
    for (const o of outpoints) {
      this.reservations.set(outpointKey(o), approvalId);
    }
  }

  /**
   * Release every coin held for an approval.
   *
   * @returns the number of coins released
   */
  release(approvalId: string): number {
    let released = 0;
    for (const [key, holder] of this.reservations) {
      if (holder === approvalId) {
        this.reservations.delete(key);
        released++;
      }
    }
    return released;
  }

  /**
   * Record a broadcast spend: inputs disappear, change appears unconfirmed.
   * Reconciled on the next network refresh.
   */
  markSpent(inputs: readonly Outpoint[], spentInTxid: string, change?: UTXO): void {
    const keys = new Set(inputs.map((o) => outpointKey(o)));
    let confirmedOut = 0;
    let unconfirmedOut = 0;

    for (const u of this.raw.utxos) {
      if (!keys.has(outpointKey(u))) continue;
      if (u.confirmations >= 1) confirmedOut += u.amount;
      else unconfirmedOut += u.amount;
    }
    for (const key of keys) {
      this.spent.set(key, spentInTxid);
      this.reservations.delete(key);
    }

    const utxos = this.raw.utxos.filter((u) => !keys.has(outpointKey(u)));
    if (change) utxos.push({ ...change });

    this.install(
      {
        utxos,
        balance: {
          confirmed: Math.max(0, this.raw.balance.confirmed - confirmedOut),
          unconfirmed: Math.max(0, this.raw.balance.unconfirmed - unconfirmedOut) + (change?.amount ?? 0),
        },
        doginals: this.raw.doginals.filter((d) => !keys.has(outpointKey(d))),
      },
      this.current.refreshedAt,
    );
    this.log("info", `doge-provider: marked ${keys.size} UTXO(s) spent in ${spentInTxid}`);
  }

  /**
   * Forget everything cached for the active account (wallet lock).
   */
  clear(): void {
    this.generation++;
    this.inflight = null;
    this.reservations.clear();
    this.spent.clear();
    this.raw = emptyRaw();
    this.stale = true;
    this.current = this.build(this.activeAddress(), this.raw, null);
  }

  // ---- Private helpers ----

  private activeAddress(): string {
    return this.listAddresses()[this.activeIndex] ?? "";
  }

  private async fetchAndInstall(address: string, generation: number): Promise<AccountSnapshot> {
    try {
      const [utxos, balance, doginals] = await Promise.all([
        this.network.fetchUtxos(address),
        this.network.fetchBalance(address),
        this.network.fetchDoginals(address),
      ]);

      if (generation !== this.generation) {
        this.log("info", `doge-provider: discarding refresh for ${address} (account changed)`);
        return this.current;
      }

      this.pruneSpent(utxos);
      this.install({ utxos, balance, doginals }, new Date().toISOString());
      this.stale = false;
      this.log("info", `doge-provider: refreshed ${utxos.length} UTXOs, ${doginals.length} doginals for ${address}`);
      return this.current;
    } catch (err: unknown) {
      if (generation === this.generation) this.stale = true;
      this.log("warn", `doge-provider: refresh failed for ${address}: ${errorMessage(err)}`);
      throw err;
    }
  }

  /** Spends the network no longer reports as unspent are settled */
  private pruneSpent(networkUtxos: readonly UTXO[]): void {
    const reported = new Set(networkUtxos.map((u) => outpointKey(u)));
    for (const key of this.spent.keys()) {
      if (!reported.has(key)) this.spent.delete(key);
    }
  }

  private install(raw: RawAccountData, refreshedAt: string | null): void {
    this.raw = raw;
    this.current = this.build(this.current.address, raw, refreshedAt);
  }

  private build(address: string, raw: RawAccountData, refreshedAt: string | null): AccountSnapshot {
    // The network may still report coins we already spent
    let hiddenConfirmed = 0;
    let hiddenUnconfirmed = 0;
    const visible: UTXO[] = [];
    for (const u of raw.utxos) {
      if (this.spent.has(outpointKey(u))) {
        if (u.confirmations >= 1) hiddenConfirmed += u.amount;
        else hiddenUnconfirmed += u.amount;
      } else {
        visible.push(u);
      }
    }
    const doginals = raw.doginals.filter((d) => !this.spent.has(outpointKey(d)));

    const confirmed = Math.max(0, raw.balance.confirmed - hiddenConfirmed);
    const unconfirmed = Math.max(0, raw.balance.unconfirmed - hiddenUnconfirmed);

    return Object.freeze({
      address,
      balance: Object.freeze({ confirmed, unconfirmed, total: confirmed + unconfirmed }),
      utxos: Object.freeze(
        classifyUtxos(visible, doginals, this.protectionThreshold).map((u) => Object.freeze(u)),
      ),
      doginals: Object.freeze(doginals.map((d) => Object.freeze({ ...d }))),
      refreshedAt,
    });
  }
}
