/**
 * DOGE Provider — HD Keyring
 *
 * Holds the ordered list of derived addresses and, while unlocked, their
 * private keys. Keys are zeroed on lock; the address list survives so the
 * provider can still answer read-only questions about the wallet.
 *
 * Key storage (keystore encryption, passphrases) lives outside the provider
 * core; this keyring is seeded from a mnemonic the host already decrypted.
 *
 * Much secure. Very derive. Wow. 🐕
 */

import * as bip39 from "bip39";
import { deriveKey } from "./derivation.js";
import { WalletError, WalletLockedError } from "../errors.js";
import type { DogeNetwork, LogFn, SigningKey, WalletKeyring } from "../types.js";

/** Invalid mnemonic phrase */
export class InvalidMnemonicError extends WalletError {
  constructor() {
    super("INVALID_MNEMONIC", "Invalid mnemonic phrase. Much words. Very check. 🐕");
    this.name = "InvalidMnemonicError";
  }
}

export interface HdKeyringOptions {
  network: DogeNetwork;
  /** Number of accounts to derive up front (default 1) */
  accounts?: number;
  log?: LogFn;
}

export class HdKeyring implements WalletKeyring {
  private readonly network: DogeNetwork;
  private readonly log: LogFn;
  private readonly _addresses: string[] = [];
  private seed: Buffer | null = null;
  private keys: Map<string, Buffer> | null = null;

  private constructor(network: DogeNetwork, log: LogFn) {
    this.network = network;
    this.log = log;
  }

  /**
   * Build an unlocked keyring from a BIP39 mnemonic.
   *
   * @throws InvalidMnemonicError if the phrase fails BIP39 validation
   */
  static fromMnemonic(mnemonic: string, opts: HdKeyringOptions): HdKeyring {
    const keyring = new HdKeyring(opts.network, opts.log ?? (() => {}));
    keyring.load(mnemonic);
    const count = Math.max(1, opts.accounts ?? 1);
    for (let i = 0; i < count; i++) {
      keyring.addAccount();
    }
    return keyring;
  }

  isUnlocked(): boolean {
    return this.keys !== null;
  }

  addresses(): string[] {
    return [...this._addresses];
  }

  /**
   * Derive the next account and append it to the ordered address list.
   */
  addAccount(): string {
    if (!this.seed || !this.keys) {
      throw new WalletLockedError();
    }
    const derived = deriveKey(this.seed, this.network, this._addresses.length);
    this._addresses.push(derived.address);
    this.keys.set(derived.address, derived.privateKey);
    this.log("info", `doge-provider: derived account ${derived.index} (${derived.address})`);
    return derived.address;
  }

  /**
   * Copy of the private key for one signing operation. The caller zeroes it.
   */
  signingKey(address: string): SigningKey {
    if (!this.keys) {
      throw new WalletLockedError();
    }
    const key = this.keys.get(address);
    if (!key) {
      throw new WalletError("UNKNOWN_ACCOUNT", `No key for address ${address}`);
    }
    return { address, privateKey: Buffer.from(key) };
  }

  /**
   * Re-derive keys for the existing address list.
   *
   * @throws InvalidMnemonicError if the phrase does not reproduce account 0
   */
  unlock(mnemonic: string): void {
    const previous = this._addresses.length;
    const expected = this._addresses[0];
    this.load(mnemonic);
    const seed = this.seed;
    const keys = this.keys;
    if (!seed || !keys) return;

    for (let i = 0; i < previous; i++) {
      const derived = deriveKey(seed, this.network, i);
      if (i === 0 && derived.address !== expected) {
        this.lock();
        throw new InvalidMnemonicError();
      }
      keys.set(derived.address, derived.privateKey);
    }
  }

  /**
   * Zero and drop all key material.
   */
  lock(): void {
    if (this.keys) {
      for (const key of this.keys.values()) key.fill(0);
    }
    this.seed?.fill(0);
    this.keys = null;
    this.seed = null;
  }

  private load(mnemonic: string): void {
    const normalized = mnemonic.trim().toLowerCase().split(/\s+/).join(" ");
    if (!bip39.validateMnemonic(normalized)) {
      throw new InvalidMnemonicError();
    }
    this.seed = bip39.mnemonicToSeedSync(normalized);
    this.keys = new Map();
  }
}
