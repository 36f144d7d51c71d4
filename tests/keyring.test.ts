/**
 * Tests for HdKeyring — BIP44 derivation, lock/unlock, key hand-out.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { HdKeyring, InvalidMnemonicError } from "../src/keys/keyring.js";
import { isValidAddress, publicKeyToAddress } from "../src/keys/derivation.js";
import { WalletLockedError } from "../src/errors.js";
import secp256k1 from "secp256k1";
import { ADDR_A, RECIPIENT } from "./helpers.js";

// Standard all-zero-entropy test phrase
const MNEMONIC = "abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about";
const OTHER_MNEMONIC = "zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo wrong";

describe("HdKeyring", () => {
  it("derives m/44'/3'/0'/0/i addresses in order", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "mainnet", accounts: 2 });
    assert.deepEqual(keyring.addresses(), [
      "DBus3bamQjgJULBJtYXpEzDWQRwF5iwxgC",
      "DAcDAtJRztxBHyA6D6h8du1HguyTR43Mas",
    ]);
  });

  it("derives testnet addresses with the testnet version byte", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "testnet" });
    assert.deepEqual(keyring.addresses(), ["naxvmcKgLi92MJkVvNBGVPooeJKY4wHDxY"]);
  });

  it("normalises whitespace and case", () => {
    const keyring = HdKeyring.fromMnemonic(`  ${MNEMONIC.toUpperCase().replace(/ /g, "   ")} `, { network: "mainnet" });
    assert.deepEqual(keyring.addresses(), ["DBus3bamQjgJULBJtYXpEzDWQRwF5iwxgC"]);
  });

  it("rejects an invalid phrase", () => {
    assert.throws(
      () => HdKeyring.fromMnemonic("abandon abandon abandon", { network: "mainnet" }),
      InvalidMnemonicError,
    );
  });

  it("hands out a copy of the key for the address", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "mainnet" });
    const [address] = keyring.addresses();
    const key = keyring.signingKey(address);
    const publicKey = Buffer.from(secp256k1.publicKeyCreate(key.privateKey, true));
    assert.equal(publicKeyToAddress(publicKey, "mainnet"), address);

    key.privateKey.fill(0);
    const again = keyring.signingKey(address);
    assert.equal(again.privateKey.every((b) => b === 0), false);
  });

  it("refuses keys for addresses it did not derive", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "mainnet" });
    assert.throws(() => keyring.signingKey(ADDR_A), /No key for address/);
  });

  it("lock keeps the address list but drops every key", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "mainnet", accounts: 2 });
    keyring.lock();
    assert.equal(keyring.isUnlocked(), false);
    assert.equal(keyring.addresses().length, 2);
    assert.throws(() => keyring.signingKey("DBus3bamQjgJULBJtYXpEzDWQRwF5iwxgC"), WalletLockedError);
    assert.throws(() => keyring.addAccount(), WalletLockedError);
  });

  it("unlock restores keys only for the same phrase", () => {
    const keyring = HdKeyring.fromMnemonic(MNEMONIC, { network: "mainnet", accounts: 2 });
    keyring.lock();

    assert.throws(() => keyring.unlock(OTHER_MNEMONIC), InvalidMnemonicError);
    assert.equal(keyring.isUnlocked(), false);

    keyring.unlock(MNEMONIC);
    assert.equal(keyring.isUnlocked(), true);
    assert.equal(keyring.signingKey("DAcDAtJRztxBHyA6D6h8du1HguyTR43Mas").privateKey.length, 32);
  });
});

describe("isValidAddress", () => {
  it("accepts addresses of the configured network only", () => {
    assert.equal(isValidAddress(RECIPIENT, "mainnet"), true);
    assert.equal(isValidAddress(RECIPIENT, "testnet"), false);
    assert.equal(isValidAddress("nfHasKcaJsev32P7yzQvgkbZSWxJC8W4Vf", "testnet"), true);
  });

  it("rejects a corrupted checksum", () => {
    const corrupted = RECIPIENT.slice(0, -1) + (RECIPIENT.endsWith("3") ? "4" : "3");
    assert.equal(isValidAddress(corrupted, "mainnet"), false);
    assert.equal(isValidAddress("", "mainnet"), false);
  });
});
