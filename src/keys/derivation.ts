/**
 * DOGE Provider — Key Derivation & Address Utilities
 *
 * BIP44 key derivation (m/44'/3'/0'/0/i) and address validation.
 * Uses hdkey for BIP32 derivation and Node.js crypto for hashing.
 *
 * Much derive. Very BIP44. Wow. 🐕
 */

import { createHash } from "node:crypto";
import HDKey from "hdkey";
import bs58check from "bs58check";
import { DOGE_MAINNET, DOGE_TESTNET, type DogeNetwork, type DogeNetworkParams } from "../types.js";

/** Dogecoin BIP44 coin type */
const DOGE_COIN_TYPE = 3;

export interface DerivedKey {
  /** Compressed public key (33 bytes) */
  publicKey: Buffer;
  /** Private key (32 bytes) — NEVER log this */
  privateKey: Buffer;
  address: string;
  derivationPath: string;
  index: number;
}

export function networkParams(network: DogeNetwork): DogeNetworkParams {
  return network === "mainnet" ? DOGE_MAINNET : DOGE_TESTNET;
}

/** HASH160 = RIPEMD160(SHA256(data)) */
export function hash160(data: Buffer): Buffer {
  const sha = createHash("sha256").update(data).digest();
  return createHash("ripemd160").update(sha).digest();
}

/**
 * Derive a P2PKH address from a compressed public key.
 */
export function publicKeyToAddress(publicKey: Buffer, network: DogeNetwork): string {
  const params = networkParams(network);
  const payload = Buffer.concat([Buffer.from([params.pubKeyHash]), hash160(publicKey)]);
  return bs58check.encode(payload);
}

/**
 * Derive the key at `m/44'/3'/0'/0/{index}` from a BIP39 seed.
 */
export function deriveKey(seed: Buffer, network: DogeNetwork, index: number): DerivedKey {
  const params = networkParams(network);
  const master = HDKey.fromMasterSeed(seed, params.bip32);
  const derivationPath = `m/44'/${DOGE_COIN_TYPE}'/0'/0/${index}`;
  const child = master.derive(derivationPath);

  if (!child.privateKey || !child.publicKey) {
    throw new Error(`doge-provider: key derivation produced no key at ${derivationPath}`);
  }

  return {
    publicKey: Buffer.from(child.publicKey),
    privateKey: Buffer.from(child.privateKey),
    address: publicKeyToAddress(Buffer.from(child.publicKey), network),
    derivationPath,
    index,
  };
}

/**
 * Validate a DOGE address.
 *
 * Checks the Base58Check checksum, a 21-byte payload, and a version byte
 * for the expected network (P2PKH or P2SH).
 */
export function isValidAddress(address: string, network: DogeNetwork): boolean {
  if (typeof address !== "string" || address.length < 26 || address.length > 35) {
    return false;
  }
  let decoded: Uint8Array;
  try {
    decoded = bs58check.decode(address);
  } catch {
    return false;
  }
  if (decoded.length !== 21) return false;
  const params = networkParams(network);
  return decoded[0] === params.pubKeyHash || decoded[0] === params.scriptHash;
}

/**
 * P2PKH locking script hex for an address:
 * OP_DUP OP_HASH160 <20 bytes> OP_EQUALVERIFY OP_CHECKSIG
 */
export function addressToScriptPubKey(address: string): string {
  const decoded = bs58check.decode(address);
  if (decoded.length !== 21) {
    throw new Error(`doge-provider: not a P2PKH address: ${address}`);
  }
  return `76a914${Buffer.from(decoded.subarray(1)).toString("hex")}88ac`;
}
