/**
 * DOGE Provider — Config Loading + Validation
 *
 * Reads the host-supplied config, applies defaults, validates fields.
 * Much config. Very validate. Wow. 🐕
 */

import { isValidAddress } from "./keys/derivation.js";
import type { ProviderConfig } from "./types.js";

/** Default configuration — every field except the dev-fee recipient */
export const DEFAULTS: ProviderConfig = {
  network: "mainnet",
  dataDir: null,
  fees: {
    source: "network",
    defaultFeePerByte: 1_000, // 0.01 DOGE/kB
    maxFeePerByte: 100_000,   // 1 DOGE/kB
  },
  utxo: {
    protectionThreshold: 10_000_000, // 0.1 DOGE
    dustThreshold: 1_000_000,        // 0.01 DOGE
  },
  devFee: {
    address: "",
    amount: 1_000_000, // 0.01 DOGE
  },
  doginals: {
    networkFeePerInscription: 10_000_000, // 0.1 DOGE
  },
  approvals: {
    timeoutMs: 120_000,
  },
  broadcast: {
    maxRetries: 3,
    baseDelayMs: 1_000,
  },
};

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`doge-provider: config "${key}" must be an object`);
  }
  return value;
}

/** Read a non-negative integer, falling back to the default when absent */
function readInt(src: RawSection, path: string, key: string, fallback: number): number {
  const value = src[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`doge-provider: invalid ${path}.${key} "${String(value)}" — must be a non-negative integer`);
  }
  return value;
}

/**
 * Parse and validate the provider config.
 * Returns a fully-populated ProviderConfig with defaults applied.
 *
 * @throws Error naming the offending field
 */
export function parseProviderConfig(raw: unknown): ProviderConfig {
  const src: RawSection = isRecord(raw) ? raw : {};

  const network = src.network ?? DEFAULTS.network;
  if (network !== "mainnet" && network !== "testnet") {
    throw new Error(`doge-provider: invalid network "${String(network)}" — must be "mainnet" or "testnet"`);
  }

  const dataDir = src.dataDir ?? DEFAULTS.dataDir;
  if (dataDir !== null && typeof dataDir !== "string") {
    throw new Error("doge-provider: dataDir must be a string or null");
  }

  const fees = section(src, "fees");
  const feeSource = fees.source ?? DEFAULTS.fees.source;
  if (feeSource !== "network" && feeSource !== "static") {
    throw new Error(`doge-provider: invalid fee source "${String(feeSource)}"`);
  }
  const defaultFeePerByte = readInt(fees, "fees", "defaultFeePerByte", DEFAULTS.fees.defaultFeePerByte);
  const maxFeePerByte = readInt(fees, "fees", "maxFeePerByte", DEFAULTS.fees.maxFeePerByte);
  if (defaultFeePerByte === 0) {
    throw new Error("doge-provider: fees.defaultFeePerByte must be positive");
  }
  if (maxFeePerByte < defaultFeePerByte) {
    throw new Error("doge-provider: fees.maxFeePerByte must be >= fees.defaultFeePerByte");
  }

  const utxo = section(src, "utxo");
  const devFee = section(src, "devFee");
  const devFeeAddress = devFee.address ?? DEFAULTS.devFee.address;
  if (typeof devFeeAddress !== "string" || !isValidAddress(devFeeAddress, network)) {
    throw new Error(`doge-provider: invalid devFee.address "${String(devFeeAddress)}" for ${network}`);
  }

  const approvals = section(src, "approvals");
  const timeoutMs = readInt(approvals, "approvals", "timeoutMs", DEFAULTS.approvals.timeoutMs);
  if (timeoutMs === 0) {
    throw new Error("doge-provider: approvals.timeoutMs must be positive");
  }

  const doginals = section(src, "doginals");
  const broadcast = section(src, "broadcast");

  return {
    network,
    dataDir,
    fees: {
      source: feeSource,
      defaultFeePerByte,
      maxFeePerByte,
    },
    utxo: {
      protectionThreshold: readInt(utxo, "utxo", "protectionThreshold", DEFAULTS.utxo.protectionThreshold),
      dustThreshold: readInt(utxo, "utxo", "dustThreshold", DEFAULTS.utxo.dustThreshold),
    },
    devFee: {
      address: devFeeAddress,
      amount: readInt(devFee, "devFee", "amount", DEFAULTS.devFee.amount),
    },
    doginals: {
      networkFeePerInscription: readInt(
        doginals,
        "doginals",
        "networkFeePerInscription",
        DEFAULTS.doginals.networkFeePerInscription,
      ),
    },
    approvals: { timeoutMs },
    broadcast: {
      maxRetries: Math.max(1, readInt(broadcast, "broadcast", "maxRetries", DEFAULTS.broadcast.maxRetries)),
      baseDelayMs: readInt(broadcast, "broadcast", "baseDelayMs", DEFAULTS.broadcast.baseDelayMs),
    },
  };
}
