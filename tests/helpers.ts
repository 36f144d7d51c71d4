/**
 * Shared fixtures and in-process fakes for the provider tests.
 */

import type {
  ApprovalDecision,
  ApprovalUi,
  ClassifiedUtxo,
  Doginal,
  NetworkCapability,
  PendingApproval,
  ProviderConfig,
  SignedTransaction,
  SigningCapability,
  SigningKey,
  TxOutput,
  UTXO,
  WalletKeyring,
} from "../src/types.js";

// Mainnet P2PKH addresses of the private keys 0x01…01, 0x02…02, 0x03…03, 0x04…04
export const ADDR_A = "DGEX9JsfNuCCA3ovxAmUSM1GCea1BpY4Et";
export const ADDR_B = "DSdeTLgR9ZChn46U89HyK4Quaj91EU2Zuq";
export const DEV_ADDR = "DB7NZUwffx4NMgCDnmAgVeh8fKBrWwg6f4";
export const RECIPIENT = "DHb8EBV31rBDXmkRvtiiK82giB3LeCMdn3";

export function txid(n: number): string {
  return n.toString(16).padStart(64, "0");
}

export function makeUtxo(partial: Partial<UTXO> = {}): UTXO {
  return {
    txid: partial.txid ?? txid(1),
    vout: partial.vout ?? 0,
    address: partial.address ?? ADDR_A,
    amount: partial.amount ?? 50_000_000,
    scriptPubKey: partial.scriptPubKey ?? "",
    confirmations: partial.confirmations ?? 6,
  };
}

export function coin(partial: Partial<ClassifiedUtxo> = {}): ClassifiedUtxo {
  return { ...makeUtxo(partial), protected: partial.protected ?? false };
}

export function makeDoginal(partial: Partial<Doginal> = {}): Doginal {
  const backing = partial.txid ?? txid(100);
  return {
    inscriptionId: partial.inscriptionId ?? `${backing}i0`,
    txid: backing,
    vout: partial.vout ?? 0,
    contentType: partial.contentType ?? "image/png",
    contentUrl: partial.contentUrl ?? `https://content.test/${backing}i0`,
  };
}

export const TEST_CONFIG: ProviderConfig = {
  network: "mainnet",
  dataDir: null,
  fees: { source: "static", defaultFeePerByte: 1_000, maxFeePerByte: 100_000 },
  utxo: { protectionThreshold: 10_000_000, dustThreshold: 1_000_000 },
  devFee: { address: DEV_ADDR, amount: 1_000_000 },
  doginals: { networkFeePerInscription: 10_000_000 },
  approvals: { timeoutMs: 60_000 },
  broadcast: { maxRetries: 3, baseDelayMs: 1 },
};

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================================================
// Network
// ============================================================================

export class FakeNetwork implements NetworkCapability {
  readonly name: string;
  utxos = new Map<string, UTXO[]>();
  balances = new Map<string, { confirmed: number; unconfirmed: number }>();
  doginals = new Map<string, Doginal[]>();
  broadcasts: string[] = [];
  fetchCalls = 0;
  /** Errors thrown by the next broadcasts, in order */
  broadcastErrors: Error[] = [];
  /** When set, every fetch throws it */
  fetchError: Error | null = null;
  /** When set, fetches wait on it */
  gate: Promise<void> | null = null;

  constructor(name = "fake") {
    this.name = name;
  }

  /** Seed an address; the balance is the sum of confirmed/unconfirmed coins */
  seed(address: string, utxos: UTXO[], doginals: Doginal[] = []): void {
    this.utxos.set(address, utxos);
    this.doginals.set(address, doginals);
    let confirmed = 0;
    let unconfirmed = 0;
    for (const u of utxos) {
      if (u.confirmations >= 1) confirmed += u.amount;
      else unconfirmed += u.amount;
    }
    this.balances.set(address, { confirmed, unconfirmed });
  }

  async fetchUtxos(address: string): Promise<UTXO[]> {
    await this.waitForGate();
    this.fetchCalls++;
    return (this.utxos.get(address) ?? []).map((u) => ({ ...u }));
  }

  async fetchBalance(address: string): Promise<{ confirmed: number; unconfirmed: number }> {
    await this.waitForGate();
    return { ...(this.balances.get(address) ?? { confirmed: 0, unconfirmed: 0 }) };
  }

  async fetchDoginals(address: string): Promise<Doginal[]> {
    await this.waitForGate();
    return (this.doginals.get(address) ?? []).map((d) => ({ ...d }));
  }

  async broadcast(signedTxHex: string): Promise<{ txid: string }> {
    const err = this.broadcastErrors.shift();
    if (err) throw err;
    this.broadcasts.push(signedTxHex);
    return { txid: `broadcast-${this.broadcasts.length}` };
  }

  private async waitForGate(): Promise<void> {
    if (this.gate) await this.gate;
    if (this.fetchError) throw this.fetchError;
  }
}

// ============================================================================
// Keyring & signer
// ============================================================================

export class FakeKeyring implements WalletKeyring {
  private readonly list: string[];
  unlocked = true;
  handedOut: SigningKey[] = [];

  constructor(addresses: string[] = [ADDR_A, ADDR_B]) {
    this.list = [...addresses];
  }

  isUnlocked(): boolean {
    return this.unlocked;
  }

  addresses(): string[] {
    return [...this.list];
  }

  signingKey(address: string): SigningKey {
    const key = { address, privateKey: Buffer.alloc(32, 7) };
    this.handedOut.push(key);
    return key;
  }

  lock(): void {
    this.unlocked = false;
  }
}

export interface SignCall {
  inputs: UTXO[];
  outputs: TxOutput[];
  address: string;
}

export class FakeSigner implements SigningCapability {
  calls: SignCall[] = [];
  messages: string[] = [];
  fail: Error | null = null;

  async sign(inputs: UTXO[], outputs: TxOutput[], key: SigningKey): Promise<SignedTransaction> {
    if (this.fail) throw this.fail;
    this.calls.push({ inputs: inputs.map((u) => ({ ...u })), outputs: outputs.map((o) => ({ ...o })), address: key.address });
    return { signedTx: `0${this.calls.length}`.padStart(4, "0"), txid: `signed-${this.calls.length}` };
  }

  async signMessage(text: string, key: SigningKey): Promise<string> {
    if (this.fail) throw this.fail;
    this.messages.push(text);
    return `sig(${key.address}:${text})`;
  }
}

// ============================================================================
// Approval UI
// ============================================================================

export interface Presentation {
  approval: PendingApproval;
  signal: AbortSignal;
  decide(decision: ApprovalDecision): void;
}

/**
 * Records every presentation. Tests either take presentations one by one
 * with `next()` or set `auto` to answer immediately.
 */
export class ScriptedUi implements ApprovalUi {
  auto: ApprovalDecision | null = null;
  presented: Presentation[] = [];
  private waiters: Array<(p: Presentation) => void> = [];
  private backlog: Presentation[] = [];

  presentApproval(approval: Readonly<PendingApproval>, signal: AbortSignal): Promise<ApprovalDecision> {
    return new Promise<ApprovalDecision>((resolve) => {
      const presentation: Presentation = {
        approval: structuredClone(approval),
        signal,
        decide: resolve,
      };
      this.presented.push(presentation);
      if (this.auto) {
        resolve(this.auto);
        return;
      }
      const waiter = this.waiters.shift();
      if (waiter) waiter(presentation);
      else this.backlog.push(presentation);
    });
  }

  /** Resolves with the next presentation (already shown or upcoming) */
  next(): Promise<Presentation> {
    const ready = this.backlog.shift();
    if (ready) return Promise.resolve(ready);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
