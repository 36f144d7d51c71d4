/**
 * DOGE Provider — Type Definitions
 *
 * Shared interfaces for the in-page provider core and the narrow
 * collaborator contracts (signer, network, approval UI).
 * Much types. Very strict. Wow. 🐕
 */

// ============================================================================
// Network Parameters
// ============================================================================

export interface DogeNetworkParams {
  messagePrefix: string;
  bip32: {
    public: number;
    private: number;
  };
  pubKeyHash: number;
  scriptHash: number;
  wif: number;
}

export const DOGE_MAINNET: DogeNetworkParams = {
  messagePrefix: "\x19Dogecoin Signed Message:\n",
  bip32: {
    public: 0x02facafd,  // dgub
    private: 0x02fac398, // dgpv
  },
  pubKeyHash: 0x1e, // D... addresses
  scriptHash: 0x16, // 9... or A... addresses
  wif: 0x9e,
};

export const DOGE_TESTNET: DogeNetworkParams = {
  messagePrefix: "\x19Dogecoin Signed Message:\n",
  bip32: {
    public: 0x0432a9a8,  // tgub
    private: 0x0432a243, // tgpv
  },
  pubKeyHash: 0x71, // n... addresses
  scriptHash: 0xc4,
  wif: 0xf1,
};

export type DogeNetwork = "mainnet" | "testnet";

/** Chain identifier exposed to pages */
export const CHAIN_ID = "dogecoin:mainnet";

// ============================================================================
// Coins & Inscriptions
// ============================================================================

/** Unspent Transaction Output as reported by the network collaborator */
export interface UTXO {
  txid: string;
  vout: number;
  address: string;
  /** Amount in koinu (1 DOGE = 100,000,000 koinu) */
  amount: number;
  scriptPubKey: string;
  confirmations: number;
}

/** UTXO with the derived inscription-protection flag */
export interface ClassifiedUtxo extends UTXO {
  /** Below the inscription-carrier threshold, or backs a known doginal */
  protected: boolean;
}

/** Output reference: prior txid + output index */
export interface Outpoint {
  txid: string;
  vout: number;
}

export interface Doginal {
  /** Immutable inscription identifier, e.g. "<txid>i0" */
  inscriptionId: string;
  /** Backing UTXO */
  txid: string;
  vout: number;
  contentType: string;
  contentUrl: string;
  /** Displayed value in koinu, if the indexer reports one */
  value?: number;
}

export function outpointKey(o: Outpoint): string {
  return `${o.txid}:${o.vout}`;
}

// ============================================================================
// Account Snapshot
// ============================================================================

export interface BalanceSnapshot {
  /** Confirmed koinu */
  confirmed: number;
  /** Unconfirmed koinu */
  unconfirmed: number;
  /** confirmed + unconfirmed */
  total: number;
}

/** Immutable view of the active account; replaced wholesale on every change */
export interface AccountSnapshot {
  readonly address: string;
  readonly balance: Readonly<BalanceSnapshot>;
  readonly utxos: readonly ClassifiedUtxo[];
  readonly doginals: readonly Doginal[];
  /** ISO 8601 time of the last successful refresh, null before the first */
  readonly refreshedAt: string | null;
}

/** Collaborator-supplied push update for one address */
export interface AccountUpdate {
  utxos?: UTXO[];
  balance?: { confirmed: number; unconfirmed: number };
  doginals?: Doginal[];
}

// ============================================================================
// Transaction Plans
// ============================================================================

export type TxOutputRole = "recipient" | "inscription" | "dev-fee" | "change";

export interface TxOutput {
  address: string;
  /** koinu */
  amount: number;
  role: TxOutputRole;
}

/** Fully-resolved inputs/outputs ready for signing */
export interface TxPlan {
  kind: "send" | "doginal";
  /** Sender and change address */
  from: string;
  inputs: ClassifiedUtxo[];
  outputs: TxOutput[];
  /** Amount delivered to the recipient (koinu); postage sum for doginals */
  amount: number;
  devFee: number;
  /** Network fee actually paid (includes absorbed dust) */
  networkFee: number;
  change: number;
  /** amount + devFee + networkFee — what leaves the wallet */
  total: number;
  /** Inscriptions moved by this plan (doginal transfers only) */
  inscriptionIds: string[];
}

// ============================================================================
// Collaborator Contracts
// ============================================================================

/** Key material handed to the signer for exactly one operation */
export interface SigningKey {
  address: string;
  /** 32-byte private key. NEVER LOG THIS. */
  privateKey: Buffer;
}

export interface SignedTransaction {
  /** Signed transaction hex */
  signedTx: string;
  txid: string;
}

export interface SigningCapability {
  /** Must receive the full input list; the fee is inputs minus outputs */
  sign(inputs: UTXO[], outputs: TxOutput[], key: SigningKey): Promise<SignedTransaction>;
  /** Base64 65-byte recoverable signature in Dogecoin signed-message format */
  signMessage(text: string, key: SigningKey): Promise<string>;
}

export interface NetworkCapability {
  readonly name: string;
  fetchUtxos(address: string): Promise<UTXO[]>;
  fetchBalance(address: string): Promise<{ confirmed: number; unconfirmed: number }>;
  fetchDoginals(address: string): Promise<Doginal[]>;
  broadcast(signedTxHex: string): Promise<{ txid: string }>;
  /** koinu per byte; optional, the static default applies when absent */
  fetchFeeRate?(): Promise<number>;
}

export type ApprovalDecision = "approve" | "reject";

export interface ApprovalUi {
  /**
   * Show the approval to the user. The signal aborts when the approval is
   * replaced, cancelled or timed out; the UI should close and may reject.
   */
  presentApproval(approval: Readonly<PendingApproval>, signal: AbortSignal): Promise<ApprovalDecision>;
}

/** Source of the ordered derived-address list and signing keys */
export interface WalletKeyring {
  isUnlocked(): boolean;
  /** Ordered derived addresses; available while locked */
  addresses(): string[];
  /** Throws WalletLockedError when locked */
  signingKey(address: string): SigningKey;
  lock(): void;
}

// ============================================================================
// Approvals
// ============================================================================

export type ApprovalKind = "connect" | "sendTransaction" | "sendDoginal" | "signMessage";

export type ApprovalState =
  | "Created"
  | "AwaitingUserDecision"
  | "Approved"
  | "Rejected"
  | "TimedOut"
  | "Cancelled";

export interface SendTransactionParams {
  to: string;
  /** koinu */
  amount: number;
}

export interface SendDoginalParams {
  to: string;
  inscriptionIds: string[];
}

export interface SignMessageParams {
  message: string;
}

export interface ConnectParams {
  /** Page-supplied display metadata */
  title?: string;
  icon?: string;
}

export type ApprovalParams =
  | ConnectParams
  | SendTransactionParams
  | SendDoginalParams
  | SignMessageParams;

export interface PendingApproval {
  id: string;
  kind: ApprovalKind;
  origin: string;
  contextId: string;
  params: ApprovalParams;
  createdAt: string;
  expiresAt: string;
  state: ApprovalState;
  resolvedAt?: string;
  /** Fee breakdown shown to the user (fund-moving kinds) */
  quote?: TxPlan;
}

// ============================================================================
// Page Contexts & Events
// ============================================================================

/** One page context (tab/frame) attached to the provider */
export interface PageContext {
  id: string;
  origin: string;
}

export interface ProviderEvents {
  connect: { address: string; chainId: string };
  disconnect: { origin: string };
  accountsChanged: string[];
}

export type ProviderEventName = keyof ProviderEvents;

// ============================================================================
// Config Types
// ============================================================================

export interface FeesConfig {
  source: "network" | "static";
  /** Fallback/static rate in koinu per byte */
  defaultFeePerByte: number;
  /** Cap on collaborator-supplied rates */
  maxFeePerByte: number;
}

export interface UtxoConfig {
  /** Below this value a UTXO is treated as an inscription carrier (koinu) */
  protectionThreshold: number;
  /** Change at or below this is absorbed into the fee (koinu) */
  dustThreshold: number;
}

export interface DevFeeConfig {
  address: string;
  amount: number;
}

export interface DoginalConfig {
  /** Flat network fee per transferred inscription (koinu) */
  networkFeePerInscription: number;
}

export interface ApprovalConfig {
  timeoutMs: number;
}

export interface BroadcastConfig {
  maxRetries: number;
  baseDelayMs: number;
}

export interface ProviderConfig {
  network: DogeNetwork;
  /** Where grants and the audit trail persist; null keeps everything in memory */
  dataDir: string | null;
  fees: FeesConfig;
  utxo: UtxoConfig;
  devFee: DevFeeConfig;
  doginals: DoginalConfig;
  approvals: ApprovalConfig;
  broadcast: BroadcastConfig;
}

// ============================================================================
// Audit Types
// ============================================================================

export type AuditAction =
  | "connect"
  | "disconnect"
  | "approve"
  | "reject"
  | "timeout"
  | "send"
  | "doginal_transfer"
  | "sign_message"
  | "lock"
  | "account_switch"
  | "error";

export interface AuditEntry {
  id: string;
  timestamp: string;
  action: AuditAction;
  origin?: string;
  txid?: string;
  /** Amount in koinu */
  amount?: number;
  address?: string;
  /** Fee in koinu (network + dev) */
  fee?: number;
  approvalId?: string;
  reason?: string;
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Logging
// ============================================================================

export type LogFn = (level: "info" | "warn" | "error", msg: string) => void;

// ============================================================================
// Constants
// ============================================================================

/** 1 DOGE = 100,000,000 koinu */
export const KOINU_PER_DOGE = 100_000_000;

/** Convert DOGE to koinu */
export function dogeToKoinu(doge: number): number {
  return Math.round(doge * KOINU_PER_DOGE);
}

/** Convert koinu to DOGE */
export function koinuToDoge(koinu: number): number {
  return koinu / KOINU_PER_DOGE;
}
