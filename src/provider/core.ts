/**
 * DOGE Provider — Core
 *
 * Composition root: owns the permission store, account state, fee engine,
 * approval workflow, transaction builder, event bus and router, and
 * implements the operations the router dispatches to.
 *
 * Much core. Very provide. Wow. 🐕
 */

import { randomUUID } from "node:crypto";
import { PermissionStore } from "../permissions/store.js";
import { AccountState } from "../account/state.js";
import { FeeEngine } from "../fees/engine.js";
import { ApprovalWorkflow } from "../approval/workflow.js";
import { TransactionBuilder } from "../tx/builder.js";
import { BitcoreSigner } from "../tx/signer.js";
import { EventBus } from "../events/bus.js";
import { RequestRouter } from "../router/router.js";
import { AuditLog } from "../audit.js";
import { PageProvider } from "./page.js";
import { isValidAddress } from "../keys/derivation.js";
import { InvalidParamsError, NotConnectedError, WalletError, WalletLockedError, errorMessage } from "../errors.js";
import {
  CHAIN_ID,
  type AccountSnapshot,
  type AccountUpdate,
  type ApprovalUi,
  type AuditEntry,
  type ConnectParams,
  type Doginal,
  type LogFn,
  type NetworkCapability,
  type PageContext,
  type PendingApproval,
  type ProviderConfig,
  type SendDoginalParams,
  type SendTransactionParams,
  type SignMessageParams,
  type SigningCapability,
  type WalletKeyring,
} from "../types.js";
import type {
  BalanceResult,
  ConnectResult,
  ConnectionStatus,
  ProviderOperations,
  SignatureResult,
  TxResult,
} from "../router/methods.js";

export interface ProviderCoreOptions {
  config: ProviderConfig;
  keyring: WalletKeyring;
  network: NetworkCapability;
  ui: ApprovalUi;
  /** Defaults to the bitcore-backed signer for `config.network` */
  signer?: SigningCapability;
  log?: LogFn;
  /** Broadcast backoff sleep, injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export class ProviderCore implements ProviderOperations {
  readonly permissions: PermissionStore;
  readonly account: AccountState;
  readonly events: EventBus;
  readonly approvals: ApprovalWorkflow;
  readonly audit: AuditLog | null;

  private readonly config: ProviderConfig;
  private readonly keyring: WalletKeyring;
  private readonly builder: TransactionBuilder;
  private readonly router: RequestRouter;
  private readonly log: LogFn;
  private readonly contexts = new Map<string, PageContext>();

  constructor(opts: ProviderCoreOptions) {
    const { config, keyring, network } = opts;
    this.config = config;
    this.keyring = keyring;
    this.log = opts.log ?? (() => {});

    this.audit = config.dataDir ? new AuditLog(config.dataDir, this.log) : null;
    this.permissions = new PermissionStore(config.dataDir, this.log);
    this.events = new EventBus(this.log);
    this.account = new AccountState({
      network,
      addresses: () => keyring.addresses(),
      protectionThreshold: config.utxo.protectionThreshold,
      onAccountsChanged: (addresses) => this.onAccountSwitched(addresses),
      log: this.log,
    });
    this.approvals = new ApprovalWorkflow({
      ui: opts.ui,
      timeoutMs: config.approvals.timeoutMs,
      audit: this.audit ?? undefined,
      log: this.log,
    });
    this.builder = new TransactionBuilder({
      account: this.account,
      fees: new FeeEngine(config, network, this.log),
      signer: opts.signer ?? new BitcoreSigner(config.network),
      network,
      keyring,
      broadcast: config.broadcast,
      log: this.log,
      sleep: opts.sleep,
    });
    this.router = new RequestRouter(this, this.permissions, this.log);
  }

  /**
   * Build a core and restore persisted grants (retargeted to the active account).
   */
  static async create(opts: ProviderCoreOptions): Promise<ProviderCore> {
    const core = new ProviderCore(opts);
    await core.permissions.load();
    if (core.permissions.connectedOrigins().length > 0) {
      core.permissions.retarget([core.account.currentAddress()]);
    }
    return core;
  }

  // --------------------------------------------------------------------------
  // Host API
  // --------------------------------------------------------------------------

  /**
   * Create a page context for an origin and hand back its provider object.
   */
  attach(origin: string): PageProvider {
    if (typeof origin !== "string" || origin.length === 0) {
      throw new WalletError("INVALID_ORIGIN", "Page origin is required");
    }
    const context: PageContext = { id: randomUUID(), origin };
    this.contexts.set(context.id, context);
    this.log("info", `doge-provider: attached context ${context.id} for ${origin}`);
    return new PageProvider(context, this.router, this.events, () => this.contexts.has(context.id));
  }

  /**
   * Tear a page context down: its pending approvals are cancelled and its
   * subscriptions dropped.
   */
  detach(contextId: string): void {
    if (!this.contexts.delete(contextId)) return;
    const cancelled = this.approvals.cancelContext(contextId);
    this.events.teardown(contextId);
    this.log("info", `doge-provider: detached context ${contextId} (${cancelled} approval(s) cancelled)`);
  }

  /**
   * Lock the wallet: cancel every approval, drop all grants, zero keys, and
   * tell each formerly connected origin.
   */
  lock(): void {
    this.approvals.cancelAll();
    const origins = this.permissions.clear();
    this.keyring.lock();
    this.account.clear();
    this.record({ action: "lock", reason: `${origins.length} origin(s) disconnected` });
    for (const origin of origins) {
      this.notifyDisconnected(origin);
    }
    this.log("info", "doge-provider: wallet locked");
  }

  /**
   * Make another derived account active.
   *
   * @returns the new active address
   */
  switchAccount(index: number): string {
    return this.account.switchAccount(index);
  }

  refresh(): Promise<AccountSnapshot> {
    return this.account.refresh();
  }

  /** Collaborator push update */
  applyUpdate(address: string, update: AccountUpdate): boolean {
    return this.account.applyUpdate(address, update);
  }

  pendingApprovals(): PendingApproval[] {
    return this.approvals.pending();
  }

  /** Wait for queued grant writes */
  flush(): Promise<void> {
    return this.permissions.flush();
  }

  // --------------------------------------------------------------------------
  // Operations (dispatched by the router)
  // --------------------------------------------------------------------------

  async connect(ctx: PageContext, params: ConnectParams): Promise<ConnectResult> {
    this.requireUnlocked();
    if (this.permissions.isConnected(ctx.origin)) {
      return { address: this.account.currentAddress(), chainId: CHAIN_ID };
    }

    const address = await this.approvals.requestConnect(ctx, params, async (approval) => {
      const granted = this.account.currentAddress();
      this.permissions.grant(ctx.origin, [granted]);
      this.record({ action: "connect", origin: ctx.origin, approvalId: approval.id, address: granted });
      this.events.emit("connect", { address: granted, chainId: CHAIN_ID }, (c) => c.origin === ctx.origin);
      return granted;
    });
    return { address, chainId: CHAIN_ID };
  }

  async disconnect(ctx: PageContext): Promise<void> {
    if (!this.permissions.revoke(ctx.origin)) return;
    const cancelled = this.approvals.cancelOrigin(ctx.origin);
    this.record({ action: "disconnect", origin: ctx.origin, reason: `${cancelled} approval(s) cancelled` });
    this.notifyDisconnected(ctx.origin);
  }

  isConnected(ctx: PageContext): boolean {
    return this.permissions.isConnected(ctx.origin);
  }

  connectionStatus(ctx: PageContext): ConnectionStatus {
    if (!this.permissions.isConnected(ctx.origin)) {
      return { connected: false, chainId: CHAIN_ID };
    }
    return { connected: true, address: this.account.currentAddress(), chainId: CHAIN_ID };
  }

  address(_ctx: PageContext): string {
    return this.account.currentAddress();
  }

  async balance(_ctx: PageContext): Promise<BalanceResult> {
    const snap = await this.account.read();
    return { address: snap.address, ...snap.balance };
  }

  async doginals(_ctx: PageContext): Promise<Doginal[]> {
    const snap = await this.account.read();
    return snap.doginals.map((d) => ({ ...d }));
  }

  async sendTransaction(ctx: PageContext, params: SendTransactionParams): Promise<TxResult> {
    this.requireUnlocked();
    this.requireRecipient("sendTransaction", params.to);
    return this.approvals.requestPrivileged(ctx, "sendTransaction", params, {
      prepare: (approval) => this.builder.quoteSend(params, approval.id),
      execute: (approval) => this.executeSpend(approval),
      release: (approval) => {
        this.account.release(approval.id);
      },
    });
  }

  async sendDoginal(ctx: PageContext, params: SendDoginalParams): Promise<TxResult> {
    this.requireUnlocked();
    this.requireRecipient("sendDoginal", params.to);
    return this.approvals.requestPrivileged(ctx, "sendDoginal", params, {
      prepare: (approval) => this.builder.quoteDoginal(params, approval.id),
      execute: (approval) => this.executeSpend(approval),
      release: (approval) => {
        this.account.release(approval.id);
      },
    });
  }

  async signMessage(ctx: PageContext, params: SignMessageParams): Promise<SignatureResult> {
    this.requireUnlocked();
    return this.approvals.requestPrivileged(ctx, "signMessage", params, {
      execute: async (approval) => {
        this.requireConnected(approval.origin);
        const address = this.account.currentAddress();
        const signature = await this.builder.signMessage(params.message);
        this.record({ action: "sign_message", origin: ctx.origin, approvalId: approval.id, address });
        return { address, signature };
      },
    });
  }

  chainId(): string {
    return CHAIN_ID;
  }

  // ---- Private helpers ----

  private async executeSpend(approval: Readonly<PendingApproval>): Promise<TxResult> {
    this.requireConnected(approval.origin);
    const plan = approval.quote;
    if (!plan) {
      throw new WalletError("NO_QUOTE", `Approval ${approval.id} has no transaction plan`);
    }
    try {
      const { txid } = await this.builder.execute(plan);
      if (this.audit) {
        void this.audit.logSpend(approval.origin, approval.id, plan, txid);
      }
      return { txid };
    } catch (err: unknown) {
      this.record({
        action: "error",
        origin: approval.origin,
        approvalId: approval.id,
        reason: `${approval.kind} failed: ${errorMessage(err)}`,
      });
      throw err;
    }
  }

  private onAccountSwitched(addresses: string[]): void {
    // Quotes from the previous account can no longer be honoured
    this.approvals.cancelAll();
    this.permissions.retarget(addresses);
    this.record({ action: "account_switch", address: addresses[0] });
    this.events.emit("accountsChanged", addresses, (c) => this.permissions.isConnected(c.origin));
  }

  private notifyDisconnected(origin: string): void {
    const sameOrigin = (c: PageContext): boolean => c.origin === origin;
    this.events.emit("disconnect", { origin }, sameOrigin);
    this.events.emit("accountsChanged", [], sameOrigin);
  }

  private requireUnlocked(): void {
    if (!this.keyring.isUnlocked()) throw new WalletLockedError();
  }

  /** Grants can be revoked while an approval is on screen */
  private requireConnected(origin: string): void {
    if (!this.permissions.isConnected(origin)) throw new NotConnectedError();
  }

  private requireRecipient(method: string, address: string): void {
    if (!isValidAddress(address, this.config.network)) {
      throw new InvalidParamsError(method, "invalid recipient address");
    }
  }

  private record(entry: Omit<AuditEntry, "id" | "timestamp">): void {
    if (this.audit) {
      void this.audit.logAudit(entry);
    }
  }
}
