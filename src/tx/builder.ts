/**
 * DOGE Provider — Transaction Builder
 *
 * Glue between the fee engine, account state, signer and broadcaster.
 * Quotes run before the user is asked; execution runs after approval and
 * only touches local state once the network has accepted the transaction.
 *
 * Much build. Very sign. Wow. 🐕
 */

import { broadcastTransaction } from "./broadcaster.js";
import { addressToScriptPubKey } from "../keys/derivation.js";
import {
  BroadcastFailedError,
  InsufficientFundsError,
  SigningFailedError,
  WalletError,
  WalletLockedError,
  errorMessage,
} from "../errors.js";
import type { AccountState } from "../account/state.js";
import type { FeeEngine } from "../fees/engine.js";
import {
  outpointKey,
  type BroadcastConfig,
  type LogFn,
  type NetworkCapability,
  type SendDoginalParams,
  type SendTransactionParams,
  type SignedTransaction,
  type SigningCapability,
  type TxPlan,
  type UTXO,
  type WalletKeyring,
} from "../types.js";

export interface TransactionBuilderOptions {
  account: AccountState;
  fees: FeeEngine;
  signer: SigningCapability;
  network: NetworkCapability;
  keyring: WalletKeyring;
  broadcast: BroadcastConfig;
  log?: LogFn;
  /** Backoff sleep, injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecutionResult {
  txid: string;
}

export class TransactionBuilder {
  private readonly account: AccountState;
  private readonly fees: FeeEngine;
  private readonly signer: SigningCapability;
  private readonly network: NetworkCapability;
  private readonly keyring: WalletKeyring;
  private readonly broadcastConfig: BroadcastConfig;
  private readonly log: LogFn;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(opts: TransactionBuilderOptions) {
    this.account = opts.account;
    this.fees = opts.fees;
    this.signer = opts.signer;
    this.network = opts.network;
    this.keyring = opts.keyring;
    this.broadcastConfig = opts.broadcast;
    this.log = opts.log ?? (() => {});
    this.sleep = opts.sleep;
  }

  // --------------------------------------------------------------------------
  // Quotes
  // --------------------------------------------------------------------------

  /**
   * Plan a send against fresh state and reserve its inputs for the approval.
   */
  async quoteSend(params: SendTransactionParams, approvalId: string): Promise<TxPlan> {
    await this.fresh();
    const feePerByte = await this.fees.feeRate();
    const plan = this.fees.planSend({
      from: this.account.currentAddress(),
      to: params.to,
      amount: params.amount,
      utxos: this.account.spendableUtxos(),
      feePerByte,
    });
    this.account.reserve(plan.inputs, approvalId);
    this.log(
      "info",
      `doge-provider: quoted send ${approvalId}: ${plan.amount} + dev ${plan.devFee} + fee ${plan.networkFee} koinu, ${plan.inputs.length} input(s)`,
    );
    return plan;
  }

  async quoteDoginal(params: SendDoginalParams, approvalId: string): Promise<TxPlan> {
    await this.fresh();
    const plan = this.fees.planDoginalTransfer({
      from: this.account.currentAddress(),
      to: params.to,
      inscriptionIds: params.inscriptionIds,
      utxos: this.account.spendableUtxos(),
      doginals: this.account.doginals(),
    });
    this.account.reserve(plan.inputs, approvalId);
    this.log(
      "info",
      `doge-provider: quoted doginal transfer ${approvalId}: ${plan.inscriptionIds.length} inscription(s), fee ${plan.networkFee} koinu`,
    );
    return plan;
  }

  // --------------------------------------------------------------------------
  // Execution
  // --------------------------------------------------------------------------

  /**
   * Sign and broadcast an approved plan, then record the spend locally.
   *
   * @throws InsufficientFundsError if a planned input is gone or the account changed
   * @throws SigningFailedError / BroadcastFailedError; local state is untouched
   */
  async execute(plan: TxPlan): Promise<ExecutionResult> {
    if (!this.keyring.isUnlocked()) {
      throw new WalletLockedError();
    }
    if (plan.from !== this.account.currentAddress()) {
      throw new InsufficientFundsError();
    }
    const present = new Set(this.account.utxoSet().map((u) => outpointKey(u)));
    if (!plan.inputs.every((u) => present.has(outpointKey(u)))) {
      this.log("warn", "doge-provider: planned inputs no longer available");
      throw new InsufficientFundsError();
    }

    const signed = await this.signPlan(plan);

    const result = await broadcastTransaction(signed.signedTx, this.network, {
      maxRetries: this.broadcastConfig.maxRetries,
      baseDelayMs: this.broadcastConfig.baseDelayMs,
      log: this.log,
      sleep: this.sleep,
    });

    this.account.markSpent(plan.inputs, result.txid, this.changeUtxo(plan, result.txid));
    return { txid: result.txid };
  }

  /**
   * Sign a message with the active account's key.
   */
  async signMessage(text: string): Promise<string> {
    const key = this.keyring.signingKey(this.account.currentAddress());
    try {
      return await this.signer.signMessage(text, key);
    } catch (err: unknown) {
      if (err instanceof WalletError) throw err;
      throw new SigningFailedError(errorMessage(err));
    } finally {
      key.privateKey.fill(0);
    }
  }

  // ---- Private helpers ----

  private async fresh(): Promise<void> {
    try {
      await this.account.ensureFresh();
    } catch (err: unknown) {
      throw new BroadcastFailedError(`account state unavailable: ${errorMessage(err)}`);
    }
  }

  private async signPlan(plan: TxPlan): Promise<SignedTransaction> {
    const key = this.keyring.signingKey(plan.from);
    try {
      return await this.signer.sign(plan.inputs, plan.outputs, key);
    } catch (err: unknown) {
      if (err instanceof WalletError) throw err;
      throw new SigningFailedError(errorMessage(err));
    } finally {
      key.privateKey.fill(0);
    }
  }

  private changeUtxo(plan: TxPlan, txid: string): UTXO | undefined {
    const vout = plan.outputs.findIndex((o) => o.role === "change");
    if (vout < 0) return undefined;
    return {
      txid,
      vout,
      address: plan.from,
      amount: plan.outputs[vout].amount,
      scriptPubKey: addressToScriptPubKey(plan.from),
      confirmations: 0,
    };
  }
}
