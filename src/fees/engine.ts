/**
 * DOGE Provider — Fee Engine
 *
 * Turns a send or doginal-transfer intent into a fully-resolved plan:
 * inputs, outputs, network fee, dev fee and change. Every plan carries the
 * dev-fee output explicitly and reports it in `total`.
 *
 * Size model is P2PKH: 10 bytes overhead, 148 per input, 34 per output.
 *
 * Much fee. Very deterministic. Wow. 🐕
 */

import { selectCoins } from "../utxo/selection.js";
import { InscriptionNotFoundError, InvalidParamsError, errorMessage } from "../errors.js";
import {
  outpointKey,
  type ClassifiedUtxo,
  type Doginal,
  type LogFn,
  type NetworkCapability,
  type ProviderConfig,
  type TxOutput,
  type TxPlan,
} from "../types.js";

export const TX_OVERHEAD_BYTES = 10;
export const P2PKH_INPUT_BYTES = 148;
export const P2PKH_OUTPUT_BYTES = 34;

export function estimateTxSize(inputs: number, outputs: number): number {
  return TX_OVERHEAD_BYTES + inputs * P2PKH_INPUT_BYTES + outputs * P2PKH_OUTPUT_BYTES;
}

export function estimateFee(inputs: number, outputs: number, feePerByte: number): number {
  return estimateTxSize(inputs, outputs) * feePerByte;
}

export interface PlanSendParams {
  /** Sender (change) address */
  from: string;
  to: string;
  /** koinu */
  amount: number;
  /** Spendable snapshot coins, already filtered of reservations */
  utxos: readonly ClassifiedUtxo[];
  feePerByte: number;
}

export interface PlanDoginalParams {
  from: string;
  to: string;
  inscriptionIds: readonly string[];
  utxos: readonly ClassifiedUtxo[];
  doginals: readonly Doginal[];
}

type FeeSettings = Pick<ProviderConfig, "fees" | "utxo" | "devFee" | "doginals">;

export class FeeEngine {
  private readonly config: FeeSettings;
  private readonly network: NetworkCapability | undefined;
  private readonly log: LogFn;

  constructor(config: FeeSettings, network?: NetworkCapability, log?: LogFn) {
    this.config = config;
    this.network = network;
    this.log = log ?? (() => {});
  }

  /**
   * Current fee rate in koinu per byte.
   * Network rates are capped; a failing or absent source falls back to the default.
   */
  async feeRate(): Promise<number> {
    const { source, defaultFeePerByte, maxFeePerByte } = this.config.fees;
    if (source !== "network" || !this.network?.fetchFeeRate) {
      return defaultFeePerByte;
    }
    try {
      const rate = await this.network.fetchFeeRate();
      if (!Number.isFinite(rate) || rate <= 0) {
        this.log("warn", `doge-provider: ignoring fee rate ${rate} from ${this.network.name}`);
        return defaultFeePerByte;
      }
      return Math.min(Math.ceil(rate), maxFeePerByte);
    } catch (err: unknown) {
      this.log("warn", `doge-provider: fee rate unavailable (${errorMessage(err)}), using default`);
      return defaultFeePerByte;
    }
  }

  /**
   * Plan a plain-value send: recipient + dev fee + change (when above dust).
   *
   * @throws InsufficientFundsError if unprotected coins cannot cover it
   */
  planSend(params: PlanSendParams): TxPlan {
    const { amount, feePerByte } = params;
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new InvalidParamsError("sendTransaction", "amount must be a positive integer of koinu");
    }

    const devFee = this.config.devFee.amount;
    const target = amount + devFee;
    const fixedOutputs = devFee > 0 ? 2 : 1;

    // Estimate with the change output present; drop it afterwards if it is dust
    const selection = selectCoins(params.utxos, target, (n) =>
      estimateFee(n, fixedOutputs + 1, feePerByte),
    );

    const outputs: TxOutput[] = [{ address: params.to, amount, role: "recipient" }];
    if (devFee > 0) {
      outputs.push({ address: this.config.devFee.address, amount: devFee, role: "dev-fee" });
    }

    const { change, networkFee } = this.settleChange(selection.totalInput, target, selection.fee);
    if (change > 0) {
      outputs.push({ address: params.from, amount: change, role: "change" });
    }

    return {
      kind: "send",
      from: params.from,
      inputs: selection.selected,
      outputs,
      amount,
      devFee,
      networkFee,
      change,
      total: amount + devFee + networkFee,
      inscriptionIds: [],
    };
  }

  /**
   * Plan a transfer of one or more doginals to a single recipient.
   *
   * Each backing UTXO is spent into its own recipient output, in the order
   * given. The flat network fee scales with the count. When the last backing
   * coin can pay the dev and network fees and still keep at least the dust
   * threshold, the fees come out of its output; otherwise its full value is
   * kept and unprotected coins fund the fees. Fees only ever reduce the last
   * output, so every inscription stays at the start of its own output.
   *
   * @throws InscriptionNotFoundError if an id has no current backing UTXO
   * @throws InsufficientFundsError if unprotected coins cannot cover the fees
   */
  planDoginalTransfer(params: PlanDoginalParams): TxPlan {
    const { inscriptionIds } = params;
    if (inscriptionIds.length === 0) {
      throw new InvalidParamsError("sendDoginal", "at least one inscription id is required");
    }
    if (new Set(inscriptionIds).size !== inscriptionIds.length) {
      throw new InvalidParamsError("sendDoginal", "duplicate inscription id");
    }

    const byOutpoint = new Map(params.utxos.map((u) => [outpointKey(u), u]));
    const backing: ClassifiedUtxo[] = [];
    for (const id of inscriptionIds) {
      const doginal = params.doginals.find((d) => d.inscriptionId === id);
      const utxo = doginal ? byOutpoint.get(outpointKey(doginal)) : undefined;
      if (!utxo) {
        throw new InscriptionNotFoundError(id);
      }
      backing.push(utxo);
    }

    const devFee = this.config.devFee.amount;
    const flatFee = this.config.doginals.networkFeePerInscription * inscriptionIds.length;
    const fees = devFee + flatFee;
    const last = backing.length - 1;
    const selfFunded = backing[last].amount - fees >= this.config.utxo.dustThreshold;

    const outputs: TxOutput[] = backing.map((u, i) => ({
      address: params.to,
      amount: selfFunded && i === last ? u.amount - fees : u.amount,
      role: "inscription" as const,
    }));
    if (devFee > 0) {
      outputs.push({ address: this.config.devFee.address, amount: devFee, role: "dev-fee" });
    }

    const inputs = [...backing];
    let change = 0;
    let networkFee = flatFee;
    if (!selfFunded) {
      const backingKeys = new Set(backing.map((u) => outpointKey(u)));
      const funding = selectCoins(
        params.utxos.filter((u) => !backingKeys.has(outpointKey(u))),
        fees,
        () => 0,
      );
      inputs.push(...funding.selected);
      const settled = this.settleChange(funding.totalInput, devFee, flatFee);
      change = settled.change;
      networkFee = settled.networkFee;
      if (change > 0) {
        outputs.push({ address: params.from, amount: change, role: "change" });
      }
    }

    const postage = outputs.reduce((sum, o) => (o.role === "inscription" ? sum + o.amount : sum), 0);
    return {
      kind: "doginal",
      from: params.from,
      inputs,
      outputs,
      amount: postage,
      devFee,
      networkFee,
      change,
      total: postage + devFee + networkFee,
      inscriptionIds: [...inscriptionIds],
    };
  }

  /** Change above dust goes back to the sender; anything else becomes fee */
  private settleChange(
    totalInput: number,
    target: number,
    fee: number,
  ): { change: number; networkFee: number } {
    const excess = totalInput - target - fee;
    if (excess > this.config.utxo.dustThreshold) {
      return { change: excess, networkFee: fee };
    }
    return { change: 0, networkFee: totalInput - target };
  }
}
