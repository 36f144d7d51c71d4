/**
 * DOGE Provider — Page Method Table
 *
 * Every page-callable method: its parameter schema, whether the origin must
 * be connected, and the operation it runs. Direct methods and `request()`
 * both dispatch through this table.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidParamsError } from "../errors.js";
import type {
  ConnectParams,
  Doginal,
  PageContext,
  SendDoginalParams,
  SendTransactionParams,
  SignMessageParams,
} from "../types.js";

// ============================================================================
// Results
// ============================================================================

export interface ConnectResult {
  address: string;
  chainId: string;
}

export interface ConnectionStatus {
  connected: boolean;
  /** Active address, only while connected */
  address?: string;
  chainId: string;
}

export interface BalanceResult {
  address: string;
  /** koinu */
  confirmed: number;
  unconfirmed: number;
  total: number;
}

export interface TxResult {
  txid: string;
}

export interface SignatureResult {
  address: string;
  /** Base64, 65-byte recoverable signature */
  signature: string;
}

/** What the router needs from the provider core */
export interface ProviderOperations {
  connect(ctx: PageContext, params: ConnectParams): Promise<ConnectResult>;
  disconnect(ctx: PageContext): Promise<void>;
  isConnected(ctx: PageContext): boolean;
  connectionStatus(ctx: PageContext): ConnectionStatus;
  address(ctx: PageContext): string;
  balance(ctx: PageContext): Promise<BalanceResult>;
  doginals(ctx: PageContext): Promise<Doginal[]>;
  sendTransaction(ctx: PageContext, params: SendTransactionParams): Promise<TxResult>;
  sendDoginal(ctx: PageContext, params: SendDoginalParams): Promise<TxResult>;
  signMessage(ctx: PageContext, params: SignMessageParams): Promise<SignatureResult>;
  chainId(): string;
}

export interface MethodResults {
  connect: ConnectResult;
  disconnect: void;
  isConnected: boolean;
  getConnectionStatus: ConnectionStatus;
  getAddress: string;
  getBalance: BalanceResult;
  getDoginals: Doginal[];
  sendTransaction: TxResult;
  sendDoginal: TxResult;
  signMessage: SignatureResult;
  getChainId: string;
}

export type MethodName = keyof MethodResults;

export interface MethodHandler<R> {
  name: MethodName;
  /** Origin must hold a grant */
  requiresConnection: boolean;
  /** Validates the raw params, then runs */
  invoke(ctx: PageContext, raw: unknown): Promise<R>;
}

export type MethodTable = { [K in MethodName]: MethodHandler<MethodResults[K]> };

// ============================================================================
// Schemas
// ============================================================================

const NoParams = Type.Object({});

const ConnectSchema = Type.Object({
  title: Type.Optional(Type.String({ maxLength: 200 })),
  icon: Type.Optional(Type.String({ maxLength: 2048 })),
});

const SendTransactionSchema = Type.Object({
  to: Type.String({ minLength: 1, description: "Recipient DOGE address" }),
  amount: Type.Integer({ minimum: 1, description: "Amount in koinu" }),
});

const SendDoginalSchema = Type.Object({
  to: Type.String({ minLength: 1, description: "Recipient DOGE address" }),
  inscriptionIds: Type.Array(Type.String({ minLength: 1 }), { minItems: 1, description: "Inscriptions to transfer" }),
});

const SignMessageSchema = Type.Object({
  message: Type.String({ minLength: 1, maxLength: 10_000 }),
});

/** Shape of the generic `request()` argument */
export const RequestSchema = Type.Object({
  method: Type.String({ minLength: 1 }),
  params: Type.Optional(Type.Unknown()),
});

// ============================================================================
// Aliases
// ============================================================================

/** Alternate names accepted by `request()` */
export const METHOD_ALIASES: Readonly<Record<string, MethodName>> = {
  doge_connect: "connect",
  doge_requestAccounts: "connect",
  doge_disconnect: "disconnect",
  doge_isConnected: "isConnected",
  doge_getConnectionStatus: "getConnectionStatus",
  doge_accounts: "getAddress",
  doge_getAddress: "getAddress",
  doge_getBalance: "getBalance",
  doge_getDoginals: "getDoginals",
  doge_sendTransaction: "sendTransaction",
  doge_sendDoginal: "sendDoginal",
  doge_signMessage: "signMessage",
  doge_chainId: "getChainId",
};

// ============================================================================
// Table
// ============================================================================

function defineMethod<S extends TSchema, R>(
  name: MethodName,
  schema: S,
  requiresConnection: boolean,
  run: (ctx: PageContext, params: Static<S>) => Promise<R>,
): MethodHandler<R> {
  return {
    name,
    requiresConnection,
    async invoke(ctx, raw) {
      const params: unknown = raw ?? {};
      if (!Value.Check(schema, params)) {
        const first = Value.Errors(schema, params).First();
        throw new InvalidParamsError(name, first ? `${first.path || "params"}: ${first.message}` : undefined);
      }
      return run(ctx, params);
    },
  };
}

export function createMethodTable(ops: ProviderOperations): MethodTable {
  return {
    connect: defineMethod("connect", ConnectSchema, false, (ctx, p) => ops.connect(ctx, p)),
    disconnect: defineMethod("disconnect", NoParams, false, (ctx) => ops.disconnect(ctx)),
    isConnected: defineMethod("isConnected", NoParams, false, async (ctx) => ops.isConnected(ctx)),
    getConnectionStatus: defineMethod("getConnectionStatus", NoParams, false, async (ctx) =>
      ops.connectionStatus(ctx),
    ),
    getAddress: defineMethod("getAddress", NoParams, true, async (ctx) => ops.address(ctx)),
    getBalance: defineMethod("getBalance", NoParams, true, (ctx) => ops.balance(ctx)),
    getDoginals: defineMethod("getDoginals", NoParams, true, (ctx) => ops.doginals(ctx)),
    sendTransaction: defineMethod("sendTransaction", SendTransactionSchema, true, (ctx, p) =>
      ops.sendTransaction(ctx, p),
    ),
    sendDoginal: defineMethod("sendDoginal", SendDoginalSchema, true, (ctx, p) => ops.sendDoginal(ctx, p)),
    signMessage: defineMethod("signMessage", SignMessageSchema, true, (ctx, p) => ops.signMessage(ctx, p)),
    getChainId: defineMethod("getChainId", NoParams, false, async () => ops.chainId()),
  };
}
