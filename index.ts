/**
 * DOGE Provider — public entry point
 *
 * In-page provider core for a non-custodial Dogecoin wallet: per-origin
 * permissions, account state, inscription-safe coin selection, fee math,
 * user approvals and page events.
 *
 * Much provide. Very wallet. Wow. 🐕
 */

export { ProviderCore, type ProviderCoreOptions } from "./src/provider/core.js";
export { PageProvider } from "./src/provider/page.js";
export { parseProviderConfig, DEFAULTS } from "./src/config.js";

export { PermissionStore, type OriginPermission } from "./src/permissions/store.js";
export { AccountState, type AccountStateOptions } from "./src/account/state.js";
export { ApprovalWorkflow, type PrivilegedHandlers, type PrivilegedKind } from "./src/approval/workflow.js";
export { EventBus, type EventListener } from "./src/events/bus.js";
export { RequestRouter } from "./src/router/router.js";
export {
  METHOD_ALIASES,
  type BalanceResult,
  type ConnectResult,
  type ConnectionStatus,
  type MethodName,
  type SignatureResult,
  type TxResult,
} from "./src/router/methods.js";

export { FeeEngine, estimateFee, estimateTxSize } from "./src/fees/engine.js";
export { selectCoins } from "./src/utxo/selection.js";
export { classifyUtxos, isProtected } from "./src/utxo/protection.js";
export { TransactionBuilder } from "./src/tx/builder.js";
export { BitcoreSigner, messageHash } from "./src/tx/signer.js";
export { broadcastTransaction, computeTxid } from "./src/tx/broadcaster.js";

export { HdKeyring, InvalidMnemonicError } from "./src/keys/keyring.js";
export { isValidAddress, addressToScriptPubKey } from "./src/keys/derivation.js";
export { FailoverNetwork } from "./src/api/failover.js";
export { AuditLog } from "./src/audit.js";

export * from "./src/errors.js";
export * from "./src/types.js";
