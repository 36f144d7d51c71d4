/**
 * DOGE Provider — Custom Error Types
 *
 * Every privileged-operation failure a page can observe is one of these.
 * The messages are part of the page-facing contract: do not reword them.
 *
 * Much error. Very descriptive. Wow. 🐕
 */

/** Base wallet error — all provider errors extend this */
export class WalletError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "WalletError";
    this.code = code;
  }
}

/** Origin has no grant */
export class NotConnectedError extends WalletError {
  constructor() {
    super("NOT_CONNECTED", "Site not connected");
    this.name = "NotConnectedError";
  }
}

export type RejectionKind = "connect" | "transaction" | "doginalTransfer" | "signing";

const REJECTION_MESSAGES: Record<RejectionKind, string> = {
  connect: "Connection rejected by user",
  transaction: "Transaction rejected by user",
  doginalTransfer: "Doginal transfer rejected by user",
  signing: "Message signing rejected by user",
};

/** User declined an approval */
export class UserRejectedError extends WalletError {
  public readonly kind: RejectionKind;

  constructor(kind: RejectionKind) {
    super("USER_REJECTED", REJECTION_MESSAGES[kind]);
    this.name = "UserRejectedError";
    this.kind = kind;
  }
}

/** Wallet is locked — private keys not in memory */
export class WalletLockedError extends WalletError {
  constructor() {
    super("WALLET_LOCKED", "Wallet is locked");
    this.name = "WalletLockedError";
  }
}

/** Eligible coins cannot cover target + fees */
export class InsufficientFundsError extends WalletError {
  public readonly required?: number;
  public readonly available?: number;

  constructor(required?: number, available?: number) {
    // Amounts stay on the instance; the page only sees the generic message
    super("INSUFFICIENT_FUNDS", "Insufficient funds");
    this.name = "InsufficientFundsError";
    this.required = required;
    this.available = available;
  }
}

/** Named inscription has no current backing UTXO */
export class InscriptionNotFoundError extends WalletError {
  public readonly inscriptionId: string;

  constructor(inscriptionId: string) {
    super("INSCRIPTION_NOT_FOUND", `Inscription not found: ${inscriptionId}`);
    this.name = "InscriptionNotFoundError";
    this.inscriptionId = inscriptionId;
  }
}

export class UnsupportedMethodError extends WalletError {
  public readonly method: string;

  constructor(method: string) {
    super("UNSUPPORTED_METHOD", `Unsupported method: ${method}`);
    this.name = "UnsupportedMethodError";
    this.method = method;
  }
}

export class InvalidParamsError extends WalletError {
  constructor(method: string, detail?: string) {
    super("INVALID_PARAMS", detail ? `Invalid params for ${method}: ${detail}` : `Invalid params for ${method}`);
    this.name = "InvalidParamsError";
  }
}

export class SigningFailedError extends WalletError {
  constructor(detail: string) {
    super("SIGNING_FAILED", `Signing failed: ${detail}`);
    this.name = "SigningFailedError";
  }
}

export class BroadcastFailedError extends WalletError {
  /** Non-retriable network verdict, e.g. DOUBLE_SPEND or FEE_TOO_LOW */
  public readonly reason?: string;

  constructor(detail: string, reason?: string) {
    super("BROADCAST_FAILED", `Broadcast failed: ${detail}`);
    this.name = "BroadcastFailedError";
    this.reason = reason;
  }
}

/** No user decision within the approval window — treated as rejection */
export class ApprovalTimeoutError extends WalletError {
  constructor() {
    super("TIMEOUT", "Approval request timed out");
    this.name = "ApprovalTimeoutError";
  }
}

/** Requesting page context went away before a decision */
export class RequestCancelledError extends WalletError {
  constructor() {
    super("CANCELLED", "Request cancelled");
    this.name = "RequestCancelledError";
  }
}

/** Every network collaborator failed */
export class ProviderUnavailableError extends WalletError {
  public readonly providers: string[];

  constructor(providers: string[]) {
    super(
      "PROVIDER_UNAVAILABLE",
      `All network providers are down (${providers.join(", ")}). Much sadness. Very offline. 🐕`,
    );
    this.name = "ProviderUnavailableError";
    this.providers = providers;
  }
}

/** Normalise an unknown thrown value into a message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
