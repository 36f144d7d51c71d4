/**
 * DOGE Provider — Page-Facing Provider
 *
 * The object a host injects into one page context. Every call goes through
 * the request router, so direct methods and `request()` behave the same.
 * Once the host detaches the context, every call fails with
 * RequestCancelledError.
 */

import { CHAIN_ID, type ConnectParams, type Doginal, type PageContext, type ProviderEventName } from "../types.js";
import type { EventBus, EventListener } from "../events/bus.js";
import type { RequestRouter } from "../router/router.js";
import { RequestCancelledError } from "../errors.js";
import type {
  BalanceResult,
  ConnectResult,
  ConnectionStatus,
  MethodName,
  MethodResults,
  SignatureResult,
  TxResult,
} from "../router/methods.js";

export class PageProvider {
  readonly isDogecoin = true;
  readonly chainId = CHAIN_ID;

  private readonly context: PageContext;
  private readonly router: RequestRouter;
  private readonly events: EventBus;
  private readonly attached: () => boolean;

  constructor(context: PageContext, router: RequestRouter, events: EventBus, attached: () => boolean) {
    this.context = context;
    this.router = router;
    this.events = events;
    this.attached = attached;
  }

  get contextId(): string {
    return this.context.id;
  }

  get origin(): string {
    return this.context.origin;
  }

  connect(params?: ConnectParams): Promise<ConnectResult> {
    return this.call("connect", params);
  }

  disconnect(): Promise<void> {
    return this.call("disconnect");
  }

  isConnected(): Promise<boolean> {
    return this.call("isConnected");
  }

  getConnectionStatus(): Promise<ConnectionStatus> {
    return this.call("getConnectionStatus");
  }

  getAddress(): Promise<string> {
    return this.call("getAddress");
  }

  getBalance(): Promise<BalanceResult> {
    return this.call("getBalance");
  }

  getDoginals(): Promise<Doginal[]> {
    return this.call("getDoginals");
  }

  /** `amount` is in koinu */
  sendTransaction(params: { to: string; amount: number }): Promise<TxResult> {
    return this.call("sendTransaction", params);
  }

  sendDoginal(params: { to: string; inscriptionIds: string[] }): Promise<TxResult> {
    return this.call("sendDoginal", params);
  }

  signMessage(message: string): Promise<SignatureResult> {
    return this.call("signMessage", { message });
  }

  getChainId(): Promise<string> {
    return this.call("getChainId");
  }

  /** Generic entry point: `{ method, params }` with direct names or doge_* aliases */
  async request(args: { method: string; params?: unknown }): Promise<unknown> {
    this.requireAttached();
    return this.router.request(this.context, args);
  }

  /**
   * @returns a function that removes the listener
   */
  on<E extends ProviderEventName>(event: E, listener: EventListener<E>): () => void {
    this.requireAttached();
    return this.events.subscribe(this.context, event, listener);
  }

  off<E extends ProviderEventName>(event: E, listener: EventListener<E>): void {
    this.events.unsubscribe(this.context.id, event, listener);
  }

  private async call<K extends MethodName>(name: K, params?: unknown): Promise<MethodResults[K]> {
    this.requireAttached();
    return this.router.call(this.context, name, params);
  }

  private requireAttached(): void {
    if (!this.attached()) throw new RequestCancelledError();
  }
}
