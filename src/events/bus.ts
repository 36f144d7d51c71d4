/**
 * DOGE Provider — Event Bus
 *
 * In-process publish/subscribe for page contexts. Delivery walks a copy of
 * the subscriber list taken when the event is emitted, so a listener added
 * during delivery waits for the next event and removals never skip anyone.
 */

import { InvalidParamsError, errorMessage } from "../errors.js";
import type { LogFn, PageContext, ProviderEventName, ProviderEvents } from "../types.js";

export type EventListener<E extends ProviderEventName> = (payload: ProviderEvents[E]) => void;

interface Subscription<E extends ProviderEventName> {
  context: PageContext;
  listener: EventListener<E>;
}

type Registry = { [E in ProviderEventName]: Array<Subscription<E>> };

export class EventBus {
  private readonly registry: Registry = {
    connect: [],
    disconnect: [],
    accountsChanged: [],
  };
  private readonly log: LogFn;

  constructor(log?: LogFn) {
    this.log = log ?? (() => {});
  }

  /**
   * Subscribe a context to an event. Pages are untrusted, so the name and
   * listener are checked at run time.
   *
   * @returns an idempotent unsubscribe function
   * @throws InvalidParamsError for an unknown event or a non-function listener
   */
  subscribe<E extends ProviderEventName>(
    context: PageContext,
    event: E,
    listener: EventListener<E>,
  ): () => void {
    if (!this.isKnown(event)) {
      throw new InvalidParamsError("on", `unknown event "${String(event)}"`);
    }
    if (typeof listener !== "function") {
      throw new InvalidParamsError("on", "listener must be a function");
    }
    const list: Array<Subscription<E>> = this.registry[event];
    const sub: Subscription<E> = { context, listener };
    list.push(sub);
    return () => {
      const index = list.indexOf(sub);
      if (index >= 0) list.splice(index, 1);
    };
  }

  /**
   * Remove the first matching subscription. Unknown listeners are ignored.
   */
  unsubscribe<E extends ProviderEventName>(contextId: string, event: E, listener: EventListener<E>): void {
    if (!this.isKnown(event)) return;
    const list: Array<Subscription<E>> = this.registry[event];
    const index = list.findIndex((s) => s.context.id === contextId && s.listener === listener);
    if (index >= 0) list.splice(index, 1);
  }

  /**
   * Deliver an event to matching subscribers in subscription order.
   *
   * @param filter - restrict delivery to some contexts (e.g. one origin)
   * @returns the number of listeners invoked
   */
  emit<E extends ProviderEventName>(
    event: E,
    payload: ProviderEvents[E],
    filter?: (context: PageContext) => boolean,
  ): number {
    const list: Array<Subscription<E>> = this.registry[event];
    const snapshot = list.filter((s) => !filter || filter(s.context));

    let delivered = 0;
    for (const sub of snapshot) {
      // Removed by an earlier listener in this same delivery
      if (!list.includes(sub)) continue;
      try {
        sub.listener(payload);
      } catch (err: unknown) {
        this.log("warn", `doge-provider: ${event} listener in ${sub.context.origin} threw: ${errorMessage(err)}`);
      }
      delivered++;
    }
    return delivered;
  }

  /**
   * Drop every subscription owned by a page context.
   */
  teardown(contextId: string): void {
    this.prune("connect", contextId);
    this.prune("disconnect", contextId);
    this.prune("accountsChanged", contextId);
  }

  listenerCount(event: ProviderEventName): number {
    return this.registry[event].length;
  }

  private isKnown(event: string): boolean {
    return Object.hasOwn(this.registry, event);
  }

  private prune<E extends ProviderEventName>(event: E, contextId: string): void {
    const list: Array<Subscription<E>> = this.registry[event];
    for (let i = list.length - 1; i >= 0; i--) {
      if (list[i].context.id === contextId) list.splice(i, 1);
    }
  }
}
