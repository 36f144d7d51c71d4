/**
 * DOGE Provider — Approval Workflow
 *
 * Every request that needs the user's consent becomes a PendingApproval:
 *
 *   Created → AwaitingUserDecision → Approved | Rejected | TimedOut | Cancelled
 *
 * Every request waits in a single FIFO queue; the queue position is held
 * until execution finishes, so only one user decision and one wallet
 * mutation are ever in flight. Connect requests keep one slot per origin: a
 * newer connect takes over the older one's place instead of queuing again.
 *
 * Much consent. Very queue. Wow. 🐕
 */

import { randomUUID } from "node:crypto";
import { Mutex } from "async-mutex";
import {
  ApprovalTimeoutError,
  RequestCancelledError,
  UserRejectedError,
  WalletError,
  errorMessage,
  type RejectionKind,
} from "../errors.js";
import type { AuditLog } from "../audit.js";
import type {
  ApprovalKind,
  ApprovalParams,
  ApprovalState,
  ApprovalUi,
  ConnectParams,
  LogFn,
  PageContext,
  PendingApproval,
  TxPlan,
} from "../types.js";

// ============================================================================
// Types
// ============================================================================

export type PrivilegedKind = Exclude<ApprovalKind, "connect">;

export interface PrivilegedHandlers<T> {
  /** Runs once the request reaches the head of the queue; returns the quote to show */
  prepare?: (approval: Readonly<PendingApproval>) => Promise<TxPlan | undefined>;
  /** Runs after approval, still holding the queue position */
  execute: (approval: Readonly<PendingApproval>) => Promise<T>;
  /** Always runs once the request leaves the queue head */
  release?: (approval: Readonly<PendingApproval>) => void;
}

export interface ApprovalWorkflowOptions {
  ui: ApprovalUi;
  timeoutMs: number;
  audit?: AuditLog;
  log?: LogFn;
}

type Verdict =
  | { type: "approve" }
  | { type: "reject" }
  | { type: "timeout" }
  | { type: "cancel" }
  | { type: "replaced" };

interface Entry {
  approval: PendingApproval;
  /** Set while the user is deciding */
  finish?: (verdict: Verdict) => void;
  /** Set while waiting in the queue */
  abortQueued?: (err: Error) => void;
  cancelled: boolean;
}

/** The entry currently standing for an origin's connect request */
interface ConnectRef {
  current: Entry;
}

interface ConnectSlot {
  ref: ConnectRef;
  outcome: Promise<string>;
}

// ============================================================================
// Constants
// ============================================================================

const TRANSITIONS: Record<ApprovalState, readonly ApprovalState[]> = {
  Created: ["AwaitingUserDecision", "Cancelled"],
  AwaitingUserDecision: ["Approved", "Rejected", "TimedOut", "Cancelled"],
  Approved: [],
  Rejected: [],
  TimedOut: [],
  Cancelled: [],
};

const REJECTION_KIND: Record<ApprovalKind, RejectionKind> = {
  connect: "connect",
  sendTransaction: "transaction",
  sendDoginal: "doginalTransfer",
  signMessage: "signing",
};

export function isTerminal(state: ApprovalState): boolean {
  return TRANSITIONS[state].length === 0;
}

// ============================================================================
// ApprovalWorkflow
// ============================================================================

export class ApprovalWorkflow {
  private readonly ui: ApprovalUi;
  private readonly timeoutMs: number;
  private readonly audit: AuditLog | undefined;
  private readonly log: LogFn;

  private readonly queue = new Mutex();
  private readonly entries = new Map<string, Entry>();
  private readonly connectSlots = new Map<string, ConnectSlot>();

  constructor(opts: ApprovalWorkflowOptions) {
    this.ui = opts.ui;
    this.timeoutMs = opts.timeoutMs;
    this.audit = opts.audit;
    this.log = opts.log ?? (() => {});
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  /**
   * Ask the user to connect an origin. A newer connect from the same origin
   * replaces one still queued or awaiting a decision; both callers get its
   * result.
   *
   * @returns whatever `execute` returns after approval (the granted address)
   */
  requestConnect(
    ctx: PageContext,
    params: ConnectParams,
    execute: (approval: Readonly<PendingApproval>) => Promise<string>,
  ): Promise<string> {
    const existing = this.connectSlots.get(ctx.origin);
    if (existing) {
      // Once decided, later callers just share the result
      if (!isTerminal(existing.ref.current.approval.state)) {
        this.replace(existing.ref, this.create(ctx, "connect", params));
      }
      return existing.outcome;
    }

    const ref: ConnectRef = { current: this.create(ctx, "connect", params) };
    const outcome = this.enqueue(ref.current, () => ref.current, () => this.runConnect(ref, execute)).finally(() => {
      if (this.connectSlots.get(ctx.origin)?.ref === ref) {
        this.connectSlots.delete(ctx.origin);
      }
    });
    this.connectSlots.set(ctx.origin, { ref, outcome });
    return outcome;
  }

  /**
   * Queue a privileged request. Resolves with the result of `execute` once
   * approved; rejects with the matching error otherwise.
   */
  requestPrivileged<T>(
    ctx: PageContext,
    kind: PrivilegedKind,
    params: ApprovalParams,
    handlers: PrivilegedHandlers<T>,
  ): Promise<T> {
    const entry = this.create(ctx, kind, params);
    return this.enqueue(entry, () => entry, () => this.runPrivileged(entry, handlers));
  }

  /**
   * Cancel everything a page context still has pending (tab closed, navigated).
   *
   * @returns number of approvals cancelled
   */
  cancelContext(contextId: string): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.approval.contextId === contextId && this.cancel(entry)) count++;
    }
    return count;
  }

  /**
   * Cancel everything an origin has pending (site disconnected).
   *
   * @returns number of approvals cancelled
   */
  cancelOrigin(origin: string): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.approval.origin === origin && this.cancel(entry)) count++;
    }
    return count;
  }

  /** Cancel every pending approval (wallet lock) */
  cancelAll(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (this.cancel(entry)) count++;
    }
    return count;
  }

  /** Approvals not yet decided, oldest first */
  pending(): PendingApproval[] {
    return Array.from(this.entries.values())
      .filter((e) => !isTerminal(e.approval.state))
      .map((e) => structuredClone(e.approval));
  }

  get(id: string): PendingApproval | undefined {
    const entry = this.entries.get(id);
    return entry ? structuredClone(entry.approval) : undefined;
  }

  // --------------------------------------------------------------------------
  // Flows
  // --------------------------------------------------------------------------

  /**
   * Wait for a queue position. A request cancelled while it waits rejects at
   * once; the position it held is skipped when reached.
   */
  private async enqueue<T>(first: Entry, head: () => Entry, body: () => Promise<T>): Promise<T> {
    const cancelledWhileQueued = new Promise<never>((_, reject) => {
      first.abortQueued = reject;
    });
    const run = this.queue.runExclusive(async () => {
      const entry = head();
      entry.abortQueued = undefined;
      if (entry.cancelled) return null;
      return { value: await body() };
    });

    const result = await Promise.race([run, cancelledWhileQueued]);
    if (result === null) throw new RequestCancelledError();
    return result.value;
  }

  /** Present whichever entry stands for the origin until one is decided */
  private async runConnect(
    ref: ConnectRef,
    execute: (approval: Readonly<PendingApproval>) => Promise<string>,
  ): Promise<string> {
    for (;;) {
      const entry = ref.current;
      try {
        // A replacement can be cancelled before it is shown
        if (entry.cancelled) {
          this.transition(entry, "Cancelled");
          throw new RequestCancelledError();
        }
        const verdict = await this.awaitDecision(entry);
        if (verdict.type === "replaced") {
          this.transition(entry, "Cancelled");
          continue;
        }
        this.conclude(entry, verdict);
        return await execute(structuredClone(entry.approval));
      } finally {
        this.entries.delete(entry.approval.id);
      }
    }
  }

  /** Put a newer connect in place of the origin's current one */
  private replace(ref: ConnectRef, next: Entry): void {
    const previous = ref.current;
    ref.current = next;
    this.log("info", `doge-provider: connect ${previous.approval.id} replaced by ${next.approval.id}`);

    if (previous.abortQueued) {
      // Still waiting: the newer entry inherits the queue position
      next.abortQueued = previous.abortQueued;
      previous.abortQueued = undefined;
      this.transition(previous, "Cancelled");
      this.entries.delete(previous.approval.id);
    } else {
      previous.finish?.({ type: "replaced" });
    }
  }

  private async runPrivileged<T>(entry: Entry, handlers: PrivilegedHandlers<T>): Promise<T> {
    try {
      if (handlers.prepare) {
        try {
          entry.approval.quote = await handlers.prepare(structuredClone(entry.approval));
        } catch (err: unknown) {
          this.transition(entry, "Cancelled");
          this.log("warn", `doge-provider: approval ${entry.approval.id} could not be prepared: ${errorMessage(err)}`);
          throw err;
        }
      }
      if (entry.cancelled) {
        this.transition(entry, "Cancelled");
        throw new RequestCancelledError();
      }

      const verdict = await this.awaitDecision(entry);
      if (verdict.type === "replaced") {
        // Only connect slots are ever replaced
        throw new WalletError("INVALID_TRANSITION", `Approval ${entry.approval.id} cannot be replaced`);
      }
      this.conclude(entry, verdict);
      return await handlers.execute(structuredClone(entry.approval));
    } finally {
      handlers.release?.(structuredClone(entry.approval));
      this.entries.delete(entry.approval.id);
    }
  }

  // --------------------------------------------------------------------------
  // Decision plumbing
  // --------------------------------------------------------------------------

  /**
   * Present the approval and wait for the first of: user decision, timeout,
   * cancellation, replacement. The UI is aborted unless it produced the verdict.
   */
  private awaitDecision(entry: Entry): Promise<Verdict> {
    this.transition(entry, "AwaitingUserDecision");
    entry.approval.expiresAt = new Date(Date.now() + this.timeoutMs).toISOString();
    const controller = new AbortController();

    return new Promise<Verdict>((resolve) => {
      const timer = setTimeout(() => entry.finish?.({ type: "timeout" }), this.timeoutMs);
      entry.finish = (verdict) => {
        entry.finish = undefined;
        clearTimeout(timer);
        if (verdict.type !== "approve" && verdict.type !== "reject") controller.abort();
        resolve(verdict);
      };

      this.ui.presentApproval(structuredClone(entry.approval), controller.signal).then(
        (decision) => entry.finish?.(decision === "approve" ? { type: "approve" } : { type: "reject" }),
        (err: unknown) => {
          this.log("warn", `doge-provider: approval UI failed for ${entry.approval.id}: ${errorMessage(err)}`);
          entry.finish?.({ type: "reject" });
        },
      );
    });
  }

  /** Apply a final verdict; anything but approval throws */
  private conclude(entry: Entry, verdict: Exclude<Verdict, { type: "replaced" }>): void {
    const { id, origin, kind } = entry.approval;
    switch (verdict.type) {
      case "approve":
        this.transition(entry, "Approved");
        this.record("approve", entry);
        this.log("info", `doge-provider: ${kind} ${id} from ${origin} APPROVED`);
        return;
      case "reject":
        this.transition(entry, "Rejected");
        this.record("reject", entry);
        this.log("info", `doge-provider: ${kind} ${id} from ${origin} rejected`);
        throw new UserRejectedError(REJECTION_KIND[kind]);
      case "timeout":
        this.transition(entry, "TimedOut");
        this.record("timeout", entry);
        this.log("warn", `doge-provider: ${kind} ${id} from ${origin} timed out`);
        throw new ApprovalTimeoutError();
      case "cancel":
        this.transition(entry, "Cancelled");
        this.log("info", `doge-provider: ${kind} ${id} from ${origin} cancelled`);
        throw new RequestCancelledError();
    }
  }

  /** @returns true if the entry was still undecided */
  private cancel(entry: Entry): boolean {
    if (entry.cancelled || isTerminal(entry.approval.state)) return false;
    entry.cancelled = true;

    if (entry.abortQueued) {
      this.transition(entry, "Cancelled");
      this.entries.delete(entry.approval.id);
      entry.abortQueued(new RequestCancelledError());
      entry.abortQueued = undefined;
    } else {
      // Preparing entries notice the flag once prepare settles
      entry.finish?.({ type: "cancel" });
    }
    return true;
  }

  private create(ctx: PageContext, kind: ApprovalKind, params: ApprovalParams): Entry {
    const now = new Date();
    const entry: Entry = {
      approval: {
        id: randomUUID(),
        kind,
        origin: ctx.origin,
        contextId: ctx.id,
        params: structuredClone(params),
        createdAt: now.toISOString(),
        expiresAt: new Date(now.getTime() + this.timeoutMs).toISOString(),
        state: "Created",
      },
      cancelled: false,
    };
    this.entries.set(entry.approval.id, entry);
    this.log("info", `doge-provider: ${kind} approval ${entry.approval.id} created for ${ctx.origin}`);
    return entry;
  }

  private transition(entry: Entry, to: ApprovalState): void {
    const from = entry.approval.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new WalletError("INVALID_TRANSITION", `Approval ${entry.approval.id} cannot move from ${from} to ${to}`);
    }
    entry.approval.state = to;
    if (isTerminal(to)) entry.approval.resolvedAt = new Date().toISOString();
  }

  private record(action: "approve" | "reject" | "timeout", entry: Entry): void {
    if (!this.audit) return;
    const { id, kind, origin } = entry.approval;
    void this.audit.logAudit({ action, origin, approvalId: id, reason: kind });
  }
}
