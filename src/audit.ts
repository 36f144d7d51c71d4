/**
 * DOGE Provider — Audit Trail
 *
 * Every grant, decision and spend a page triggers is appended to a JSONL
 * file with owner-only permissions. Audit writes never fail the operation
 * being audited.
 *
 * Much audit. Very transparent. Wow. 🐕
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { secureAppendFile } from "./secure-fs.js";
import { errorMessage } from "./errors.js";
import type { AuditEntry, AuditAction, LogFn, TxPlan } from "./types.js";

export class AuditLog {
  private readonly filePath: string;
  private readonly log: LogFn;
  /** Appends are chained so lines never interleave */
  private tail: Promise<void> = Promise.resolve();

  constructor(dataDir: string, log?: LogFn) {
    this.filePath = join(dataDir, "audit", "audit.jsonl");
    this.log = log ?? (() => {});
  }

  /** Log an audit entry — appends to the JSONL file */
  logAudit(entry: Omit<AuditEntry, "id" | "timestamp">): Promise<AuditEntry> {
    const fullEntry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry,
    };
    const line = JSON.stringify(fullEntry) + "\n";

    const write = this.tail.then(async () => {
      try {
        await secureAppendFile(this.filePath, line);
        this.log("info", `doge-provider: audit: ${fullEntry.action} — ${fullEntry.reason ?? fullEntry.origin ?? "no reason"}`);
      } catch (err: unknown) {
        this.log("error", `doge-provider: audit write failed: ${errorMessage(err)}`);
      }
    });
    this.tail = write;
    return write.then(() => fullEntry);
  }

  /** Read recent audit entries, newest first */
  async getAuditLog(limit: number = 20): Promise<AuditEntry[]> {
    await this.tail;
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return []; // No audit log yet
      }
      this.log("error", `doge-provider: audit read failed: ${errorMessage(err)}`);
      return [];
    }

    const entries: AuditEntry[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      try {
        entries.push(JSON.parse(line) as AuditEntry);
      } catch {
        this.log("warn", "doge-provider: skipping malformed audit line");
      }
    }
    return entries.slice(-limit).reverse();
  }

  /** Get audit entries filtered by action type */
  async getByAction(action: AuditAction, limit: number = 20): Promise<AuditEntry[]> {
    const all = await this.getAuditLog(1000);
    return all.filter((e) => e.action === action).slice(0, limit);
  }

  /** Log a broadcast send or doginal transfer */
  logSpend(origin: string, approvalId: string, plan: TxPlan, txid: string): Promise<AuditEntry> {
    const to = plan.outputs.find((o) => o.role === "recipient" || o.role === "inscription")?.address;
    return this.logAudit({
      action: plan.kind === "doginal" ? "doginal_transfer" : "send",
      origin,
      approvalId,
      txid,
      address: to,
      amount: plan.amount,
      fee: plan.networkFee + plan.devFee,
      reason: plan.kind === "doginal"
        ? `Transfer ${plan.inscriptionIds.length} doginal(s) to ${to}`
        : `Send ${plan.amount / 1e8} DOGE to ${to}`,
      metadata: plan.kind === "doginal" ? { inscriptionIds: plan.inscriptionIds } : undefined,
    });
  }
}
