/**
 * Tests for AuditLog — JSONL append, ordering, spend entries.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { AuditLog } from "../src/audit.js";
import type { TxPlan } from "../src/types.js";
import { ADDR_A, DEV_ADDR, RECIPIENT } from "./helpers.js";

const SEND_PLAN: TxPlan = {
  kind: "send",
  from: ADDR_A,
  inputs: [],
  outputs: [
    { address: RECIPIENT, amount: 150_000_000, role: "recipient" },
    { address: DEV_ADDR, amount: 1_000_000, role: "dev-fee" },
  ],
  amount: 150_000_000,
  devFee: 1_000_000,
  networkFee: 226_000,
  change: 0,
  total: 151_226_000,
  inscriptionIds: [],
};

describe("AuditLog", () => {
  let dataDir: string;
  let audit: AuditLog;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "doge-audit-test-"));
    audit = new AuditLog(dataDir);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("returns nothing before the first entry", async () => {
    assert.deepEqual(await audit.getAuditLog(), []);
  });

  it("returns entries newest first, limited", async () => {
    await audit.logAudit({ action: "connect", origin: "https://a.test" });
    await audit.logAudit({ action: "disconnect", origin: "https://a.test" });
    await audit.logAudit({ action: "lock" });

    const entries = await audit.getAuditLog(2);
    assert.deepEqual(entries.map((e) => e.action), ["lock", "disconnect"]);
  });

  it("keeps entries in call order without awaiting each write", async () => {
    void audit.logAudit({ action: "approve", approvalId: "1" });
    void audit.logAudit({ action: "reject", approvalId: "2" });
    const entries = await audit.getAuditLog();
    assert.deepEqual(entries.map((e) => e.approvalId), ["2", "1"]);
  });

  it("records spends with recipient, amount and total fee", async () => {
    const entry = await audit.logSpend("https://shop.test", "ap-1", SEND_PLAN, "tx-1");
    assert.equal(entry.action, "send");
    assert.equal(entry.address, RECIPIENT);
    assert.equal(entry.amount, 150_000_000);
    assert.equal(entry.fee, 1_226_000);
    assert.equal(entry.reason, `Send 1.5 DOGE to ${RECIPIENT}`);
  });

  it("records doginal transfers with their inscription ids", async () => {
    const plan: TxPlan = {
      ...SEND_PLAN,
      kind: "doginal",
      outputs: [{ address: RECIPIENT, amount: 100_000, role: "inscription" }],
      amount: 100_000,
      inscriptionIds: ["abc i0"],
    };
    const entry = await audit.logSpend("https://shop.test", "ap-2", plan, "tx-2");
    assert.equal(entry.action, "doginal_transfer");
    assert.equal(entry.reason, `Transfer 1 doginal(s) to ${RECIPIENT}`);
    assert.deepEqual(entry.metadata, { inscriptionIds: ["abc i0"] });
  });

  it("filters by action", async () => {
    await audit.logAudit({ action: "connect", origin: "https://a.test" });
    await audit.logAudit({ action: "lock" });
    await audit.logAudit({ action: "connect", origin: "https://b.test" });
    const connects = await audit.getByAction("connect");
    assert.deepEqual(connects.map((e) => e.origin), ["https://b.test", "https://a.test"]);
  });

  it("writes one JSON object per line, owner-only", async () => {
    await audit.logAudit({ action: "lock" });
    const file = join(dataDir, "audit", "audit.jsonl");
    const lines = (await readFile(file, "utf-8")).trim().split("\n");
    assert.equal(lines.length, 1);
    assert.equal(JSON.parse(lines[0]).action, "lock");
    assert.equal((await stat(file)).mode & 0o777, 0o600);
  });
});
