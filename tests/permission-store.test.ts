/**
 * Tests for PermissionStore — grants, revocation, lock clearing, persistence.
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { PermissionStore } from "../src/permissions/store.js";
import { ADDR_A, ADDR_B } from "./helpers.js";

describe("PermissionStore — in memory", () => {
  it("an origin is disconnected until granted", () => {
    const store = new PermissionStore();
    assert.equal(store.isConnected("https://shop.test"), false);
    assert.deepEqual(store.connectedAddresses("https://shop.test"), []);

    store.grant("https://shop.test", [ADDR_A]);
    assert.equal(store.isConnected("https://shop.test"), true);
    assert.deepEqual(store.connectedAddresses("https://shop.test"), [ADDR_A]);
  });

  it("revocation is immediate and total", () => {
    const store = new PermissionStore();
    store.grant("https://shop.test", [ADDR_A]);
    assert.equal(store.revoke("https://shop.test"), true);
    assert.equal(store.isConnected("https://shop.test"), false);
    assert.equal(store.get("https://shop.test"), undefined);
    assert.equal(store.revoke("https://shop.test"), false);
  });

  it("grants are keyed by exact origin", () => {
    const store = new PermissionStore();
    store.grant("https://shop.test", [ADDR_A]);
    assert.equal(store.isConnected("http://shop.test"), false);
    assert.equal(store.isConnected("https://shop.test:8443"), false);
  });

  it("returned records are copies", () => {
    const store = new PermissionStore();
    const granted = store.grant("https://shop.test", [ADDR_A]);
    granted.addresses.push(ADDR_B);
    store.connectedAddresses("https://shop.test").push(ADDR_B);
    assert.deepEqual(store.connectedAddresses("https://shop.test"), [ADDR_A]);
  });

  it("retarget points every grant at the new account", () => {
    const store = new PermissionStore();
    store.grant("https://a.test", [ADDR_A]);
    store.grant("https://b.test", [ADDR_A]);
    store.retarget([ADDR_B]);
    assert.deepEqual(store.connectedAddresses("https://a.test"), [ADDR_B]);
    assert.deepEqual(store.connectedAddresses("https://b.test"), [ADDR_B]);
  });

  it("clear drops all grants and reports who was connected", () => {
    const store = new PermissionStore();
    store.grant("https://a.test", [ADDR_A]);
    store.grant("https://b.test", [ADDR_A]);
    assert.deepEqual(store.clear(), ["https://a.test", "https://b.test"]);
    assert.deepEqual(store.connectedOrigins(), []);
  });
});

describe("PermissionStore — persistence", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "doge-perm-test-"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("grants survive a reload", async () => {
    const first = new PermissionStore(dataDir);
    first.grant("https://shop.test", [ADDR_A]);
    await first.flush();

    const second = new PermissionStore(dataDir);
    await second.load();
    assert.equal(second.isConnected("https://shop.test"), true);
    assert.deepEqual(second.connectedAddresses("https://shop.test"), [ADDR_A]);
  });

  it("revocations are persisted too", async () => {
    const first = new PermissionStore(dataDir);
    first.grant("https://shop.test", [ADDR_A]);
    first.revoke("https://shop.test");
    await first.flush();

    const second = new PermissionStore(dataDir);
    await second.load();
    assert.equal(second.isConnected("https://shop.test"), false);
  });

  it("writes the state file owner-only", async () => {
    const store = new PermissionStore(dataDir);
    store.grant("https://shop.test", [ADDR_A]);
    await store.flush();

    const info = await stat(join(dataDir, "permissions.json"));
    assert.equal(info.mode & 0o777, 0o600);
    const state = JSON.parse(await readFile(join(dataDir, "permissions.json"), "utf-8"));
    assert.equal(state.version, 1);
    assert.equal(state.grants[0].origin, "https://shop.test");
  });

  it("starts empty when there is no state file", async () => {
    const store = new PermissionStore(dataDir);
    await store.load();
    assert.deepEqual(store.connectedOrigins(), []);
  });
});
