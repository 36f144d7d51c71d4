/**
 * Tests for TransactionBuilder — quotes with reservations, execution order,
 * and untouched state on signing/broadcast failure.
 */

import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { TransactionBuilder } from "../src/tx/builder.js";
import { AccountState } from "../src/account/state.js";
import { FeeEngine } from "../src/fees/engine.js";
import {
  BroadcastFailedError,
  InsufficientFundsError,
  SigningFailedError,
  WalletLockedError,
} from "../src/errors.js";
import { outpointKey } from "../src/types.js";
import {
  ADDR_A,
  ADDR_B,
  DEV_ADDR,
  FakeKeyring,
  FakeNetwork,
  FakeSigner,
  RECIPIENT,
  TEST_CONFIG,
  makeDoginal,
  makeUtxo,
  txid,
} from "./helpers.js";

const big = makeUtxo({ txid: txid(1), amount: 40_000_000 });
const small = makeUtxo({ txid: txid(2), amount: 20_000_000 });
const inscribed = makeUtxo({ txid: txid(100), amount: 100_000 });
const doginal = makeDoginal({ txid: txid(100) });

describe("TransactionBuilder", () => {
  let network: FakeNetwork;
  let keyring: FakeKeyring;
  let signer: FakeSigner;
  let account: AccountState;
  let builder: TransactionBuilder;

  beforeEach(() => {
    network = new FakeNetwork();
    network.seed(ADDR_A, [big, small, inscribed], [doginal]);
    keyring = new FakeKeyring();
    signer = new FakeSigner();
    account = new AccountState({
      network,
      addresses: () => keyring.addresses(),
      protectionThreshold: TEST_CONFIG.utxo.protectionThreshold,
    });
    builder = new TransactionBuilder({
      account,
      fees: new FeeEngine(TEST_CONFIG),
      signer,
      network,
      keyring,
      broadcast: TEST_CONFIG.broadcast,
      sleep: async () => {},
    });
  });

  it("quotes against fresh state and reserves the inputs", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");

    assert.deepEqual(plan.inputs.map(outpointKey), [outpointKey(big), outpointKey(small)]);
    assert.deepEqual(plan.outputs, [
      { address: RECIPIENT, amount: 50_000_000, role: "recipient" },
      { address: DEV_ADDR, amount: 1_000_000, role: "dev-fee" },
      { address: ADDR_A, amount: 8_592_000, role: "change" },
    ]);
    assert.equal(plan.networkFee, 408_000);
    assert.equal(plan.total, 51_408_000);
    assert.equal(account.reservedCount(), 2);
    assert.deepEqual(account.spendableUtxos().map(outpointKey), [outpointKey(inscribed)]);
  });

  it("a second quote cannot use coins held by the first", async () => {
    await builder.quoteSend({ to: RECIPIENT, amount: 30_000_000 }, "ap-1");
    await assert.rejects(builder.quoteSend({ to: RECIPIENT, amount: 30_000_000 }, "ap-2"), InsufficientFundsError);
  });

  it("reports an unreachable network as a broadcast failure", async () => {
    network.fetchError = new Error("indexer down");
    await assert.rejects(builder.quoteSend({ to: RECIPIENT, amount: 1_000_000 }, "ap-1"), {
      name: "BroadcastFailedError",
      message: "Broadcast failed: account state unavailable: indexer down",
    });
  });

  it("signs, broadcasts, then records the spend with its change", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    const result = await builder.execute(plan);

    assert.deepEqual(result, { txid: "broadcast-1" });
    assert.equal(signer.calls.length, 1);
    assert.equal(signer.calls[0].address, ADDR_A);
    assert.deepEqual(signer.calls[0].outputs, plan.outputs);
    assert.deepEqual(network.broadcasts, ["0001"]);

    assert.deepEqual(account.utxoSet().map(outpointKey), [outpointKey(inscribed), "broadcast-1:2"]);
    const change = account.utxoSet()[1];
    assert.equal(change.amount, 8_592_000);
    assert.equal(change.scriptPubKey, "76a91479b000887626b294a914501a4cd226b58b23598388ac");
    assert.equal(change.confirmations, 0);
    assert.deepEqual(account.balance(), { confirmed: 100_000, unconfirmed: 8_592_000, total: 8_692_000 });
    assert.equal(account.reservedCount(), 0);
  });

  it("zeroes the signing key after use", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    await builder.execute(plan);
    assert.equal(keyring.handedOut.length, 1);
    assert.equal(keyring.handedOut[0].privateKey.every((b) => b === 0), true);
  });

  it("a signing failure leaves everything as it was", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    const before = account.snapshot();
    signer.fail = new Error("device unplugged");

    await assert.rejects(builder.execute(plan), (err: unknown) => {
      assert.ok(err instanceof SigningFailedError);
      assert.equal(err.message, "Signing failed: device unplugged");
      return true;
    });
    assert.equal(account.snapshot(), before);
    assert.deepEqual(network.broadcasts, []);
    assert.equal(keyring.handedOut[0].privateKey.every((b) => b === 0), true);
  });

  it("a rejected broadcast leaves everything as it was", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    const before = account.snapshot();
    network.broadcastErrors = [new Error("bad-txns-inputs-missingorspent")];

    await assert.rejects(builder.execute(plan), (err: unknown) => {
      assert.ok(err instanceof BroadcastFailedError);
      assert.equal(err.reason, "DOUBLE_SPEND");
      return true;
    });
    assert.equal(account.snapshot(), before);
  });

  it("refuses to execute while locked", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    keyring.unlocked = false;
    await assert.rejects(builder.execute(plan), WalletLockedError);
    assert.equal(signer.calls.length, 0);
  });

  it("refuses a plan whose inputs disappeared", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    account.applyUpdate(ADDR_A, { utxos: [small, inscribed] });
    await assert.rejects(builder.execute(plan), InsufficientFundsError);
    assert.equal(signer.calls.length, 0);
  });

  it("refuses a plan made for another account", async () => {
    const plan = await builder.quoteSend({ to: RECIPIENT, amount: 50_000_000 }, "ap-1");
    account.switchAccount(1);
    assert.equal(account.currentAddress(), ADDR_B);
    await assert.rejects(builder.execute(plan), InsufficientFundsError);
  });

  it("transfers a doginal and drops it from the inventory", async () => {
    const plan = await builder.quoteDoginal({ to: RECIPIENT, inscriptionIds: [doginal.inscriptionId] }, "ap-1");

    assert.deepEqual(plan.inputs.map(outpointKey), [outpointKey(inscribed), outpointKey(small)]);
    assert.deepEqual(plan.outputs, [
      { address: RECIPIENT, amount: 100_000, role: "inscription" },
      { address: DEV_ADDR, amount: 1_000_000, role: "dev-fee" },
      { address: ADDR_A, amount: 9_000_000, role: "change" },
    ]);
    assert.equal(plan.total, 11_100_000);

    await builder.execute(plan);
    assert.deepEqual(account.doginals(), []);
    assert.deepEqual(account.utxoSet().map(outpointKey), [outpointKey(big), "broadcast-1:2"]);
  });

  it("signs messages with the active account key", async () => {
    assert.equal(await builder.signMessage("gm"), `sig(${ADDR_A}:gm)`);
    assert.equal(keyring.handedOut[0].privateKey.every((b) => b === 0), true);
  });
});
