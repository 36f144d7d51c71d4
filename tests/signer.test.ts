/**
 * Tests for BitcoreSigner and the signed-message envelope.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import secp256k1 from "secp256k1";
import { BitcoreSigner, encodeVarInt, messageHash } from "../src/tx/signer.js";
import { computeTxid } from "../src/tx/broadcaster.js";
import { addressToScriptPubKey } from "../src/keys/derivation.js";
import { SigningFailedError } from "../src/errors.js";
import type { SigningKey } from "../src/types.js";
import { ADDR_A, RECIPIENT, makeUtxo, txid } from "./helpers.js";

function keyA(): SigningKey {
  return { address: ADDR_A, privateKey: Buffer.alloc(32, 1) };
}

describe("encodeVarInt", () => {
  it("encodes each size class", () => {
    assert.equal(encodeVarInt(10).toString("hex"), "0a");
    assert.equal(encodeVarInt(300).toString("hex"), "fd2c01");
    assert.equal(encodeVarInt(70_000).toString("hex"), "fe70110100");
  });
});

describe("messageHash", () => {
  it("hashes the Dogecoin signed-message envelope", () => {
    assert.equal(
      messageHash("hello doge").toString("hex"),
      "b699799b0b0742aecb5b55e440e80caebe9e23477fabd70b2d2eca432c3121ca",
    );
  });
});

describe("addressToScriptPubKey", () => {
  it("builds the P2PKH locking script", () => {
    assert.equal(addressToScriptPubKey(ADDR_A), "76a91479b000887626b294a914501a4cd226b58b23598388ac");
  });
});

describe("BitcoreSigner.sign", () => {
  const signer = new BitcoreSigner("mainnet");
  const input = makeUtxo({ txid: txid(1), amount: 50_000_000 });

  it("signs every input and reports the matching txid", async () => {
    const signed = await signer.sign(
      [input],
      [
        { address: RECIPIENT, amount: 30_000_000, role: "recipient" },
        { address: ADDR_A, amount: 19_774_000, role: "change" },
      ],
      keyA(),
    );
    assert.match(signed.signedTx, /^[0-9a-f]+$/);
    assert.equal(signed.txid, computeTxid(signed.signedTx));
  });

  it("spends with the compressed public key behind the account address", async () => {
    const signed = await signer.sign([input], [{ address: RECIPIENT, amount: 49_000_000, role: "recipient" }], keyA());
    const pubkey = Buffer.from(secp256k1.publicKeyCreate(Buffer.alloc(32, 1), true)).toString("hex");
    // scriptSig pushes the 33-byte key
    assert.ok(signed.signedTx.includes(`21${pubkey}`));
  });

  it("zeroes the key after use", async () => {
    const key = keyA();
    await signer.sign([input], [{ address: RECIPIENT, amount: 49_000_000, role: "recipient" }], key);
    assert.equal(key.privateKey.every((b) => b === 0), true);
  });

  it("rejects a key that does not own the inputs", async () => {
    await assert.rejects(
      signer.sign(
        [input],
        [{ address: RECIPIENT, amount: 49_000_000, role: "recipient" }],
        { address: ADDR_A, privateKey: Buffer.alloc(32, 2) },
      ),
      SigningFailedError,
    );
  });

  it("rejects outputs worth more than the inputs", async () => {
    await assert.rejects(
      signer.sign([input], [{ address: RECIPIENT, amount: 60_000_000, role: "recipient" }], keyA()),
      { message: "Signing failed: outputs exceed inputs" },
    );
  });

  it("rejects an empty transaction", async () => {
    await assert.rejects(signer.sign([], [], keyA()), {
      message: "Signing failed: transaction needs at least one input and one output",
    });
  });
});

describe("BitcoreSigner.signMessage", () => {
  it("produces a recoverable compact signature for the account key", async () => {
    const key = keyA();
    const signature = Buffer.from(await new BitcoreSigner().signMessage("hello doge", key), "base64");
    assert.equal(signature.length, 65);

    const header = signature[0];
    assert.ok(header === 31 || header === 32);
    const recovered = secp256k1.ecdsaRecover(
      signature.subarray(1),
      header - 31,
      messageHash("hello doge"),
      true,
    );
    const expected = secp256k1.publicKeyCreate(Buffer.alloc(32, 1), true);
    assert.deepEqual(Buffer.from(recovered), Buffer.from(expected));
    assert.equal(key.privateKey.every((b) => b === 0), true);
  });
});
