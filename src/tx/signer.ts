/**
 * DOGE Provider — Transaction & Message Signer
 *
 * Default signing capability backed by bitcore-lib-doge (transactions)
 * and secp256k1 (messages).
 *
 * Private key handling:
 *   - NEVER logged
 *   - NEVER in error messages
 *   - Caller's copy is zeroed after use
 *
 * Much sign. Very ECDSA. Wow. 🐕
 */

import { createHash } from "node:crypto";
import bitcore from "bitcore-lib-doge";
import secp256k1 from "secp256k1";
import { addressToScriptPubKey } from "../keys/derivation.js";
import { SigningFailedError, errorMessage } from "../errors.js";
import {
  DOGE_MAINNET,
  type DogeNetwork,
  type SignedTransaction,
  type SigningCapability,
  type SigningKey,
  type TxOutput,
  type UTXO,
} from "../types.js";

// ============================================================================
// Message hashing
// ============================================================================

/** Bitcoin-style CompactSize prefix */
export function encodeVarInt(n: number): Buffer {
  if (n < 0xfd) return Buffer.from([n]);
  if (n <= 0xffff) {
    const buf = Buffer.alloc(3);
    buf[0] = 0xfd;
    buf.writeUInt16LE(n, 1);
    return buf;
  }
  const buf = Buffer.alloc(5);
  buf[0] = 0xfe;
  buf.writeUInt32LE(n, 1);
  return buf;
}

function sha256(data: Buffer): Buffer {
  return createHash("sha256").update(data).digest();
}

/**
 * Double-SHA256 of the Dogecoin signed-message envelope:
 * varint(len(prefix)) + prefix + varint(len(msg)) + msg
 */
export function messageHash(message: string): Buffer {
  // The prefix constant already carries its own length byte (0x19)
  const prefix = Buffer.from(DOGE_MAINNET.messagePrefix, "utf8");
  const body = Buffer.from(message, "utf8");
  return sha256(sha256(Buffer.concat([prefix, encodeVarInt(body.length), body])));
}

// ============================================================================
// BitcoreSigner
// ============================================================================

export class BitcoreSigner implements SigningCapability {
  private readonly network: DogeNetwork;

  constructor(network: DogeNetwork = "mainnet") {
    this.network = network;
  }

  async sign(inputs: UTXO[], outputs: TxOutput[], key: SigningKey): Promise<SignedTransaction> {
    if (inputs.length === 0 || outputs.length === 0) {
      throw new SigningFailedError("transaction needs at least one input and one output");
    }
    const totalIn = inputs.reduce((sum, u) => sum + u.amount, 0);
    const totalOut = outputs.reduce((sum, o) => sum + o.amount, 0);
    if (totalOut > totalIn) {
      throw new SigningFailedError("outputs exceed inputs");
    }

    try {
      const tx = new bitcore.Transaction();
      tx.from(
        inputs.map(
          (u) =>
            new bitcore.Transaction.UnspentOutput({
              address: u.address,
              txId: u.txid,
              outputIndex: u.vout,
              // Some indexers omit the script; P2PKH can be rebuilt from the address
              script: u.scriptPubKey || addressToScriptPubKey(u.address),
              satoshis: u.amount,
            }),
        ),
      );
      for (const o of outputs) {
        tx.to(o.address, o.amount);
      }
      tx.fee(totalIn - totalOut);

      const net = this.network === "mainnet" ? bitcore.Networks.livenet : bitcore.Networks.testnet;
      // Hex construction yields a compressed key, matching the keyring's addresses
      tx.sign(new bitcore.PrivateKey(key.privateKey.toString("hex"), net));

      if (!tx.isFullySigned()) {
        throw new SigningFailedError("not every input could be signed with the account key");
      }

      // Dust and fee policy are enforced by the fee engine, not here
      const signedTx = tx.serialize({
        disableDustOutputs: true,
        disableLargeFees: true,
        disableSmallFees: true,
      });
      return { signedTx, txid: tx.id };
    } catch (err: unknown) {
      if (err instanceof SigningFailedError) throw err;
      throw new SigningFailedError(errorMessage(err));
    } finally {
      key.privateKey.fill(0);
    }
  }

  async signMessage(text: string, key: SigningKey): Promise<string> {
    try {
      const { signature, recid } = secp256k1.ecdsaSign(messageHash(text), key.privateKey);
      // 27 + recid, +4 for a compressed public key
      const header = 27 + recid + 4;
      return Buffer.concat([Buffer.from([header]), Buffer.from(signature)]).toString("base64");
    } catch (err: unknown) {
      throw new SigningFailedError(errorMessage(err));
    } finally {
      key.privateKey.fill(0);
    }
  }
}
