/**
 * Type declarations for bitcore-lib-doge (ships no types).
 * Covers the subset the signer uses: Transaction, PrivateKey, Script, Networks.
 */
declare module "bitcore-lib-doge" {
  namespace bitcore {
    class Transaction {
      inputs: Transaction.Input[];
      outputs: Transaction.Output[];
      id: string;

      constructor(serialized?: string | Buffer);

      from(utxos: Transaction.UnspentOutput[] | Transaction.UnspentOutput): Transaction;
      to(address: string, amount: number): Transaction;
      fee(amount: number): Transaction;
      sign(privateKey: PrivateKey): Transaction;
      serialize(opts?: {
        disableAll?: boolean;
        disableDustOutputs?: boolean;
        disableSmallFees?: boolean;
        disableLargeFees?: boolean;
        disableIsFullySigned?: boolean;
      }): string;
      isFullySigned(): boolean;
      getFee(): number;
    }

    namespace Transaction {
      class Input {
        prevTxId: Buffer;
        outputIndex: number;
      }

      class Output {
        satoshis: number;
        script: Script;
      }

      class UnspentOutput {
        constructor(data: {
          address: string;
          txId: string;
          outputIndex: number;
          script: string;
          satoshis: number;
        });
      }
    }

    class PrivateKey {
      constructor(data?: string | Buffer, network?: Network);
      toAddress(): { toString(): string };
    }

    class Script {
      constructor(data?: string | Buffer);
      toHex(): string;
      isPublicKeyHashOut(): boolean;
    }

    interface Network {
      name: string;
      pubkeyhash: number;
      privatekey: number;
      scripthash: number;
    }

    const Networks: {
      livenet: Network;
      testnet: Network;
    };
  }

  export = bitcore;
}
