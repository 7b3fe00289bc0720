import { Wallet } from "xrpl";
import type { PayloadSigner } from "../types.js";
import { decodePayment } from "./payment.js";

/**
 * Local custodian key backed by an `xrpl` Wallet, signing in multisign mode.
 *
 * Existing signatures on the payload are dropped before signing; the
 * coordinator merges the returned one-signer payload with the rest.
 */
export class XrplWalletSigner implements PayloadSigner {
  private readonly wallet: Wallet;

  constructor(wallet: Wallet) {
    this.wallet = wallet;
  }

  static fromSeed(seed: string): XrplWalletSigner {
    return new XrplWalletSigner(Wallet.fromSeed(seed));
  }

  get address(): string {
    return this.wallet.classicAddress;
  }

  async sign(payload: string): Promise<string> {
    const { tx } = decodePayment(payload);
    return this.wallet.sign({ ...tx, SigningPubKey: "" }, true).tx_blob;
  }
}
