/**
 * Reference in-memory token ledger.
 *
 * Stands in for the stablecoin contract in tests and demos. Switches
 * reproduce the behaviours a wallet has to survive:
 * - falseNegativeTransfers: moves funds but reports `false`
 * - dropTransfers: reports `true` but moves nothing
 * - failTransfers: throws
 * - onTransfer: runs after funds move; a throw undoes the move
 */

import type { TokenLedger } from "./types.js";

export type TransferHook = (from: string, to: string, amount: bigint) => void;

export interface InMemoryTokenLedgerOptions {
  readonly balances?: Readonly<Record<string, bigint>>;
  readonly falseNegativeTransfers?: boolean;
  readonly dropTransfers?: boolean;
  readonly failTransfers?: boolean;
  readonly onTransfer?: TransferHook;
}

export class TokenLedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenLedgerError";
  }
}

export class InMemoryTokenLedger implements TokenLedger {
  private readonly balances = new Map<string, bigint>();

  falseNegativeTransfers: boolean;
  dropTransfers: boolean;
  failTransfers: boolean;
  onTransfer: TransferHook | undefined;

  /** Every transfer that moved funds, in order */
  readonly transfers: { from: string; to: string; amount: bigint }[] = [];

  constructor(options: InMemoryTokenLedgerOptions = {}) {
    for (const [address, amount] of Object.entries(options.balances ?? {})) {
      this.balances.set(address, amount);
    }
    this.falseNegativeTransfers = options.falseNegativeTransfers ?? false;
    this.dropTransfers = options.dropTransfers ?? false;
    this.failTransfers = options.failTransfers ?? false;
    this.onTransfer = options.onTransfer;
  }

  mint(address: string, amount: bigint): void {
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  balanceOf(address: string): bigint {
    return this.balances.get(address) ?? 0n;
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    if (this.failTransfers) {
      throw new TokenLedgerError("Transfer rejected by token");
    }
    if (this.dropTransfers) {
      return true;
    }

    const fromBefore = this.balanceOf(from);
    if (fromBefore < amount) {
      throw new TokenLedgerError(
        `Insufficient funds: ${from} holds ${fromBefore.toString()}, needs ${amount.toString()}`,
      );
    }
    const toBefore = this.balanceOf(to);

    this.balances.set(from, fromBefore - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    if (this.onTransfer !== undefined) {
      try {
        this.onTransfer(from, to, amount);
      } catch (err) {
        this.balances.set(from, fromBefore);
        this.balances.set(to, toBefore);
        throw err;
      }
    }

    this.transfers.push({ from, to, amount });
    return !this.falseNegativeTransfers;
  }
}
