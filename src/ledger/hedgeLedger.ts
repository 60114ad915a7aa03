import {
  InsufficientFundsError,
  InsufficientHoldingError,
  InvalidAmountError,
} from "../utils/errors";

export const CASH = "CASH";

export interface LedgerEntry {
  readonly venue: string;
  /** `CASH` for the USD balance, otherwise an asset symbol. */
  readonly account: string;
  readonly amount: number;
}

export type LedgerSnapshot = ReadonlyArray<LedgerEntry>;

interface VenueBalance {
  cash: number;
  holdings: Map<string, number>;
}

function cloneBalances(balances: Map<string, VenueBalance>): Map<string, VenueBalance> {
  const copy = new Map<string, VenueBalance>();
  for (const [venue, balance] of balances) {
    copy.set(venue, { cash: balance.cash, holdings: new Map(balance.holdings) });
  }
  return copy;
}

/**
 * Per-venue USD cash and asset holdings. Every amount stays >= 0: a mutation
 * that would break this is rejected and leaves the ledger untouched.
 */
export class HedgeLedger {
  private balances: Map<string, VenueBalance> = new Map();

  constructor(venues: readonly string[], startingCash: number = 0) {
    if (venues.length === 0) {
      throw new InvalidAmountError("Ledger needs at least one venue");
    }
    assertAmount("starting cash", startingCash);
    for (const venue of venues) {
      this.balances.set(venue, { cash: startingCash, holdings: new Map() });
    }
  }

  /**
   * Rebuild a ledger from persisted entries. Venues not mentioned keep zero cash.
   */
  static fromSnapshot(venues: readonly string[], entries: LedgerSnapshot): HedgeLedger {
    const ledger = new HedgeLedger(venues);
    for (const entry of entries) {
      const balance = ledger.balanceOf(entry.venue);
      assertAmount(`${entry.venue}/${entry.account}`, entry.amount);
      if (entry.account === CASH) {
        balance.cash = entry.amount;
      } else {
        balance.holdings.set(entry.account, entry.amount);
      }
    }
    return ledger;
  }

  venues(): string[] {
    return Array.from(this.balances.keys());
  }

  cash(venue: string): number {
    return this.balanceOf(venue).cash;
  }

  holding(venue: string, asset: string): number {
    return this.balanceOf(venue).holdings.get(asset) ?? 0;
  }

  debitCash(venue: string, amount: number): void {
    assertAmount("debit", amount);
    const balance = this.balanceOf(venue);
    if (amount > balance.cash) {
      throw new InsufficientFundsError(venue, amount, balance.cash);
    }
    balance.cash -= amount;
  }

  creditCash(venue: string, amount: number): void {
    assertAmount("credit", amount);
    this.balanceOf(venue).cash += amount;
  }

  adjustHolding(venue: string, asset: string, delta: number): void {
    if (!Number.isFinite(delta)) {
      throw new InvalidAmountError(`Holding delta must be finite, got ${delta}`);
    }
    if (asset === CASH) {
      throw new InvalidAmountError(`"${CASH}" is reserved for the cash account`);
    }
    const balance = this.balanceOf(venue);
    const current = balance.holdings.get(asset) ?? 0;
    const next = current + delta;
    if (next < 0) {
      throw new InsufficientHoldingError(venue, asset, delta, current);
    }
    balance.holdings.set(asset, next);
  }

  /**
   * Run a group of mutations all-or-nothing. If `fn` throws, every balance
   * is restored to what it was before the call and the error is rethrown.
   */
  atomically<T>(fn: () => T): T {
    const saved = cloneBalances(this.balances);
    try {
      return fn();
    } catch (error) {
      this.balances = saved;
      throw error;
    }
  }

  snapshot(): LedgerSnapshot {
    const entries: LedgerEntry[] = [];
    for (const [venue, balance] of this.balances) {
      entries.push(Object.freeze({ venue, account: CASH, amount: balance.cash }));
      for (const [asset, amount] of balance.holdings) {
        entries.push(Object.freeze({ venue, account: asset, amount }));
      }
    }
    return Object.freeze(entries);
  }

  private balanceOf(venue: string): VenueBalance {
    const balance = this.balances.get(venue);
    if (!balance) {
      throw new InvalidAmountError(`Unknown venue: ${venue}`);
    }
    return balance;
  }
}

function assertAmount(label: string, amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidAmountError(`Invalid ${label} amount: ${amount}`);
  }
}
