import { PriceSample } from "../history/priceHistory";
import { LedgerSnapshot } from "../ledger/hedgeLedger";

export type TradeSide = "buy" | "sell";

export interface TradeRecord {
  timestamp: Date;
  asset: string;
  side: TradeSide;
  /** Positive when bought, negative when sold. */
  amount: number;
  price: number;
  venue: string;
  notionalUsd: number;
}

export interface HistoryStore {
  load(asset: string, venue: string): PriceSample[];
  append(asset: string, venue: string, sample: PriceSample): void;
}

export interface BalanceStore {
  load(): LedgerSnapshot;
  save(snapshot: LedgerSnapshot): void;
}

export interface TradeLog {
  append(record: TradeRecord): void;
}
