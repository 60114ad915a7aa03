import * as fs from "fs";
import * as path from "path";
import { ensureDir } from "./fileHistoryStore";
import { TradeLog, TradeRecord } from "./types";

/**
 * Appends `timestamp,side,amount,price,notional,venue` to
 * `{dataDir}/{ASSET}_trade_history.txt`.
 */
export class FileTradeLog implements TradeLog {
  constructor(private readonly dataDir: string) {}

  filePath(asset: string): string {
    return path.join(this.dataDir, `${asset}_trade_history.txt`);
  }

  append(record: TradeRecord): void {
    const file = this.filePath(record.asset);
    ensureDir(path.dirname(file));
    const line = [
      record.timestamp.toISOString(),
      record.side,
      record.amount,
      record.price,
      record.notionalUsd,
      record.venue,
    ].join(",");
    fs.appendFileSync(file, line + "\n", "utf8");
  }
}
