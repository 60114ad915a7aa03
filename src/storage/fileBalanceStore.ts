import * as fs from "fs";
import * as path from "path";
import { CASH, LedgerEntry, LedgerSnapshot } from "../ledger/hedgeLedger";
import { Logger } from "../utils/logger";
import { ensureDir } from "./fileHistoryStore";
import { BalanceStore } from "./types";

const CASH_CURRENCY = "USD";

export interface BalanceDefaults {
  venues: readonly string[];
  startingCashUsd: number;
  assets: readonly string[];
}

/**
 * `{dataDir}/balances.txt`, one `venue,currency,amount` line per account.
 * Cash is stored under the `USD` currency.
 */
export class FileBalanceStore implements BalanceStore {
  constructor(
    private readonly dataDir: string,
    private readonly defaults: BalanceDefaults,
    private readonly logger: Logger
  ) {}

  filePath(): string {
    return path.join(this.dataDir, "balances.txt");
  }

  load(): LedgerSnapshot {
    const file = this.filePath();
    if (!fs.existsSync(file)) {
      const initial = defaultSnapshot(this.defaults);
      this.logger.info("No balances file found, writing starting balances", {
        file,
        startingCashUsd: this.defaults.startingCashUsd,
      });
      this.save(initial);
      return initial;
    }

    const entries: LedgerEntry[] = [];
    const seenCash = new Set<string>();
    const lines = fs.readFileSync(file, "utf8").split("\n");

    for (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0) {
        continue;
      }
      const parts = line.split(",");
      if (parts.length !== 3) {
        this.logger.error("Skipping malformed balance line", { file, line });
        continue;
      }
      const [venue, currency, amountText] = parts;
      const amount = Number(amountText);
      if (amountText.trim() === "" || !Number.isFinite(amount) || amount < 0) {
        this.logger.error("Skipping balance line with invalid amount", { file, line });
        continue;
      }
      if (!this.defaults.venues.includes(venue)) {
        this.logger.error("Skipping balance line for unknown venue", { file, line, venue });
        continue;
      }

      if (currency === CASH_CURRENCY) {
        seenCash.add(venue);
        entries.push({ venue, account: CASH, amount });
      } else {
        entries.push({ venue, account: currency, amount });
      }
    }

    for (const venue of this.defaults.venues) {
      if (!seenCash.has(venue)) {
        entries.push({ venue, account: CASH, amount: this.defaults.startingCashUsd });
      }
    }

    return Object.freeze(entries);
  }

  save(snapshot: LedgerSnapshot): void {
    const file = this.filePath();
    ensureDir(path.dirname(file));
    const body = snapshot
      .map((entry) => {
        const currency = entry.account === CASH ? CASH_CURRENCY : entry.account;
        // String(number) is the shortest text that parses back to the same double
        return `${entry.venue},${currency},${String(entry.amount)}`;
      })
      .join("\n");
    fs.writeFileSync(file, body + "\n", "utf8");
  }
}

export function defaultSnapshot(defaults: BalanceDefaults): LedgerSnapshot {
  const entries: LedgerEntry[] = [];
  for (const venue of defaults.venues) {
    entries.push({ venue, account: CASH, amount: defaults.startingCashUsd });
    for (const asset of defaults.assets) {
      entries.push({ venue, account: asset, amount: 0 });
    }
  }
  return Object.freeze(entries);
}
