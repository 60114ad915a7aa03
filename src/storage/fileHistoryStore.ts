import * as fs from "fs";
import * as path from "path";
import { PriceSample } from "../history/priceHistory";
import { Logger } from "../utils/logger";
import { HistoryStore } from "./types";

/**
 * One `iso8601,price` line per sample in
 * `{dataDir}/{ASSET}_{venue}_price_history.txt`.
 */
export class FileHistoryStore implements HistoryStore {
  constructor(
    private readonly dataDir: string,
    private readonly logger: Logger
  ) {}

  filePath(asset: string, venue: string): string {
    return path.join(this.dataDir, `${asset}_${venue}_price_history.txt`);
  }

  load(asset: string, venue: string): PriceSample[] {
    const file = this.filePath(asset, venue);
    if (!fs.existsSync(file)) {
      return [];
    }

    const samples: PriceSample[] = [];
    const lines = fs.readFileSync(file, "utf8").split("\n");
    for (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0) {
        continue;
      }
      const sample = parseSampleLine(line);
      if (!sample) {
        this.logger.warn("Skipping malformed price history line", { file, line });
        continue;
      }
      samples.push(sample);
    }
    return samples;
  }

  append(asset: string, venue: string, sample: PriceSample): void {
    const file = this.filePath(asset, venue);
    ensureDir(path.dirname(file));
    fs.appendFileSync(file, `${sample.timestamp.toISOString()},${sample.price}\n`, "utf8");
  }
}

export function parseSampleLine(line: string): PriceSample | null {
  const parts = line.split(",");
  if (parts.length !== 2) {
    return null;
  }
  const timestamp = new Date(parts[0]);
  const price = Number(parts[1]);
  if (isNaN(timestamp.getTime()) || parts[1].trim() === "" || !Number.isFinite(price) || price <= 0) {
    return null;
  }
  return { timestamp, price };
}

export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
