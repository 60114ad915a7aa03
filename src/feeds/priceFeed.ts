import { Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";

/**
 * Current-price lookup for one asset on one venue. `null` means the price is
 * unavailable this time; implementations must not throw for feed failures.
 */
export interface PriceFeed {
  currentPrice(asset: string, venue: string): Promise<number | null>;
}

/** Venue-specific HTTP quote endpoint. */
export interface QuoteSource {
  readonly venue: string;
  fetchPrice(asset: string, signal: AbortSignal): Promise<number>;
}

export class HttpPriceFeed implements PriceFeed {
  private sources: Map<string, QuoteSource> = new Map();

  constructor(
    sources: QuoteSource[],
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {
    for (const source of sources) {
      this.sources.set(source.venue, source);
    }
  }

  async currentPrice(asset: string, venue: string): Promise<number | null> {
    const source = this.sources.get(venue);
    if (!source) {
      this.logger.error("No quote source for venue", { venue, asset });
      return null;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const price = await source.fetchPrice(asset, controller.signal);
      if (!Number.isFinite(price) || price <= 0) {
        this.logger.warn("Venue returned an unusable price", { venue, asset, price });
        return null;
      }
      return price;
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        this.logger.error("Timeout fetching price", { venue, asset, timeoutMs: this.timeoutMs });
      } else {
        this.logger.error("Error fetching price", { venue, asset, error: errorMessage(error) });
      }
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export async function fetchJson(url: string, signal: AbortSignal): Promise<unknown> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} from ${url}`);
  }
  return response.json();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePriceField(value: unknown, context: string): number {
  if (typeof value !== "string" && typeof value !== "number") {
    throw new Error(`Missing price in ${context} response`);
  }
  const price = typeof value === "number" ? value : parseFloat(value);
  if (isNaN(price)) {
    throw new Error(`Unparseable price in ${context} response: ${String(value)}`);
  }
  return price;
}
