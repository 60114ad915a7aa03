import { QuoteSource, fetchJson, isRecord, parsePriceField } from "./priceFeed";

/**
 * MEXC spot ticker. Pairs are quoted against USDT, treated as USD.
 */
export class MexcQuoteSource implements QuoteSource {
  readonly venue = "mexc";

  constructor(private readonly baseUrl: string = "https://api.mexc.com") {}

  symbolFor(asset: string): string {
    return `${asset}USDT`;
  }

  async fetchPrice(asset: string, signal: AbortSignal): Promise<number> {
    const symbol = this.symbolFor(asset);
    const body = await fetchJson(
      `${this.baseUrl}/api/v3/ticker/price?symbol=${encodeURIComponent(symbol)}`,
      signal
    );
    if (!isRecord(body)) {
      throw new Error(`Unexpected MEXC ticker response for ${symbol}`);
    }
    return parsePriceField(body.price, "MEXC ticker");
  }
}
