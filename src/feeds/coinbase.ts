import { QuoteSource, fetchJson, isRecord, parsePriceField } from "./priceFeed";

export class CoinbaseQuoteSource implements QuoteSource {
  readonly venue = "coinbase";

  constructor(private readonly baseUrl: string = "https://api.coinbase.com") {}

  symbolFor(asset: string): string {
    return `${asset}-USD`;
  }

  async fetchPrice(asset: string, signal: AbortSignal): Promise<number> {
    const symbol = this.symbolFor(asset);
    const body = await fetchJson(
      `${this.baseUrl}/v2/prices/${encodeURIComponent(symbol)}/spot`,
      signal
    );
    // { data: { amount: "1.23", base: "XTZ", currency: "USD" } }
    if (!isRecord(body) || !isRecord(body.data)) {
      throw new Error(`Unexpected Coinbase spot response for ${symbol}`);
    }
    return parsePriceField(body.data.amount, "Coinbase spot");
  }
}
