import { BotConfig } from "../config";
import { Logger } from "../utils/logger";
import { HttpPriceFeed, QuoteSource } from "./priceFeed";
import { MexcQuoteSource } from "./mexc";
import { CoinbaseQuoteSource } from "./coinbase";

export * from "./priceFeed";
export { MexcQuoteSource } from "./mexc";
export { CoinbaseQuoteSource } from "./coinbase";

export function createPriceFeed(config: BotConfig, logger: Logger): HttpPriceFeed {
  const sources: QuoteSource[] = [
    new MexcQuoteSource(config.mexcApiUrl),
    new CoinbaseQuoteSource(config.coinbaseApiUrl),
  ];
  return new HttpPriceFeed(sources, config.priceTimeoutMs, logger);
}
