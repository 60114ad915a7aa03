import dotenv from "dotenv";

dotenv.config();

export interface TrackedPair {
  asset: string;
  quote: "USD";
}

export interface BotConfig {
  // Venues
  venueA: string;
  venueB: string;
  mexcApiUrl: string;
  coinbaseApiUrl: string;
  priceTimeoutMs: number;

  // Trading
  trackedPairs: TrackedPair[];
  defaultAssets: string[];
  startingCashUsd: number;
  takerFeeRate: number;
  minTradeUsd: number;
  tradeSizeFactor: number;
  atrPeriod: number;
  historyCapacity: number;
  pollIntervalMs: number;
  warmupSamples: number;
  warmupIntervalMs: number;

  // Storage
  dataDir: string;

  // Logging
  logLevel: string;
  logFile: string;
}

export const SUPPORTED_VENUES = ["mexc", "coinbase"] as const;

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value) {
    return value;
  }
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} is not a number: ${value}`);
  }
  return parsed;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

export function toTrackedPairs(assets: string[]): TrackedPair[] {
  return assets.map((asset): TrackedPair => ({ asset, quote: "USD" }));
}

export function validateConfig(config: BotConfig): void {
  const problems: string[] = [];
  const supported: readonly string[] = SUPPORTED_VENUES;

  for (const venue of [config.venueA, config.venueB]) {
    if (!supported.includes(venue)) {
      problems.push(`unsupported venue "${venue}" (supported: ${SUPPORTED_VENUES.join(", ")})`);
    }
  }
  if (config.venueA === config.venueB) {
    problems.push("VENUE_A and VENUE_B must differ");
  }
  if (config.trackedPairs.length === 0) {
    problems.push("TRACKED_ASSETS must name at least one asset");
  }
  if (config.takerFeeRate < 0 || config.takerFeeRate >= 1) {
    problems.push("TAKER_FEE must be in [0, 1)");
  }
  if (config.minTradeUsd <= 0) problems.push("MIN_TRADE_AMOUNT must be positive");
  if (config.tradeSizeFactor <= 0) problems.push("TRADE_SIZE_FACTOR must be positive");
  if (config.startingCashUsd < 0) problems.push("STARTING_CASH_USD must not be negative");
  if (!Number.isInteger(config.atrPeriod) || config.atrPeriod < 1) {
    problems.push("ATR_PERIOD must be a positive integer");
  }
  if (!Number.isInteger(config.historyCapacity) || config.historyCapacity < 1) {
    problems.push("HISTORY_CAPACITY must be a positive integer");
  }
  if (!Number.isInteger(config.warmupSamples) || config.warmupSamples < 0) {
    problems.push("WARMUP_SAMPLES must be a non-negative integer");
  }
  if (config.pollIntervalMs < 0) problems.push("POLL_INTERVAL_MS must not be negative");
  if (config.warmupIntervalMs < 0) problems.push("WARMUP_INTERVAL_MS must not be negative");
  if (config.priceTimeoutMs <= 0) problems.push("PRICE_TIMEOUT_MS must be positive");

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
}

export function loadConfig(): BotConfig {
  const config: BotConfig = {
    // Venues
    venueA: getEnvVar("VENUE_A", "mexc").toLowerCase(),
    venueB: getEnvVar("VENUE_B", "coinbase").toLowerCase(),
    mexcApiUrl: getEnvVar("MEXC_API_URL", "https://api.mexc.com"),
    coinbaseApiUrl: getEnvVar("COINBASE_API_URL", "https://api.coinbase.com"),
    priceTimeoutMs: getEnvNumber("PRICE_TIMEOUT_MS", 10000),

    // Trading
    trackedPairs: toTrackedPairs(getEnvList("TRACKED_ASSETS", ["XTZ", "BONK", "DOT"])),
    defaultAssets: getEnvList("DEFAULT_ASSETS", ["XTZ", "BTC", "LTC", "BONK", "DOT", "ADA"]),
    startingCashUsd: getEnvNumber("STARTING_CASH_USD", 2000),
    takerFeeRate: getEnvNumber("TAKER_FEE", 0.001),
    minTradeUsd: getEnvNumber("MIN_TRADE_AMOUNT", 5),
    tradeSizeFactor: getEnvNumber("TRADE_SIZE_FACTOR", 500000),
    atrPeriod: getEnvNumber("ATR_PERIOD", 14),
    historyCapacity: getEnvNumber("HISTORY_CAPACITY", 500),
    pollIntervalMs: getEnvNumber("POLL_INTERVAL_MS", 15000),
    warmupSamples: getEnvNumber("WARMUP_SAMPLES", 15),
    warmupIntervalMs: getEnvNumber("WARMUP_INTERVAL_MS", 1000),

    // Storage
    dataDir: getEnvVar("DATA_DIR", "data"),

    // Logging
    logLevel: getEnvVar("LOG_LEVEL", "info"),
    logFile: getEnvVar("LOG_FILE", "logs/arbitrage.log"),
  };

  validateConfig(config);
  return config;
}
