import { loadConfig } from '../config';

const KEYS = [
  'VENUE_A',
  'VENUE_B',
  'TRACKED_ASSETS',
  'TAKER_FEE',
  'ATR_PERIOD',
  'MIN_TRADE_AMOUNT',
  'POLL_INTERVAL_MS',
];

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  it('should fall back to the default trading parameters', () => {
    const config = loadConfig();

    expect(config.venueA).toBe('mexc');
    expect(config.venueB).toBe('coinbase');
    expect(config.trackedPairs).toEqual([
      { asset: 'XTZ', quote: 'USD' },
      { asset: 'BONK', quote: 'USD' },
      { asset: 'DOT', quote: 'USD' },
    ]);
    expect(config.takerFeeRate).toBe(0.001);
    expect(config.minTradeUsd).toBe(5);
    expect(config.tradeSizeFactor).toBe(500000);
    expect(config.atrPeriod).toBe(14);
  });

  it('should read overrides from the environment', () => {
    process.env.VENUE_A = 'Coinbase';
    process.env.VENUE_B = 'mexc';
    process.env.TRACKED_ASSETS = ' btc, eth ,';
    process.env.TAKER_FEE = '0.002';
    process.env.POLL_INTERVAL_MS = '5000';

    const config = loadConfig();

    expect(config.venueA).toBe('coinbase');
    expect(config.venueB).toBe('mexc');
    expect(config.trackedPairs.map((p) => p.asset)).toEqual(['BTC', 'ETH']);
    expect(config.takerFeeRate).toBe(0.002);
    expect(config.pollIntervalMs).toBe(5000);
  });

  it('should reject unsupported or duplicate venues', () => {
    process.env.VENUE_A = 'kraken';
    expect(() => loadConfig()).toThrow('unsupported venue "kraken"');

    process.env.VENUE_A = 'coinbase';
    process.env.VENUE_B = 'coinbase';
    expect(() => loadConfig()).toThrow('VENUE_A and VENUE_B must differ');
  });

  it('should reject nonsensical trading parameters', () => {
    process.env.ATR_PERIOD = '2.5';
    expect(() => loadConfig()).toThrow('ATR_PERIOD must be a positive integer');

    process.env.ATR_PERIOD = '14';
    process.env.MIN_TRADE_AMOUNT = 'lots';
    expect(() => loadConfig()).toThrow('Environment variable MIN_TRADE_AMOUNT is not a number: lots');
  });
});
