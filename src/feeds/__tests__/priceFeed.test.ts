import { CoinbaseQuoteSource, HttpPriceFeed, MexcQuoteSource, QuoteSource } from '..';
import { createSilentLogger, Logger } from '../../utils/logger';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HttpPriceFeed', () => {
  let logger: Logger;
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    logger = createSilentLogger();
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function feed(timeoutMs = 10000): HttpPriceFeed {
    return new HttpPriceFeed(
      [new MexcQuoteSource('https://api.mexc.com'), new CoinbaseQuoteSource('https://api.coinbase.com')],
      timeoutMs,
      logger
    );
  }

  it('should read the MEXC ticker price for the USDT pair', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ symbol: 'XTZUSDT', price: '0.8123' }));

    const price = await feed().currentPrice('XTZ', 'mexc');

    expect(price).toBe(0.8123);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.mexc.com/api/v3/ticker/price?symbol=XTZUSDT',
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('should read the Coinbase spot price for the USD pair', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ data: { amount: '1.05', base: 'XTZ', currency: 'USD' } })
    );

    const price = await feed().currentPrice('XTZ', 'coinbase');

    expect(price).toBe(1.05);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.coinbase.com/v2/prices/XTZ-USD/spot',
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it('should report unavailable when the API responds with an error status', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ msg: 'Invalid symbol.' }, 400));
    const error = jest.spyOn(logger, 'error');

    const price = await feed().currentPrice('NOPE', 'mexc');

    expect(price).toBeNull();
    expect(error).toHaveBeenCalledWith('Error fetching price', {
      venue: 'mexc',
      asset: 'NOPE',
      error: 'HTTP 400 from https://api.mexc.com/api/v3/ticker/price?symbol=NOPEUSDT',
    });
  });

  it('should report unavailable on a network failure', async () => {
    fetchMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND api.coinbase.com'));

    await expect(feed().currentPrice('XTZ', 'coinbase')).resolves.toBeNull();
  });

  it('should report unavailable on a malformed body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: { base: 'XTZ' } }));
    fetchMock.mockResolvedValueOnce(jsonResponse(['unexpected']));
    fetchMock.mockResolvedValueOnce(jsonResponse({ price: 'n/a' }));

    expect(await feed().currentPrice('XTZ', 'coinbase')).toBeNull();
    expect(await feed().currentPrice('XTZ', 'mexc')).toBeNull();
    expect(await feed().currentPrice('XTZ', 'mexc')).toBeNull();
  });

  it('should report unavailable for a zero price', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ symbol: 'XTZUSDT', price: '0' }));
    const warn = jest.spyOn(logger, 'warn');

    expect(await feed().currentPrice('XTZ', 'mexc')).toBeNull();
    expect(warn).toHaveBeenCalledWith('Venue returned an unusable price', {
      venue: 'mexc',
      asset: 'XTZ',
      price: 0,
    });
  });

  it('should report unavailable for a venue it has no source for', async () => {
    expect(await feed().currentPrice('XTZ', 'kraken')).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should give up on a source that does not answer in time', async () => {
    const stalled: QuoteSource = {
      venue: 'stalled',
      fetchPrice: (_asset, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => {
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        }),
    };
    const error = jest.spyOn(logger, 'error');

    const price = await new HttpPriceFeed([stalled], 20, logger).currentPrice('XTZ', 'stalled');

    expect(price).toBeNull();
    expect(error).toHaveBeenCalledWith('Timeout fetching price', {
      venue: 'stalled',
      asset: 'XTZ',
      timeoutMs: 20,
    });
  });
});
