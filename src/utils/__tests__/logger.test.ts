import { logMetadata } from '../logger';
import { toTrackedPairs } from '../../config';

describe('logMetadata', () => {
  it('should tag entries with the venue pair and tracked assets', () => {
    const meta = logMetadata({
      logLevel: 'info',
      logFile: 'logs/arbitrage.log',
      venueA: 'mexc',
      venueB: 'coinbase',
      trackedPairs: toTrackedPairs(['XTZ', 'BONK', 'DOT']),
    });

    expect(meta).toEqual({
      service: 'venue-arb-bot',
      venues: 'mexc/coinbase',
      assets: 'XTZ,BONK,DOT',
    });
  });
});
