import { describe, expect, it } from 'vitest';

import { parseMarketBatch } from '../../src/core/market_batch.js';

const receivedAt = new Date('2025-01-01T12:00:00.000Z');

describe('parseMarketBatch', () => {
  it('turns market observations into pipeline contexts', () => {
    const [context] = parseMarketBatch(
      [
        {
          marketId: 'm1',
          question: 'Will it snow?',
          probability: 0.4,
          volume24h: 12_000,
          liquidity: 8000,
          windowVolume: 6000,
          trades: [
            { traderAddress: '0xaaa', size: 100, price: 0.4, timestamp: '2025-01-01T11:00:00Z' },
          ],
          externalProbabilities: { bookmaker: 0.55, poll: null },
        },
      ],
      receivedAt
    );

    expect(context?.snapshot).toEqual({
      marketId: 'm1',
      probability: 0.4,
      volume24h: 12_000,
      liquidity: 8000,
      timestamp: receivedAt,
    });
    expect(context?.windowVolume).toBe(6000);
    expect(context?.trades).toEqual([
      {
        marketId: 'm1',
        traderAddress: '0xaaa',
        size: 100,
        price: 0.4,
        timestamp: new Date('2025-01-01T11:00:00.000Z'),
      },
    ]);
    expect(context?.externalProbabilities).toEqual({ bookmaker: 0.55, poll: null });
  });

  it('accepts a wrapped batch and keeps explicit timestamps', () => {
    const contexts = parseMarketBatch(
      {
        markets: [
          {
            marketId: 'm2',
            probability: 0.7,
            volume24h: 0,
            liquidity: 0,
            timestamp: '2024-12-31T00:00:00Z',
          },
        ],
      },
      receivedAt
    );
    expect(contexts).toHaveLength(1);
    expect(contexts[0]?.question).toBe('');
    expect(contexts[0]?.snapshot.timestamp).toEqual(new Date('2024-12-31T00:00:00.000Z'));
    expect(contexts[0]?.trades).toEqual([]);
  });

  it('rejects probabilities outside [0, 1]', () => {
    expect(() =>
      parseMarketBatch([{ marketId: 'm1', probability: 1.4, volume24h: 0, liquidity: 0 }])
    ).toThrow();
  });
});
