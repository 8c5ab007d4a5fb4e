import { describe, expect, it } from 'vitest';

import { decodeSignal, encodeSignal } from '../../src/memory/signal_codec.js';
import type { Signal } from '../../src/types/index.js';

describe('signal codec', () => {
  it('restores a fresh-wallet signal', () => {
    const signal: Signal = {
      type: 'fresh_wallet_large_bet',
      marketId: 'taiwan',
      walletAddress: '0xfresh',
      ageHours: 24,
      betSizeUsd: 300_000,
      totalTrades: 1,
      allocationPct: 100,
      detectedAt: new Date('2025-01-05T12:00:00.000Z'),
    };
    expect(decodeSignal(encodeSignal(signal))).toEqual(signal);
  });

  it('restores a divergence signal keyed by source', () => {
    const signal: Signal = {
      type: 'probability_divergence',
      marketId: 'm1',
      divergences: {
        bookmaker: { localProbability: 0.5, externalProbability: 0.7, divergencePct: 20 },
      },
      detectedAt: new Date('2025-01-01T00:00:00.000Z'),
    };
    expect(decodeSignal(encodeSignal(signal))).toEqual(signal);
  });

  it('rejects unknown signal types', () => {
    expect(() =>
      decodeSignal('{"type":"moon_phase","marketId":"m1","detectedAt":"2025-01-01T00:00:00.000Z"}')
    ).toThrow();
  });
});
