import { z } from 'zod';

import type { Signal } from '../types/index.js';

const base = {
  marketId: z.string(),
  detectedAt: z.coerce.date(),
};

const SignalSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('volume_spike'),
    ...base,
    windowHours: z.number(),
    currentVolume: z.number(),
    averageVolume: z.number(),
    spikeRatio: z.number(),
  }),
  z.object({
    type: z.literal('unusual_trade_size'),
    ...base,
    trades: z.array(
      z.object({
        traderAddress: z.string(),
        size: z.number(),
        price: z.number(),
        valueUsd: z.number(),
        timestamp: z.coerce.date(),
      })
    ),
  }),
  z.object({
    type: z.literal('probability_divergence'),
    ...base,
    divergences: z.record(
      z.object({
        localProbability: z.number(),
        externalProbability: z.number(),
        divergencePct: z.number(),
      })
    ),
  }),
  z.object({
    type: z.literal('correlation_divergence'),
    ...base,
    pairedMarketId: z.string(),
    correlation: z.number(),
    movementPct: z.number(),
    pairedMovementPct: z.number(),
    leaderMarketId: z.string(),
  }),
  z.object({
    type: z.literal('fresh_wallet_large_bet'),
    ...base,
    walletAddress: z.string(),
    ageHours: z.number(),
    betSizeUsd: z.number(),
    totalTrades: z.number(),
    allocationPct: z.number(),
  }),
  z.object({
    type: z.literal('social_mention_spike'),
    ...base,
    mentions: z.array(z.object({ keyword: z.string(), count: z.number() })),
  }),
]);

export function encodeSignal(signal: Signal): string {
  return JSON.stringify(signal);
}

/** Restores a stored signal, including its Date fields. */
export function decodeSignal(json: string): Signal {
  return SignalSchema.parse(JSON.parse(json));
}
