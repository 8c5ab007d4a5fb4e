import { readFileSync } from 'node:fs';

import { z } from 'zod';

import type { MarketContext } from './pipeline.js';

const probability = z.number().min(0).max(1);
const usd = z.number().nonnegative();

const TradeInputSchema = z.object({
  traderAddress: z.string(),
  size: z.number().nonnegative(),
  price: probability,
  timestamp: z.coerce.date(),
});

const MarketInputSchema = z.object({
  marketId: z.string().min(1),
  question: z.string().default(''),
  probability,
  volume24h: usd,
  liquidity: usd,
  timestamp: z.coerce.date().optional(),
  windowVolume: usd.optional(),
  trades: z.array(TradeInputSchema).default([]),
  externalProbabilities: z.record(probability.nullable()).optional(),
  mentionCounts: z.record(z.number().nonnegative()).optional(),
  correlatedMarkets: z
    .array(z.object({ marketId: z.string().min(1), probability }))
    .optional(),
});

const MarketBatchSchema = z.union([
  z.array(MarketInputSchema),
  z.object({ markets: z.array(MarketInputSchema) }).transform((batch) => batch.markets),
]);

export type MarketInput = z.input<typeof MarketInputSchema>;

/**
 * Validates a batch of market observations (a bare array or `{ markets }`)
 * and turns each entry into a pipeline context stamped at `receivedAt`
 * unless it carries its own timestamp.
 */
export function parseMarketBatch(raw: unknown, receivedAt: Date = new Date()): MarketContext[] {
  return MarketBatchSchema.parse(raw).map((market) => ({
    snapshot: {
      marketId: market.marketId,
      probability: market.probability,
      volume24h: market.volume24h,
      liquidity: market.liquidity,
      timestamp: market.timestamp ?? receivedAt,
    },
    question: market.question,
    windowVolume: market.windowVolume,
    trades: market.trades.map((trade) => ({ ...trade, marketId: market.marketId })),
    externalProbabilities: market.externalProbabilities,
    mentionCounts: market.mentionCounts,
    correlatedMarkets: market.correlatedMarkets,
  }));
}

export function loadMarketBatch(path: string, receivedAt?: Date): MarketContext[] {
  return parseMarketBatch(JSON.parse(readFileSync(path, 'utf-8')), receivedAt);
}
