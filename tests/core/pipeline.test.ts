import { beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveConfig, type TripwireConfig } from '../../src/core/config.js';
import { Logger } from '../../src/core/logger.js';
import { OpportunityPipeline, type MarketContext } from '../../src/core/pipeline.js';
import { ScriptedWalletAgeOracle } from '../../src/detection/wallet_age.js';
import { InMemoryHistoryStore } from '../../src/memory/history_store.js';
import { InMemoryOpportunityStore } from '../../src/memory/opportunity_store.js';
import type { MarketSnapshot, Signal } from '../../src/types/index.js';

const HOUR = 60 * 60 * 1000;
const now = new Date('2025-01-01T12:00:00.000Z');

class FailingHistoryStore extends InMemoryHistoryStore {
  override appendSnapshot(snapshot: MarketSnapshot): void {
    if (snapshot.marketId === 'broken') {
      throw new Error('disk unavailable');
    }
    super.appendSnapshot(snapshot);
  }
}

let history: InMemoryHistoryStore;
let opportunities: InMemoryOpportunityStore;
let oracle: ScriptedWalletAgeOracle;

function createPipeline(config: TripwireConfig = resolveConfig()): OpportunityPipeline {
  return new OpportunityPipeline(config, {
    history,
    opportunities,
    walletAges: oracle,
    logger: new Logger('error'),
    clock: () => now,
  });
}

function context(marketId: string, overrides: Partial<MarketContext> = {}): MarketContext {
  return {
    snapshot: {
      marketId,
      probability: 0.5,
      volume24h: 1000,
      liquidity: 10_000,
      timestamp: now,
    },
    question: `Will ${marketId} resolve yes?`,
    ...overrides,
  };
}

function seedQuietHistory(marketId: string): void {
  for (const hoursAgo of [2, 1]) {
    history.appendSnapshot({
      marketId,
      probability: 0.5,
      volume24h: 1000,
      liquidity: 10_000,
      timestamp: new Date(now.getTime() - hoursAgo * HOUR),
    });
  }
}

beforeEach(() => {
  history = new InMemoryHistoryStore();
  opportunities = new InMemoryOpportunityStore();
  oracle = new ScriptedWalletAgeOracle();
});

describe('OpportunityPipeline.analyzeMarket', () => {
  it('records the snapshot and trades before detecting', async () => {
    const pipeline = createPipeline();
    const signals = await pipeline.analyzeMarket(
      context('m1', {
        trades: [{ marketId: 'm1', traderAddress: '0xaaa', size: 10, price: 0.5, timestamp: now }],
      })
    );
    expect(signals).toEqual([]);
    expect(history.volumeHistory('m1', 24, now)).toHaveLength(1);
    expect(history.tradesByMarket('m1')).toHaveLength(1);
  });

  it('runs every detector whose inputs are present', async () => {
    seedQuietHistory('m1');
    oracle.set('0xaaa', 24);
    const pipeline = createPipeline();
    const signals = await pipeline.analyzeMarket(
      context('m1', {
        windowVolume: 5000,
        trades: [{ marketId: 'm1', traderAddress: '0xaaa', size: 10_000, price: 0.5, timestamp: now }],
        externalProbabilities: { bookmaker: 0.7 },
        mentionCounts: { election: 40 },
      })
    );
    expect(signals.map((signal) => signal.type)).toEqual([
      'volume_spike',
      'unusual_trade_size',
      'fresh_wallet_large_bet',
      'probability_divergence',
      'social_mention_spike',
    ]);
  });
});

describe('OpportunityPipeline.processSignals', () => {
  it('estimates fair value from diverging sources', () => {
    const pipeline = createPipeline();
    const signal: Signal = {
      type: 'probability_divergence',
      marketId: 'm1',
      divergences: {
        a: { localProbability: 0.5, externalProbability: 0.7, divergencePct: 20 },
        b: { localProbability: 0.5, externalProbability: 0.6, divergencePct: 10 },
      },
      detectedAt: now,
    };
    expect(pipeline.estimateFairProbability(signal, 0.5)).toBeCloseTo(0.65);
  });

  it('rejects signals without expected value', () => {
    const pipeline = createPipeline();
    const decisions = pipeline.processSignals(context('m1'), [
      {
        type: 'social_mention_spike',
        marketId: 'm1',
        mentions: [{ keyword: 'election', count: 40 }],
        detectedAt: now,
      },
    ]);
    expect(decisions).toHaveLength(1);
    expect(decisions[0]?.status).toBe('flagged');

    const expensive = pipeline.processSignals(
      context('m2', {
        snapshot: { marketId: 'm2', probability: 0.95, volume24h: 1000, liquidity: 10_000, timestamp: now },
      }),
      [{ type: 'social_mention_spike', marketId: 'm2', mentions: [], detectedAt: now }]
    );
    expect(expensive[0]).toMatchObject({
      status: 'rejected',
      reason: 'Expected value $0.00 below minimum $0.05',
    });
  });

  it('sizes around exposure already taken', () => {
    const pipeline = createPipeline();
    opportunities.flag({
      marketId: 'held',
      question: 'held',
      signal: { type: 'social_mention_spike', marketId: 'held', mentions: [], detectedAt: now },
      currentProbability: 0.5,
      expectedValueUsd: 10,
      suggestedSizeUsd: 3800,
      rationale: 'held',
      flaggedAt: now,
    });
    const [decision] = pipeline.processSignals(context('m1'), [
      { type: 'social_mention_spike', marketId: 'm1', mentions: [], detectedAt: now },
    ]);
    expect(decision?.status).toBe('flagged');
    if (decision?.status === 'flagged') {
      expect(decision.opportunity.suggestedSizeUsd).toBeCloseTo(200, 6);
      expect(decision.opportunity.expectedValueUsd).toBeCloseTo(20, 6);
    }
  });

  it('passes risk refusals through as rejections', () => {
    const pipeline = createPipeline(resolveConfig({ risk: { maxOpenPositions: 0 } }));
    const decisions = pipeline.processSignals(context('m1'), [
      { type: 'social_mention_spike', marketId: 'm1', mentions: [], detectedAt: now },
    ]);
    expect(decisions[0]).toMatchObject({ status: 'rejected', reason: 'Max positions (0) reached' });
    expect(opportunities.listUnresolved()).toEqual([]);
  });
});

describe('OpportunityPipeline.runPass', () => {
  it('flags, persists and emits a volume spike', async () => {
    seedQuietHistory('m1');
    const pipeline = createPipeline();
    const listener = vi.fn();
    pipeline.on('opportunity', listener);

    const summary = await pipeline.runPass([context('m1', { windowVolume: 5000 })]);

    expect(summary.marketsAnalyzed).toBe(1);
    expect(summary.signals).toBe(1);
    expect(summary.rejected).toBe(0);
    expect(summary.opportunities).toHaveLength(1);

    const [flagged] = summary.opportunities;
    expect(flagged?.suggestedSizeUsd).toBeCloseTo(500, 6);
    expect(flagged?.expectedValueUsd).toBeCloseTo(50, 6);
    expect(flagged?.flaggedAt).toEqual(now);
    expect(flagged?.rationale.split('\n')).toEqual([
      'Signal detected: Volume Spike.',
      'Volume spike detected: 5.0x average volume.',
      'Edge: 5.00%. Expected Value: $50.00. Suggested position: $500.00 (5.0% of bankroll).',
    ]);
    expect(listener).toHaveBeenCalledWith(flagged);
    expect(opportunities.listUnresolved()).toHaveLength(1);
  });

  it('skips illiquid markets without touching history', async () => {
    const pipeline = createPipeline();
    const low = context('thin');
    const summary = await pipeline.runPass([
      { ...low, snapshot: { ...low.snapshot, liquidity: 100 } },
    ]);
    expect(summary.marketsSkipped).toBe(1);
    expect(summary.marketsAnalyzed).toBe(0);
    expect(history.volumeHistory('thin', 24, now)).toEqual([]);
  });

  it('keeps going after a market fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    history = new FailingHistoryStore();
    seedQuietHistory('m1');
    const pipeline = createPipeline();
    const onError = vi.fn();
    pipeline.on('market-error', onError);

    const summary = await pipeline.runPass([
      context('broken', { windowVolume: 5000 }),
      context('m1', { windowVolume: 5000 }),
    ]);

    expect(summary.failures).toEqual([{ marketId: 'broken', error: 'disk unavailable' }]);
    expect(summary.marketsAnalyzed).toBe(1);
    expect(summary.opportunities.map((item) => item.marketId)).toEqual(['m1']);
    expect(onError).toHaveBeenCalledWith('broken', expect.any(Error));
  });
});

describe('OpportunityPipeline.keywordsFor', () => {
  it('extracts search terms from the question', () => {
    expect(createPipeline().keywordsFor('Will China invade Taiwan in 2025?')).toEqual([
      'china',
      'invade',
      'taiwan',
      '2025',
    ]);
  });
});
