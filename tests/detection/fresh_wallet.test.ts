import { beforeEach, describe, expect, it, vi } from 'vitest';

import { resolveConfig } from '../../src/core/config.js';
import { FreshWalletDetector } from '../../src/detection/fresh_wallet.js';
import { ScriptedWalletAgeOracle } from '../../src/detection/wallet_age.js';
import { InMemoryHistoryStore } from '../../src/memory/history_store.js';
import type { TradeRecord } from '../../src/types/index.js';

const now = new Date('2025-01-05T12:00:00.000Z');
const config = resolveConfig();

let store: InMemoryHistoryStore;
let oracle: ScriptedWalletAgeOracle;
let detector: FreshWalletDetector;

function trade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    marketId: 'm1',
    traderAddress: '0xaaa',
    size: 10_000,
    price: 0.5,
    timestamp: now,
    ...overrides,
  };
}

function priorTrade(marketId: string, valueUsd: number, minutesAgo = 60): TradeRecord {
  return trade({
    marketId,
    size: valueUsd * 2,
    price: 0.5,
    timestamp: new Date(now.getTime() - minutesAgo * 60_000),
  });
}

beforeEach(() => {
  store = new InMemoryHistoryStore();
  oracle = new ScriptedWalletAgeOracle([['0xaaa', 24]]);
  detector = new FreshWalletDetector(config, store, oracle, { clock: () => now });
});

describe('FreshWalletDetector', () => {
  it('flags a young single-bet wallet', async () => {
    const signal = await detector.detect('m1', [trade()]);
    expect(signal).toEqual({
      type: 'fresh_wallet_large_bet',
      marketId: 'm1',
      walletAddress: '0xaaa',
      ageHours: 24,
      betSizeUsd: 5000,
      totalTrades: 1,
      allocationPct: 100,
      detectedAt: now,
    });
  });

  it('suppresses wallets with more than the allowed trade count', async () => {
    store.appendTrades([
      priorTrade('m2', 5, 10),
      priorTrade('m3', 5, 20),
      priorTrade('m4', 5, 30),
    ]);
    expect(await detector.detect('m1', [trade()])).toBeNull();
    const assessment = await detector.assessWallet('m1', '0xaaa', [trade()]);
    expect(assessment.passed).toBe(false);
    if (!assessment.passed) {
      expect(assessment.gate).toBe('too_many_trades');
      expect(assessment.reason).toBe('Wallet has 4 trades, above limit 3');
    }
  });

  it('checks the bet size before asking for the age', async () => {
    const lookup = vi.spyOn(oracle, 'getWalletAge');
    const assessment = await detector.assessWallet('m1', '0xaaa', [trade({ size: 9998 })]);
    expect(assessment).toEqual({
      passed: false,
      gate: 'bet_below_threshold',
      reason: 'Bet size $4,999 below threshold $5,000',
      betSizeUsd: 4999,
      ageHours: null,
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('skips wallets of unknown age', async () => {
    const assessment = await detector.assessWallet('m1', '0xbbb', [trade({ traderAddress: '0xbbb' })]);
    expect(assessment.passed === false && assessment.gate).toBe('age_unknown');
  });

  it('skips wallets older than the threshold', async () => {
    oracle.set('0xaaa', 100);
    const assessment = await detector.assessWallet('m1', '0xaaa', [trade()]);
    expect(assessment.passed === false && assessment.reason).toBe(
      'Wallet age 100h above threshold 72h'
    );
  });

  it('requires the bet to dominate the wallet footprint', async () => {
    store.appendTrades([priorTrade('m2', 2000)]);
    const assessment = await detector.assessWallet('m1', '0xaaa', [trade()]);
    expect(assessment.passed === false && assessment.gate).toBe('allocation_too_low');
    expect(assessment.passed === false && assessment.reason).toBe(
      'Allocation 71.4% below minimum 80%'
    );
  });

  it('skips wallets with large bets elsewhere', async () => {
    store.appendTrades([priorTrade('m2', 6000)]);
    const assessment = await detector.assessWallet('m1', '0xaaa', [trade({ size: 60_000 })]);
    expect(assessment.passed === false && assessment.gate).toBe('prior_large_bets');
  });

  it('gives the same answer once the batch is in the ledger', async () => {
    const batch = [trade()];
    store.appendTrades(batch);
    const signal = await detector.detect('m1', batch);
    expect(signal?.totalTrades).toBe(1);
    expect(signal?.allocationPct).toBe(100);
  });

  it('sums a bet split over several trades', async () => {
    const batch = [
      trade({ size: 5000 }),
      trade({ size: 5000, timestamp: new Date(now.getTime() - 60_000) }),
    ];
    const signal = await detector.detect('m1', batch);
    expect(signal?.betSizeUsd).toBe(5000);
    expect(signal?.totalTrades).toBe(2);
  });

  it('only counts trades on the market being checked', async () => {
    const batch = [trade({ size: 6000 }), trade({ marketId: 'm2', size: 6000 })];
    const assessment = await detector.assessWallet('m1', '0xaaa', batch);
    expect(assessment.passed === false && assessment.gate).toBe('bet_below_threshold');
  });

  it('picks the first qualifying wallet by address', async () => {
    oracle.set('0x111', 10);
    const signal = await detector.detect('m1', [trade(), trade({ traderAddress: '0x111' })]);
    expect(signal?.walletAddress).toBe('0x111');
  });

  it('profiles a wallet from the ledger', async () => {
    store.appendTrades([priorTrade('m1', 3000), priorTrade('m2', 1000, 120)]);
    const profile = await detector.profileWallet('0xaaa', 'm1');
    expect(profile).toEqual({
      address: '0xaaa',
      ageHours: 24,
      tradeCount: 2,
      totalVolumeUsd: 4000,
      marketTrades: 1,
      marketVolumeUsd: 3000,
      allocationPct: 75,
      isFresh: true,
      isFocused: false,
      hasLargeBet: false,
    });
  });
});
