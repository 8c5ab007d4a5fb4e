import { describe, expect, it } from 'vitest';

import { openDatabase } from '../../src/memory/db.js';
import {
  InMemoryHistoryStore,
  SqliteHistoryStore,
  type HistoryStore,
} from '../../src/memory/history_store.js';
import type { MarketSnapshot, TradeRecord } from '../../src/types/index.js';

const HOUR = 60 * 60 * 1000;
const asOf = new Date('2025-01-01T12:00:00.000Z');

function snapshotAt(offsetHours: number, volume24h: number, marketId = 'm1'): MarketSnapshot {
  return {
    marketId,
    probability: 0.5,
    volume24h,
    liquidity: 10_000,
    timestamp: new Date(asOf.getTime() + offsetHours * HOUR),
  };
}

function trade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    marketId: 'm1',
    traderAddress: '0xaaa',
    size: 100,
    price: 0.5,
    timestamp: new Date('2025-01-01T10:00:00.000Z'),
    ...overrides,
  };
}

const factories: Array<[string, () => HistoryStore]> = [
  ['in-memory', () => new InMemoryHistoryStore()],
  ['sqlite', () => new SqliteHistoryStore(openDatabase(':memory:'))],
];

describe.each(factories)('%s history store', (_name, createStore) => {
  it('returns the trailing window oldest first', () => {
    const store = createStore();
    for (const snapshot of [
      snapshotAt(-1, 400),
      snapshotAt(-30, 100),
      snapshotAt(0, 500),
      snapshotAt(-24, 200),
      snapshotAt(1, 600),
      snapshotAt(-10, 300),
    ]) {
      store.appendSnapshot(snapshot);
    }

    const history = store.volumeHistory('m1', 24, asOf);
    expect(history.map((item) => item.volume24h)).toEqual([300, 400, 500]);
    expect(history[0]?.timestamp).toEqual(snapshotAt(-10, 300).timestamp);
  });

  it('keeps markets apart', () => {
    const store = createStore();
    store.appendSnapshot(snapshotAt(-1, 100, 'm1'));
    store.appendSnapshot(snapshotAt(-1, 900, 'm2'));
    expect(store.volumeHistory('m2', 24, asOf).map((item) => item.volume24h)).toEqual([900]);
    expect(store.volumeHistory('m3', 24, asOf)).toEqual([]);
  });

  it('ignores trades it already holds', () => {
    const store = createStore();
    const first = trade();
    const second = trade({ traderAddress: '0xbbb' });
    const third = trade({ timestamp: new Date('2025-01-01T09:00:00.000Z') });

    expect(store.appendTrades([first, second])).toBe(2);
    expect(store.appendTrades([first, third])).toBe(1);
    expect(store.appendTrades([])).toBe(0);
  });

  it('queries trades by wallet and by market in time order', () => {
    const store = createStore();
    store.appendTrades([
      trade({ timestamp: new Date('2025-01-01T11:00:00.000Z') }),
      trade({ marketId: 'm2', timestamp: new Date('2025-01-01T08:00:00.000Z') }),
      trade({ traderAddress: '0xbbb' }),
    ]);

    const byWallet = store.tradesByWallet('0xaaa');
    expect(byWallet.map((item) => item.marketId)).toEqual(['m2', 'm1']);
    expect(byWallet[1]?.timestamp).toEqual(new Date('2025-01-01T11:00:00.000Z'));

    const byMarket = store.tradesByMarket('m1');
    expect(byMarket.map((item) => item.traderAddress)).toEqual(['0xbbb', '0xaaa']);
    expect(store.tradesByWallet('0xccc')).toEqual([]);
  });
});
