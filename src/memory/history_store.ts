import type Database from 'better-sqlite3';

import type { MarketSnapshot, TradeRecord } from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Append-only market history and trade ledger.
 *
 * The only shared mutable resource of the engine. Reads and writes are
 * atomic per call; callers never see a partially appended batch.
 */
export interface HistoryStore {
  appendSnapshot(snapshot: MarketSnapshot): void;
  /** Snapshots in `(asOf - hours, asOf]`, oldest first. */
  volumeHistory(marketId: string, hours: number, asOf?: Date): MarketSnapshot[];
  /** Returns how many trades were new to the ledger. */
  appendTrades(trades: readonly TradeRecord[]): number;
  tradesByWallet(address: string): TradeRecord[];
  tradesByMarket(marketId: string): TradeRecord[];
}

export function tradeKey(trade: TradeRecord): string {
  return [
    trade.marketId,
    trade.traderAddress,
    trade.timestamp.toISOString(),
    trade.size,
    trade.price,
  ].join('|');
}

function byTimestamp<T extends { timestamp: Date }>(a: T, b: T): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}

export class InMemoryHistoryStore implements HistoryStore {
  private snapshots = new Map<string, MarketSnapshot[]>();
  private trades: TradeRecord[] = [];
  private tradeKeys = new Set<string>();

  appendSnapshot(snapshot: MarketSnapshot): void {
    const series = this.snapshots.get(snapshot.marketId) ?? [];
    series.push({ ...snapshot });
    this.snapshots.set(snapshot.marketId, series);
  }

  volumeHistory(marketId: string, hours: number, asOf: Date = new Date()): MarketSnapshot[] {
    const end = asOf.getTime();
    const start = end - hours * HOUR_MS;
    return (this.snapshots.get(marketId) ?? [])
      .filter((snapshot) => {
        const ts = snapshot.timestamp.getTime();
        return ts > start && ts <= end;
      })
      .sort(byTimestamp);
  }

  appendTrades(trades: readonly TradeRecord[]): number {
    let inserted = 0;
    for (const trade of trades) {
      const key = tradeKey(trade);
      if (this.tradeKeys.has(key)) continue;
      this.tradeKeys.add(key);
      this.trades.push({ ...trade });
      inserted += 1;
    }
    return inserted;
  }

  tradesByWallet(address: string): TradeRecord[] {
    return this.trades.filter((trade) => trade.traderAddress === address).sort(byTimestamp);
  }

  tradesByMarket(marketId: string): TradeRecord[] {
    return this.trades.filter((trade) => trade.marketId === marketId).sort(byTimestamp);
  }
}

interface SnapshotRow {
  marketId: string;
  probability: number;
  volume24h: number;
  liquidity: number;
  recordedAt: string;
}

interface TradeRow {
  marketId: string;
  traderAddress: string;
  size: number;
  price: number;
  tradedAt: string;
}

function toSnapshot(row: SnapshotRow): MarketSnapshot {
  return {
    marketId: row.marketId,
    probability: row.probability,
    volume24h: row.volume24h,
    liquidity: row.liquidity,
    timestamp: new Date(row.recordedAt),
  };
}

function toTrade(row: TradeRow): TradeRecord {
  return {
    marketId: row.marketId,
    traderAddress: row.traderAddress,
    size: row.size,
    price: row.price,
    timestamp: new Date(row.tradedAt),
  };
}

const TRADE_COLUMNS = `
  market_id as marketId,
  trader_address as traderAddress,
  size,
  price,
  traded_at as tradedAt
`;

export class SqliteHistoryStore implements HistoryStore {
  constructor(private db: Database.Database) {}

  appendSnapshot(snapshot: MarketSnapshot): void {
    this.db
      .prepare(
        `
          INSERT INTO market_snapshots (market_id, probability, volume_24h, liquidity, recorded_at)
          VALUES (@marketId, @probability, @volume24h, @liquidity, @recordedAt)
        `
      )
      .run({
        marketId: snapshot.marketId,
        probability: snapshot.probability,
        volume24h: snapshot.volume24h,
        liquidity: snapshot.liquidity,
        recordedAt: snapshot.timestamp.toISOString(),
      });
  }

  volumeHistory(marketId: string, hours: number, asOf: Date = new Date()): MarketSnapshot[] {
    const start = new Date(asOf.getTime() - hours * HOUR_MS).toISOString();
    const rows = this.db
      .prepare<[string, string, string], SnapshotRow>(
        `
          SELECT
            market_id as marketId,
            probability,
            volume_24h as volume24h,
            liquidity,
            recorded_at as recordedAt
          FROM market_snapshots
          WHERE market_id = ? AND recorded_at > ? AND recorded_at <= ?
          ORDER BY recorded_at ASC, id ASC
        `
      )
      .all(marketId, start, asOf.toISOString());
    return rows.map(toSnapshot);
  }

  appendTrades(trades: readonly TradeRecord[]): number {
    const insert = this.db.prepare(
      `
        INSERT OR IGNORE INTO trades (market_id, trader_address, size, price, traded_at)
        VALUES (@marketId, @traderAddress, @size, @price, @tradedAt)
      `
    );
    const insertAll = this.db.transaction((batch: readonly TradeRecord[]) => {
      let inserted = 0;
      for (const trade of batch) {
        const result = insert.run({
          marketId: trade.marketId,
          traderAddress: trade.traderAddress,
          size: trade.size,
          price: trade.price,
          tradedAt: trade.timestamp.toISOString(),
        });
        inserted += result.changes;
      }
      return inserted;
    });
    return insertAll(trades);
  }

  tradesByWallet(address: string): TradeRecord[] {
    return this.db
      .prepare<[string], TradeRow>(
        `SELECT ${TRADE_COLUMNS} FROM trades WHERE trader_address = ? ORDER BY traded_at ASC, id ASC`
      )
      .all(address)
      .map(toTrade);
  }

  tradesByMarket(marketId: string): TradeRecord[] {
    return this.db
      .prepare<[string], TradeRow>(
        `SELECT ${TRADE_COLUMNS} FROM trades WHERE market_id = ? ORDER BY traded_at ASC, id ASC`
      )
      .all(marketId)
      .map(toTrade);
  }
}
