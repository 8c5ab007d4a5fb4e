import type { TripwireConfig } from '../core/config.js';
import type { HistoryStore } from '../memory/history_store.js';
import type { Clock } from '../types/index.js';
import { systemClock } from '../types/index.js';

export interface CorrelatedMarket {
  marketId: string;
  correlation: number;
}

/** Pearson coefficient of two equal-length series; 0 when undefined. */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i += 1) {
    sumX += xs[i] ?? 0;
    sumY += ys[i] ?? 0;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = (xs[i] ?? 0) - meanX;
    const dy = (ys[i] ?? 0) - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }

  const denominator = Math.sqrt(varX * varY);
  if (!Number.isFinite(denominator) || denominator === 0) return 0;
  const r = cov / denominator;
  if (!Number.isFinite(r)) return 0;
  return Math.max(-1, Math.min(1, r));
}

export class CorrelationAnalyzer {
  private clock: Clock;

  constructor(
    private config: TripwireConfig,
    private store: HistoryStore,
    clock?: Clock
  ) {
    this.clock = clock ?? systemClock;
  }

  /**
   * Correlation of the two markets' probabilities over the timestamps both
   * have in the trailing window. Fewer than two common points gives 0.
   */
  correlation(
    marketA: string,
    marketB: string,
    windowDays: number = this.config.detection.correlationWindowDays
  ): number {
    const hours = windowDays * 24;
    const asOf = this.clock();
    const historyA = this.store.volumeHistory(marketA, hours, asOf);
    const historyB = this.store.volumeHistory(marketB, hours, asOf);
    if (historyA.length < 2 || historyB.length < 2) return 0;

    const byTime = new Map<number, number>();
    for (const snapshot of historyA) {
      byTime.set(snapshot.timestamp.getTime(), snapshot.probability);
    }

    const common: Array<[number, number, number]> = [];
    const seen = new Set<number>();
    for (const snapshot of historyB) {
      const ts = snapshot.timestamp.getTime();
      const probA = byTime.get(ts);
      if (probA === undefined || seen.has(ts)) continue;
      seen.add(ts);
      common.push([ts, probA, snapshot.probability]);
    }
    if (common.length < 2) return 0;

    common.sort((a, b) => a[0] - b[0]);
    return pearson(
      common.map((point) => point[1]),
      common.map((point) => point[2])
    );
  }

  /** Candidates whose |r| with `marketId` clears the threshold, strongest first. */
  findCorrelatedMarkets(
    marketId: string,
    candidates: readonly string[],
    threshold: number = this.config.detection.correlationThreshold,
    windowDays: number = this.config.detection.correlationWindowDays
  ): CorrelatedMarket[] {
    return candidates
      .filter((candidate) => candidate !== marketId)
      .map((candidate) => ({
        marketId: candidate,
        correlation: this.correlation(marketId, candidate, windowDays),
      }))
      .filter((entry) => Math.abs(entry.correlation) >= threshold)
      .sort((a, b) => Math.abs(b.correlation) - Math.abs(a.correlation));
  }
}
