import type { TripwireConfig } from '../core/config.js';
import type { HistoryStore } from '../memory/history_store.js';
import {
  isProbability,
  systemClock,
  tradeValueUsd,
  type Clock,
  type CorrelationDivergenceSignal,
  type KeywordMentions,
  type ProbabilityDivergenceSignal,
  type SocialMentionSpikeSignal,
  type SourceDivergence,
  type TradeRecord,
  type UnusualTrade,
  type UnusualTradeSizeSignal,
  type VolumeSpikeSignal,
} from '../types/index.js';
import { CorrelationAnalyzer } from './correlation.js';

export interface VolumeSpikeMeasurement {
  sampleCount: number;
  sufficientHistory: boolean;
  currentVolume: number;
  averageVolume: number;
  /** 0 when the average is 0 or history is insufficient. */
  spikeRatio: number;
}

export interface CorrelationPair {
  marketA: string;
  marketB: string;
  probabilityA: number;
  probabilityB: number;
}

/** External probabilities keyed by source; unknown values are skipped. */
export type ExternalProbabilities = Readonly<Record<string, number | null | undefined>>;

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Market-level detectors. Every method is a pure evaluation over its inputs
 * and the injected history store; none of them throws for well-typed input.
 */
export class SignalDetectors {
  private clock: Clock;
  readonly analyzer: CorrelationAnalyzer;

  constructor(
    private config: TripwireConfig,
    private store: HistoryStore,
    options: { clock?: Clock; analyzer?: CorrelationAnalyzer } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.analyzer = options.analyzer ?? new CorrelationAnalyzer(config, store, this.clock);
  }

  measureVolumeSpike(marketId: string, currentVolume: number): VolumeSpikeMeasurement {
    const history = this.store.volumeHistory(
      marketId,
      this.config.detection.historyWindowHours,
      this.clock()
    );
    if (history.length < 2) {
      return {
        sampleCount: history.length,
        sufficientHistory: false,
        currentVolume,
        averageVolume: 0,
        spikeRatio: 0,
      };
    }

    const averageVolume = average(history.map((snapshot) => snapshot.volume24h));
    const spikeRatio =
      averageVolume > 0 && Number.isFinite(currentVolume) ? currentVolume / averageVolume : 0;

    return {
      sampleCount: history.length,
      sufficientHistory: true,
      currentVolume,
      averageVolume,
      spikeRatio,
    };
  }

  detectVolumeSpike(
    marketId: string,
    currentVolume: number,
    windowHours: number = this.config.detection.volumeWindowHours
  ): VolumeSpikeSignal | null {
    const measurement = this.measureVolumeSpike(marketId, currentVolume);
    if (!measurement.sufficientHistory || measurement.averageVolume <= 0) return null;
    if (measurement.spikeRatio < this.config.detection.volumeSpikeMultiplier) return null;

    return {
      type: 'volume_spike',
      marketId,
      windowHours,
      currentVolume,
      averageVolume: measurement.averageVolume,
      spikeRatio: measurement.spikeRatio,
      detectedAt: this.clock(),
    };
  }

  detectUnusualTradeSize(
    trades: readonly TradeRecord[],
    minSizeUsd: number = this.config.detection.minTradeSizeUsd
  ): UnusualTradeSizeSignal | null {
    const unusual: UnusualTrade[] = [];
    let marketId: string | null = null;

    for (const trade of trades) {
      const valueUsd = tradeValueUsd(trade);
      if (valueUsd < minSizeUsd) continue;
      marketId = marketId ?? trade.marketId;
      unusual.push({
        traderAddress: trade.traderAddress,
        size: trade.size,
        price: trade.price,
        valueUsd,
        timestamp: trade.timestamp,
      });
    }

    if (marketId === null || unusual.length === 0) return null;

    return {
      type: 'unusual_trade_size',
      marketId,
      trades: unusual,
      detectedAt: this.clock(),
    };
  }

  detectProbabilityDivergence(
    marketId: string,
    localProbability: number,
    externals: ExternalProbabilities,
    thresholdPct: number = this.config.detection.divergenceThresholdPct
  ): ProbabilityDivergenceSignal | null {
    if (!isProbability(localProbability)) return null;

    const divergences: Record<string, SourceDivergence> = {};
    for (const source of Object.keys(externals).sort()) {
      const external = externals[source];
      if (!isProbability(external)) continue;
      const divergencePct = Math.abs(localProbability - external) * 100;
      if (divergencePct >= thresholdPct) {
        divergences[source] = {
          localProbability,
          externalProbability: external,
          divergencePct,
        };
      }
    }

    if (Object.keys(divergences).length === 0) return null;

    return {
      type: 'probability_divergence',
      marketId,
      divergences,
      detectedAt: this.clock(),
    };
  }

  /**
   * Fires when two strongly correlated markets disagree: exactly one moved by
   * at least the movement delta over the history window while the other moved
   * less than half of it. Both moving is co-movement, not divergence.
   */
  detectCorrelationDivergence(pair: CorrelationPair): CorrelationDivergenceSignal | null {
    const { marketA, marketB, probabilityA, probabilityB } = pair;
    if (!isProbability(probabilityA) || !isProbability(probabilityB)) return null;

    const { correlationThreshold, movementDeltaPct, historyWindowHours } = this.config.detection;
    const correlation = this.analyzer.correlation(marketA, marketB);
    if (Math.abs(correlation) < correlationThreshold) return null;

    const asOf = this.clock();
    const historyA = this.store.volumeHistory(marketA, historyWindowHours, asOf);
    const historyB = this.store.volumeHistory(marketB, historyWindowHours, asOf);
    const referenceA = historyA[0];
    const referenceB = historyB[0];
    if (historyA.length < 2 || historyB.length < 2 || !referenceA || !referenceB) return null;

    const movementA = Math.abs(probabilityA - referenceA.probability) * 100;
    const movementB = Math.abs(probabilityB - referenceB.probability) * 100;
    const quiet = movementDeltaPct / 2;

    let leaderMarketId: string | null = null;
    if (movementA >= movementDeltaPct && movementB < quiet) {
      leaderMarketId = marketA;
    } else if (movementB >= movementDeltaPct && movementA < quiet) {
      leaderMarketId = marketB;
    }
    if (!leaderMarketId) return null;

    return {
      type: 'correlation_divergence',
      marketId: marketA,
      pairedMarketId: marketB,
      correlation,
      movementPct: movementA,
      pairedMovementPct: movementB,
      leaderMarketId,
      detectedAt: asOf,
    };
  }

  detectSocialMentionSpike(
    marketId: string,
    mentionCounts: Readonly<Record<string, number>>,
    minMentions: number = this.config.detection.socialMinMentions
  ): SocialMentionSpikeSignal | null {
    const mentions: KeywordMentions[] = Object.entries(mentionCounts)
      .filter(([, count]) => Number.isFinite(count) && count >= minMentions)
      .map(([keyword, count]) => ({ keyword, count }))
      .sort((a, b) => b.count - a.count || a.keyword.localeCompare(b.keyword));

    if (mentions.length === 0) return null;

    return {
      type: 'social_mention_spike',
      marketId,
      mentions,
      detectedAt: this.clock(),
    };
  }
}
