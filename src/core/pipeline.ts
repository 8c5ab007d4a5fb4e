/**
 * Opportunity pipeline
 *
 * One analysis pass over a batch of markets:
 * snapshot -> history -> detectors -> sizing -> risk gate -> journal.
 */

import { EventEmitter } from 'eventemitter3';

import type { TripwireConfig } from './config.js';
import { Logger } from './logger.js';
import { SignalDetectors, type ExternalProbabilities } from '../detection/detectors.js';
import { FreshWalletDetector } from '../detection/fresh_wallet.js';
import { extractKeywords } from '../detection/keywords.js';
import type { WalletAgeOracle } from '../detection/wallet_age.js';
import type { HistoryStore } from '../memory/history_store.js';
import type { OpportunityStore } from '../memory/opportunity_store.js';
import { calculateExpectedValue, PositionSizer, type PositionSize } from '../risk/position_sizer.js';
import { RiskManager } from '../risk/risk_manager.js';
import {
  systemClock,
  type Clock,
  type MarketSnapshot,
  type Opportunity,
  type Signal,
  type TradeRecord,
} from '../types/index.js';

export interface PairedMarket {
  marketId: string;
  probability: number;
}

/** Everything the detectors may look at for one market in one pass. */
export interface MarketContext {
  snapshot: MarketSnapshot;
  question: string;
  /** Volume over the trailing detection window; enables the spike detector. */
  windowVolume?: number;
  trades?: readonly TradeRecord[];
  externalProbabilities?: ExternalProbabilities;
  mentionCounts?: Readonly<Record<string, number>>;
  correlatedMarkets?: readonly PairedMarket[];
}

export type SignalDecision =
  | { status: 'flagged'; signal: Signal; opportunity: Opportunity }
  | { status: 'rejected'; signal: Signal; reason: string };

export interface MarketFailure {
  marketId: string;
  error: string;
}

export interface PassSummary {
  marketsAnalyzed: number;
  marketsSkipped: number;
  failures: MarketFailure[];
  signals: number;
  opportunities: Opportunity[];
  rejected: number;
}

export interface PipelineEvents {
  opportunity: (opportunity: Opportunity) => void;
  'market-error': (marketId: string, error: Error) => void;
}

export interface PipelineDependencies {
  history: HistoryStore;
  opportunities: OpportunityStore;
  walletAges: WalletAgeOracle;
  logger?: Logger;
  clock?: Clock;
}

function titleCase(signalType: string): string {
  return signalType
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function describeSignal(signal: Signal): string | null {
  switch (signal.type) {
    case 'volume_spike':
      return `Volume spike detected: ${signal.spikeRatio.toFixed(1)}x average volume.`;
    case 'unusual_trade_size': {
      const largest = Math.max(...signal.trades.map((trade) => trade.valueUsd));
      return `${signal.trades.length} unusual trade(s), largest $${largest.toFixed(2)}.`;
    }
    case 'probability_divergence':
      return Object.entries(signal.divergences)
        .map(([source, item]) => `Probability divergence with ${source}: ${item.divergencePct.toFixed(1)}%.`)
        .join('\n');
    case 'correlation_divergence':
      return `Correlated market ${signal.pairedMarketId} (r=${signal.correlation.toFixed(2)}) diverged; ${signal.leaderMarketId} moved first.`;
    case 'fresh_wallet_large_bet':
      return `Fresh wallet ${signal.walletAddress} (${signal.ageHours}h old) bet $${signal.betSizeUsd.toFixed(2)}, ${signal.allocationPct.toFixed(0)}% of its activity.`;
    case 'social_mention_spike':
      return signal.mentions
        .map((item) => `Social activity spike: ${item.count} mentions of '${item.keyword}'.`)
        .join('\n');
    default:
      return null;
  }
}

export function buildRationale(signal: Signal, sizing: PositionSize, expectedValueUsd: number): string {
  const lines = [`Signal detected: ${titleCase(signal.type)}.`];
  const detail = describeSignal(signal);
  if (detail) lines.push(detail);
  lines.push(
    `Edge: ${sizing.edgePct.toFixed(2)}%. ` +
      `Expected Value: $${expectedValueUsd.toFixed(2)}. ` +
      `Suggested position: $${sizing.adjustedSizeUsd.toFixed(2)} (${sizing.bankrollPct.toFixed(1)}% of bankroll).`
  );
  return lines.join('\n');
}

export class OpportunityPipeline extends EventEmitter<PipelineEvents> {
  private history: HistoryStore;
  private opportunities: OpportunityStore;
  private logger: Logger;
  private clock: Clock;
  readonly detectors: SignalDetectors;
  readonly freshWallets: FreshWalletDetector;
  readonly sizer: PositionSizer;
  readonly risk: RiskManager;

  constructor(
    private config: TripwireConfig,
    deps: PipelineDependencies
  ) {
    super();
    this.history = deps.history;
    this.opportunities = deps.opportunities;
    this.logger = deps.logger ?? new Logger('info');
    this.clock = deps.clock ?? systemClock;
    this.detectors = new SignalDetectors(config, deps.history, { clock: this.clock });
    this.freshWallets = new FreshWalletDetector(config, deps.history, deps.walletAges, {
      clock: this.clock,
    });
    this.sizer = new PositionSizer(config);
    this.risk = new RiskManager(config, deps.opportunities);
  }

  /** Search terms to query the social feed with for this market. */
  keywordsFor(question: string): string[] {
    return extractKeywords(question);
  }

  /**
   * Records the market's snapshot and trades, then runs every detector whose
   * inputs the context provides.
   */
  async analyzeMarket(context: MarketContext): Promise<Signal[]> {
    const { snapshot } = context;
    const marketId = snapshot.marketId;
    const trades = context.trades ?? [];

    this.history.appendSnapshot(snapshot);
    if (trades.length > 0) {
      const inserted = this.history.appendTrades(trades);
      this.logger.debug(`Ingested ${inserted}/${trades.length} trades for ${marketId}`);
    }

    const signals: Signal[] = [];

    if (context.windowVolume !== undefined) {
      const spike = this.detectors.detectVolumeSpike(marketId, context.windowVolume);
      if (spike) signals.push(spike);
    }

    if (trades.length > 0) {
      const unusual = this.detectors.detectUnusualTradeSize(trades);
      if (unusual) signals.push(unusual);

      const fresh = await this.freshWallets.detect(marketId, trades);
      if (fresh) signals.push(fresh);
    }

    if (context.externalProbabilities) {
      const divergence = this.detectors.detectProbabilityDivergence(
        marketId,
        snapshot.probability,
        context.externalProbabilities
      );
      if (divergence) signals.push(divergence);
    }

    for (const paired of context.correlatedMarkets ?? []) {
      const divergence = this.detectors.detectCorrelationDivergence({
        marketA: marketId,
        marketB: paired.marketId,
        probabilityA: snapshot.probability,
        probabilityB: paired.probability,
      });
      if (divergence) signals.push(divergence);
    }

    if (context.mentionCounts) {
      const mentions = this.detectors.detectSocialMentionSpike(marketId, context.mentionCounts);
      if (mentions) signals.push(mentions);
    }

    return signals;
  }

  estimateFairProbability(signal: Signal, marketProbability: number): number {
    if (signal.type === 'probability_divergence') {
      const externals = Object.values(signal.divergences).map((item) => item.externalProbability);
      if (externals.length > 0) {
        return externals.reduce((sum, value) => sum + value, 0) / externals.length;
      }
    }
    return marketProbability * this.config.pipeline.fairProbabilityMultiplier;
  }

  /** Strongest |r| between this market and any market already held. */
  private heldCorrelation(marketId: string): number {
    const held = [...new Set(this.opportunities.listUnresolved().map((item) => item.marketId))];
    const strongest = this.detectors.analyzer.findCorrelatedMarkets(marketId, held, 0)[0];
    return strongest?.correlation ?? 0;
  }

  /**
   * Sizes and risk-gates each signal. Signals that clear both are journaled
   * and emitted as opportunities.
   */
  processSignals(context: MarketContext, signals: readonly Signal[]): SignalDecision[] {
    const marketId = context.snapshot.marketId;
    const marketProb = context.snapshot.probability;
    const decisions: SignalDecision[] = [];

    for (const signal of signals) {
      const fairProb = this.estimateFairProbability(signal, marketProb);
      const sizing = this.sizer.calculatePositionSize({
        marketProb,
        fairProb,
        correlation: this.heldCorrelation(marketId),
        existingExposure: this.risk.currentExposure(),
      });
      const expectedValueUsd = calculateExpectedValue(marketProb, fairProb, sizing.adjustedSizeUsd);

      if (expectedValueUsd < this.config.pipeline.minExpectedValueUsd) {
        decisions.push({
          signal,
          status: 'rejected',
          reason: `Expected value $${expectedValueUsd.toFixed(2)} below minimum $${this.config.pipeline.minExpectedValueUsd}`,
        });
        continue;
      }

      const check = this.risk.canTakePosition(sizing.adjustedSizeUsd);
      if (!check.allowed) {
        this.logger.debug(`Skipping ${signal.type} on ${marketId} due to risk: ${check.reason}`);
        decisions.push({ signal, status: 'rejected', reason: check.reason });
        continue;
      }

      const opportunity = this.opportunities.flag({
        marketId,
        question: context.question,
        signal,
        currentProbability: marketProb,
        expectedValueUsd,
        suggestedSizeUsd: sizing.adjustedSizeUsd,
        rationale: buildRationale(signal, sizing, expectedValueUsd),
        flaggedAt: this.clock(),
      });
      this.logger.info(`Flagged opportunity #${opportunity.id}: ${context.question.slice(0, 50)}`);
      decisions.push({ signal, status: 'flagged', opportunity });
      this.emit('opportunity', opportunity);
    }

    return decisions;
  }

  /**
   * Sequential pass over the batch. A failing market is logged, emitted and
   * recorded; the remaining markets still run.
   */
  async runPass(contexts: readonly MarketContext[]): Promise<PassSummary> {
    const summary: PassSummary = {
      marketsAnalyzed: 0,
      marketsSkipped: 0,
      failures: [],
      signals: 0,
      opportunities: [],
      rejected: 0,
    };

    for (const context of contexts) {
      const marketId = context.snapshot.marketId;
      if (context.snapshot.liquidity < this.config.pipeline.minLiquidityUsd) {
        summary.marketsSkipped += 1;
        continue;
      }

      try {
        const signals = await this.analyzeMarket(context);
        summary.marketsAnalyzed += 1;
        summary.signals += signals.length;
        for (const decision of this.processSignals(context, signals)) {
          if (decision.status === 'flagged') {
            summary.opportunities.push(decision.opportunity);
          } else {
            summary.rejected += 1;
          }
        }
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Error analyzing market ${marketId}`, err);
        summary.failures.push({ marketId, error: err.message });
        this.emit('market-error', marketId, err);
      }
    }

    this.logger.info(
      `Pass complete: ${summary.marketsAnalyzed} analyzed, ${summary.marketsSkipped} skipped, ` +
        `${summary.signals} signals, ${summary.opportunities.length} opportunities`
    );
    return summary;
  }
}
