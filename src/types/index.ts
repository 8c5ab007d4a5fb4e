/**
 * Shared value types for the surveillance engine.
 *
 * Snapshots and trades are immutable records; signals and opportunities are
 * produced once and never mutated in place.
 */

export interface MarketSnapshot {
  readonly marketId: string;
  /** Probability of the primary outcome, 0–1. */
  readonly probability: number;
  readonly volume24h: number;
  readonly liquidity: number;
  readonly timestamp: Date;
}

export interface TradeRecord {
  readonly marketId: string;
  readonly traderAddress: string;
  /** Shares. */
  readonly size: number;
  /** Price per share, 0–1. */
  readonly price: number;
  readonly timestamp: Date;
}

/** USD notional of a trade. Never stored, always derived. */
export function tradeValueUsd(trade: Pick<TradeRecord, 'size' | 'price'>): number {
  const value = trade.size * trade.price;
  return Number.isFinite(value) ? value : 0;
}

export function isProbability(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

export interface WalletProfile {
  address: string;
  ageHours: number | null;
  tradeCount: number;
  totalVolumeUsd: number;
}

export type SignalType =
  | 'volume_spike'
  | 'unusual_trade_size'
  | 'probability_divergence'
  | 'correlation_divergence'
  | 'fresh_wallet_large_bet'
  | 'social_mention_spike';

export const SIGNAL_TYPES: readonly SignalType[] = [
  'volume_spike',
  'unusual_trade_size',
  'probability_divergence',
  'correlation_divergence',
  'fresh_wallet_large_bet',
  'social_mention_spike',
] as const;

interface SignalBase<T extends SignalType> {
  readonly type: T;
  readonly marketId: string;
  readonly detectedAt: Date;
}

export interface VolumeSpikeSignal extends SignalBase<'volume_spike'> {
  readonly windowHours: number;
  readonly currentVolume: number;
  readonly averageVolume: number;
  readonly spikeRatio: number;
}

export interface UnusualTrade {
  readonly traderAddress: string;
  readonly size: number;
  readonly price: number;
  readonly valueUsd: number;
  readonly timestamp: Date;
}

export interface UnusualTradeSizeSignal extends SignalBase<'unusual_trade_size'> {
  readonly trades: readonly UnusualTrade[];
}

export interface SourceDivergence {
  readonly localProbability: number;
  readonly externalProbability: number;
  readonly divergencePct: number;
}

export interface ProbabilityDivergenceSignal extends SignalBase<'probability_divergence'> {
  readonly divergences: Readonly<Record<string, SourceDivergence>>;
}

export interface CorrelationDivergenceSignal extends SignalBase<'correlation_divergence'> {
  readonly pairedMarketId: string;
  readonly correlation: number;
  readonly movementPct: number;
  readonly pairedMovementPct: number;
  /** The market that moved while its correlated partner stayed put. */
  readonly leaderMarketId: string;
}

export interface FreshWalletLargeBetSignal extends SignalBase<'fresh_wallet_large_bet'> {
  readonly walletAddress: string;
  readonly ageHours: number;
  readonly betSizeUsd: number;
  readonly totalTrades: number;
  readonly allocationPct: number;
}

export interface KeywordMentions {
  readonly keyword: string;
  readonly count: number;
}

export interface SocialMentionSpikeSignal extends SignalBase<'social_mention_spike'> {
  readonly mentions: readonly KeywordMentions[];
}

export type Signal =
  | VolumeSpikeSignal
  | UnusualTradeSizeSignal
  | ProbabilityDivergenceSignal
  | CorrelationDivergenceSignal
  | FreshWalletLargeBetSignal
  | SocialMentionSpikeSignal;

export type OpportunityStatus = 'pending' | 'win' | 'loss';

export interface NewOpportunity {
  marketId: string;
  question: string;
  signal: Signal;
  currentProbability: number;
  expectedValueUsd: number;
  suggestedSizeUsd: number;
  rationale: string;
  flaggedAt: Date;
}

export interface Opportunity extends NewOpportunity {
  id: number;
  status: OpportunityStatus;
  pnl: number | null;
  resolvedAt: Date | null;
}

export interface PortfolioState {
  totalExposureUsd: number;
  exposurePct: number;
  openPositions: number;
  maxPositions: number;
  maxExposurePct: number;
  bankrollUsd: number;
  availableCapitalUsd: number;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
