import type { TripwireConfig } from '../core/config.js';
import type { OpportunityStore } from '../memory/opportunity_store.js';
import type { Opportunity, PortfolioState } from '../types/index.js';

export type RiskRefusalCode = 'position_limit_exceeded' | 'exposure_limit_exceeded';

export type RiskCheck = { allowed: true } | { allowed: false; code: RiskRefusalCode; reason: string };

export interface PositionReview {
  opportunityId: number;
  marketId: string;
  originalProbability: number;
  currentProbability: number;
  hedge: boolean;
  hedgeSizeUsd: number;
  stopLoss: boolean;
}

/**
 * Exposure limits over the open opportunities. Nothing is tracked
 * incrementally: every figure is recomputed from the store on each call.
 */
export class RiskManager {
  constructor(
    private config: TripwireConfig,
    private opportunities: OpportunityStore
  ) {}

  private get maxExposureUsd(): number {
    const { bankrollUsd, maxExposurePct } = this.config.sizing;
    return (bankrollUsd * maxExposurePct) / 100;
  }

  private openOpportunities(): Opportunity[] {
    return this.opportunities.listUnresolved();
  }

  currentExposure(): number {
    return this.openOpportunities().reduce((sum, item) => sum + item.suggestedSizeUsd, 0);
  }

  openPositionCount(): number {
    return this.openOpportunities().length;
  }

  canTakePosition(sizeUsd: number): RiskCheck {
    const open = this.openOpportunities();
    const maxPositions = this.config.risk.maxOpenPositions;
    if (open.length >= maxPositions) {
      return {
        allowed: false,
        code: 'position_limit_exceeded',
        reason: `Max positions (${maxPositions}) reached`,
      };
    }

    const exposure = open.reduce((sum, item) => sum + item.suggestedSizeUsd, 0);
    if (exposure + sizeUsd > this.maxExposureUsd) {
      return {
        allowed: false,
        code: 'exposure_limit_exceeded',
        reason: `Exposure $${(exposure + sizeUsd).toFixed(2)} would exceed limit $${this.maxExposureUsd.toFixed(2)}`,
      };
    }

    return { allowed: true };
  }

  shouldHedge(probability: number, threshold: number = this.config.risk.hedgeThreshold): boolean {
    return probability >= threshold;
  }

  calculateHedgeSize(
    positionSizeUsd: number,
    positionProb: number,
    maxHedgePct: number = this.config.risk.maxHedgePct
  ): number {
    if (!this.shouldHedge(positionProb)) return 0;
    return Math.max(0, (positionSizeUsd * maxHedgePct) / 100);
  }

  checkStopLoss(
    originalProb: number,
    currentProb: number,
    thresholdPct: number = this.config.risk.stopLossPct
  ): boolean {
    if (originalProb <= 0) return false;
    const dropPct = ((originalProb - currentProb) / originalProb) * 100;
    return dropPct >= thresholdPct;
  }

  portfolioSummary(): PortfolioState {
    const open = this.openOpportunities();
    const totalExposureUsd = open.reduce((sum, item) => sum + item.suggestedSizeUsd, 0);
    const { bankrollUsd, maxExposurePct } = this.config.sizing;

    return {
      totalExposureUsd,
      exposurePct: bankrollUsd > 0 ? (totalExposureUsd / bankrollUsd) * 100 : 0,
      openPositions: open.length,
      maxPositions: this.config.risk.maxOpenPositions,
      maxExposurePct,
      bankrollUsd,
      availableCapitalUsd: Math.max(0, this.maxExposureUsd - totalExposureUsd),
    };
  }

  /** Hedge and stop-loss flags for every open opportunity with a current price. */
  reviewOpenPositions(currentProbabilities: ReadonlyMap<string, number>): PositionReview[] {
    const reviews: PositionReview[] = [];
    for (const item of this.openOpportunities()) {
      const currentProbability = currentProbabilities.get(item.marketId);
      if (currentProbability === undefined) continue;
      reviews.push({
        opportunityId: item.id,
        marketId: item.marketId,
        originalProbability: item.currentProbability,
        currentProbability,
        hedge: this.shouldHedge(currentProbability),
        hedgeSizeUsd: this.calculateHedgeSize(item.suggestedSizeUsd, currentProbability),
        stopLoss: this.checkStopLoss(item.currentProbability, currentProbability),
      });
    }
    return reviews;
  }
}
