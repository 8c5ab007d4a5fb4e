import type { TripwireConfig } from '../core/config.js';

export interface PositionSizeInput {
  marketProb: number;
  fairProb: number;
  /** Correlation to positions already held; 0 when unrelated. */
  correlation?: number;
  existingExposure?: number;
}

export interface PositionSize {
  kellySizeUsd: number;
  adjustedSizeUsd: number;
  edge: number;
  edgePct: number;
  bankrollPct: number;
}

const isOpenProbability = (value: number): boolean =>
  Number.isFinite(value) && value > 0 && value < 1;

/**
 * Expected profit of buying the primary outcome at `marketProb` when the
 * true probability is `fairProb`. 0 for probabilities outside (0,1).
 */
export function calculateExpectedValue(
  marketProb: number,
  fairProb: number,
  betSizeUsd: number
): number {
  if (!isOpenProbability(marketProb) || !Number.isFinite(fairProb) || !Number.isFinite(betSizeUsd)) {
    return 0;
  }
  return (fairProb / marketProb - 1) * betSizeUsd;
}

/**
 * Fractional Kelly sizing, capped by the exposure limit.
 */
export class PositionSizer {
  constructor(private config: TripwireConfig) {}

  private get maxExposureUsd(): number {
    const { bankrollUsd, maxExposurePct } = this.config.sizing;
    return (bankrollUsd * maxExposurePct) / 100;
  }

  calculateKellySize(
    marketProb: number,
    fairProb: number,
    bankroll: number = this.config.sizing.bankrollUsd
  ): number {
    if (!isOpenProbability(marketProb) || !isOpenProbability(fairProb)) return 0;
    if (fairProb <= marketProb) return 0;

    const odds = 1 / marketProb - 1;
    if (odds <= 0) return 0;

    const fullKelly = (odds * fairProb - (1 - fairProb)) / odds;
    const fraction = Math.max(0, fullKelly * this.config.sizing.kellyFraction);
    const cap = (bankroll * this.config.sizing.maxExposurePct) / 100;
    return Math.min(fraction * bankroll, cap);
  }

  adjustForCorrelation(baseSize: number, correlation: number, existingExposure: number): number {
    const { correlationReductionFactor } = this.config.sizing;
    let size = baseSize;
    if (Math.abs(correlation) >= this.config.detection.correlationThreshold) {
      size *= correlationReductionFactor;
    }
    const headroom = this.maxExposureUsd - existingExposure;
    return Math.max(0, Math.min(size, headroom));
  }

  calculatePositionSize(input: PositionSizeInput): PositionSize {
    const { marketProb, fairProb, correlation = 0, existingExposure = 0 } = input;
    const { bankrollUsd } = this.config.sizing;

    const kellySizeUsd = this.calculateKellySize(marketProb, fairProb);
    const adjustedSizeUsd = this.adjustForCorrelation(kellySizeUsd, correlation, existingExposure);
    const edge = fairProb - marketProb;

    return {
      kellySizeUsd,
      adjustedSizeUsd,
      edge,
      edgePct: edge * 100,
      bankrollPct: bankrollUsd > 0 ? (adjustedSizeUsd / bankrollUsd) * 100 : 0,
    };
  }
}
