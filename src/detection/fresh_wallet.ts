import type { TripwireConfig } from '../core/config.js';
import { tradeKey, type HistoryStore } from '../memory/history_store.js';
import {
  systemClock,
  tradeValueUsd,
  type Clock,
  type FreshWalletLargeBetSignal,
  type TradeRecord,
  type WalletProfile,
} from '../types/index.js';
import type { WalletAgeOracle } from './wallet_age.js';

export type FreshWalletGate =
  | 'bet_below_threshold'
  | 'age_unknown'
  | 'wallet_too_old'
  | 'too_many_trades'
  | 'allocation_too_low'
  | 'prior_large_bets';

export type WalletAssessment =
  | { passed: true; signal: FreshWalletLargeBetSignal }
  | {
      passed: false;
      gate: FreshWalletGate;
      reason: string;
      betSizeUsd: number;
      ageHours: number | null;
    };

export interface WalletPatternProfile extends WalletProfile {
  marketTrades: number;
  marketVolumeUsd: number;
  allocationPct: number;
  isFresh: boolean;
  isFocused: boolean;
  hasLargeBet: boolean;
}

function sumValue(trades: readonly TradeRecord[]): number {
  return trades.reduce((total, trade) => total + tradeValueUsd(trade), 0);
}

function formatUsd(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

/**
 * Flags wallets that are new, have barely traded, and put most of their
 * footprint into one large bet on this market.
 */
export class FreshWalletDetector {
  private clock: Clock;

  constructor(
    private config: TripwireConfig,
    private store: HistoryStore,
    private oracle: WalletAgeOracle,
    options: { clock?: Clock } = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** First qualifying wallet in address order, or null. */
  async detect(
    marketId: string,
    trades: readonly TradeRecord[]
  ): Promise<FreshWalletLargeBetSignal | null> {
    const addresses = new Set<string>();
    for (const trade of trades) {
      if (trade.traderAddress && trade.marketId === marketId) {
        addresses.add(trade.traderAddress);
      }
    }

    for (const address of [...addresses].sort()) {
      const assessment = await this.assessWallet(marketId, address, trades);
      if (assessment.passed) {
        return assessment.signal;
      }
    }
    return null;
  }

  /**
   * Runs one wallet through every gate and reports the first one it fails.
   * The wallet's history is the ledger plus this batch, deduplicated, so the
   * outcome is the same whether or not the batch was already ingested.
   */
  async assessWallet(
    marketId: string,
    address: string,
    trades: readonly TradeRecord[]
  ): Promise<WalletAssessment> {
    const { minBetUsd, ageThresholdHours, maxTrades, minAllocationPct } = this.config.freshWallet;
    const batch = trades.filter(
      (trade) => trade.traderAddress === address && trade.marketId === marketId
    );
    const betSizeUsd = sumValue(batch);

    if (betSizeUsd < minBetUsd) {
      return {
        passed: false,
        gate: 'bet_below_threshold',
        reason: `Bet size ${formatUsd(betSizeUsd)} below threshold ${formatUsd(minBetUsd)}`,
        betSizeUsd,
        ageHours: null,
      };
    }

    const ageHours = await this.oracle.getWalletAge(address);
    if (ageHours === null) {
      return {
        passed: false,
        gate: 'age_unknown',
        reason: `Wallet age unknown for ${address}`,
        betSizeUsd,
        ageHours,
      };
    }
    if (ageHours > ageThresholdHours) {
      return {
        passed: false,
        gate: 'wallet_too_old',
        reason: `Wallet age ${ageHours}h above threshold ${ageThresholdHours}h`,
        betSizeUsd,
        ageHours,
      };
    }

    const history = this.walletHistory(address, batch);
    const totalTrades = history.length;
    if (totalTrades > maxTrades) {
      return {
        passed: false,
        gate: 'too_many_trades',
        reason: `Wallet has ${totalTrades} trades, above limit ${maxTrades}`,
        betSizeUsd,
        ageHours,
      };
    }

    const totalActivityUsd = sumValue(history);
    const allocationPct = totalActivityUsd > 0 ? (betSizeUsd / totalActivityUsd) * 100 : 100;
    if (allocationPct < minAllocationPct) {
      return {
        passed: false,
        gate: 'allocation_too_low',
        reason: `Allocation ${allocationPct.toFixed(1)}% below minimum ${minAllocationPct}%`,
        betSizeUsd,
        ageHours,
      };
    }

    const hasPriorLargeBets = history.some(
      (trade) => trade.marketId !== marketId && tradeValueUsd(trade) >= minBetUsd
    );
    if (hasPriorLargeBets) {
      return {
        passed: false,
        gate: 'prior_large_bets',
        reason: 'Wallet already placed large bets on other markets',
        betSizeUsd,
        ageHours,
      };
    }

    return {
      passed: true,
      signal: {
        type: 'fresh_wallet_large_bet',
        marketId,
        walletAddress: address,
        ageHours,
        betSizeUsd,
        totalTrades,
        allocationPct,
        detectedAt: this.clock(),
      },
    };
  }

  async profileWallet(address: string, marketId: string): Promise<WalletPatternProfile> {
    const { minBetUsd, ageThresholdHours, maxTrades, minAllocationPct } = this.config.freshWallet;
    const ageHours = await this.oracle.getWalletAge(address);
    const history = this.store.tradesByWallet(address);
    const marketHistory = history.filter((trade) => trade.marketId === marketId);

    const totalVolumeUsd = sumValue(history);
    const marketVolumeUsd = sumValue(marketHistory);
    const allocationPct = totalVolumeUsd > 0 ? (marketVolumeUsd / totalVolumeUsd) * 100 : 0;

    return {
      address,
      ageHours,
      tradeCount: history.length,
      totalVolumeUsd,
      marketTrades: marketHistory.length,
      marketVolumeUsd,
      allocationPct,
      isFresh: ageHours !== null && ageHours <= ageThresholdHours,
      isFocused: history.length <= maxTrades && allocationPct >= minAllocationPct,
      hasLargeBet: marketVolumeUsd >= minBetUsd,
    };
  }

  private walletHistory(address: string, batch: readonly TradeRecord[]): TradeRecord[] {
    const merged = new Map<string, TradeRecord>();
    for (const trade of this.store.tradesByWallet(address)) {
      merged.set(tradeKey(trade), trade);
    }
    for (const trade of batch) {
      merged.set(tradeKey(trade), trade);
    }
    return [...merged.values()];
  }
}
