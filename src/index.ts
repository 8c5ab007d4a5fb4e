/**
 * Tripwire - prediction-market surveillance engine
 *
 * Main entry point for the library.
 */

import { loadConfig, type TripwireConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { OpportunityPipeline, type MarketContext, type PassSummary } from './core/pipeline.js';
import { BacktestSimulator, type BacktestOptions, type SuiteReport } from './backtest/backtester.js';
import { ExplorerWalletAgeOracle, type WalletAgeOracle } from './detection/wallet_age.js';
import { openDatabase } from './memory/db.js';
import { SqliteHistoryStore } from './memory/history_store.js';
import { SqliteOpportunityStore } from './memory/opportunity_store.js';
import type { Opportunity, PortfolioState } from './types/index.js';

export * from './types/index.js';

export { loadConfig, resolveConfig, type TripwireConfig } from './core/config.js';
export { Logger, parseLogLevel, type LogLevel } from './core/logger.js';
export {
  OpportunityPipeline,
  buildRationale,
  type MarketContext,
  type PassSummary,
  type SignalDecision,
} from './core/pipeline.js';
export { parseMarketBatch, loadMarketBatch } from './core/market_batch.js';
export { SignalDetectors, type CorrelationPair, type ExternalProbabilities } from './detection/detectors.js';
export { CorrelationAnalyzer, pearson } from './detection/correlation.js';
export { FreshWalletDetector, type WalletAssessment } from './detection/fresh_wallet.js';
export {
  ExplorerWalletAgeOracle,
  ScriptedWalletAgeOracle,
  type WalletAgeOracle,
} from './detection/wallet_age.js';
export { extractKeywords } from './detection/keywords.js';
export { PositionSizer, calculateExpectedValue } from './risk/position_sizer.js';
export { RiskManager, type RiskCheck } from './risk/risk_manager.js';
export {
  InMemoryHistoryStore,
  SqliteHistoryStore,
  type HistoryStore,
} from './memory/history_store.js';
export {
  InMemoryOpportunityStore,
  SqliteOpportunityStore,
  type OpportunityStore,
} from './memory/opportunity_store.js';
export { openDatabase, closeDatabase } from './memory/db.js';
export { BacktestSimulator, type ScenarioReport, type SuiteReport } from './backtest/backtester.js';
export { loadScenarios, type Scenario } from './backtest/scenarios.js';

export const VERSION = '0.1.0';

/**
 * Tripwire client for programmatic access.
 *
 * @example
 * ```typescript
 * const tripwire = new Tripwire({ configPath: '~/.tripwire/config.yaml' });
 * tripwire.start();
 *
 * const summary = await tripwire.analyze(contexts);
 * console.log(summary.opportunities.length, tripwire.portfolio().exposurePct);
 * ```
 */
export class Tripwire {
  private configPath?: string;
  private config?: TripwireConfig;
  private walletAges?: WalletAgeOracle;
  private logger?: Logger;
  private pipeline?: OpportunityPipeline;
  private opportunities?: SqliteOpportunityStore;

  constructor(options?: {
    configPath?: string;
    config?: TripwireConfig;
    walletAges?: WalletAgeOracle;
  }) {
    this.configPath = options?.configPath;
    this.config = options?.config;
    this.walletAges = options?.walletAges;
  }

  get started(): boolean {
    return this.pipeline !== undefined;
  }

  start(): void {
    if (this.pipeline) {
      throw new Error('Tripwire already started');
    }

    const config = this.config ?? loadConfig(this.configPath);
    this.config = config;
    this.logger = new Logger(config.logLevel);

    const db = openDatabase(config.memory.dbPath);
    this.opportunities = new SqliteOpportunityStore(db);
    this.pipeline = new OpportunityPipeline(config, {
      history: new SqliteHistoryStore(db),
      opportunities: this.opportunities,
      walletAges:
        this.walletAges ??
        new ExplorerWalletAgeOracle(config, { logger: this.logger.child('wallet-age') }),
      logger: this.logger.child('pipeline'),
    });
  }

  stop(): void {
    this.pipeline?.removeAllListeners();
    this.pipeline = undefined;
    this.opportunities = undefined;
  }

  /** Runs one analysis pass over the given markets. */
  async analyze(contexts: readonly MarketContext[]): Promise<PassSummary> {
    return this.requirePipeline().runPass(contexts);
  }

  async backtest(options: BacktestOptions = {}): Promise<SuiteReport> {
    const config = this.requireConfig();
    const simulator = new BacktestSimulator(config, { logger: this.logger?.child('backtest') });
    return simulator.runFullSuite(options);
  }

  portfolio(): PortfolioState {
    return this.requirePipeline().risk.portfolioSummary();
  }

  recentOpportunities(limit?: number): Opportunity[] {
    this.requirePipeline();
    return this.opportunities?.listRecent(limit) ?? [];
  }

  private requireConfig(): TripwireConfig {
    if (!this.config) {
      throw new Error('Tripwire not started. Call start() first.');
    }
    return this.config;
  }

  private requirePipeline(): OpportunityPipeline {
    if (!this.pipeline) {
      throw new Error('Tripwire not started. Call start() first.');
    }
    return this.pipeline;
  }
}
