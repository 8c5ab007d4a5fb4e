#!/usr/bin/env node
import 'dotenv/config';
/**
 * Tripwire CLI
 *
 * Command-line interface for market surveillance passes, backtests and the
 * opportunity journal.
 */

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { BacktestSimulator, type ScenarioReport } from '../backtest/backtester.js';
import { loadScenarios } from '../backtest/scenarios.js';
import { loadConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { loadMarketBatch } from '../core/market_batch.js';
import { OpportunityPipeline } from '../core/pipeline.js';
import { FreshWalletDetector } from '../detection/fresh_wallet.js';
import { ExplorerWalletAgeOracle } from '../detection/wallet_age.js';
import { openDatabase } from '../memory/db.js';
import { SqliteHistoryStore } from '../memory/history_store.js';
import { SqliteOpportunityStore, type ResolvedOutcome } from '../memory/opportunity_store.js';
import { RiskManager } from '../risk/risk_manager.js';
import type { Opportunity } from '../types/index.js';

const program = new Command();
const config = loadConfig();
const logger = new Logger(config.logLevel);

function openStores() {
  const db = openDatabase(config.memory.dbPath);
  return {
    history: new SqliteHistoryStore(db),
    opportunities: new SqliteOpportunityStore(db),
  };
}

function parseInteger(raw: string | undefined, label: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${label} must be an integer, got "${raw}"`);
  }
  return value;
}

function formatOpportunity(item: Opportunity): string {
  const status = item.status === 'pending' ? 'pending' : `${item.status} (pnl ${item.pnl ?? 'n/a'})`;
  return [
    `#${item.id} ${item.marketId} | ${item.signal.type} | ${status}`,
    `  ${item.question}`,
    `  Size: $${item.suggestedSizeUsd.toFixed(2)} | EV: $${item.expectedValueUsd.toFixed(2)} | ` +
      `Prob: ${(item.currentProbability * 100).toFixed(1)}% | Flagged: ${item.flaggedAt.toISOString()}`,
  ].join('\n');
}

function printScenario(report: ScenarioReport): void {
  console.log(`${report.scenario}: ${report.totalDetected}/${report.totalExpected} detected`);
  for (const item of report.detectedSignals) {
    console.log(`  ✓ ${item.date.toISOString()} ${item.label} (${item.expectedType})`);
  }
  for (const item of report.missedSignals) {
    console.log(`  ✗ ${item.date.toISOString()} ${item.label} (${item.expectedType}): ${item.reason}`);
  }
}

program
  .name('tripwire')
  .description('Prediction-market surveillance engine')
  .version(VERSION);

// ============================================================================
// Analysis
// ============================================================================

program
  .command('analyze <file>')
  .description('Run one analysis pass over a JSON batch of market observations')
  .action(async (file: string) => {
    const contexts = loadMarketBatch(file);
    const stores = openStores();
    const pipeline = new OpportunityPipeline(config, {
      ...stores,
      walletAges: new ExplorerWalletAgeOracle(config, { logger: logger.child('wallet-age') }),
      logger: logger.child('pipeline'),
    });

    const summary = await pipeline.runPass(contexts);
    console.log('Analysis Pass');
    console.log('─'.repeat(60));
    console.log(`Markets analyzed: ${summary.marketsAnalyzed}`);
    console.log(`Markets skipped (low liquidity): ${summary.marketsSkipped}`);
    console.log(`Signals: ${summary.signals} | Rejected: ${summary.rejected}`);
    for (const failure of summary.failures) {
      console.log(`Failed: ${failure.marketId} (${failure.error})`);
    }
    for (const item of summary.opportunities) {
      console.log(formatOpportunity(item));
      console.log(item.rationale);
    }
  });

// ============================================================================
// Backtesting
// ============================================================================

program
  .command('backtest')
  .description('Replay the synthetic scenarios through the detectors')
  .option('-s, --scenario <id>', 'Only run one scenario')
  .option('--seed <number>', 'Random seed')
  .option('-d, --days <number>', 'Days of synthetic history')
  .option('--json', 'Print the report as JSON', false)
  .action(async (options: { scenario?: string; seed?: string; days?: string; json: boolean }) => {
    const simulator = new BacktestSimulator(config, { logger: logger.child('backtest') });
    const scenarios = loadScenarios().filter(
      (scenario) => !options.scenario || scenario.id === options.scenario
    );
    if (scenarios.length === 0) {
      console.log(`Unknown scenario: ${options.scenario}`);
      process.exitCode = 1;
      return;
    }

    const report = await simulator.backtestScenarios(scenarios, {
      seed: parseInteger(options.seed, 'seed'),
      daysBack: parseInteger(options.days, 'days'),
    });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log('Backtest Report');
    console.log('─'.repeat(60));
    for (const scenario of report.scenarios) {
      printScenario(scenario);
    }
    console.log('─'.repeat(60));
    console.log(`Scenarios: ${report.scenariosTested}`);
    console.log(
      `Detected: ${report.totalDetected}/${report.totalExpected} ` +
        `(${report.detectionRate.toFixed(1)}%), missed ${report.totalMissed}`
    );
  });

// ============================================================================
// Portfolio & Journal
// ============================================================================

program
  .command('portfolio')
  .description('Show exposure across unresolved opportunities')
  .action(() => {
    const { opportunities } = openStores();
    const summary = new RiskManager(config, opportunities).portfolioSummary();
    console.log('Portfolio');
    console.log('─'.repeat(40));
    console.log(`Bankroll: $${summary.bankrollUsd.toFixed(2)}`);
    console.log(
      `Exposure: $${summary.totalExposureUsd.toFixed(2)} (${summary.exposurePct.toFixed(1)}% / max ${summary.maxExposurePct}%)`
    );
    console.log(`Open positions: ${summary.openPositions}/${summary.maxPositions}`);
    console.log(`Available: $${summary.availableCapitalUsd.toFixed(2)}`);
  });

const opportunities = program.command('opportunities').description('Opportunity journal');

opportunities
  .command('list')
  .description('List recently flagged opportunities')
  .option('-l, --limit <number>', 'Limit results', '20')
  .action((options: { limit: string }) => {
    const { opportunities: store } = openStores();
    const items = store.listRecent(parseInteger(options.limit, 'limit'));
    if (items.length === 0) {
      console.log('No opportunities flagged yet.');
      return;
    }
    for (const item of items) {
      console.log(formatOpportunity(item));
    }
  });

opportunities
  .command('resolve <id> <outcome>')
  .description('Mark an opportunity as win or loss')
  .option('--pnl <amount>', 'Realized profit or loss (USD)')
  .action((rawId: string, rawOutcome: string, options: { pnl?: string }) => {
    if (rawOutcome !== 'win' && rawOutcome !== 'loss') {
      console.log('Outcome must be "win" or "loss".');
      process.exitCode = 1;
      return;
    }
    const outcome: ResolvedOutcome = rawOutcome;
    const id = parseInteger(rawId, 'id') ?? 0;
    const pnl = options.pnl === undefined ? null : Number(options.pnl);
    if (pnl !== null && !Number.isFinite(pnl)) {
      console.log('PnL must be a number.');
      process.exitCode = 1;
      return;
    }

    const { opportunities: store } = openStores();
    const resolved = store.resolve(id, outcome, pnl);
    if (!resolved) {
      console.log(`Opportunity #${id} not found.`);
      process.exitCode = 1;
      return;
    }
    console.log(formatOpportunity(resolved));
  });

// ============================================================================
// Wallets
// ============================================================================

const wallet = program.command('wallet').description('Wallet inspection');

wallet
  .command('profile <address>')
  .description('Show the fresh-wallet profile of an address on one market')
  .requiredOption('-m, --market <id>', 'Market ID')
  .action(async (address: string, options: { market: string }) => {
    const { history } = openStores();
    const oracle = new ExplorerWalletAgeOracle(config, { logger: logger.child('wallet-age') });
    const detector = new FreshWalletDetector(config, history, oracle);
    const profile = await detector.profileWallet(address, options.market);

    console.log(`Wallet: ${profile.address}`);
    console.log('─'.repeat(40));
    console.log(`Age: ${profile.ageHours === null ? 'unknown' : `${profile.ageHours}h`}`);
    console.log(`Trades: ${profile.tradeCount} (${profile.marketTrades} on ${options.market})`);
    console.log(
      `Volume: $${profile.totalVolumeUsd.toFixed(2)} ($${profile.marketVolumeUsd.toFixed(2)} on this market, ${profile.allocationPct.toFixed(1)}%)`
    );
    console.log(
      `Fresh: ${profile.isFresh ? 'yes' : 'no'} | Focused: ${profile.isFocused ? 'yes' : 'no'} | Large bet: ${profile.hasLargeBet ? 'yes' : 'no'}`
    );
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exitCode = 1;
});
