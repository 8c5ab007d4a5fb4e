/**
 * Backtest harness
 *
 * Replays synthetic scenario history through the live detectors and scores
 * how many labelled events they catch.
 */

import type { TripwireConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { SignalDetectors } from '../detection/detectors.js';
import { FreshWalletDetector } from '../detection/fresh_wallet.js';
import { ScriptedWalletAgeOracle } from '../detection/wallet_age.js';
import { InMemoryHistoryStore } from '../memory/history_store.js';
import type { Signal, SignalType } from '../types/index.js';
import { generateFreshWalletTrades, generateHistory, generateTrades } from './history.js';
import { createRandom, type Random } from './random.js';
import { loadScenarios, type Scenario, type ScenarioEvent } from './scenarios.js';

export interface DetectedEvent {
  date: Date;
  label: string;
  expectedType: SignalType;
  signal: Signal;
}

export interface MissedEvent {
  date: Date;
  label: string;
  expectedType: SignalType;
  reason: string;
}

export interface ScenarioReport {
  scenario: string;
  question: string;
  totalExpected: number;
  totalDetected: number;
  detectedSignals: DetectedEvent[];
  missedSignals: MissedEvent[];
}

export interface SuiteReport {
  scenariosTested: number;
  totalExpected: number;
  totalDetected: number;
  totalMissed: number;
  /** Percentage, 0 when nothing was expected. */
  detectionRate: number;
  scenarios: ScenarioReport[];
}

export interface BacktestOptions {
  seed?: number;
  daysBack?: number;
}

type EventOutcome = { detected: true; signal: Signal } | { detected: false; reason: string };

interface ReplayContext {
  scenario: Scenario;
  random: Random;
  store: InMemoryHistoryStore;
  detectors: SignalDetectors;
  freshWallets: FreshWalletDetector;
  oracle: ScriptedWalletAgeOracle;
}

const HOUR_MS = 60 * 60 * 1000;

export class BacktestSimulator {
  private logger: Logger;

  constructor(
    private config: TripwireConfig,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
  }

  /**
   * Replays one scenario. Each call reseeds the generator, so the same seed
   * always gives the same report.
   */
  async backtestScenario(scenario: Scenario, options: BacktestOptions = {}): Promise<ScenarioReport> {
    const seed = options.seed ?? this.config.backtest.seed;
    const daysBack = options.daysBack ?? this.config.backtest.daysBack;
    const random = createRandom(seed);
    const history = generateHistory(scenario, daysBack, random, this.config.backtest.eventWindowHours);

    let replayTime = new Date(0);
    const clock = () => replayTime;
    const store = new InMemoryHistoryStore();
    const oracle = new ScriptedWalletAgeOracle();
    const context: ReplayContext = {
      scenario,
      random,
      store,
      oracle,
      detectors: new SignalDetectors(this.config, store, { clock }),
      freshWallets: new FreshWalletDetector(this.config, store, oracle, { clock }),
    };

    const report: ScenarioReport = {
      scenario: scenario.id,
      question: scenario.question,
      totalExpected: 0,
      totalDetected: 0,
      detectedSignals: [],
      missedSignals: [],
    };

    const events = [...scenario.events].sort((a, b) => a.date.getTime() - b.date.getTime());
    let replayed = 0;

    for (const event of events) {
      const eventTime = event.date.getTime();
      while (replayed < history.length) {
        const snapshot = history[replayed];
        if (!snapshot || snapshot.timestamp.getTime() >= eventTime) break;
        store.appendSnapshot(snapshot);
        replayed += 1;
      }
      replayTime = event.date;

      report.totalExpected += 1;
      const windowVolumes = history
        .filter((snapshot) => {
          const ts = snapshot.timestamp.getTime();
          return ts >= eventTime && ts < eventTime + this.config.backtest.eventWindowHours * HOUR_MS;
        })
        .map((snapshot) => snapshot.volume24h);
      const outcome = await this.replayEvent(context, event, windowVolumes);

      if (outcome.detected) {
        report.totalDetected += 1;
        report.detectedSignals.push({
          date: event.date,
          label: event.label,
          expectedType: event.expectedSignal,
          signal: outcome.signal,
        });
      } else {
        report.missedSignals.push({
          date: event.date,
          label: event.label,
          expectedType: event.expectedSignal,
          reason: outcome.reason,
        });
      }
    }

    this.logger.info(
      `Backtest ${scenario.id}: ${report.totalDetected}/${report.totalExpected} events detected`
    );
    return report;
  }

  async backtestScenarios(
    scenarios: readonly Scenario[],
    options: BacktestOptions = {}
  ): Promise<SuiteReport> {
    const reports: ScenarioReport[] = [];
    for (const scenario of scenarios) {
      reports.push(await this.backtestScenario(scenario, options));
    }

    const totalExpected = reports.reduce((sum, item) => sum + item.totalExpected, 0);
    const totalDetected = reports.reduce((sum, item) => sum + item.totalDetected, 0);

    return {
      scenariosTested: reports.length,
      totalExpected,
      totalDetected,
      totalMissed: totalExpected - totalDetected,
      detectionRate: totalExpected > 0 ? (totalDetected / totalExpected) * 100 : 0,
      scenarios: reports,
    };
  }

  async runFullSuite(options: BacktestOptions & { scenariosPath?: string } = {}): Promise<SuiteReport> {
    return this.backtestScenarios(loadScenarios(options.scenariosPath), options);
  }

  private async replayEvent(
    context: ReplayContext,
    event: ScenarioEvent,
    windowVolumes: number[]
  ): Promise<EventOutcome> {
    const { scenario, random, store, detectors, freshWallets, oracle } = context;

    switch (event.expectedSignal) {
      case 'volume_spike': {
        if (windowVolumes.length === 0) {
          return { detected: false, reason: 'No history generated for the event window' };
        }
        const currentVolume = windowVolumes.reduce((sum, value) => sum + value, 0) / windowVolumes.length;
        const signal = detectors.detectVolumeSpike(scenario.id, currentVolume);
        if (signal) return { detected: true, signal };

        const measurement = detectors.measureVolumeSpike(scenario.id, currentVolume);
        if (!measurement.sufficientHistory) {
          return {
            detected: false,
            reason: `Insufficient history (${measurement.sampleCount} points)`,
          };
        }
        return {
          detected: false,
          reason: `Ratio ${measurement.spikeRatio.toFixed(2)}x below threshold ${this.config.detection.volumeSpikeMultiplier}x`,
        };
      }

      case 'unusual_trade_size': {
        const trades = generateTrades(scenario, event, random);
        store.appendTrades(trades);
        const signal = detectors.detectUnusualTradeSize(trades);
        if (signal) return { detected: true, signal };
        return {
          detected: false,
          reason: `No trades at or above $${this.config.detection.minTradeSizeUsd}`,
        };
      }

      case 'fresh_wallet_large_bet': {
        const fresh = generateFreshWalletTrades(scenario, event, random);
        if (!fresh || !event.freshWallet) {
          return { detected: false, reason: 'No fresh-wallet bet scripted for this event' };
        }
        oracle.set(fresh.address, event.freshWallet.ageHours);
        const trades = [...generateTrades(scenario, event, random), ...fresh.trades];
        store.appendTrades(trades);

        const signal = await freshWallets.detect(scenario.id, trades);
        if (signal && signal.walletAddress === fresh.address) {
          return { detected: true, signal };
        }
        const assessment = await freshWallets.assessWallet(scenario.id, fresh.address, trades);
        return {
          detected: false,
          reason: assessment.passed ? 'Another wallet matched first' : assessment.reason,
        };
      }

      default:
        return { detected: false, reason: `No replay for signal type ${event.expectedSignal}` };
    }
  }
}
