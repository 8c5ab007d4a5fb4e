import type { MarketSnapshot, TradeRecord } from '../types/index.js';
import { randomBetween, randomInt, type Random } from './random.js';
import type { Scenario, ScenarioEvent } from './scenarios.js';

const HOUR_MS = 60 * 60 * 1000;
const DIURNAL_AMPLITUDE = 0.2;
const VOLUME_JITTER = 0.04;
const PROBABILITY_JITTER = 0.05;
const BACKGROUND_TRADES = 20;

const clampProbability = (value: number): number => Math.max(0, Math.min(1, value));

function lastEventTime(scenario: Scenario): number {
  return scenario.events.reduce((latest, event) => Math.max(latest, event.date.getTime()), 0);
}

function activeEvent(
  scenario: Scenario,
  timestamp: number,
  eventWindowHours: number
): ScenarioEvent | undefined {
  return scenario.events.find((event) => {
    const hoursSince = (timestamp - event.date.getTime()) / HOUR_MS;
    return hoursSince >= 0 && hoursSince < eventWindowHours;
  });
}

/**
 * Hourly synthetic snapshots ending one day after the scenario's last event.
 * Baseline volume follows a daily cycle with small jitter; inside an event
 * window volume and probability take the event's values exactly.
 */
export function generateHistory(
  scenario: Scenario,
  daysBack: number,
  random: Random,
  eventWindowHours = 4
): MarketSnapshot[] {
  const end = (lastEventTime(scenario) || Date.now()) + 24 * HOUR_MS;
  const hours = Math.max(0, Math.floor(daysBack * 24));
  const start = end - hours * HOUR_MS;
  const { baseVolume, baseProbability } = scenario;
  const snapshots: MarketSnapshot[] = [];

  for (let i = 0; i < hours; i += 1) {
    const timestamp = new Date(start + i * HOUR_MS);
    const diurnal = DIURNAL_AMPLITUDE * Math.sin((2 * Math.PI * timestamp.getUTCHours()) / 24);
    const jitter = randomBetween(random, -VOLUME_JITTER, VOLUME_JITTER);
    let volume = baseVolume * (1 + diurnal + jitter);
    let probability = baseProbability + randomBetween(random, -PROBABILITY_JITTER, PROBABILITY_JITTER);

    const event = activeEvent(scenario, timestamp.getTime(), eventWindowHours);
    if (event) {
      volume = baseVolume * (event.volumeMultiplier ?? 1);
      probability = baseProbability + (event.probabilityChange ?? 0);
    }

    snapshots.push({
      marketId: scenario.id,
      probability: clampProbability(probability),
      volume24h: volume,
      liquidity: scenario.liquidity,
      timestamp,
    });
  }

  return snapshots;
}

/** Small background trades in the day before the event plus its scripted large trades. */
export function generateTrades(scenario: Scenario, event: ScenarioEvent, random: Random): TradeRecord[] {
  const eventTime = event.date.getTime();
  const trades: TradeRecord[] = [];

  for (let i = 0; i < BACKGROUND_TRADES; i += 1) {
    trades.push({
      marketId: scenario.id,
      traderAddress: `0x${randomInt(random, 1000, 9999)}`,
      size: randomInt(random, 10, 100),
      price: randomBetween(random, 0.45, 0.55),
      timestamp: new Date(eventTime - randomInt(random, 1, 24) * HOUR_MS),
    });
  }

  for (const unusual of event.unusualTrades ?? []) {
    trades.push({
      marketId: scenario.id,
      traderAddress: `0x${randomInt(random, 1000, 9999)}`,
      size: unusual.size,
      price: unusual.price,
      timestamp: new Date(eventTime),
    });
  }

  return trades;
}

/**
 * The scripted fresh-wallet bet, split into equal trades at the base price.
 * Returns no trades when the event scripts no such bet.
 */
export function generateFreshWalletTrades(
  scenario: Scenario,
  event: ScenarioEvent,
  random: Random
): { address: string; trades: TradeRecord[] } | null {
  const bet = event.freshWallet;
  if (!bet) return null;

  const address = `0xfresh${randomInt(random, 1000, 9999)}`;
  const price = scenario.baseProbability > 0 ? scenario.baseProbability : 0.5;
  const size = bet.betSizeUsd / price / bet.totalTrades;
  const eventTime = event.date.getTime();
  const trades: TradeRecord[] = [];

  for (let i = 0; i < bet.totalTrades; i += 1) {
    trades.push({
      marketId: scenario.id,
      traderAddress: address,
      size,
      price,
      timestamp: new Date(eventTime - (bet.totalTrades - 1 - i) * 60_000),
    });
  }

  return { address, trades };
}
