import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { parseLogLevel } from './logger.js';

const DEFAULT_CONFIG_PATH = join(homedir(), '.tripwire', 'config.yaml');

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const probability = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positive = z.number().positive();

const ConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  detection: z
    .object({
      volumeSpikeMultiplier: positive.default(4.0),
      volumeWindowHours: positive.default(4),
      historyWindowHours: positive.default(24),
      minTradeSizeUsd: nonNegative.default(1000),
      divergenceThresholdPct: nonNegative.default(12),
      correlationThreshold: probability.default(0.7),
      movementDeltaPct: nonNegative.default(5.0),
      correlationWindowDays: positive.default(7),
      socialMinMentions: nonNegative.default(15),
    })
    .default({}),
  freshWallet: z
    .object({
      ageThresholdHours: nonNegative.default(72),
      minBetUsd: nonNegative.default(5000),
      maxTrades: z.number().int().min(0).default(3),
      minAllocationPct: z.number().min(0).max(100).default(80),
    })
    .default({}),
  sizing: z
    .object({
      bankrollUsd: nonNegative.default(10_000),
      kellyFraction: z.number().min(0).max(1).default(0.5),
      maxExposurePct: z.number().min(0).max(100).default(40),
      correlationReductionFactor: probability.default(0.5),
    })
    .default({}),
  risk: z
    .object({
      maxOpenPositions: z.number().int().min(0).default(10),
      hedgeThreshold: probability.default(0.7),
      maxHedgePct: z.number().min(0).max(100).default(20),
      stopLossPct: nonNegative.default(20),
    })
    .default({}),
  pipeline: z
    .object({
      minLiquidityUsd: nonNegative.default(5000),
      minExpectedValueUsd: z.number().default(0.05),
      fairProbabilityMultiplier: positive.default(1.1),
    })
    .default({}),
  backtest: z
    .object({
      daysBack: z.number().int().positive().default(60),
      seed: z.number().int().default(42),
      eventWindowHours: z.number().int().positive().default(4),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().default('~/.tripwire/tripwire.sqlite'),
    })
    .default({}),
  explorer: z
    .object({
      apiUrl: z.string().url().default('https://api.polygonscan.com/api'),
      apiKey: z.string().optional(),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
});

export type TripwireConfig = z.infer<typeof ConfigSchema>;

/**
 * Parses an already-loaded config object, filling every default.
 */
export function resolveConfig(raw: unknown = {}): TripwireConfig {
  const cfg = ConfigSchema.parse(raw ?? {});
  cfg.memory.dbPath = expandHome(cfg.memory.dbPath);
  return cfg;
}

function readConfigFile(configPath?: string): unknown {
  const explicit = configPath ?? process.env.TRIPWIRE_CONFIG_PATH;
  if (explicit) {
    return yaml.parse(readFileSync(expandHome(explicit), 'utf-8')) ?? {};
  }
  if (!existsSync(DEFAULT_CONFIG_PATH)) {
    return {};
  }
  return yaml.parse(readFileSync(DEFAULT_CONFIG_PATH, 'utf-8')) ?? {};
}

export function loadConfig(configPath?: string): TripwireConfig {
  const cfg = resolveConfig(readConfigFile(configPath));

  const envDbPath = process.env.TRIPWIRE_DB_PATH;
  if (envDbPath) {
    cfg.memory.dbPath = expandHome(envDbPath);
  }

  const envApiKey = process.env.TRIPWIRE_EXPLORER_API_KEY;
  if (envApiKey) {
    cfg.explorer.apiKey = envApiKey;
  }

  if (process.env.TRIPWIRE_LOG_LEVEL) {
    cfg.logLevel = parseLogLevel(process.env.TRIPWIRE_LOG_LEVEL, cfg.logLevel);
  }

  return cfg;
}
