import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { SIGNAL_TYPES, type SignalType } from '../types/index.js';

const DEFAULT_SCENARIOS_PATH = fileURLToPath(new URL('./scenarios.json', import.meta.url));

const SignalTypeSchema = z.custom<SignalType>(
  (value) => typeof value === 'string' && SIGNAL_TYPES.some((type) => type === value),
  { message: 'Unknown signal type' }
);

const ScenarioEventSchema = z.object({
  date: z.coerce.date(),
  label: z.string(),
  expectedSignal: SignalTypeSchema,
  volumeMultiplier: z.number().positive().optional(),
  probabilityChange: z.number().optional(),
  unusualTrades: z
    .array(z.object({ size: z.number().nonnegative(), price: z.number().min(0).max(1) }))
    .optional(),
  freshWallet: z
    .object({
      ageHours: z.number().nonnegative(),
      betSizeUsd: z.number().positive(),
      totalTrades: z.number().int().positive(),
    })
    .optional(),
});

const ScenarioSchema = z.object({
  id: z.string().min(1),
  question: z.string(),
  category: z.string().default('general'),
  liquidity: z.number().nonnegative(),
  baseVolume: z.number().positive(),
  baseProbability: z.number().min(0).max(1).default(0.5),
  events: z.array(ScenarioEventSchema),
});

const ScenarioFileSchema = z.object({
  scenarios: z.array(ScenarioSchema),
});

export type ScenarioEvent = z.infer<typeof ScenarioEventSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

export function parseScenarios(raw: unknown): Scenario[] {
  return ScenarioFileSchema.parse(raw).scenarios;
}

/** Reads a scenario file; the bundled fixtures when no path is given. */
export function loadScenarios(path: string = DEFAULT_SCENARIOS_PATH): Scenario[] {
  return parseScenarios(JSON.parse(readFileSync(path, 'utf-8')));
}
