import fetch from 'node-fetch';
import { ethers } from 'ethers';
import { z } from 'zod';

import type { TripwireConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { systemClock, type Clock } from '../types/index.js';

/**
 * Source of wallet ages in hours. `null` means the age is unknown, which
 * callers treat as "skip for now", never as young or old.
 */
export interface WalletAgeOracle {
  getWalletAge(address: string): Promise<number | null>;
}

/** Fixed ages for replay and tests. Unlisted addresses are unknown. */
export class ScriptedWalletAgeOracle implements WalletAgeOracle {
  private ages: Map<string, number>;

  constructor(ages: Iterable<[string, number]> = []) {
    this.ages = new Map(ages);
  }

  set(address: string, ageHours: number): void {
    this.ages.set(address, ageHours);
  }

  async getWalletAge(address: string): Promise<number | null> {
    return this.ages.get(address) ?? null;
  }
}

const ExplorerTxListSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  result: z.union([
    z.array(z.object({ timeStamp: z.union([z.string(), z.number()]) }).passthrough()),
    z.string(),
  ]),
});

/**
 * Derives wallet age from the first transaction reported by an
 * Etherscan-compatible explorer. First-seen times are cached per address.
 */
export class ExplorerWalletAgeOracle implements WalletAgeOracle {
  private logger: Logger;
  private clock: Clock;
  private firstSeen = new Map<string, number>();

  constructor(
    private config: TripwireConfig,
    options: { logger?: Logger; clock?: Clock } = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
    this.clock = options.clock ?? systemClock;
  }

  async getWalletAge(address: string): Promise<number | null> {
    const apiKey = this.config.explorer.apiKey;
    if (!apiKey) {
      this.logger.debug('Explorer API key not configured; wallet age unknown');
      return null;
    }
    if (!ethers.isAddress(address)) {
      return null;
    }

    const key = address.toLowerCase();
    let firstSeenSeconds = this.firstSeen.get(key);
    if (firstSeenSeconds === undefined) {
      const fetched = await this.fetchFirstTransactionTime(address, apiKey);
      if (fetched === null) return null;
      firstSeenSeconds = fetched;
      this.firstSeen.set(key, fetched);
    }

    const ageSeconds = this.clock().getTime() / 1000 - firstSeenSeconds;
    return Math.max(0, Math.floor(ageSeconds / 3600));
  }

  private async fetchFirstTransactionTime(address: string, apiKey: string): Promise<number | null> {
    const url = new URL(this.config.explorer.apiUrl);
    url.searchParams.set('module', 'account');
    url.searchParams.set('action', 'txlist');
    url.searchParams.set('address', address);
    url.searchParams.set('startblock', '0');
    url.searchParams.set('endblock', '99999999');
    url.searchParams.set('page', '1');
    url.searchParams.set('offset', '1');
    url.searchParams.set('sort', 'asc');
    url.searchParams.set('apikey', apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.explorer.timeoutMs);
    try {
      const response = await fetch(url.toString(), { signal: controller.signal });
      if (!response.ok) {
        this.logger.warn(`Explorer lookup for ${address} returned status ${response.status}`);
        return null;
      }
      const parsed = ExplorerTxListSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.status !== '1' || typeof parsed.data.result === 'string') {
        return null;
      }
      const first = parsed.data.result[0];
      const seconds = first ? Number(first.timeStamp) : 0;
      return Number.isFinite(seconds) && seconds > 0 ? seconds : null;
    } catch (error) {
      this.logger.warn(`Explorer lookup failed for ${address}`, error);
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}
