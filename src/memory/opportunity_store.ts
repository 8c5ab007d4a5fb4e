import type Database from 'better-sqlite3';

import type { NewOpportunity, Opportunity, OpportunityStatus } from '../types/index.js';
import { decodeSignal, encodeSignal } from './signal_codec.js';

export type ResolvedOutcome = Exclude<OpportunityStatus, 'pending'>;

/**
 * Journal of flagged opportunities. Exposure is always derived from the
 * unresolved rows, so this store is the single source of portfolio state.
 */
export interface OpportunityStore {
  flag(opportunity: NewOpportunity): Opportunity;
  get(id: number): Opportunity | null;
  listUnresolved(): Opportunity[];
  listRecent(limit?: number): Opportunity[];
  /** Returns the updated record, or null when the id is unknown. */
  resolve(id: number, outcome: ResolvedOutcome, pnl?: number | null, at?: Date): Opportunity | null;
}

export class InMemoryOpportunityStore implements OpportunityStore {
  private rows: Opportunity[] = [];
  private nextId = 1;

  flag(opportunity: NewOpportunity): Opportunity {
    const stored: Opportunity = {
      ...opportunity,
      id: this.nextId,
      status: 'pending',
      pnl: null,
      resolvedAt: null,
    };
    this.nextId += 1;
    this.rows.push(stored);
    return { ...stored };
  }

  get(id: number): Opportunity | null {
    const row = this.rows.find((item) => item.id === id);
    return row ? { ...row } : null;
  }

  listUnresolved(): Opportunity[] {
    return this.rows.filter((row) => row.status === 'pending').map((row) => ({ ...row }));
  }

  listRecent(limit = 50): Opportunity[] {
    return [...this.rows]
      .sort((a, b) => b.flaggedAt.getTime() - a.flaggedAt.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((row) => ({ ...row }));
  }

  resolve(
    id: number,
    outcome: ResolvedOutcome,
    pnl: number | null = null,
    at: Date = new Date()
  ): Opportunity | null {
    const row = this.rows.find((item) => item.id === id);
    if (!row) return null;
    row.status = outcome;
    row.pnl = pnl;
    row.resolvedAt = at;
    return { ...row };
  }
}

interface OpportunityRow {
  id: number;
  marketId: string;
  question: string;
  signalJson: string;
  currentProbability: number;
  expectedValueUsd: number;
  suggestedSizeUsd: number;
  rationale: string;
  flaggedAt: string;
  status: string;
  pnl: number | null;
  resolvedAt: string | null;
}

function parseStatus(value: string): OpportunityStatus {
  return value === 'win' || value === 'loss' ? value : 'pending';
}

function toOpportunity(row: OpportunityRow): Opportunity {
  return {
    id: row.id,
    marketId: row.marketId,
    question: row.question,
    signal: decodeSignal(row.signalJson),
    currentProbability: row.currentProbability,
    expectedValueUsd: row.expectedValueUsd,
    suggestedSizeUsd: row.suggestedSizeUsd,
    rationale: row.rationale,
    flaggedAt: new Date(row.flaggedAt),
    status: parseStatus(row.status),
    pnl: row.pnl,
    resolvedAt: row.resolvedAt ? new Date(row.resolvedAt) : null,
  };
}

const SELECT_OPPORTUNITY = `
  SELECT
    id,
    market_id as marketId,
    question,
    signal_json as signalJson,
    current_probability as currentProbability,
    expected_value_usd as expectedValueUsd,
    suggested_size_usd as suggestedSizeUsd,
    rationale,
    flagged_at as flaggedAt,
    status,
    pnl,
    resolved_at as resolvedAt
  FROM opportunities
`;

export class SqliteOpportunityStore implements OpportunityStore {
  constructor(private db: Database.Database) {}

  flag(opportunity: NewOpportunity): Opportunity {
    const result = this.db
      .prepare(
        `
          INSERT INTO opportunities (
            market_id,
            question,
            signal_type,
            signal_json,
            current_probability,
            expected_value_usd,
            suggested_size_usd,
            rationale,
            flagged_at
          ) VALUES (
            @marketId,
            @question,
            @signalType,
            @signalJson,
            @currentProbability,
            @expectedValueUsd,
            @suggestedSizeUsd,
            @rationale,
            @flaggedAt
          )
        `
      )
      .run({
        marketId: opportunity.marketId,
        question: opportunity.question,
        signalType: opportunity.signal.type,
        signalJson: encodeSignal(opportunity.signal),
        currentProbability: opportunity.currentProbability,
        expectedValueUsd: opportunity.expectedValueUsd,
        suggestedSizeUsd: opportunity.suggestedSizeUsd,
        rationale: opportunity.rationale,
        flaggedAt: opportunity.flaggedAt.toISOString(),
      });

    return {
      ...opportunity,
      id: Number(result.lastInsertRowid),
      status: 'pending',
      pnl: null,
      resolvedAt: null,
    };
  }

  get(id: number): Opportunity | null {
    const row = this.db
      .prepare<[number], OpportunityRow>(`${SELECT_OPPORTUNITY} WHERE id = ?`)
      .get(id);
    return row ? toOpportunity(row) : null;
  }

  listUnresolved(): Opportunity[] {
    return this.db
      .prepare<[], OpportunityRow>(
        `${SELECT_OPPORTUNITY} WHERE status = 'pending' ORDER BY flagged_at ASC, id ASC`
      )
      .all()
      .map(toOpportunity);
  }

  listRecent(limit = 50): Opportunity[] {
    return this.db
      .prepare<[number], OpportunityRow>(
        `${SELECT_OPPORTUNITY} ORDER BY flagged_at DESC, id DESC LIMIT ?`
      )
      .all(limit)
      .map(toOpportunity);
  }

  resolve(
    id: number,
    outcome: ResolvedOutcome,
    pnl: number | null = null,
    at: Date = new Date()
  ): Opportunity | null {
    const result = this.db
      .prepare(
        `UPDATE opportunities SET status = @status, pnl = @pnl, resolved_at = @resolvedAt WHERE id = @id`
      )
      .run({ id, status: outcome, pnl, resolvedAt: at.toISOString() });
    if (result.changes === 0) return null;
    return this.get(id);
  }
}
