/**
 * Sync Result Aggregator
 * Counts per-item outcomes into a SyncOutcome with timing and success rate.
 */

import { errorDetails, errorKind, errorMessage } from '@stockbridge/integrations';
import type { ItemStatus, SyncErrorEntry, SyncOutcome } from './types.js';

/** Identifier of errors raised before any item could be enumerated */
export const SYSTEM_IDENTIFIER = 'SYSTEM';

export function toErrorEntry(identifier: string, error: unknown, timestamp: Date = new Date()): SyncErrorEntry {
  const details = errorDetails(error);
  return {
    identifier,
    kind: errorKind(error),
    message: errorMessage(error),
    ...(Object.keys(details).length > 0 ? { details } : {}),
    timestamp,
  };
}

export interface SyncResultAggregatorOptions {
  clock?: () => Date;
  metadata?: Record<string, unknown>;
}

export class SyncResultAggregator {
  private readonly clock: () => Date;
  private readonly startedAt: Date;
  private readonly metadata: Record<string, unknown>;
  private readonly statuses = new Map<string, ItemStatus>();
  private readonly errors: SyncErrorEntry[] = [];
  private total = 0;

  constructor(options: SyncResultAggregatorOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.startedAt = this.clock();
    this.metadata = { ...options.metadata };
  }

  setTotal(total: number): void {
    this.total = total;
  }

  /**
   * Count an item under one status. Each identifier is counted at most once;
   * returns false when it already was.
   */
  record(identifier: string, status: ItemStatus): boolean {
    if (this.statuses.has(identifier)) {
      return false;
    }
    this.statuses.set(identifier, status);
    return true;
  }

  statusOf(identifier: string): ItemStatus | undefined {
    return this.statuses.get(identifier);
  }

  /** Append an error without touching the counters */
  recordError(identifier: string, error: unknown): SyncErrorEntry {
    const entry = toErrorEntry(identifier, error, this.clock());
    this.errors.push(entry);
    return entry;
  }

  fail(identifier: string, error: unknown): void {
    this.recordError(identifier, error);
    this.record(identifier, 'failed');
  }

  /** A run-level failure, counted as one failed pseudo-item */
  failSystem(error: unknown): void {
    this.fail(SYSTEM_IDENTIFIER, error);
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata[key] = value;
  }

  finalize(): SyncOutcome {
    const endedAt = this.clock();
    let updatedCount = 0;
    let skippedCount = 0;
    let failedCount = 0;

    for (const status of this.statuses.values()) {
      if (status === 'updated') updatedCount++;
      else if (status === 'skipped') skippedCount++;
      else failedCount++;
    }

    const total = Math.max(this.total, this.statuses.size);

    return {
      success: failedCount === 0,
      total,
      updatedCount,
      skippedCount,
      failedCount,
      errors: [...this.errors],
      startedAt: this.startedAt,
      endedAt,
      durationMs: endedAt.getTime() - this.startedAt.getTime(),
      successRate: total === 0 ? 0 : (updatedCount / total) * 100,
      metadata: { ...this.metadata },
    };
  }
}

// ============================================================================
// Presentation
// ============================================================================

/**
 * Human-readable summary listing at most `maxErrors` errors
 */
export function formatSummary(outcome: SyncOutcome, maxErrors = 5): string {
  const lines = [
    `Sync completed in ${(outcome.durationMs / 1000).toFixed(2)}s`,
    `Total items: ${outcome.total}`,
    `Updated: ${outcome.updatedCount}`,
    `Failed: ${outcome.failedCount}`,
    `Skipped: ${outcome.skippedCount}`,
    `Success rate: ${outcome.successRate.toFixed(2)}%`,
  ];

  if (outcome.errors.length > 0) {
    lines.push('', `Errors (${outcome.errors.length}):`);
    for (const error of outcome.errors.slice(0, maxErrors)) {
      lines.push(`  - ${error.identifier}: ${error.message}`);
    }
    if (outcome.errors.length > maxErrors) {
      lines.push(`  ... and ${outcome.errors.length - maxErrors} more errors`);
    }
  }

  return lines.join('\n');
}

/**
 * JSON-safe view with ISO timestamps and rounded figures
 */
export function outcomeToJSON(outcome: SyncOutcome): Record<string, unknown> {
  return {
    success: outcome.success,
    total: outcome.total,
    updatedCount: outcome.updatedCount,
    skippedCount: outcome.skippedCount,
    failedCount: outcome.failedCount,
    successRate: Math.round(outcome.successRate * 100) / 100,
    durationMs: outcome.durationMs,
    startedAt: outcome.startedAt.toISOString(),
    endedAt: outcome.endedAt.toISOString(),
    errors: outcome.errors.map((error) => ({
      identifier: error.identifier,
      kind: error.kind,
      message: error.message,
      details: error.details ?? null,
      timestamp: error.timestamp.toISOString(),
    })),
    metadata: outcome.metadata,
  };
}
