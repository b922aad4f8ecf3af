import { logger } from '../../shared/logger';
import type { EnrichmentGateway } from '../enrichment/adapters/types';
import {
  enrichProfile,
  type EnrichmentOutcome,
  type EnrichmentRow,
} from '../enrichment/enrichment.service';

export interface BatchSummary {
  processed: number;
  matched: number;
  noMatch: number;
  invalid: number;
  unlocked: number;
}

export interface BatchResult {
  /** One row per input URL, in input order. */
  rows: EnrichmentRow[];
  creditsSpent: number;
  summary: BatchSummary;
}

export interface RunBatchOptions {
  unlockCreditCost?: number;
  /** Credit total to start counting from. Defaults to 0. */
  initialCredits?: number;
}

function tally(summary: BatchSummary, outcome: EnrichmentOutcome): void {
  summary.processed += 1;
  switch (outcome.kind) {
    case 'invalid_url':
      summary.invalid += 1;
      break;
    case 'no_match':
      summary.noMatch += 1;
      break;
    case 'matched':
      summary.matched += 1;
      if (outcome.unlock === 'unlocked') summary.unlocked += 1;
      break;
  }
}

/**
 * Enrich every URL strictly in order, threading the credit total from one
 * profile into the next. Profiles are never processed concurrently: the
 * per-row credit total is only meaningful in input order.
 */
export async function runBatch(
  gateway: EnrichmentGateway,
  linkedinUrls: readonly string[],
  options: RunBatchOptions = {},
): Promise<BatchResult> {
  const rows: EnrichmentRow[] = [];
  const summary: BatchSummary = { processed: 0, matched: 0, noMatch: 0, invalid: 0, unlocked: 0 };
  let creditsSpent = options.initialCredits ?? 0;

  for (const [index, linkedinUrl] of linkedinUrls.entries()) {
    logger.debug('Processing profile', { index, total: linkedinUrls.length, linkedinUrl });

    const result = await enrichProfile(gateway, linkedinUrl, creditsSpent, {
      unlockCreditCost: options.unlockCreditCost,
    });

    creditsSpent = result.creditsSpent;
    rows.push(result.row);
    tally(summary, result.outcome);
  }

  return { rows, creditsSpent, summary };
}
