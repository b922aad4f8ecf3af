/**
 * Enrichment service — two-stage lookup for a single LinkedIn profile.
 *
 * Stage 1 matches the profile URL against the people-data API. Stage 2
 * spends a simulated credit to unlock the mobile number, but only when the
 * number is neither verified nor already unlocked and a person id exists.
 * The running credit total is passed in and returned; nothing here keeps
 * state between calls.
 */

import { logger } from '../../shared/logger';
import type { EnrichmentGateway } from './adapters/types';
import { parseLinkedInIdentifier } from './linkedin-identifier';
import {
  classifyMobileStatus,
  extractPersonRecord,
  readMobileNumber,
  type PersonRecord,
} from './person-extractor';

// === Row and outcome types ===

export type RowStatus = 'Invalid URL' | 'No Match' | 'Matched';

/** A row for a URL that never produced person data. */
export interface UnmatchedRow {
  status: Exclude<RowStatus, 'Matched'>;
  linkedinUrl: string;
}

/** A matched row: person fields plus the cumulative credit total. */
export interface MatchedRow extends PersonRecord {
  status: 'Matched';
  creditsUsed: number;
}

export type EnrichmentRow = UnmatchedRow | MatchedRow;

/** What happened at the unlock decision for a matched profile. */
export type UnlockOutcome =
  | 'already_verified'
  | 'unlocked'
  | 'no_number'
  | 'failed'
  | 'skipped_unlocked'
  | 'skipped_no_id';

export type EnrichmentOutcome =
  | { kind: 'invalid_url' }
  | { kind: 'no_match' }
  | { kind: 'matched'; unlock: UnlockOutcome };

export interface EnrichProfileResult {
  row: EnrichmentRow;
  /** Cumulative credits after this profile. */
  creditsSpent: number;
  outcome: EnrichmentOutcome;
}

export interface EnrichProfileOptions {
  /** Simulated credits charged per successful mobile unlock. */
  unlockCreditCost?: number;
}

// === Constants ===

export const DEFAULT_UNLOCK_CREDIT_COST = 1;

// === Helpers ===

interface UnlockDecision {
  record: PersonRecord;
  creditsSpent: number;
  unlock: UnlockOutcome;
}

async function resolveMobile(
  gateway: EnrichmentGateway,
  record: PersonRecord,
  creditsSpent: number,
  unlockCreditCost: number,
): Promise<UnlockDecision> {
  const statusKind = classifyMobileStatus(record.mobileStatus);

  if (statusKind === 'verified') {
    return { record, creditsSpent, unlock: 'already_verified' };
  }
  if (statusKind === 'unlocked') {
    return { record, creditsSpent, unlock: 'skipped_unlocked' };
  }
  if (record.personId === '') {
    return { record, creditsSpent, unlock: 'skipped_no_id' };
  }

  logger.info('Attempting mobile unlock', {
    personId: record.personId,
    mobileStatus: record.mobileStatus,
  });

  const unlocked = await gateway.unlockMobile(record.personId);
  if (!unlocked) {
    return { record, creditsSpent, unlock: 'failed' };
  }
  if (readMobileNumber(unlocked) === '') {
    return { record, creditsSpent, unlock: 'no_number' };
  }

  // The unlock payload replaces every stage-1 field, not only the phone.
  return {
    record: extractPersonRecord(unlocked),
    creditsSpent: creditsSpent + unlockCreditCost,
    unlock: 'unlocked',
  };
}

function logUnlockOutcome(
  unlock: UnlockOutcome,
  record: PersonRecord,
  creditsSpent: number,
): void {
  switch (unlock) {
    case 'already_verified':
      logger.info('Mobile already verified, skipping unlock', { personId: record.personId });
      return;
    case 'unlocked':
      logger.info('Mobile number unlocked', { personId: record.personId, creditsSpent });
      return;
    case 'no_number':
      logger.info('Mobile unlock returned no number', { personId: record.personId });
      return;
    case 'failed':
      logger.warn('Mobile unlock request failed or returned no person', {
        personId: record.personId,
      });
      return;
    case 'skipped_unlocked':
    case 'skipped_no_id':
      logger.info('Mobile unlock not attempted', {
        personId: record.personId,
        mobileStatus: record.mobileStatus,
      });
      return;
    default: {
      const exhaustive: never = unlock;
      throw new Error(`Unhandled unlock outcome: ${String(exhaustive)}`);
    }
  }
}

// === Service functions ===

/**
 * Enrich one LinkedIn URL.
 *
 * 1. Parse the profile identifier — unparseable URLs make no remote calls
 * 2. Match the URL — no person means a "No Match" row
 * 3. Extract stage-1 fields
 * 4. Unlock the mobile number when it is still locked and a person id exists
 * 5. Stamp the row with the cumulative credit total
 */
export async function enrichProfile(
  gateway: EnrichmentGateway,
  linkedinUrl: string,
  creditsSpent: number,
  options: EnrichProfileOptions = {},
): Promise<EnrichProfileResult> {
  const unlockCreditCost = options.unlockCreditCost ?? DEFAULT_UNLOCK_CREDIT_COST;

  // 1. Parse
  const identifier = parseLinkedInIdentifier(linkedinUrl);
  if (identifier === null) {
    logger.warn('Skipping profile, could not parse identifier from URL', { linkedinUrl });
    return {
      row: { status: 'Invalid URL', linkedinUrl },
      creditsSpent,
      outcome: { kind: 'invalid_url' },
    };
  }

  // 2. Match
  logger.info('Matching profile', { linkedinUrl, identifier });
  const person = await gateway.match(linkedinUrl);
  if (!person) {
    logger.info('No match found', { linkedinUrl, identifier });
    return {
      row: { status: 'No Match', linkedinUrl },
      creditsSpent,
      outcome: { kind: 'no_match' },
    };
  }

  // 3. Extract
  const baseline = extractPersonRecord(person);

  // 4. Unlock decision
  const decision = await resolveMobile(gateway, baseline, creditsSpent, unlockCreditCost);
  logUnlockOutcome(decision.unlock, decision.record, decision.creditsSpent);

  // 5. Finalize
  return {
    row: { ...decision.record, status: 'Matched', creditsUsed: decision.creditsSpent },
    creditsSpent: decision.creditsSpent,
    outcome: { kind: 'matched', unlock: decision.unlock },
  };
}
