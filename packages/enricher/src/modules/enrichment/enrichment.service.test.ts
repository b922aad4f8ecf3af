import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { enrichProfile } from './enrichment.service';
import type { EnrichmentGateway, PersonPayload } from './adapters/types';
import { logger } from '../../shared/logger';

// --- Shared fixtures ---

const JANE_URL = 'https://linkedin.com/in/jane-doe/';

function makePerson(overrides: PersonPayload = {}): PersonPayload {
  return {
    id: 'person-1',
    first_name: 'Jane',
    last_name: 'Doe',
    title: 'Head of Sales',
    email: 'jane@acme.test',
    linkedin_url: 'http://www.linkedin.com/in/jane-doe',
    mobile_phone_status: 'unavailable',
    organization: { name: 'Acme', website_url: 'https://acme.test', industry: 'retail' },
    ...overrides,
  };
}

function makeGateway(
  matchResult: PersonPayload | null,
  unlockResult: PersonPayload | null = null,
) {
  return {
    match: vi.fn(async (_linkedinUrl: string) => matchResult),
    unlockMobile: vi.fn(async (_personId: string) => unlockResult),
  } satisfies EnrichmentGateway;
}

describe('enrichment.service', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('enrichProfile — parse stage', () => {
    it('marks an unparseable URL invalid without any remote call', async () => {
      const gateway = makeGateway(makePerson());

      const result = await enrichProfile(gateway, 'https://invalid-url', 0);

      expect(result.row).toEqual({ status: 'Invalid URL', linkedinUrl: 'https://invalid-url' });
      expect(result.creditsSpent).toBe(0);
      expect(result.outcome).toEqual({ kind: 'invalid_url' });
      expect(gateway.match).not.toHaveBeenCalled();
      expect(gateway.unlockMobile).not.toHaveBeenCalled();
    });

    it('passes the incoming credit total through unchanged', async () => {
      const gateway = makeGateway(null);

      const result = await enrichProfile(gateway, 'https://linkedin.com/company/acme', 7);

      expect(result.creditsSpent).toBe(7);
    });
  });

  describe('enrichProfile — match stage', () => {
    it('returns a No Match row when the service finds no person', async () => {
      const url = 'https://linkedin.com/in/nobody-here';
      const gateway = makeGateway(null);

      const result = await enrichProfile(gateway, url, 2);

      expect(result.row).toEqual({ status: 'No Match', linkedinUrl: url });
      expect(result.creditsSpent).toBe(2);
      expect(result.outcome).toEqual({ kind: 'no_match' });
      expect(gateway.match).toHaveBeenCalledWith(url);
      expect(gateway.unlockMobile).not.toHaveBeenCalled();
    });

    it('sends the original URL, not the parsed identifier', async () => {
      const gateway = makeGateway(null);

      await enrichProfile(gateway, JANE_URL, 0);

      expect(gateway.match).toHaveBeenCalledWith(JANE_URL);
    });
  });

  describe('enrichProfile — unlock decision', () => {
    it('keeps a verified stage-1 number and skips the unlock', async () => {
      const gateway = makeGateway(
        makePerson({ mobile_phone_status: 'verified', mobile_phone_number: '+1 555 0101' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(gateway.unlockMobile).not.toHaveBeenCalled();
      expect(result.creditsSpent).toBe(0);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'already_verified' });
      expect(result.row).toMatchObject({
        status: 'Matched',
        verifiedMobilePhone: '+1 555 0101',
        mobileStatus: 'verified',
        creditsUsed: 0,
      });
    });

    it('does not unlock a number that is already unlocked', async () => {
      const gateway = makeGateway(
        makePerson({ mobile_phone_status: 'unlocked', mobile_phone_number: '+1 555 0102' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 4);

      expect(gateway.unlockMobile).not.toHaveBeenCalled();
      expect(result.creditsSpent).toBe(4);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'skipped_unlocked' });
      expect(result.row).toMatchObject({ verifiedMobilePhone: '', creditsUsed: 4 });
    });

    it('does not unlock when the person has no id', async () => {
      const gateway = makeGateway(makePerson({ id: undefined }));

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(gateway.unlockMobile).not.toHaveBeenCalled();
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'skipped_no_id' });
      expect(result.row).toMatchObject({ personId: '', firstName: 'Jane', creditsUsed: 0 });
    });

    it('unlocks a locked number and charges one credit', async () => {
      const gateway = makeGateway(
        makePerson(),
        makePerson({ mobile_phone_status: 'verified', mobile_phone_number: '+1 555 0199' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(gateway.unlockMobile).toHaveBeenCalledWith('person-1');
      expect(result.creditsSpent).toBe(1);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'unlocked' });
      expect(result.row).toEqual({
        status: 'Matched',
        firstName: 'Jane',
        lastName: 'Doe',
        jobTitle: 'Head of Sales',
        companyName: 'Acme',
        companyWebsite: 'https://acme.test',
        companyIndustry: 'retail',
        corporateEmail: 'jane@acme.test',
        verifiedMobilePhone: '+1 555 0199',
        linkedinUrl: 'http://www.linkedin.com/in/jane-doe',
        mobileStatus: 'verified',
        personId: 'person-1',
        creditsUsed: 1,
      });
    });

    it('uses the configured unlock cost', async () => {
      const gateway = makeGateway(
        makePerson(),
        makePerson({ mobile_phone_status: 'verified', mobile_phone_number: '+1 555 0199' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 10, { unlockCreditCost: 5 });

      expect(result.creditsSpent).toBe(15);
      expect(result.row).toMatchObject({ creditsUsed: 15 });
    });

    it('replaces every field with the unlock payload', async () => {
      const gateway = makeGateway(
        makePerson(),
        {
          id: 'person-1',
          first_name: 'Janet',
          email: 'janet@newco.test',
          mobile_phone_status: 'verified',
          mobile_phone_number: '+1 555 0199',
        },
      );

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(result.row).toMatchObject({
        firstName: 'Janet',
        lastName: '',
        corporateEmail: 'janet@newco.test',
        companyName: '',
        verifiedMobilePhone: '+1 555 0199',
      });
    });

    it('charges for an unlocked number even when it is not verified', async () => {
      const gateway = makeGateway(
        makePerson(),
        makePerson({ mobile_phone_status: 'unlocked', mobile_phone_number: '+1 555 0199' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(result.creditsSpent).toBe(1);
      expect(result.row).toMatchObject({ verifiedMobilePhone: '', mobileStatus: 'unlocked' });
    });

    it('keeps stage-1 fields and charges nothing when unlock returns no number', async () => {
      const gateway = makeGateway(
        makePerson(),
        makePerson({ first_name: 'Changed', mobile_phone_status: 'no_phone' }),
      );

      const result = await enrichProfile(gateway, JANE_URL, 3);

      expect(result.creditsSpent).toBe(3);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'no_number' });
      expect(result.row).toMatchObject({
        firstName: 'Jane',
        mobileStatus: 'unavailable',
        verifiedMobilePhone: '',
        creditsUsed: 3,
      });
    });

    it('does not charge when the unlock number is a boolean', async () => {
      const gateway = makeGateway(makePerson(), { id: 'person-1', mobile_phone_number: false });

      const result = await enrichProfile(gateway, JANE_URL, 2);

      expect(result.creditsSpent).toBe(2);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'no_number' });
      expect(result.row).toMatchObject({
        firstName: 'Jane',
        companyName: 'Acme',
        mobileStatus: 'unavailable',
        verifiedMobilePhone: '',
        creditsUsed: 2,
      });
    });

    it('keeps stage-1 fields and logs a warning when the unlock call fails', async () => {
      const gateway = makeGateway(makePerson(), null);

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(result.creditsSpent).toBe(0);
      expect(result.outcome).toEqual({ kind: 'matched', unlock: 'failed' });
      expect(result.row).toMatchObject({ firstName: 'Jane', mobileStatus: 'unavailable' });
      expect(logger.warn).toHaveBeenCalledWith(
        'Mobile unlock request failed or returned no person',
        { personId: 'person-1' },
      );
    });

    it('attempts an unlock when the stage-1 status is missing', async () => {
      const gateway = makeGateway(makePerson({ mobile_phone_status: undefined }), null);

      const result = await enrichProfile(gateway, JANE_URL, 0);

      expect(gateway.unlockMobile).toHaveBeenCalledWith('person-1');
      expect(result.row).toMatchObject({ mobileStatus: '' });
    });
  });
});
