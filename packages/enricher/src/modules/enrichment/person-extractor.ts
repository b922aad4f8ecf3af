import type { PersonPayload } from './adapters/types';

/** Normalized person fields, every one defaulting to an empty string. */
export interface PersonRecord {
  firstName: string;
  lastName: string;
  jobTitle: string;
  companyName: string;
  companyWebsite: string;
  companyIndustry: string;
  corporateEmail: string;
  /** Only set when `mobileStatus` is exactly `verified`. */
  verifiedMobilePhone: string;
  linkedinUrl: string;
  mobileStatus: string;
  personId: string;
}

/** Closed classification of the raw `mobile_phone_status` value. */
export type MobileStatusKind = 'verified' | 'unlocked' | 'locked';

export function classifyMobileStatus(rawStatus: string): MobileStatusKind {
  switch (rawStatus) {
    case 'verified':
      return 'verified';
    case 'unlocked':
      return 'unlocked';
    default:
      return 'locked';
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/** Mobile number carried by a payload, or an empty string. Only strings and numbers count. */
export function readMobileNumber(person: PersonPayload): string {
  const value = person['mobile_phone_number'];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Maps a person payload onto the fixed output fields.
 * Pure and total: missing, null or non-scalar values become ''.
 */
export function extractPersonRecord(person: PersonPayload): PersonRecord {
  const rawOrganization = person['organization'];
  const organization = isObject(rawOrganization) ? rawOrganization : {};
  const mobileStatus = readString(person, 'mobile_phone_status');
  const mobileNumber = readMobileNumber(person);

  return {
    firstName: readString(person, 'first_name'),
    lastName: readString(person, 'last_name'),
    jobTitle: readString(person, 'title'),

    companyName: readString(organization, 'name'),
    companyWebsite: readString(organization, 'website_url'),
    companyIndustry: readString(organization, 'industry'),

    corporateEmail: readString(person, 'email'),
    verifiedMobilePhone: classifyMobileStatus(mobileStatus) === 'verified' ? mobileNumber : '',
    linkedinUrl: readString(person, 'linkedin_url'),
    mobileStatus,
    personId: readString(person, 'id'),
  };
}
