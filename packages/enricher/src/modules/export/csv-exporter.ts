import { writeFile } from 'fs/promises';
import { ExportError } from '../../shared/errors';
import { errorMessage } from '../../shared/logger';
import type { EnrichmentRow } from '../enrichment/enrichment.service';

type ExportedField =
  | 'firstName'
  | 'lastName'
  | 'jobTitle'
  | 'companyName'
  | 'companyWebsite'
  | 'companyIndustry'
  | 'corporateEmail'
  | 'verifiedMobilePhone'
  | 'linkedinUrl'
  | 'mobileStatus'
  | 'personId'
  | 'creditsUsed';

// Column order of the exported file
export const EXPORT_COLUMNS: ReadonlyArray<{ header: string; field: ExportedField }> = [
  { header: 'First Name', field: 'firstName' },
  { header: 'Last Name', field: 'lastName' },
  { header: 'Job Title', field: 'jobTitle' },
  { header: 'Company Name', field: 'companyName' },
  { header: 'Company Website', field: 'companyWebsite' },
  { header: 'Company Industry', field: 'companyIndustry' },
  { header: 'Verified Corporate Email', field: 'corporateEmail' },
  { header: 'Verified Mobile Phone Number', field: 'verifiedMobilePhone' },
  { header: 'LinkedIn URL', field: 'linkedinUrl' },
  { header: 'Mobile Phone Status (Raw)', field: 'mobileStatus' },
  { header: 'Apollo Person ID', field: 'personId' },
  { header: 'Simulated Credits Used', field: 'creditsUsed' },
];

/**
 * Escapes a CSV field value per RFC 4180.
 * Fields containing commas, double quotes, or newlines are wrapped in double quotes.
 * Double quotes within fields are escaped by doubling them.
 */
export function escapeCSVField(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function fieldValue(row: EnrichmentRow, field: ExportedField): string {
  if (row.status !== 'Matched') {
    return field === 'linkedinUrl' ? row.linkedinUrl : '';
  }
  return String(row[field]);
}

/**
 * Converts a row to a CSV line in export column order.
 * Unmatched rows only fill the LinkedIn URL column.
 */
export function rowToCSVLine(row: EnrichmentRow): string {
  return EXPORT_COLUMNS.map(({ field }) => escapeCSVField(fieldValue(row, field))).join(',');
}

/** Renders the header line and every row, newline-terminated. */
export function rowsToCsv(rows: readonly EnrichmentRow[]): string {
  const lines = [
    EXPORT_COLUMNS.map(({ header }) => escapeCSVField(header)).join(','),
    ...rows.map(rowToCSVLine),
  ];
  return lines.join('\n') + '\n';
}

/** Writes the rows to `filePath` as CSV, replacing any existing file. */
export async function exportRowsToCsv(
  rows: readonly EnrichmentRow[],
  filePath: string,
): Promise<void> {
  try {
    await writeFile(filePath, rowsToCsv(rows), 'utf8');
  } catch (err) {
    throw new ExportError(`Failed to write ${filePath}: ${errorMessage(err)}`);
  }
}
