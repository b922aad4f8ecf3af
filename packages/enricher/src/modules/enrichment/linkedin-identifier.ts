const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Returns the path segment after `/in/` (e.g. `jane-doe` for
 * `https://www.linkedin.com/in/jane-doe/`), or null when the URL cannot be
 * parsed or has no such segment. Never throws.
 *
 * Input without a scheme (`linkedin.com/in/jane-doe`) is read as https.
 */
export function parseLinkedInIdentifier(url: string): string | null {
  const trimmed = url.trim();
  if (trimmed === '') return null;

  let pathname: string;
  try {
    pathname = new URL(SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`).pathname;
  } catch {
    return null;
  }

  const parts = pathname.split('/').filter((p) => p !== '');
  const inIndex = parts.indexOf('in');
  if (inIndex === -1 || inIndex + 1 >= parts.length) return null;

  return parts[inIndex + 1];
}
