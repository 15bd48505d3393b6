/**
 * Response header parsing
 */

export const DEFAULT_FILENAME = 'document.pdf';

const FILENAME_PATTERN = /filename="?([^";\n]+)"?/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer header value. Absent or malformed values yield 0.
 */
export function parseIntegerHeader(value: string | null): number {
  if (value === null || !INTEGER_PATTERN.test(value)) {
    return 0;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

/**
 * Extract the filename from a Content-Disposition header
 */
export function parseFilename(contentDisposition: string | null): string {
  if (!contentDisposition) {
    return DEFAULT_FILENAME;
  }
  return FILENAME_PATTERN.exec(contentDisposition)?.[1] ?? DEFAULT_FILENAME;
}
