/**
 * Format a millisecond timestamp in UTC
 * Example: 1700000000000 → "2023-11-14 22:13:20 UTC"
 */
export function formatTimestamp(ms: number | null | undefined): string {
  if (ms === null || ms === undefined) return '-';
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Render the boolean-ish flags servers return (true/false or 1/0)
 */
export function formatFlag(value: boolean | number | null | undefined): string {
  return value === true || (typeof value === 'number' && value !== 0) ? 'yes' : 'no';
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Show only the first and last few characters of a secret
 * Example: "syt_abcdefghijkl" → "syt_…ijkl"
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) return '*'.repeat(secret.length);
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
