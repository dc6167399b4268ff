/**
 * Keeps the first `visibleStart` and last `visibleEnd` characters of a key and
 * stars out the rest, with at least three stars. Keys too short to keep any
 * characters are starred out in full.
 */
export function maskSecret(value: string | undefined, visibleStart = 2, visibleEnd = 2): string {
  if (!value) return '(not set)';
  const hidden = value.length - visibleStart - visibleEnd;
  if (hidden <= 0) return '*'.repeat(Math.max(3, value.length));
  const start = value.slice(0, visibleStart);
  const end = value.slice(value.length - visibleEnd);
  return `${start}${'*'.repeat(Math.max(3, hidden))}${end}`;
}
