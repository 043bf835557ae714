/**
 * Parses `true/false/1/0` (case-insensitive). Returns null for anything else.
 */
export function parseBooleanFlag(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1') return true;
  if (lower === 'false' || lower === '0') return false;
  return null;
}
