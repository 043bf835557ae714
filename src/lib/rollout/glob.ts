function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Desktop group filters are wildcard globs (`*`, `?`), matched against the whole name,
 * case-insensitively.
 */
export function globToRegExp(glob: string): RegExp {
  let out = '';
  for (const ch of glob) {
    if (ch === '*') out += '.*';
    else if (ch === '?') out += '.';
    else out += escapeRegExp(ch);
  }
  return new RegExp(`^${out}$`, 'i');
}

export function matchesGlob(glob: string, value: string | null): boolean {
  const trimmed = glob.trim();
  if (trimmed === '' || trimmed === '*') return true;
  if (value === null) return false;
  return globToRegExp(trimmed).test(value);
}
