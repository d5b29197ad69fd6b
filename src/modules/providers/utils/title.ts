/**
 * Title used for a fallback search: drops "(1995)" and other parenthetical
 * annotations, then collapses every run of non-alphanumerics to one space.
 */
export function sanitizeTitle(title: string): string {
  return title
    .replace(/\s*\(\d{4}\)/g, '')
    .replace(/\s*\([^)]*\)/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

// comparison key: case, accents, spacing and punctuation ignored
export function normalizeTitle(input: string): string {
  return input
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .replace(/[^\p{L}\p{N}]+/gu, '');
}
