export function toNumber(value: unknown): number | null {
  if (typeof value === 'string' && !value.trim()) return null;
  if (typeof value !== 'number' && typeof value !== 'string') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

// "1995", "1995-12-15", "2010–2014"
export function parseYear(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  if (typeof value !== 'string') return null;
  const match = value.match(/^\s*(\d{4})/);
  return match ? Number(match[1]) : null;
}

// "1,234,567"
export function parseVotes(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const digits = value.replace(/,/g, '').trim();
  return /^\d+$/.test(digits) ? Number(digits) : null;
}

/**
 * Reads a provider-formatted score: "89%" is out of 100, "7.9/10" carries its
 * own scale. "N/A" and anything unrecognised yield null.
 */
export function parseRatingText(text: string): { value: number; max: number } | null {
  const trimmed = text.trim();
  if (!trimmed || trimmed.toUpperCase() === 'N/A') return null;

  if (trimmed.endsWith('%')) {
    const value = toNumber(trimmed.slice(0, -1).trim());
    return value === null ? null : { value, max: 100 };
  }

  const parts = trimmed.split('/');
  if (parts.length === 2) {
    const value = toNumber(parts[0].trim());
    const max = toNumber(parts[1].trim());
    return value === null || max === null ? null : { value, max };
  }

  return null;
}
