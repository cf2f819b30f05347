/**
 * Relevance predicates for observed log lines and console calls.
 * Pure functions; every comparison is case-insensitive.
 */

// ── Keyword sets ─────────────────────────────────────────────

export const DATALAYER_KEYWORDS = [
  'datalayer',
  'gtag',
  'google tag manager',
  'gtm',
  'ga(',
  'google-analytics',
  '_gaq',
  'datalayer.push',
] as const;

export const NETWORK_KEYWORDS = ['gtag', 'google-analytics', 'googletagmanager'] as const;

export const CONSOLE_API_KEYWORDS = ['datalayer', 'gtag'] as const;

// ── Predicates ───────────────────────────────────────────────

export function isDataLayerRelated(text: string | null | undefined): boolean {
  if (!text) return false;

  const lower = text.toLowerCase();
  if (containsAny(lower, DATALAYER_KEYWORDS)) return true;

  return lower.includes('event') && lower.includes('track');
}

export function isAnalyticsNetworkLine(text: string | null | undefined): boolean {
  if (!text) return false;
  return containsAny(text.toLowerCase(), NETWORK_KEYWORDS);
}

/** Match the first argument of a console-API call, whatever its type. */
export function matchesConsoleApiArgument(value: unknown): boolean {
  const text = stringifyArgument(value);
  if (!text) return false;
  return containsAny(text.toLowerCase(), CONSOLE_API_KEYWORDS);
}

// ── Helpers ──────────────────────────────────────────────────

function containsAny(lower: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => lower.includes(keyword));
}

export function stringifyArgument(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;

  try {
    const json = JSON.stringify(value);
    // JSON.stringify returns undefined for functions and symbols.
    return typeof json === 'string' ? json : String(value);
  } catch {
    // Cycles and bigints end up here; objects may lack a usable toString.
    return typeof value === 'object' ? Object.prototype.toString.call(value) : String(value);
  }
}
