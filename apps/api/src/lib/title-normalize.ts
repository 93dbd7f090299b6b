/**
 * Normalize a title for matching and cache keys:
 * - normalize Unicode (NFKC)
 * - drop zero-width/bidi marks, collapse whitespace
 * - fold curly quotes and dashes
 */
export function normalizeTitleForMatching(raw: string): string {
  let s = (raw ?? '').trim();
  if (!s) return '';

  s = s.normalize('NFKC');

  s = s
    .replace(/\u00a0/g, ' ') // nbsp
    .replace(/[\u200b-\u200f\u202a-\u202e]/g, '') // zero-width + bidi marks
    .replace(/\s+/g, ' ')
    .replace(/[\u2018\u2019\u02bc]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .replace(/[\u2013\u2014]/g, '-')
    .trim();

  return s;
}

/** Case-folded form used to decide whether two titles are "the same" within one run. */
export function titleKey(raw: string): string {
  return normalizeTitleForMatching(raw).toLocaleLowerCase('en-US');
}

export function buildTitleQueryVariants(title: string): string[] {
  const base = normalizeTitleForMatching(title);
  if (!base) return [];

  const variants: string[] = [];
  const push = (v: string) => {
    const t = v.replace(/\s+/g, ' ').trim();
    if (t && !variants.includes(t)) variants.push(t);
  };

  push(base);
  // "Show (2019)" style names carry the year in the title on some servers.
  push(base.replace(/\s*\((?:19|20)\d{2}\)\s*$/, ''));
  push(base.replace(/\u00b7/g, ' '));
  push(base.replace(/[-\u2013\u2014:]/g, ' '));
  push(base.replace(/[^\p{L}\p{N}\s]/gu, ' '));

  return variants.slice(0, 4);
}
