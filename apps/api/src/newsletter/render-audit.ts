export type AuditRule =
  | 'forbidden-tag'
  | 'inline-handler'
  | 'unsafe-url'
  | 'javascript-scheme';

export type AuditFinding = {
  rule: AuditRule;
  excerpt: string;
};

export type AuditReport = {
  passed: boolean;
  findings: AuditFinding[];
};

const FORBIDDEN_TAG_RE = /<\s*\/?\s*(script|iframe|object|embed|form)\b[^>]*>?/gi;
const TAG_RE = /<[a-zA-Z][^>]*>/g;
const INLINE_HANDLER_RE = /[\s"'/]on[a-z]+\s*=/i;
const URL_ATTR_RE =
  /[\s"'/](href|src|action|formaction|background|poster|xlink:href)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/gi;
const JAVASCRIPT_RE = /javascript\s*:/i;
const SCHEME_RE = /^([a-z][a-z0-9+.-]*):/;
const SAFE_SCHEMES = new Set(['http', 'https', 'mailto']);
const EXCERPT_LEN = 120;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  colon: ':',
  tab: '\t',
  newline: '\n',
  sol: '/',
};

const excerpt = (s: string): string =>
  s.length > EXCERPT_LEN ? `${s.slice(0, EXCERPT_LEN)}…` : s;

function fromCodePoint(code: number): string {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : '';
}

/** Decode character references so obfuscated schemes (`&#106;avascript:`) are visible. */
export function decodeEntities(value: string): string {
  return value.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);?/g, (match, ref: string) => {
    if (ref.startsWith('#x') || ref.startsWith('#X')) return fromCodePoint(parseInt(ref.slice(2), 16));
    if (ref.startsWith('#')) return fromCodePoint(parseInt(ref.slice(1), 10));
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

function isUnsafeUrl(raw: string): boolean {
  // Browsers ignore whitespace and control characters inside a scheme.
  const decoded = decodeEntities(raw).replace(/[\u0000- \u007f]/g, '').toLowerCase();
  const scheme = SCHEME_RE.exec(decoded)?.[1];
  if (!scheme) return false;
  return !SAFE_SCHEMES.has(scheme);
}

/** Blank quoted attribute values so their contents are never read as attribute names. */
function withoutQuotedValues(tag: string): string {
  return tag.replace(/"[^"]*"|'[^']*'/g, '""');
}

/** Drop URL attributes whose value already passed the scheme check. */
function withoutSafeUrlAttributes(html: string): string {
  return html.replace(TAG_RE, (tag) =>
    tag.replace(URL_ATTR_RE, (attr: string, _name: string, dq?: string, sq?: string, bare?: string) =>
      isUnsafeUrl(dq ?? sq ?? bare ?? '') ? attr : ' ',
    ),
  );
}

/** Scan rendered HTML for anything that can execute script or submit data. */
export function auditHtml(html: string): AuditReport {
  const findings: AuditFinding[] = [];

  for (const m of html.matchAll(FORBIDDEN_TAG_RE)) {
    findings.push({ rule: 'forbidden-tag', excerpt: excerpt(m[0]) });
  }

  for (const m of html.matchAll(TAG_RE)) {
    const tag = m[0];
    if (INLINE_HANDLER_RE.test(withoutQuotedValues(tag))) {
      findings.push({ rule: 'inline-handler', excerpt: excerpt(tag) });
    }
    for (const attr of tag.matchAll(URL_ATTR_RE)) {
      const value = attr[2] ?? attr[3] ?? attr[4] ?? '';
      if (isUnsafeUrl(value)) {
        findings.push({ rule: 'unsafe-url', excerpt: excerpt(`${attr[1]}=${value}`) });
      }
    }
  }

  const scanned = withoutSafeUrlAttributes(html);
  const js = JAVASCRIPT_RE.exec(scanned);
  if (js) {
    const start = Math.max(0, js.index - 40);
    findings.push({ rule: 'javascript-scheme', excerpt: excerpt(scanned.slice(start, js.index + 40)) });
  }

  return { passed: findings.length === 0, findings };
}
