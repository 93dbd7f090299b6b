import { isAbsolute, relative, resolve, sep } from 'node:path';
import { PathTraversalError } from './newsletter.errors';

export const LENGTH_LIMITS = {
  title: 200,
  synopsis: 300,
  label: 500,
  text: 10_000,
  url: 2_048,
  email: 254,
} as const;

export type ContentClass = keyof typeof LENGTH_LIMITS;

const ELLIPSIS = '…';
const MAX_DEPTH = 32;

// NUL and C0/C1 controls except \t \n \r.
const CONTROL_CHARS_RE = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f-\u009f]/g;

const DANGEROUS_PATTERNS: readonly RegExp[] = [
  /<\s*\/?\s*script/gi,
  /(?:java|vb)script\s*:/gi,
  /\bdata\s*:(?=\s*[\w.+-]+\/)/gi,
  /\bon[a-z]+\s*=/gi,
];

// An "&" that does not already open a character reference.
const BARE_AMPERSAND_RE =
  /&(?!(?:[a-zA-Z][a-zA-Z0-9]{1,31}|#[0-9]{1,7}|#[xX][0-9a-fA-F]{1,6});)/g;

const ALLOWED_URL_PROTOCOLS = new Set(['http:', 'https:', 'mailto:']);

const EMAIL_RE =
  /^[A-Za-z0-9_%+-](?:[A-Za-z0-9._%+-]{0,62}[A-Za-z0-9_%+-])?@(?:[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?\.)+[A-Za-z]{2,63}$/;

const BLOCKED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : '';
  }
  return '';
}

function stripDangerous(input: string): string {
  let out = input;
  let previous: string;
  do {
    previous = out;
    for (const pattern of DANGEROUS_PATTERNS) out = out.replace(pattern, '');
  } while (out !== previous);
  return out;
}

/**
 * Escape for an HTML text node or quoted attribute. Existing character references are
 * left intact, so escaping twice gives the same result as escaping once.
 */
export function escapeText(value: unknown): string {
  const cleaned = stripDangerous(toText(value).replace(CONTROL_CHARS_RE, ''));
  return cleaned
    .replace(BARE_AMPERSAND_RE, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Full attribute encoding for validated URLs: every "&" is encoded. */
export function encodeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function clampLength(value: unknown, maxLen: number = LENGTH_LIMITS.text): string {
  const text = toText(value);
  const limit = Number.isFinite(maxLen) ? Math.max(0, Math.trunc(maxLen)) : LENGTH_LIMITS.text;
  if (text.length <= limit) return text;

  // Count code points so a surrogate pair is never split.
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  if (limit === 0) return '';
  return `${chars.slice(0, limit - 1).join('')}${ELLIPSIS}`;
}

export function validateUrl(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const url = value.trim();
  if (!url || url.length > LENGTH_LIMITS.url) return null;
  // Browsers drop tabs/newlines inside schemes ("java\nscript:"); refuse them outright.
  if (/[\s\u0000-\u001f\u007f]/.test(url)) return null;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!ALLOWED_URL_PROTOCOLS.has(parsed.protocol)) return null;
  if (parsed.username || parsed.password) return null;
  return url;
}

export function validateEmail(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const email = value.trim();
  if (!email || email.length > LENGTH_LIMITS.email) return null;
  if (email.includes('..')) return null;
  return EMAIL_RE.test(email) ? email : null;
}

/**
 * Resolve `requestedPath` under `allowedRoot`; the result must be a strict descendant of the root.
 */
export function sanitizePath(requestedPath: string, allowedRoot: string): string {
  if (!requestedPath || !requestedPath.trim() || requestedPath.includes('\0')) {
    throw new PathTraversalError(requestedPath.replace(/\0/g, '\\0'));
  }
  const root = resolve(allowedRoot);
  const resolved = resolve(root, requestedPath);
  const rel = relative(root, resolved);
  if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new PathTraversalError(requestedPath);
  }
  return resolved;
}

/** Plain text safe for a mail header: no control characters or line breaks. */
export function toHeaderText(value: unknown, maxLen: number = LENGTH_LIMITS.title): string {
  const flat = toText(value)
    .replace(/[\r\n\t]+/g, ' ')
    .replace(CONTROL_CHARS_RE, '')
    .replace(/\s+/g, ' ')
    .trim();
  return clampLength(flat, maxLen);
}

/**
 * Values the renderer may emit as-is. Handlebars calls `toHTML()` instead of escaping
 * again; anything that is not one of these gets the engine's own escaping.
 */
export abstract class SanitizedField {
  protected constructor(protected readonly encoded: string) {}

  toHTML(): string {
    return this.encoded;
  }

  toString(): string {
    return this.encoded;
  }

  toJSON(): string {
    return this.encoded;
  }
}

export class SanitizedText extends SanitizedField {
  static from(value: unknown, contentClass: ContentClass = 'text'): SanitizedText | null {
    const escaped = escapeText(clampLength(value, LENGTH_LIMITS[contentClass]));
    return escaped ? new SanitizedText(escaped) : null;
  }
}

export class SanitizedUrl extends SanitizedField {
  private constructor(readonly url: string) {
    super(encodeAttribute(url));
  }

  static from(value: unknown): SanitizedUrl | null {
    const url = validateUrl(value);
    return url === null ? null : new SanitizedUrl(url);
  }
}

export class SanitizedEmail extends SanitizedField {
  private constructor(readonly address: string) {
    super(encodeAttribute(address));
  }

  static from(value: unknown): SanitizedEmail | null {
    const address = validateEmail(value);
    return address === null ? null : new SanitizedEmail(address);
  }
}

export type SanitizedNode =
  | SanitizedField
  | number
  | boolean
  | null
  | SanitizedNode[]
  | { [key: string]: SanitizedNode };

export type SanitizedContext = { [key: string]: SanitizedNode };

type LeafKind = 'url' | 'email' | ContentClass;

export function classifyKey(key: string | undefined): LeafKind {
  if (!key) return 'text';
  if (/(^|_)url$|Url$|^href$|^src$/.test(key)) return 'url';
  if (/(^|_)email$|Email$/.test(key)) return 'email';
  if (/synopsis|overview|description/i.test(key)) return 'synopsis';
  if (/(^|_)(name|title)$|(Name|Title)$/.test(key)) return 'title';
  if (/(^|_)label$|Label$/.test(key)) return 'label';
  return 'text';
}

function sanitizeLeaf(value: unknown, key: string | undefined): SanitizedNode {
  const kind = classifyKey(key);
  if (kind === 'url') return SanitizedUrl.from(value);
  if (kind === 'email') return SanitizedEmail.from(value);
  return SanitizedText.from(value, kind);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sanitizeNode(value: unknown, key: string | undefined, depth: number): SanitizedNode {
  if (depth > MAX_DEPTH) return null;
  if (value === null || value === undefined) return null;
  if (value instanceof SanitizedField) return value;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' || typeof value === 'bigint' || value instanceof Date) {
    return sanitizeLeaf(value, key);
  }
  if (Array.isArray(value)) {
    // Array elements inherit the classification of the key that holds the array.
    return value.map((item) => sanitizeNode(item, key, depth + 1));
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: SanitizedNode } = {};
    for (const [k, v] of Object.entries(value)) {
      if (BLOCKED_KEYS.has(k)) continue;
      out[k] = sanitizeNode(v, k, depth + 1);
    }
    return out;
  }
  return null;
}

/**
 * Sanitize every leaf of a nested structure: URL-class keys are validated, e-mail keys
 * checked, all other strings clamped then escaped. Unknown object kinds become null.
 */
export function deepSanitize(value: Record<string, unknown>): SanitizedContext {
  const out: SanitizedContext = {};
  for (const [k, v] of Object.entries(value)) {
    if (BLOCKED_KEYS.has(k)) continue;
    out[k] = sanitizeNode(v, k, 1);
  }
  return out;
}
