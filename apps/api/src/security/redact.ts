const SECRET_QUERY_PARAMS = [
  'api_key',
  'apiKey',
  'api_token',
  'X-Plex-Token',
  'x-plex-token',
  'X-Emby-Token',
  'x-emby-token',
  'token',
  'access_token',
];

const SECRET_QUERY_RE = new RegExp(
  `([?&](?:${SECRET_QUERY_PARAMS.join('|')})=)[^&#\\s]*`,
  'g',
);
const SECRET_HEADER_RE =
  /\b(X-(?:Plex|Emby)-Token|Authorization)(\s*[:=]\s*)(?:Bearer\s+|MediaBrowser\s+Token=)?"?[^\s",]+"?/gi;
const BEARER_RE = /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g;
const URL_CREDENTIALS_RE = /\b([a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+:[^/\s@]+@/gi;

/**
 * Scrub credentials from free text before it reaches a log line or an error message.
 * Also drops any explicitly known secret values (config tokens) wherever they appear.
 */
export function redactSecrets(text: string, knownSecrets: string[] = []): string {
  let out = text
    .replace(URL_CREDENTIALS_RE, '$1')
    .replace(SECRET_QUERY_RE, '$1REDACTED')
    .replace(SECRET_HEADER_RE, '$1$2REDACTED')
    .replace(BEARER_RE, 'Bearer REDACTED');

  for (const secret of knownSecrets) {
    const s = secret.trim();
    if (s.length < 4) continue;
    out = out.split(s).join('REDACTED');
  }
  return out;
}

export function sanitizeUrlForLogs(raw: string): string {
  try {
    const u = new URL(raw);
    u.username = '';
    u.password = '';
    for (const k of SECRET_QUERY_PARAMS) {
      if (u.searchParams.has(k)) u.searchParams.set(k, 'REDACTED');
    }
    return u.toString();
  } catch {
    return redactSecrets(raw);
  }
}
