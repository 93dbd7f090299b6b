import type { NextFunction, Request, Response } from 'express';

export const NEWSLETTER_PREVIEW_PATH = '/api/newsletter/preview';

// JSON endpoints never render anything.
const API_CSP = ["default-src 'none'", "frame-ancestors 'none'", "base-uri 'none'"].join('; ');

// Rendered newsletters: remote poster images and inline styles only, never script.
const PREVIEW_CSP = [
  "default-src 'none'",
  'img-src https: http:',
  "style-src 'unsafe-inline'",
  "base-uri 'none'",
  "form-action 'none'",
  "frame-ancestors 'none'",
].join('; ');

const CORE_SECURITY_HEADERS: ReadonlyArray<readonly [string, string]> = [
  ['X-Content-Type-Options', 'nosniff'],
  ['X-Frame-Options', 'DENY'],
  ['Referrer-Policy', 'no-referrer'],
  ['Permissions-Policy', 'camera=(), microphone=(), geolocation=(), payment=(), usb=()'],
  ['Cross-Origin-Opener-Policy', 'same-origin'],
  ['Cross-Origin-Resource-Policy', 'same-origin'],
];

function getRequestPath(req: Request): string {
  const raw = req.originalUrl || req.url || '';
  return raw.split('?')[0] || '';
}

export function securityHeadersMiddleware(req: Request, res: Response, next: NextFunction) {
  const path = getRequestPath(req);
  for (const [headerName, headerValue] of CORE_SECURITY_HEADERS) {
    res.setHeader(headerName, headerValue);
  }

  // Swagger UI depends on inline assets.
  if (!path.startsWith('/api/docs')) {
    res.setHeader('Content-Security-Policy', path === NEWSLETTER_PREVIEW_PATH ? PREVIEW_CSP : API_CSP);
  }

  if (process.env.NODE_ENV === 'production' && req.secure) {
    res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  }

  next();
}
