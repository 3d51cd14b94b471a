import { Request, Response, NextFunction } from 'express';

/**
 * Headers set on every response
 */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
  'Strict-Transport-Security': 'max-age=31536000; includeSubDomains',
  'Content-Security-Policy': "default-src 'self'",
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'Permissions-Policy': 'geolocation=(), microphone=(), camera=()',
};

/**
 * Headers added to extraction responses so results are never cached
 */
export const NO_CACHE_HEADERS: Readonly<Record<string, string>> = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  'Pragma': 'no-cache',
  'Expires': '0',
};

// Swagger UI bootstraps with inline script and style
const DOCS_CSP = "default-src 'self'; script-src 'self' 'unsafe-inline'; style-src 'self' 'unsafe-inline'; img-src 'self' data:";

// ReDoc loads its bundle from the CDN and runs it in a worker
export const REDOC_CSP = "default-src 'self'; script-src 'self' https://cdn.jsdelivr.net; style-src 'self' 'unsafe-inline' https://fonts.googleapis.com; font-src 'self' https://fonts.gstatic.com; img-src 'self' data: https://cdn.redoc.ly; worker-src 'self' blob:";

/**
 * Security headers middleware
 * Registered before routing so error responses carry the headers too.
 */
export function securityHeadersMiddleware(req: Request, res: Response, next: NextFunction): void {
  for (const [header, value] of Object.entries(SECURITY_HEADERS)) {
    res.setHeader(header, value);
  }

  if (req.path === '/docs' || req.path.startsWith('/docs/')) {
    res.setHeader('Content-Security-Policy', DOCS_CSP);
  } else if (req.path === '/redoc') {
    res.setHeader('Content-Security-Policy', REDOC_CSP);
  }

  next();
}

export function noCacheMiddleware(_req: Request, res: Response, next: NextFunction): void {
  for (const [header, value] of Object.entries(NO_CACHE_HEADERS)) {
    res.setHeader(header, value);
  }
  next();
}
