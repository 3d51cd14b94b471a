import type { Request } from 'express';

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Extract the client IP address from a request, considering proxies.
 *
 * Order: first hop of X-Forwarded-For, then X-Real-IP, then the socket peer.
 */
export function getClientIp(req: Pick<Request, 'headers' | 'socket'>): string {
  const forwardedFor = firstHeaderValue(req.headers['x-forwarded-for']);
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0]?.trim();
    if (first) {
      return first;
    }
  }

  const realIp = firstHeaderValue(req.headers['x-real-ip'])?.trim();
  if (realIp) {
    return realIp;
  }

  return req.socket?.remoteAddress || 'unknown';
}
