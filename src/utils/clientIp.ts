import type { IncomingHttpHeaders } from 'http';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolve the originating client address behind a reverse proxy.
 *
 * Priority: x-real-ip, first x-forwarded-for entry, socket address.
 * Without a trusted proxy in front the headers are client-controlled, so
 * only the socket address counts.
 */
export function resolveClientIp(headers: IncomingHttpHeaders, remoteAddress?: string, trustProxy: boolean = true): string {
  if (!trustProxy) {
    return remoteAddress || 'unknown';
  }

  const realIp = firstHeader(headers['x-real-ip'])?.trim();
  if (realIp) {
    return realIp;
  }

  const forwardedFor = firstHeader(headers['x-forwarded-for']);
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0].trim();
    if (first) {
      return first;
    }
  }

  return remoteAddress || 'unknown';
}
