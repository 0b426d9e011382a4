/**
 * CORS and Security Headers Utility
 *
 * Provides CORS configuration and security headers for the Netlify Functions
 */

import type { NetlifyEvent } from '../types.js';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://localhost:8888', // Netlify dev
];

/**
 * Production origins come from ALLOWED_ORIGINS (comma separated).
 * Outside production the localhost dev servers are allowed as well.
 */
function getAllowedOrigin(origin: string | undefined): string {
  const isProduction = process.env.NODE_ENV === 'production';
  const allowedOrigins = (process.env.ALLOWED_ORIGINS ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (!isProduction) {
    allowedOrigins.push(...DEV_ORIGINS);
  }

  if (origin && allowedOrigins.includes(origin)) {
    return origin;
  }

  if (!isProduction) {
    return origin || '*';
  }

  return allowedOrigins[0] || '*';
}

export function getCorsHeaders(event: NetlifyEvent, allowCredentials: boolean = false): Record<string, string> {
  const origin = event.headers.origin ?? event.headers.Origin;
  const allowedOrigin = getAllowedOrigin(origin);

  const headers: Record<string, string> = {
    'Access-Control-Allow-Origin': allowedOrigin,
    'Access-Control-Allow-Headers': 'Content-Type, Authorization, X-Filename',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  };

  // Credentials are never combined with a wildcard origin
  if (allowCredentials && allowedOrigin !== '*') {
    headers['Access-Control-Allow-Credentials'] = 'true';
  }

  return headers;
}

export function getSecurityHeaders(): Record<string, string> {
  return {
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
    'Strict-Transport-Security': 'max-age=31536000; includeSubDomains; preload',
    'Content-Security-Policy': "default-src 'none'",
    'Cache-Control': 'no-store',
  };
}

export function getHeaders(event: NetlifyEvent, allowCredentials: boolean = false): Record<string, string> {
  return {
    ...getCorsHeaders(event, allowCredentials),
    ...getSecurityHeaders(),
  };
}
