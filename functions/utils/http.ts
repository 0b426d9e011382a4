/**
 * Response and request helpers shared by the function handlers
 */

import type { ErrorCode, ServiceError } from '../services/result.js';
import type { NetlifyEvent, NetlifyResponse } from '../types.js';

const STATUS_BY_ERROR: Record<ErrorCode, number> = {
  Conflict: 400,
  NotFound: 404,
  InvalidCredentials: 401,
  NotVerified: 403,
  Deactivated: 403,
  AlreadyVerified: 400,
  NoOtpPending: 400,
  Expired: 400,
  InvalidCode: 400,
  Unauthenticated: 401,
  ValidationFailed: 400,
  UpstreamFailure: 502,
};

export function statusForError(code: ErrorCode): number {
  return STATUS_BY_ERROR[code];
}

export function jsonResponse(statusCode: number, headers: Record<string, string>, body: unknown): NetlifyResponse {
  return {
    statusCode,
    headers: { ...headers, 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function preflightResponse(headers: Record<string, string>): NetlifyResponse {
  return { statusCode: 200, headers, body: '' };
}

export function methodNotAllowed(headers: Record<string, string>): NetlifyResponse {
  return jsonResponse(405, headers, { success: false, error: 'Method not allowed' });
}

export function badRequest(headers: Record<string, string>, message: string): NetlifyResponse {
  return jsonResponse(400, headers, { success: false, error: message, code: 'ValidationFailed' });
}

export function errorResponse(headers: Record<string, string>, error: ServiceError): NetlifyResponse {
  return jsonResponse(statusForError(error.code), headers, {
    success: false,
    error: error.message,
    code: error.code,
  });
}

export function internalError(headers: Record<string, string>): NetlifyResponse {
  return jsonResponse(500, headers, { success: false, error: 'Internal server error' });
}

export function unauthenticated(headers: Record<string, string>, message: string = 'Authentication required'): NetlifyResponse {
  return errorResponse(headers, { code: 'Unauthenticated', message });
}

export type JsonBody = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the event body as a JSON object. Returns null on invalid JSON or a
 * non-object payload.
 */
export function parseJsonBody(event: NetlifyEvent): JsonBody | null {
  const raw = event.isBase64Encoded && event.body
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  try {
    const parsed: unknown = JSON.parse(raw || '{}');
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Raw request body as bytes (Netlify base64-encodes binary payloads)
 */
export function readBinaryBody(event: NetlifyEvent): Buffer {
  if (!event.body) return Buffer.alloc(0);
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64') : Buffer.from(event.body, 'utf8');
}

export function getHeader(event: NetlifyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const entry = Object.entries(event.headers).find(([key]) => key.toLowerCase() === wanted);
  return entry?.[1];
}
