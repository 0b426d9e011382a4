import { getHeaders } from './utils/cors-headers.js';
import { getAppContext, type ContextResolver } from './utils/context.js';
import {
  badRequest,
  errorResponse,
  internalError,
  jsonResponse,
  methodNotAllowed,
  parseJsonBody,
  preflightResponse,
} from './utils/http.js';
import { readPassword, sanitizeEmail } from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export function createLoginHandler(resolveContext: ContextResolver = getAppContext) {
  return async function handler(event: NetlifyEvent): Promise<NetlifyResponse> {
    const headers = getHeaders(event, true);

    if (event.httpMethod === 'OPTIONS') {
      return preflightResponse(headers);
    }

    if (event.httpMethod !== 'POST') {
      return methodNotAllowed(headers);
    }

    try {
      const body = parseJsonBody(event);
      if (!body) {
        return badRequest(headers, 'Invalid JSON payload');
      }

      const email = sanitizeEmail(body.email);
      const password = readPassword(body.password);

      if (!email || !password) {
        return badRequest(headers, 'Email and password are required');
      }

      const { accounts } = resolveContext();
      const result = await accounts.login(email, password);

      if (!result.success) {
        return errorResponse(headers, result.error);
      }

      return jsonResponse(200, headers, {
        success: true,
        accessToken: result.data.accessToken,
        tokenType: result.data.tokenType,
        expiresAt: result.data.expiresAt.toISOString(),
      });
    } catch (error) {
      console.error('auth-login: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createLoginHandler();
