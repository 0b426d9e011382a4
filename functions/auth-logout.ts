import { getHeaders } from './utils/cors-headers.js';
import { getAppContext, type ContextResolver } from './utils/context.js';
import {
  errorResponse,
  internalError,
  jsonResponse,
  methodNotAllowed,
  preflightResponse,
  unauthenticated,
} from './utils/http.js';
import { extractBearerToken } from './utils/jwt.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export function createLogoutHandler(resolveContext: ContextResolver = getAppContext) {
  return async function handler(event: NetlifyEvent): Promise<NetlifyResponse> {
    const headers = getHeaders(event, true);

    if (event.httpMethod === 'OPTIONS') {
      return preflightResponse(headers);
    }

    if (event.httpMethod !== 'POST') {
      return methodNotAllowed(headers);
    }

    try {
      const token = extractBearerToken(event.headers);
      if (!token) {
        return unauthenticated(headers);
      }

      const { accounts } = resolveContext();
      const result = await accounts.authenticate(token);

      if (!result.success) {
        return errorResponse(headers, result.error);
      }

      // Tokens are stateless; the client is expected to discard it
      const { id, username, email } = result.data;
      return jsonResponse(200, headers, {
        success: true,
        message: 'Logged out successfully. Please delete the token from client side.',
        user: { id, username, email },
      });
    } catch (error) {
      console.error('auth-logout: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createLogoutHandler();
