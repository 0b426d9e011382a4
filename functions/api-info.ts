import { getHeaders } from './utils/cors-headers.js';
import { getAppContext, type ContextResolver } from './utils/context.js';
import { internalError, jsonResponse, methodNotAllowed, preflightResponse } from './utils/http.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export const API_VERSION = '1.0.0';

export const ENDPOINTS = {
  auth: '/auth',
  documents: '/documents',
  health: '/health',
} as const;

export function createApiInfoHandler(resolveContext: ContextResolver = getAppContext) {
  return async function handler(event: NetlifyEvent): Promise<NetlifyResponse> {
    const headers = getHeaders(event);

    if (event.httpMethod === 'OPTIONS') {
      return preflightResponse(headers);
    }

    if (event.httpMethod !== 'GET') {
      return methodNotAllowed(headers);
    }

    try {
      const { config } = resolveContext();
      return jsonResponse(200, headers, {
        message: `Welcome to ${config.appName} API`,
        status: 'running',
        version: API_VERSION,
        endpoints: ENDPOINTS,
      });
    } catch (error) {
      console.error('api-info: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createApiInfoHandler();
