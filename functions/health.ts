import { getHeaders } from './utils/cors-headers.js';
import { getAppContext, type ContextResolver } from './utils/context.js';
import { internalError, jsonResponse, methodNotAllowed, preflightResponse } from './utils/http.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

const connectionLabel = (reachable: boolean): string => (reachable ? 'connected' : 'disconnected');

/**
 * Connectivity report for the database and the blob store.
 * Answers 503 when either one is unreachable.
 */
export function createHealthHandler(resolveContext: ContextResolver = getAppContext) {
  return async function handler(event: NetlifyEvent): Promise<NetlifyResponse> {
    const headers = getHeaders(event);

    if (event.httpMethod === 'OPTIONS') {
      return preflightResponse(headers);
    }

    if (event.httpMethod !== 'GET') {
      return methodNotAllowed(headers);
    }

    try {
      const { health } = resolveContext();
      const [database, storage] = await Promise.all([health.database(), health.storage()]);
      const healthy = database && storage;

      if (!healthy) {
        console.warn('health: Degraded:', { database, storage });
      }

      return jsonResponse(healthy ? 200 : 503, headers, {
        status: healthy ? 'healthy' : 'degraded',
        database: connectionLabel(database),
        storage: connectionLabel(storage),
      });
    } catch (error) {
      console.error('health: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createHealthHandler();
