import { DEFAULT_PAGE_SIZE } from './services/document-service.js';
import { getHeaders } from './utils/cors-headers.js';
import { getAppContext, type ContextResolver } from './utils/context.js';
import {
  badRequest,
  errorResponse,
  getHeader,
  internalError,
  jsonResponse,
  methodNotAllowed,
  preflightResponse,
  readBinaryBody,
  unauthenticated,
} from './utils/http.js';
import { extractBearerToken } from './utils/jwt.js';
import { sanitizeFilename } from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export type DocumentRoute =
  | { kind: 'collection' }
  | { kind: 'upload' }
  | { kind: 'item'; id: number }
  | { kind: 'download'; id: number }
  | { kind: 'unknown' };

// Document ids are Postgres INTEGER keys
const MAX_DOCUMENT_ID = 2147483647;

const ROUTE_PATTERN = /^\/(?:\.netlify\/functions\/)?documents(?:\/([^/]+))?(?:\/([^/]+))?\/?$/;

/**
 * Map a request path (public `/documents/...` or the raw function path) to a route
 */
export function parseDocumentRoute(path: string | undefined): DocumentRoute {
  const match = ROUTE_PATTERN.exec(path ?? '/documents');
  if (!match) return { kind: 'unknown' };

  const [, first, second] = match;
  if (!first) return { kind: 'collection' };
  if (first === 'upload' && !second) return { kind: 'upload' };

  if (!/^\d+$/.test(first)) return { kind: 'unknown' };
  const id = Number(first);
  if (id > MAX_DOCUMENT_ID) return { kind: 'unknown' };

  if (!second) return { kind: 'item', id };
  if (second === 'download') return { kind: 'download', id };
  return { kind: 'unknown' };
}

function readPaging(event: NetlifyEvent): { skip: number; limit: number } {
  const params = event.queryStringParameters ?? {};
  const skip = Number.parseInt(params.skip ?? '', 10);
  const limit = Number.parseInt(params.limit ?? '', 10);
  return {
    skip: Number.isNaN(skip) ? 0 : skip,
    limit: Number.isNaN(limit) ? DEFAULT_PAGE_SIZE : limit,
  };
}

function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7E]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export function createDocumentsHandler(resolveContext: ContextResolver = getAppContext) {
  return async function handler(event: NetlifyEvent): Promise<NetlifyResponse> {
    const headers = getHeaders(event, true);

    if (event.httpMethod === 'OPTIONS') {
      return preflightResponse(headers);
    }

    const route = parseDocumentRoute(event.path);
    if (route.kind === 'unknown') {
      return jsonResponse(404, headers, { success: false, error: 'Not Found' });
    }

    try {
      const token = extractBearerToken(event.headers);
      if (!token) {
        return unauthenticated(headers);
      }

      const { accounts, documents } = resolveContext();
      const auth = await accounts.authenticate(token);
      if (!auth.success) {
        return errorResponse(headers, auth.error);
      }
      const ownerId = auth.data.id;

      switch (route.kind) {
        case 'collection': {
          if (event.httpMethod !== 'GET') {
            return methodNotAllowed(headers);
          }

          const { skip, limit } = readPaging(event);
          const list = await documents.list(ownerId, skip, limit);
          return jsonResponse(200, headers, { success: true, documents: list });
        }

        case 'upload': {
          if (event.httpMethod !== 'POST') {
            return methodNotAllowed(headers);
          }

          const filename = sanitizeFilename(event.queryStringParameters?.filename ?? getHeader(event, 'x-filename'));
          if (!filename) {
            return badRequest(headers, 'A filename is required');
          }

          const contentType = (getHeader(event, 'content-type') ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
          const result = await documents.upload(ownerId, {
            filename,
            contentType,
            bytes: readBinaryBody(event),
          });

          if (!result.success) {
            return errorResponse(headers, result.error);
          }
          return jsonResponse(201, headers, { success: true, document: result.data });
        }

        case 'item': {
          if (event.httpMethod === 'GET') {
            const result = await documents.get(ownerId, route.id);
            return result.success
              ? jsonResponse(200, headers, { success: true, document: result.data })
              : errorResponse(headers, result.error);
          }

          if (event.httpMethod === 'DELETE') {
            const result = await documents.delete(ownerId, route.id);
            return result.success
              ? jsonResponse(200, headers, { success: true, message: 'Document deleted successfully' })
              : errorResponse(headers, result.error);
          }

          return methodNotAllowed(headers);
        }

        case 'download': {
          if (event.httpMethod !== 'GET') {
            return methodNotAllowed(headers);
          }

          const result = await documents.download(ownerId, route.id);
          if (!result.success) {
            return errorResponse(headers, result.error);
          }

          const { document, bytes } = result.data;
          return {
            statusCode: 200,
            headers: {
              ...headers,
              'Content-Type': document.contentType,
              'Content-Disposition': contentDisposition(document.originalFilename),
            },
            body: Buffer.from(bytes).toString('base64'),
            isBase64Encoded: true,
          };
        }
      }
    } catch (error) {
      console.error('documents: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createDocumentsHandler();
