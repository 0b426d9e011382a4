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
import { exceedsPasswordLimit, MAX_PASSWORD_BYTES, MIN_PASSWORD_LENGTH } from './utils/password.js';
import {
  isValidEmail,
  isValidFullName,
  isValidUsername,
  MAX_FULL_NAME_LENGTH,
  MAX_USERNAME_LENGTH,
  MIN_USERNAME_LENGTH,
  readPassword,
  sanitizeEmail,
  sanitizeName,
  sanitizeUsername,
} from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export function createSignupHandler(resolveContext: ContextResolver = getAppContext) {
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

      const username = sanitizeUsername(body.username);
      const email = sanitizeEmail(body.email);
      const fullName = sanitizeName(body.fullName);
      const password = readPassword(body.password);

      if (!username || !email || !fullName || !password) {
        return badRequest(headers, 'Username, email, full name and password are required');
      }

      if (!isValidUsername(username)) {
        return badRequest(
          headers,
          `Username must be ${MIN_USERNAME_LENGTH} to ${MAX_USERNAME_LENGTH} characters and contain only letters, digits, dots, dashes or underscores`
        );
      }

      if (!isValidFullName(fullName)) {
        return badRequest(headers, `Full name must be at most ${MAX_FULL_NAME_LENGTH} characters`);
      }

      if (!isValidEmail(email)) {
        return badRequest(headers, 'Invalid email format');
      }

      if (password.length < MIN_PASSWORD_LENGTH) {
        return badRequest(headers, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
      }

      if (exceedsPasswordLimit(password)) {
        return badRequest(headers, `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`);
      }

      const { accounts } = resolveContext();
      const result = await accounts.signup({ username, email, fullName, password });

      if (!result.success) {
        return errorResponse(headers, result.error);
      }

      return jsonResponse(201, headers, {
        success: true,
        message: 'User registered successfully. Please check your email for OTP verification.',
        email: result.data.email,
      });
    } catch (error) {
      console.error('auth-signup: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createSignupHandler();
