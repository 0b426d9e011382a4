import { getHeaders } from './utils/cors-headers.js';
import type { AccountService } from './services/account-service.js';
import type { ServiceResult } from './services/result.js';
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
import { isValidEmail, sanitizeEmail } from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

type OtpReissue = (accounts: AccountService, email: string) => Promise<ServiceResult<{ email: string }>>;

/**
 * Shared by forget-password and resend-otp: both take `{ email }` and put a
 * fresh OTP on the account.
 */
export function createOtpReissueHandler(
  name: string,
  reissue: OtpReissue,
  successMessage: string,
  resolveContext: ContextResolver
) {
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
      if (!email) {
        return badRequest(headers, 'Email is required');
      }

      if (!isValidEmail(email)) {
        return badRequest(headers, 'Invalid email format');
      }

      const { accounts } = resolveContext();
      const result = await reissue(accounts, email);

      if (!result.success) {
        return errorResponse(headers, result.error);
      }

      return jsonResponse(200, headers, {
        success: true,
        message: successMessage,
        email: result.data.email,
      });
    } catch (error) {
      console.error(`${name}: Error:`, error);
      return internalError(headers);
    }
  };
}

export function createForgetPasswordHandler(resolveContext: ContextResolver = getAppContext) {
  return createOtpReissueHandler(
    'auth-forget-password',
    (accounts, email) => accounts.forgotPassword(email),
    'OTP sent to your email for password reset',
    resolveContext
  );
}

export const handler = createForgetPasswordHandler();
