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
import { isValidEmail, isValidOtpFormat, readPassword, sanitizeEmail, sanitizeString } from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export function createResetPasswordHandler(resolveContext: ContextResolver = getAppContext) {
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
      const otp = sanitizeString(body.otp, 10);
      const newPassword = readPassword(body.newPassword);

      if (!email || !otp || !newPassword) {
        return badRequest(headers, 'Email, OTP, and new password are required');
      }

      if (!isValidEmail(email)) {
        return badRequest(headers, 'Invalid email format');
      }

      if (!isValidOtpFormat(otp)) {
        return badRequest(headers, 'Invalid OTP format');
      }

      if (newPassword.length < MIN_PASSWORD_LENGTH) {
        return badRequest(headers, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
      }

      if (exceedsPasswordLimit(newPassword)) {
        return badRequest(headers, `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`);
      }

      const { accounts } = resolveContext();
      const result = await accounts.resetPassword(email, otp, newPassword);

      if (!result.success) {
        return errorResponse(headers, result.error);
      }

      return jsonResponse(200, headers, {
        success: true,
        message: 'Password reset successfully. You can now login with your new password.',
      });
    } catch (error) {
      console.error('auth-reset-password: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createResetPasswordHandler();
