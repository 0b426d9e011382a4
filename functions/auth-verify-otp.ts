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
import { isValidEmail, isValidOtpFormat, sanitizeEmail, sanitizeString } from './utils/sanitize.js';
import type { NetlifyEvent, NetlifyResponse } from './types.js';

export function createVerifyOtpHandler(resolveContext: ContextResolver = getAppContext) {
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

      if (!email || !otp) {
        return badRequest(headers, 'Email and OTP are required');
      }

      if (!isValidEmail(email)) {
        return badRequest(headers, 'Invalid email format');
      }

      if (!isValidOtpFormat(otp)) {
        return badRequest(headers, 'Invalid OTP format');
      }

      const { accounts } = resolveContext();
      const result = await accounts.verifyOtp(email, otp);

      if (!result.success) {
        console.log(`auth-verify-otp: Verification rejected (${result.error.code})`);
        return errorResponse(headers, result.error);
      }

      return jsonResponse(200, headers, {
        success: true,
        message: 'Account verified successfully! Welcome email sent.',
        user: result.data,
      });
    } catch (error) {
      console.error('auth-verify-otp: Error:', error);
      return internalError(headers);
    }
  };
}

export const handler = createVerifyOtpHandler();
