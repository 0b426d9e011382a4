import { createOtpReissueHandler } from './auth-forget-password.js';
import { getAppContext, type ContextResolver } from './utils/context.js';

export function createResendOtpHandler(resolveContext: ContextResolver = getAppContext) {
  return createOtpReissueHandler(
    'auth-resend-otp',
    (accounts, email) => accounts.resendOtp(email),
    'New OTP sent to your email',
    resolveContext
  );
}

export const handler = createResendOtpHandler();
