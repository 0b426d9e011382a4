export type ErrorCode =
  | 'Conflict'
  | 'NotFound'
  | 'InvalidCredentials'
  | 'NotVerified'
  | 'Deactivated'
  | 'AlreadyVerified'
  | 'NoOtpPending'
  | 'Expired'
  | 'InvalidCode'
  | 'Unauthenticated'
  | 'ValidationFailed'
  | 'UpstreamFailure';

export interface ServiceError {
  code: ErrorCode;
  message: string;
}

/**
 * Outcome of a service operation. Expected failures (bad OTP, duplicate
 * account, ...) are returned here; only collaborator outages are thrown.
 */
export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: ServiceError };

export function ok<T>(data: T): ServiceResult<T> {
  return { success: true, data };
}

export function fail(code: ErrorCode, message: string): ServiceResult<never> {
  return { success: false, error: { code, message } };
}
