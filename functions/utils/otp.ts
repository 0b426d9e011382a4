/**
 * OTP Generation and Validity Utilities
 *
 * Codes are 6 decimal digits with leading zeros allowed. Expiry is an absolute
 * UTC instant; validity is checked against the clock at verification time.
 */

import crypto from 'crypto';
import type { AppConfig } from './config.js';

export const OTP_LENGTH = 6;

const OTP_SPACE = 10 ** OTP_LENGTH;

export interface IssuedOTP {
  code: string;
  expiresAt: Date;
}

export interface OtpGenerator {
  generate(): string;
  expiryFrom(now: Date): Date;
  isValid(expiry: Date | string, now: Date): boolean;
  issue(now: Date): IssuedOTP;
}

type RandomInt = (min: number, max: number) => number;

const TIMEZONE_SUFFIX = /\d{2}:\d{2}(:\d{2}(\.\d+)?)?\s*(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Parse a timestamp, reading one without an explicit timezone as UTC.
 */
export function toUtcDate(value: Date | string): Date {
  if (value instanceof Date) return value;

  const trimmed = value.trim();
  if (TIMEZONE_SUFFIX.test(trimmed)) return new Date(trimmed);
  return new Date(`${trimmed.replace(' ', 'T')}Z`);
}

export function createOtpGenerator(
  config: Pick<AppConfig, 'otpTtlMinutes'>,
  randomInt: RandomInt = crypto.randomInt
): OtpGenerator {
  const ttlMs = config.otpTtlMinutes * 60 * 1000;

  const generate = (): string => randomInt(0, OTP_SPACE).toString().padStart(OTP_LENGTH, '0');

  const expiryFrom = (now: Date): Date => new Date(now.getTime() + ttlMs);

  const isValid = (expiry: Date | string, now: Date): boolean =>
    now.getTime() < toUtcDate(expiry).getTime();

  return {
    generate,
    expiryFrom,
    isValid,
    issue: (now) => ({ code: generate(), expiresAt: expiryFrom(now) }),
  };
}
