/**
 * Input Sanitization Utilities
 *
 * Normalizes untrusted request fields before they reach the account and
 * document services. Non-string input sanitizes to an empty string.
 */

import { OTP_LENGTH } from './otp.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

export const MIN_USERNAME_LENGTH = 3;
export const MAX_USERNAME_LENGTH = 32;
export const MAX_FULL_NAME_LENGTH = 100;
const OTP_PATTERN = new RegExp(`^\\d{${OTP_LENGTH}}$`);

/**
 * Sanitize a string by removing control characters and normalizing whitespace
 */
export function sanitizeString(value: unknown, maxLength: number = 1000): string {
  if (typeof value !== 'string') return '';
  return value
    .normalize('NFKC')
    .replace(/[\x00-\x1F\x7F]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, maxLength);
}

/**
 * Lowercased, trimmed, max 254 chars
 */
export function sanitizeEmail(email: unknown): string {
  if (typeof email !== 'string') return '';
  return sanitizeString(email.toLowerCase(), 254);
}

/**
 * Names and usernames are not truncated; the length checks below reject
 * anything too long.
 */
export function sanitizeName(name: unknown): string {
  return sanitizeString(name);
}

export function sanitizeUsername(username: unknown): string {
  return sanitizeString(username);
}

/**
 * Passwords are taken as-is apart from the type check; whitespace is significant.
 */
export function readPassword(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Keep only the basename of an uploaded file name.
 */
export function sanitizeFilename(filename: unknown): string {
  const cleaned = sanitizeString(filename, 255);
  const basename = cleaned.split(/[\\/]/).pop() ?? '';
  return basename.replace(/^\.+/, '');
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function isValidUsername(username: string): boolean {
  return (
    username.length >= MIN_USERNAME_LENGTH &&
    username.length <= MAX_USERNAME_LENGTH &&
    USERNAME_PATTERN.test(username)
  );
}

export function isValidFullName(fullName: string): boolean {
  return fullName.length > 0 && fullName.length <= MAX_FULL_NAME_LENGTH;
}

export function isValidOtpFormat(code: string): boolean {
  return OTP_PATTERN.test(code);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
