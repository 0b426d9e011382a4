import { describe, expect, it } from 'vitest';
import { createOtpGenerator, toUtcDate } from '../utils/otp.js';

describe('createOtpGenerator', () => {
  const otp = createOtpGenerator({ otpTtlMinutes: 10 });

  it('always produces exactly 6 decimal digits', () => {
    for (let i = 0; i < 500; i++) {
      expect(otp.generate()).toMatch(/^\d{6}$/);
    }
  });

  it('keeps leading zeros', () => {
    const fixed = createOtpGenerator({ otpTtlMinutes: 10 }, () => 42);
    expect(fixed.generate()).toBe('000042');
  });

  it('draws from the full 0..999999 range', () => {
    const calls: [number, number][] = [];
    const spy = createOtpGenerator({ otpTtlMinutes: 10 }, (min, max) => {
      calls.push([min, max]);
      return 999999;
    });

    expect(spy.generate()).toBe('999999');
    expect(calls).toEqual([[0, 1000000]]);
  });

  it('computes expiry as now plus the configured TTL', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    expect(otp.expiryFrom(now).toISOString()).toBe('2026-03-01T12:10:00.000Z');

    const short = createOtpGenerator({ otpTtlMinutes: 1 });
    expect(short.expiryFrom(now).toISOString()).toBe('2026-03-01T12:01:00.000Z');
  });

  it('is valid strictly before expiry and invalid at or after it', () => {
    const expiry = new Date('2026-03-01T12:10:00.000Z');

    expect(otp.isValid(expiry, new Date('2026-03-01T12:09:59.999Z'))).toBe(true);
    expect(otp.isValid(expiry, new Date('2026-03-01T12:10:00.000Z'))).toBe(false);
    expect(otp.isValid(expiry, new Date('2026-03-01T12:10:00.001Z'))).toBe(false);
  });

  it('reads an expiry without timezone as UTC', () => {
    const now = new Date('2026-03-01T12:05:00.000Z');

    expect(otp.isValid('2026-03-01 12:10:00', now)).toBe(true);
    expect(otp.isValid('2026-03-01T12:04:00', now)).toBe(false);
  });

  it('issues a code together with its expiry', () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const issued = createOtpGenerator({ otpTtlMinutes: 10 }, () => 123456).issue(now);

    expect(issued).toEqual({ code: '123456', expiresAt: new Date('2026-03-01T12:10:00.000Z') });
  });
});

describe('toUtcDate', () => {
  it('respects an explicit offset', () => {
    expect(toUtcDate('2026-03-01T14:00:00+02:00').toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(toUtcDate('2026-03-01T12:00:00Z').toISOString()).toBe('2026-03-01T12:00:00.000Z');
  });

  it('treats a naive timestamp as UTC', () => {
    expect(toUtcDate('2026-03-01T12:00:00').toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(toUtcDate('2026-03-01 12:00:00.250').toISOString()).toBe('2026-03-01T12:00:00.250Z');
  });

  it('returns Date instances unchanged', () => {
    const date = new Date('2026-03-01T12:00:00.000Z');
    expect(toUtcDate(date)).toBe(date);
  });
});
