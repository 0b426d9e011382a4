import { describe, expect, it } from 'vitest';
import { renderOtpEmail, renderWelcomeEmail } from '../utils/email-service.js';
import {
  escapeHtml,
  isValidEmail,
  isValidFullName,
  isValidUsername,
  sanitizeFilename,
  sanitizeName,
  sanitizeUsername,
} from '../utils/sanitize.js';

const options = { appName: 'Skynet', otpTtlMinutes: 10 };

describe('renderOtpEmail', () => {
  it('uses verification wording by default', () => {
    const { subject, html } = renderOtpEmail('004512', 'Alice', 'email_verification', options);

    expect(subject).toBe('Your OTP Code - Skynet');
    expect(html).toContain('>004512</span>');
    expect(html).toContain('This code will expire in 10 minutes.');
    expect(html).toContain('verify your email address');
  });

  it('uses reset wording for password resets', () => {
    const { subject, html } = renderOtpEmail('123456', 'Alice', 'password_reset', options);

    expect(subject).toBe('Reset your Skynet password');
    expect(html).toContain('reset your password');
  });

  it('escapes the recipient name', () => {
    const { html } = renderOtpEmail('123456', '<b>Eve</b>', 'email_verification', options);
    expect(html).toContain('Hi &lt;b&gt;Eve&lt;/b&gt;,');
  });
});

describe('renderWelcomeEmail', () => {
  it('greets the user by name', () => {
    const { subject, html } = renderWelcomeEmail('Alice', options);

    expect(subject).toBe('Welcome to Skynet!');
    expect(html).toContain('Welcome to Skynet, Alice!');
  });
});

describe('sanitize helpers', () => {
  it('validates emails and usernames', () => {
    expect(isValidEmail('a@b.co')).toBe(true);
    expect(isValidEmail('a@b')).toBe(false);
    expect(isValidUsername('al')).toBe(false);
    expect(isValidUsername('al_ice.9-x')).toBe(true);
    expect(isValidUsername('alice smith')).toBe(false);
    expect(isValidUsername('Alice_Liddell')).toBe(true);
    expect(isValidUsername('a'.repeat(32))).toBe(true);
    expect(isValidUsername('a'.repeat(33))).toBe(false);
  });

  it('keeps usernames and names whole so length checks can reject them', () => {
    expect(sanitizeUsername('  Alice ')).toBe('Alice');
    expect(sanitizeUsername('a'.repeat(40))).toHaveLength(40);
    expect(sanitizeName('N'.repeat(150))).toHaveLength(150);
    expect(isValidFullName('N'.repeat(100))).toBe(true);
    expect(isValidFullName('N'.repeat(101))).toBe(false);
  });

  it('reduces filenames to a safe basename', () => {
    expect(sanitizeFilename('C:\\Users\\me\\scan.png')).toBe('scan.png');
    expect(sanitizeFilename('../../.hidden.pdf')).toBe('hidden.pdf');
    expect(sanitizeFilename(42)).toBe('');
  });

  it('escapes HTML metacharacters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});
