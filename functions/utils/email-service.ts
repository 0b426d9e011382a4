/**
 * Email Service Utility
 *
 * Sends OTP and welcome emails through the Resend API. Callers decide what a
 * delivery failure means; this module only reports it by rejecting.
 */

import { Resend } from 'resend';
import type { AppConfig } from './config.js';
import { escapeHtml } from './sanitize.js';

export type OtpPurpose = 'email_verification' | 'password_reset';

export interface EmailService {
  sendOtpEmail(to: string, otp: string, userName: string, purpose: OtpPurpose): Promise<void>;
  sendWelcomeEmail(to: string, userName: string): Promise<void>;
}

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
}

export interface EmailTemplateOptions {
  appName: string;
  otpTtlMinutes: number;
}

export function renderOtpEmail(
  otp: string,
  userName: string,
  purpose: OtpPurpose,
  { appName, otpTtlMinutes }: EmailTemplateOptions
): Omit<EmailMessage, 'to'> {
  const name = escapeHtml(userName || 'there');
  const app = escapeHtml(appName);
  const isReset = purpose === 'password_reset';

  const subject = isReset ? `Reset your ${appName} password` : `Your OTP Code - ${appName}`;
  const intro = isReset
    ? 'We received a request to reset your password. Use this code to verify your identity:'
    : 'Use this code to verify your email address and activate your account:';
  const accent = isReset ? '#dc2626' : '#2563eb';

  const html = `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
      <h2 style="color: ${accent};">Hi ${name},</h2>
      <p>${intro}</p>
      <div style="background: #f3f4f6; padding: 20px; border-radius: 8px; text-align: center; margin: 20px 0;">
        <span style="font-size: 32px; font-weight: bold; color: #1f2937; letter-spacing: 4px; font-family: monospace;">${otp}</span>
      </div>
      <p>This code will expire in ${otpTtlMinutes} minutes.</p>
      <p>If you didn't request this code, please ignore this email.</p>
      <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 30px 0;">
      <p style="font-size: 12px; color: #6c757d;">
        This is an automated message from ${app}. Please do not reply to this email.
      </p>
    </div>
  `;

  return { subject, html };
}

export function renderWelcomeEmail(userName: string, { appName }: Pick<EmailTemplateOptions, 'appName'>): Omit<EmailMessage, 'to'> {
  const name = escapeHtml(userName || 'there');
  const app = escapeHtml(appName);

  return {
    subject: `Welcome to ${appName}!`,
    html: `
      <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
        <h2 style="color: #059669;">Welcome to ${app}, ${name}!</h2>
        <p>Your email address is verified and your account is active. You can now sign in.</p>
        <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 30px 0;">
        <p style="font-size: 12px; color: #6c757d;">
          This is an automated message from ${app}. Please do not reply to this email.
        </p>
      </div>
    `,
  };
}

export function createResendEmailService(
  config: Pick<AppConfig, 'resendApiKey' | 'fromEmail' | 'appName' | 'otpTtlMinutes'>
): EmailService {
  const resend = new Resend(config.resendApiKey);
  const from = `${config.appName} <${config.fromEmail}>`;

  async function sendEmail({ to, subject, html }: EmailMessage): Promise<void> {
    const { data, error } = await resend.emails.send({ from, to: [to], subject, html });

    if (error) {
      console.error('Email service: Resend rejected message:', error.name, error.message);
      throw new Error(`Failed to send email: ${error.message}`);
    }

    console.log('Email service: Email sent successfully:', data?.id);
  }

  return {
    sendOtpEmail: (to, otp, userName, purpose) =>
      sendEmail({ to, ...renderOtpEmail(otp, userName, purpose, config) }),

    sendWelcomeEmail: (to, userName) => sendEmail({ to, ...renderWelcomeEmail(userName, config) }),
  };
}
