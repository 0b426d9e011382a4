/**
 * Account lifecycle: signup, OTP verification, login, password reset.
 *
 * An account starts Pending (unverified, inactive) with an OTP attached and
 * becomes Verified+Active once the OTP is confirmed. The same OTP fields serve
 * password reset and resend, independent of verification state.
 *
 * Each read-check-write goes through `mutateAccount`, which retries when the
 * repository reports that the row changed underneath us. OTP and welcome
 * emails go out only after the change is stored; a failed send is logged and
 * does not undo it (resend-otp is the recovery path).
 */

import type { UserChanges, UserRecord, UserRepository } from '../db/users.js';
import type { EmailService, OtpPurpose } from '../utils/email-service.js';
import type { TokenService } from '../utils/jwt.js';
import type { OtpGenerator } from '../utils/otp.js';
import { exceedsPasswordLimit, MAX_PASSWORD_BYTES, type PasswordHasher } from '../utils/password.js';
import { fail, ok, type ServiceResult } from './result.js';

const MAX_WRITE_ATTEMPTS = 3;

const PASSWORD_TOO_LONG = `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`;

export interface AccountServiceDeps {
  users: UserRepository;
  hasher: PasswordHasher;
  tokens: TokenService;
  otp: OtpGenerator;
  email: EmailService;
  now?: () => Date;
}

export interface SignupInput {
  username: string;
  email: string;
  fullName: string;
  password: string;
}

export interface PublicUser {
  id: number;
  username: string;
  email: string;
  fullName: string;
}

export interface LoginSuccess {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: Date;
}

export class ConcurrentUpdateError extends Error {
  constructor(email: string) {
    super(`Account ${email} kept changing during update`);
    this.name = 'ConcurrentUpdateError';
  }
}

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
  };
}

type Decision = ServiceResult<UserChanges>;

export class AccountService {
  private readonly users: UserRepository;
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenService;
  private readonly otp: OtpGenerator;
  private readonly email: EmailService;
  private readonly now: () => Date;

  constructor(deps: AccountServiceDeps) {
    this.users = deps.users;
    this.hasher = deps.hasher;
    this.tokens = deps.tokens;
    this.otp = deps.otp;
    this.email = deps.email;
    this.now = deps.now ?? (() => new Date());
  }

  async signup(input: SignupInput): Promise<ServiceResult<PublicUser>> {
    if (exceedsPasswordLimit(input.password)) {
      return fail('ValidationFailed', PASSWORD_TOO_LONG);
    }

    const existing = await this.users.findByEmailOrUsername(input.email, input.username);
    if (existing) {
      return fail('Conflict', 'Email or username already registered');
    }

    const otp = this.otp.issue(this.now());
    const created = await this.users.create({
      username: input.username,
      email: input.email,
      fullName: input.fullName,
      passwordHash: await this.hasher.hash(input.password),
      otp,
    });

    // Lost a race against a concurrent signup on the unique index
    if (!created) {
      return fail('Conflict', 'Email or username already registered');
    }

    console.log('account-service: Pending account created:', created.id);
    await this.deliverOtp(created, otp.code, 'email_verification');

    return ok(toPublicUser(created));
  }

  async verifyOtp(email: string, code: string): Promise<ServiceResult<PublicUser>> {
    const result = await this.mutateAccount(email, (user, now) => {
      if (user.isVerified) {
        return fail('AlreadyVerified', 'User already verified');
      }
      const otpError = this.checkOtp(user, code, now);
      if (otpError) return otpError;

      return ok({ isVerified: true, isActive: true, otp: null });
    });

    if (!result.success) return result;

    const user = result.data;
    console.log('account-service: Account verified:', user.id);

    try {
      await this.email.sendWelcomeEmail(user.email, user.fullName);
    } catch (error) {
      console.warn('account-service: Welcome email failed for account', user.id, error);
    }

    return ok(toPublicUser(user));
  }

  async login(email: string, password: string): Promise<ServiceResult<LoginSuccess>> {
    const user = await this.users.findByEmail(email);

    if (!user || !(await this.hasher.verify(password, user.passwordHash))) {
      return fail('InvalidCredentials', 'Invalid email or password');
    }
    if (!user.isVerified) {
      return fail('NotVerified', 'Account not verified. Please verify your email first.');
    }
    if (!user.isActive) {
      return fail('Deactivated', 'Account is deactivated');
    }

    const { token, expiresAt } = this.tokens.issue(String(user.id), this.now());
    return ok({ accessToken: token, tokenType: 'bearer' as const, expiresAt });
  }

  /**
   * Issue a fresh OTP for a password reset. Works for unverified accounts too.
   */
  forgotPassword(email: string): Promise<ServiceResult<{ email: string }>> {
    return this.reissueOtp(email, 'password_reset');
  }

  /**
   * Same state change as forgotPassword; only the email wording differs.
   */
  resendOtp(email: string): Promise<ServiceResult<{ email: string }>> {
    return this.reissueOtp(email, 'email_verification');
  }

  async resetPassword(email: string, code: string, newPassword: string): Promise<ServiceResult<PublicUser>> {
    if (exceedsPasswordLimit(newPassword)) {
      return fail('ValidationFailed', PASSWORD_TOO_LONG);
    }

    let passwordHash: string | null = null;

    const result = await this.mutateAccount(email, async (user, now) => {
      const otpError = this.checkOtp(user, code, now);
      if (otpError) return otpError;

      // Hash once even if a lost race makes us decide again
      const hash = passwordHash ?? (await this.hasher.hash(newPassword));
      passwordHash = hash;
      return ok({ passwordHash: hash, otp: null });
    });

    if (!result.success) return result;

    console.log('account-service: Password reset for account', result.data.id);
    return ok(toPublicUser(result.data));
  }

  /**
   * Resolve a bearer token to a usable account. Tokens are never revoked,
   * so the account state is re-checked on every call.
   */
  async authenticate(token: string): Promise<ServiceResult<PublicUser>> {
    const validation = this.tokens.verify(token, this.now());
    if (!validation.isValid) {
      return fail('Unauthenticated', validation.error === 'expired' ? 'Token has expired' : 'Invalid token');
    }

    const id = Number(validation.subject);
    const user = Number.isSafeInteger(id) ? await this.users.findById(id) : null;
    if (!user || !user.isVerified || !user.isActive) {
      return fail('Unauthenticated', 'Invalid token');
    }

    return ok(toPublicUser(user));
  }

  private async reissueOtp(email: string, purpose: OtpPurpose): Promise<ServiceResult<{ email: string }>> {
    let code = '';

    const result = await this.mutateAccount(email, (_user, now) => {
      const otp = this.otp.issue(now);
      code = otp.code;
      return ok({ otp });
    });

    if (!result.success) return result;

    await this.deliverOtp(result.data, code, purpose);
    return ok({ email: result.data.email });
  }

  /**
   * OTP checks shared by verification and reset, in fixed precedence:
   * NoOtpPending, then Expired, then InvalidCode.
   */
  private checkOtp(user: UserRecord, code: string, now: Date): ServiceResult<never> | null {
    if (!user.otp) {
      return fail('NoOtpPending', 'No OTP found for this user. Please request a new one.');
    }
    if (!this.otp.isValid(user.otp.expiresAt, now)) {
      return fail('Expired', 'OTP has expired. Please request a new one.');
    }
    if (user.otp.code !== code) {
      return fail('InvalidCode', 'Invalid OTP');
    }
    return null;
  }

  /**
   * Read the account, decide on a change, and write it only if the row is
   * still the one that was read. A lost race re-reads and decides again.
   */
  private async mutateAccount(
    email: string,
    decide: (user: UserRecord, now: Date) => Decision | Promise<Decision>
  ): Promise<ServiceResult<UserRecord>> {
    for (let attempt = 0; attempt < MAX_WRITE_ATTEMPTS; attempt++) {
      const user = await this.users.findByEmail(email);
      if (!user) {
        return fail('NotFound', 'User not found');
      }

      const decision = await decide(user, this.now());
      if (!decision.success) return decision;

      const updated = await this.users.update(user, decision.data);
      if (updated) return ok(updated);

      console.log('account-service: Concurrent update detected, retrying for account', user.id);
    }

    throw new ConcurrentUpdateError(email);
  }

  private async deliverOtp(user: UserRecord, code: string, purpose: OtpPurpose): Promise<void> {
    try {
      await this.email.sendOtpEmail(user.email, code, user.fullName, purpose);
    } catch (error) {
      console.warn('account-service: OTP email delivery failed for account', user.id, error);
    }
  }
}
