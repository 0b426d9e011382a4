/**
 * Configuration Loader
 *
 * Reads environment variables once at startup into an immutable config object
 * that is passed to the token, OTP, email and storage components.
 */

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ['HS256', 'HS384', 'HS512'];

export interface StorageConfig {
  bucket: string;
  region: string;
  endpoint?: string;
}

export interface AppConfig {
  appName: string;
  jwtSecret: string;
  jwtAlgorithm: JwtAlgorithm;
  accessTokenTtlMinutes: number;
  otpTtlMinutes: number;
  bcryptRounds: number;
  databaseUrl: string;
  resendApiKey: string;
  fromEmail: string;
  storage: StorageConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readAlgorithm(env: Env): JwtAlgorithm {
  const raw = env.JWT_ALGORITHM?.trim() || 'HS256';
  const algorithm = JWT_ALGORITHMS.find((candidate) => candidate === raw);
  if (!algorithm) {
    throw new ConfigError(`JWT_ALGORITHM must be one of ${JWT_ALGORITHMS.join(', ')}, got "${raw}"`);
  }
  return algorithm;
}

/**
 * Build the application config from environment variables.
 * All missing required variables are reported in a single error.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const required = ['JWT_SECRET', 'NEON_DATABASE_URL', 'RESEND_API_KEY', 'S3_BUCKET'] as const;
  const missing = required.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const endpoint = env.S3_ENDPOINT?.trim();

  return Object.freeze({
    appName: env.APP_NAME?.trim() || 'Skynet',
    jwtSecret: (env.JWT_SECRET ?? '').trim(),
    jwtAlgorithm: readAlgorithm(env),
    accessTokenTtlMinutes: readPositiveInt(env, 'ACCESS_TOKEN_EXPIRE_MINUTES', 30),
    otpTtlMinutes: readPositiveInt(env, 'OTP_EXPIRY_MINUTES', 10),
    bcryptRounds: readPositiveInt(env, 'BCRYPT_SALT_ROUNDS', 12),
    databaseUrl: (env.NEON_DATABASE_URL ?? '').trim(),
    resendApiKey: (env.RESEND_API_KEY ?? '').trim(),
    fromEmail: env.FROM_EMAIL?.trim() || 'noreply@skynet.local',
    storage: Object.freeze({
      bucket: (env.S3_BUCKET ?? '').trim(),
      region: env.S3_REGION?.trim() || env.AWS_REGION?.trim() || 'us-east-1',
      ...(endpoint ? { endpoint } : {}),
    }),
  });
}
