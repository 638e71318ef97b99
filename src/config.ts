import * as dotenv from 'dotenv';
dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export const config = {
  port: intFromEnv('PORT', 8000),
  nodeEnv: process.env.NODE_ENV ?? 'development',

  jwt: {
    secret: process.env.JWT_SECRET ?? 'change-me-in-production',
    // Only a single symmetric scheme is accepted when signing or verifying.
    algorithm: 'HS256',
    expiresInMinutes: intFromEnv('JWT_EXPIRES_IN_MINUTES', 30),
  },

  auth: {
    bcryptRounds: intFromEnv('BCRYPT_ROUNDS', 10),
  },

  rateLimit: {
    windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    max: intFromEnv('RATE_LIMIT_MAX', 500),
  },

  allowedOrigins: (process.env.ALLOWED_ORIGINS ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean),
} as const;

export type Config = typeof config;
