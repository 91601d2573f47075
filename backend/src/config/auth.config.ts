import { ConfigService, registerAs } from '@nestjs/config';

/**
 * Authentication Configuration
 *
 * Email/password login issuing a single stateless access token.
 * There is no refresh token: clients log in again once it expires.
 * The token only names the identity; role and status are re-read
 * from the database on every request.
 */
export const authConfig = registerAs('auth', () => ({
  jwt: {
    secret: process.env.JWT_SECRET,
    accessTokenExpiry: process.env.JWT_EXPIRY || '24h',
  },

  /** bcrypt cost factor */
  bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '10', 10),

  /** Optional administrator created at startup when missing */
  bootstrapAdmin: {
    email: process.env.ADMIN_EMAIL,
    password: process.env.ADMIN_PASSWORD,
    name: process.env.ADMIN_NAME || 'Admin',
  },
}));

export const DEV_JWT_SECRET = 'dev-secret-change-in-production';

/**
 * Signing secret for both issuing and verifying tokens. Production refuses
 * to start without JWT_SECRET.
 */
export function resolveJwtSecret(configService: ConfigService): string {
  const secret = configService.get<string>('auth.jwt.secret');
  if (!secret && configService.get<string>('NODE_ENV') === 'production') {
    throw new Error('JWT_SECRET must be set in production');
  }
  return secret || DEV_JWT_SECRET;
}
