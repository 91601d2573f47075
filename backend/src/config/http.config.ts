import { registerAs } from '@nestjs/config';

export const httpConfig = registerAs('http', () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: (process.env.CORS_ORIGINS || '*').split(',').map((origin) => origin.trim()),

  /** Rate limit applied to the credential endpoints */
  throttle: {
    ttlMs: parseInt(process.env.THROTTLE_TTL_MS || '60000', 10),
    limit: parseInt(process.env.THROTTLE_LIMIT || '20', 10),
  },
}));
