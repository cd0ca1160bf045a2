const intFromEnv = (name: string, fallback: number): number => {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Parses `JWT_SIGNING_KEYS` ("kid:secret,kid2:secret2"). Falls back to a single
 * `default` key taken from `JWT_SECRET`.
 */
export const parseSigningKeys = (
  raw: string | undefined,
  fallbackSecret: string | undefined,
): Record<string, string> => {
  const keys: Record<string, string> = {};

  for (const entry of (raw ?? '').split(',')) {
    const separator = entry.indexOf(':');
    if (separator <= 0) continue;

    const kid = entry.slice(0, separator).trim();
    const secret = entry.slice(separator + 1).trim();
    if (kid && secret) {
      keys[kid] = secret;
    }
  }

  if (Object.keys(keys).length === 0 && fallbackSecret) {
    keys.default = fallbackSecret;
  }

  return keys;
};

export default () => {
  const signingKeys = parseSigningKeys(process.env.JWT_SIGNING_KEYS, process.env.JWT_SECRET);

  return {
    port: intFromEnv('PORT', 3000),
    nodeEnv: process.env.NODE_ENV || 'development',
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: intFromEnv('DATABASE_PORT', 5432),
      username: process.env.DATABASE_USERNAME || 'postgres',
      password: process.env.DATABASE_PASSWORD || 'postgres',
      database: process.env.DATABASE_NAME || 'phone_auth',
      poolSize: intFromEnv('DATABASE_POOL_SIZE', 20),
      connectionTimeoutMillis: intFromEnv('DATABASE_TIMEOUT', 5000),
      migrationsRun: process.env.DATABASE_MIGRATIONS_RUN !== 'false',
    },
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: intFromEnv('REDIS_PORT', 6379),
      password: process.env.REDIS_PASSWORD,
      commandTimeoutMs: intFromEnv('REDIS_COMMAND_TIMEOUT_MS', 500),
    },
    sms: {
      sandbox: process.env.SMS_SANDBOX === 'true',
      apiKey: process.env.SMS_API_KEY,
      gatewayUrl: process.env.SMS_GATEWAY_URL,
      sender: process.env.SMS_SENDER,
      timeoutMs: intFromEnv('SMS_TIMEOUT_MS', 5000),
    },
    auth: {
      phone: {
        defaultCountryCode: process.env.PHONE_DEFAULT_COUNTRY_CODE || '994',
      },
      otp: {
        length: intFromEnv('OTP_LENGTH', 6),
        expirySeconds: intFromEnv('OTP_EXPIRY_SECONDS', 300),
        maxVerifyAttempts: intFromEnv('MAX_OTP_VERIFY_ATTEMPTS', 3),
        hashRounds: intFromEnv('OTP_HASH_ROUNDS', 10),
      },
      rateLimit: {
        issueWindowSeconds: intFromEnv('OTP_ISSUE_WINDOW_SECONDS', 600),
        issueMaxRequests: intFromEnv('OTP_ISSUE_MAX_REQUESTS', 5),
      },
      jwt: {
        keys: signingKeys,
        activeKeyId: process.env.JWT_ACTIVE_KEY_ID || Object.keys(signingKeys)[0] || '',
        issuer: process.env.JWT_ISSUER || 'phone-auth',
        accessTokenTtlSeconds: intFromEnv('ACCESS_TOKEN_TTL_SECONDS', 900), // 15 minutes
        refreshTokenTtlSeconds: intFromEnv('REFRESH_TOKEN_TTL_SECONDS', 2592000), // 30 days
      },
    },
  };
};
