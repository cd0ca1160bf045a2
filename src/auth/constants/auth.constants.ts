/**
 * Authentication module constants
 * Centralizes key layouts and fixed limits used across auth services
 */

export const AUTH_CONSTANTS = {
  /**
   * Cache key prefixes
   */
  KEYS: {
    /** Pending OTP record per canonical phone number */
    OTP_RECORD: 'otp:phone:',
    /** Fixed-window issuance counter per canonical phone number */
    OTP_ISSUE_COUNTER: 'otp:issue:count:',
    /** Revoked refresh token ids */
    REVOKED_TOKEN: 'auth:revoked:',
  },

  OTP: {
    /** Re-reads allowed when a concurrent writer changed the record under us */
    MAX_OPTIMISTIC_RETRIES: 3,
    /** Records outlive their expiry by this much so late submissions see EXPIRED, not NOT_FOUND */
    EXPIRED_RECORD_GRACE_MS: 60000,
  },

  TOKEN: {
    /** Only HMAC-SHA256 tokens are minted or accepted */
    ALGORITHM: 'HS256',
  },

  CLEANUP: {
    /** SCAN page size used by the periodic evictor */
    SCAN_BATCH_SIZE: 500,
  },
} as const;
