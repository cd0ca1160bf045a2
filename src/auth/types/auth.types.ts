export type TokenType = 'access' | 'refresh';

/**
 * Pending one-time code as held by the OTP store. Timestamps are epoch milliseconds.
 */
export interface OtpRecord {
  phone: string;
  codeHash: string;
  issuedAt: number;
  expiresAt: number;
  attemptsRemaining: number;
}

/**
 * A record together with the exact serialized value it was read from.
 * The value doubles as the version for compare-and-delete.
 */
export interface VersionedOtpRecord {
  record: OtpRecord;
  version: string;
}

/**
 * `gone`: the record was consumed or evicted meanwhile. `superseded`: a new code
 * was issued after the compared one. `counted`: 0 attempts left means evicted.
 */
export type FailedAttemptResult =
  | { status: 'gone' }
  | { status: 'superseded' }
  | { status: 'counted'; attemptsRemaining: number };

export interface RateLimitCounter {
  phone: string;
  windowStart: Date;
  count: number;
}

export interface OtpIssueResult {
  phone: string;
  expiresAt: Date;
  attemptsAllowed: number;
  dispatched: boolean;
}

export interface IssuedToken {
  token: string;
  tokenId: string;
  type: TokenType;
  expiresAt: Date;
}

export interface TokenPair {
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
}

export interface TokenClaims {
  subjectId: string;
  tokenId: string;
  type: TokenType;
  issuedAt: Date;
  expiresAt: Date;
  keyId: string;
}

/**
 * JWT payload as signed. `iat`/`exp` are seconds since the epoch.
 */
export interface TokenPayload {
  sub: string;
  jti: string;
  type: TokenType;
  iat: number;
  exp: number;
  iss: string;
}

export enum LoginStatus {
  AWAITING_CODE = 'AWAITING_CODE',
  VERIFIED = 'VERIFIED',
  TOKEN_ISSUED = 'TOKEN_ISSUED',
  FAILED = 'FAILED',
}

export interface PendingLogin {
  status: LoginStatus.AWAITING_CODE;
  phone: string;
  expiresAt: Date;
}

export interface LoginResult {
  status: LoginStatus.TOKEN_ISSUED;
  userId: string;
  tokens: TokenPair;
}

export interface AuthenticatedUser {
  userId: string;
  tokenId: string;
  expiresAt: Date;
}
