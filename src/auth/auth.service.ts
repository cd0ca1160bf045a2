import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OtpService } from './otp.service';
import { TokenService } from './services/token.service';
import { RevocationStoreService } from './services/revocation-store.service';
import { UserService } from './services/user.service';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import {
  AuthErrorCode,
  AuthException,
  isAuthError,
} from '../common/exceptions/auth.exception';
import { normalizePhoneNumber } from './helpers/phone-number.helper';
import {
  LoginResult,
  LoginStatus,
  PendingLogin,
  TokenClaims,
  TokenPair,
} from './types/auth.types';

/**
 * Orchestrates phone login, refresh token rotation and logout.
 *
 * A login attempt moves AWAITING_CODE -> VERIFIED -> TOKEN_ISSUED, or to FAILED
 * from any state; each transition is written to the audit log.
 */
@Injectable()
export class AuthService {
  constructor(
    private otpService: OtpService,
    private tokenService: TokenService,
    private revocationStore: RevocationStoreService,
    private userService: UserService,
    private configService: ConfigService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Starts a login by sending a one-time code to `rawPhone`.
   *
   * @throws AuthException INVALID_PHONE_NUMBER, RATE_LIMITED or DISPATCH_FAILED
   */
  async requestLogin(rawPhone: string): Promise<PendingLogin> {
    const phone = this.canonicalize(rawPhone);

    const issued = await this.tracked(phone, () => this.otpService.issue(phone));
    if (!issued.dispatched) {
      this.auditLogger.logLoginState(phone, LoginStatus.FAILED, AuthErrorCode.DISPATCH_FAILED);
      throw new AuthException(AuthErrorCode.DISPATCH_FAILED);
    }

    this.auditLogger.logLoginState(phone, LoginStatus.AWAITING_CODE);
    return { status: LoginStatus.AWAITING_CODE, phone, expiresAt: issued.expiresAt };
  }

  /**
   * Exchanges a valid code for a token pair. This is the only way an
   * unauthenticated caller obtains tokens.
   */
  async completeLogin(rawPhone: string, code: string): Promise<LoginResult> {
    const phone = this.canonicalize(rawPhone);

    await this.tracked(phone, () => this.otpService.verifyAndConsume(phone, code));
    this.auditLogger.logLoginState(phone, LoginStatus.VERIFIED);

    const userId = await this.tracked(phone, () => this.userService.resolveOrCreate(phone));
    const tokens = this.mint(userId);

    this.auditLogger.logLoginState(phone, LoginStatus.TOKEN_ISSUED, undefined, userId);
    return { status: LoginStatus.TOKEN_ISSUED, userId, tokens };
  }

  /**
   * Rotates a refresh token. The presented token is revoked in the same step
   * that checks it, so a token can be exchanged at most once.
   *
   * @throws AuthException EXPIRED, INVALID_TOKEN or REVOKED
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    let claims: TokenClaims;
    try {
      claims = this.tokenService.verify(refreshToken, 'refresh');
    } catch (error) {
      if (isAuthError(error, AuthErrorCode.EXPIRED)) {
        this.metricsService.incrementTokenRefresh('expired');
        this.auditLogger.logTokenRefreshRejected(AuthErrorCode.EXPIRED);
        throw error;
      }
      if (isAuthError(error)) {
        this.metricsService.incrementTokenRefresh('invalid');
        this.auditLogger.logTokenRefreshRejected(error.code);
        throw new AuthException(AuthErrorCode.INVALID_TOKEN);
      }
      throw error;
    }

    const claimed = await this.revocationStore.revoke(claims.tokenId, claims.expiresAt);
    if (!claimed) {
      this.metricsService.incrementTokenRefresh('revoked');
      this.auditLogger.logTokenRefreshRejected(
        AuthErrorCode.REVOKED,
        claims.subjectId,
        claims.tokenId,
      );
      this.auditLogger.logSuspiciousActivity('Revoked refresh token presented', {
        userId: claims.subjectId,
        tokenId: claims.tokenId,
      });
      throw new AuthException(AuthErrorCode.REVOKED);
    }
    this.metricsService.incrementTokensRevoked('rotation');

    const tokens = this.mint(claims.subjectId);
    this.metricsService.incrementTokenRefresh('success');
    this.auditLogger.logTokenRefreshed(
      claims.subjectId,
      claims.tokenId,
      tokens.refreshToken.tokenId,
    );
    return tokens;
  }

  /**
   * Revokes a refresh token. Repeating the call, or passing a token that has
   * already expired, is not an error.
   *
   * @throws AuthException INVALID_TOKEN
   */
  async logout(refreshToken: string): Promise<void> {
    let claims: TokenClaims;
    try {
      claims = this.tokenService.verify(refreshToken, 'refresh', { allowExpired: true });
    } catch (error) {
      if (isAuthError(error)) {
        throw new AuthException(AuthErrorCode.INVALID_TOKEN);
      }
      throw error;
    }

    if (await this.revocationStore.revoke(claims.tokenId, claims.expiresAt)) {
      this.metricsService.incrementTokensRevoked('logout');
      this.auditLogger.logTokenRevoked(claims.subjectId, claims.tokenId, 'logout');
    }
  }

  /**
   * Verifies an access token. No store is consulted.
   */
  authenticate(accessToken: string): TokenClaims {
    return this.tokenService.verify(accessToken, 'access');
  }

  private canonicalize(rawPhone: string): string {
    const defaultCountryCode = this.configService.getOrThrow<string>(
      'auth.phone.defaultCountryCode',
    );
    try {
      return normalizePhoneNumber(rawPhone, defaultCountryCode);
    } catch (error) {
      this.auditLogger.logLoginState(rawPhone, LoginStatus.FAILED, AuthErrorCode.INVALID_PHONE_NUMBER);
      throw error;
    }
  }

  private mint(userId: string): TokenPair {
    const tokens = this.tokenService.issuePair(userId);
    this.metricsService.incrementTokensIssued('access');
    this.metricsService.incrementTokensIssued('refresh');
    this.auditLogger.logTokensIssued(
      userId,
      tokens.accessToken.tokenId,
      tokens.refreshToken.tokenId,
    );
    return tokens;
  }

  /**
   * Runs one login step, recording a FAILED transition if it throws.
   */
  private async tracked<T>(phone: string, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      const reason = error instanceof AuthException ? error.code : 'INTERNAL_ERROR';
      this.auditLogger.logLoginState(phone, LoginStatus.FAILED, reason);
      throw error;
    }
  }
}
