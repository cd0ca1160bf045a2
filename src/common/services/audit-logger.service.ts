import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export enum AuditEventType {
  OTP_ISSUED = 'OTP_ISSUED',
  OTP_DISPATCH_FAILED = 'OTP_DISPATCH_FAILED',
  OTP_VERIFIED = 'OTP_VERIFIED',
  OTP_VERIFICATION_FAILED = 'OTP_VERIFICATION_FAILED',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  USER_CREATED = 'USER_CREATED',
  LOGIN_STATE_CHANGED = 'LOGIN_STATE_CHANGED',
  TOKENS_ISSUED = 'TOKENS_ISSUED',
  TOKEN_REFRESHED = 'TOKEN_REFRESHED',
  TOKEN_REFRESH_REJECTED = 'TOKEN_REFRESH_REJECTED',
  TOKEN_REVOKED = 'TOKEN_REVOKED',
  SUSPICIOUS_ACTIVITY = 'SUSPICIOUS_ACTIVITY',
  STORE_CLEANUP = 'STORE_CLEANUP',
}

export type AuditMetadata = Record<string, string | number | boolean | null | undefined>;

export interface AuditLogEntry {
  timestamp: Date;
  eventType: AuditEventType;
  userId?: string;
  phone?: string;
  metadata?: AuditMetadata;
  success: boolean;
  message?: string;
}

/**
 * Service for logging security and authentication events.
 * Never receives OTP codes, code hashes or raw tokens.
 */
@Injectable()
export class AuditLoggerService {
  private readonly logger = new Logger(AuditLoggerService.name);
  private readonly isProduction: boolean;

  constructor(private configService: ConfigService) {
    this.isProduction = this.configService.get<string>('nodeEnv') === 'production';
  }

  /**
   * Logs an audit event for security monitoring and compliance.
   */
  log(entry: AuditLogEntry): void {
    const logData = {
      timestamp: entry.timestamp.toISOString(),
      eventType: entry.eventType,
      userId: entry.userId || 'N/A',
      phone: this.maskPhoneNumber(entry.phone),
      success: entry.success,
      message: entry.message,
      metadata: entry.metadata,
    };

    if (this.isProduction) {
      this.logger.log(JSON.stringify(logData));
    } else {
      this.logger.log(`[AUDIT] ${entry.eventType}`, logData);
    }

    if (this.isSecurityEvent(entry.eventType) && !entry.success) {
      this.logger.warn(`[SECURITY] ${entry.eventType} - ${entry.message}`, logData);
    }
  }

  logOtpIssued(phone: string, expiresAt: Date): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_ISSUED,
      phone,
      success: true,
      message: 'OTP issued',
      metadata: { expiresAt: expiresAt.toISOString() },
    });
  }

  logOtpDispatchFailed(phone: string, reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_DISPATCH_FAILED,
      phone,
      success: false,
      message: reason,
    });
  }

  logOtpVerified(phone: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_VERIFIED,
      phone,
      success: true,
      message: 'OTP verified and consumed',
    });
  }

  logOtpVerificationFailed(phone: string, reason: string, metadata?: AuditMetadata): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.OTP_VERIFICATION_FAILED,
      phone,
      success: false,
      message: reason,
      metadata,
    });
  }

  logRateLimitExceeded(phone: string, limitType: string, retryAfterSeconds: number): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.RATE_LIMIT_EXCEEDED,
      phone,
      success: false,
      message: `Rate limit exceeded: ${limitType}`,
      metadata: { limitType, retryAfterSeconds },
    });
  }

  logUserCreated(userId: string, phone: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.USER_CREATED,
      userId,
      phone,
      success: true,
      message: 'New user created',
    });
  }

  /**
   * Records a transition of a login attempt (AWAITING_CODE, VERIFIED, TOKEN_ISSUED, FAILED).
   */
  logLoginState(phone: string, state: string, reason?: string, userId?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.LOGIN_STATE_CHANGED,
      userId,
      phone,
      success: state !== 'FAILED',
      message: reason ? `${state}: ${reason}` : state,
      metadata: { state },
    });
  }

  logTokensIssued(userId: string, accessTokenId: string, refreshTokenId: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.TOKENS_ISSUED,
      userId,
      success: true,
      message: 'Access and refresh tokens issued',
      metadata: { accessTokenId, refreshTokenId },
    });
  }

  logTokenRefreshed(userId: string, previousTokenId: string, refreshTokenId: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.TOKEN_REFRESHED,
      userId,
      success: true,
      message: 'Refresh token rotated',
      metadata: { previousTokenId, refreshTokenId },
    });
  }

  logTokenRefreshRejected(reason: string, userId?: string, tokenId?: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.TOKEN_REFRESH_REJECTED,
      userId,
      success: false,
      message: reason,
      metadata: { tokenId },
    });
  }

  logTokenRevoked(userId: string, tokenId: string, reason: string): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.TOKEN_REVOKED,
      userId,
      success: true,
      message: `Token revoked: ${reason}`,
      metadata: { tokenId, reason },
    });
  }

  /**
   * Logs suspicious activity that requires attention.
   */
  logSuspiciousActivity(description: string, metadata?: AuditMetadata): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.SUSPICIOUS_ACTIVITY,
      success: false,
      message: description,
      metadata,
    });
  }

  logStoreCleanup(success: boolean, message: string, metadata?: AuditMetadata): void {
    this.log({
      timestamp: new Date(),
      eventType: AuditEventType.STORE_CLEANUP,
      success,
      message,
      metadata,
    });
  }

  /**
   * Masks phone number for privacy in logs (shows only last 4 digits).
   */
  maskPhoneNumber(phone?: string): string {
    if (!phone) return 'N/A';

    if (phone.length <= 4) return '****';

    const lastFour = phone.slice(-4);
    return '*'.repeat(phone.length - 4) + lastFour;
  }

  private isSecurityEvent(eventType: AuditEventType): boolean {
    const securityEvents = [
      AuditEventType.OTP_VERIFICATION_FAILED,
      AuditEventType.RATE_LIMIT_EXCEEDED,
      AuditEventType.TOKEN_REFRESH_REJECTED,
      AuditEventType.SUSPICIOUS_ACTIVITY,
    ];

    return securityEvents.includes(eventType);
  }
}
