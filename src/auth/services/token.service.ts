import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { JsonWebTokenError } from 'jsonwebtoken';
import { ClockService } from '../../common/services/clock.service';
import { RandomService } from '../../common/services/random.service';
import { AuthErrorCode, AuthException } from '../../common/exceptions/auth.exception';
import { AUTH_CONSTANTS } from '../constants/auth.constants';
import { IssuedToken, TokenClaims, TokenPair, TokenPayload, TokenType } from '../types/auth.types';

export interface VerifyOptions {
  /** Accept a correctly signed token whose `exp` has passed. */
  allowExpired?: boolean;
}

/**
 * Service responsible for minting and verifying signed access/refresh tokens.
 *
 * Stateless: verification never touches a store. Signing keys are read once at
 * construction into a `kid -> secret` map; the active key signs, every key in the
 * map verifies, so retired keys keep old tokens valid until they expire.
 */
@Injectable()
export class TokenService {
  private readonly keys: ReadonlyMap<string, string>;
  private readonly activeKeyId: string;
  private readonly activeSecret: string;
  private readonly issuer: string;

  constructor(
    private jwtService: JwtService,
    private configService: ConfigService,
    private clock: ClockService,
    private random: RandomService,
  ) {
    const configuredKeys = this.configService.getOrThrow<Record<string, string>>('auth.jwt.keys');
    this.keys = new Map(Object.entries(configuredKeys));
    this.activeKeyId = this.configService.getOrThrow<string>('auth.jwt.activeKeyId');
    this.issuer = this.configService.getOrThrow<string>('auth.jwt.issuer');

    const activeSecret = this.keys.get(this.activeKeyId);
    if (activeSecret === undefined) {
      throw new Error(`Active signing key '${this.activeKeyId}' is not configured`);
    }
    this.activeSecret = activeSecret;
  }

  /**
   * Mints an access token and a refresh token for `userId`, each with a fresh id.
   */
  issuePair(userId: string): TokenPair {
    return {
      accessToken: this.issue(userId, 'access'),
      refreshToken: this.issue(userId, 'refresh'),
    };
  }

  /**
   * Verifies signature, type and expiry, in that order.
   *
   * @throws AuthException INVALID_SIGNATURE, WRONG_TYPE, EXPIRED or INVALID_TOKEN
   */
  verify(token: string, expectedType: TokenType, options: VerifyOptions = {}): TokenClaims {
    const keyId = this.readKeyId(token);
    const secret = keyId === null ? undefined : this.keys.get(keyId);
    if (keyId === null || secret === undefined) {
      throw new AuthException(AuthErrorCode.INVALID_SIGNATURE);
    }

    let payload: unknown;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        secret,
        algorithms: [AUTH_CONSTANTS.TOKEN.ALGORITHM],
        issuer: this.issuer,
        ignoreExpiration: true,
      });
    } catch (error) {
      if (error instanceof JsonWebTokenError || error instanceof SyntaxError) {
        throw new AuthException(AuthErrorCode.INVALID_SIGNATURE);
      }
      throw error;
    }

    if (!isTokenPayload(payload)) {
      throw new AuthException(AuthErrorCode.INVALID_TOKEN);
    }

    if (payload.type !== expectedType) {
      throw new AuthException(AuthErrorCode.WRONG_TYPE);
    }

    if (!options.allowExpired && this.nowSeconds() >= payload.exp) {
      throw new AuthException(AuthErrorCode.EXPIRED);
    }

    return {
      subjectId: payload.sub,
      tokenId: payload.jti,
      type: payload.type,
      issuedAt: new Date(payload.iat * 1000),
      expiresAt: new Date(payload.exp * 1000),
      keyId,
    };
  }

  private issue(userId: string, type: TokenType): IssuedToken {
    const ttlSeconds = this.configService.getOrThrow<number>(
      type === 'access' ? 'auth.jwt.accessTokenTtlSeconds' : 'auth.jwt.refreshTokenTtlSeconds',
    );
    const issuedAt = this.nowSeconds();
    const payload: TokenPayload = {
      sub: userId,
      jti: this.random.uuid(),
      type,
      iat: issuedAt,
      exp: issuedAt + ttlSeconds,
      iss: this.issuer,
    };

    const token = this.jwtService.sign(payload, {
      secret: this.activeSecret,
      algorithm: AUTH_CONSTANTS.TOKEN.ALGORITHM,
      keyid: this.activeKeyId,
    });

    return {
      token,
      tokenId: payload.jti,
      type,
      expiresAt: new Date(payload.exp * 1000),
    };
  }

  private readKeyId(token: string): string | null {
    let decoded: unknown;
    try {
      decoded = this.jwtService.decode<unknown>(token, { complete: true });
    } catch (error) {
      // Header or payload segments that are not JSON.
      if (error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }

    if (
      typeof decoded === 'object' &&
      decoded !== null &&
      'header' in decoded &&
      typeof decoded.header === 'object' &&
      decoded.header !== null &&
      'kid' in decoded.header &&
      typeof decoded.header.kid === 'string'
    ) {
      return decoded.header.kid;
    }

    return null;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now() / 1000);
  }
}

function isTokenPayload(value: unknown): value is TokenPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sub' in value &&
    typeof value.sub === 'string' &&
    'jti' in value &&
    typeof value.jti === 'string' &&
    'type' in value &&
    (value.type === 'access' || value.type === 'refresh') &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number'
  );
}
