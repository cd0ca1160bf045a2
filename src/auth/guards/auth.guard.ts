import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { AuthService } from '../auth.service';
import { AuditLoggerService } from '../../common/services/audit-logger.service';
import { AuthErrorCode, AuthException } from '../../common/exceptions/auth.exception';
import { AuthenticatedUser } from '../types/auth.types';

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

/**
 * Admits requests carrying a valid access token in `Authorization: Bearer`.
 *
 * CSRF Protection: Not required for this API.
 * Bearer tokens must be added to each request explicitly, so browsers never
 * attach them on their own.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private authService: AuthService,
    private auditLogger: AuditLoggerService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      const authHeader = request.headers.authorization;
      this.auditLogger.logSuspiciousActivity('Missing or malformed authorization header', {
        ipAddress: request.ip,
        authHeaderPresent: !!authHeader,
        authHeaderFormat: authHeader ? authHeader.split(' ')[0] : 'none',
        path: request.url,
      });
      throw new AuthException(AuthErrorCode.INVALID_TOKEN);
    }

    const claims = this.authService.authenticate(token);

    request.user = {
      userId: claims.subjectId,
      tokenId: claims.tokenId,
      expiresAt: claims.expiresAt,
    };

    return true;
  }

  private extractTokenFromHeader(request: Request): string | undefined {
    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return undefined;
    }

    const [type, token] = authHeader.split(' ');
    return type === 'Bearer' && token ? token : undefined;
  }
}
