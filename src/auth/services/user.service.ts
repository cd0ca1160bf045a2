import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from '../entities/user.entity';
import { AuditLoggerService } from '../../common/services/audit-logger.service';
import { ClockService } from '../../common/services/clock.service';
import { AuthErrorCode, AuthException } from '../../common/exceptions/auth.exception';

const UNIQUE_VIOLATION = '23505';

/**
 * Service responsible for user management operations.
 * Resolves a verified phone number to a durable user id.
 */
@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private auditLogger: AuditLoggerService,
    private clock: ClockService,
  ) {}

  /**
   * Returns the id of the user owning `phone`, creating the user on first login.
   * Marks the number verified and stamps `lastLoginAt` either way.
   *
   * Two first logins racing on the same phone end up with the same user: the
   * losing insert hits the unique constraint and re-reads the winner's row.
   *
   * @throws AuthException IDENTITY_STORE_UNAVAILABLE when the database fails
   */
  async resolveOrCreate(phone: string): Promise<string> {
    try {
      const existing = await this.userRepository.findOne({ where: { phone } });
      if (existing) {
        await this.markLoggedIn(existing);
        return existing.id;
      }

      return await this.create(phone);
    } catch (error) {
      if (error instanceof AuthException) {
        throw error;
      }
      this.logger.error(`Identity store failure: ${errorMessage(error)}`);
      throw new AuthException(AuthErrorCode.IDENTITY_STORE_UNAVAILABLE);
    }
  }

  private async create(phone: string): Promise<string> {
    const user = this.userRepository.create({
      phone,
      phoneVerified: true,
      lastLoginAt: new Date(this.clock.now()),
    });

    try {
      const saved = await this.userRepository.save(user);
      this.auditLogger.logUserCreated(saved.id, phone);
      return saved.id;
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    const winner = await this.userRepository.findOne({ where: { phone } });
    if (!winner) {
      throw new AuthException(AuthErrorCode.IDENTITY_STORE_UNAVAILABLE);
    }
    await this.markLoggedIn(winner);
    return winner.id;
  }

  private async markLoggedIn(user: User): Promise<void> {
    await this.userRepository.update(user.id, {
      phoneVerified: true,
      lastLoginAt: new Date(this.clock.now()),
    });
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
