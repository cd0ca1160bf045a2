import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JwtModule } from '@nestjs/jwt';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { OtpService } from './otp.service';
import { User } from './entities/user.entity';
import { SmsModule } from '../sms/sms.module';
import { CommonModule } from '../common/common.module';
import { AuthGuard } from './guards/auth.guard';
import { TokenService } from './services/token.service';
import { UserService } from './services/user.service';
import { OtpStoreService } from './services/otp-store.service';
import { OtpRateLimiterService } from './services/otp-rate-limiter.service';
import { RevocationStoreService } from './services/revocation-store.service';
import { AuthStoreCleanupService } from './services/auth-store-cleanup.service';

@Module({
  // Secrets are passed per call by TokenService, keyed by `kid`.
  imports: [TypeOrmModule.forFeature([User]), JwtModule.register({}), SmsModule, CommonModule],
  controllers: [AuthController],
  providers: [
    AuthService,
    OtpService,
    AuthGuard,
    TokenService,
    UserService,
    OtpStoreService,
    OtpRateLimiterService,
    RevocationStoreService,
    AuthStoreCleanupService,
  ],
  exports: [AuthService, AuthGuard],
})
export class AuthModule {}
