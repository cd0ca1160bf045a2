import { Module } from '@nestjs/common';
import { AuditLoggerService } from './services/audit-logger.service';
import { MetricsService } from './services/metrics.service';
import { ClockService } from './services/clock.service';
import { RandomService } from './services/random.service';
import { ConfigValidationService } from './config/config-validation.service';

@Module({
  providers: [
    AuditLoggerService,
    MetricsService,
    ClockService,
    RandomService,
    ConfigValidationService,
  ],
  exports: [
    AuditLoggerService,
    MetricsService,
    ClockService,
    RandomService,
    ConfigValidationService,
  ],
})
export class CommonModule {}
