import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { AuthModule } from './auth/auth.module';
import { RedisModule } from './redis/redis.module';
import { SmsModule } from './sms/sms.module';
import { CommonModule } from './common/common.module';
import { User } from './auth/entities/user.entity';
import { CreateUsersTable1730000000001 } from './database/migrations/1730000000001-CreateUsersTable';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    PrometheusModule.register({
      path: '/metrics',
      defaultMetrics: {
        enabled: true,
      },
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.username'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.database'),
        entities: [User],
        migrations: [CreateUsersTable1730000000001],
        migrationsRun: configService.get<boolean>('database.migrationsRun'),
        synchronize: false, // Disabled - using migrations instead
        logging: configService.get<string>('nodeEnv') === 'development',
        extra: {
          max: configService.get<number>('database.poolSize'), // Connection pool size
          connectionTimeoutMillis: configService.get<number>('database.connectionTimeoutMillis'),
        },
      }),
      inject: [ConfigService],
    }),
    RedisModule,
    SmsModule,
    CommonModule,
    AuthModule,
  ],
})
export class AppModule {}
