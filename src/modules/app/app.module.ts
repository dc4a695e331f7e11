import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { envSchema, validateEnv } from './env';
import { AppConfigModule } from './app-config.module';
import { DatabaseModule } from '../database/database.module';
import { HealthModule } from '../health/health.module';
import { UploadsModule } from '../uploads/uploads.module';
import { FitsModule } from '../fits/fits.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv(envSchema),
    }),
    AppConfigModule,
    DatabaseModule,
    HealthModule,
    UploadsModule,
    FitsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
