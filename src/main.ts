import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { AppConfigService } from './modules/app/app-config.service';
import { configureApp } from './common/bootstrap/configure-app';

async function bootstrap() {
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const logLevels: LogLevel[] = isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'];
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger: logLevels });

  const appConfig = app.get(AppConfigService);

  if (!appConfig.isProd() && appConfig.logStartupInfo()) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `databasePath=${appConfig.databasePath()}`,
        `uploadDir=${appConfig.uploadDir()}`,
        `publicBaseUrl=${appConfig.publicBaseUrl()}`,
        `trustProxy=${appConfig.trustProxy()}`,
        `allowedOrigins=${appConfig.allowedOrigins().join(',') || '(none)'}`,
        `bodyJsonLimit=${appConfig.bodyJsonLimit()}`,
      ].join(' | '),
    );
  }

  configureApp(app);
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Glow Up API')
    .setDescription('Share a fit, collect 1-10 ratings and emoji reactions through a link.')
    .setVersion('2.0.0')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException | undefined)?.code;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use (set PORT in .env).`);
    } else {
      startup.error(`Failed to start server: ${(err as Error)?.message ?? String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
