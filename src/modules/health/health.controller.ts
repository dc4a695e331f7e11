import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { AppConfigService } from '../app/app-config.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  health() {
    const now = new Date();
    const nowIso = now.toISOString();
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));
    const base = {
      nowIso,
      uptimeSeconds,
      service: 'glowup-api',
      nodeEnv: this.appConfig.nodeEnv(),
    };

    const startedAt = Date.now();
    try {
      // Readiness-style check: ensure the DB can execute a trivial query.
      this.database.ping();
      return { status: 'ok', ...base, db: { status: 'ok', latencyMs: Date.now() - startedAt } };
    } catch (err) {
      return {
        status: 'degraded',
        ...base,
        db: {
          status: 'down',
          latencyMs: Date.now() - startedAt,
          error: err instanceof Error ? err.message : String(err),
        },
      };
    }
  }
}
