import { Controller, Get } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import { AppConfigService } from '../app/app-config.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly db: DatabaseService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  async health() {
    const now = new Date();
    const base = {
      nowIso: now.toISOString(),
      uptimeSeconds: Math.max(0, Math.floor(process.uptime())),
      service: 'blog-api',
      config: {
        nodeEnv: this.appConfig.nodeEnv(),
        pageSize: this.appConfig.pageSize(),
        denialMode: this.appConfig.authorizationPolicy().denialMode,
      },
    };

    const startedAt = Date.now();
    try {
      // Readiness-style check: ensure the DB can execute a trivial query.
      await this.db.ping();
      return { data: { ...base, status: 'ok', db: { status: 'ok', latencyMs: Date.now() - startedAt } } };
    } catch (err) {
      return {
        data: {
          ...base,
          status: 'degraded',
          db: {
            status: 'down',
            latencyMs: Date.now() - startedAt,
            error: err instanceof Error ? err.message : String(err),
          },
        },
      };
    }
  }
}
