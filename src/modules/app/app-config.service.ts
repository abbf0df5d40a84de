import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AuthorizationPolicy, DenialMode } from '../authorization/ownership';
import type { VisibilityPolicy } from '../visibility/visibility.rules';

export type NodeEnv = 'development' | 'test' | 'production';

const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'production'];

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number) {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = (this.config.get<string>('NODE_ENV') ?? 'development').trim().toLowerCase();
    return NODE_ENVS.find((e) => e === raw) ?? 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    const raw = this.config.get<string>('PORT') ?? '3001';
    const n = Number(raw);
    return Number.isFinite(n) ? n : 3001;
  }

  databaseUrl(): string {
    return (this.config.get<string>('DATABASE_URL') ?? '').trim();
  }

  /** Number of connection retries on startup (default 20). */
  dbConnectRetries(): number {
    return this.readPositiveInt('DB_CONNECT_RETRIES', 20);
  }

  /** Delay in ms between connection retries (default 500). */
  dbConnectRetryDelayMs(): number {
    return this.readPositiveInt('DB_CONNECT_RETRY_DELAY_MS', 500);
  }

  dbLogSlowQueries(): boolean {
    return this.readBool('DB_LOG_SLOW_QUERIES', !this.isProd());
  }

  dbSlowQueryMs(): number {
    return this.readPositiveInt('DB_SLOW_QUERY_MS', 200);
  }

  /** Apply db/schema.sql on startup (idempotent CREATE ... IF NOT EXISTS). */
  dbApplySchema(): boolean {
    return this.readBool('DB_APPLY_SCHEMA', false);
  }

  dbSchemaPath(): string {
    return (this.config.get<string>('DB_SCHEMA_PATH') ?? 'db/schema.sql').trim() || 'db/schema.sql';
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  sessionHmacSecret(): string {
    // env schema requires a real secret in production
    return this.config.get<string>('SESSION_HMAC_SECRET') ?? 'dev-session-secret-change-me';
  }

  cookieDomain(): string | undefined {
    const v = this.config.get<string>('COOKIE_DOMAIN');
    return v?.trim() ? v.trim() : undefined;
  }

  /** Posts per listing page (index, category, profile). */
  pageSize(): number {
    return this.readPositiveInt('PAGE_SIZE', 10);
  }

  authorizationPolicy(): AuthorizationPolicy {
    const rawMode = (this.config.get<string>('AUTH_DENIAL_MODE') ?? '').trim().toLowerCase();
    const denialMode: DenialMode = rawMode === 'redirect' ? 'redirect' : 'forbidden';
    return {
      staffOverride: this.readBool('AUTH_STAFF_OVERRIDE', false),
      denialMode,
    };
  }

  visibilityPolicy(): VisibilityPolicy {
    return { staffSeesAll: this.readBool('VISIBILITY_STAFF_SEES_ALL', false) };
  }

  rateLimitTtlMs(): number {
    return this.readPositiveInt('RATE_LIMIT_TTL_SECONDS', 60) * 1000;
  }

  rateLimitLimit(): number {
    // Pretty generous default.
    return this.readPositiveInt('RATE_LIMIT_LIMIT', 600);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  bodyJsonLimit(): string {
    return (this.config.get<string>('BODY_JSON_LIMIT') ?? '1mb').trim() || '1mb';
  }

  requireCsrfOriginInProd(): boolean {
    return this.readBool('REQUIRE_CSRF_ORIGIN_IN_PROD', true);
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  logStartupInfo(): boolean {
    return this.readBool('LOG_STARTUP_INFO', true);
  }
}
