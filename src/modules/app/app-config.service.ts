import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'node:path';
import type { Env } from './env';

export type NodeEnv = Env['NODE_ENV'];

const DEFAULT_PORT = 8000;
const DEFAULT_PUBLIC_BASE_URL = 'http://localhost:8000';

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

  nodeEnv(): NodeEnv {
    const raw = (this.config.get<string>('NODE_ENV') ?? 'development').trim().toLowerCase();
    return raw === 'production' || raw === 'test' ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    const raw = this.config.get<string>('PORT') ?? String(DEFAULT_PORT);
    const n = Number(raw);
    return Number.isFinite(n) ? n : DEFAULT_PORT;
  }

  /** SQLite database file, or ":memory:". */
  databasePath(): string {
    return (this.config.get<string>('DATABASE_PATH') ?? 'glowup.db').trim() || 'glowup.db';
  }

  /** Absolute path of the image upload directory. */
  uploadDir(): string {
    const raw = (this.config.get<string>('UPLOAD_DIR') ?? 'uploads').trim() || 'uploads';
    return path.resolve(raw);
  }

  /** Base URL for absolute image links when a request does not override it. */
  publicBaseUrl(): string {
    return (this.config.get<string>('PUBLIC_BASE_URL') ?? DEFAULT_PUBLIC_BASE_URL).trim() || DEFAULT_PUBLIC_BASE_URL;
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '*';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  allowsAnyOrigin(): boolean {
    return this.allowedOrigins().includes('*');
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowsAnyOrigin() || this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  bodyJsonLimit(): string {
    return (this.config.get<string>('BODY_JSON_LIMIT') ?? '1mb').trim() || '1mb';
  }

  bodyUrlEncodedLimit(): string {
    return (this.config.get<string>('BODY_URLENCODED_LIMIT') ?? '25kb').trim() || '25kb';
  }

  logRequests(): boolean {
    // Only meaningful in non-prod.
    return this.readBool('LOG_REQUESTS', false);
  }

  /** Debug-log a fingerprint of every SQL statement. */
  logQueries(): boolean {
    return this.readBool('DATABASE_LOG_QUERIES', false);
  }

  logStartupInfo(): boolean {
    return this.readBool('LOG_STARTUP_INFO', false);
  }
}
