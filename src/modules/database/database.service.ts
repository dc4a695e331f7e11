import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import { sql } from 'drizzle-orm';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { AppConfigService } from '../app/app-config.service';
import { SCHEMA_DDL } from './schema';

export type Db = BetterSQLite3Database;

/**
 * Owns the single SQLite connection for the process. Opened on module init, closed on shutdown.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private sqlite: Database.Database | null = null;
  private handle: Db | null = null;

  constructor(private readonly appConfig: AppConfigService) {}

  get db(): Db {
    if (!this.handle) throw new Error('Database is not open');
    return this.handle;
  }

  onModuleInit() {
    const file = this.appConfig.databasePath();
    if (file !== ':memory:') fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });

    const sqlite = new Database(file);
    // SQLite leaves FK enforcement off per connection; cascades depend on it.
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(SCHEMA_DDL);

    const logQueries = this.appConfig.logQueries();
    this.sqlite = sqlite;
    this.handle = drizzle(sqlite, {
      logger: logQueries
        ? {
            logQuery: (query: string) => {
              // Do NOT log params (usernames, PIN hashes). A short fingerprint is enough for grouping.
              const kind = query.trim().split(/\s+/, 1)[0]?.toUpperCase() || 'QUERY';
              const fp = crypto.createHash('sha1').update(query).digest('hex').slice(0, 10);
              this.logger.debug(`[sqlite] kind=${kind} query=${fp}`);
            },
          }
        : false,
    });
    this.logger.log(`SQLite ready at ${file}`);
  }

  onModuleDestroy() {
    this.sqlite?.close();
    this.sqlite = null;
    this.handle = null;
  }

  /** Readiness probe. */
  ping(): void {
    this.db.get(sql`SELECT 1`);
  }
}
