import { ConfigService } from '@nestjs/config';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AppConfigService } from '../../src/modules/app/app-config.service';

export const TEST_PUBLIC_BASE_URL = 'http://test.local';

/** In-memory database and a throwaway upload directory, whatever the process env says. */
export class TestAppConfigService extends AppConfigService {
  constructor(private readonly testUploadDir: string) {
    super(new ConfigService());
  }

  databasePath(): string {
    return ':memory:';
  }

  uploadDir(): string {
    return this.testUploadDir;
  }

  publicBaseUrl(): string {
    return TEST_PUBLIC_BASE_URL;
  }

  logQueries(): boolean {
    return false;
  }

  logRequests(): boolean {
    return false;
  }
}

export function makeTempUploadDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'glowup-uploads-'));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}
