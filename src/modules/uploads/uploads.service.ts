import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { AppConfigService } from '../app/app-config.service';

/**
 * Flat directory of uploaded images, named `{postId}.{ext}`.
 */
@Injectable()
export class UploadsService implements OnModuleInit {
  private readonly logger = new Logger(UploadsService.name);

  constructor(private readonly appConfig: AppConfigService) {}

  async onModuleInit() {
    await fs.mkdir(this.dir(), { recursive: true });
  }

  dir(): string {
    return this.appConfig.uploadDir();
  }

  pathFor(filename: string): string {
    return path.join(this.dir(), filename);
  }

  async write(filename: string, bytes: Buffer): Promise<void> {
    await fs.writeFile(this.pathFor(filename), bytes);
  }

  /** Removes the file; a file that is already gone is not an error. */
  async remove(filename: string): Promise<void> {
    const target = this.pathFor(filename);
    try {
      await fs.unlink(target);
    } catch (err) {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') {
        this.logger.warn(`Image already missing: ${filename}`);
        return;
      }
      throw err;
    }
  }
}
