import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { mkdir, mkdtemp, readdir, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { AllConfigType } from '../../../config/config.type';
import { TempScope } from '../../domain/ports/temp-scope.port';

const RESOURCE_PREFIX = 'docext_';

/**
 * Tracks temp files and directories created while preparing documents.
 *
 * Injected into the extraction service rather than kept as a process-wide
 * singleton. Work is done inside `withScope`, which releases what the scope
 * created when the callback settles, including on errors. Concurrent scopes
 * only ever release their own resources.
 */
@Injectable()
export class TempResourceTracker implements OnApplicationShutdown {
  private readonly logger = new Logger(TempResourceTracker.name);
  private readonly tracked = new Set<string>();
  private readonly baseDirectory: string;
  private readonly cleanupEnabled: boolean;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const { directory, cleanup } = this.configService.getOrThrow(
      'documentExtraction.tempFiles',
      { infer: true },
    );
    this.baseDirectory = directory;
    this.cleanupEnabled = cleanup;
  }

  async onApplicationShutdown(): Promise<void> {
    await this.releaseAll();
  }

  async createTempDirectory(prefix = RESOURCE_PREFIX): Promise<string> {
    await mkdir(this.baseDirectory, { recursive: true });
    const directory = await mkdtemp(join(this.baseDirectory, prefix));
    this.track(directory);
    return directory;
  }

  async createTempFile(suffix = '', prefix = RESOURCE_PREFIX): Promise<string> {
    await mkdir(this.baseDirectory, { recursive: true });
    const filePath = join(this.baseDirectory, `${prefix}${randomUUID()}${suffix}`);
    await writeFile(filePath, '');
    this.track(filePath);
    return filePath;
  }

  track(resourcePath: string): string {
    this.tracked.add(resourcePath);
    this.logger.debug(`[TEMP] Tracking resource: ${resourcePath}`);
    return resourcePath;
  }

  /**
   * Stop tracking without deleting
   * @returns whether the resource was tracked
   */
  untrack(resourcePath: string): boolean {
    const wasTracked = this.tracked.delete(resourcePath);
    if (wasTracked) {
      this.logger.debug(`[TEMP] Untracked resource: ${resourcePath}`);
    }
    return wasTracked;
  }

  /**
   * Delete a resource (file or directory) and stop tracking it
   * @returns false when deletion failed
   */
  async release(resourcePath: string): Promise<boolean> {
    try {
      await rm(resourcePath, { recursive: true, force: true });
      this.tracked.delete(resourcePath);
      this.logger.debug(`[TEMP] Deleted resource: ${resourcePath}`);
      return true;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `[TEMP] Failed to cleanup resource ${resourcePath}: ${errorMessage}`,
      );
      return false;
    }
  }

  /**
   * @returns number of resources deleted (0 when cleanup is disabled)
   */
  async releaseAll(): Promise<number> {
    if (!this.cleanupEnabled) {
      this.logger.debug('[TEMP] Resource cleanup is disabled');
      return 0;
    }

    const results = await Promise.all(
      this.list().map((resourcePath) => this.release(resourcePath)),
    );
    const cleaned = results.filter(Boolean).length;

    this.logger.log(`[TEMP] Cleaned up ${cleaned} resources`);
    return cleaned;
  }

  list(): string[] {
    return [...this.tracked];
  }

  isCleanupEnabled(): boolean {
    return this.cleanupEnabled;
  }

  async withScope<T>(work: (scope: TempScope) => Promise<T>): Promise<T> {
    const scope = new TrackedTempScope(this);
    try {
      return await work(scope);
    } finally {
      await scope.close();
    }
  }

  /**
   * Remove leftovers from earlier runs (crashes, disabled cleanup)
   * @returns number of entries removed
   */
  async cleanupStale(maxAgeHours = 24): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.baseDirectory);
    } catch {
      return 0; // Directory not created yet
    }

    const cutoff = Date.now() - maxAgeHours * 3600 * 1000;
    let cleaned = 0;

    for (const entry of entries) {
      if (!entry.startsWith(RESOURCE_PREFIX)) {
        continue;
      }
      const entryPath = join(this.baseDirectory, entry);
      if (this.tracked.has(entryPath)) {
        continue;
      }
      let mtimeMs: number;
      try {
        ({ mtimeMs } = await stat(entryPath));
      } catch (error) {
        // Removed since readdir, e.g. by another instance sharing TEMP_DIR
        this.logger.debug(
          `[TEMP] Skipping ${entryPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
        continue;
      }
      if (mtimeMs < cutoff && (await this.release(entryPath))) {
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.log(`[TEMP] Cleaned up ${cleaned} old temporary resources`);
    }
    return cleaned;
  }
}

class TrackedTempScope implements TempScope {
  private readonly owned = new Set<string>();

  constructor(private readonly tracker: TempResourceTracker) {}

  async createTempDirectory(prefix?: string): Promise<string> {
    const directory = await this.tracker.createTempDirectory(
      `${RESOURCE_PREFIX}${prefix ?? ''}`,
    );
    this.owned.add(directory);
    return directory;
  }

  async createTempFile(suffix?: string, prefix?: string): Promise<string> {
    const filePath = await this.tracker.createTempFile(
      suffix,
      `${RESOURCE_PREFIX}${prefix ?? ''}`,
    );
    this.owned.add(filePath);
    return filePath;
  }

  track(resourcePath: string): string {
    this.owned.add(resourcePath);
    return this.tracker.track(resourcePath);
  }

  list(): string[] {
    return [...this.owned];
  }

  async close(): Promise<void> {
    const resources = this.list();
    this.owned.clear();

    if (!this.tracker.isCleanupEnabled()) {
      resources.forEach((resourcePath) => this.tracker.untrack(resourcePath));
      return;
    }

    await Promise.all(
      resources.map((resourcePath) => this.tracker.release(resourcePath)),
    );
  }
}
