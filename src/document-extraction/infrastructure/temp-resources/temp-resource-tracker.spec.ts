import { existsSync } from 'fs';
import { mkdir, mkdtemp, rm, symlink, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildDocumentExtractionConfig,
  createConfigService,
} from '../../testing/document-extraction-config.fixture';
import { TempResourceTracker } from './temp-resource-tracker';

describe('TempResourceTracker', () => {
  let baseDirectory: string;
  let tracker: TempResourceTracker;

  function createTracker(cleanup = true): TempResourceTracker {
    return new TempResourceTracker(
      createConfigService(
        buildDocumentExtractionConfig({
          tempFiles: { directory: baseDirectory, cleanup },
        }),
      ),
    );
  }

  beforeEach(async () => {
    baseDirectory = await mkdtemp(join(tmpdir(), 'temp-tracker-'));
    tracker = createTracker();
  });

  afterEach(async () => {
    await rm(baseDirectory, { recursive: true, force: true });
  });

  it('should create tracked directories and files under the base directory', async () => {
    const directory = await tracker.createTempDirectory();
    const file = await tracker.createTempFile('.png');

    expect(directory.startsWith(join(baseDirectory, 'docext_'))).toBe(true);
    expect(file.startsWith(join(baseDirectory, 'docext_'))).toBe(true);
    expect(file.endsWith('.png')).toBe(true);
    expect(existsSync(directory)).toBe(true);
    expect(existsSync(file)).toBe(true);
    expect(tracker.list()).toEqual([directory, file]);
  });

  it('should report whether untrack removed anything', async () => {
    const file = await tracker.createTempFile();

    expect(tracker.untrack(file)).toBe(true);
    expect(tracker.untrack(file)).toBe(false);
    expect(existsSync(file)).toBe(true);
  });

  it('should release a resource and stop tracking it', async () => {
    const directory = await tracker.createTempDirectory();
    await writeFile(join(directory, 'page-1.jpg'), 'x');

    await expect(tracker.release(directory)).resolves.toBe(true);
    expect(existsSync(directory)).toBe(false);
    expect(tracker.list()).toEqual([]);
  });

  it('should release everything it tracks', async () => {
    await tracker.createTempDirectory();
    await tracker.createTempFile();

    await expect(tracker.releaseAll()).resolves.toBe(2);
    expect(tracker.list()).toEqual([]);
  });

  it('should keep files when cleanup is disabled', async () => {
    tracker = createTracker(false);
    const file = await tracker.createTempFile();

    await expect(tracker.releaseAll()).resolves.toBe(0);
    expect(existsSync(file)).toBe(true);
  });

  describe('withScope', () => {
    it('should release scope resources after the work completes', async () => {
      let scoped = '';
      const result = await tracker.withScope(async (scope) => {
        scoped = await scope.createTempDirectory('pages_');
        expect(scope.list()).toEqual([scoped]);
        return 'done';
      });

      expect(result).toBe('done');
      expect(existsSync(scoped)).toBe(false);
      expect(tracker.list()).toEqual([]);
    });

    it('should release scope resources when the work throws', async () => {
      let scoped = '';
      await expect(
        tracker.withScope(async (scope) => {
          scoped = await scope.createTempFile('.jpg');
          throw new Error('rasterizer crashed');
        }),
      ).rejects.toThrow('rasterizer crashed');

      expect(scoped).not.toBe('');
      expect(existsSync(scoped)).toBe(false);
    });

    it('should only release what the scope itself created', async () => {
      const outside = await tracker.createTempFile();
      let first = '';
      let second = '';

      await Promise.all([
        tracker.withScope(async (scope) => {
          first = await scope.createTempFile();
        }),
        tracker.withScope(async (scope) => {
          second = await scope.createTempFile();
        }),
      ]);

      expect(existsSync(first)).toBe(false);
      expect(existsSync(second)).toBe(false);
      expect(existsSync(outside)).toBe(true);
      expect(tracker.list()).toEqual([outside]);
    });

    it('should release paths registered with track', async () => {
      const adopted = join(baseDirectory, 'adopted.png');
      await writeFile(adopted, 'x');

      await tracker.withScope(async (scope) => {
        expect(scope.track(adopted)).toBe(adopted);
      });

      expect(existsSync(adopted)).toBe(false);
    });

    it('should untrack but keep scope files when cleanup is disabled', async () => {
      tracker = createTracker(false);
      let scoped = '';

      await tracker.withScope(async (scope) => {
        scoped = await scope.createTempFile();
      });

      expect(existsSync(scoped)).toBe(true);
      expect(tracker.list()).toEqual([]);
    });
  });

  describe('cleanupStale', () => {
    it('should remove old prefixed entries only', async () => {
      const old = join(baseDirectory, 'docext_old');
      const recent = join(baseDirectory, 'docext_recent');
      const foreign = join(baseDirectory, 'other_old');
      await mkdir(old);
      await mkdir(recent);
      await mkdir(foreign);

      const twoDaysAgo = new Date(Date.now() - 48 * 3600 * 1000);
      await utimes(old, twoDaysAgo, twoDaysAgo);
      await utimes(foreign, twoDaysAgo, twoDaysAgo);

      await expect(tracker.cleanupStale(24)).resolves.toBe(1);
      expect(existsSync(old)).toBe(false);
      expect(existsSync(recent)).toBe(true);
      expect(existsSync(foreign)).toBe(true);
    });

    it('should skip entries that vanish before they can be inspected', async () => {
      const old = join(baseDirectory, 'docext_old');
      await mkdir(old);
      const twoDaysAgo = new Date(Date.now() - 48 * 3600 * 1000);
      await utimes(old, twoDaysAgo, twoDaysAgo);
      // Listed by readdir, but stat fails with ENOENT
      await symlink(join(baseDirectory, 'missing-target'), join(baseDirectory, 'docext_gone'));

      await expect(tracker.cleanupStale(24)).resolves.toBe(1);
      expect(existsSync(old)).toBe(false);
    });

    it('should return 0 when the base directory does not exist', async () => {
      await rm(baseDirectory, { recursive: true, force: true });

      await expect(tracker.cleanupStale()).resolves.toBe(0);
    });
  });
});
