import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { SharpImageResizerAdapter } from './sharp-image-resizer.adapter';

describe('SharpImageResizerAdapter', () => {
  let resizer: SharpImageResizerAdapter;
  let directory: string;

  async function createImage(
    name: string,
    width: number,
    height: number,
    format: 'png' | 'jpeg',
  ): Promise<string> {
    const path = join(directory, name);
    const image = sharp({
      create: {
        width,
        height,
        channels: 3,
        background: { r: 255, g: 255, b: 255 },
      },
    });
    await (format === 'png' ? image.png() : image.jpeg()).toFile(path);
    return path;
  }

  beforeEach(async () => {
    resizer = new SharpImageResizerAdapter();
    directory = await mkdtemp(join(tmpdir(), 'resizer-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should cap the longest edge and keep the aspect ratio', async () => {
    const path = await createImage('wide.png', 2000, 1000, 'png');

    const [outcome] = await resizer.resizeInPlace([path], 1024);

    expect(outcome).toEqual({
      path,
      originalSize: { width: 2000, height: 1000 },
      size: { width: 1024, height: 512 },
      resized: true,
    });
    const metadata = await sharp(path).metadata();
    expect([metadata.width, metadata.height, metadata.format]).toEqual([
      1024,
      512,
      'png',
    ]);
  });

  it('should keep JPEG output for JPEG input', async () => {
    const path = await createImage('tall.jpg', 600, 1200, 'jpeg');

    await resizer.resizeInPlace([path], 300);

    const metadata = await sharp(path).metadata();
    expect([metadata.width, metadata.height, metadata.format]).toEqual([
      150,
      300,
      'jpeg',
    ]);
  });

  it('should leave small images untouched', async () => {
    const path = await createImage('small.png', 200, 100, 'png');

    const [outcome] = await resizer.resizeInPlace([path], 1024);

    expect(outcome.resized).toBe(false);
    expect(outcome.size).toEqual({ width: 200, height: 100 });
  });
});
