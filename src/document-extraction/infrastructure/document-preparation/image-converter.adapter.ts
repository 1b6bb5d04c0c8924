import { Injectable, Logger } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import Jimp from 'jimp';
import { extname } from 'path';
import sharp from 'sharp';
import { ImageConverterPort } from '../../domain/ports/image-converter.port';

// libvips has no BMP loader
const JIMP_ONLY_EXTENSIONS: readonly string[] = ['.bmp'];

@Injectable()
export class ImageConverterAdapter implements ImageConverterPort {
  private readonly logger = new Logger(ImageConverterAdapter.name);

  async convertToPng(sourcePath: string, targetPath: string): Promise<void> {
    const input = await readFile(sourcePath);
    const extension = extname(sourcePath).toLowerCase();

    const output = JIMP_ONLY_EXTENSIONS.includes(extension)
      ? await (await Jimp.read(input)).getBufferAsync(Jimp.MIME_PNG)
      : await sharp(input).png().toBuffer();

    await writeFile(targetPath, output);
    this.logger.debug(`[CONVERT] ${sourcePath} -> ${targetPath}`);
  }
}
