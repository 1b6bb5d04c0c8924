import { Injectable, Logger } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import sharp from 'sharp';
import {
  ImageResizerPort,
  ResizeOutcome,
} from '../../domain/ports/image-resizer.port';

const JPEG_QUALITY = 95;

@Injectable()
export class SharpImageResizerAdapter implements ImageResizerPort {
  private readonly logger = new Logger(SharpImageResizerAdapter.name);

  async resizeInPlace(
    paths: string[],
    maxDimension: number,
  ): Promise<ResizeOutcome[]> {
    const outcomes: ResizeOutcome[] = [];
    for (const path of paths) {
      outcomes.push(await this.resizeOne(path, maxDimension));
    }
    return outcomes;
  }

  private async resizeOne(
    path: string,
    maxDimension: number,
  ): Promise<ResizeOutcome> {
    // Read into memory first: sharp cannot write to the file it streams from
    const input = await readFile(path);
    const metadata = await sharp(input).metadata();
    const width = metadata.width ?? 0;
    const height = metadata.height ?? 0;
    const originalSize = { width, height };

    if (Math.max(width, height) <= maxDimension) {
      return { path, originalSize, size: originalSize, resized: false };
    }

    let pipeline = sharp(input).resize({
      width: maxDimension,
      height: maxDimension,
      fit: 'inside',
      withoutEnlargement: true,
    });
    if (metadata.format === 'jpeg') {
      pipeline = pipeline.jpeg({ quality: JPEG_QUALITY });
    }

    const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
    await writeFile(path, data);

    this.logger.debug(
      `[RESIZE] ${path}: ${width}x${height} -> ${info.width}x${info.height}`,
    );

    return {
      path,
      originalSize,
      size: { width: info.width, height: info.height },
      resized: true,
    };
  }
}
