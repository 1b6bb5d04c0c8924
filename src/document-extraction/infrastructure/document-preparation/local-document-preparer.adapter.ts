import { Inject, Injectable, Logger } from '@nestjs/common';
import { copyFile, mkdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import {
  DocumentPreparationError,
  ValidationError,
} from '../../domain/errors/extraction.errors';
import {
  DocumentPreparerPort,
  SUPPORTED_DOCUMENT_EXTENSIONS,
} from '../../domain/ports/document-preparer.port';
import {
  ImageConverterPort,
  VISION_IMAGE_EXTENSIONS,
} from '../../domain/ports/image-converter.port';
import { ImageResizerPort } from '../../domain/ports/image-resizer.port';
import { PdfRasterizerPort } from '../../domain/ports/pdf-rasterizer.port';
import { TempScope } from '../../domain/ports/temp-scope.port';

/**
 * Prepares documents on the local filesystem: PDFs are rasterized page by
 * page, web-format images are copied, other images (BMP, TIFF) become PNG
 * copies, and every working image is capped in size.
 */
@Injectable()
export class LocalDocumentPreparerAdapter implements DocumentPreparerPort {
  private readonly logger = new Logger(LocalDocumentPreparerAdapter.name);

  constructor(
    @Inject('PdfRasterizerPort')
    private readonly pdfRasterizer: PdfRasterizerPort,
    @Inject('ImageResizerPort')
    private readonly imageResizer: ImageResizerPort,
    @Inject('ImageConverterPort')
    private readonly imageConverter: ImageConverterPort,
  ) {}

  async validateFiles(filePaths: string[]): Promise<void> {
    const problems: Record<string, string> = {};

    for (const [index, filePath] of filePaths.entries()) {
      const problem = await this.checkFile(filePath);
      if (problem) {
        problems[`files[${index}]`] = problem;
      }
    }

    const entries = Object.entries(problems);
    if (entries.length > 0) {
      throw new ValidationError(
        `Invalid input files: ${entries
          .map(([key, problem]) => `${key}: ${problem}`)
          .join('; ')}`,
        problems,
      );
    }
  }

  async prepare(
    filePaths: string[],
    maxImageSize: number,
    scope: TempScope,
  ): Promise<string[]> {
    const workDirectory = await scope.createTempDirectory('pages_');
    const images: string[] = [];

    for (const [index, filePath] of filePaths.entries()) {
      const extension = extname(filePath).toLowerCase();
      if (extension === '.pdf') {
        images.push(...(await this.rasterizePdf(filePath, index, workDirectory)));
      } else {
        images.push(await this.copyImage(filePath, index, workDirectory));
      }
    }

    try {
      const outcomes = await this.imageResizer.resizeInPlace(images, maxImageSize);
      const resized = outcomes.filter((outcome) => outcome.resized).length;
      this.logger.log(
        `[PREPARE] Prepared ${images.length} image(s) from ${filePaths.length} file(s), ${resized} resized to max ${maxImageSize}px`,
      );
    } catch (error) {
      throw new DocumentPreparationError(
        `Failed to resize images: ${describe(error)}`,
        workDirectory,
        { cause: error },
      );
    }

    return images;
  }

  private async checkFile(filePath: string): Promise<string | null> {
    const extension = extname(filePath).toLowerCase();
    if (!SUPPORTED_DOCUMENT_EXTENSIONS.includes(extension)) {
      return `unsupported file type "${extension || basename(filePath)}" (supported: ${SUPPORTED_DOCUMENT_EXTENSIONS.join(', ')})`;
    }

    try {
      const stats = await stat(filePath);
      return stats.isFile() ? null : `not a regular file: ${filePath}`;
    } catch {
      return `file not found: ${filePath}`;
    }
  }

  private async rasterizePdf(
    filePath: string,
    index: number,
    workDirectory: string,
  ): Promise<string[]> {
    // One directory per input keeps pages of same-named PDFs apart
    const outputDirectory = await this.makeInputDirectory(workDirectory, index);
    try {
      return await this.pdfRasterizer.rasterize(filePath, outputDirectory);
    } catch (error) {
      throw new DocumentPreparationError(
        `Failed to rasterize PDF ${basename(filePath)}: ${describe(error)}`,
        filePath,
        { cause: error },
      );
    }
  }

  private async copyImage(
    filePath: string,
    index: number,
    workDirectory: string,
  ): Promise<string> {
    const extension = extname(filePath);
    const passThrough = VISION_IMAGE_EXTENSIONS.includes(extension.toLowerCase());
    const name = passThrough
      ? basename(filePath)
      : `${basename(filePath, extension)}.png`;
    const target = join(workDirectory, `${index}_${name}`);

    try {
      if (passThrough) {
        await copyFile(filePath, target);
      } else {
        await this.imageConverter.convertToPng(filePath, target);
      }
      return target;
    } catch (error) {
      throw new DocumentPreparationError(
        `Failed to ${passThrough ? 'copy' : 'convert'} image ${basename(filePath)}: ${describe(error)}`,
        filePath,
        { cause: error },
      );
    }
  }

  private async makeInputDirectory(
    workDirectory: string,
    index: number,
  ): Promise<string> {
    const directory = join(workDirectory, String(index));
    await mkdir(directory, { recursive: true });
    return directory;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
