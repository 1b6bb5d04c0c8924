import { Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import { promisify } from 'util';
import { PdfRasterizerPort } from '../../domain/ports/pdf-rasterizer.port';

const execFileAsync = promisify(execFile);

const RENDER_DPI = 200;

/**
 * Renders PDF pages with poppler's `pdftoppm`.
 *
 * Requires poppler-utils on the host (`apt install poppler-utils`,
 * `brew install poppler`).
 */
@Injectable()
export class PopplerPdfRasterizerAdapter implements PdfRasterizerPort {
  private readonly logger = new Logger(PopplerPdfRasterizerAdapter.name);

  async rasterize(pdfPath: string, outputDirectory: string): Promise<string[]> {
    const stem = basename(pdfPath, extname(pdfPath));
    const outputPrefix = join(outputDirectory, stem);

    this.logger.debug(`[PDF] Rendering ${pdfPath} at ${RENDER_DPI} dpi`);

    await execFileAsync('pdftoppm', [
      '-jpeg',
      '-r',
      String(RENDER_DPI),
      pdfPath,
      outputPrefix,
    ]);

    const pages = await this.collectPages(outputDirectory, stem);
    if (pages.length === 0) {
      throw new Error(`pdftoppm produced no pages for ${pdfPath}`);
    }

    this.logger.debug(`[PDF] Rendered ${pages.length} page(s) from ${pdfPath}`);
    return pages;
  }

  /**
   * pdftoppm names pages `<prefix>-<n>.jpg`, zero-padding `n` to the width
   * of the page count.
   */
  private async collectPages(
    outputDirectory: string,
    stem: string,
  ): Promise<string[]> {
    const pagePattern = new RegExp(`^${escapeRegExp(stem)}-(\\d+)\\.jpg$`);
    const entries = await readdir(outputDirectory);

    return entries
      .map((entry) => {
        const match = pagePattern.exec(entry);
        return match ? { entry, page: Number(match[1]) } : null;
      })
      .filter((page): page is { entry: string; page: number } => page !== null)
      .sort((a, b) => a.page - b.page)
      .map(({ entry }) => join(outputDirectory, entry));
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
