import { Test, TestingModule } from '@nestjs/testing';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import {
  DocumentPreparationError,
  ValidationError,
} from '../../domain/errors/extraction.errors';
import { ImageConverterPort } from '../../domain/ports/image-converter.port';
import {
  ImageResizerPort,
  ResizeOutcome,
} from '../../domain/ports/image-resizer.port';
import { PdfRasterizerPort } from '../../domain/ports/pdf-rasterizer.port';
import {
  buildDocumentExtractionConfig,
  createConfigService,
} from '../../testing/document-extraction-config.fixture';
import { TempResourceTracker } from '../temp-resources/temp-resource-tracker';
import { LocalDocumentPreparerAdapter } from './local-document-preparer.adapter';

describe('LocalDocumentPreparerAdapter', () => {
  let preparer: LocalDocumentPreparerAdapter;
  let tracker: TempResourceTracker;
  let mockPdfRasterizer: jest.Mocked<PdfRasterizerPort>;
  let mockImageResizer: jest.Mocked<ImageResizerPort>;
  let mockImageConverter: jest.Mocked<ImageConverterPort>;
  let inputDirectory: string;
  let tempDirectory: string;

  beforeEach(async () => {
    inputDirectory = await mkdtemp(join(tmpdir(), 'preparer-input-'));
    tempDirectory = await mkdtemp(join(tmpdir(), 'preparer-temp-'));
    tracker = new TempResourceTracker(
      createConfigService(
        buildDocumentExtractionConfig({
          tempFiles: { directory: tempDirectory, cleanup: true },
        }),
      ),
    );

    mockPdfRasterizer = {
      rasterize: jest.fn<Promise<string[]>, [string, string]>(
        async (pdfPath, outputDirectory) => {
          const pages = [1, 2].map((page) =>
            join(outputDirectory, `${basename(pdfPath, '.pdf')}-${page}.jpg`),
          );
          await Promise.all(pages.map((page) => writeFile(page, 'page')));
          return pages;
        },
      ),
    };
    mockImageResizer = {
      resizeInPlace: jest.fn<Promise<ResizeOutcome[]>, [string[], number]>(
        async (paths) =>
          paths.map((path) => ({
            path,
            originalSize: { width: 2000, height: 1000 },
            size: { width: 1024, height: 512 },
            resized: true,
          })),
      ),
    };

    mockImageConverter = {
      convertToPng: jest.fn<Promise<void>, [string, string]>(
        async (_source, target) => writeFile(target, 'png-copy'),
      ),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LocalDocumentPreparerAdapter,
        { provide: 'PdfRasterizerPort', useValue: mockPdfRasterizer },
        { provide: 'ImageResizerPort', useValue: mockImageResizer },
        { provide: 'ImageConverterPort', useValue: mockImageConverter },
      ],
    }).compile();

    preparer = module.get<LocalDocumentPreparerAdapter>(
      LocalDocumentPreparerAdapter,
    );
  });

  afterEach(async () => {
    await rm(inputDirectory, { recursive: true, force: true });
    await rm(tempDirectory, { recursive: true, force: true });
  });

  async function input(name: string, content = 'data'): Promise<string> {
    const path = join(inputDirectory, name);
    await writeFile(path, content);
    return path;
  }

  describe('validateFiles', () => {
    it('should accept supported documents regardless of extension case', async () => {
      const files = await Promise.all([
        input('scan.PDF'),
        input('photo.jpeg'),
        input('page.webp'),
      ]);

      await expect(preparer.validateFiles(files)).resolves.toBeUndefined();
    });

    it('should reject unsupported extensions', async () => {
      const doc = await input('notes.docx');

      await expect(preparer.validateFiles([doc])).rejects.toThrow(
        ValidationError,
      );
    });

    it('should list every offending file', async () => {
      const good = await input('a.png');
      const missing = join(inputDirectory, 'missing.png');
      const folder = join(inputDirectory, 'folder.png');
      await mkdir(folder);

      let caught: unknown;
      try {
        await preparer.validateFiles([good, missing, folder]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError && caught.details).toEqual({
        'files[1]': `file not found: ${missing}`,
        'files[2]': `not a regular file: ${folder}`,
      });
    });
  });

  describe('prepare', () => {
    it('should rasterize PDFs and copy images in input order', async () => {
      const pdf = await input('invoice.pdf');
      const png = await input('receipt.png', 'png-bytes');

      const images = await tracker.withScope(async (scope) => {
        const prepared = await preparer.prepare([pdf, png], 1024, scope);
        // Files exist while the scope is open
        expect(prepared.every((image) => existsSync(image))).toBe(true);
        expect(await readFile(prepared[2], 'utf8')).toBe('png-bytes');
        return prepared;
      });

      expect(images).toHaveLength(3);
      expect(basename(images[0])).toBe('invoice-1.jpg');
      expect(basename(images[1])).toBe('invoice-2.jpg');
      expect(basename(images[2])).toBe('1_receipt.png');
      expect(mockPdfRasterizer.rasterize).toHaveBeenCalledTimes(1);
      expect(mockImageResizer.resizeInPlace).toHaveBeenCalledWith(images, 1024);
    });

    it('should convert BMP and TIFF inputs to PNG working copies', async () => {
      const bmp = await input('scan.bmp', 'bmp-bytes');
      const tiff = await input('fax.TIFF', 'tiff-bytes');
      const jpg = await input('photo.jpg', 'jpg-bytes');

      const images = await tracker.withScope(async (scope) => {
        const prepared = await preparer.prepare([bmp, tiff, jpg], 1024, scope);
        expect(await readFile(prepared[0], 'utf8')).toBe('png-copy');
        expect(await readFile(prepared[2], 'utf8')).toBe('jpg-bytes');
        return prepared;
      });

      expect(images.map((image) => basename(image))).toEqual([
        '0_scan.png',
        '1_fax.png',
        '2_photo.jpg',
      ]);
      expect(mockImageConverter.convertToPng).toHaveBeenCalledTimes(2);
      expect(mockImageConverter.convertToPng).toHaveBeenCalledWith(bmp, images[0]);
      expect(mockImageConverter.convertToPng).toHaveBeenCalledWith(tiff, images[1]);
      expect(mockImageResizer.resizeInPlace).toHaveBeenCalledWith(images, 1024);
    });

    it('should wrap converter failures in DocumentPreparationError', async () => {
      const bmp = await input('scan.bmp');
      mockImageConverter.convertToPng.mockRejectedValueOnce(
        new Error('Could not find MIME for Buffer'),
      );

      await expect(
        tracker.withScope((scope) => preparer.prepare([bmp], 1024, scope)),
      ).rejects.toThrow(
        new DocumentPreparationError(
          'Failed to convert image scan.bmp: Could not find MIME for Buffer',
          bmp,
        ),
      );
    });

    it('should never touch the original files', async () => {
      const png = await input('receipt.png', 'original');

      await tracker.withScope(async (scope) => {
        const [copy] = await preparer.prepare([png], 512, scope);
        expect(copy).not.toBe(png);
        expect(copy.startsWith(tempDirectory)).toBe(true);
      });

      expect(await readFile(png, 'utf8')).toBe('original');
    });

    it('should remove working copies when the scope ends', async () => {
      const png = await input('receipt.png');

      const images = await tracker.withScope((scope) =>
        preparer.prepare([png], 1024, scope),
      );

      expect(existsSync(images[0])).toBe(false);
    });

    it('should wrap rasterizer failures in DocumentPreparationError', async () => {
      const pdf = await input('broken.pdf');
      mockPdfRasterizer.rasterize.mockRejectedValueOnce(
        new Error('pdftoppm exited with code 1'),
      );

      await expect(
        tracker.withScope((scope) => preparer.prepare([pdf], 1024, scope)),
      ).rejects.toThrow(
        new DocumentPreparationError(
          'Failed to rasterize PDF broken.pdf: pdftoppm exited with code 1',
          pdf,
        ),
      );
    });

    it('should wrap resizer failures in DocumentPreparationError', async () => {
      const png = await input('receipt.png');
      mockImageResizer.resizeInPlace.mockRejectedValueOnce(
        new Error('unsupported image format'),
      );

      await expect(
        tracker.withScope((scope) => preparer.prepare([png], 1024, scope)),
      ).rejects.toBeInstanceOf(DocumentPreparationError);
    });
  });
});
