import { TempScope } from './temp-scope.port';

export const SUPPORTED_IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.tiff',
  '.bmp',
  '.gif',
  '.webp',
];

export const SUPPORTED_DOCUMENT_EXTENSIONS: readonly string[] = [
  ...SUPPORTED_IMAGE_EXTENSIONS,
  '.pdf',
];

export interface DocumentPreparerPort {
  /**
   * Reject missing paths, directories and unsupported extensions
   * @throws ValidationError
   */
  validateFiles(filePaths: string[]): Promise<void>;

  /**
   * Turn input files into a DocumentSet: PDFs become one image per page,
   * images are copied; every resulting image is capped to `maxImageSize`.
   * Working copies live in `scope`, originals are never modified.
   * @returns image paths, one per page/image, in input order
   * @throws DocumentPreparationError
   */
  prepare(
    filePaths: string[],
    maxImageSize: number,
    scope: TempScope,
  ): Promise<string[]>;
}
