/**
 * Extensions vision endpoints accept as-is. Other raster inputs are
 * converted to PNG working copies.
 */
export const VISION_IMAGE_EXTENSIONS: readonly string[] = [
  '.jpg',
  '.jpeg',
  '.png',
  '.gif',
  '.webp',
];

export interface ImageConverterPort {
  /**
   * Decode `sourcePath` and write it as PNG to `targetPath`
   */
  convertToPng(sourcePath: string, targetPath: string): Promise<void>;
}
