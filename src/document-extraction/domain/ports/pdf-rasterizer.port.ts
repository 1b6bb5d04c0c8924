export interface PdfRasterizerPort {
  /**
   * Render every page of a PDF into `outputDirectory`
   * @returns image paths in page order
   */
  rasterize(pdfPath: string, outputDirectory: string): Promise<string[]>;
}
