export interface ResizeOutcome {
  path: string;
  originalSize: { width: number; height: number };
  size: { width: number; height: number };
  resized: boolean;
}

export interface ImageResizerPort {
  /**
   * Cap the longest edge of each image to `maxDimension`, preserving aspect
   * ratio. Files are overwritten; smaller images are left untouched.
   */
  resizeInPlace(paths: string[], maxDimension: number): Promise<ResizeOutcome[]>;
}
