/**
 * Temp files and directories acquired for one unit of work. Everything
 * created through a scope is released when the scope ends, on every exit
 * path.
 */
export interface TempScope {
  createTempDirectory(prefix?: string): Promise<string>;
  createTempFile(suffix?: string, prefix?: string): Promise<string>;
  track(resourcePath: string): string;
  list(): string[];
}
