import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

export class OutputDirectoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutputDirectoryError';
  }
}

/**
 * FileManager - Output directories, batch file reading and artifact checks
 */
export class FileManager {
  private readonly baseDir: string;

  constructor(baseDirectory: string) {
    this.baseDir = path.resolve(baseDirectory);
  }

  get baseDirectory(): string {
    return this.baseDir;
  }

  /**
   * Resolve an output subfolder relative to the base directory and create it.
   * Empty input means the base directory itself; absolute paths and paths
   * climbing out of the base are rejected.
   */
  async resolveOutputDirectory(subfolder: string): Promise<string> {
    const input = subfolder.trim();

    let target = this.baseDir;
    if (input) {
      if (path.isAbsolute(input) || path.win32.isAbsolute(input)) {
        throw new OutputDirectoryError(
          'Absolute paths are not allowed. Use subfolders only.',
        );
      }

      target = path.resolve(this.baseDir, input);
      const relative = path.relative(this.baseDir, target);
      if (relative.startsWith('..') || path.isAbsolute(relative)) {
        throw new OutputDirectoryError(
          `Subfolder must stay inside ${this.baseDir}.`,
        );
      }
    }

    try {
      await fs.mkdir(target, { recursive: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to create output directory', {
        path: target,
        error: message,
      });
      throw new OutputDirectoryError(
        `Cannot create output directory ${target}: ${message}`,
      );
    }

    logger.info('📁 Output directory ready', { path: target });
    return target;
  }

  /**
   * Read a text file as UTF-8, dropping bytes that do not decode
   */
  async readTextFile(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    return buffer.toString('utf-8').replace(/\uFFFD/g, '').trim();
  }

  /**
   * Check if a regular file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Keep only the paths that exist on disk, in order
   */
  async existingFiles(filePaths: string[]): Promise<string[]> {
    const verified: string[] = [];
    for (const filePath of filePaths) {
      if (await this.fileExists(filePath)) {
        verified.push(filePath);
      } else {
        logger.debug('Reported artifact not found on disk', { path: filePath });
      }
    }
    return verified;
  }
}
