import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { logger } from './logger.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSystemUtils {
  /**
   * Ensure directory exists, create if not
   */
  public static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      logger().debug(`Directory ensured: ${dirPath}`);
    } catch (error) {
      logger().error(`Failed to create directory: ${dirPath}`, { error });
      throw error;
    }
  }

  /**
   * Size of a regular file, or undefined when nothing exists at the path.
   * Anything other than a missing file (permissions, a directory) is an error.
   */
  public static async statSize(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new Error(`Not a regular file: ${filePath}`);
      }
      return stats.size;
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      logger().error(`Failed to stat file: ${filePath}`, { error });
      throw error;
    }
  }

  /**
   * Remove file or directory recursively; a missing path is not an error
   */
  public static async remove(path: string): Promise<void> {
    try {
      await fs.rm(path, { recursive: true });
      logger().debug(`Removed: ${path}`);
    } catch (error) {
      if (!isMissing(error)) {
        logger().error(`Failed to remove: ${path}`, { error });
        throw error;
      }
    }
  }

  public static async createTempDir(prefix = 'transfer-'): Promise<string> {
    try {
      const tempDir = await fs.mkdtemp(join(tmpdir(), prefix));
      logger().debug(`Created temp directory: ${tempDir}`);
      return tempDir;
    } catch (error) {
      logger().error('Failed to create temp directory', { error });
      throw error;
    }
  }
}

// Export convenience functions
export const ensureDir = FileSystemUtils.ensureDir.bind(FileSystemUtils);
export const statSize = FileSystemUtils.statSize.bind(FileSystemUtils);
export const remove = FileSystemUtils.remove.bind(FileSystemUtils);
export const createTempDir = FileSystemUtils.createTempDir.bind(FileSystemUtils);
