/**
 * LibraryScanner - filesystem enumeration for playback libraries
 * Flat listing for shuffle/list play, recursive filtered walk for search.
 */

import { promises as fs, Dirent } from 'fs';
import * as path from 'path';
import {
  Library,
  LibraryError,
  LibraryFactory,
  LibraryScanOptions,
  Result
} from '@dirplay/shared';
import { ILibraryScanner } from '../../domain/playback/interfaces';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name.localeCompare(b.name);
}

export class LibraryScanner implements ILibraryScanner {
  async enumerate(directory: string, options: LibraryScanOptions): Promise<Result<Library, LibraryError>> {
    const check = await this.checkDirectory(directory);
    if (!check.success) {
      return check;
    }

    let files: string[];
    try {
      files = options.recursive
        ? await this.walk(directory)
        : await this.listFlat(directory);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EACCES' || code === 'EPERM') {
        return { success: false, error: 'PERMISSION_DENIED' };
      }
      throw error;
    }

    if (options.filterTerm !== undefined) {
      files = LibraryFactory.filterByTerm(files, options.filterTerm);
    }

    if (options.mediaOnly) {
      files = files.filter(file => LibraryFactory.isMediaFile(file));
    }

    return LibraryFactory.create(directory, files, options);
  }

  private async checkDirectory(directory: string): Promise<Result<void, LibraryError>> {
    try {
      const stats = await fs.stat(directory);
      if (!stats.isDirectory()) {
        return { success: false, error: 'NOT_A_DIRECTORY' };
      }
      return { success: true, value: undefined };
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return { success: false, error: 'DIRECTORY_NOT_FOUND' };
      }
      if (code === 'EACCES' || code === 'EPERM') {
        return { success: false, error: 'PERMISSION_DENIED' };
      }
      throw error;
    }
  }

  /**
   * Regular files directly in the directory, dot-files left out,
   * ordered by name. Symlinks count when they point at a file.
   */
  private async listFlat(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries.sort(byName)) {
      if (LibraryFactory.isHidden(entry.name)) {
        continue;
      }

      const fullPath = path.join(directory, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && await this.isFileTarget(fullPath))) {
        files.push(fullPath);
      }
    }

    return files;
  }

  /**
   * Depth-first walk over every regular file, hidden ones included.
   * Symlinks are not followed. Unreadable sub-directories are skipped.
   */
  private async walk(directory: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.readdir(directory, { withFileTypes: true });

    for (const entry of entries.sort(byName)) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        try {
          files.push(...await this.walk(fullPath));
        } catch (error) {
          console.warn(`Skipping unreadable directory ${fullPath}:`, errorCode(error) ?? error);
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }

    return files;
  }

  private async isFileTarget(linkPath: string): Promise<boolean> {
    try {
      return (await fs.stat(linkPath)).isFile();
    } catch {
      return false;
    }
  }
}
