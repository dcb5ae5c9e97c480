import * as path from 'path';

/**
 * Library snapshot: the ordered set of playable file paths for one session.
 * Taken once and never re-read while the session runs.
 */
export interface Library {
  readonly baseDirectory: string;
  readonly files: readonly string[];
  readonly recursive: boolean;
  readonly filterTerm?: string;
}

/**
 * Options controlling how a library is enumerated
 */
export interface LibraryScanOptions {
  readonly recursive: boolean;
  readonly filterTerm?: string;
  readonly mediaOnly?: boolean;
}

/**
 * Result type for operations that can fail
 */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

/**
 * Library-related error types
 */
export type LibraryError =
  | 'EMPTY_LIBRARY'
  | 'DIRECTORY_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'PERMISSION_DENIED';

/**
 * Audio and video extensions accepted when the media filter is on
 */
export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3', '.flac', '.wav', '.ogg', '.m4a', '.aac', '.wma', '.opus',
  '.mp4', '.avi', '.mkv', '.mov', '.webm'
]);

/**
 * Library construction and filtering helpers
 */
export class LibraryFactory {
  static isMediaFile(filePath: string): boolean {
    return MEDIA_EXTENSIONS.has(path.extname(filePath).toLowerCase());
  }

  static isHidden(name: string): boolean {
    return name.startsWith('.');
  }

  /**
   * Case-insensitive substring test against the base name only
   */
  static matchesTerm(filePath: string, term: string): boolean {
    return path.basename(filePath).toLowerCase().includes(term.toLowerCase());
  }

  static filterByTerm(files: readonly string[], term: string): string[] {
    return files.filter(file => this.matchesTerm(file, term));
  }

  /**
   * Wrap an enumerated file list, rejecting an empty one
   */
  static create(
    baseDirectory: string,
    files: readonly string[],
    options: LibraryScanOptions
  ): Result<Library, LibraryError> {
    if (files.length === 0) {
      return { success: false, error: 'EMPTY_LIBRARY' };
    }

    const library: Library = {
      baseDirectory,
      files: Object.freeze([...files]),
      recursive: options.recursive,
      ...(options.filterTerm !== undefined ? { filterTerm: options.filterTerm } : {})
    };

    return { success: true, value: library };
  }
}
