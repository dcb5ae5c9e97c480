/**
 * Error types and error details for library enumeration and selection
 */

import type { LibraryError } from './Library';
import type { SelectionError } from './Selection';

export type { LibraryError, SelectionError };

/**
 * Error details with context information
 */
export interface ErrorDetails {
  code: string;
  message: string;
  context?: Record<string, unknown> | undefined;
  suggestion?: string | undefined;
}

/**
 * Error factory for creating consistent error responses
 */
export class ErrorFactory {
  static createLibraryError(error: LibraryError, context?: Record<string, unknown> | undefined): ErrorDetails {
    const rawDirectory = context?.directory;
    const rawTerm = context?.filterTerm;
    const directory = typeof rawDirectory === 'string' ? rawDirectory : '.';
    const term = typeof rawTerm === 'string' ? rawTerm : undefined;

    const messages: Record<LibraryError, string> = {
      EMPTY_LIBRARY: term !== undefined
        ? `No files found matching '${term}' in '${directory}'.`
        : `No files found in '${directory}'.`,
      DIRECTORY_NOT_FOUND: `Directory does not exist: ${directory}`,
      NOT_A_DIRECTORY: `Path is not a directory: ${directory}`,
      PERMISSION_DENIED: `Permission denied accessing directory: ${directory}`
    };

    const suggestions: Record<LibraryError, string> = {
      EMPTY_LIBRARY: term !== undefined
        ? 'Try a shorter search term or a different directory'
        : 'Add some media files to the directory or choose another one',
      DIRECTORY_NOT_FOUND: 'Check the path and try again',
      NOT_A_DIRECTORY: 'Point the player at a directory, not a file',
      PERMISSION_DENIED: 'Check the directory permissions'
    };

    return {
      code: error,
      message: messages[error],
      context: context || undefined,
      suggestion: suggestions[error]
    };
  }

  static createSelectionError(error: SelectionError, context?: Record<string, unknown> | undefined): ErrorDetails {
    if (error === 'EMPTY_LIBRARY') {
      return this.createLibraryError(error, context);
    }

    const count = context?.count;

    return {
      code: error,
      message: 'Invalid selection. Exiting.',
      context: context || undefined,
      suggestion: typeof count === 'number'
        ? `Enter a number between 1 and ${count}`
        : 'Enter one of the listed numbers'
    };
  }
}
