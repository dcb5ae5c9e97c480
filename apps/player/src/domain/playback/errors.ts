/**
 * Error types for player processes and playback sessions
 */

import { ErrorFactory, LibraryError, SelectionError } from '@dirplay/shared';

/**
 * Player process error types
 */
export type PlayerError =
  | 'PLAYER_LAUNCH_FAILED'
  | 'PLAYER_RUNTIME_FAILURE';

/**
 * Session error types combining all error categories
 */
export type SessionError = LibraryError | SelectionError | PlayerError;

/**
 * Error details with context information
 * Consistent with the error pattern from the shared package
 */
export interface PlaybackErrorDetails {
  readonly code: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
  readonly suggestion?: string;
}

const PLAYER_ERRORS: readonly string[] = ['PLAYER_LAUNCH_FAILED', 'PLAYER_RUNTIME_FAILURE'];

export function isPlayerError(error: SessionError): error is PlayerError {
  return PLAYER_ERRORS.includes(error);
}

/**
 * Error factory for creating consistent playback error responses
 */
export class PlaybackErrorFactory {
  static createPlayerError(error: PlayerError, context?: Record<string, unknown>): PlaybackErrorDetails {
    const rawPlayer = context?.player;
    const player = typeof rawPlayer === 'string' ? rawPlayer : 'the media player';
    const code = context?.exitCode;

    const messages: Record<PlayerError, string> = {
      PLAYER_LAUNCH_FAILED: `Failed to launch ${player}`,
      PLAYER_RUNTIME_FAILURE: typeof code === 'number'
        ? `${player} exited with status ${code}`
        : `${player} exited abnormally`
    };

    const suggestions: Record<PlayerError, string> = {
      PLAYER_LAUNCH_FAILED: 'Install mpv or set DIRPLAY_PLAYER to an installed player',
      PLAYER_RUNTIME_FAILURE: 'Check that the file is a playable media file'
    };

    return {
      code: error,
      message: messages[error],
      context,
      suggestion: suggestions[error]
    };
  }

  static createSessionError(error: SessionError, context?: Record<string, unknown>): PlaybackErrorDetails {
    if (isPlayerError(error)) {
      return this.createPlayerError(error, context);
    }

    if (error === 'INVALID_SELECTION') {
      return ErrorFactory.createSelectionError(error, context);
    }

    return ErrorFactory.createLibraryError(error, context);
  }
}
