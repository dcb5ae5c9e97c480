/**
 * Core interfaces for playback sessions
 * Ports & adapters: the session talks to the filesystem and the player
 * only through these.
 */

import {
  Library,
  LibraryError,
  LibraryScanOptions,
  Result,
  Selection,
  SelectionError,
  SelectionPolicy,
  SelectionState
} from '@dirplay/shared';
import {
  ExitStatus,
  PlaybackEventListener,
  PlaybackHandle,
  SessionOutcome
} from './types';
import { PlayerError } from './errors';

/**
 * Library scanner interface for directory enumeration
 */
export interface ILibraryScanner {
  /**
   * List the files of a directory as a library snapshot
   */
  enumerate(directory: string, options: LibraryScanOptions): Promise<Result<Library, LibraryError>>;
}

/**
 * Selector interface for picking the next library entry
 */
export interface ITrackSelector {
  selectNext(
    library: Library,
    policy: SelectionPolicy,
    state: SelectionState
  ): Result<Selection, SelectionError>;
}

/**
 * Player launcher capability. Alternate players or test doubles
 * can stand in without spawning real processes.
 */
export interface IPlayerLauncher {
  /**
   * Start the player on one file
   */
  launch(filePath: string): Promise<Result<PlaybackHandle, PlayerError>>;
}

/**
 * Playback session interface
 */
export interface IPlaybackSession {
  /**
   * Play one file and wait for the player to exit
   */
  play(filePath: string): Promise<Result<ExitStatus, PlayerError>>;

  /**
   * Run selection and playback until the policy finishes or the session is interrupted
   */
  run(library: Library, policy: SelectionPolicy, state?: SelectionState): Promise<SessionOutcome>;

  /**
   * Stop the loop and terminate the current player
   */
  interrupt(): void;

  isRunning(): boolean;

  addEventListener(listener: PlaybackEventListener): void;

  removeEventListener(listener: PlaybackEventListener): void;
}
