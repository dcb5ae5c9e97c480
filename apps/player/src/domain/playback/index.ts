/**
 * Playback domain exports
 */

// Core types
export type {
  ExitStatus,
  PlaybackHandle,
  PlayerOptions,
  SessionStatus,
  SessionOutcome,
  PlaybackEventType,
  PlaybackEvent,
  PlaybackEventListener
} from './types';

// Error types
export type {
  PlayerError,
  SessionError,
  PlaybackErrorDetails
} from './errors';

export { PlaybackErrorFactory, isPlayerError } from './errors';

// Interfaces
export type {
  ILibraryScanner,
  ITrackSelector,
  IPlayerLauncher,
  IPlaybackSession
} from './interfaces';
