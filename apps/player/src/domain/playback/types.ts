/**
 * Core types for directory-driven playback sessions
 */

import { SelectionPolicy } from '@dirplay/shared';
import { SessionError } from './errors';

/**
 * Exit status of one player process
 */
export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * One spawned player process for exactly one file.
 * Owned by a single session and reaped once wait() resolves.
 */
export interface PlaybackHandle {
  readonly pid: number | undefined;
  readonly filePath: string;
  readonly player: string;
  wait(): Promise<ExitStatus>;
  terminate(): void;
}

/**
 * Player invocation settings
 */
export interface PlayerOptions {
  readonly command: string;
  readonly args: readonly string[];
  readonly fallbackCommands: readonly string[];
  readonly killGraceMs: number;
}

export type SessionStatus = 'completed' | 'interrupted' | 'failed';

/**
 * Final report of a session run
 */
export interface SessionOutcome {
  readonly status: SessionStatus;
  readonly policy: SelectionPolicy;
  readonly played: number;
  readonly lastExit?: ExitStatus;
  readonly error?: SessionError;
}

export type PlaybackEventType =
  | 'track_started'
  | 'track_finished'
  | 'track_failed'
  | 'session_ended';

/**
 * Playback event data
 */
export interface PlaybackEvent {
  readonly type: PlaybackEventType;
  readonly timestamp: Date;
  readonly data: {
    readonly filePath?: string;
    readonly index?: number;
    readonly exit?: ExitStatus;
    readonly error?: SessionError;
    readonly outcome?: SessionOutcome;
  };
}

/**
 * Event listener function type
 */
export type PlaybackEventListener = (event: PlaybackEvent) => void;
