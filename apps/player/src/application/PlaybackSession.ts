/**
 * PlaybackSession - runs selection and playback over one library snapshot
 * Continuous policies loop until interrupted, search-pick plays once.
 */

import {
  Library,
  Result,
  SelectionPolicy,
  SelectionState,
  SelectionValidator
} from '@dirplay/shared';
import {
  IPlaybackSession,
  IPlayerLauncher,
  ITrackSelector
} from '../domain/playback/interfaces';
import {
  ExitStatus,
  PlaybackEvent,
  PlaybackEventListener,
  PlaybackHandle,
  SessionOutcome
} from '../domain/playback/types';
import { PlayerError, SessionError } from '../domain/playback/errors';

export class PlaybackSession implements IPlaybackSession {
  private readonly launcher: IPlayerLauncher;
  private readonly selector: ITrackSelector;
  private listeners: PlaybackEventListener[] = [];

  private running = false;
  private interrupted = false;
  private busy = false;
  private currentHandle: PlaybackHandle | null = null;

  constructor(launcher: IPlayerLauncher, selector: ITrackSelector) {
    this.launcher = launcher;
    this.selector = selector;
  }

  /**
   * Launch the player on one file and wait for it to exit.
   * Never overlaps: a second call while a player runs is a programming error.
   */
  async play(filePath: string): Promise<Result<ExitStatus, PlayerError>> {
    if (this.busy) {
      throw new Error(`Cannot play ${filePath}: a player is already running`);
    }

    this.busy = true;
    try {
      const launched = await this.launcher.launch(filePath);
      if (!launched.success) {
        return launched;
      }

      const handle = launched.value;
      this.currentHandle = handle;

      // interrupt() may have landed while the launch was pending
      if (this.interrupted) {
        handle.terminate();
      }

      const exit = await handle.wait();
      return { success: true, value: exit };
    } finally {
      this.currentHandle = null;
      this.busy = false;
    }
  }

  async run(
    library: Library,
    policy: SelectionPolicy,
    state: SelectionState = SelectionValidator.initialState()
  ): Promise<SessionOutcome> {
    if (this.running) {
      throw new Error('Playback session is already running');
    }

    // An interrupt that arrived before run() still counts
    this.running = true;

    const continuous = SelectionValidator.isContinuous(policy);
    let cursor = state;
    let played = 0;
    let lastExit: ExitStatus | undefined;

    const finish = (status: SessionOutcome['status'], error?: SessionError): SessionOutcome => {
      this.running = false;
      this.interrupted = false;
      const outcome: SessionOutcome = {
        status,
        policy,
        played,
        ...(lastExit ? { lastExit } : {}),
        ...(error ? { error } : {})
      };
      this.emitEvent('session_ended', { outcome, ...(error ? { error } : {}) });
      return outcome;
    };

    try {
      while (!this.interrupted) {
        const selection = this.selector.selectNext(library, policy, cursor);
        if (!selection.success) {
          return finish('failed', selection.error);
        }

        const { filePath, index } = selection.value;
        cursor = selection.value.state;

        this.emitEvent('track_started', { filePath, index });
        const result = await this.play(filePath);

        if (!result.success) {
          this.emitEvent('track_failed', { filePath, index, error: result.error });
          return finish('failed', result.error);
        }

        played++;
        lastExit = result.value;

        if (this.interrupted) {
          this.emitEvent('track_finished', { filePath, index, exit: lastExit });
          break;
        }

        if (lastExit.code !== 0) {
          this.emitEvent('track_failed', {
            filePath,
            index,
            exit: lastExit,
            error: 'PLAYER_RUNTIME_FAILURE'
          });

          if (!continuous) {
            return finish('failed', 'PLAYER_RUNTIME_FAILURE');
          }

          // Continuous play moves on to the next selection
          console.warn(`Player exited with ${this.describeExit(lastExit)} for ${filePath}`);
        } else {
          this.emitEvent('track_finished', { filePath, index, exit: lastExit });
        }

        if (!continuous) {
          return finish('completed');
        }
      }

      return finish('interrupted');
    } catch (error) {
      this.running = false;
      this.interrupted = false;
      throw error;
    }
  }

  /**
   * Stop the loop and ask the running player to terminate.
   * run() resolves once that player has been reaped.
   */
  interrupt(): void {
    if (this.interrupted) {
      return;
    }

    this.interrupted = true;
    this.currentHandle?.terminate();
  }

  isRunning(): boolean {
    return this.running;
  }

  isPlaying(): boolean {
    return this.busy;
  }

  addEventListener(listener: PlaybackEventListener): void {
    this.listeners.push(listener);
  }

  removeEventListener(listener: PlaybackEventListener): void {
    const index = this.listeners.indexOf(listener);
    if (index > -1) {
      this.listeners.splice(index, 1);
    }
  }

  private describeExit(exit: ExitStatus): string {
    return exit.signal ? `signal ${exit.signal}` : `status ${exit.code}`;
  }

  private emitEvent(type: PlaybackEvent['type'], data: PlaybackEvent['data']): void {
    const event: PlaybackEvent = { type, timestamp: new Date(), data };

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error('Error in playback event listener:', error);
      }
    }
  }
}
