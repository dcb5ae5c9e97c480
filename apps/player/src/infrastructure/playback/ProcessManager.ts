/**
 * ProcessManager for external player lifecycle management
 * Spawns one player per file, waits on it, and terminates it on request
 */

import { spawn, SpawnOptions } from 'child_process';
import { Result } from '@dirplay/shared';
import { IPlayerLauncher } from '../../domain/playback/interfaces';
import { ExitStatus, PlaybackHandle, PlayerOptions } from '../../domain/playback/types';
import { PlayerError } from '../../domain/playback/errors';

/**
 * The part of a child process the manager relies on
 */
export interface PlayerProcess {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnPlayer = (command: string, args: string[], options: SpawnOptions) => PlayerProcess;

const spawnChild: SpawnPlayer = (command, args, options) => spawn(command, args, options);

/**
 * Handle over one spawned player process
 */
export class ChildPlaybackHandle implements PlaybackHandle {
  readonly filePath: string;
  readonly player: string;

  private readonly child: PlayerProcess;
  private readonly killGraceMs: number;
  private readonly exited: Promise<ExitStatus>;
  private exitStatus: ExitStatus | null = null;
  private killTimer: NodeJS.Timeout | null = null;

  constructor(child: PlayerProcess, filePath: string, player: string, killGraceMs: number) {
    this.child = child;
    this.filePath = filePath;
    this.player = player;
    this.killGraceMs = killGraceMs;

    this.exited = new Promise(resolve => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const status: ExitStatus = { code, signal };
        this.exitStatus = status;
        this.clearKillTimer();
        resolve(status);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.exitStatus !== null;
  }

  wait(): Promise<ExitStatus> {
    return this.exited;
  }

  /**
   * SIGTERM first, SIGKILL if the player is still alive after the grace period
   */
  terminate(): void {
    if (this.hasExited() || this.killTimer) {
      return;
    }

    this.child.kill('SIGTERM');
    if (this.hasExited()) {
      return;
    }

    this.killTimer = setTimeout(() => {
      this.killTimer = null;
      if (!this.hasExited()) {
        console.warn(`${this.player} ignored SIGTERM, sending SIGKILL`);
        this.child.kill('SIGKILL');
      }
    }, this.killGraceMs);
  }

  /**
   * Immediate kill for synchronous process-exit cleanup
   */
  kill(): void {
    if (!this.hasExited()) {
      this.child.kill('SIGKILL');
    }
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
  }
}

export class ProcessManager implements IPlayerLauncher {
  private readonly options: PlayerOptions;
  private readonly spawnPlayer: SpawnPlayer;
  private current: ChildPlaybackHandle | null = null;

  constructor(options: PlayerOptions, spawnPlayer: SpawnPlayer = spawnChild) {
    this.options = options;
    this.spawnPlayer = spawnPlayer;
  }

  /**
   * Launch the configured player, then each fallback in turn if it cannot be started
   */
  async launch(filePath: string): Promise<Result<PlaybackHandle, PlayerError>> {
    // Only one player instance at a time
    if (this.current && !this.current.hasExited()) {
      await this.stopCurrent();
    }

    const candidates = [this.options.command, ...this.options.fallbackCommands];

    for (const command of candidates) {
      const result = await this.start(command, filePath);
      if (result.success) {
        this.current = result.value;
        return result;
      }
      console.warn(`Could not start ${command}`);
    }

    return { success: false, error: 'PLAYER_LAUNCH_FAILED' };
  }

  getCurrent(): PlaybackHandle | null {
    return this.current && !this.current.hasExited() ? this.current : null;
  }

  /**
   * Terminate the running player and wait for it to be reaped
   */
  async cleanup(): Promise<void> {
    await this.stopCurrent();
  }

  /**
   * Synchronous cleanup for process exit
   */
  syncCleanup(): void {
    try {
      this.current?.kill();
    } catch (error) {
      console.error('Synchronous cleanup failed:', error);
    }
  }

  private async stopCurrent(): Promise<void> {
    const handle = this.current;
    this.current = null;
    if (!handle || handle.hasExited()) {
      return;
    }

    handle.terminate();
    await handle.wait();
  }

  private async start(command: string, filePath: string): Promise<Result<ChildPlaybackHandle, PlayerError>> {
    let child: PlayerProcess;
    try {
      // The player shares our terminal so its own key bindings work
      child = this.spawnPlayer(command, [...this.options.args, filePath], { stdio: 'inherit' });
    } catch (error) {
      console.error(`Failed to spawn ${command}:`, error);
      return { success: false, error: 'PLAYER_LAUNCH_FAILED' };
    }

    const handle = new ChildPlaybackHandle(child, filePath, command, this.options.killGraceMs);

    return new Promise<Result<ChildPlaybackHandle, PlayerError>>(resolve => {
      let resolved = false;

      child.once('spawn', () => {
        if (resolved) return;
        resolved = true;
        resolve({ success: true, value: handle });
      });

      child.on('error', (error: Error) => {
        if (resolved) {
          console.error(`${command} process error:`, error);
          return;
        }
        resolved = true;
        console.error(`${command} failed to start:`, error.message);
        resolve({ success: false, error: 'PLAYER_LAUNCH_FAILED' });
      });
    });
  }
}
