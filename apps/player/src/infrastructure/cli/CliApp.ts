/**
 * CliApp - mode menu, search prompts and session wiring for the terminal
 */

import * as path from 'path';
import {
  Library,
  LibraryScanOptions,
  MODE_POLICIES,
  PlaybackMode,
  RandomSource,
  Result,
  SelectionValidator
} from '@dirplay/shared';
import { PlaybackSession, TrackSelector } from '../../application';
import {
  ILibraryScanner,
  IPlayerLauncher,
  PlaybackErrorFactory,
  PlaybackEvent,
  PlayerError,
  PlayerOptions,
  SessionError,
  SessionOutcome
} from '../../domain/playback';
import { PlayerConfig } from '../config/config';
import { ResolvedPlayer } from '../validation/dependency-validator';
import { IPrompter, PromptClosedError } from './Prompter';

export interface ManagedLauncher extends IPlayerLauncher {
  cleanup(): Promise<void>;
}

export interface CliAppDependencies {
  readonly config: PlayerConfig;
  readonly scanner: ILibraryScanner;
  readonly prompter: IPrompter;
  readonly resolvePlayer: (candidates: readonly string[]) => Promise<Result<ResolvedPlayer, PlayerError>>;
  readonly createLauncher: (options: PlayerOptions) => ManagedLauncher;
  readonly random?: RandomSource;
}

export interface ModeRequest {
  readonly mode: PlaybackMode;
  readonly directory?: string;
  readonly term?: string;
}

export const MENU_LINES = ['1: Shuffle Play', '2: List Play', '3: Search'];
const MENU_CHOICES: ReadonlyMap<string, PlaybackMode> = new Map<string, PlaybackMode>([
  ['1', 'shuffle'],
  ['2', 'list'],
  ['3', 'search']
]);

export class CliApp {
  private readonly deps: CliAppDependencies;
  private session: PlaybackSession | null = null;
  private launcher: ManagedLauncher | null = null;
  private interrupted = false;
  private playerCommand: string;

  constructor(deps: CliAppDependencies) {
    this.deps = deps;
    this.playerCommand = deps.config.player.command;
  }

  /**
   * Prompt for a mode until a valid choice is made, then run it
   */
  async runMenu(): Promise<number> {
    for (;;) {
      MENU_LINES.forEach(line => console.log(line));

      let choice: string;
      try {
        choice = await this.deps.prompter.ask('Enter your choice: ');
      } catch (error) {
        if (error instanceof PromptClosedError) {
          return 0;
        }
        throw error;
      }

      const mode = MENU_CHOICES.get(choice.trim());
      if (mode !== undefined) {
        return this.runMode({ mode });
      }

      console.log('Invalid choice. Please try again.');
    }
  }

  async runMode(request: ModeRequest): Promise<number> {
    try {
      const player = await this.deps.resolvePlayer(this.candidates());
      if (!player.success) {
        this.reportError(player.error, { player: this.deps.config.player.command });
        return 1;
      }

      this.playerCommand = player.value.command;
      const options = this.playerOptions(player.value.command);

      switch (request.mode) {
        case 'shuffle':
          return await this.runContinuous('shuffle', request.directory ?? this.deps.config.musicDirectory, options);
        case 'list':
          return await this.runContinuous('list', request.directory ?? this.deps.config.baseDirectory, options);
        case 'search':
          return await this.runSearch(request, options);
        default: {
          const unknownMode: never = request.mode;
          throw new Error(`Unknown playback mode: ${String(unknownMode)}`);
        }
      }
    } catch (error) {
      // Input closed by a signal is an interrupt, not a failure
      if (error instanceof PromptClosedError) {
        return this.interrupted ? 0 : 1;
      }
      throw error;
    } finally {
      this.deps.prompter.close();
    }
  }

  /**
   * Stop whatever is running: pending prompts and the active session
   */
  interrupt(): void {
    this.interrupted = true;
    this.deps.prompter.close();
    this.session?.interrupt();
  }

  async cleanup(): Promise<void> {
    if (this.launcher) {
      await this.launcher.cleanup();
    }
  }

  private async runContinuous(mode: PlaybackMode, directory: string, options: PlayerOptions): Promise<number> {
    const resolved = this.resolveDirectory(directory);
    const library = await this.enumerate(resolved, { recursive: false });
    if (!library) {
      return 1;
    }

    this.deps.prompter.close();
    const outcome = await this.runSession(library, mode, options, event => {
      if (event.type === 'track_started' && event.data.filePath) {
        console.log(`Playing: ${event.data.filePath}`);
      }
    });

    return this.exitCodeFor(outcome);
  }

  private async runSearch(request: ModeRequest, options: PlayerOptions): Promise<number> {
    const term = request.term ?? await this.deps.prompter.ask('Enter Song Name: ');

    let directory = request.directory;
    if (directory === undefined) {
      directory = await this.deps.prompter.ask(
        'Enter the directory to search in (leave blank for current directory): '
      );
    }
    if (directory.trim() === '') {
      directory = '.';
    }

    const library = await this.enumerate(this.resolveDirectory(directory), {
      recursive: true,
      filterTerm: term
    }, directory);
    if (!library) {
      return 1;
    }

    console.log('Found the following files:');
    library.files.forEach((file, i) => console.log(`${i + 1}: ${file}`));

    const answer = await this.deps.prompter.ask('Enter the number of the file you want to play: ');
    const index = SelectionValidator.parseSelectionIndex(answer, library.files.length);
    if (!index.success) {
      this.reportError(index.error, { count: library.files.length, input: answer });
      return 1;
    }

    this.deps.prompter.close();
    console.log(`Playing '${library.files[index.value - 1]}' with ${options.command}...`);

    const outcome = await this.runSession(library, 'search', options, () => undefined, { cursor: index.value });
    return this.exitCodeFor(outcome);
  }

  private async runSession(
    library: Library,
    mode: PlaybackMode,
    options: PlayerOptions,
    onEvent: (event: PlaybackEvent) => void,
    state = SelectionValidator.initialState()
  ): Promise<SessionOutcome> {
    this.launcher = this.deps.createLauncher(options);
    const session = new PlaybackSession(this.launcher, new TrackSelector(this.deps.random));
    session.addEventListener(onEvent);
    this.session = session;

    // A signal may have arrived before the session existed
    if (this.interrupted) {
      session.interrupt();
    }

    try {
      return await session.run(library, MODE_POLICIES[mode], state);
    } finally {
      session.removeEventListener(onEvent);
      this.session = null;
      await this.cleanup();
    }
  }

  private async enumerate(
    directory: string,
    options: Omit<LibraryScanOptions, 'mediaOnly'>,
    displayDirectory: string = directory
  ): Promise<Library | null> {
    const result = await this.deps.scanner.enumerate(directory, {
      ...options,
      mediaOnly: this.deps.config.mediaOnly
    });

    if (!result.success) {
      this.reportError(result.error, {
        directory: displayDirectory,
        ...(options.filterTerm !== undefined ? { filterTerm: options.filterTerm } : {})
      });
      return null;
    }

    return result.value;
  }

  private exitCodeFor(outcome: SessionOutcome): number {
    if (outcome.status !== 'failed') {
      return 0;
    }

    if (outcome.error) {
      const exitCode = outcome.lastExit?.code;
      this.reportError(outcome.error, {
        player: this.playerCommand,
        ...(typeof exitCode === 'number' ? { exitCode } : {})
      });
    }
    return 1;
  }

  private reportError(error: SessionError, context: Record<string, unknown>): void {
    const details = PlaybackErrorFactory.createSessionError(error, context);
    console.error(details.message);
    if (details.suggestion) {
      console.error(details.suggestion);
    }
  }

  private resolveDirectory(directory: string): string {
    return path.resolve(this.deps.config.baseDirectory, directory);
  }

  private candidates(): string[] {
    const { command, fallbackCommands } = this.deps.config.player;
    return [command, ...fallbackCommands.filter(fallback => fallback !== command)];
  }

  private playerOptions(resolvedCommand: string): PlayerOptions {
    return {
      ...this.deps.config.player,
      command: resolvedCommand,
      fallbackCommands: this.candidates().filter(candidate => candidate !== resolvedCommand)
    };
  }
}
