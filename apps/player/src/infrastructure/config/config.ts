/**
 * Player Configuration Management
 *
 * Reads player and directory settings from environment variables with
 * validation. Command-line options are applied on top via overrides.
 */

import * as os from 'os';
import * as path from 'path';
import { PlayerOptions } from '../../domain/playback/types';

export interface PlayerConfig {
  readonly player: PlayerOptions;
  /** Directory used by shuffle play */
  readonly musicDirectory: string;
  /** Directory used by list play and as the search default */
  readonly baseDirectory: string;
  readonly mediaOnly: boolean;
}

export interface PlayerConfigOverrides {
  readonly command?: string;
  readonly args?: readonly string[];
  readonly musicDirectory?: string;
  readonly baseDirectory?: string;
  readonly mediaOnly?: boolean;
}

export const DEFAULT_PLAYER = 'mpv';
export const DEFAULT_KILL_GRACE_MS = 3000;
const MIN_KILL_GRACE_MS = 100;
const MAX_KILL_GRACE_MS = 30000;

/**
 * Configuration error for invalid player setup
 */
export class PlayerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlayerConfigError';
  }
}

function splitList(value: string | undefined, separator: RegExp): string[] {
  if (!value) {
    return [];
  }
  return value.split(separator).map(part => part.trim()).filter(part => part.length > 0);
}

function parseBoolean(name: string, value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') {
    return false;
  }

  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new PlayerConfigError(`${name} must be true or false, got '${value}'`);
  }
}

function parseGrace(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_KILL_GRACE_MS;
  }

  if (!/^[0-9]+$/.test(value.trim())) {
    throw new PlayerConfigError(`DIRPLAY_KILL_GRACE_MS must be a whole number of milliseconds, got '${value}'`);
  }

  const grace = parseInt(value, 10);
  if (grace < MIN_KILL_GRACE_MS || grace > MAX_KILL_GRACE_MS) {
    throw new PlayerConfigError(
      `DIRPLAY_KILL_GRACE_MS must be between ${MIN_KILL_GRACE_MS} and ${MAX_KILL_GRACE_MS}, got ${grace}`
    );
  }

  return grace;
}

/**
 * Load player configuration from environment variables.
 * The working directory is captured here once and passed on explicitly.
 */
export function loadPlayerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  homeDirectory: string = os.homedir()
): PlayerConfig {
  const rawCommand = env.DIRPLAY_PLAYER;
  if (rawCommand !== undefined && rawCommand.trim().length === 0) {
    throw new PlayerConfigError('DIRPLAY_PLAYER must name a player executable');
  }

  const musicDirectory = env.DIRPLAY_MUSIC_DIR && env.DIRPLAY_MUSIC_DIR.trim().length > 0
    ? path.resolve(cwd, env.DIRPLAY_MUSIC_DIR.trim())
    : path.join(homeDirectory, 'Music');

  return {
    player: {
      command: rawCommand ? rawCommand.trim() : DEFAULT_PLAYER,
      args: splitList(env.DIRPLAY_PLAYER_ARGS, /\s+/),
      fallbackCommands: splitList(env.DIRPLAY_FALLBACK_PLAYERS, /,/),
      killGraceMs: parseGrace(env.DIRPLAY_KILL_GRACE_MS)
    },
    musicDirectory,
    baseDirectory: cwd,
    mediaOnly: parseBoolean('DIRPLAY_MEDIA_ONLY', env.DIRPLAY_MEDIA_ONLY)
  };
}

/**
 * Apply command-line overrides on top of a loaded configuration
 */
export function createPlayerConfig(base: PlayerConfig, overrides: PlayerConfigOverrides = {}): PlayerConfig {
  if (overrides.command !== undefined && overrides.command.trim().length === 0) {
    throw new PlayerConfigError('--player must name a player executable');
  }

  return {
    player: {
      ...base.player,
      ...(overrides.command !== undefined ? { command: overrides.command.trim() } : {}),
      ...(overrides.args !== undefined ? { args: overrides.args } : {})
    },
    musicDirectory: overrides.musicDirectory !== undefined
      ? path.resolve(base.baseDirectory, overrides.musicDirectory)
      : base.musicDirectory,
    baseDirectory: overrides.baseDirectory !== undefined
      ? path.resolve(base.baseDirectory, overrides.baseDirectory)
      : base.baseDirectory,
    mediaOnly: overrides.mediaOnly ?? base.mediaOnly
  };
}
