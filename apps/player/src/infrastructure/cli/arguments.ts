/**
 * Command-line argument parsing
 */

import { parseArgs } from 'util';
import { PlaybackMode, Result } from '@dirplay/shared';

export const VERSION = '1.0.0';

export interface CliOptions {
  readonly player?: string;
  readonly mediaOnly?: boolean;
}

export type CliCommand =
  | { readonly kind: 'menu'; readonly options: CliOptions }
  | {
      readonly kind: 'mode';
      readonly mode: PlaybackMode;
      readonly directory?: string;
      readonly term?: string;
      readonly options: CliOptions;
    }
  | { readonly kind: 'help' }
  | { readonly kind: 'version' };

export const USAGE = `Usage: dirplay [options] [command]

Commands:
  (none)                 Show the mode menu
  shuffle [dir]          Random continuous play (default: $DIRPLAY_MUSIC_DIR or ~/Music)
  list [dir]             Sequential continuous play (default: current directory)
  search [term] [dir]    Search file names below dir and play one match

Options:
  -p, --player <cmd>     Player executable (default: $DIRPLAY_PLAYER or mpv)
      --media-only       Only list audio/video files
  -h, --help             Show this help
  -v, --version          Show the version`;

const MODES: readonly PlaybackMode[] = ['shuffle', 'list', 'search'];

function isMode(value: string): value is PlaybackMode {
  return MODES.some(mode => mode === value);
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      player: { type: 'string', short: 'p' },
      'media-only': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' }
    },
    allowPositionals: true,
    strict: true
  });
}

export function parseCliArguments(argv: readonly string[]): Result<CliCommand, string> {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;

  if (values.help) {
    return { success: true, value: { kind: 'help' } };
  }
  if (values.version) {
    return { success: true, value: { kind: 'version' } };
  }

  const options: CliOptions = {
    ...(values.player !== undefined ? { player: values.player } : {}),
    ...(values['media-only'] !== undefined ? { mediaOnly: values['media-only'] } : {})
  };

  if (positionals.length === 0) {
    return { success: true, value: { kind: 'menu', options } };
  }

  const [name, ...rest] = positionals;
  if (!isMode(name)) {
    return { success: false, error: `Unknown command '${name}'` };
  }

  const maxRest = name === 'search' ? 2 : 1;
  if (rest.length > maxRest) {
    return { success: false, error: `Too many arguments for '${name}'` };
  }

  if (name === 'search') {
    const [term, directory] = rest;
    return {
      success: true,
      value: {
        kind: 'mode',
        mode: name,
        ...(term !== undefined ? { term } : {}),
        ...(directory !== undefined ? { directory } : {}),
        options
      }
    };
  }

  const [directory] = rest;
  return {
    success: true,
    value: {
      kind: 'mode',
      mode: name,
      ...(directory !== undefined ? { directory } : {}),
      options
    }
  };
}
