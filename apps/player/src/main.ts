/**
 * dirplay entry point
 *
 * Parses the command line, loads configuration, validates the player and
 * runs either the mode menu or the requested mode.
 */

import { CliApp } from './infrastructure/cli/CliApp';
import { parseCliArguments, USAGE, VERSION } from './infrastructure/cli/arguments';
import { ReadlinePrompter } from './infrastructure/cli/Prompter';
import {
  createPlayerConfig,
  loadPlayerConfig,
  PlayerConfig,
  PlayerConfigError
} from './infrastructure/config/config';
import { LibraryScanner } from './infrastructure/library/LibraryScanner';
import { ProcessManager } from './infrastructure/playback';
import { DependencyValidator } from './infrastructure/validation/dependency-validator';

let app: CliApp | null = null;
let processManager: ProcessManager | null = null;

/**
 * Run the CLI and resolve with the process exit code
 */
async function runCli(argv: readonly string[]): Promise<number> {
  const command = parseCliArguments(argv);
  if (!command.success) {
    console.error(command.error);
    console.error(USAGE);
    return 1;
  }

  const cli = command.value;
  switch (cli.kind) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(`dirplay ${VERSION}`);
      return 0;
  }

  const { player, mediaOnly } = cli.options;
  let config: PlayerConfig;
  try {
    config = createPlayerConfig(loadPlayerConfig(), {
      ...(player !== undefined ? { command: player } : {}),
      ...(mediaOnly !== undefined ? { mediaOnly } : {})
    });
  } catch (error) {
    if (error instanceof PlayerConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const cliApp = new CliApp({
    config,
    scanner: new LibraryScanner(),
    prompter: new ReadlinePrompter(),
    resolvePlayer: candidates => DependencyValidator.validateAtStartup(candidates),
    createLauncher: options => {
      processManager = new ProcessManager(options);
      return processManager;
    }
  });

  app = cliApp;
  setupGracefulShutdown();

  if (cli.kind === 'menu') {
    return cliApp.runMenu();
  }

  const { mode, directory, term } = cli;
  return cliApp.runMode({
    mode,
    ...(directory !== undefined ? { directory } : {}),
    ...(term !== undefined ? { term } : {})
  });
}

/**
 * Set up graceful shutdown handlers.
 * A signal stops the session; the running player is terminated and reaped
 * before run() returns, so the process exits on its own.
 */
function setupGracefulShutdown(): void {
  const shutdownHandler = (signal: NodeJS.Signals) => {
    console.log(`\nReceived ${signal}, stopping playback...`);
    app?.interrupt();
  };

  process.on('SIGINT', shutdownHandler);
  process.on('SIGTERM', shutdownHandler);

  // Never leave a player behind, whatever ends the process
  process.on('exit', () => processManager?.syncCleanup());

  process.on('unhandledRejection', async (reason) => {
    console.error('Unhandled rejection:', reason);
    await cleanup();
    process.exit(1);
  });
}

/**
 * Stop the session and any running player
 */
async function cleanup(): Promise<void> {
  try {
    app?.interrupt();
    if (processManager) {
      await processManager.cleanup();
      processManager = null;
    }
  } catch (error) {
    console.error('Cleanup failed:', error);
  }
}

/**
 * Run with the process arguments and set the exit code
 */
function main(): void {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(async error => {
      console.error('Fatal error:', error instanceof Error ? error.message : error);
      await cleanup();
      process.exit(1);
    });
}

// Start the CLI if this file is run directly
if (require.main === module) {
  main();
}

export { main, runCli, cleanup };
