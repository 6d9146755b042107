#!/usr/bin/env node

/**
 * playsync
 * --------
 * Appends videos from source playlists to a target playlist, skipping the
 * ones it already holds.
 *
 * Usage:
 *   playsync config --oauth2-json ./client_secret.json
 *   playsync config --add <PLAYLIST_ID> --from <SOURCE_ID> [<SOURCE_ID>...]
 *   playsync config --list
 *   playsync sync [--id <PLAYLIST_ID>] [--dry-run]
 */

import { Command } from 'commander';
import { CliContext, createDefaultContext } from '../src/cli/context';
import { ConfigLoader } from '../src/config/config-loader';
import { describeError } from '../src/utils/errors';
import { getLogger, initializeLogger, LogLevel, toLogLevel } from '../src/utils/logger';
import { ConfigCommand, ConfigCommandOptions } from './config-command';
import { SyncCommand, SyncCommandOptions } from './sync-command';

export function createProgram(context: CliContext): Command {
  const program = new Command();
  program
    .name('playsync')
    .description('Sync YouTube playlists from their configured source playlists');

  program
    .command('config')
    .description('Manage playlist configuration')
    .option('-o, --oauth2-json <path>', 'Path to the OAuth2 client JSON file for YouTube API authentication')
    .option('-a, --add <playlistId>', 'Add a target playlist to the configuration')
    .option('--from <playlistIds...>', 'Source playlists for --add or --update')
    .option('-u, --update <playlistId>', 'Replace the sources of a configured playlist (with --from)')
    .option('-r, --remove <playlistId>', 'Remove a playlist from the configuration')
    .option('-l, --list', 'List all configured playlists')
    .option('--reset', 'Reset the configuration to defaults')
    .option('-y, --yes', 'Skip the reset confirmation')
    .action(async (options: ConfigCommandOptions) => {
      await new ConfigCommand(context).run(options);
    });

  program
    .command('sync')
    .description('Sync playlists based on configuration')
    .option('-i, --id <playlistId>', 'Sync only this target playlist (all when omitted)')
    .option('-d, --dry-run', 'Report what would be added without changing anything')
    .action(async (options: SyncCommandOptions) => {
      await new SyncCommand(context).run(options);
    });

  return program;
}

// Main execution
async function main(): Promise<void> {
  initializeLogger({ verbose: false, logLevel: LogLevel.INFO });

  const settings = await new ConfigLoader().loadSettings();
  initializeLogger({
    verbose: settings.app.verbose,
    logLevel: toLogLevel(settings.app.logLevel),
    logsDir: settings.paths.logsDir
  });

  await createProgram(createDefaultContext(settings)).parseAsync(process.argv);
}

// Run if called directly
if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof Error) {
      getLogger().error('playsync failed', error);
    } else {
      getLogger().error(`playsync failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
  });
}
