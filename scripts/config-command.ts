import * as path from 'path';
import { CliContext } from '../src/cli/context';
import {
  findRule,
  withCredentialsPath,
  withoutRule,
  withRule,
  withUpdatedRule
} from '../src/config/config-store';
import { Configuration } from '../src/types/api-types';
import { ConfigError, PlaysyncError, ValidationError } from '../src/utils/errors';
import { getLogger } from '../src/utils/logger';
import { SourceChoice } from '../src/utils/prompter';

export interface ConfigCommandOptions {
  oauth2Json?: string;
  add?: string;
  from?: string[];
  update?: string;
  remove?: string;
  list?: boolean;
  reset?: boolean;
  yes?: boolean;
}

/**
 * Human-readable listing of the credentials path and every rule with its
 * sources. Sources that are configured targets themselves show their title.
 */
export function describeConfiguration(config: Configuration): string[] {
  const lines = [`OAuth2 credentials: ${config.oauth2CredentialsPath ?? '<not set>'}`];

  if (config.rules.length === 0) {
    lines.push('No playlists configured');
    return lines;
  }

  lines.push(`Playlists (${config.rules.length}):`);
  for (const rule of config.rules) {
    lines.push(`  ${rule.title ?? 'Untitled'} (ID: ${rule.targetPlaylistId})`);
    if (rule.sourcePlaylistIds.length === 0) {
      lines.push('    No sync sources');
      continue;
    }
    for (const sourceId of rule.sourcePlaylistIds) {
      const title = findRule(config, sourceId)?.title;
      lines.push(title ? `    <- ${title} (ID: ${sourceId})` : `    <- ${sourceId}`);
    }
  }
  return lines;
}

/**
 * Configured playlists that may feed a new target: not the target itself
 * and not already syncing from it, which would make the two feed each other.
 */
export function sourceCandidates(config: Configuration, targetId: string): SourceChoice[] {
  return config.rules
    .filter(rule => rule.targetPlaylistId !== targetId && !rule.sourcePlaylistIds.includes(targetId))
    .map(rule => ({ playlistId: rule.targetPlaylistId, title: rule.title }));
}

function uniqueSources(targetId: string, sourceIds: string[]): string[] {
  if (sourceIds.includes(targetId)) {
    throw new ValidationError(`Playlist ${targetId} cannot sync from itself`, targetId);
  }
  return [...new Set(sourceIds)];
}

export class ConfigCommand {
  constructor(private readonly context: CliContext) {}

  async run(options: ConfigCommandOptions): Promise<void> {
    const logger = getLogger();

    // Reset does not read the old file, so it also recovers a corrupt one
    if (options.reset) {
      await this.reset(!!options.yes);
      return;
    }

    if (options.from && !options.add && !options.update) {
      throw new ValidationError('--from only applies together with --add or --update');
    }

    let config = await this.context.store.load();
    const changes: string[] = [];

    if (options.oauth2Json) {
      config = withCredentialsPath(config, path.resolve(options.oauth2Json));
      changes.push('OAuth2 JSON path set successfully');
    }

    if (options.add) {
      config = await this.addPlaylist(config, options.add, options.from);
      changes.push(`Playlist ${options.add} added successfully`);
    }

    if (options.update) {
      if (!options.from) {
        throw new ValidationError('--update needs the new source list in --from', options.update);
      }
      config = withUpdatedRule(config, options.update, uniqueSources(options.update, options.from));
      changes.push(`Playlist ${options.update} updated successfully`);
    }

    if (options.remove) {
      config = withoutRule(config, options.remove);
      changes.push(`Playlist ${options.remove} removed successfully`);
    }

    // Saved once, after every requested change succeeded
    if (changes.length > 0) {
      await this.context.store.save(config);
      changes.forEach(change => logger.success(change));
    }

    if (options.list) {
      describeConfiguration(config).forEach(line => logger.info(line));
    }

    if (changes.length === 0 && !options.list) {
      logger.info('Nothing to do. Try: playsync config --list');
    }
  }

  private async reset(skipConfirmation: boolean): Promise<void> {
    const logger = getLogger();
    if (!skipConfirmation) {
      if (!this.context.interactive) {
        throw new PlaysyncError('Refusing to reset the configuration without confirmation, pass --yes');
      }
      const confirmed = await this.context.prompter.confirm('Are you sure you want to reset the configuration?');
      if (!confirmed) {
        logger.info('Reset cancelled');
        return;
      }
    }
    await this.context.store.reset();
    logger.success('Configuration reset successfully');
  }

  private async addPlaylist(
    config: Configuration,
    targetId: string,
    from: string[] | undefined
  ): Promise<Configuration> {
    if (findRule(config, targetId)) {
      throw new ConfigError(`Playlist ${targetId} is already configured`, 'DuplicateTarget');
    }
    if (!config.oauth2CredentialsPath) {
      throw new ConfigError(
        'The path to the OAuth2 JSON file is not set. Set it with --oauth2-json before adding playlists.',
        'MissingCredentials'
      );
    }

    const client = await this.context.createClient(config.oauth2CredentialsPath);
    const title = await client.getPlaylistTitle(targetId);

    let sources = from ?? [];
    if (!from) {
      const candidates = sourceCandidates(config, targetId);
      if (candidates.length > 0 && this.context.interactive) {
        sources = await this.context.prompter.selectSources(candidates);
      }
    }

    return withRule(config, {
      targetPlaylistId: targetId,
      title,
      sourcePlaylistIds: uniqueSources(targetId, sources)
    });
  }
}
