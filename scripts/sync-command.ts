import { CliContext } from '../src/cli/context';
import { ruleLabel, summarizeReport, SyncEngine } from '../src/sync/sync-engine';
import { RuleSyncReport, SyncRunResult } from '../src/types/api-types';
import { AuthError, ValidationError } from '../src/utils/errors';
import { getLogger } from '../src/utils/logger';

export interface SyncCommandOptions {
  id?: string;
  dryRun?: boolean;
}

export function describeReport(report: RuleSyncReport): string[] {
  const lines = [`${ruleLabel(report.rule)}: ${summarizeReport(report)}`];

  if (report.dryRun) {
    for (const video of report.toAdd) {
      lines.push(`  + ${video.title} (${video.videoId})`);
    }
  }
  for (const failure of report.failures) {
    lines.push(`  ! ${failure.video.title} (${failure.video.videoId}): ${failure.reason}`);
  }
  if (report.abortedBy) {
    lines.push(`  Stopped early: ${report.abortedBy.message}`);
  }
  return lines;
}

export class SyncCommand {
  constructor(private readonly context: CliContext) {}

  async run(options: SyncCommandOptions): Promise<SyncRunResult> {
    const logger = getLogger();
    const dryRun = !!options.dryRun;
    const config = await this.context.store.load();

    if (!config.oauth2CredentialsPath) {
      throw new AuthError(
        'The path to the OAuth2 JSON file is not set. Run: playsync config --oauth2-json <path>'
      );
    }

    let rules = config.rules;
    if (options.id) {
      rules = rules.filter(rule => rule.targetPlaylistId === options.id);
      if (rules.length === 0) {
        throw new ValidationError(`No sync rule configured for playlist ${options.id}`, options.id);
      }
    }

    if (rules.length === 0) {
      logger.info('No playlists configured to sync');
      return { reports: [] };
    }

    logger.info(dryRun ? 'Playlist sync (dry run)' : 'Playlist sync');
    const client = await this.context.createClient(config.oauth2CredentialsPath);
    const result = await new SyncEngine(client).syncAll(rules, { dryRun });

    for (const report of result.reports) {
      if (report.rule.sourcePlaylistIds.length === 0) continue;
      describeReport(report).forEach(line =>
        report.failures.length > 0 || report.abortedBy ? logger.warning(line) : logger.info(line)
      );
    }
    logger.info(`Estimated API quota used: ${client.getQuotaUsage().quotaUsed} units`);

    if (result.fatalError) {
      throw result.fatalError;
    }

    logger.success(dryRun ? 'Dry run completed' : 'Sync completed');
    return result;
  }
}
