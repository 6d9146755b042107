import {
  AdditionPlan,
  PlaylistClient,
  RuleSyncReport,
  SyncOptions,
  SyncRule,
  SyncRunResult,
  VideoReference
} from '../types/api-types';
import { AuthError, toApiError } from '../utils/errors';
import { getLogger, logVerbose } from '../utils/logger';

/**
 * Videos from the sources that the target lacks, in source order, each
 * video at most once per run.
 */
export function planAdditions(
  targetItems: VideoReference[],
  sourceItemLists: VideoReference[][]
): AdditionPlan {
  const seen = new Set(targetItems.map(item => item.videoId));
  const toAdd: VideoReference[] = [];
  let skippedDuplicates = 0;

  for (const sourceItems of sourceItemLists) {
    for (const item of sourceItems) {
      if (seen.has(item.videoId)) {
        skippedDuplicates++;
        continue;
      }
      seen.add(item.videoId);
      toAdd.push(item);
    }
  }

  return { toAdd, skippedDuplicates };
}

export function ruleLabel(rule: SyncRule): string {
  return rule.title ? `'${rule.title}' (${rule.targetPlaylistId})` : rule.targetPlaylistId;
}

export function summarizeReport(report: RuleSyncReport): string {
  const parts = report.dryRun
    ? [`${report.toAdd.length} to add`]
    : [`${report.added.length} added`];
  parts.push(`${report.skippedDuplicates} skipped (duplicate)`);
  if (report.failures.length > 0) {
    parts.push(`${report.failures.length} failed`);
  }
  return parts.join(', ');
}

function emptyReport(rule: SyncRule, options: SyncOptions): RuleSyncReport {
  return {
    rule,
    dryRun: options.dryRun,
    toAdd: [],
    added: [],
    skippedDuplicates: 0,
    failures: []
  };
}

export class SyncEngine {
  constructor(private readonly client: PlaylistClient) {}

  /**
   * Sync one rule. Fetch failures propagate; insertion failures are
   * collected, and a quota or authorization error stops the remaining
   * insertions.
   */
  async syncRule(rule: SyncRule, options: SyncOptions): Promise<RuleSyncReport> {
    const logger = getLogger();
    const report = emptyReport(rule, options);

    if (rule.sourcePlaylistIds.length === 0) {
      logVerbose(`${ruleLabel(rule)} has no source playlists, skipping`);
      return report;
    }

    logger.info(`Syncing playlist ${ruleLabel(rule)}`);
    const targetItems = await this.client.listItems(rule.targetPlaylistId);

    const sourceItemLists: VideoReference[][] = [];
    for (const sourceId of rule.sourcePlaylistIds) {
      sourceItemLists.push(await this.client.listItems(sourceId));
    }

    const plan = planAdditions(targetItems, sourceItemLists);
    report.toAdd = plan.toAdd;
    report.skippedDuplicates = plan.skippedDuplicates;
    logger.info(`Found ${plan.toAdd.length} videos to sync to ${ruleLabel(rule)}`);

    if (options.dryRun || plan.toAdd.length === 0) {
      return report;
    }

    for (const video of plan.toAdd) {
      try {
        await this.client.insertItem(rule.targetPlaylistId, video.videoId);
        report.added.push(video);
        logger.success(`Added: ${video.title}`);
      } catch (error) {
        const apiError = toApiError(error, `insertItem(${rule.targetPlaylistId}, ${video.videoId})`);
        if (apiError.quotaExceeded) {
          report.abortedBy = apiError;
          logger.error(`Quota exhausted while syncing ${ruleLabel(rule)}, stopping`);
          break;
        }
        if (apiError.authFailure) {
          report.abortedBy = new AuthError(`Authorization lost while syncing ${ruleLabel(rule)}: ${apiError.message}`, {
            cause: apiError
          });
          logger.error(`Authorization lost while syncing ${ruleLabel(rule)}, stopping`);
          break;
        }
        report.failures.push({ video, reason: apiError.message, error: apiError });
        logger.warning(`Failed to add '${video.title}': ${apiError.message}`);
      }
    }

    return report;
  }

  /**
   * Sync rules one after another. Stops at the first quota or authorization
   * abort, or failed playlist fetch.
   */
  async syncAll(rules: SyncRule[], options: SyncOptions): Promise<SyncRunResult> {
    const result: SyncRunResult = { reports: [] };

    for (const rule of rules) {
      let report: RuleSyncReport;
      try {
        report = await this.syncRule(rule, options);
      } catch (error) {
        result.fatalError = error instanceof Error ? error : toApiError(error, `sync ${rule.targetPlaylistId}`);
        getLogger().error(`Sync of ${ruleLabel(rule)} failed`, result.fatalError);
        break;
      }

      result.reports.push(report);
      if (report.abortedBy) {
        result.fatalError = report.abortedBy;
        break;
      }
    }

    return result;
  }
}
