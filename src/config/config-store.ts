import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { Configuration, SyncRule } from '../types/api-types';
import { ConfigError, describeError } from '../utils/errors';
import { logVerbose } from '../utils/logger';

const SyncRuleSchema = z.object({
  targetPlaylistId: z.string().min(1, 'Target playlist ID is required'),
  title: z.string().optional(),
  sourcePlaylistIds: z.array(z.string().min(1)).default([])
});

const ConfigurationSchema = z
  .object({
    oauth2CredentialsPath: z.string().min(1).optional(),
    rules: z.array(SyncRuleSchema).default([])
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.rules.forEach((rule, index) => {
      if (seen.has(rule.targetPlaylistId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'targetPlaylistId'],
          message: `Duplicate target playlist ${rule.targetPlaylistId}`
        });
      }
      seen.add(rule.targetPlaylistId);
    });
  });

const FsErrorShape = z.object({ code: z.string() });

export function emptyConfiguration(): Configuration {
  return { rules: [] };
}

export function findRule(config: Configuration, targetId: string): SyncRule | undefined {
  return config.rules.find(rule => rule.targetPlaylistId === targetId);
}

export function withRule(config: Configuration, rule: SyncRule): Configuration {
  if (findRule(config, rule.targetPlaylistId)) {
    throw new ConfigError(
      `Playlist ${rule.targetPlaylistId} is already configured`,
      'DuplicateTarget'
    );
  }
  return { ...config, rules: [...config.rules, { ...rule, sourcePlaylistIds: [...rule.sourcePlaylistIds] }] };
}

export function withUpdatedRule(config: Configuration, targetId: string, sourceIds: string[]): Configuration {
  if (!findRule(config, targetId)) {
    throw new ConfigError(`Playlist ${targetId} is not configured`, 'UnknownRule');
  }
  return {
    ...config,
    rules: config.rules.map(rule =>
      rule.targetPlaylistId === targetId ? { ...rule, sourcePlaylistIds: [...sourceIds] } : rule
    )
  };
}

export function withoutRule(config: Configuration, targetId: string): Configuration {
  if (!findRule(config, targetId)) {
    throw new ConfigError(`Playlist ${targetId} is not configured`, 'UnknownRule');
  }
  return { ...config, rules: config.rules.filter(rule => rule.targetPlaylistId !== targetId) };
}

export function withCredentialsPath(config: Configuration, credentialsPath: string): Configuration {
  return { ...config, oauth2CredentialsPath: credentialsPath };
}

/**
 * JSON file holding the credentials path and the sync rules.
 */
export class ConfigStore {
  constructor(public readonly filePath: string) {}

  /**
   * Load the configuration. A missing file is a first run and yields an
   * empty configuration.
   */
  async load(): Promise<Configuration> {
    if (!(await fs.pathExists(this.filePath))) {
      logVerbose(`No configuration at ${this.filePath}, starting empty`);
      return emptyConfiguration();
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(this.filePath);
    } catch (error) {
      // File system errors carry a code such as EACCES; JSON syntax errors do not
      if (FsErrorShape.safeParse(error).success) {
        throw new ConfigError(
          `Configuration file ${this.filePath} could not be read: ${describeError(error)}`,
          'Unreadable',
          { cause: error }
        );
      }
      throw new ConfigError(`Configuration file ${this.filePath} is not valid JSON`, 'ParseError', {
        cause: error
      });
    }

    const parsed = ConfigurationSchema.safeParse(raw);
    if (!parsed.success) {
      const validationErrors = parsed.error.errors
        .map(err => `${err.path.join('.')}: ${err.message}`)
        .join(', ');
      throw new ConfigError(`Invalid configuration in ${this.filePath}: ${validationErrors}`, 'ParseError');
    }
    return parsed.data;
  }

  /**
   * Write through a temp file so a crash never leaves a truncated config.
   */
  async save(config: Configuration): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeJson(tempPath, config, { spaces: 2 });
    await fs.move(tempPath, this.filePath, { overwrite: true });
    logVerbose(`Configuration saved to ${this.filePath}`);
  }

  async addRule(targetId: string, sourceIds: string[], title?: string): Promise<Configuration> {
    const config = withRule(await this.load(), { targetPlaylistId: targetId, title, sourcePlaylistIds: sourceIds });
    await this.save(config);
    return config;
  }

  async updateRule(targetId: string, sourceIds: string[]): Promise<Configuration> {
    const config = withUpdatedRule(await this.load(), targetId, sourceIds);
    await this.save(config);
    return config;
  }

  async removeRule(targetId: string): Promise<Configuration> {
    const config = withoutRule(await this.load(), targetId);
    await this.save(config);
    return config;
  }

  async setCredentialsPath(credentialsPath: string): Promise<Configuration> {
    const config = withCredentialsPath(await this.load(), credentialsPath);
    await this.save(config);
    return config;
  }

  async reset(): Promise<Configuration> {
    const config = emptyConfiguration();
    await this.save(config);
    return config;
  }
}
