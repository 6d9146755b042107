import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { RateLimitingOptions } from '../types/api-types';
import { ConfigError } from '../utils/errors';
import { AppPaths, defaultConfigDir } from '../utils/paths';

const numeric = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine(val => /^\d+$/.test(val), 'must be a non-negative integer')
    .transform(val => parseInt(val, 10));

// Environment variables schema
const EnvSchema = z.object({
  // Application Settings
  VERBOSE: z.string().default('false').transform(val => val === 'true'),
  LOG_LEVEL: z.enum(['error', 'info', 'verbose']).default('info'),
  LOGS_DIR: z.string().min(1).optional(),
  PLAYSYNC_CONFIG_DIR: z.string().min(1).optional(),

  // Rate Limiting
  MAX_RETRIES: numeric('3'),
  RETRY_DELAY_MS: numeric('1000'),
  API_CALL_DELAY_MS: numeric('100'),
  QUOTA_POLICY: z.enum(['abort', 'retry']).default('abort'),
  QUOTA_RETRY_DELAY_MS: numeric('60000'),

  // OAuth
  OAUTH_FLOW: z.enum(['loopback', 'manual']).default('loopback'),
  OAUTH_REDIRECT_PORT: numeric('8085'),
  OAUTH_TIMEOUT_MS: numeric('120000')
});

export type OAuthFlow = 'loopback' | 'manual';

export interface AppSettings {
  app: {
    verbose: boolean;
    logLevel: 'error' | 'info' | 'verbose';
  };
  rateLimiting: RateLimitingOptions;
  oauth: {
    flow: OAuthFlow;
    redirectPort: number;
    timeoutMs: number;
  };
  paths: {
    configDir: string;
    logsDir: string | undefined;
  };
}

export class ConfigLoader {
  private settings: AppSettings | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and validate settings from the environment and an optional .env
   */
  async loadSettings(): Promise<AppSettings> {
    if (this.settings) {
      return this.settings;
    }

    const env = await this.loadEnvironmentVariables();
    this.settings = {
      app: {
        verbose: env.VERBOSE,
        logLevel: env.LOG_LEVEL
      },
      rateLimiting: {
        maxRetries: env.MAX_RETRIES,
        retryDelayMs: env.RETRY_DELAY_MS,
        apiCallDelayMs: env.API_CALL_DELAY_MS,
        quotaPolicy: env.QUOTA_POLICY,
        quotaRetryDelayMs: env.QUOTA_RETRY_DELAY_MS
      },
      oauth: {
        flow: env.OAUTH_FLOW,
        redirectPort: env.OAUTH_REDIRECT_PORT,
        timeoutMs: env.OAUTH_TIMEOUT_MS
      },
      paths: {
        configDir: env.PLAYSYNC_CONFIG_DIR ?? defaultConfigDir(),
        logsDir: env.LOGS_DIR
      }
    };
    return this.settings;
  }

  /**
   * Load and validate environment variables
   */
  private async loadEnvironmentVariables(): Promise<z.infer<typeof EnvSchema>> {
    // Only the real process environment picks up a .env file
    const envPath = path.resolve(process.cwd(), '.env');
    if (this.env === process.env && (await fs.pathExists(envPath))) {
      dotenv.config({ path: envPath });
    }

    const parsed = EnvSchema.safeParse(this.env);
    if (!parsed.success) {
      const invalidVars = parsed.error.errors
        .map(err => `${err.path.join('.')} (${err.message})`)
        .join(', ');
      throw new ConfigError(`Missing or invalid environment variables: ${invalidVars}`, 'ParseError');
    }
    return parsed.data;
  }
}

export function appPathsFor(settings: AppSettings): AppPaths {
  return new AppPaths(settings.paths.configDir);
}

// Convenience function to load settings
export async function loadSettings(): Promise<AppSettings> {
  const loader = new ConfigLoader();
  return await loader.loadSettings();
}
