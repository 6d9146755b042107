import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import type { Credentials } from 'google-auth-library';
import { getLogger, logVerbose } from '../utils/logger';

export interface TokenStore {
  load(): Promise<Credentials | null>;
  save(tokens: Credentials): Promise<void>;
  clear(): Promise<void>;
}

const CredentialsSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  id_token: z.string().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional()
});

/**
 * OAuth tokens persisted as JSON beside the configuration file.
 */
export class FileTokenCache implements TokenStore {
  constructor(public readonly filePath: string) {}

  async load(): Promise<Credentials | null> {
    if (!(await fs.pathExists(this.filePath))) {
      return null;
    }

    try {
      const parsed = CredentialsSchema.safeParse(await fs.readJson(this.filePath));
      if (!parsed.success || (!parsed.data.access_token && !parsed.data.refresh_token)) {
        getLogger().warning(`Ignoring unusable token cache at ${this.filePath}`);
        return null;
      }
      logVerbose('OAuth tokens loaded successfully');
      return parsed.data;
    } catch (error) {
      getLogger().warning(`Ignoring unreadable token cache at ${this.filePath}`);
      logVerbose(`Token cache read error: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  async save(tokens: Credentials): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(this.filePath, tokens, { spaces: 2, mode: 0o600 });
    logVerbose('OAuth tokens saved successfully');
  }

  async clear(): Promise<void> {
    await fs.remove(this.filePath);
    logVerbose('OAuth token cache cleared');
  }
}
