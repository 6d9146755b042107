import * as os from 'os';
import * as path from 'path';

export const APP_NAME = 'playsync';
export const CONFIG_FILE = 'config.json';
export const TOKEN_CACHE_FILE = 'token_cache.json';

/**
 * Per-user configuration directory for the current platform.
 */
export function defaultConfigDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  if (platform === 'win32') {
    return path.join(env.APPDATA ?? path.join(home, 'AppData', 'Roaming'), APP_NAME);
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_NAME);
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_NAME);
}

export class AppPaths {
  constructor(public readonly configDir: string) {}

  get configFile(): string {
    return path.join(this.configDir, CONFIG_FILE);
  }

  get tokenCacheFile(): string {
    return path.join(this.configDir, TOKEN_CACHE_FILE);
  }
}
