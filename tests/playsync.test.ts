import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createProgram } from '../scripts/playsync';
import { ConfigStore } from '../src/config/config-store';
import { createFakeContext } from './helpers/fake-context';
import { FakePlaylistClient } from './helpers/fake-playlist-client';

describe('playsync command line', () => {
  let tempDir: string;
  let store: ConfigStore;
  let client: FakePlaylistClient;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'playsync-cli-'));
    store = new ConfigStore(path.join(tempDir, 'config.json'));
    client = new FakePlaylistClient({ PL_T: ['A'], PL_S1: ['A', 'B'], PL_S2: ['C'] });
    client.titles.set('PL_T', 'Target');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  async function run(...args: string[]): Promise<void> {
    await createProgram(createFakeContext(store, client)).parseAsync(args, { from: 'user' });
  }

  it('configures a playlist and syncs it', async () => {
    await run('config', '--oauth2-json', '/secrets/client_secret.json');
    await run('config', '--add', 'PL_T', '--from', 'PL_S1', 'PL_S2');

    expect(await store.load()).toEqual({
      oauth2CredentialsPath: '/secrets/client_secret.json',
      rules: [{ targetPlaylistId: 'PL_T', title: 'Target', sourcePlaylistIds: ['PL_S1', 'PL_S2'] }]
    });

    await run('sync', '--dry-run');
    expect(client.insertCalls).toEqual([]);

    await run('sync', '--id', 'PL_T');
    expect(client.videoIds('PL_T')).toEqual(['A', 'B', 'C']);
  });

  it('passes the short flags through', async () => {
    await store.save({
      oauth2CredentialsPath: '/secrets/client_secret.json',
      rules: [{ targetPlaylistId: 'PL_T', sourcePlaylistIds: ['PL_S1'] }]
    });

    await run('config', '-u', 'PL_T', '--from', 'PL_S2');
    expect((await store.load()).rules[0].sourcePlaylistIds).toEqual(['PL_S2']);

    await run('config', '-r', 'PL_T');
    expect((await store.load()).rules).toEqual([]);
  });
});
