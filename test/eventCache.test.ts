import { describe, expect, it } from 'vitest';
import path from 'node:path';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import os from 'node:os';
import { EventCache } from '../src/github/eventCache.js';
import { StoreError } from '../src/store/jsonFile.js';

async function tmpFile() {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'taskpulse-events-'));
  return path.join(dir, 'events.json');
}

describe('EventCache', () => {
  it('returns undefined before anything was cached', async () => {
    expect(await new EventCache(await tmpFile()).load()).toBeUndefined();
  });

  it('overwrites the file with the latest events', async () => {
    const file = await tmpFile();
    const cache = new EventCache(file);

    await cache.save([{ id: '1', type: 'WatchEvent' }, { id: '2', type: 'ForkEvent' }]);
    await cache.save([{ id: '3', type: 'PushEvent', payload: { title: 'naïve café' } }]);

    expect(await cache.load()).toEqual([{ id: '3', type: 'PushEvent', payload: { title: 'naïve café' } }]);
    expect(await readFile(file, 'utf8')).toContain('naïve café');
  });

  it('fails loudly on a corrupt file', async () => {
    const file = await tmpFile();
    await writeFile(file, '[{"id": ', 'utf8');

    await expect(new EventCache(file).load()).rejects.toBeInstanceOf(StoreError);
  });
});
