import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { getLifecycle } from '@core/lifecycle';
import { ServiceRegistry } from '@core/registry';
import { applyStateUris, loadStateUris } from '@core/state-uris';
import type { ServiceState } from '@shared/types';
import { expectOk } from './helpers';

const full = getLifecycle('full');

let dir: string;

async function writeUriFile(name: string, contents: unknown): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, JSON.stringify(contents), 'utf-8');
  return file;
}

beforeAll(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'state-uris-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadStateUris', () => {
  it('resolves keys by name or ordinal', async () => {
    const file = await writeUriFile('mixed.json', {
      uris: { Created: 'ipfs://created', '4': 'ipfs://rated', paid: 'ipfs://paid' },
    });
    const uris = await loadStateUris(file, full);
    expect([...uris.entries()]).toEqual([
      ['Rated', 'ipfs://rated'],
      ['Created', 'ipfs://created'],
      ['Paid', 'ipfs://paid'],
    ]);
  });

  it('rejects a state the lifecycle does not have', async () => {
    const file = await writeUriFile('foreign.json', { uris: { Finished: 'ipfs://finished' } });
    await expect(loadStateUris(file, full)).rejects.toThrow(
      "'Finished' is not a state of the full lifecycle",
    );
  });

  it('rejects a file without a uris object', async () => {
    const file = await writeUriFile('shape.json', { Created: 'ipfs://created' });
    await expect(loadStateUris(file, full)).rejects.toThrow(/^Invalid state URI file/);
  });

  it('reads the bundled configuration files', async () => {
    const fullUris = await loadStateUris(path.resolve('config/state-uris.full.json'), full);
    expect(fullUris.size).toBe(5);

    const simplifiedUris = await loadStateUris(
      path.resolve('config/state-uris.simplified.json'),
      getLifecycle('simplified'),
    );
    expect(simplifiedUris.size).toBe(3);
  });
});

describe('applyStateUris', () => {
  it('configures each state on the registry', async () => {
    const registry = new ServiceRegistry({ lifecycle: 'full' });
    const updates = await applyStateUris(
      registry,
      new Map<ServiceState, string>([
        ['Created', 'ipfs://created'],
        ['Paid', 'ipfs://paid'],
      ]),
    );

    expect(updates.map((u) => u.state)).toEqual(['Created', 'Paid']);
    expect(updates.every((u) => u.changed)).toBe(true);
    expect(await registry.stateUriTable()).toEqual({
      Created: 'ipfs://created',
      Paid: 'ipfs://paid',
    });
    expect(expectOk(await registry.createService('client-a')).uri).toBe('ipfs://created');
  });

  it('stops at a state the registry rejects', async () => {
    const registry = new ServiceRegistry({ lifecycle: 'simplified' });
    const uris = new Map<ServiceState, string>([['Rated', 'ipfs://rated']]);
    await expect(applyStateUris(registry, uris)).rejects.toThrow(
      "Cannot configure URI for 'Rated'",
    );
  });
});
