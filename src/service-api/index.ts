import { createServer, type Server } from 'http';
import path from 'path';
import { InMemoryEventJournal, type EventJournal } from '@core/journal';
import { InMemoryOwnershipLedger, type OwnershipLedger } from '@core/ledger';
import { ServiceRegistry } from '@core/registry';
import { applyStateUris, loadStateUris } from '@core/state-uris';
import { InMemoryRegistryStore, type RegistryStore } from '@core/store';
import { API_PREFIX } from '@shared/constants';
import { connectDatabase } from '@db/connection';
import { PgEventJournal } from '@db/journal';
import { PgOwnershipLedger } from '@db/ledger';
import { PgRegistryStore } from '@db/store';
import { createApp } from './app';
import { config } from './config';
import type { StorageKind } from './context';

interface Storage {
  ledger: OwnershipLedger;
  store: RegistryStore;
  journal: EventJournal;
  storage: StorageKind;
}

const closers: (() => Promise<void>)[] = [];
let server: Server | null = null;

function buildStorage(): Storage {
  if (config.database.url) {
    const handle = connectDatabase(config.database.url);
    closers.push(handle.close);
    return {
      ledger: new PgOwnershipLedger(handle.db),
      store: new PgRegistryStore(handle.db),
      journal: new PgEventJournal(handle.db),
      storage: 'postgres',
    };
  }
  const journal = new InMemoryEventJournal();
  return {
    ledger: new InMemoryOwnershipLedger(),
    store: new InMemoryRegistryStore(journal),
    journal,
    storage: 'memory',
  };
}

function releaseStorage(code: number) {
  Promise.all(closers.map((close) => close())).then(
    () => process.exit(code),
    (err: unknown) => {
      console.error('[SERVER] Failed to release storage:', err);
      process.exit(1);
    },
  );
}

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  if (server) {
    server.close(() => releaseStorage(0));
  } else {
    releaseStorage(0);
  }
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

async function start() {
  const { ledger, store, journal, storage } = buildStorage();

  const registry = await ServiceRegistry.open({
    lifecycle: config.lifecycle,
    ledger,
    store,
    collection: config.collection,
  });

  if (config.stateUrisFile) {
    const file = path.resolve(config.stateUrisFile);
    const uris = await loadStateUris(file, registry.lifecycle);
    const updates = await applyStateUris(registry, uris);
    const changed = updates.filter((update) => update.changed).length;
    console.warn(`[REGISTRY] Loaded ${updates.length} state URIs from ${file} (${changed} changed)`);
  }

  console.warn(
    `[REGISTRY] ${config.collection.name} (${config.collection.symbol}), ${registry.lifecycle.name} lifecycle, ${storage} storage, next id ${registry.nextId()}`,
  );

  const app = createApp({ registry, journal, storage }, { clientUrl: config.clientUrl });
  server = createServer(app);
  server.listen(config.port, () => {
    console.warn(`[SERVER] Companion service registry API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  releaseStorage(1);
});
