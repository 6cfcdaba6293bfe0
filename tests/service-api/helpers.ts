import { once } from 'events';
import type { Server } from 'http';
import { InMemoryEventJournal } from '@core/journal';
import { ServiceRegistry } from '@core/registry';
import { InMemoryRegistryStore } from '@core/store';
import type { LifecycleName } from '@shared/types';
import { createApp } from '@api/app';
import type { ApiContext } from '@api/context';

/** Registry and journal wired the way the server wires its in-memory storage. */
export function makeContext(
  lifecycle: LifecycleName = 'full',
  journal: InMemoryEventJournal = new InMemoryEventJournal(),
): ApiContext {
  const store = new InMemoryRegistryStore(journal);
  return {
    registry: new ServiceRegistry({ lifecycle, store }),
    journal,
    storage: 'memory',
  };
}

export interface TestServer {
  ctx: ApiContext;
  baseUrl: string;
  close(): Promise<void>;
}

/** Serves a fresh app on an ephemeral loopback port. */
export async function startServer(
  lifecycle: LifecycleName = 'full',
  journal?: InMemoryEventJournal,
): Promise<TestServer> {
  const ctx = makeContext(lifecycle, journal);
  const server: Server = createApp(ctx, { logRequests: false }).listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    ctx,
    baseUrl: `http://127.0.0.1:${address.port}/api`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export interface JsonResponse {
  status: number;
  body: unknown;
}

export async function request(
  baseUrl: string,
  method: string,
  path: string,
  payload?: unknown,
): Promise<JsonResponse> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: payload === undefined ? undefined : { 'content-type': 'application/json' },
    body: payload === undefined ? undefined : JSON.stringify(payload),
  });
  const body: unknown = await res.json();
  return { status: res.status, body };
}

export function routePaths(router: { stack: { route?: { path: string } }[] }): string[] {
  return router.stack.flatMap((layer) => (layer.route ? [layer.route.path] : []));
}
