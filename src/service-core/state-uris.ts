import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ServiceState } from '@shared/types';
import { decodeState, type Lifecycle } from './lifecycle';
import type { ServiceRegistry, StateUriUpdate } from './registry';

// --- Schema ---

export const stateUriFileSchema = z.object({
  uris: z.record(z.string(), z.string().min(1)),
});

// --- Loader ---

/**
 * Reads a `{ "uris": { "<State>": "<uri>" } }` file and resolves every key
 * against the lifecycle. Unknown states are rejected so a typo cannot leave a
 * state silently unconfigured.
 */
export async function loadStateUris(
  filePath: string,
  lifecycle: Lifecycle,
): Promise<Map<ServiceState, string>> {
  const raw = await readFile(filePath, 'utf-8');
  const parsed = stateUriFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid state URI file ${filePath}: ${parsed.error.message}`);
  }

  const resolved = new Map<ServiceState, string>();
  for (const [key, uri] of Object.entries(parsed.data.uris)) {
    const state = decodeState(lifecycle, key);
    if (!state) {
      throw new Error(
        `Invalid state URI file ${filePath}: '${key}' is not a state of the ${lifecycle.name} lifecycle`,
      );
    }
    resolved.set(state, uri);
  }
  return resolved;
}

/** Seeds a registry's URI table, one state at a time. */
export async function applyStateUris(
  registry: ServiceRegistry,
  uris: Map<ServiceState, string>,
): Promise<StateUriUpdate[]> {
  const updates: StateUriUpdate[] = [];
  for (const [state, uri] of uris) {
    const result = await registry.configureStateURI(state, uri);
    if (!result.ok) {
      throw new Error(`Cannot configure URI for '${state}': ${result.error.message}`);
    }
    updates.push(result.value);
  }
  return updates;
}
