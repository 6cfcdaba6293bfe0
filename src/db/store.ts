import { asc } from 'drizzle-orm';
import type { ServiceState } from '@shared/types';
import { eventAction, eventTokenId } from '@core/events';
import type { RegistryCommit, RegistrySnapshot, RegistryStore } from '@core/store';
import type { ServiceToken } from '@core/token';
import type { Database } from './connection';
import { registryEvents } from './schema/registry-events';
import { serviceTokens } from './schema/service-tokens';
import { stateUris } from './schema/state-uris';

// Token records, the URI table and the journal share one transaction per
// commit, so the journal's seq order is the order the registry applied them.
export class PgRegistryStore implements RegistryStore {
  constructor(private readonly db: Database) {}

  async load(): Promise<RegistrySnapshot> {
    const rows = await this.db.select().from(serviceTokens).orderBy(asc(serviceTokens.id));
    const uriRows = await this.db.select().from(stateUris);

    const tokens: ServiceToken[] = rows.map((row) => ({
      id: row.id,
      state: row.state,
      rating: row.rating,
      companion: row.companion,
      evidenceOf: row.evidenceOf,
      evidenceFor: row.evidenceFor,
      uri: row.uri,
    }));

    const uris: Partial<Record<ServiceState, string>> = {};
    for (const row of uriRows) {
      uris[row.state] = row.uri;
    }

    return { tokens, stateUris: uris };
  }

  async commit(commit: RegistryCommit): Promise<void> {
    await this.db.transaction(async (tx) => {
      for (const token of commit.tokens) {
        const values = {
          state: token.state,
          rating: token.rating,
          companion: token.companion,
          evidenceOf: token.evidenceOf,
          evidenceFor: token.evidenceFor,
          uri: token.uri,
          updatedAt: new Date(),
        };
        await tx
          .insert(serviceTokens)
          .values({ id: token.id, ...values })
          .onConflictDoUpdate({ target: serviceTokens.id, set: values });
      }

      if (commit.stateUri) {
        const { state, uri } = commit.stateUri;
        await tx
          .insert(stateUris)
          .values({ state, uri })
          .onConflictDoUpdate({ target: stateUris.state, set: { uri, updatedAt: new Date() } });
      }

      if (commit.events.length > 0) {
        await tx.insert(registryEvents).values(
          commit.events.map((event) => ({
            tokenId: eventTokenId(event),
            action: eventAction(event),
            event,
          })),
        );
      }
    });
  }
}
