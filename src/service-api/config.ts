import 'dotenv/config';
import { DEFAULT_COLLECTION } from '@shared/constants';
import type { LifecycleName } from '@shared/types';
import { isLifecycleName } from '@core/lifecycle';

export function parseLifecycle(value: string | undefined): LifecycleName {
  const name = value || 'full';
  if (!isLifecycleName(name)) {
    throw new Error(`SERVICE_LIFECYCLE must be 'full' or 'simplified' (got '${name}')`);
  }
  return name;
}

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  database: {
    url: process.env.DATABASE_URL || null,
  },
  lifecycle: parseLifecycle(process.env.SERVICE_LIFECYCLE),
  stateUrisFile: process.env.STATE_URIS_FILE || null,
  collection: {
    name: process.env.COLLECTION_NAME || DEFAULT_COLLECTION.name,
    symbol: process.env.COLLECTION_SYMBOL || DEFAULT_COLLECTION.symbol,
  },
} as const;
