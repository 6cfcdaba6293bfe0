import { and, count, eq } from 'drizzle-orm';
import { LedgerError, type OwnershipLedger } from '@core/ledger';
import type { Database } from './connection';
import { tokenOwners } from './schema/token-owners';

export class PgOwnershipLedger implements OwnershipLedger {
  constructor(private readonly db: Database) {}

  async mint(owner: string, tokenId: number): Promise<void> {
    const inserted = await this.db
      .insert(tokenOwners)
      .values({ tokenId, owner })
      .onConflictDoNothing()
      .returning({ tokenId: tokenOwners.tokenId });

    if (inserted.length === 0) {
      throw new LedgerError(`Token ${tokenId} already minted`);
    }
  }

  async transfer(from: string, to: string, tokenId: number): Promise<void> {
    const updated = await this.db
      .update(tokenOwners)
      .set({ owner: to, updatedAt: new Date() })
      .where(and(eq(tokenOwners.tokenId, tokenId), eq(tokenOwners.owner, from)))
      .returning({ tokenId: tokenOwners.tokenId });

    if (updated.length === 0) {
      throw new LedgerError(`Token ${tokenId} is not owned by ${from}`);
    }
  }

  async burn(owner: string, tokenId: number): Promise<void> {
    const deleted = await this.db
      .delete(tokenOwners)
      .where(and(eq(tokenOwners.tokenId, tokenId), eq(tokenOwners.owner, owner)))
      .returning({ tokenId: tokenOwners.tokenId });

    if (deleted.length === 0) {
      throw new LedgerError(`Token ${tokenId} is not owned by ${owner}`);
    }
  }

  async ownerOf(tokenId: number): Promise<string | null> {
    const [row] = await this.db
      .select({ owner: tokenOwners.owner })
      .from(tokenOwners)
      .where(eq(tokenOwners.tokenId, tokenId));
    return row ? row.owner : null;
  }

  async balanceOf(owner: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(tokenOwners)
      .where(eq(tokenOwners.owner, owner));
    return row ? row.value : 0;
  }
}
