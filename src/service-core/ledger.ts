// Ownership of tokens lives outside the registry. The registry only reaches it
// through this interface and treats every thrown error as a failed call.

export interface OwnershipLedger {
  mint(owner: string, tokenId: number): Promise<void>;
  transfer(from: string, to: string, tokenId: number): Promise<void>;
  /** Undoes a mint; only the current owner can burn. */
  burn(owner: string, tokenId: number): Promise<void>;
  ownerOf(tokenId: number): Promise<string | null>;
  balanceOf(owner: string): Promise<number>;
}

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class InMemoryOwnershipLedger implements OwnershipLedger {
  private readonly owners = new Map<number, string>();

  async mint(owner: string, tokenId: number): Promise<void> {
    if (this.owners.has(tokenId)) {
      throw new LedgerError(`Token ${tokenId} already minted`);
    }
    this.owners.set(tokenId, owner);
  }

  async transfer(from: string, to: string, tokenId: number): Promise<void> {
    this.requireOwner(from, tokenId);
    this.owners.set(tokenId, to);
  }

  async burn(owner: string, tokenId: number): Promise<void> {
    this.requireOwner(owner, tokenId);
    this.owners.delete(tokenId);
  }

  async ownerOf(tokenId: number): Promise<string | null> {
    return this.owners.get(tokenId) ?? null;
  }

  async balanceOf(owner: string): Promise<number> {
    let count = 0;
    for (const holder of this.owners.values()) {
      if (holder === owner) count += 1;
    }
    return count;
  }

  private requireOwner(owner: string, tokenId: number): void {
    const current = this.owners.get(tokenId);
    if (current === undefined) {
      throw new LedgerError(`Token ${tokenId} does not exist`);
    }
    if (current !== owner) {
      throw new LedgerError(`Token ${tokenId} is not owned by ${owner}`);
    }
  }
}
