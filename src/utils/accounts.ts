import type { StorageAccount } from '../types/storage';

export interface ResolvedAccount {
  accountId: string;
  account: StorageAccount;
}

/**
 * Bucket → owning account table.
 *
 * Built once from configuration and never mutated, so concurrent
 * lookups need no coordination. When two accounts claim the same
 * bucket, the one listed first keeps it.
 */
export class AccountRegistry {
  private readonly byBucket = new Map<string, ResolvedAccount>();
  private readonly ids: readonly string[];

  constructor(accounts: readonly StorageAccount[]) {
    for (const account of accounts) {
      for (const bucket of account.buckets) {
        if (!this.byBucket.has(bucket)) {
          this.byBucket.set(bucket, { accountId: account.id, account });
        }
      }
    }
    this.ids = accounts.map((account) => account.id);
  }

  resolve(bucket: string): ResolvedAccount | undefined {
    return this.byBucket.get(bucket);
  }

  accountIds(): readonly string[] {
    return this.ids;
  }

  /** Number of routable buckets */
  get size(): number {
    return this.byBucket.size;
  }
}
