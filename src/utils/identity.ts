/**
 * API Key → Identity resolution
 *
 * Identities come from the configuration file and are immutable after
 * load. Keys are indexed by SHA-256 digest so the table never holds
 * them in cleartext, and the same digest (shortened) is what logs see.
 */

import { createHash } from 'crypto';
import type { Identity } from '../types/auth';

function digest(apiKey: string): string {
  return createHash('sha256').update(apiKey, 'utf8').digest('hex');
}

/**
 * Short, log-safe fingerprint of an API key
 */
export function keyFingerprint(apiKey: string): string {
  return digest(apiKey).slice(0, 12);
}

export class IdentityStore {
  private readonly byDigest = new Map<string, Identity>();

  constructor(entries: ReadonlyArray<{ api_key: string; identity: Identity }>) {
    for (const { api_key, identity } of entries) {
      const key = digest(api_key);
      if (!this.byDigest.has(key)) {
        this.byDigest.set(key, identity);
      }
    }
  }

  /**
   * Look up the identity owning an API key.
   * Returns undefined for unknown, empty or missing keys alike.
   */
  resolve(apiKey: string | undefined): Identity | undefined {
    if (!apiKey) return undefined;
    return this.byDigest.get(digest(apiKey));
  }

  get size(): number {
    return this.byDigest.size;
  }
}
