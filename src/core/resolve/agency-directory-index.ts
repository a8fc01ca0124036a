/**
 * Agency Directory Index
 *
 * Append-only join index from `agencyNameHash` to the metadata collected
 * in the global agency directory. Workers read and write it concurrently
 * under a lock per hash; the first entry registered for a hash wins.
 *
 * @module
 */

import { KeyedMutex } from "../../utils/async.js";
import { agencyNameHash, type Identifier } from "../identity/id-generator.js";
import type { DirectoryAgencyFields } from "../extractors/models/fields.js";

export interface DirectoryEntry {
  agencyNameHash: Identifier;
  name: string;
  description: string | null;
  logoUrl: string | null;
  agencyUrl: string | null;
}

export class AgencyDirectoryIndex {
  private entries = new Map<Identifier, DirectoryEntry>();
  private matched = new Set<Identifier>();
  private locks = new KeyedMutex();

  /**
   * Adds directory metadata under the name hash.
   * @returns false when an entry for the same normalized name already exists
   */
  async register(fields: DirectoryAgencyFields): Promise<boolean> {
    const hash = agencyNameHash(fields.name);
    return this.locks.runExclusive(hash, () => {
      if (this.entries.has(hash)) return false;
      this.entries.set(hash, {
        agencyNameHash: hash,
        name: fields.name,
        description: fields.description,
        logoUrl: fields.logoUrl,
        agencyUrl: fields.agencyUrl,
      });
      return true;
    });
  }

  /**
   * Looks up directory metadata for a placement and marks it as matched.
   */
  async lookup(hash: Identifier): Promise<DirectoryEntry | null> {
    return this.locks.runExclusive(hash, () => {
      const entry = this.entries.get(hash);
      if (!entry) return null;
      this.matched.add(hash);
      return entry;
    });
  }

  get size(): number {
    return this.entries.size;
  }

  /** Directory agencies that no placement joined to, ordered by hash */
  unmatched(): DirectoryEntry[] {
    return [...this.entries.values()]
      .filter((entry) => !this.matched.has(entry.agencyNameHash))
      .sort((a, b) => a.agencyNameHash.localeCompare(b.agencyNameHash));
  }
}
