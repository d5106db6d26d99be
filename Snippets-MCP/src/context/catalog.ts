import type { CommandCatalogEntry, CommandCatalogSource } from './types.js';

export interface StoredEntry extends CommandCatalogEntry {
  userId: string;
  /** null for entries saved in a direct context */
  serverId: string | null;
}

/**
 * Catalog held in memory. In a server every entry saved there is visible to
 * everyone; in a direct context a user only sees their own direct entries.
 */
export class InMemoryCatalogSource implements CommandCatalogSource {
  private entries: StoredEntry[];

  constructor(entries: readonly StoredEntry[] = []) {
    this.entries = [...entries];
  }

  add(entry: StoredEntry): void {
    this.entries.push(entry);
  }

  async listAvailable(scope: { userId: string; serverId: string | null }): Promise<CommandCatalogEntry[]> {
    return this.entries
      .filter((entry) =>
        scope.serverId !== null
          ? entry.serverId === scope.serverId
          : entry.serverId === null && entry.userId === scope.userId,
      )
      .map(({ name, content, run }) => ({ name, content, run }));
  }
}
