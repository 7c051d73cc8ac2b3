/**
 * Process-lifetime name → ID cache for resolved entities.
 *
 * Entries are advisory: the resolver re-validates every hit against the live
 * gateway and evicts it when it no longer holds.
 */

export type EntityKind = 'server' | 'channel' | 'user';

/** Scope key for lookups that are not limited to one server. */
export const GLOBAL_SCOPE = 'global';

export class ResolutionCache {
  private readonly entries = new Map<EntityKind, Map<string, Map<string, string>>>();

  get(kind: EntityKind, scope: string, name: string): string | undefined {
    return this.entries.get(kind)?.get(scope)?.get(name.toLowerCase());
  }

  set(kind: EntityKind, scope: string, name: string, id: string): void {
    let byScope = this.entries.get(kind);
    if (!byScope) {
      byScope = new Map();
      this.entries.set(kind, byScope);
    }
    let byName = byScope.get(scope);
    if (!byName) {
      byName = new Map();
      byScope.set(scope, byName);
    }
    byName.set(name.toLowerCase(), id);
  }

  delete(kind: EntityKind, scope: string, name: string): void {
    this.entries.get(kind)?.get(scope)?.delete(name.toLowerCase());
  }
}
