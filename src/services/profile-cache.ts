/**
 * Profile caches. Every operation is synchronous, so no entry is ever read
 * or written across an await.
 */

import { EntityProfile } from '../types/index.js';

export interface ProfileCache {
  get(entityName: string): EntityProfile | undefined;
  set(entityName: string, profile: EntityProfile): void;
  delete(entityName: string): void;
  clear(): void;
}

interface CacheEntry {
  profile: EntityProfile;
  cachedAt: number;
}

export class TtlProfileCache implements ProfileCache {
  private entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(entityName: string): EntityProfile | undefined {
    const entry = this.entries.get(entityName);
    if (!entry) return undefined;

    if (this.now() - entry.cachedAt >= this.ttlMs) {
      this.entries.delete(entityName);
      return undefined;
    }
    return entry.profile;
  }

  set(entityName: string, profile: EntityProfile): void {
    if (this.ttlMs <= 0) return;
    this.entries.set(entityName, { profile, cachedAt: this.now() });
  }

  delete(entityName: string): void {
    this.entries.delete(entityName);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export class NoopProfileCache implements ProfileCache {
  get(): EntityProfile | undefined {
    return undefined;
  }

  set(): void {}

  delete(): void {}

  clear(): void {}
}
