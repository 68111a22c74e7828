/**
 * Profile Repository - entity profiles and the events that built them
 */

import { z } from 'zod';
import { EntityEvent, EntityProfile } from '../types/index.js';
import { SqliteDatabase, withStorage } from './storage.js';

export interface ActiveEntity {
  profile: EntityProfile;
  eventCount: number;
}

export interface ProfileRepository {
  load(entityName: string): EntityProfile | null;
  /** Upsert the profile and append its events atomically */
  save(profile: EntityProfile, events: readonly EntityEvent[]): void;
  mostActive(ownerKey: string, limit: number): ActiveEntity[];
  deleteEventsOlderThan(cutoff: Date): number;
}

const EventTypeSchema = z.enum(['taming', 'death', 'building', 'pvp', 'joining', 'leaving', 'tribe', 'chat']);
const TraitSchema = z.enum(['tamer', 'builder', 'aggressive', 'social', 'explorer']);

const ProfileStateSchema = z.object({
  counters: z.record(EventTypeSchema, z.number()).default({}),
  favoriteSubtypes: z.record(z.string(), z.number()).default({}),
  subtypeCategories: z.record(z.string(), z.number()).default({}),
  traitVector: z.record(TraitSchema, z.number()).default({})
});

interface ProfileRow {
  entity_name: string;
  first_seen: string;
  last_seen: string;
  state: string;
}

interface ActiveRow extends ProfileRow {
  event_count: number;
}

function toProfile(row: ProfileRow): EntityProfile {
  const state = ProfileStateSchema.parse(JSON.parse(row.state));
  return {
    entityName: row.entity_name,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    ...state
  };
}

export class SqliteProfileRepository implements ProfileRepository {
  constructor(private readonly db: SqliteDatabase) {}

  load(entityName: string): EntityProfile | null {
    return withStorage('load profile', () => {
      const row = this.db
        .prepare<[string], ProfileRow>(
          'SELECT entity_name, first_seen, last_seen, state FROM entity_profiles WHERE entity_name = ?'
        )
        .get(entityName);
      return row ? toProfile(row) : null;
    });
  }

  save(profile: EntityProfile, events: readonly EntityEvent[]): void {
    withStorage('save profile', () => {
      const upsert = this.db.prepare<[string, string, string, string]>(
        `INSERT INTO entity_profiles (entity_name, first_seen, last_seen, state) VALUES (?, ?, ?, ?)
         ON CONFLICT(entity_name) DO UPDATE SET last_seen = excluded.last_seen, state = excluded.state`
      );
      const insertEvent = this.db.prepare<[string, string, string, string, string]>(
        'INSERT INTO entity_events (entity_name, event_type, details, owner_key, timestamp) VALUES (?, ?, ?, ?, ?)'
      );

      const write = this.db.transaction(() => {
        const { entityName, firstSeen, lastSeen, ...state } = profile;
        upsert.run(entityName, firstSeen, lastSeen, JSON.stringify(state));
        for (const event of events) {
          insertEvent.run(event.entityName, event.eventType, JSON.stringify(event.details), event.ownerKey, event.timestamp);
        }
      });

      write();
    });
  }

  mostActive(ownerKey: string, limit: number): ActiveEntity[] {
    return withStorage('most active entities', () =>
      this.db
        .prepare<[string, number], ActiveRow>(
          `SELECT p.entity_name, p.first_seen, p.last_seen, p.state, COUNT(e.id) AS event_count
             FROM entity_profiles p
             JOIN entity_events e ON e.entity_name = p.entity_name AND e.owner_key = ?
            GROUP BY p.entity_name
            ORDER BY event_count DESC, p.last_seen DESC
            LIMIT ?`
        )
        .all(ownerKey, limit)
        .map(row => ({ profile: toProfile(row), eventCount: row.event_count }))
    );
  }

  deleteEventsOlderThan(cutoff: Date): number {
    return withStorage('prune entity events', () =>
      this.db.prepare<[string]>('DELETE FROM entity_events WHERE timestamp < ?').run(cutoff.toISOString()).changes
    );
  }
}
