/**
 * Entity Behavior Profile Store
 * Learns per-entity behavior from event lines and renders it as short
 * context blurbs for the generator
 */

import { ProfileConfig } from '../config.js';
import {
  ClassifiedEvent,
  EntityEvent,
  EntityProfile,
  EventDetails,
  EventType,
  TierResult,
  TraitName
} from '../types/index.js';
import { ExtractionError } from '../utils/errors.js';
import { Logger, createLogger, describeError } from '../utils/logger.js';
import { degraded, fromList } from '../utils/tier-result.js';
import {
  DETAIL_PATTERNS,
  ENTITY_PATTERNS,
  ENTITY_STOPLIST,
  EVENT_RULES,
  MIN_ENTITY_NAME_LENGTH,
  PERSONALITY_LABELS,
  PROFILE_THRESHOLDS,
  PVP_KILLERS,
  SUBTYPE_CATEGORIES,
  SUBTYPE_PREFIXES,
  TRAIT_NAMES,
  UNCATEGORIZED
} from './entity-rules.js';
import { ProfileCache } from './profile-cache.js';
import { ProfileRepository } from './profile-repository.js';

export interface ActiveEntitySummary {
  entityName: string;
  eventCount: number;
  personality: string;
  context: string;
}

type KnownEvent = ClassifiedEvent & { type: EventType };

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_LABEL = 'active survivor';

function isKnown(event: ClassifiedEvent): event is KnownEvent {
  return event.type !== 'unknown';
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/** Clamp to [0, 1], rounded so repeated 0.1 steps land exactly on 1 */
function clampTrait(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 1e6) / 1e6;
}

function topEntry(counts: Record<string, number>): [string, number] | null {
  let best: [string, number] | null = null;
  for (const [key, count] of Object.entries(counts)) {
    if (best === null || count > best[1]) best = [key, count];
  }
  return best;
}

/** Whole-word, case-insensitive match of a name, so "Bob" skips "Bobby" */
function mentionPattern(entityName: string): RegExp {
  const escaped = entityName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])`, 'iu');
}

function withArticle(label: string): string {
  return /^[aeiou]/i.test(label) ? `an ${label}` : `a ${label}`;
}

export function categorizeSubtype(subtype: string): string {
  const lower = subtype.toLowerCase();
  for (const rule of SUBTYPE_CATEGORIES) {
    if (rule.members.some(member => lower.includes(member))) {
      return rule.category;
    }
  }
  return UNCATEGORIZED;
}

export function extractDetails(line: string, type: EventType): EventDetails {
  const details: EventDetails = {};

  switch (type) {
    case 'taming': {
      const tamed = DETAIL_PATTERNS.tamed.exec(line);
      if (tamed) {
        const words = tamed[2].trim().split(/\s+/);
        const subtype = SUBTYPE_PREFIXES.has(words[0].toLowerCase()) && words.length > 1
          ? `${words[0]} ${words[1]}`
          : words[0];
        details.subtype = subtype;
        details.category = categorizeSubtype(subtype);
      }
      const level = DETAIL_PATTERNS.level.exec(line);
      if (level) details.level = Number.parseInt(level[1], 10);
      break;
    }
    case 'death': {
      const killer = DETAIL_PATTERNS.killedBy.exec(line);
      if (killer) details.killedBy = killer[1];
      break;
    }
    case 'building': {
      const structure = DETAIL_PATTERNS.structure.exec(line);
      if (structure) details.structure = structure[1];
      break;
    }
    case 'pvp': {
      const target = DETAIL_PATTERNS.target.exec(line);
      if (target) details.target = target[1];
      break;
    }
    default:
      break;
  }

  return details;
}

export class EntityProfileStore {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly cache: ProfileCache,
    private readonly config: ProfileConfig,
    private readonly logger: Logger = createLogger('entity-profiles'),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Entity names mentioned next to known action verbs, in discovery order
   */
  extractEntities(text: string | readonly string[]): Set<string> {
    const joined = typeof text === 'string' ? text : text.join('\n');
    const entities = new Set<string>();

    for (const pattern of ENTITY_PATTERNS) {
      for (const match of joined.matchAll(pattern)) {
        const name = match[1].trim();
        if (name.length >= MIN_ENTITY_NAME_LENGTH && !ENTITY_STOPLIST.has(name.toLowerCase())) {
          entities.add(name);
        }
      }
    }

    return entities;
  }

  /**
   * @throws ExtractionError for blank lines
   */
  classify(line: string): ClassifiedEvent {
    if (line.trim() === '') {
      throw new ExtractionError('Cannot classify a blank line', line);
    }

    const lower = line.toLowerCase();
    for (const rule of EVENT_RULES) {
      if (rule.keywords.some(keyword => lower.includes(keyword))) {
        return { type: rule.type, details: extractDetails(line, rule.type), raw: line };
      }
    }

    return { type: 'unknown', details: {}, raw: line };
  }

  getProfile(entityName: string): EntityProfile | null {
    const cached = this.cache.get(entityName);
    if (cached) return cached;

    const profile = this.repository.load(entityName);
    if (profile) this.cache.set(entityName, profile);
    return profile;
  }

  /**
   * Apply events to an entity's profile, persist profile and events in one
   * transaction, then refresh the cache. Unknown events are ignored.
   *
   * @throws StorageError when the profile cannot be read or written
   */
  updateProfile(entityName: string, ownerKey: string, events: readonly ClassifiedEvent[]): EntityProfile | null {
    const known = events.filter(isKnown);
    if (known.length === 0) return null;

    const timestamp = this.now().toISOString();
    const existing = this.getProfile(entityName);
    const profile = existing ? structuredClone(existing) : this.createEmptyProfile(entityName, timestamp);

    for (const event of known) {
      this.applyEvent(profile, event);
    }
    profile.lastSeen = timestamp;

    const records: EntityEvent[] = known.map(event => ({
      entityName,
      eventType: event.type,
      details: event.details,
      ownerKey,
      timestamp
    }));

    this.repository.save(profile, records);
    this.cache.set(entityName, profile);

    this.logger.debug(`Updated profile for ${entityName} with ${known.length} events`);
    return profile;
  }

  /**
   * Extract entities from a batch, classify the lines mentioning each one and
   * update their profiles. The value is every extracted entity; the result is
   * degraded when some profile could not be updated.
   */
  processBatch(lines: readonly string[], ownerKey: string): TierResult<string[]> {
    const classified: KnownEvent[] = [];
    for (const line of lines) {
      try {
        const event = this.classify(line);
        if (isKnown(event)) classified.push(event);
      } catch (error) {
        if (!(error instanceof ExtractionError)) throw error;
        this.logger.debug(`Skipping line: ${error.message}`);
      }
    }

    const entities = [...this.extractEntities(lines)];
    const failures: string[] = [];

    for (const entityName of entities) {
      const mention = mentionPattern(entityName);
      const events = classified.filter(event => mention.test(event.raw));
      if (events.length === 0) continue;

      try {
        this.updateProfile(entityName, ownerKey, events);
      } catch (error) {
        this.logger.error(`Failed to update profile for ${entityName}: ${describeError(error)}`);
        failures.push(`${entityName}: ${describeError(error)}`);
      }
    }

    this.logger.debug(`Processed ${lines.length} lines for ${entities.length} entities on ${ownerKey}`);
    return failures.length > 0 ? degraded(entities, failures.join('; ')) : fromList(entities);
  }

  personalityLabel(profile: EntityProfile): string {
    let top: TraitName | null = null;
    let topValue = -Infinity;
    for (const trait of TRAIT_NAMES) {
      const value = profile.traitVector[trait];
      if (value !== undefined && value > topValue) {
        top = trait;
        topValue = value;
      }
    }

    if (top === null) return 'newcomer';
    if (topValue < PROFILE_THRESHOLDS.casualTraitCeiling) return 'casual player';
    return PERSONALITY_LABELS[top] ?? DEFAULT_LABEL;
  }

  favoriteActivities(profile: EntityProfile): string[] {
    const activities: string[] = [];

    const subtype = topEntry(profile.favoriteSubtypes);
    if (subtype && subtype[1] > PROFILE_THRESHOLDS.favoriteSubtype) {
      activities.push(`taming ${subtype[0]}s`);
    }

    const category = topEntry(profile.subtypeCategories);
    if (category && category[1] > PROFILE_THRESHOLDS.favoriteCategory) {
      activities.push(`${category[0]} dinosaurs`);
    }

    if ((profile.counters.building ?? 0) > PROFILE_THRESHOLDS.building) activities.push('building');
    if ((profile.counters.pvp ?? 0) > PROFILE_THRESHOLDS.pvp) activities.push('PvP combat');

    return activities.slice(0, PROFILE_THRESHOLDS.maxActivities);
  }

  notableStats(profile: EntityProfile): string[] {
    const stats: string[] = [];
    const deaths = profile.counters.death ?? 0;
    const tames = profile.counters.taming ?? 0;
    const structures = profile.counters.building ?? 0;

    if (deaths > PROFILE_THRESHOLDS.notableDeaths) stats.push(`${deaths} deaths`);
    if (tames > PROFILE_THRESHOLDS.notableTames) stats.push(`${tames} tames`);
    if (structures > PROFILE_THRESHOLDS.notableStructures) stats.push(`${structures} structures built`);

    return stats.slice(0, PROFILE_THRESHOLDS.maxStats);
  }

  /**
   * One-sentence blurb about an entity. Profiles are shared across owners.
   *
   * @throws StorageError when the profile cannot be loaded
   */
  getContext(entityName: string): string {
    const profile = this.getProfile(entityName);
    if (!profile) return `${entityName} is a newcomer.`;
    return this.describe(profile);
  }

  /**
   * Blurbs for the first few entities, one per line, cut to `maxChars`
   */
  getContextualSummaries(entities: readonly string[], maxChars: number = this.config.blurbCharCap): string {
    if (entities.length === 0) return '';

    const summary = entities
      .slice(0, this.config.maxEntities)
      .map(entity => this.getContext(entity))
      .join('\n');

    return summary.length > maxChars ? `${summary.slice(0, Math.max(0, maxChars - 3))}...` : summary;
  }

  getMostActiveEntities(ownerKey: string, limit: number = 10): ActiveEntitySummary[] {
    return this.repository.mostActive(ownerKey, limit).map(({ profile, eventCount }) => ({
      entityName: profile.entityName,
      eventCount,
      personality: this.personalityLabel(profile),
      context: this.describe(profile)
    }));
  }

  /**
   * Drop stored events older than `days`; profiles keep their counters
   */
  pruneEventsOlderThan(days: number = 90): number {
    const cutoff = new Date(this.now().getTime() - days * DAY_MS);
    const deleted = this.repository.deleteEventsOlderThan(cutoff);
    this.logger.info(`Cleaned up ${deleted} old entity events`);
    return deleted;
  }

  private describe(profile: EntityProfile): string {
    let sentence = `${profile.entityName} is ${withArticle(this.personalityLabel(profile))}`;

    const activities = this.favoriteActivities(profile);
    if (activities.length > 0) sentence += ` who loves ${activities.join(', ')}`;
    sentence += '.';

    const stats = this.notableStats(profile);
    if (stats.length > 0) sentence += ` Notable: ${stats.join(', ')}.`;

    return sentence;
  }

  private createEmptyProfile(entityName: string, timestamp: string): EntityProfile {
    return {
      entityName,
      firstSeen: timestamp,
      lastSeen: timestamp,
      counters: {},
      favoriteSubtypes: {},
      subtypeCategories: {},
      traitVector: { aggressive: 0, builder: 0, tamer: 0, explorer: 0, social: 0 }
    };
  }

  private applyEvent(profile: EntityProfile, event: KnownEvent): void {
    profile.counters[event.type] = (profile.counters[event.type] ?? 0) + 1;

    if (event.type === 'taming' && event.details.subtype) {
      increment(profile.favoriteSubtypes, event.details.subtype);
      increment(profile.subtypeCategories, event.details.category ?? UNCATEGORIZED);
    }

    this.addTrait(profile, event.type);

    // A death at another player's hands also counts as a PvP encounter
    const killer = event.details.killedBy;
    if (event.type === 'death' && killer && PVP_KILLERS.has(killer.toLowerCase())) {
      profile.counters.pvp = (profile.counters.pvp ?? 0) + 1;
      this.addTrait(profile, 'pvp');
    }
  }

  private addTrait(profile: EntityProfile, type: EventType): void {
    const step = this.config.traitIncrements[type];
    if (!step) return;
    const current = profile.traitVector[step.trait] ?? 0;
    profile.traitVector[step.trait] = clampTrait(current + step.amount);
  }
}
