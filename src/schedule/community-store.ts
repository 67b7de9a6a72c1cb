/**
 * EventDefinition store
 *
 * Process-wide, in-memory configuration of every community: the announce
 * channel and the recurring events. Mutations go through `commit`, which
 * persists and rolls the store back when persistence fails, so no change is
 * ever visible that is not durable.
 */

import { PersistenceError } from '../core/errors.js';
import type { CommunityConfig, CommunitySnapshot, EventDefinition } from './types.js';

/**
 * Normalize an event name to its key.
 */
export function eventKeyOf(name: string): string {
  return name.trim().toLowerCase();
}

function cloneCommunity(config: CommunityConfig): CommunityConfig {
  return structuredClone(config);
}

export class CommunityStore {
  private communities = new Map<string, CommunityConfig>();
  private commitQueue: Promise<void> = Promise.resolve();

  constructor(initial: readonly CommunityConfig[] = []) {
    for (const community of initial) {
      this.communities.set(community.communityId, cloneCommunity(community));
    }
  }

  getCommunity(communityId: string): CommunityConfig | undefined {
    const community = this.communities.get(communityId);
    return community ? cloneCommunity(community) : undefined;
  }

  getEvent(communityId: string, name: string): EventDefinition | undefined {
    const event = this.communities.get(communityId)?.events[eventKeyOf(name)];
    return event ? structuredClone(event) : undefined;
  }

  /**
   * Events of one community, sorted by name.
   */
  listEvents(communityId: string): EventDefinition[] {
    const community = this.communities.get(communityId);
    if (!community) return [];
    return Object.values(community.events)
      .map((event) => structuredClone(event))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * Immutable copy of all communities, taken at tick start.
   */
  snapshot(): CommunitySnapshot {
    return [...this.communities.values()].map((community) =>
      Object.freeze(cloneCommunity(community))
    );
  }

  setAnnounceChannel(communityId: string, channelId: string | null): void {
    this.ensureCommunity(communityId).announceChannelId = channelId;
  }

  /**
   * Insert or replace an event by key.
   * @returns the replaced definition, if any
   */
  upsertEvent(communityId: string, definition: EventDefinition): EventDefinition | undefined {
    const community = this.ensureCommunity(communityId);
    const previous = community.events[definition.key];
    community.events[definition.key] = structuredClone(definition);
    return previous;
  }

  /**
   * @returns the removed definition, if it existed
   */
  removeEvent(communityId: string, name: string): EventDefinition | undefined {
    const community = this.communities.get(communityId);
    if (!community) return undefined;
    const key = eventKeyOf(name);
    const previous = community.events[key];
    if (previous) {
      delete community.events[key];
    }
    return previous;
  }

  /**
   * Drop a community with its channel and events.
   * @returns whether it existed
   */
  removeCommunity(communityId: string): boolean {
    return this.communities.delete(communityId);
  }

  /**
   * Apply a mutation and persist it. On persistence failure the store is
   * restored to its prior state and a PersistenceError is thrown.
   *
   * Commits run one at a time in call order, so a rollback only ever undoes
   * its own mutation.
   */
  commit<T>(
    mutation: (store: CommunityStore) => T,
    persist: (store: CommunityStore) => Promise<void>
  ): Promise<T> {
    const run = this.commitQueue.then(() => this.applyAndPersist(mutation, persist));
    this.commitQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyAndPersist<T>(
    mutation: (store: CommunityStore) => T,
    persist: (store: CommunityStore) => Promise<void>
  ): Promise<T> {
    const before = new Map<string, CommunityConfig>();
    for (const [id, community] of this.communities) {
      before.set(id, cloneCommunity(community));
    }

    let result: T;
    try {
      result = mutation(this);
    } catch (error) {
      this.communities = before;
      throw error;
    }

    try {
      await persist(this);
    } catch (error) {
      this.communities = before;
      throw error instanceof PersistenceError ? error : new PersistenceError('communities', error);
    }
    return result;
  }

  toJSON(): Record<string, CommunityConfig> {
    const result: Record<string, CommunityConfig> = {};
    for (const [id, community] of this.communities) {
      result[id] = cloneCommunity(community);
    }
    return result;
  }

  private ensureCommunity(communityId: string): CommunityConfig {
    let community = this.communities.get(communityId);
    if (!community) {
      community = { communityId, announceChannelId: null, events: {} };
      this.communities.set(communityId, community);
    }
    return community;
  }
}
