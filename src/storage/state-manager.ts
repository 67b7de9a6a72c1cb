import type { Logger } from '../types/logger.js';
import type { Storage } from './storage.js';
import { CommunityStore } from '../schedule/community-store.js';
import { PostLog } from '../schedule/post-log.js';
import { PersistenceError } from '../core/errors.js';
import {
  PERSISTED_STATE_VERSION,
  StateFormatError,
  deserializeCommunities,
  deserializePostLog,
  serializeCommunities,
  serializePostLog,
} from './persisted-state.js';

/**
 * State manager configuration.
 */
export interface StateManagerConfig {
  /** Storage key of the communities document */
  communitiesKey?: string;
  /** Storage key of the post-log document */
  postLogKey?: string;
}

const DEFAULT_CONFIG: Required<StateManagerConfig> = {
  communitiesKey: 'communities',
  postLogKey: 'post-log',
};

/**
 * Loaded process-wide state.
 */
export interface LoadedState {
  store: CommunityStore;
  postLog: PostLog;
}

/**
 * StateManager - coordinates persistence of the bot's state.
 *
 * Responsibilities:
 * - Load both documents on startup
 * - Save a document after every mutation (no periodic auto-save: a reminder
 *   is only sent once its post-log entry is durable)
 * - Migrate documents between versions
 *
 * Load failures are thrown, never replaced by empty state.
 */
export class StateManager {
  private readonly storage: Storage;
  private readonly logger: Logger;
  private readonly config: Required<StateManagerConfig>;

  constructor(storage: Storage, logger: Logger, config: Partial<StateManagerConfig> = {}) {
    this.storage = storage;
    this.logger = logger.child({ component: 'state-manager' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Load state from storage. Missing documents start empty.
   */
  async load(): Promise<LoadedState> {
    const rawCommunities = this.migrate(
      this.config.communitiesKey,
      await this.storage.load(this.config.communitiesKey)
    );
    const rawPostLog = this.migrate(
      this.config.postLogKey,
      await this.storage.load(this.config.postLogKey)
    );

    const communities =
      rawCommunities === null ? [] : deserializeCommunities(rawCommunities, this.logger);
    const store = new CommunityStore(communities);

    const postLog =
      rawPostLog === null ? new PostLog() : deserializePostLog(rawPostLog, this.logger);
    const fresh = rawCommunities === null && rawPostLog === null;

    this.logger.info(
      {
        communities: communities.length,
        events: communities.reduce((sum, c) => sum + Object.keys(c.events).length, 0),
        postLogEntries: postLog.size,
      },
      fresh ? 'No saved state found, starting fresh' : 'State loaded'
    );

    return { store, postLog };
  }

  /**
   * Persist the communities document.
   * @throws PersistenceError
   */
  async saveCommunities(store: CommunityStore): Promise<void> {
    await this.write(this.config.communitiesKey, serializeCommunities(store));
  }

  /**
   * Persist the post-log document.
   * @throws PersistenceError
   */
  async savePostLog(postLog: PostLog): Promise<void> {
    await this.write(this.config.postLogKey, serializePostLog(postLog));
  }

  private async write(key: string, document: unknown): Promise<void> {
    try {
      await this.storage.save(key, document);
      this.logger.trace({ key }, 'State saved');
    } catch (error) {
      this.logger.error({ key, error }, 'Failed to save state');
      throw new PersistenceError(key, error);
    }
  }

  /**
   * Migrate a raw document from older versions.
   * @throws StateFormatError for a version newer than this build writes
   */
  private migrate(key: string, raw: unknown): unknown {
    if (raw === null || typeof raw !== 'object' || !('version' in raw)) {
      return raw;
    }
    if (raw.version === PERSISTED_STATE_VERSION) {
      return raw;
    }
    if (typeof raw.version === 'number' && raw.version > PERSISTED_STATE_VERSION) {
      throw new StateFormatError(
        key,
        `version ${String(raw.version)} is newer than supported ${String(PERSISTED_STATE_VERSION)}`
      );
    }

    this.logger.info({ key, from: raw.version, to: PERSISTED_STATE_VERSION }, 'Migrating state');
    // Future migrations go here
    // if (raw.version < 2) { ... migrate to v2 ... }
    return { ...raw, version: PERSISTED_STATE_VERSION };
  }
}

/**
 * Factory function for creating a state manager.
 */
export function createStateManager(
  storage: Storage,
  logger: Logger,
  config?: Partial<StateManagerConfig>
): StateManager {
  return new StateManager(storage, logger, config);
}
