/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { CommunitiesDocument, PostLogDocument } from './persisted-state.js';
export {
  PERSISTED_STATE_VERSION,
  StateFormatError,
  serializeCommunities,
  deserializeCommunities,
  serializePostLog,
  deserializePostLog,
} from './persisted-state.js';
export type { StateManagerConfig, LoadedState } from './state-manager.js';
export { StateManager, createStateManager } from './state-manager.js';
