export { SessionStore, type SessionStoreOptions } from './store.js';
export { SessionSweeper, type SweeperOptions, type SweepResult } from './sweeper.js';
export { SnapshotPersister } from './persister.js';
export { newSession, parseSnapshot, sessionSchema } from './schema.js';
export * from './types.js';
