// Main entry point for sync-checkpoint-core

// Types
export * from './types';

// Checkpoint coordination
export * from './checkpoint/CheckpointManager';
export * from './checkpoint/CheckpointFlusher';

// Range tracking
export * from './state/RangeSet';
export * from './state/StreamManager';
export * from './state/SyncManager';

// Catalog and messages
export * from './catalog/DestinationCatalog';
export * from './message/Batch';
export * from './message/CheckpointMessage';

// Configuration
export * from './config/YamlSyncConfiguration';

// Sync run wiring
export * from './sync/SyncRun';

// Common modules
export * from './common/errors';
export * from './common/logger';
