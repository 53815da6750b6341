/**
 * Public entry point.
 */

export * from './config';
export * from './core/errors';
export type { Disposable } from './core/ManagerBase';

export * from './nodes/NodeAdapter';
export * from './nodes/NodeSortKeyEvaluator';
export * from './nodes/NodeVersionUpdater';

export * from './scanner/PathTemplate';
export * from './scanner/DirectoryListingCache';
export * from './scanner/VersionSetResolver';
export * from './scanner/FrameRangeScanner';

export * from './thumbnails/shared';
export * from './thumbnails/ImageDecoderRegistry';
export * from './thumbnails/NetpbmDecoder';
export * from './thumbnails/Reformat';
export * from './thumbnails/FileThumbnailGenerator';
export * from './thumbnails/ThumbnailCache';

export * from './session/KeyboardActionMap';
export * from './session/NavigationStateMachine';
export * from './session/VersionSession';

export * from './utils/frameFormat';
export { Logger, LogLevel, parseLogLevel, LOG_LEVEL_ENV } from './utils/Logger';
export type { LogSink } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';
export type { EventCallback, EventMap } from './utils/EventEmitter';
export { LRUCache } from './utils/LRUCache';
export { WorkerPool } from './utils/WorkerPool';
export type { TaskExecutor, WorkerPoolConfig, WorkerPoolStats } from './utils/WorkerPool';
