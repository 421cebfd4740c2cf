/**
 * @fileoverview Library entry point.
 * @module index
 * @version 1.0.0
 */

export { PlaybackOrchestrator } from './Orchestrator';
export {
    DEFAULT_ORCHESTRATOR_CONFIG,
    VALID_PHASE_TRANSITIONS,
    type ActiveAdapterChangedEvent,
    type IndexChangedEvent,
    type ItemFailedEvent,
    type OrchestratorConfig,
    type OrchestratorEventMap,
    type SessionPhase,
    type SessionSnapshot,
} from './core/session';

export * from './modules/commands';
export * from './modules/clock';
export * from './modules/media';
export * from './modules/gestures';
export * from './modules/lifecycle';

export {
    AppErrorCode,
    StoryError,
    isStoryError,
    CONTRACT_VIOLATION_CODES,
    type AppError,
} from './types';
export { STORY_STORAGE_KEYS } from './config/storageKeys';
export type { IDisposable } from './utils/interfaces';
