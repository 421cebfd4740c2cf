/**
 * @fileoverview Public exports for the playback session types.
 * @module core/session
 * @version 1.0.0
 */

export { VALID_PHASE_TRANSITIONS, DEFAULT_ORCHESTRATOR_CONFIG } from './constants';
export type {
    ActiveAdapterChangedEvent,
    IndexChangedEvent,
    ItemFailedEvent,
    OrchestratorConfig,
    OrchestratorEventMap,
    SessionPhase,
    SessionSnapshot,
} from './types';
