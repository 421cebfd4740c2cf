/**
 * @fileoverview Constants for the playback session.
 * @module core/session/constants
 * @version 1.0.0
 */

import { DEFAULT_ASSET_BASE_URL } from '../../modules/media/constants';
import type { SessionPhase } from './types';

/**
 * Valid phase transitions. Any phase may move to 'destroyed'.
 */
export const VALID_PHASE_TRANSITIONS: Readonly<Record<SessionPhase, readonly SessionPhase[]>> = {
    idle: ['loading', 'destroyed'],
    loading: ['active', 'failed', 'transitioning', 'destroyed'],
    active: ['transitioning', 'destroyed'],
    failed: ['transitioning', 'destroyed'],
    transitioning: ['loading', 'completed', 'destroyed'],
    completed: ['transitioning', 'destroyed'],
    destroyed: [],
};

export const DEFAULT_ORCHESTRATOR_CONFIG = {
    initialIndex: 0,
    initialStatus: 'playing',
    initiallyMuted: null,
    assetBaseUrl: DEFAULT_ASSET_BASE_URL,
    assertContracts: true,
    debugMode: false,
} as const;
