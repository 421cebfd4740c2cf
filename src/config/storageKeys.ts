/**
 * @fileoverview storyreel localStorage key constants.
 * @module config/storageKeys
 * @version 1.0.0
 */

/**
 * Canonical localStorage keys used across modules.
 *
 * Keep this file free of module imports so every layer can depend on it safely.
 */
export const STORY_STORAGE_KEYS = {
    /** '1' or 'true' turns on transition tracing in the console */
    DEBUG_LOGGING: 'storyreel_debug_logging',
} as const;
