/**
 * @fileoverview Safe localStorage helpers.
 * @module utils/storage
 * @version 1.0.0
 *
 * Storage can be missing (non-browser hosts) or throw (privacy modes, sandboxed frames).
 * These helpers treat storage as optional and never throw.
 */

export function safeLocalStorageGet(key: string): string | null {
    try {
        if (typeof localStorage === 'undefined') {
            return null;
        }
        return localStorage.getItem(key);
    } catch {
        return null;
    }
}

/**
 * Interpret a stored flag value. Accepts '1' and 'true' (case-insensitive).
 */
export function isStoredTrue(value: string | null): boolean {
    if (value === null) {
        return false;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === '1' || normalized === 'true';
}
