/**
 * @fileoverview Unit tests for safe storage helpers.
 * @module utils/__tests__/storage.test
 * @version 1.0.0
 */

import { isStoredTrue, safeLocalStorageGet } from '../storage';
import { createThrowingLocalStorage, installLocalStorage } from '../../__tests__/mocks/localStorage';

describe('safeLocalStorageGet', () => {
    beforeEach(() => {
        localStorage.clear();
    });

    it('reads stored values', () => {
        localStorage.setItem('storyreel_test', '1');
        expect(safeLocalStorageGet('storyreel_test')).toBe('1');
    });

    it('returns null for missing keys', () => {
        expect(safeLocalStorageGet('storyreel_missing')).toBeNull();
    });

    it('returns null instead of throwing when storage is unavailable', () => {
        const restore = installLocalStorage(createThrowingLocalStorage());
        try {
            expect(safeLocalStorageGet('storyreel_test')).toBeNull();
        } finally {
            restore();
        }
    });
});

describe('isStoredTrue', () => {
    it('treats "1" and "true" as true', () => {
        expect(isStoredTrue('1')).toBe(true);
        expect(isStoredTrue(' TRUE ')).toBe(true);
    });

    it('treats anything else as false', () => {
        expect(isStoredTrue('0')).toBe(false);
        expect(isStoredTrue(null)).toBe(false);
    });
});
