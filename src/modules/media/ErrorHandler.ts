/**
 * @fileoverview Load error construction for media adapters.
 * @module modules/media/ErrorHandler
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import type { LoadError, StoryItemKind } from './types';
import { MEDIA_ERROR_CODES, MEDIA_ERROR_MESSAGES } from './constants';

/**
 * Build a LoadError. Load errors are always recoverable: the session moves on.
 */
export function createLoadError(
    kind: StoryItemKind,
    code: AppErrorCode,
    message: string,
    cause: unknown = null
): LoadError {
    return { kind, code, message, cause, recoverable: true };
}

/**
 * Map MediaError code to LoadError.
 *
 * @param mediaErrorCode - MediaError.code value (1-4), or null when the element has no error
 * @param kind - Kind of the failing item
 * @param cause - The error event or MediaError
 */
export function mapMediaErrorCodeToLoadError(
    mediaErrorCode: number | null,
    kind: StoryItemKind,
    cause: unknown = null
): LoadError {
    switch (mediaErrorCode) {
        case MEDIA_ERROR_CODES.MEDIA_ERR_ABORTED:
            return createLoadError(kind, AppErrorCode.LOAD_ABORTED, MEDIA_ERROR_MESSAGES.ABORTED, cause);
        case MEDIA_ERROR_CODES.MEDIA_ERR_NETWORK:
            return createLoadError(kind, AppErrorCode.NETWORK_ERROR, MEDIA_ERROR_MESSAGES.NETWORK, cause);
        case MEDIA_ERROR_CODES.MEDIA_ERR_DECODE:
            return createLoadError(kind, AppErrorCode.DECODE_ERROR, MEDIA_ERROR_MESSAGES.DECODE, cause);
        case MEDIA_ERROR_CODES.MEDIA_ERR_SRC_NOT_SUPPORTED:
            return createLoadError(
                kind,
                AppErrorCode.FORMAT_UNSUPPORTED,
                MEDIA_ERROR_MESSAGES.UNSUPPORTED,
                cause
            );
        default:
            return createLoadError(
                kind,
                AppErrorCode.LOAD_FAILED,
                `Unknown media error (code: ${mediaErrorCode ?? 'none'})`,
                cause
            );
    }
}

/**
 * Wrap an arbitrary thrown value.
 */
export function toLoadError(error: unknown, kind: StoryItemKind, code = AppErrorCode.LOAD_FAILED): LoadError {
    const message = error instanceof Error ? error.message : String(error);
    return createLoadError(kind, code, message, error);
}
