/**
 * @fileoverview Contract-violation reporting.
 * @module utils/contracts
 * @version 1.0.0
 */

import { AppErrorCode, CONTRACT_VIOLATION_CODES, StoryError, isStoryError } from '../types/app-errors';
import type { HandlerErrorReporter } from './EventEmitter';

/**
 * Report a broken invariant.
 *
 * With `assert` on, throws a StoryError so the violation surfaces at the call site
 * (tests, development builds). With `assert` off, logs it and lets the caller continue.
 *
 * @param code - Contract-violation code
 * @param message - What was violated
 * @param assert - Whether to throw
 * @param scope - Log prefix of the calling module
 */
export function raiseContractViolation(
    code: AppErrorCode,
    message: string,
    assert: boolean,
    scope: string
): void {
    const error = new StoryError(code, message);
    if (assert) {
        throw error;
    }
    console.error(`[${scope}] Contract violation (${code}): ${message}`);
}

export function isContractViolation(error: unknown): error is StoryError {
    return isStoryError(error) && CONTRACT_VIOLATION_CODES.has(error.code);
}

/**
 * Handler error reporter for emitters that sit on the control path.
 *
 * Contract violations raised inside a handler are rethrown to the emitter's
 * caller; every other handler error is logged and isolated.
 *
 * @param scope - Log prefix of the owning module
 */
export function propagateContractViolations(scope: string): HandlerErrorReporter {
    return (event, error): void => {
        if (isContractViolation(error)) {
            throw error;
        }
        console.error(`[${scope}] Handler error for event '${event}':`, error);
    };
}
