/**
 * @fileoverview Shared types.
 * @module types
 */

export { AppErrorCode, StoryError, CONTRACT_VIOLATION_CODES, isStoryError } from './app-errors';
export type { AppError } from './app-errors';
