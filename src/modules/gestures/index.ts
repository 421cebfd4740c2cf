/**
 * @fileoverview Public exports for the Gestures module.
 * @module modules/gestures
 * @version 1.0.0
 */

export { GestureCoordinator } from './GestureCoordinator';
export type { IGestureCoordinator } from './interfaces';
export type { GestureDelegate, GestureResult, VerticalDragDetail } from './types';
