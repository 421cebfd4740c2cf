/**
 * @fileoverview Interface definitions for the Gestures module.
 * @module modules/gestures/interfaces
 * @version 1.0.0
 */

import type { GestureResult, VerticalDragDetail } from './types';

/**
 * Maps semantic gestures to playback commands, giving a delegate the first say.
 * Hit-testing (which side was tapped, how long a press lasted) stays with the host.
 */
export interface IGestureCoordinator {
    /** Default: previous */
    leftTap(): Promise<GestureResult>;
    /** Default: next */
    rightTap(): Promise<GestureResult>;
    /** Default: pause */
    holdStart(): Promise<GestureResult>;
    /** Default: play */
    holdEnd(): Promise<GestureResult>;
    /** Hold interrupted (pointer left the surface). Default: play */
    holdCancel(): Promise<GestureResult>;
    /** Forwarded to the delegate; no default */
    verticalDragStart(detail: VerticalDragDetail): void;
    /** Forwarded to the delegate; no default */
    verticalDragUpdate(detail: VerticalDragDetail): void;
}
