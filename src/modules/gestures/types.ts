/**
 * @fileoverview Type definitions for the Gestures module.
 * @module modules/gestures/types
 * @version 1.0.0
 */

/**
 * Vertical drag as reported by the host's hit-testing layer.
 */
export interface VerticalDragDetail {
    /** Pointer position relative to the story surface */
    x: number;
    y: number;
    /** Movement since the previous update; 0 on drag start */
    deltaY: number;
}

/**
 * Host overrides for gestures.
 * Resolving `true` means the host handled the gesture and the default command is skipped.
 */
export interface GestureDelegate {
    onLeftTap?(): Promise<boolean>;
    onRightTap?(): Promise<boolean>;
    onPauseHold?(): Promise<boolean>;
    onResumeRelease?(): Promise<boolean>;
    onVerticalDragStart?(detail: VerticalDragDetail): void;
    onVerticalDragUpdate?(detail: VerticalDragDetail): void;
}

/**
 * Outcome of one gesture.
 */
export interface GestureResult {
    /** Delegate resolved true */
    handledByDelegate: boolean;
    /** The default command was emitted and accepted */
    defaultApplied: boolean;
}
