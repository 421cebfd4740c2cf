/**
 * @fileoverview Public exports for the Lifecycle module.
 * @module modules/lifecycle
 * @version 1.0.0
 */

export { VisibilityCoordinator } from './VisibilityCoordinator';
export type { IVisibilityCoordinator } from './interfaces';
export type { VisibilityCoordinatorOptions, VisibilityDocument } from './types';
