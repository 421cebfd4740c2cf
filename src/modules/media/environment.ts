/**
 * @fileoverview DOM-backed MediaEnvironment.
 * @module modules/media/environment
 * @version 1.0.0
 */

import type { MediaEnvironment } from './types';

/**
 * Create elements through the given document.
 * @param doc - Document to create elements in; the global document when omitted
 */
export function createDomMediaEnvironment(doc: Document = document): MediaEnvironment {
    return {
        createImage: () => doc.createElement('img'),
        createVideo: () => doc.createElement('video'),
        createAudio: () => doc.createElement('audio'),
        createFrame: () => doc.createElement('iframe'),
        createContainer: () => doc.createElement('div'),
    };
}
