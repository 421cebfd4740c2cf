/**
 * @fileoverview MediaEnvironment for tests: jsdom elements with stubbed playback.
 * @module __tests__/mocks/mediaEnvironment
 */

import type { MediaEnvironment } from '../../modules/media/types';

export interface TestMediaEnvironment extends MediaEnvironment {
    images: HTMLImageElement[];
    videos: HTMLVideoElement[];
    audios: HTMLAudioElement[];
    frames: HTMLIFrameElement[];
    containers: HTMLElement[];
}

/**
 * jsdom does not implement media playback; replace it with mocks.
 */
function stubPlayback<T extends HTMLMediaElement>(element: T): T {
    element.play = jest.fn(() => Promise.resolve());
    element.pause = jest.fn();
    element.load = jest.fn();
    setMediaDuration(element, Number.NaN);
    return element;
}

export function createTestMediaEnvironment(): TestMediaEnvironment {
    const env: TestMediaEnvironment = {
        images: [],
        videos: [],
        audios: [],
        frames: [],
        containers: [],
        createImage: () => track(env.images, document.createElement('img')),
        createVideo: () => track(env.videos, stubPlayback(document.createElement('video'))),
        createAudio: () => track(env.audios, stubPlayback(document.createElement('audio'))),
        createFrame: () => track(env.frames, document.createElement('iframe')),
        createContainer: () => track(env.containers, document.createElement('div')),
    };
    return env;
}

function track<T>(list: T[], element: T): T {
    list.push(element);
    return element;
}

/**
 * Set the reported media length in seconds.
 */
export function setMediaDuration(element: HTMLMediaElement, seconds: number): void {
    Object.defineProperty(element, 'duration', { value: seconds, configurable: true });
}

/**
 * Set element.error to a MediaError-like value with the given code.
 */
export function setMediaError(element: HTMLMediaElement, code: number): void {
    Object.defineProperty(element, 'error', {
        value: { code, message: `media error ${code}` },
        configurable: true,
    });
}

/**
 * Dispatch a plain DOM event on an element.
 */
export function fire(element: EventTarget, type: string): void {
    element.dispatchEvent(new Event(type));
}

/**
 * Let pending promise callbacks run. Works under fake timers.
 */
export async function flushPromises(): Promise<void> {
    for (let i = 0; i < 5; i++) {
        await Promise.resolve();
    }
}
