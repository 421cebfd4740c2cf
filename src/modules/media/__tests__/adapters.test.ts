/**
 * @fileoverview Unit tests for the media adapters.
 * @module modules/media/__tests__/adapters.test
 * @version 1.0.0
 */

import { AudioAdapter } from '../AudioAdapter';
import { CustomAdapter } from '../CustomAdapter';
import { ImageAdapter } from '../ImageAdapter';
import { TextAdapter } from '../TextAdapter';
import { VideoAdapter } from '../VideoAdapter';
import { WebAdapter } from '../WebAdapter';
import { createMediaAdapter } from '../MediaAdapterFactory';
import type { CustomViewContext, LoadError, MediaAdapterContext } from '../types';
import { CommandChannel } from '../../commands/CommandChannel';
import { AppErrorCode, StoryError } from '../../../types/app-errors';
import {
    createTestMediaEnvironment,
    fire,
    flushPromises,
    setMediaDuration,
    setMediaError,
    type TestMediaEnvironment,
} from '../../../__tests__/mocks/mediaEnvironment';

describe('media adapters', () => {
    let env: TestMediaEnvironment;
    let context: MediaAdapterContext;

    beforeEach(() => {
        env = createTestMediaEnvironment();
        context = {
            environment: env,
            commands: null,
            assetBaseUrl: 'assets/',
            assertContracts: true,
        };
    });

    describe('ImageAdapter', () => {
        it('is ready when the bitmap loads', () => {
            const adapter = new ImageAdapter({ kind: 'image', sourceLocator: 'https://cdn.test/a.jpg' }, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();
            expect(adapter.getPhase()).toBe('loading');
            expect(env.images[0].getAttribute('src')).toBe('https://cdn.test/a.jpg');

            fire(env.images[0], 'load');
            expect(onReady).toHaveBeenCalledWith({ durationMs: null });
            expect(adapter.getPhase()).toBe('ready');
            expect(adapter.getElement()).toBe(env.images[0]);
        });

        it('resolves asset locators against the asset base', () => {
            const adapter = new ImageAdapter(
                { kind: 'image', sourceLocator: 'cover.png', sourceOrigin: 'asset', config: { alt: 'Cover' } },
                context
            );
            adapter.activate();

            expect(env.images[0].getAttribute('src')).toBe('assets/cover.png');
            expect(env.images[0].alt).toBe('Cover');
        });

        it('fails once and never becomes ready afterwards', () => {
            const adapter = new ImageAdapter({ kind: 'image', sourceLocator: 'missing.jpg' }, context);
            const onReady = jest.fn();
            const onFailed = jest.fn();
            adapter.onReady(onReady);
            adapter.onFailed(onFailed);

            adapter.activate();
            fire(env.images[0], 'error');
            fire(env.images[0], 'error');
            fire(env.images[0], 'load');

            expect(onFailed).toHaveBeenCalledTimes(1);
            const error: LoadError = onFailed.mock.calls[0][0];
            expect(error.code).toBe(AppErrorCode.SOURCE_UNAVAILABLE);
            expect(error.kind).toBe('image');
            expect(onReady).not.toHaveBeenCalled();
            expect(adapter.getPhase()).toBe('failed');
        });
    });

    describe('VideoAdapter', () => {
        const item = { kind: 'video' as const, sourceLocator: 'https://cdn.test/clip.mp4' };

        it('applies remembered mute and playback state on ready', () => {
            const adapter = new VideoAdapter(item, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.setMuted(true);
            adapter.setPlaybackState('playing');
            adapter.activate();
            const video = env.videos[0];
            expect(video.play).not.toHaveBeenCalled();

            setMediaDuration(video, 8);
            fire(video, 'loadeddata');

            expect(onReady).toHaveBeenCalledWith({ durationMs: 8000 });
            expect(video.muted).toBe(true);
            expect(video.play).toHaveBeenCalledTimes(1);
            expect(adapter.intrinsicDurationMs()).toBe(8000);
        });

        it('forwards playback and mute changes after ready', () => {
            const adapter = new VideoAdapter(item, context);
            adapter.setPlaybackState('playing');
            adapter.activate();
            const video = env.videos[0];
            fire(video, 'loadeddata');

            adapter.setPlaybackState('paused');
            adapter.setPlaybackState('paused');
            adapter.setMuted(true);

            expect(video.pause).toHaveBeenCalledTimes(1);
            expect(video.muted).toBe(true);
        });

        it('reports no intrinsic duration for live or unknown lengths', () => {
            const adapter = new VideoAdapter(item, context);
            adapter.activate();
            const video = env.videos[0];

            expect(adapter.intrinsicDurationMs()).toBeNull();
            setMediaDuration(video, Number.POSITIVE_INFINITY);
            expect(adapter.intrinsicDurationMs()).toBeNull();
            setMediaDuration(video, 0);
            expect(adapter.intrinsicDurationMs()).toBeNull();
        });

        it('maps the element error code', () => {
            const adapter = new VideoAdapter(item, context);
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);
            adapter.activate();

            setMediaError(env.videos[0], 3);
            fire(env.videos[0], 'error');

            expect(onFailed.mock.calls[0][0].code).toBe(AppErrorCode.DECODE_ERROR);
        });

        it('ignores errors after ready', () => {
            const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
            const adapter = new VideoAdapter(item, context);
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);
            adapter.activate();
            fire(env.videos[0], 'loadeddata');

            setMediaError(env.videos[0], 2);
            fire(env.videos[0], 'error');

            expect(onFailed).not.toHaveBeenCalled();
            expect(adapter.getPhase()).toBe('ready');
            expect(warnSpy).toHaveBeenCalledTimes(1);
            warnSpy.mockRestore();
        });

        it('signals the natural end once, and only after ready', () => {
            const adapter = new VideoAdapter(item, context);
            const onEnded = jest.fn();
            adapter.onEnded(onEnded);
            adapter.activate();
            const video = env.videos[0];

            fire(video, 'ended');
            expect(onEnded).not.toHaveBeenCalled();

            fire(video, 'loadeddata');
            fire(video, 'ended');
            fire(video, 'ended');
            expect(onEnded).toHaveBeenCalledTimes(1);
        });

        it('reports buffering from waiting and playing', () => {
            const adapter = new VideoAdapter(item, context);
            const changes: boolean[] = [];
            adapter.onBufferingChange(({ isBuffering }) => changes.push(isBuffering));
            adapter.activate();
            const video = env.videos[0];

            fire(video, 'waiting');
            fire(video, 'stalled');
            fire(video, 'playing');

            expect(changes).toEqual([true, false]);
        });

        it('keeps counting playback time through a stalled fetch', () => {
            const adapter = new VideoAdapter(
                { kind: 'video', sourceLocator: 'https://cdn.test/loop.mp4', config: { loop: true } },
                context
            );
            const changes: boolean[] = [];
            adapter.onBufferingChange(({ isBuffering }) => changes.push(isBuffering));
            adapter.activate();
            const video = env.videos[0];

            fire(video, 'loadeddata');
            fire(video, 'playing');
            fire(video, 'stalled');

            expect(adapter.isBuffering()).toBe(false);
            expect(changes).toEqual([]);
            expect(video.loop).toBe(true);
        });

        it('is ready on metadata when only metadata is preloaded', () => {
            const adapter = new VideoAdapter(
                { kind: 'video', sourceLocator: 'https://cdn.test/clip.mp4', config: { preload: 'metadata' } },
                context
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);
            adapter.setPlaybackState('playing');
            adapter.activate();
            const video = env.videos[0];

            setMediaDuration(video, 4);
            fire(video, 'loadedmetadata');

            expect(video.preload).toBe('metadata');
            expect(onReady).toHaveBeenCalledWith({ durationMs: 4000 });
            expect(video.play).toHaveBeenCalledTimes(1);
        });

        it('pauses and drops the source on release', () => {
            const adapter = new VideoAdapter(item, context);
            adapter.activate();
            const video = env.videos[0];
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.release();

            expect(video.pause).toHaveBeenCalled();
            expect(video.hasAttribute('src')).toBe(false);
            expect(video.load).toHaveBeenCalledTimes(2);
            fire(video, 'loadeddata');
            expect(onReady).not.toHaveBeenCalled();
            expect(adapter.getElement()).toBeNull();
        });
    });

    describe('AudioAdapter', () => {
        it('is ready once metadata is known', () => {
            const adapter = new AudioAdapter({ kind: 'audio', sourceLocator: 'track.mp3' }, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);
            adapter.activate();
            const audio = env.audios[0];

            fire(audio, 'loadeddata');
            expect(onReady).not.toHaveBeenCalled();

            setMediaDuration(audio, 12.5);
            fire(audio, 'loadedmetadata');
            expect(onReady).toHaveBeenCalledWith({ durationMs: 12500 });
        });

        it('starts muted when asked before activation', () => {
            const adapter = new AudioAdapter({ kind: 'audio', sourceLocator: 'track.mp3' }, context);
            adapter.setMuted(true);
            adapter.activate();

            expect(env.audios[0].muted).toBe(true);
        });
    });

    describe('TextAdapter', () => {
        it('is ready synchronously during activate', () => {
            const adapter = new TextAdapter(
                { kind: 'text', sourceLocator: 'Chapter one', config: { textColor: 'white' } },
                context
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();

            expect(onReady).toHaveBeenCalledWith({ durationMs: null });
            expect(env.containers[0].textContent).toBe('Chapter one');
            expect(env.containers[0].style.color).toBe('white');
        });

        it('ignores a second activate', () => {
            const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
            const adapter = new TextAdapter({ kind: 'text', sourceLocator: 'x' }, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();
            adapter.activate();

            expect(onReady).toHaveBeenCalledTimes(1);
            expect(env.containers).toHaveLength(1);
            expect(warnSpy).toHaveBeenCalledWith('[MediaAdapter] text adapter already activated; ignoring');
            warnSpy.mockRestore();
        });
    });

    describe('WebAdapter', () => {
        it('is ready when the frame loads and applies frame attributes', () => {
            const adapter = new WebAdapter(
                { kind: 'web', sourceLocator: 'https://example.test/page', config: { sandbox: 'allow-scripts' } },
                context
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);
            adapter.activate();
            const frame = env.frames[0];

            expect(frame.getAttribute('sandbox')).toBe('allow-scripts');
            fire(frame, 'load');
            expect(onReady).toHaveBeenCalledTimes(1);
        });

        it('hands the frame to onLoaded after it loads', () => {
            const onLoaded = jest.fn();
            const adapter = new WebAdapter(
                { kind: 'web', sourceLocator: 'https://example.test/page', config: { onLoaded } },
                context
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);
            adapter.activate();

            fire(env.frames[0], 'load');

            expect(onLoaded).toHaveBeenCalledWith(env.frames[0], true);
            expect(onReady).toHaveBeenCalledTimes(1);
        });

        it('reports a failed frame to onLoaded and keeps the failure when the hook throws', () => {
            const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
            const onLoaded = jest.fn(() => {
                throw new Error('host hook failure');
            });
            const adapter = new WebAdapter(
                { kind: 'web', sourceLocator: 'https://example.test/missing', config: { onLoaded } },
                context
            );
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);
            adapter.activate();

            fire(env.frames[0], 'error');

            expect(onLoaded).toHaveBeenCalledWith(env.frames[0], false);
            expect(onFailed).toHaveBeenCalledTimes(1);
            expect(adapter.getPhase()).toBe('failed');
            expect(warnSpy).toHaveBeenCalledWith('[MediaAdapter] web onLoaded callback threw:', expect.any(Error));
            warnSpy.mockRestore();
        });
    });

    describe('audio tracks on visual items', () => {
        const narrated = {
            kind: 'image' as const,
            sourceLocator: 'https://cdn.test/cover.jpg',
            durationMs: 3000,
            audioTrack: { sourceLocator: 'narration.mp3', sourceOrigin: 'asset' as const },
        };

        it('waits for the track and takes its duration', () => {
            const adapter = new ImageAdapter(narrated, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);
            adapter.activate();
            const audio = env.audios[0];

            expect(audio.getAttribute('src')).toBe('assets/narration.mp3');
            fire(env.images[0], 'load');
            expect(onReady).not.toHaveBeenCalled();
            expect(adapter.getPhase()).toBe('loading');

            setMediaDuration(audio, 9);
            fire(audio, 'loadedmetadata');

            expect(onReady).toHaveBeenCalledWith({ durationMs: 9000 });
            expect(adapter.intrinsicDurationMs()).toBe(9000);
            expect(adapter.getElement()).toBe(env.images[0]);
            expect(adapter.getAudioTrackElement()).toBe(audio);
        });

        it('holds a text item until its track metadata is known', () => {
            const adapter = new TextAdapter(
                { kind: 'text', sourceLocator: 'Chapter two', audioTrack: { sourceLocator: 'theme.mp3' } },
                context
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();
            expect(onReady).not.toHaveBeenCalled();
            expect(env.containers[0].textContent).toBe('Chapter two');

            setMediaDuration(env.audios[0], 6);
            fire(env.audios[0], 'loadedmetadata');
            expect(onReady).toHaveBeenCalledWith({ durationMs: 6000 });
        });

        it('drives playback, mute, buffering and the end from the track', () => {
            const adapter = new ImageAdapter(narrated, context);
            const onEnded = jest.fn();
            const buffering: boolean[] = [];
            adapter.onEnded(onEnded);
            adapter.onBufferingChange(({ isBuffering }) => buffering.push(isBuffering));
            adapter.setMuted(true);
            adapter.setPlaybackState('playing');
            adapter.activate();
            const audio = env.audios[0];
            expect(audio.muted).toBe(true);

            fire(env.images[0], 'load');
            fire(audio, 'loadedmetadata');
            expect(audio.play).toHaveBeenCalledTimes(1);

            adapter.setMuted(false);
            adapter.setPlaybackState('paused');
            expect(audio.muted).toBe(false);
            expect(audio.pause).toHaveBeenCalledTimes(1);

            fire(audio, 'waiting');
            fire(audio, 'playing');
            fire(audio, 'ended');
            expect(buffering).toEqual([true, false]);
            expect(onEnded).toHaveBeenCalledTimes(1);
        });

        it('fails the item when the track fails to load', () => {
            const adapter = new ImageAdapter(narrated, context);
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);
            adapter.activate();

            setMediaError(env.audios[0], 2);
            fire(env.audios[0], 'error');

            const error: LoadError = onFailed.mock.calls[0][0];
            expect(error.code).toBe(AppErrorCode.NETWORK_ERROR);
            expect(error.kind).toBe('image');
            expect(adapter.getPhase()).toBe('failed');
        });

        it('frees the track on release', () => {
            const adapter = new ImageAdapter(narrated, context);
            const onEnded = jest.fn();
            adapter.onEnded(onEnded);
            adapter.activate();
            const audio = env.audios[0];
            fire(env.images[0], 'load');
            fire(audio, 'loadedmetadata');

            adapter.release();
            fire(audio, 'ended');

            // once when ready in the paused state, once on release
            expect(audio.pause).toHaveBeenCalledTimes(2);
            expect(audio.hasAttribute('src')).toBe(false);
            expect(onEnded).not.toHaveBeenCalled();
            expect(adapter.getAudioTrackElement()).toBeNull();
        });
    });

    describe('CustomAdapter', () => {
        it('is ready immediately without a ready promise', () => {
            const element = document.createElement('section');
            const adapter = new CustomAdapter({ kind: 'custom', customView: () => ({ element }) }, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();

            expect(onReady).toHaveBeenCalledTimes(1);
            expect(adapter.getElement()).toBe(element);
        });

        it('waits for the ready promise', async () => {
            let resolveReady: () => void = () => undefined;
            const ready = new Promise<void>((resolve) => {
                resolveReady = resolve;
            });
            const adapter = new CustomAdapter({ kind: 'custom', customView: () => ({ ready }) }, context);
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();
            await flushPromises();
            expect(onReady).not.toHaveBeenCalled();

            resolveReady();
            await flushPromises();
            expect(onReady).toHaveBeenCalledTimes(1);
        });

        it('fails with CUSTOM_VIEW_FAILED when the ready promise rejects', async () => {
            const adapter = new CustomAdapter(
                { kind: 'custom', customView: () => ({ ready: Promise.reject(new Error('no data')) }) },
                context
            );
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);

            adapter.activate();
            await flushPromises();

            expect(onFailed).toHaveBeenCalledTimes(1);
            expect(onFailed.mock.calls[0][0]).toMatchObject({
                code: AppErrorCode.CUSTOM_VIEW_FAILED,
                message: 'no data',
            });
        });

        it('converts a throwing factory into a load failure', () => {
            const adapter = new CustomAdapter(
                {
                    kind: 'custom',
                    customView: () => {
                        throw new Error('render failed');
                    },
                },
                context
            );
            const onFailed = jest.fn();
            adapter.onFailed(onFailed);

            expect(() => adapter.activate()).not.toThrow();
            expect(onFailed.mock.calls[0][0].code).toBe(AppErrorCode.CUSTOM_VIEW_FAILED);
        });

        it('passes the command channel and aborts and disposes on release', async () => {
            const commands = new CommandChannel();
            const dispose = jest.fn();
            const received: CustomViewContext[] = [];
            let resolveReady: () => void = () => undefined;
            const adapter = new CustomAdapter(
                {
                    kind: 'custom',
                    customView: (viewContext) => {
                        received.push(viewContext);
                        return {
                            ready: new Promise<void>((resolve) => {
                                resolveReady = resolve;
                            }),
                            dispose,
                        };
                    },
                },
                { ...context, commands }
            );
            const onReady = jest.fn();
            adapter.onReady(onReady);

            adapter.activate();
            expect(received).toHaveLength(1);
            const { signal, commands: viewCommands } = received[0];
            expect(viewCommands).toBe(commands);
            expect(signal.aborted).toBe(false);

            adapter.release();
            resolveReady();
            await flushPromises();

            expect(signal.aborted).toBe(true);
            expect(dispose).toHaveBeenCalledTimes(1);
            expect(onReady).not.toHaveBeenCalled();
        });
    });

    describe('release contract', () => {
        it('is safe before activate', () => {
            const adapter = new TextAdapter({ kind: 'text', sourceLocator: 'x' }, context);

            expect(() => adapter.release()).not.toThrow();
            expect(adapter.isLive()).toBe(false);
        });

        it('throws DOUBLE_RELEASE on a second release', () => {
            const adapter = new TextAdapter({ kind: 'text', sourceLocator: 'x' }, context);
            adapter.activate();
            expect(adapter.isLive()).toBe(true);
            adapter.release();

            expect(() => adapter.release()).toThrow(StoryError);
            expect(() => adapter.release()).toThrow('text adapter released twice');
        });

        it('throws ADAPTER_RELEASED when activated after release', () => {
            const adapter = new ImageAdapter({ kind: 'image', sourceLocator: 'a.jpg' }, context);
            adapter.release();

            expect(() => adapter.activate()).toThrow('activate() called on a released image adapter');
            expect(env.images).toHaveLength(0);
        });

        it('propagates a contract violation raised by an event handler', () => {
            const errorSpy = jest.spyOn(console, 'error').mockImplementation();
            const adapter = new TextAdapter({ kind: 'text', sourceLocator: 'x' }, context);
            adapter.onReady(() => {
                adapter.release();
                adapter.release();
            });

            expect(() => adapter.activate()).toThrow('text adapter released twice');
            expect(adapter.getPhase()).toBe('released');
            expect(errorSpy).not.toHaveBeenCalled();
            errorSpy.mockRestore();
        });

        it('logs instead of throwing when contract assertions are off', () => {
            const errorSpy = jest.spyOn(console, 'error').mockImplementation();
            const adapter = new TextAdapter(
                { kind: 'text', sourceLocator: 'x' },
                { ...context, assertContracts: false }
            );
            adapter.release();
            adapter.release();

            expect(errorSpy).toHaveBeenCalledWith(
                '[MediaAdapter] Contract violation (DOUBLE_RELEASE): text adapter released twice'
            );
            errorSpy.mockRestore();
        });
    });

    describe('createMediaAdapter', () => {
        it('dispatches on kind', () => {
            expect(createMediaAdapter({ kind: 'image', sourceLocator: 'a' }, context)).toBeInstanceOf(ImageAdapter);
            expect(createMediaAdapter({ kind: 'video', sourceLocator: 'a' }, context)).toBeInstanceOf(VideoAdapter);
            expect(createMediaAdapter({ kind: 'audio', sourceLocator: 'a' }, context)).toBeInstanceOf(AudioAdapter);
            expect(createMediaAdapter({ kind: 'text', sourceLocator: 'a' }, context)).toBeInstanceOf(TextAdapter);
            expect(createMediaAdapter({ kind: 'web', sourceLocator: 'a' }, context)).toBeInstanceOf(WebAdapter);
            expect(
                createMediaAdapter({ kind: 'custom', customView: () => undefined }, context)
            ).toBeInstanceOf(CustomAdapter);
        });
    });
});
