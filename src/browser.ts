/**
 * Browser implementations of the host collaborators: asset loading over
 * fetch and image elements, Web Audio playback, and the key/frame streams.
 */

import {
    Observable,
    animationFrames,
    firstValueFrom,
    fromEvent,
    map,
    merge,
    switchMap,
} from "rxjs";
import { fromFetch } from "rxjs/fetch";
import type { AssetLoader, AudioDevice, Bitmap, KeyPress, Sound } from "./types";

// Assets are served from the site root by the dev server and the build
const assetUrl = (path: string): string =>
    new URL(path, `${window.location.origin}/`).href;

const fetchAsset = <T>(
    path: string,
    read: (response: Response) => Promise<T>,
): Promise<T> =>
    firstValueFrom(
        fromFetch(assetUrl(path)).pipe(
            switchMap(response => {
                if (response.ok) return read(response);
                throw new Error(`Fetch error for ${path}: ${response.status}`);
            }),
        ),
    );

const loadImageElement = (path: string): Promise<Bitmap> =>
    new Promise((resolve, reject) => {
        const image = new Image();
        image.onload = () => resolve(image);
        image.onerror = () => reject(new Error(`Error loading image: ${path}`));
        image.src = assetUrl(path);
    });

export const browserAssetLoader = (audioContext: AudioContext): AssetLoader => ({
    loadImage: loadImageElement,
    loadJson: path =>
        fetchAsset(path, (response): Promise<unknown> => response.json()),
    loadSound: async path =>
        audioContext.decodeAudioData(
            await fetchAsset(path, response => response.arrayBuffer()),
        ),
});

export const webAudioDevice = (context: AudioContext): AudioDevice => ({
    playSound: (sound: Sound) => {
        if (!(sound instanceof AudioBuffer)) {
            throw new TypeError("Audio device cannot play this sound handle");
        }
        const source = context.createBufferSource();
        source.buffer = sound;
        source.connect(context.destination);
        source.start(0);
    },
});

/** Raw press/release events from an element that has keyboard focus */
export const keyPresses$ = (target: HTMLElement): Observable<KeyPress> =>
    merge(
        fromEvent<KeyboardEvent>(target, "keydown").pipe(
            map(({ code }): KeyPress => ({ type: "keydown", code })),
        ),
        fromEvent<KeyboardEvent>(target, "keyup").pipe(
            map(({ code }): KeyPress => ({ type: "keyup", code })),
        ),
    );

/** requestAnimationFrame timestamps, on the performance.now() clock */
export const frameTimestamps$ = (): Observable<number> =>
    animationFrames().pipe(map(({ timestamp }) => timestamp));
