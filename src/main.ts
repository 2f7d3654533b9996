/**
 * Application entry point.
 *
 * Asset loading and DOM access live here at the edge; the simulation core
 * only sees the Renderer, AssetLoader, AudioDevice and stream interfaces.
 */

import { EMPTY, catchError, from, switchMap } from "rxjs";
import {
    browserAssetLoader,
    frameTimestamps$,
    keyPresses$,
    webAudioDevice,
} from "./browser";
import { defaultConfig } from "./config";
import { runGame$ } from "./loop";
import { initialize, loadingSession } from "./state";
import { canvasRenderer } from "./view";

if (typeof window !== "undefined") {
    const canvas = document.querySelector("#canvas");
    if (!(canvas instanceof HTMLCanvasElement)) {
        throw new Error("No <canvas id=\"canvas\"> element on the page");
    }
    const context = canvas.getContext("2d");
    if (context === null) {
        throw new Error("2D canvas context is not available");
    }
    const audioContext = new AudioContext();

    from(
        initialize(
            loadingSession,
            browserAssetLoader(audioContext),
            webAudioDevice(audioContext),
            defaultConfig,
        ),
    )
        .pipe(
            switchMap(session =>
                session.status === "loaded"
                    ? runGame$(session.walk, {
                          frames$: frameTimestamps$(),
                          keys$: keyPresses$(canvas),
                          clock: performance,
                          renderer: canvasRenderer(context),
                      })
                    : EMPTY,
            ),
            catchError(err => {
                console.error("Game stopped:", err);
                throw err;
            }),
        )
        .subscribe();
}
