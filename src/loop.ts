/**
 * Fixed-timestep game loop as a reactive stream.
 *
 * Architecture: Unidirectional data flow
 * Key events + render timestamps -> LoopEvents -> scan(reduceLoop) -> draw
 *
 * Key events are only queued. Each render timestamp drains the queue into
 * the held-keys snapshot, adds the elapsed time to an accumulator and runs
 * as many fixed simulation steps as fit. The draw pass then sees the latest
 * simulated Walk, once per timestamp, whatever the display refresh rate.
 */

import { Observable, filter, map, merge, scan, tap } from "rxjs";
import { defaultConfig } from "./config";
import type { GameConfig } from "./config";
import { createInputQueue, drain, emptyKeyState, enqueue } from "./input";
import type { InputQueue } from "./input";
import { Tick } from "./state";
import type { Clock, KeyPress, KeyState, Renderer, Walk } from "./types";
import { drawWalk } from "./view";

/** 60 simulation steps per second */
export const FRAME_SIZE = 1000 / 60;

export type FrameClock = Readonly<{
    lastFrame: number;
    accumulatedDelta: number;
}>;

export type LoopEvent =
    | Readonly<{ kind: "key"; press: KeyPress }>
    | Readonly<{ kind: "frame"; time: number }>;

/**
 * Loop state threaded through scan()
 * - steps: simulation steps run for the latest timestamp
 * - lastEvent: whether the latest event was a render timestamp
 */
export type LoopState = Readonly<{
    walk: Walk;
    clock: FrameClock;
    keys: KeyState;
    queue: InputQueue;
    steps: number;
    lastEvent: LoopEvent["kind"];
}>;

export const createFrameClock = (startTime: number): FrameClock => ({
    lastFrame: startTime,
    accumulatedDelta: 0,
});

/**
 * Accumulate the time since the last callback and count how many whole
 * fixed steps it covers. The remainder carries over to the next callback.
 */
export const advanceClock = (
    clock: FrameClock,
    time: number,
    frameSize: number = FRAME_SIZE,
): Readonly<{ clock: FrameClock; steps: number }> => {
    let accumulated = clock.accumulatedDelta + (time - clock.lastFrame);
    let steps = 0;
    while (accumulated > frameSize) {
        accumulated -= frameSize;
        steps += 1;
    }
    return {
        clock: { lastFrame: time, accumulatedDelta: accumulated },
        steps,
    };
};

export const createLoopState = (
    walk: Walk,
    startTime: number,
    config: GameConfig = defaultConfig,
): LoopState => ({
    walk,
    clock: createFrameClock(startTime),
    keys: emptyKeyState,
    queue: createInputQueue(config.loop.inputQueueCapacity),
    steps: 0,
    lastEvent: "frame",
});

export const reduceLoop =
    (config: GameConfig = defaultConfig) =>
    (state: LoopState, event: LoopEvent): LoopState => {
        if (event.kind === "key") {
            return {
                ...state,
                queue: enqueue(state.queue, event.press),
                steps: 0,
                lastEvent: "key",
            };
        }

        const { keys, queue } = drain(state.queue, state.keys);
        const { clock, steps } = advanceClock(
            state.clock,
            event.time,
            config.loop.frameSize,
        );
        const tick = new Tick(keys, config);
        const walk = Array.from({ length: steps }).reduce<Walk>(
            current => tick.apply(current),
            state.walk,
        );

        return { walk, clock, keys, queue, steps, lastEvent: "frame" };
    };

/**
 * Simulation stream: one LoopState per render timestamp.
 *
 * @param frames$ - Render callback timestamps, on the same clock as startTime
 * @param keys$ - Raw key events, observed only when the next timestamp drains them
 */
export const gameLoop$ = (
    walk: Walk,
    frames$: Observable<number>,
    keys$: Observable<KeyPress>,
    startTime: number,
    config: GameConfig = defaultConfig,
): Observable<LoopState> =>
    merge(
        keys$.pipe(map((press): LoopEvent => ({ kind: "key", press }))),
        frames$.pipe(map((time): LoopEvent => ({ kind: "frame", time }))),
    ).pipe(
        scan(reduceLoop(config), createLoopState(walk, startTime, config)),
        filter(state => state.lastEvent === "frame"),
    );

export type LoopHost = Readonly<{
    frames$: Observable<number>;
    keys$: Observable<KeyPress>;
    clock: Clock;
    renderer: Renderer;
}>;

/**
 * The running game: simulate, then issue exactly one draw pass per
 * timestamp. A draw failure (such as a missing sprite frame) errors the
 * stream.
 */
export const runGame$ = (
    walk: Walk,
    host: LoopHost,
    config: GameConfig = defaultConfig,
): Observable<LoopState> =>
    gameLoop$(walk, host.frames$, host.keys$, host.clock.now(), config).pipe(
        tap(state => drawWalk(state.walk, host.renderer, config)),
    );
