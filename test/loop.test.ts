import { EMPTY, Subject, lastValueFrom, of, toArray } from "rxjs";
import { describe, expect, it } from "vitest";
import { resolveConfig } from "../src/config";
import { MissingFrameError } from "../src/errors";
import {
    applyKeyPress,
    createInputQueue,
    drain,
    emptyKeyState,
    enqueue,
    isPressed,
} from "../src/input";
import {
    FRAME_SIZE,
    advanceClock,
    createFrameClock,
    gameLoop$,
    runGame$,
} from "../src/loop";
import type { FrameClock, LoopState } from "../src/loop";
import { createPlayer } from "../src/player";
import { createSpriteSheet, parseAtlas } from "../src/sprites";
import type { KeyPress } from "../src/types";
import {
    characterImage,
    fakeAudio,
    jumpSound,
    recordingRenderer,
    testWalk,
} from "./fixtures";

const down = (code: string): KeyPress => ({ type: "keydown", code });
const up = (code: string): KeyPress => ({ type: "keyup", code });

describe("Input", () => {
    it("should track held keys", () => {
        const held = applyKeyPress(emptyKeyState, down("ArrowRight"));
        expect(isPressed(held, "ArrowRight")).toBe(true);
        expect(applyKeyPress(held, down("ArrowRight"))).toBe(held);
        expect(isPressed(applyKeyPress(held, up("ArrowRight")), "ArrowRight")).toBe(
            false,
        );
        expect(applyKeyPress(held, up("Space"))).toBe(held);
    });

    it("should drain queued events in arrival order", () => {
        const queue = [down("Space"), down("ArrowRight"), up("Space")].reduce(
            enqueue,
            createInputQueue(8),
        );
        const { keys, queue: emptied } = drain(queue, emptyKeyState);
        expect([...keys]).toEqual(["ArrowRight"]);
        expect(emptied.pending).toHaveLength(0);
        expect(emptied.capacity).toBe(8);
    });

    it("should keep at most capacity events pending", () => {
        const queue = [down("KeyA"), down("KeyB"), up("KeyA")].reduce(
            enqueue,
            createInputQueue(2),
        );
        expect(queue.pending).toEqual([down("KeyB"), up("KeyA")]);
        expect([...queue.overflow]).toEqual([["KeyA", "keydown"]]);
        expect([...drain(queue, emptyKeyState).keys]).toEqual(["KeyB"]);
    });

    it("should still release a key whose keyup overflowed", () => {
        const first = drain(enqueue(createInputQueue(2), down("Space")), emptyKeyState);
        expect([...first.keys]).toEqual(["Space"]);

        const queue = [up("Space"), down("KeyA"), down("KeyB")].reduce(
            enqueue,
            first.queue,
        );
        const { keys, queue: emptied } = drain(queue, first.keys);
        expect([...keys]).toEqual(["KeyA", "KeyB"]);
        expect(emptied.overflow.size).toBe(0);
    });
});

describe("Fixed-step clock", () => {
    it("should run whole steps and carry the remainder", () => {
        const results = [8, 16, 20, 55].reduce<{
            clock: FrameClock;
            steps: ReadonlyArray<number>;
        }>(
            ({ clock, steps }, time) => {
                const next = advanceClock(clock, time);
                return { clock: next.clock, steps: [...steps, next.steps] };
            },
            { clock: createFrameClock(0), steps: [] },
        );
        expect(results.steps).toEqual([0, 0, 1, 2]);
        expect(results.clock.lastFrame).toBe(55);
        expect(results.clock.accumulatedDelta).toBeCloseTo(5, 9);
    });

    it("should not step on exactly one frame of time", () => {
        const { clock, steps } = advanceClock(createFrameClock(0), 10, 10);
        expect(steps).toBe(0);
        expect(clock.accumulatedDelta).toBe(10);
        expect(advanceClock(clock, 11, 10).steps).toBe(1);
    });

    it("should catch up after a stall", () => {
        const { clock, steps } = advanceClock(createFrameClock(0), 110);
        expect(steps).toBe(6);
        expect(clock.accumulatedDelta).toBeCloseTo(110 - 6 * FRAME_SIZE, 9);
    });
});

describe("Game loop", () => {
    it("should simulate once per timestamp with the keys held at that time", () => {
        const frames$ = new Subject<number>();
        const keys$ = new Subject<KeyPress>();
        const emitted: LoopState[] = [];
        const subscription = gameLoop$(testWalk(), frames$, keys$, 0).subscribe(state =>
            emitted.push(state),
        );

        keys$.next(down("ArrowRight"));
        expect(emitted).toHaveLength(0);

        frames$.next(20);
        expect(emitted[0].steps).toBe(1);
        expect(emitted[0].walk.player.state.kind).toBe("Running");
        expect(emitted[0].walk.player.state.context.frame).toBe(1);

        frames$.next(55);
        expect(emitted[1].steps).toBe(2);
        expect(emitted[1].walk.player.state.context.frame).toBe(3);
        expect(emitted[1].walk.player.state.context.velocity.x).toBe(4);

        keys$.next(up("ArrowRight"));
        frames$.next(60);
        expect(emitted[2].steps).toBe(0);
        expect(emitted[2].keys.size).toBe(0);
        expect(emitted[2].walk).toBe(emitted[1].walk);

        expect(emitted.map(state => state.steps)).toEqual([1, 2, 0]);
        subscription.unsubscribe();
    });

    it("should keep the held keys exact when the queue overflows", () => {
        const config = resolveConfig({ loop: { inputQueueCapacity: 2 } });
        const frames$ = new Subject<number>();
        const keys$ = new Subject<KeyPress>();
        const emitted: LoopState[] = [];
        const subscription = gameLoop$(testWalk(), frames$, keys$, 0, config).subscribe(
            state => emitted.push(state),
        );

        keys$.next(down("Space"));
        frames$.next(1);
        expect(emitted[0].keys.has("Space")).toBe(true);

        keys$.next(up("Space"));
        keys$.next(down("KeyA"));
        keys$.next(down("KeyB"));
        frames$.next(2);
        expect(emitted[1].keys.has("Space")).toBe(false);
        expect([...emitted[1].keys]).toEqual(["KeyA", "KeyB"]);
        subscription.unsubscribe();
    });

    it("should draw exactly once per timestamp", async () => {
        const { renderer, calls } = recordingRenderer();
        const states = await lastValueFrom(
            runGame$(testWalk(), {
                frames$: of(20, 55, 60),
                keys$: EMPTY,
                clock: { now: () => 0 },
                renderer,
            }).pipe(toArray()),
        );
        expect(states.map(state => state.steps)).toEqual([1, 2, 0]);
        expect(calls.filter(call => call.op === "clear")).toHaveLength(3);
    });

    it("should error the stream when a sprite frame is missing", async () => {
        const { renderer } = recordingRenderer();
        const emptySheet = createSpriteSheet(parseAtlas({ frames: {} }), characterImage);
        const walk = {
            ...testWalk(),
            player: createPlayer(emptySheet, fakeAudio().audio, jumpSound),
        };
        await expect(
            lastValueFrom(
                runGame$(walk, {
                    frames$: of(5),
                    keys$: EMPTY,
                    clock: { now: () => 0 },
                    renderer,
                }),
            ),
        ).rejects.toThrow(MissingFrameError);
    });
});
