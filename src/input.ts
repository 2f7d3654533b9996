/**
 * Keyboard input: raw press/release events are queued as they arrive and
 * drained into a held-keys snapshot once per render callback. The simulation
 * only ever reads the snapshot, so every fixed step inside one callback sees
 * the same input.
 */

import type { KeyPress, KeyState } from "./types";

export const emptyKeyState: KeyState = new Set<string>();

export const isPressed = (keys: KeyState, code: string): boolean =>
    keys.has(code);

export const applyKeyPress = (keys: KeyState, press: KeyPress): KeyState => {
    if (press.type === "keydown") {
        return keys.has(press.code) ? keys : new Set([...keys, press.code]);
    }
    if (!keys.has(press.code)) return keys;
    return new Set([...keys].filter(code => code !== press.code));
};

/**
 * Bounded FIFO of pending key events.
 *
 * When full, the oldest event moves to `overflow`, which keeps only the last
 * event type seen per key code. A key's held state depends only on its last
 * event, so the drained snapshot is the same as if nothing had been dropped.
 */
export type InputQueue = Readonly<{
    capacity: number;
    pending: ReadonlyArray<KeyPress>;
    overflow: ReadonlyMap<string, KeyPress["type"]>;
}>;

export const createInputQueue = (capacity: number): InputQueue => ({
    capacity,
    pending: [],
    overflow: new Map<string, KeyPress["type"]>(),
});

export const enqueue = (queue: InputQueue, press: KeyPress): InputQueue => {
    const pending = [...queue.pending, press];
    if (pending.length <= queue.capacity) {
        return { ...queue, pending };
    }
    const [oldest, ...rest] = pending;
    return {
        ...queue,
        pending: rest,
        overflow: new Map<string, KeyPress["type"]>([
            ...queue.overflow,
            [oldest.code, oldest.type],
        ]),
    };
};

/** Apply the overflow, then every pending event in arrival order, and empty the queue */
export const drain = (
    queue: InputQueue,
    keys: KeyState,
): Readonly<{ keys: KeyState; queue: InputQueue }> => {
    const settled = [...queue.overflow].reduce(
        (held, [code, type]) => applyKeyPress(held, { type, code }),
        keys,
    );
    return {
        keys: queue.pending.reduce(applyKeyPress, settled),
        queue: { ...queue, pending: [], overflow: new Map<string, KeyPress["type"]>() },
    };
};
