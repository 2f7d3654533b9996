/**
 * Type definitions for the runner.
 *
 * Design Decision:
 * - All types use `Readonly` so every state change produces a new value
 * - ReadonlyArray keeps obstacle lists and atlases free of in-place edits
 * - Host collaborators (renderer, loader, audio) are described only by the
 *   shape the core needs from them
 */

// Keys the simulation reads from the held-keys snapshot
export type Key = "ArrowRight" | "ArrowDown" | "Space";

// 2D integer vector, used for positions and velocities alike
export type Point = Readonly<{ x: number; y: number }>;

/** Axis-aligned box in screen space */
export type Rect = Readonly<{
    x: number;
    y: number;
    width: number;
    height: number;
}>;

/**
 * Decoded bitmap handle. The core only needs its size; the renderer
 * receives the handle back untouched.
 */
export type Bitmap = Readonly<{ width: number; height: number }>;

/** Decoded audio clip handle */
export type Sound = Readonly<{ duration: number }>;

/**
 * A named region of a shared bitmap
 * - frame: source rectangle within the bitmap
 * - spriteSourceSize: offset of the visible pixels inside the animation cell
 */
export type SpriteFrame = Readonly<{
    frame: Rect;
    spriteSourceSize: Rect;
}>;

export type SpriteAtlas = ReadonlyMap<string, SpriteFrame>;

/** An atlas together with the bitmap its rectangles point into */
export type SpriteSheet = Readonly<{
    atlas: SpriteAtlas;
    image: Bitmap;
}>;

export interface Renderer {
    clear(rect: Rect): void;
    drawImage(image: Bitmap, source: Rect, destination: Rect): void;
    drawEntireImage(image: Bitmap, position: Point): void;
    drawBoundingBox(rect: Rect): void;
}

export interface AssetLoader {
    loadImage(path: string): Promise<Bitmap>;
    loadJson(path: string): Promise<unknown>;
    loadSound(path: string): Promise<Sound>;
}

export interface AudioDevice {
    playSound(sound: Sound): void;
}

export interface Clock {
    now(): number;
}

/** Raw key event as delivered by the input source */
export type KeyPress = Readonly<{
    type: "keydown" | "keyup";
    code: string;
}>;

/** Snapshot of key codes currently held down */
export type KeyState = ReadonlySet<string>;

/**
 * Action interface for state transformations
 * - Every gameplay event and simulation step is an Action
 * - apply() returns the next value and never mutates its input
 */
export interface Action<S> {
    apply(s: S): S;
}

export type CharacterStateKind =
    | "Idle"
    | "Running"
    | "Sliding"
    | "Jumping"
    | "Falling"
    | "KnockedOut";

/**
 * Physical and animation state shared by every character state
 * - frame: animation tick counter, bounded by the active state's frame count
 * - audio/jumpSound: handles used for the one-shot jump sound
 */
export type CharacterContext = Readonly<{
    frame: number;
    position: Point;
    velocity: Point;
    audio: AudioDevice;
    jumpSound: Sound;
}>;

export type StateOf<K extends CharacterStateKind> = Readonly<{
    kind: K;
    context: CharacterContext;
}>;

export type IdleState = StateOf<"Idle">;
export type RunningState = StateOf<"Running">;
export type SlidingState = StateOf<"Sliding">;
export type JumpingState = StateOf<"Jumping">;
export type FallingState = StateOf<"Falling">;
export type KnockedOutState = StateOf<"KnockedOut">;

export type CharacterState =
    | IdleState
    | RunningState
    | SlidingState
    | JumpingState
    | FallingState
    | KnockedOutState;

/** The character together with the sprite sheet it is drawn from */
export type Player = Readonly<{
    state: CharacterState;
    sheet: SpriteSheet;
}>;

/** Ground-level hazard drawn from a single bitmap */
export type Barrier = Readonly<{
    kind: "barrier";
    image: Bitmap;
    position: Point;
}>;

/**
 * Floating platform made of several sprites
 * - sprites: resolved frames, drawn left to right
 * - boundingBoxes: one per structural piece (left cap, span, right cap)
 */
export type Platform = Readonly<{
    kind: "platform";
    sheet: SpriteSheet;
    position: Point;
    sprites: ReadonlyArray<SpriteFrame>;
    boundingBoxes: ReadonlyArray<Rect>;
}>;

export type Obstacle = Barrier | Platform;

/** A scrolling full-bitmap image such as the background */
export type Scenery = Readonly<{
    image: Bitmap;
    position: Point;
}>;

/**
 * The live play session
 * - timeline: rightmost x already populated with obstacles
 * - rngSeed: threaded seed used to pick the next segment layout
 */
export type Walk = Readonly<{
    player: Player;
    backgrounds: readonly [Scenery, Scenery];
    obstacles: ReadonlyArray<Obstacle>;
    obstacleSheet: SpriteSheet;
    stone: Bitmap;
    timeline: number;
    rngSeed: number;
}>;

export type Session =
    | Readonly<{ status: "loading" }>
    | Readonly<{ status: "loaded"; walk: Walk }>;
