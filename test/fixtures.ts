import { vi } from "vitest";
import { createIdle } from "../src/character";
import { parseAtlas, createSpriteSheet } from "../src/sprites";
import { createWalk } from "../src/state";
import type { GameAssets } from "../src/state";
import type {
    AssetLoader,
    AudioDevice,
    Bitmap,
    CharacterContext,
    CharacterStateKind,
    Player,
    Point,
    Rect,
    Renderer,
    Sound,
    StateOf,
    Walk,
} from "../src/types";

// Every character frame: 80x120 cell content, offset 20px right, 1px down
export const CHARACTER_FRAME = { w: 80, h: 120 };
export const CHARACTER_OFFSET = { x: 20, y: 1 };

const animationLengths: Readonly<Record<string, number>> = {
    Idle: 10,
    Run: 8,
    Slide: 5,
    Jump: 12,
    Dead: 10,
};

export const characterAtlasJson = () => ({
    frames: Object.fromEntries(
        Object.entries(animationLengths).flatMap(([animation, length]) =>
            Array.from(
                { length },
                (_, index) =>
                    [
                        `${animation} (${index + 1}).png`,
                        {
                            frame: {
                                x: index * CHARACTER_FRAME.w,
                                y: 0,
                                ...CHARACTER_FRAME,
                            },
                            spriteSourceSize: {
                                ...CHARACTER_OFFSET,
                                ...CHARACTER_FRAME,
                            },
                        },
                    ] as const,
            ),
        ),
    ),
});

export const obstacleAtlasJson = () => ({
    frames: {
        "13.png": { frame: { x: 0, y: 0, w: 128, h: 93 } },
        "14.png": { frame: { x: 128, y: 0, w: 128, h: 93 } },
        "15.png": { frame: { x: 256, y: 0, w: 128, h: 93 } },
    },
});

export const characterImage: Bitmap = { width: 960, height: 120 };
export const obstacleImage: Bitmap = { width: 384, height: 93 };
export const backgroundImage: Bitmap = { width: 1200, height: 600 };
export const stoneImage: Bitmap = { width: 90, height: 54 };
export const jumpSound: Sound = { duration: 0.5 };

export const characterSheet = createSpriteSheet(
    parseAtlas(characterAtlasJson()),
    characterImage,
);
export const obstacleSheet = createSpriteSheet(
    parseAtlas(obstacleAtlasJson()),
    obstacleImage,
);

export const gameAssets: GameAssets = {
    characterSheet,
    background: backgroundImage,
    stone: stoneImage,
    obstacleSheet,
    jumpSound,
};

export const fakeAudio = () => {
    const playSound = vi.fn<(sound: Sound) => void>();
    const audio: AudioDevice = { playSound };
    return { audio, playSound };
};

export const contextWith = (
    overrides: Partial<Pick<CharacterContext, "frame" | "position" | "velocity">>,
    audio: AudioDevice = fakeAudio().audio,
): CharacterContext => ({
    ...createIdle(audio, jumpSound).context,
    ...overrides,
});

export const stateOf = <K extends CharacterStateKind>(
    kind: K,
    context: CharacterContext,
): StateOf<K> => ({ kind, context });

export const playerAt = (
    kind: CharacterStateKind,
    position: Point,
    velocity: Point = { x: 0, y: 0 },
): Player => ({
    state: { kind, context: contextWith({ position, velocity }) },
    sheet: characterSheet,
});

export const testWalk = (): Walk => createWalk(gameAssets, fakeAudio().audio);

export type RenderCall =
    | Readonly<{ op: "clear"; rect: Rect }>
    | Readonly<{ op: "drawImage"; image: Bitmap; source: Rect; destination: Rect }>
    | Readonly<{ op: "drawEntireImage"; image: Bitmap; position: Point }>
    | Readonly<{ op: "drawBoundingBox"; rect: Rect }>;

/** Renderer that records every call in order */
export const recordingRenderer = () => {
    const calls: RenderCall[] = [];
    const renderer: Renderer = {
        clear: rect => calls.push({ op: "clear", rect }),
        drawImage: (image, source, destination) =>
            calls.push({ op: "drawImage", image, source, destination }),
        drawEntireImage: (image, position) =>
            calls.push({ op: "drawEntireImage", image, position }),
        drawBoundingBox: rect => calls.push({ op: "drawBoundingBox", rect }),
    };
    return { renderer, calls };
};

const assetTable: Readonly<Record<string, unknown>> = {
    "rhb.json": characterAtlasJson(),
    "tiles.json": obstacleAtlasJson(),
    "rhb.png": characterImage,
    "tiles.png": obstacleImage,
    "BG.png": backgroundImage,
    "Stone.png": stoneImage,
    "SFX_Jump_23.mp3": jumpSound,
};

/**
 * In-memory asset loader.
 *
 * @param replacements - Paths whose content differs from the table
 * @param failures - Paths that reject
 */
export const fakeLoader = (
    replacements: Readonly<Record<string, unknown>> = {},
    failures: ReadonlyArray<string> = [],
): AssetLoader => {
    const lookup = (path: string): Promise<unknown> => {
        const table = { ...assetTable, ...replacements };
        if (failures.includes(path) || !(path in table)) {
            return Promise.reject(new Error(`Cannot load ${path}`));
        }
        return Promise.resolve(table[path]);
    };
    const isBitmap = (value: unknown): value is Bitmap =>
        typeof value === "object" && value !== null && "width" in value && "height" in value;
    const isSound = (value: unknown): value is Sound =>
        typeof value === "object" && value !== null && "duration" in value;

    return {
        loadJson: lookup,
        loadImage: path =>
            lookup(path).then(value => {
                if (!isBitmap(value)) throw new Error(`${path} is not an image`);
                return value;
            }),
        loadSound: path =>
            lookup(path).then(value => {
                if (!isSound(value)) throw new Error(`${path} is not a sound`);
                return value;
            }),
    };
};
