/**
 * Game configuration.
 *
 * Related values are grouped so a different skin (other sprite sizes,
 * other layouts) only has to override the groups it changes.
 */

import { ConfigError } from "./errors";
import type { CharacterStateKind, Rect } from "./types";

export type ViewportConfig = Readonly<{
    canvasWidth: number;
    canvasHeight: number;
}>;

export type CharacterConfig = Readonly<{
    floor: number;
    canvasHeight: number;
    startingPoint: number;
    runningSpeed: number;
    jumpSpeed: number;
    gravity: number;
    terminalSpeed: number;
    frameCounts: Readonly<Record<CharacterStateKind, number>>;
    animationNames: Readonly<Record<CharacterStateKind, string>>;
    // Ticks each displayed sprite stays on screen
    animationSpeed: number;
    // Insets from the drawn sprite to the hit-box
    boundingBoxInset: Readonly<{ x: number; y: number; width: number }>;
}>;

export type ObstacleConfig = Readonly<{
    stoneOnGround: number;
    lowPlatform: number;
    highPlatform: number;
    firstOffset: number;
    secondOffset: number;
    obstacleBuffer: number;
    platformSprites: ReadonlyArray<string>;
    platformBoundingBoxes: ReadonlyArray<Rect>;
}>;

export type WorldConfig = Readonly<{
    timelineMinimum: number;
    initialSeed: number;
}>;

export type LoopConfig = Readonly<{
    frameSize: number;
    inputQueueCapacity: number;
}>;

export type AssetConfig = Readonly<{
    characterAtlas: string;
    characterImage: string;
    background: string;
    stone: string;
    obstacleAtlas: string;
    obstacleImage: string;
    jumpSound: string;
}>;

export type DebugConfig = Readonly<{
    showBoundingBoxes: boolean;
}>;

export type GameConfig = Readonly<{
    viewport: ViewportConfig;
    character: CharacterConfig;
    obstacles: ObstacleConfig;
    world: WorldConfig;
    loop: LoopConfig;
    assets: AssetConfig;
    debug: DebugConfig;
}>;

const CANVAS_HEIGHT = 600;
const PLATFORM_WIDTH = 384;
const PLATFORM_CAP_WIDTH = 60;

export const defaultConfig: GameConfig = {
    viewport: {
        canvasWidth: 600,
        canvasHeight: CANVAS_HEIGHT,
    },
    character: {
        floor: 479,
        canvasHeight: CANVAS_HEIGHT,
        startingPoint: -20,
        runningSpeed: 4,
        jumpSpeed: -25,
        gravity: 1,
        terminalSpeed: 20,
        frameCounts: {
            Idle: 29,
            Running: 23,
            Sliding: 14,
            Jumping: 35,
            Falling: 29,
            KnockedOut: 29,
        },
        animationNames: {
            Idle: "Idle",
            Running: "Run",
            Sliding: "Slide",
            Jumping: "Jump",
            Falling: "Dead",
            KnockedOut: "Dead",
        },
        animationSpeed: 3,
        boundingBoxInset: { x: 18, y: 14, width: 28 },
    },
    obstacles: {
        stoneOnGround: 546,
        lowPlatform: 420,
        highPlatform: 375,
        firstOffset: 150,
        secondOffset: 370,
        obstacleBuffer: 20,
        platformSprites: ["13.png", "14.png", "15.png"],
        platformBoundingBoxes: [
            { x: 0, y: 0, width: PLATFORM_CAP_WIDTH, height: 54 },
            {
                x: PLATFORM_CAP_WIDTH,
                y: 0,
                width: PLATFORM_WIDTH - PLATFORM_CAP_WIDTH * 2,
                height: 93,
            },
            {
                x: PLATFORM_WIDTH - PLATFORM_CAP_WIDTH,
                y: 0,
                width: PLATFORM_CAP_WIDTH,
                height: 54,
            },
        ],
    },
    world: {
        timelineMinimum: 1000,
        initialSeed: 123456789,
    },
    loop: {
        frameSize: 1000 / 60,
        inputQueueCapacity: 64,
    },
    assets: {
        characterAtlas: "rhb.json",
        characterImage: "rhb.png",
        background: "BG.png",
        stone: "Stone.png",
        obstacleAtlas: "tiles.json",
        obstacleImage: "tiles.png",
        jumpSound: "SFX_Jump_23.mp3",
    },
    debug: {
        showBoundingBoxes: false,
    },
};

/** Per-group partial overrides */
export type ConfigOverrides = Readonly<{
    [G in keyof GameConfig]?: Partial<GameConfig[G]>;
}>;

/** Character height implied by where its feet rest on the floor */
export const playerHeight = (config: CharacterConfig): number =>
    config.canvasHeight - config.floor;

const requirePositive = (label: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${label} must be a positive number, got ${value}`);
    }
};

const requireFinite = (label: string, value: number): void => {
    if (!Number.isFinite(value)) {
        throw new ConfigError(`${label} must be a finite number, got ${value}`);
    }
};

const validateConfig = (config: GameConfig): GameConfig => {
    requirePositive("viewport.canvasWidth", config.viewport.canvasWidth);
    requirePositive("viewport.canvasHeight", config.viewport.canvasHeight);
    requirePositive("loop.frameSize", config.loop.frameSize);
    requirePositive(
        "loop.inputQueueCapacity",
        config.loop.inputQueueCapacity,
    );
    requirePositive("character.animationSpeed", config.character.animationSpeed);
    requirePositive("character.terminalSpeed", config.character.terminalSpeed);
    requireFinite("character.floor", config.character.floor);
    requireFinite("character.gravity", config.character.gravity);
    requireFinite("character.jumpSpeed", config.character.jumpSpeed);
    requireFinite("character.runningSpeed", config.character.runningSpeed);
    requireFinite("world.timelineMinimum", config.world.timelineMinimum);
    if (config.character.canvasHeight !== config.viewport.canvasHeight) {
        throw new ConfigError(
            `character.canvasHeight (${config.character.canvasHeight}) must equal viewport.canvasHeight (${config.viewport.canvasHeight})`,
        );
    }
    Object.entries(config.character.frameCounts).forEach(([kind, count]) =>
        requirePositive(`character.frameCounts.${kind}`, count),
    );
    if (
        config.obstacles.platformSprites.length === 0 ||
        config.obstacles.platformBoundingBoxes.length === 0
    ) {
        throw new ConfigError(
            "obstacles.platformSprites and platformBoundingBoxes must not be empty",
        );
    }
    return config;
};

/**
 * Build a full configuration from per-group overrides.
 * Keys left out keep their default value; `character.canvasHeight` follows
 * the viewport unless overridden, and must agree with it.
 */
export const resolveConfig = (
    overrides: ConfigOverrides = {},
    base: GameConfig = defaultConfig,
): GameConfig => {
    const viewport = { ...base.viewport, ...overrides.viewport };
    return validateConfig({
        viewport,
        character: {
            ...base.character,
            canvasHeight: viewport.canvasHeight,
            ...overrides.character,
        },
        obstacles: { ...base.obstacles, ...overrides.obstacles },
        world: { ...base.world, ...overrides.world },
        loop: { ...base.loop, ...overrides.loop },
        assets: { ...base.assets, ...overrides.assets },
        debug: { ...base.debug, ...overrides.debug },
    });
};
