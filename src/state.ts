/**
 * Game State Management
 *
 * - Session: one-shot Loading -> Loaded lifecycle around asset loading
 * - Walk: the live play session, advanced by the Tick action
 * - Tick: one fixed simulation step (input, character, scrolling,
 *   collisions, segment generation)
 *
 * Every step returns a new Walk; nothing in here mutates its input.
 */

import { defaultConfig } from "./config";
import type { GameConfig } from "./config";
import { AlreadyInitializedError, AssetLoadError } from "./errors";
import { movePoint } from "./geometry";
import { emptyKeyState } from "./input";
import {
    checkIntersection,
    moveObstacle,
    obstacleRight,
} from "./obstacles";
import { applyInput, createPlayer, updatePlayer, walkingSpeed } from "./player";
import { generateNextSegment, rightmost, stoneAndPlatform } from "./segments";
import { createSpriteSheet, lookupFrame, parseAtlas } from "./sprites";
import type {
    Action,
    AssetLoader,
    AudioDevice,
    Bitmap,
    KeyState,
    Obstacle,
    Player,
    Scenery,
    Session,
    Sound,
    SpriteAtlas,
    SpriteSheet,
    Walk,
} from "./types";

export const loadingSession: Session = { status: "loading" };

/** Everything a Walk needs, already decoded */
export type GameAssets = Readonly<{
    characterSheet: SpriteSheet;
    background: Bitmap;
    stone: Bitmap;
    obstacleSheet: SpriteSheet;
    jumpSound: Sound;
}>;

/**
 * Build the starting Walk: the player idle at the starting point, two
 * background copies side by side and the first segment at x = 0.
 */
export const createWalk = (
    assets: GameAssets,
    audio: AudioDevice,
    config: GameConfig = defaultConfig,
): Walk => {
    const startingObstacles = stoneAndPlatform(
        assets.stone,
        assets.obstacleSheet,
        0,
        config.obstacles,
    );
    return {
        player: createPlayer(
            assets.characterSheet,
            audio,
            assets.jumpSound,
            config.character,
        ),
        backgrounds: [
            { image: assets.background, position: { x: 0, y: 0 } },
            {
                image: assets.background,
                position: { x: assets.background.width, y: 0 },
            },
        ],
        obstacles: startingObstacles,
        obstacleSheet: assets.obstacleSheet,
        stone: assets.stone,
        timeline: rightmost(startingObstacles),
        rngSeed: config.world.initialSeed,
    };
};

// Fail at load time rather than mid-run when a platform sprite is missing
const requireFrames = (
    atlas: SpriteAtlas,
    names: ReadonlyArray<string>,
): SpriteAtlas => {
    names.forEach(name => lookupFrame(atlas, name));
    return atlas;
};

/**
 * Load every asset concurrently. All failures are collected into one
 * AssetLoadError rather than reporting only the first.
 */
export const loadAssets = async (
    loader: AssetLoader,
    config: GameConfig = defaultConfig,
): Promise<GameAssets> => {
    const { assets, obstacles } = config;
    const [
        characterAtlas,
        characterImage,
        background,
        stone,
        obstacleAtlas,
        obstacleImage,
        jumpSound,
    ] = await Promise.allSettled([
        loader.loadJson(assets.characterAtlas).then(parseAtlas),
        loader.loadImage(assets.characterImage),
        loader.loadImage(assets.background),
        loader.loadImage(assets.stone),
        loader
            .loadJson(assets.obstacleAtlas)
            .then(parseAtlas)
            .then(atlas => requireFrames(atlas, obstacles.platformSprites)),
        loader.loadImage(assets.obstacleImage),
        loader.loadSound(assets.jumpSound),
    ]);

    if (
        characterAtlas.status === "fulfilled" &&
        characterImage.status === "fulfilled" &&
        background.status === "fulfilled" &&
        stone.status === "fulfilled" &&
        obstacleAtlas.status === "fulfilled" &&
        obstacleImage.status === "fulfilled" &&
        jumpSound.status === "fulfilled"
    ) {
        return {
            characterSheet: createSpriteSheet(
                characterAtlas.value,
                characterImage.value,
            ),
            background: background.value,
            stone: stone.value,
            obstacleSheet: createSpriteSheet(
                obstacleAtlas.value,
                obstacleImage.value,
            ),
            jumpSound: jumpSound.value,
        };
    }

    throw new AssetLoadError(
        [
            characterAtlas,
            characterImage,
            background,
            stone,
            obstacleAtlas,
            obstacleImage,
            jumpSound,
        ].flatMap(result =>
            result.status === "rejected" ? [result.reason] : [],
        ),
    );
};

/**
 * Move a Loading session to Loaded.
 *
 * @throws AssetLoadError when any asset fails; the caller's session stays Loading
 * @throws AlreadyInitializedError when the session is already Loaded
 */
export const initialize = async (
    session: Session,
    loader: AssetLoader,
    audio: AudioDevice,
    config: GameConfig = defaultConfig,
): Promise<Session> => {
    if (session.status === "loaded") {
        throw new AlreadyInitializedError();
    }
    const assets = await loadAssets(loader, config);
    console.info("Assets loaded, starting walk");
    return { status: "loaded", walk: createWalk(assets, audio, config) };
};

const sceneryRight = (scenery: Scenery): number =>
    scenery.position.x + scenery.image.width;

const moveScenery = (scenery: Scenery, dx: number): Scenery => ({
    ...scenery,
    position: movePoint(scenery.position, dx),
});

const placeSceneryAt = (scenery: Scenery, x: number): Scenery => ({
    ...scenery,
    position: { ...scenery.position, x },
});

/**
 * Scroll both background copies; one that has left the screen is placed
 * after the other so the pair tiles endlessly.
 */
export const scrollBackgrounds = (
    [first, second]: Walk["backgrounds"],
    velocity: number,
): Walk["backgrounds"] => {
    const movedFirst = moveScenery(first, velocity);
    const movedSecond = moveScenery(second, velocity);
    const wrappedFirst =
        sceneryRight(movedFirst) < 0
            ? placeSceneryAt(movedFirst, sceneryRight(movedSecond))
            : movedFirst;
    const wrappedSecond =
        sceneryRight(movedSecond) < 0
            ? placeSceneryAt(movedSecond, sceneryRight(wrappedFirst))
            : movedSecond;
    return [wrappedFirst, wrappedSecond];
};

/**
 * Move every obstacle and resolve its contact with the player, then drop the
 * ones that have scrolled past the left edge.
 */
export const moveObstacles = (
    obstacles: ReadonlyArray<Obstacle>,
    player: Player,
    velocity: number,
    config: GameConfig = defaultConfig,
): Readonly<{ obstacles: ReadonlyArray<Obstacle>; player: Player }> => {
    const moved = obstacles.reduce<{
        obstacles: ReadonlyArray<Obstacle>;
        player: Player;
    }>(
        (acc, obstacle) => {
            const movedObstacle = moveObstacle(obstacle, velocity);
            return {
                obstacles: [...acc.obstacles, movedObstacle],
                player: checkIntersection(
                    movedObstacle,
                    acc.player,
                    config.character,
                ),
            };
        },
        { obstacles: [], player },
    );
    return {
        player: moved.player,
        obstacles: moved.obstacles.filter(obstacle => obstacleRight(obstacle) > 0),
    };
};

/**
 * Tick Action - one fixed simulation step
 *
 * 1. Held keys become character events, then the character updates
 * 2. Backgrounds and obstacles scroll by the player's running speed
 * 3. Obstacles resolve collisions and off-screen ones are dropped
 * 4. The timeline either advances with the scroll or, when it runs short,
 *    gets a new segment
 */
export class Tick implements Action<Walk> {
    constructor(
        private readonly keys: KeyState = emptyKeyState,
        private readonly config: GameConfig = defaultConfig,
    ) {}

    apply(walk: Walk): Walk {
        const { character, obstacles, world } = this.config;

        const player = updatePlayer(
            applyInput(walk.player, this.keys, character),
            character,
        );
        const velocity = -walkingSpeed(player);

        const resolved = moveObstacles(
            walk.obstacles,
            player,
            velocity,
            this.config,
        );

        const scrolled: Walk = {
            ...walk,
            player: resolved.player,
            backgrounds: scrollBackgrounds(walk.backgrounds, velocity),
            obstacles: resolved.obstacles,
        };

        return scrolled.timeline < world.timelineMinimum
            ? generateNextSegment(scrolled, obstacles)
            : { ...scrolled, timeline: scrolled.timeline + velocity };
    }
}

export const reduceWalk = (walk: Walk, action: Action<Walk>): Walk =>
    action.apply(walk);
