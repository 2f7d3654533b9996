/**
 * Segment layouts and procedural generation.
 *
 * A segment is a small hand-authored group of obstacles placed relative to an
 * insertion x. The world keeps a timeline cursor at the rightmost populated x
 * and appends a randomly chosen segment whenever the cursor falls below the
 * look-ahead minimum.
 */

import { defaultConfig } from "./config";
import type { ObstacleConfig } from "./config";
import { createBarrier, createPlatform, obstacleRight } from "./obstacles";
import type { Bitmap, Obstacle, Platform, Point, SpriteSheet, Walk } from "./types";
import { randomIndex } from "./util";

export type SegmentLayout = (
    stone: Bitmap,
    sheet: SpriteSheet,
    offsetX: number,
    config?: ObstacleConfig,
) => ReadonlyArray<Obstacle>;

export const createFloatingPlatform = (
    sheet: SpriteSheet,
    position: Point,
    config: ObstacleConfig = defaultConfig.obstacles,
): Platform =>
    createPlatform(
        sheet,
        position,
        config.platformSprites,
        config.platformBoundingBoxes,
    );

/** Stone on the ground, then a low platform */
export const stoneAndPlatform: SegmentLayout = (
    stone,
    sheet,
    offsetX,
    config = defaultConfig.obstacles,
) => [
    createBarrier(stone, {
        x: offsetX + config.firstOffset,
        y: config.stoneOnGround,
    }),
    createFloatingPlatform(
        sheet,
        { x: offsetX + config.secondOffset, y: config.lowPlatform },
        config,
    ),
];

/** High platform, then a stone on the ground */
export const platformAndStone: SegmentLayout = (
    stone,
    sheet,
    offsetX,
    config = defaultConfig.obstacles,
) => [
    createFloatingPlatform(
        sheet,
        { x: offsetX + config.firstOffset, y: config.highPlatform },
        config,
    ),
    createBarrier(stone, {
        x: offsetX + config.secondOffset,
        y: config.stoneOnGround,
    }),
];

// Layout templates the generator chooses between
export const segmentLayouts: ReadonlyArray<SegmentLayout> = [
    stoneAndPlatform,
    platformAndStone,
];

/** Rightmost extent of a list of obstacles, 0 when empty */
export const rightmost = (obstacles: ReadonlyArray<Obstacle>): number =>
    obstacles.length === 0
        ? 0
        : Math.max(...obstacles.map(obstacleRight));

/**
 * Append the next segment after the current timeline.
 * The timeline moves to the rightmost edge of the new obstacles.
 */
export const generateNextSegment = (
    walk: Walk,
    config: ObstacleConfig = defaultConfig.obstacles,
    layouts: ReadonlyArray<SegmentLayout> = segmentLayouts,
): Walk => {
    const { index, seed } = randomIndex(walk.rngSeed, layouts.length);
    const nextObstacles = layouts[index](
        walk.stone,
        walk.obstacleSheet,
        walk.timeline + config.obstacleBuffer,
        config,
    );

    return {
        ...walk,
        obstacles: [...walk.obstacles, ...nextObstacles],
        timeline: rightmost(nextObstacles),
        rngSeed: seed,
    };
};
