/**
 * Obstacles - barriers and platforms scrolling towards the player.
 *
 * Every operation dispatches on `kind` and returns a new value:
 * moving an obstacle produces a moved copy, resolving a collision produces
 * the player's next state.
 */

import { defaultConfig } from "./config";
import type { CharacterConfig, DebugConfig } from "./config";
import {
    intersects,
    movePoint,
    moveRect,
    rectAt,
    rectRight,
} from "./geometry";
import { boundingBox, knockOut, landOn, positionY, velocityY } from "./player";
import { lookupFrame } from "./sprites";
import type {
    Barrier,
    Bitmap,
    Obstacle,
    Platform,
    Player,
    Point,
    Rect,
    Renderer,
    SpriteSheet,
} from "./types";

export const createBarrier = (image: Bitmap, position: Point): Barrier => ({
    kind: "barrier",
    image,
    position,
});

/**
 * Create a platform at `position`.
 *
 * @param spriteNames - Frames drawn left to right, looked up once here
 * @param boundingBoxes - Boxes relative to the platform position
 * @throws MissingFrameError when a sprite is absent from the sheet
 */
export const createPlatform = (
    sheet: SpriteSheet,
    position: Point,
    spriteNames: ReadonlyArray<string>,
    boundingBoxes: ReadonlyArray<Rect>,
): Platform => ({
    kind: "platform",
    sheet,
    position,
    sprites: spriteNames.map(name => lookupFrame(sheet.atlas, name)),
    boundingBoxes: boundingBoxes.map(box => ({
        ...box,
        x: box.x + position.x,
        y: box.y + position.y,
    })),
});

const barrierBox = (barrier: Barrier): Rect =>
    rectAt(barrier.position, barrier.image);

export const obstacleBoundingBoxes = (obstacle: Obstacle): ReadonlyArray<Rect> =>
    obstacle.kind === "barrier"
        ? [barrierBox(obstacle)]
        : obstacle.boundingBoxes;

export const moveObstacle = (obstacle: Obstacle, dx: number): Obstacle => {
    switch (obstacle.kind) {
        case "barrier":
            return { ...obstacle, position: movePoint(obstacle.position, dx) };
        case "platform":
            return {
                ...obstacle,
                position: movePoint(obstacle.position, dx),
                boundingBoxes: obstacle.boundingBoxes.map(box =>
                    moveRect(box, dx),
                ),
            };
    }
};

export const obstacleRight = (obstacle: Obstacle): number =>
    obstacleBoundingBoxes(obstacle).reduce(
        (right, box) => Math.max(right, rectRight(box)),
        obstacle.position.x,
    );

/**
 * Resolve contact between an obstacle and the player.
 *
 * A platform lands a descending player whose position is still above the
 * platform top, and knocks out anything else that touches it. The first of
 * its boxes that overlaps decides the landing height. A barrier knocks out
 * on any overlap.
 *
 * A player moving mostly sideways can land through a platform's side edge
 * when already above its top; the rule only looks at vertical direction and
 * height.
 */
export const checkIntersection = (
    obstacle: Obstacle,
    player: Player,
    config: CharacterConfig = defaultConfig.character,
): Player => {
    const playerBox = boundingBox(player, config);

    switch (obstacle.kind) {
        case "barrier":
            return intersects(playerBox, barrierBox(obstacle))
                ? knockOut(player)
                : player;
        case "platform": {
            const boxToLandOn = obstacle.boundingBoxes.find(box =>
                intersects(box, playerBox),
            );
            if (boxToLandOn === undefined) return player;
            return velocityY(player) > 0 && positionY(player) < obstacle.position.y
                ? landOn(player, boxToLandOn.y, config)
                : knockOut(player);
        }
    }
};

export const drawObstacle = (
    obstacle: Obstacle,
    renderer: Renderer,
    debug: DebugConfig = defaultConfig.debug,
): void => {
    switch (obstacle.kind) {
        case "barrier":
            renderer.drawEntireImage(obstacle.image, obstacle.position);
            break;
        case "platform":
            obstacle.sprites.reduce((x, sprite) => {
                renderer.drawImage(
                    obstacle.sheet.image,
                    sprite.frame,
                    rectAt({ x, y: obstacle.position.y }, sprite.frame),
                );
                return x + sprite.frame.width;
            }, obstacle.position.x);
            break;
    }

    if (debug.showBoundingBoxes) {
        obstacleBoundingBoxes(obstacle).forEach(box =>
            renderer.drawBoundingBox(box),
        );
    }
};
