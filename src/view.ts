/**
 * Drawing.
 *
 * drawWalk() turns the latest Walk into renderer calls; it holds no game
 * logic. canvasRenderer() is the browser Renderer over a 2D canvas context.
 */

import { defaultConfig } from "./config";
import type { GameConfig } from "./config";
import { createRect } from "./geometry";
import { drawObstacle } from "./obstacles";
import { drawPlayer } from "./player";
import type { Bitmap, Point, Rect, Renderer, Walk } from "./types";

/**
 * One draw pass: clear the play surface, then backgrounds, the player and
 * the obstacles, back to front.
 */
export const drawWalk = (
    walk: Walk,
    renderer: Renderer,
    config: GameConfig = defaultConfig,
): void => {
    renderer.clear(
        createRect(0, 0, config.viewport.canvasWidth, config.viewport.canvasHeight),
    );
    walk.backgrounds.forEach(background =>
        renderer.drawEntireImage(background.image, background.position),
    );
    drawPlayer(walk.player, renderer, config.character, config.debug);
    walk.obstacles.forEach(obstacle =>
        drawObstacle(obstacle, renderer, config.debug),
    );
};

const toImageSource = (image: Bitmap): CanvasImageSource => {
    if (image instanceof HTMLImageElement || image instanceof ImageBitmap) {
        return image;
    }
    throw new TypeError("Canvas renderer cannot draw this bitmap handle");
};

export const canvasRenderer = (context: CanvasRenderingContext2D): Renderer => ({
    clear: (rect: Rect) =>
        context.clearRect(rect.x, rect.y, rect.width, rect.height),
    drawImage: (image: Bitmap, source: Rect, destination: Rect) =>
        context.drawImage(
            toImageSource(image),
            source.x,
            source.y,
            source.width,
            source.height,
            destination.x,
            destination.y,
            destination.width,
            destination.height,
        ),
    drawEntireImage: (image: Bitmap, position: Point) =>
        context.drawImage(toImageSource(image), position.x, position.y),
    drawBoundingBox: (rect: Rect) => {
        context.strokeStyle = "#FF0000";
        context.beginPath();
        context.rect(rect.x, rect.y, rect.width, rect.height);
        context.stroke();
    },
});
