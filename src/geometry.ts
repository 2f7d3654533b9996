import type { Point, Rect } from "./types";

export const createRect = (
    x: number,
    y: number,
    width: number,
    height: number,
): Rect => ({ x, y, width, height });

/** Rect at a position with the size of a bitmap or frame */
export const rectAt = (
    position: Point,
    size: Readonly<{ width: number; height: number }>,
): Rect => createRect(position.x, position.y, size.width, size.height);

export const rectRight = (rect: Rect): number => rect.x + rect.width;

export const rectBottom = (rect: Rect): number => rect.y + rect.height;

/**
 * Overlap on both axes. Boxes that only share an edge do not intersect.
 */
export const intersects = (a: Rect, b: Rect): boolean =>
    a.x < rectRight(b) &&
    rectRight(a) > b.x &&
    a.y < rectBottom(b) &&
    rectBottom(a) > b.y;

export const moveRect = (rect: Rect, dx: number): Rect => ({
    ...rect,
    x: rect.x + dx,
});

export const movePoint = (point: Point, dx: number): Point => ({
    ...point,
    x: point.x + dx,
});
