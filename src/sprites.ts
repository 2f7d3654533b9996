/**
 * Sprite atlas: parsing the descriptor and locating frames in it.
 *
 * The descriptor is the JSON a texture packer writes:
 *   { "frames": { "Run (1).png": { "frame": {x,y,w,h},
 *                                   "spriteSourceSize": {x,y,w,h} } } }
 * Parsing is a pure transformation from that JSON into a frozen map.
 */

import { createRect } from "./geometry";
import { AtlasFormatError, MissingFrameError } from "./errors";
import type { Bitmap, Rect, SpriteAtlas, SpriteFrame, SpriteSheet } from "./types";

type RawRect = Readonly<{ x: number; y: number; w: number; h: number }>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const isRawRect = (value: unknown): value is RawRect =>
    isRecord(value) &&
    ["x", "y", "w", "h"].every(
        key => typeof value[key] === "number" && Number.isFinite(value[key]),
    );

const toRect = ({ x, y, w, h }: RawRect): Rect => createRect(x, y, w, h);

const parseFrame = (name: string, entry: unknown): SpriteFrame => {
    if (!isRecord(entry) || !isRawRect(entry.frame)) {
        throw new AtlasFormatError(`Frame "${name}" has no valid "frame" rectangle`);
    }
    const frame = toRect(entry.frame);

    if (entry.spriteSourceSize === undefined) {
        // No trimming information: the visible pixels fill the whole cell
        return {
            frame,
            spriteSourceSize: createRect(0, 0, frame.width, frame.height),
        };
    }
    if (!isRawRect(entry.spriteSourceSize)) {
        throw new AtlasFormatError(
            `Frame "${name}" has an invalid "spriteSourceSize" rectangle`,
        );
    }
    return { frame, spriteSourceSize: toRect(entry.spriteSourceSize) };
};

/**
 * Parse a sprite-atlas descriptor.
 *
 * @param json - Decoded descriptor, still untrusted
 * @throws AtlasFormatError when the shape does not match
 */
export const parseAtlas = (json: unknown): SpriteAtlas => {
    if (!isRecord(json) || !isRecord(json.frames)) {
        throw new AtlasFormatError('Sprite atlas has no "frames" object');
    }
    return new Map(
        Object.entries(json.frames).map(([name, entry]) => [
            name,
            parseFrame(name, entry),
        ]),
    );
};

export const createSpriteSheet = (atlas: SpriteAtlas, image: Bitmap): SpriteSheet => ({
    atlas,
    image,
});

/**
 * Look up a frame that must exist. A miss means the atlas and the game
 * content disagree, so it is never silently skipped.
 */
export const lookupFrame = (atlas: SpriteAtlas, name: string): SpriteFrame => {
    const frame = atlas.get(name);
    if (frame === undefined) {
        throw new MissingFrameError(name);
    }
    return frame;
};

/**
 * Name of the sprite shown for an animation tick counter,
 * e.g. frameName("Run", 7, 3) === "Run (3).png".
 */
export const frameName = (
    animation: string,
    tick: number,
    animationSpeed: number,
): string => `${animation} (${Math.floor(tick / animationSpeed) + 1}).png`;
