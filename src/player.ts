/**
 * The playable character: its state machine plus the sprite sheet it is
 * drawn from. Geometry here is derived from the current sprite so the
 * hit-box follows the visible pixels, not the padded animation cell.
 */

import {
    animationName,
    createIdle,
    Jump,
    KnockOut,
    Land,
    Run,
    Slide,
    transition,
    Update,
} from "./character";
import type { CharacterEvent } from "./character";
import { defaultConfig } from "./config";
import type { CharacterConfig, DebugConfig } from "./config";
import { createRect } from "./geometry";
import { isPressed } from "./input";
import { frameName, lookupFrame } from "./sprites";
import type {
    AudioDevice,
    Key,
    KeyState,
    Player,
    Rect,
    Renderer,
    Sound,
    SpriteFrame,
    SpriteSheet,
} from "./types";

export const createPlayer = (
    sheet: SpriteSheet,
    audio: AudioDevice,
    jumpSound: Sound,
    config: CharacterConfig = defaultConfig.character,
): Player => ({
    state: createIdle(audio, jumpSound, config),
    sheet,
});

const withEvent = (player: Player, event: CharacterEvent): Player => {
    const state = transition(player.state, event);
    return state === player.state ? player : { ...player, state };
};

export const runRight = (player: Player, config?: CharacterConfig): Player =>
    withEvent(player, new Run(config));

export const slide = (player: Player): Player => withEvent(player, new Slide());

export const jump = (player: Player, config?: CharacterConfig): Player =>
    withEvent(player, new Jump(config));

export const knockOut = (player: Player): Player =>
    withEvent(player, new KnockOut());

export const landOn = (
    player: Player,
    height: number,
    config?: CharacterConfig,
): Player => withEvent(player, new Land(height, config));

export const updatePlayer = (player: Player, config?: CharacterConfig): Player =>
    withEvent(player, new Update(config));

/** Key bindings, applied in this order every simulation step */
const bindings: ReadonlyArray<
    readonly [Key, (player: Player, config: CharacterConfig) => Player]
> = [
    ["ArrowDown", player => slide(player)],
    ["ArrowRight", runRight],
    ["Space", jump],
];

export const applyInput = (
    player: Player,
    keys: KeyState,
    config: CharacterConfig = defaultConfig.character,
): Player =>
    bindings.reduce(
        (current, [key, react]) =>
            isPressed(keys, key) ? react(current, config) : current,
        player,
    );

export const playerFrameName = (
    player: Player,
    config: CharacterConfig = defaultConfig.character,
): string =>
    frameName(
        animationName(player.state, config),
        player.state.context.frame,
        config.animationSpeed,
    );

/** @throws MissingFrameError when the atlas lacks the current frame */
export const currentSprite = (
    player: Player,
    config: CharacterConfig = defaultConfig.character,
): SpriteFrame => lookupFrame(player.sheet.atlas, playerFrameName(player, config));

/** Where the current sprite lands on screen */
export const destinationBox = (
    player: Player,
    config: CharacterConfig = defaultConfig.character,
): Rect => {
    const { frame, spriteSourceSize } = currentSprite(player, config);
    const { position } = player.state.context;
    return createRect(
        position.x + spriteSourceSize.x,
        position.y + spriteSourceSize.y,
        frame.width,
        frame.height,
    );
};

export const boundingBox = (
    player: Player,
    config: CharacterConfig = defaultConfig.character,
): Rect => {
    const destination = destinationBox(player, config);
    const inset = config.boundingBoxInset;
    return createRect(
        destination.x + inset.x,
        destination.y + inset.y,
        destination.width - inset.width,
        destination.height - inset.y,
    );
};

export const walkingSpeed = (player: Player): number =>
    player.state.context.velocity.x;

export const velocityY = (player: Player): number =>
    player.state.context.velocity.y;

export const positionY = (player: Player): number =>
    player.state.context.position.y;

export const drawPlayer = (
    player: Player,
    renderer: Renderer,
    config: CharacterConfig = defaultConfig.character,
    debug: DebugConfig = defaultConfig.debug,
): void => {
    const sprite = currentSprite(player, config);
    renderer.drawImage(
        player.sheet.image,
        sprite.frame,
        destinationBox(player, config),
    );
    if (debug.showBoundingBoxes) {
        renderer.drawBoundingBox(boundingBox(player, config));
    }
};
