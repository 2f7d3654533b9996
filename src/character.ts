/**
 * Character State Machine
 *
 * Each state is a `{ kind, context }` value. Transitions are typed per state
 * (only an IdleState can `run`, only a RunningState can `jump`), and the
 * gameplay events below dispatch to them. An event with no rule for the
 * current state returns that state unchanged: pressing Jump mid-air or Run
 * while already running does nothing.
 *
 * Events follow the Action interface: apply(state) -> newState.
 */

import { defaultConfig, playerHeight } from "./config";
import type { CharacterConfig } from "./config";
import type {
    Action,
    AudioDevice,
    CharacterContext,
    CharacterState,
    CharacterStateKind,
    FallingState,
    IdleState,
    JumpingState,
    KnockedOutState,
    RunningState,
    SlidingState,
    Sound,
    StateOf,
} from "./types";

const inState = <K extends CharacterStateKind>(
    kind: K,
    context: CharacterContext,
): StateOf<K> => ({ kind, context });

/**
 * Context helpers - small pure steps composed by the transitions
 */

/**
 * One physics tick: gravity clamped at terminal speed, animation frame
 * advanced (wrapping after the frame count), position clamped to the floor.
 */
const updateContext = (
    context: CharacterContext,
    frameCount: number,
    config: CharacterConfig,
): CharacterContext => {
    const velocityY = Math.min(
        context.velocity.y + config.gravity,
        config.terminalSpeed,
    );
    return {
        ...context,
        frame: context.frame < frameCount ? context.frame + 1 : 0,
        velocity: { ...context.velocity, y: velocityY },
        position: {
            ...context.position,
            y: Math.min(context.position.y + velocityY, config.floor),
        },
    };
};

const resetFrame = (context: CharacterContext): CharacterContext => ({
    ...context,
    frame: 0,
});

const fixFrame = (context: CharacterContext, frame: number): CharacterContext => ({
    ...context,
    frame,
});

const runRight = (
    context: CharacterContext,
    config: CharacterConfig,
): CharacterContext => ({
    ...context,
    velocity: { ...context.velocity, x: context.velocity.x + config.runningSpeed },
});

const setVerticalVelocity = (
    context: CharacterContext,
    y: number,
): CharacterContext => ({
    ...context,
    velocity: { ...context.velocity, y },
});

const stop = (context: CharacterContext): CharacterContext => ({
    ...context,
    velocity: { ...context.velocity, x: 0 },
});

// Stand on a surface: feet at `height`, vertical motion cancelled
const setOn = (
    context: CharacterContext,
    height: number,
    config: CharacterConfig,
): CharacterContext => ({
    ...context,
    position: { ...context.position, y: height - playerHeight(config) },
    velocity: { ...context.velocity, y: 0 },
});

/** Playback failures only cost the sound effect */
const playJumpSound = (context: CharacterContext): CharacterContext => {
    try {
        context.audio.playSound(context.jumpSound);
    } catch (err) {
        console.warn("Error playing jump sound:", err);
    }
    return context;
};

/**
 * State constructors and typed transitions
 */

export const createIdle = (
    audio: AudioDevice,
    jumpSound: Sound,
    config: CharacterConfig = defaultConfig.character,
): IdleState =>
    inState("Idle", {
        frame: 0,
        position: { x: config.startingPoint, y: config.floor },
        velocity: { x: 0, y: 0 },
        audio,
        jumpSound,
    });

const run = (state: IdleState, config: CharacterConfig): RunningState =>
    inState("Running", runRight(resetFrame(state.context), config));

const slide = (state: RunningState): SlidingState =>
    inState("Sliding", resetFrame(state.context));

const jump = (state: RunningState, config: CharacterConfig): JumpingState =>
    inState(
        "Jumping",
        playJumpSound(
            resetFrame(setVerticalVelocity(state.context, config.jumpSpeed)),
        ),
    );

const knockOut = (
    state: RunningState | JumpingState | SlidingState,
): FallingState => inState("Falling", stop(resetFrame(state.context)));

// Touching down ends the jump
const landJumping = (
    state: JumpingState,
    height: number,
    config: CharacterConfig,
): RunningState =>
    inState("Running", setOn(resetFrame(state.context), height, config));

const landInPlace = <S extends RunningState | SlidingState | KnockedOutState>(
    state: S,
    height: number,
    config: CharacterConfig,
): S => ({ ...state, context: setOn(state.context, height, config) });

const updateIdle = (state: IdleState, config: CharacterConfig): IdleState =>
    inState("Idle", updateContext(state.context, config.frameCounts.Idle, config));

const updateRunning = (
    state: RunningState,
    config: CharacterConfig,
): RunningState =>
    inState(
        "Running",
        updateContext(state.context, config.frameCounts.Running, config),
    );

const updateSliding = (
    state: SlidingState,
    config: CharacterConfig,
): SlidingState | RunningState => {
    const context = updateContext(
        state.context,
        config.frameCounts.Sliding,
        config,
    );
    return context.frame >= config.frameCounts.Sliding
        ? inState("Running", resetFrame(context))
        : inState("Sliding", context);
};

const updateJumping = (
    state: JumpingState,
    config: CharacterConfig,
): JumpingState | RunningState => {
    const context = updateContext(
        state.context,
        config.frameCounts.Jumping,
        config,
    );
    // Reaching the floor with no platform in the way lands on the ground
    return context.position.y >= config.floor
        ? landJumping(inState("Jumping", context), config.canvasHeight, config)
        : inState("Jumping", context);
};

const updateFalling = (
    state: FallingState,
    config: CharacterConfig,
): FallingState | KnockedOutState => {
    const context = updateContext(
        state.context,
        config.frameCounts.Falling,
        config,
    );
    return context.frame >= config.frameCounts.Falling
        ? inState("KnockedOut", context)
        : inState("Falling", context);
};

// Terminal pose: physics still runs, the animation holds its last frame
const updateKnockedOut = (
    state: KnockedOutState,
    config: CharacterConfig,
): KnockedOutState =>
    inState(
        "KnockedOut",
        fixFrame(
            updateContext(state.context, config.frameCounts.KnockedOut, config),
            config.frameCounts.KnockedOut - 1,
        ),
    );

/**
 * Gameplay events
 *
 * Each class is one column of the transition table. Unlisted states fall
 * through to `return state`.
 */

export class Run implements Action<CharacterState> {
    constructor(
        private readonly config: CharacterConfig = defaultConfig.character,
    ) {}
    apply(state: CharacterState): CharacterState {
        return state.kind === "Idle" ? run(state, this.config) : state;
    }
}

export class Slide implements Action<CharacterState> {
    apply(state: CharacterState): CharacterState {
        return state.kind === "Running" ? slide(state) : state;
    }
}

export class Jump implements Action<CharacterState> {
    constructor(
        private readonly config: CharacterConfig = defaultConfig.character,
    ) {}
    apply(state: CharacterState): CharacterState {
        return state.kind === "Running" ? jump(state, this.config) : state;
    }
}

export class KnockOut implements Action<CharacterState> {
    apply(state: CharacterState): CharacterState {
        switch (state.kind) {
            case "Running":
            case "Jumping":
            case "Sliding":
                return knockOut(state);
            default:
                return state;
        }
    }
}

export class Land implements Action<CharacterState> {
    constructor(
        readonly height: number,
        private readonly config: CharacterConfig = defaultConfig.character,
    ) {}
    apply(state: CharacterState): CharacterState {
        switch (state.kind) {
            case "Jumping":
                return landJumping(state, this.height, this.config);
            case "Running":
            case "Sliding":
            case "KnockedOut":
                return landInPlace(state, this.height, this.config);
            default:
                return state;
        }
    }
}

export class Update implements Action<CharacterState> {
    constructor(
        private readonly config: CharacterConfig = defaultConfig.character,
    ) {}
    apply(state: CharacterState): CharacterState {
        switch (state.kind) {
            case "Idle":
                return updateIdle(state, this.config);
            case "Running":
                return updateRunning(state, this.config);
            case "Sliding":
                return updateSliding(state, this.config);
            case "Jumping":
                return updateJumping(state, this.config);
            case "Falling":
                return updateFalling(state, this.config);
            case "KnockedOut":
                return updateKnockedOut(state, this.config);
        }
    }
}

export type CharacterEvent = Run | Slide | Jump | KnockOut | Land | Update;

export const transition = (
    state: CharacterState,
    event: CharacterEvent,
): CharacterState => event.apply(state);

/** Animation displayed for the current state */
export const animationName = (
    state: CharacterState,
    config: CharacterConfig = defaultConfig.character,
): string => config.animationNames[state.kind];
