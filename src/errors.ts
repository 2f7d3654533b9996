/**
 * Error types raised by the runner.
 *
 * State-machine transitions never throw; everything here is either an
 * initialization failure or a content/atlas mismatch.
 */

/** The sprite-atlas descriptor did not have the expected shape */
export class AtlasFormatError extends Error {
    override readonly name = "AtlasFormatError";
}

/** An expected frame name is absent from an atlas */
export class MissingFrameError extends Error {
    override readonly name = "MissingFrameError";

    constructor(readonly frameName: string) {
        super(`Sprite frame not found in atlas: ${frameName}`);
    }
}

/** One or more assets failed to load or parse during initialization */
export class AssetLoadError extends AggregateError {
    override readonly name = "AssetLoadError";

    constructor(errors: ReadonlyArray<unknown>) {
        super(
            errors,
            `Failed to load ${errors.length} asset${errors.length === 1 ? "" : "s"}`,
        );
    }
}

/** Sessions are one-shot; a loaded session cannot be initialized again */
export class AlreadyInitializedError extends Error {
    override readonly name = "AlreadyInitializedError";

    constructor() {
        super("Game is already initialized");
    }
}

export class ConfigError extends Error {
    override readonly name = "ConfigError";
}
