/**
 * Forge error taxonomy
 *
 * Every error raised by the engine carries a stable `ERROR-GF-NN` code at the
 * front of its message. The MCP layer returns these as error text and treats
 * anything else as an internal failure.
 */

export type ForgeErrorCode =
    | "ERROR-GF-01"
    | "ERROR-GF-02"
    | "ERROR-GF-03"
    | "ERROR-GF-04"
    | "ERROR-GF-05"
    | "ERROR-GF-06"
    | "ERROR-GF-07"
    | "ERROR-GF-08"
    | "ERROR-GF-09";

export class ForgeError extends Error {
    readonly code: ForgeErrorCode;

    constructor(code: ForgeErrorCode, message: string, options?: { cause?: unknown }) {
        super(`${code}: ${message}`, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class InvalidDimensionsError extends ForgeError {
    constructor(width: number, height: number, detail = "width and height must be positive integers") {
        super("ERROR-GF-01", `Invalid dimensions ${width}x${height}: ${detail}.`);
    }
}

export class DimensionMismatchError extends ForgeError {
    constructor(a: { width: number; height: number }, b: { width: number; height: number }) {
        super("ERROR-GF-02", `Raster dimensions differ: ${a.width}x${a.height} vs ${b.width}x${b.height}.`);
    }
}

export class MissingInputError extends ForgeError {
    constructor(what: string) {
        super("ERROR-GF-03", `Missing input: ${what}.`);
    }
}

export class OutOfRangeError extends ForgeError {
    constructor(name: string, value: number, min = 0, max = 1) {
        super("ERROR-GF-04", `${name} must be within [${min}, ${max}], got ${value}.`);
    }
}

export class SourceNotFoundError extends ForgeError {
    readonly path: string;

    constructor(path: string, options?: { cause?: unknown }) {
        super("ERROR-GF-05", `Morph source raster not found: ${path}`, options);
        this.path = path;
    }
}

export class RasterDisposedError extends ForgeError {
    constructor() {
        super("ERROR-GF-06", "Raster has been disposed.");
    }
}

export class MetadataError extends ForgeError {
    constructor(message: string) {
        super("ERROR-GF-07", message);
    }
}

export class ExportError extends ForgeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("ERROR-GF-08", message, options);
    }
}

export class ConfigError extends ForgeError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super("ERROR-GF-09", `Invalid configuration: ${issues.join("; ")}`);
        this.issues = issues;
    }
}

/**
 * True when the error is one the engine raised on purpose.
 */
export function isForgeError(error: unknown): error is ForgeError {
    return error instanceof ForgeError;
}
