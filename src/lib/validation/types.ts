import type { QualityMetrics, ValidationResult } from "../../engine/types.js";
import type { Raster } from "../raster/raster.js";

/**
 * What a validator is allowed to see of a capsule under construction.
 */
export interface CapsuleView {
    readonly raster: Raster | null | undefined;
}

/**
 * A quality check. Implementations must not throw for missing or empty
 * input and may write to `metrics` for later validators to read.
 */
export interface Validator {
    readonly name: string;
    validate(capsule: CapsuleView | null | undefined, metrics: QualityMetrics): ValidationResult;
}

/**
 * Raster behind a capsule view, or the reason there is none.
 */
export function resolveRaster(capsule: CapsuleView | null | undefined): Raster | string {
    if (!capsule || !capsule.raster) {
        return "Capsule or its image cannot be null.";
    }
    if (capsule.raster.isDisposed) {
        return "Capsule image has been disposed.";
    }
    return capsule.raster;
}
