/**
 * Density validator - ink pixels over total pixels, inclusive bounds
 */

import { validationResult, type QualityMetrics, type ValidationResult } from "../../engine/types.js";
import { countInk } from "../raster/pixel.js";
import { resolveRaster, type CapsuleView, type Validator } from "./types.js";

export const DENSITY_VALIDATOR_NAME = "Density Validator";

export interface DensityThresholds {
    min: number;
    max: number;
}

export const DEFAULT_DENSITY_THRESHOLDS: DensityThresholds = { min: 0.05, max: 0.12 };

function percent(fraction: number): string {
    return `${Number((fraction * 100).toFixed(2))}%`;
}

export class DensityValidator implements Validator {
    readonly name = DENSITY_VALIDATOR_NAME;

    constructor(private readonly thresholds: DensityThresholds = DEFAULT_DENSITY_THRESHOLDS) {}

    validate(capsule: CapsuleView | null | undefined, metrics: QualityMetrics): ValidationResult {
        const raster = resolveRaster(capsule);
        if (typeof raster === "string") {
            metrics.density = 0;
            metrics.densityFraction = 0;
            metrics.densityStatus = "Unknown";
            return validationResult(false, this.name, raster);
        }

        const total = raster.pixelCount;
        const ink = countInk(raster);
        const fraction = total === 0 ? 0 : ink / total;
        metrics.densityFraction = fraction;
        metrics.density = fraction * 100;

        if (total === 0) {
            metrics.densityStatus = "TooLow";
            return validationResult(false, this.name, "Image has zero pixels.");
        }
        if (ink === 0) {
            metrics.densityStatus = "TooLow";
            return validationResult(false, this.name, "Image is completely white.");
        }

        const { min, max } = this.thresholds;
        if (fraction < min) {
            metrics.densityStatus = "TooLow";
            return validationResult(
                false,
                this.name,
                `Density of ${metrics.density.toFixed(2)}% is below the ${percent(min)} threshold.`
            );
        }
        if (fraction > max) {
            metrics.densityStatus = "TooHigh";
            return validationResult(
                false,
                this.name,
                `Density of ${metrics.density.toFixed(2)}% is above the ${percent(max)} threshold.`
            );
        }

        metrics.densityStatus = "Valid";
        return validationResult(true, this.name);
    }
}
