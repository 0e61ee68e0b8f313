/**
 * Contrast validator - both ink and background must cover at least 10%
 */

import { validationResult, type QualityMetrics, type ValidationResult } from "../../engine/types.js";
import { countInk } from "../raster/pixel.js";
import { resolveRaster, type CapsuleView, type Validator } from "./types.js";

export const CONTRAST_VALIDATOR_NAME = "Contrast Validator";
export const MIN_CLASS_RATIO = 0.1;

export class ContrastValidator implements Validator {
    readonly name = CONTRAST_VALIDATOR_NAME;

    validate(capsule: CapsuleView | null | undefined, _metrics: QualityMetrics): ValidationResult {
        const raster = resolveRaster(capsule);
        if (typeof raster === "string") {
            return validationResult(false, this.name, raster);
        }
        if (raster.pixelCount === 0) {
            return validationResult(false, this.name, "Image has zero pixels.");
        }

        const darkRatio = countInk(raster) / raster.pixelCount;
        const lightRatio = 1 - darkRatio;
        const threshold = `${(MIN_CLASS_RATIO * 100).toFixed(1)}%`;

        if (darkRatio < MIN_CLASS_RATIO) {
            return validationResult(
                false,
                this.name,
                `Image lacks dark pixels. Dark pixel ratio (${(darkRatio * 100).toFixed(1)}%) is below the required threshold of ${threshold}.`
            );
        }
        if (lightRatio < MIN_CLASS_RATIO) {
            return validationResult(
                false,
                this.name,
                `Image lacks light pixels. Light pixel ratio (${(lightRatio * 100).toFixed(1)}%) is below the required threshold of ${threshold}.`
            );
        }
        return validationResult(true, this.name);
    }
}
