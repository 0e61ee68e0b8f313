/**
 * Request and result types shared by the forge, validators and tools.
 */

import type { BlendMode } from "../lib/raster/blend.js";
import type { Dimensions } from "../lib/raster/raster.js";

export const SYMBOL_KINDS = ["Flat", "Sharp", "Natural", "DoubleSharp", "Treble", "Bass"] as const;
export type SymbolKind = (typeof SYMBOL_KINDS)[number];

export const OUTPUT_FORMS = ["Raw", "Binarized", "Skeletonized"] as const;
export type OutputForm = (typeof OUTPUT_FORMS)[number];

export const EDGE_CASE_KINDS = ["Rotated", "Clipped", "InkBleed"] as const;
export type EdgeCaseKind = (typeof EDGE_CASE_KINDS)[number];

export type PreprocessingMethod = OutputForm | "Custom";

export type DensityStatus = "Unknown" | "Valid" | "TooHigh" | "TooLow";

export interface ValidatorOverride {
    overridden: boolean;
    reason: string;
}

export interface SymbolRequest {
    kind: SymbolKind;
    /** First entry is the primary size; the rest are size variants. */
    dimensions: Dimensions[];
    outputForms: OutputForm[];
    seed?: number;
    edgeCases?: EdgeCaseKind[];
    /** Keyed by validator name. */
    overrides?: Record<string, ValidatorOverride>;
}

export interface MorphRequest {
    kind: SymbolKind;
    fromStyle: string;
    toStyle: string;
    interpolationFactor: number;
    blendMode?: BlendMode;
}

export interface QualityMetrics {
    width: number;
    height: number;
    aspectRatio: number;
    /** Ink density as a percentage, 0-100. */
    density: number;
    densityFraction: number;
    densityStatus: DensityStatus;
}

export interface ValidationResult {
    readonly isValid: boolean;
    readonly validatorName: string;
    readonly failureMessage?: string;
}

export function validationResult(isValid: boolean, validatorName: string, failureMessage?: string): ValidationResult {
    return Object.freeze(
        failureMessage === undefined ? { isValid, validatorName } : { isValid, validatorName, failureMessage }
    );
}

export function createMetrics(dimensions: Dimensions): QualityMetrics {
    return {
        width: dimensions.width,
        height: dimensions.height,
        aspectRatio: dimensions.height / dimensions.width,
        density: 0,
        densityFraction: 0,
        densityStatus: "Unknown",
    };
}
