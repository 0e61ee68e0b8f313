/**
 * Structure validator
 *
 * Only rejects a missing capsule. Hollow glyphs (a flat's bowl, an empty
 * notehead) are legitimate, so there is no centre-pixel rule here.
 */

import { validationResult, type QualityMetrics, type ValidationResult } from "../../engine/types.js";
import type { CapsuleView, Validator } from "./types.js";

export const STRUCTURE_VALIDATOR_NAME = "Structure Validator";

export class StructureValidator implements Validator {
    readonly name = STRUCTURE_VALIDATOR_NAME;

    validate(capsule: CapsuleView | null | undefined, _metrics: QualityMetrics): ValidationResult {
        if (!capsule) {
            return validationResult(false, this.name, "Capsule cannot be null.");
        }
        return validationResult(true, this.name);
    }
}
