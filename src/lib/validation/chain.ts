/**
 * Validator chain with audited overrides
 */

import {
    validationResult,
    type QualityMetrics,
    type ValidationResult,
    type ValidatorOverride,
} from "../../engine/types.js";
import { createLogger, type Logger } from "../logger.js";
import { ContrastValidator } from "./contrast.js";
import { DensityValidator, type DensityThresholds } from "./density.js";
import { StructureValidator } from "./structure.js";
import type { CapsuleView, Validator } from "./types.js";

export interface ChainOutcome {
    isValid: boolean;
    results: ValidationResult[];
}

export const OVERRIDE_PREFIX = "Overridden:";

export class ValidatorChain {
    private readonly logger: Logger;

    constructor(
        readonly validators: readonly Validator[],
        logger?: Logger
    ) {
        this.logger = logger ?? createLogger("validation");
    }

    get names(): string[] {
        return this.validators.map((v) => v.name);
    }

    /**
     * Runs each validator in order. An overridden validator is not executed;
     * it contributes a passing result carrying the override reason instead.
     */
    run(
        capsule: CapsuleView | null | undefined,
        metrics: QualityMetrics,
        overrides: Record<string, ValidatorOverride> = {}
    ): ChainOutcome {
        const results: ValidationResult[] = [];
        let isValid = true;

        for (const validator of this.validators) {
            const override = overrides[validator.name];
            if (override?.overridden) {
                this.logger.warn(`Validator overridden: ${validator.name}`, { reason: override.reason });
                results.push(validationResult(true, validator.name, `${OVERRIDE_PREFIX} ${override.reason}`));
                continue;
            }
            const result = validator.validate(capsule, metrics);
            results.push(result);
            isValid = isValid && result.isValid;
        }

        return { isValid, results };
    }
}

export function createDefaultValidators(thresholds?: DensityThresholds): Validator[] {
    return [new DensityValidator(thresholds), new ContrastValidator(), new StructureValidator()];
}
