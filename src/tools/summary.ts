/**
 * JSON-safe view of a capsule for tool responses
 */

import type { SymbolCapsule } from "../engine/capsule.js";
import type { PreprocessingMethod, QualityMetrics, ValidationResult } from "../engine/types.js";

export interface CapsuleSummary {
    capsuleId: string;
    templateName: string;
    templateHash: string;
    isValid: boolean;
    isFallback: boolean;
    method: PreprocessingMethod;
    metrics: QualityMetrics;
    validationResults: ValidationResult[];
    derivedFrom?: string;
    morphLineage?: string;
}

export function summarizeCapsule(capsule: SymbolCapsule): CapsuleSummary {
    const { metadata } = capsule;
    return {
        capsuleId: metadata.capsuleId,
        templateName: metadata.templateName,
        templateHash: metadata.templateHash,
        isValid: capsule.isValid,
        isFallback: capsule.isFallback,
        method: metadata.provenance.method,
        metrics: { ...capsule.metrics },
        validationResults: [...capsule.validationResults],
        ...(metadata.derivedFrom !== undefined && { derivedFrom: metadata.derivedFrom }),
        ...(metadata.morphLineage !== undefined && { morphLineage: metadata.morphLineage }),
    };
}
