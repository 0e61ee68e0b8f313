/**
 * Template metadata
 *
 * Records are frozen. Every change goes through `withMetadata`, which returns
 * a patched copy; `finalizeMetadata` sets the hash and capsule id last.
 */

import { capsuleIdFor } from "../lib/hash/canonicalHash.js";
import { MetadataError } from "./errors.js";
import type { PreprocessingMethod, SymbolKind } from "./types.js";

export const PENDING_HASH = "pending-computation";

export interface Provenance {
    readonly sourceImage: string;
    readonly method: PreprocessingMethod;
    readonly validationDate: string;
    readonly validatedBy: string;
    readonly notes?: string;
}

export interface TemplateMetadata {
    readonly templateName: string;
    readonly generatedBy: string;
    readonly generatedOn: string;
    readonly symbolKind: SymbolKind;
    readonly templateHash: string;
    readonly capsuleId: string;
    readonly generationSeed?: number;
    readonly morphLineage?: string;
    readonly interpolationFactor?: number;
    readonly derivedFrom?: string;
    readonly provenance: Provenance;
}

export type MetadataPatch = Partial<Omit<TemplateMetadata, "provenance">> & {
    provenance?: Partial<Provenance>;
};

export interface BaseMetadataInput {
    templateName: string;
    generatedBy: string;
    symbolKind: SymbolKind;
    generatedOn: Date;
    provenance: Provenance;
    generationSeed?: number;
    morphLineage?: string;
    interpolationFactor?: number;
}

function freeze(metadata: TemplateMetadata): TemplateMetadata {
    Object.freeze(metadata.provenance);
    return Object.freeze(metadata);
}

/**
 * Base template with a pending hash. The capsule id is empty until finalized.
 */
export function createTemplateMetadata(input: BaseMetadataInput): TemplateMetadata {
    if (input.templateName.trim() === "") {
        throw new MetadataError("TemplateName is required.");
    }
    const metadata: TemplateMetadata = {
        templateName: input.templateName,
        generatedBy: input.generatedBy,
        generatedOn: input.generatedOn.toISOString(),
        symbolKind: input.symbolKind,
        templateHash: PENDING_HASH,
        capsuleId: "",
        provenance: { ...input.provenance },
        ...(input.generationSeed !== undefined && { generationSeed: input.generationSeed }),
        ...(input.morphLineage !== undefined && { morphLineage: input.morphLineage }),
        ...(input.interpolationFactor !== undefined && { interpolationFactor: input.interpolationFactor }),
    };
    return freeze(metadata);
}

export function withMetadata(base: TemplateMetadata, patch: MetadataPatch): TemplateMetadata {
    const { provenance, ...fields } = patch;
    return freeze({
        ...base,
        ...fields,
        provenance: { ...base.provenance, ...provenance },
    });
}

export function finalizeMetadata(base: TemplateMetadata, hash: string): TemplateMetadata {
    return withMetadata(base, {
        templateHash: hash,
        capsuleId: capsuleIdFor(base.templateName, hash),
    });
}

/**
 * Everything that stops a record from being exported. Empty when complete.
 */
export function metadataProblems(metadata: TemplateMetadata): string[] {
    const problems: string[] = [];
    if (!metadata.templateName.trim()) problems.push("TemplateName is required");
    if (!metadata.generatedBy.trim()) problems.push("GeneratedBy is required");
    if (!metadata.templateHash || metadata.templateHash === PENDING_HASH) {
        problems.push("TemplateHash has not been computed");
    } else if (metadata.capsuleId !== capsuleIdFor(metadata.templateName, metadata.templateHash)) {
        problems.push("CapsuleId does not match TemplateName and TemplateHash");
    }
    if (!metadata.provenance.sourceImage.trim()) problems.push("Provenance.SourceImage is required");
    if (!metadata.provenance.validatedBy.trim()) problems.push("Provenance.ValidatedBy is required");
    return problems;
}
