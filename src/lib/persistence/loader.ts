/**
 * Capsule loader - reads an exported JSON sidecar and its PNG back into a capsule
 *
 * The image sits beside the sidecar with a `.png` extension. The raster is
 * rehashed on load; a record whose hash or capsule id no longer matches the
 * pixels is rejected.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import { z } from "zod";
import { SymbolCapsule } from "../../engine/capsule.js";
import { ExportError, MetadataError } from "../../engine/errors.js";
import { FALLBACK_VALIDATOR_NAME } from "../../engine/forge.js";
import { metadataProblems, withMetadata } from "../../engine/metadata.js";
import { SYMBOL_KINDS, validationResult } from "../../engine/types.js";
import { computeCanonicalHash } from "../hash/canonicalHash.js";
import { readRaster } from "../raster/io.js";

const provenanceSchema = z.object({
    sourceImage: z.string(),
    method: z.enum(["Raw", "Binarized", "Skeletonized", "Custom"]),
    validationDate: z.string(),
    validatedBy: z.string(),
    notes: z.string().optional(),
});

const metadataSchema = z.object({
    templateName: z.string(),
    generatedBy: z.string(),
    generatedOn: z.string(),
    symbolKind: z.enum(SYMBOL_KINDS),
    templateHash: z.string(),
    capsuleId: z.string(),
    generationSeed: z.number().int().optional(),
    morphLineage: z.string().optional(),
    interpolationFactor: z.number().optional(),
    derivedFrom: z.string().optional(),
    provenance: provenanceSchema,
});

const metricsSchema = z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    aspectRatio: z.number(),
    density: z.number(),
    densityFraction: z.number(),
    densityStatus: z.enum(["Unknown", "Valid", "TooHigh", "TooLow"]),
});

export const capsuleDocumentSchema = z.object({
    metadata: metadataSchema,
    isValid: z.boolean().optional(),
    metrics: metricsSchema,
    validationResults: z
        .array(
            z.object({
                isValid: z.boolean(),
                validatorName: z.string(),
                failureMessage: z.string().optional(),
            })
        )
        .default([]),
});

export type CapsuleDocument = z.infer<typeof capsuleDocumentSchema>;

export function imagePathFor(metadataPath: string): string {
    return join(dirname(metadataPath), `${basename(metadataPath, extname(metadataPath))}.png`);
}

async function readDocument(metadataPath: string): Promise<CapsuleDocument> {
    let json: unknown;
    try {
        json = JSON.parse(await readFile(metadataPath, "utf-8"));
    } catch (error) {
        throw new ExportError(
            `Cannot read capsule sidecar ${metadataPath}: ${error instanceof Error ? error.message : "Unknown error"}`,
            { cause: error }
        );
    }
    const parsed = capsuleDocumentSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ExportError(`Capsule sidecar ${metadataPath} is malformed: ${issues.join("; ")}.`);
    }
    return parsed.data;
}

/**
 * Load a capsule exported by `exportCapsule`. Sidecars without an `isValid`
 * flag take the AND of their validator results.
 */
export async function loadCapsule(metadataPath: string): Promise<SymbolCapsule> {
    const document = await readDocument(metadataPath);
    const metadata = withMetadata(document.metadata, {});

    const problems = metadataProblems(metadata);
    if (problems.length > 0) {
        throw new MetadataError(`Capsule metadata is incomplete: ${problems.join("; ")}.`);
    }

    const imagePath = imagePathFor(metadataPath);
    if (!existsSync(imagePath)) {
        throw new ExportError(`Capsule image not found beside sidecar: ${imagePath}`);
    }
    const raster = await readRaster(imagePath);

    const hash = computeCanonicalHash(raster);
    if (hash !== metadata.templateHash) {
        raster.dispose();
        throw new MetadataError(
            `Capsule ${metadata.capsuleId} image hash ${hash.slice(0, 8)} does not match recorded ${metadata.templateHash.slice(0, 8)}.`
        );
    }

    const results = document.validationResults.map((r) => validationResult(r.isValid, r.validatorName, r.failureMessage));
    return new SymbolCapsule({
        raster,
        metadata,
        metrics: document.metrics,
        isValid: document.isValid ?? results.every((r) => r.isValid),
        validationResults: results,
        isFallback: results.some((r) => r.validatorName === FALLBACK_VALIDATOR_NAME),
    });
}
