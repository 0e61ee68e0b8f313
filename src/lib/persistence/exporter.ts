/**
 * Capsule export - lossless PNG plus a JSON sidecar
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { SymbolCapsule } from "../../engine/capsule.js";
import { ExportError } from "../../engine/errors.js";
import { metadataProblems } from "../../engine/metadata.js";
import type { OutputForm } from "../../engine/types.js";
import { writePng } from "../raster/io.js";

export interface ExportedCapsule {
    imagePath: string;
    metadataPath: string;
}

/**
 * `{capsuleId}-{form}` in lower case. The id carries the hash prefix, so
 * capsules sharing a template name never overwrite each other.
 */
export function exportBaseName(capsuleId: string, form: OutputForm): string {
    return `${capsuleId}-${form}`.toLowerCase();
}

export function capsuleDocument(capsule: SymbolCapsule) {
    return {
        metadata: capsule.metadata,
        isValid: capsule.isValid,
        metrics: capsule.metrics,
        validationResults: capsule.validationResults,
    };
}

export async function exportCapsule(capsule: SymbolCapsule, directory: string, form: OutputForm): Promise<ExportedCapsule> {
    if (capsule.isDisposed) {
        throw new ExportError(`Cannot export disposed capsule ${capsule.capsuleId}.`);
    }
    const problems = metadataProblems(capsule.metadata);
    if (problems.length > 0) {
        throw new ExportError(`Capsule metadata is incomplete: ${problems.join("; ")}.`);
    }

    const base = exportBaseName(capsule.capsuleId, form);
    const imagePath = join(directory, `${base}.png`);
    const metadataPath = join(directory, `${base}.json`);

    try {
        await mkdir(directory, { recursive: true });
        await writePng(capsule.raster, imagePath);
        await writeFile(metadataPath, JSON.stringify(capsuleDocument(capsule), null, 2), "utf-8");
    } catch (error) {
        throw new ExportError(
            `Failed to write capsule ${capsule.capsuleId}: ${error instanceof Error ? error.message : "Unknown error"}`,
            { cause: error }
        );
    }
    return { imagePath, metadataPath };
}
