/**
 * Capsule ownership model
 *
 * A capsule owns its raster outright. Disposing a capsule releases the raster;
 * disposing a set releases the primary and every variant.
 */

import type { Raster } from "../lib/raster/raster.js";
import type { CapsuleView } from "../lib/validation/types.js";
import type { TemplateMetadata } from "./metadata.js";
import type { QualityMetrics, ValidationResult } from "./types.js";

export interface CapsuleInit {
    raster: Raster;
    metadata: TemplateMetadata;
    metrics: QualityMetrics;
    isValid: boolean;
    validationResults: ValidationResult[];
    isFallback?: boolean;
}

export class SymbolCapsule implements CapsuleView {
    readonly metadata: TemplateMetadata;
    readonly metrics: QualityMetrics;
    readonly isValid: boolean;
    readonly validationResults: readonly ValidationResult[];
    readonly isFallback: boolean;
    private readonly image: Raster;

    constructor(init: CapsuleInit) {
        this.image = init.raster;
        this.metadata = init.metadata;
        this.metrics = init.metrics;
        this.isValid = init.isValid;
        this.validationResults = Object.freeze([...init.validationResults]);
        this.isFallback = init.isFallback ?? false;
    }

    get raster(): Raster {
        return this.image;
    }

    get capsuleId(): string {
        return this.metadata.capsuleId;
    }

    get isDisposed(): boolean {
        return this.image.isDisposed;
    }

    dispose(): void {
        this.image.dispose();
    }
}

export class SymbolCapsuleSet {
    readonly primary: SymbolCapsule;
    /** Size variants in request order, then edge-case derivatives. */
    readonly variants: readonly SymbolCapsule[];

    constructor(primary: SymbolCapsule, variants: SymbolCapsule[] = []) {
        this.primary = primary;
        this.variants = Object.freeze([...variants]);
    }

    get all(): SymbolCapsule[] {
        return [this.primary, ...this.variants];
    }

    dispose(): void {
        for (const capsule of this.all) {
            capsule.dispose();
        }
    }
}

export function disposeAll(capsules: Iterable<SymbolCapsule>): void {
    for (const capsule of capsules) {
        capsule.dispose();
    }
}
