/**
 * Symbol forge
 *
 * Per requested size: generator lookup, raw generation, binarize,
 * optional skeletonize, validator chain, hash, finalize. The primary size is
 * built first, then size variants, then edge-case derivatives of the finished
 * primary. If anything throws, every capsule built for the request is
 * disposed before the error reaches the caller.
 */

import { computeCanonicalHash } from "../lib/hash/canonicalHash.js";
import type { GeneratorRegistry } from "../lib/glyphs/registry.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { blend } from "../lib/raster/blend.js";
import { binarize, BACKGROUND } from "../lib/raster/pixel.js";
import { assertDimensions, Raster, type Dimensions } from "../lib/raster/raster.js";
import { skeletonize } from "../lib/raster/skeletonize.js";
import type { ValidatorChain } from "../lib/validation/chain.js";
import { disposeAll, SymbolCapsule, SymbolCapsuleSet } from "./capsule.js";
import { applyEdgeCase, edgeCaseTemplateName } from "./edgeCases.js";
import { InvalidDimensionsError, OutOfRangeError } from "./errors.js";
import { createTemplateMetadata, finalizeMetadata, withMetadata, type TemplateMetadata } from "./metadata.js";
import type { SourceRasterLoader } from "./morph.js";
import {
    createMetrics,
    validationResult,
    type EdgeCaseKind,
    type MorphRequest,
    type OutputForm,
    type SymbolKind,
    type SymbolRequest,
} from "./types.js";

export const FALLBACK_VALIDATOR_NAME = "FallbackHandler";

export interface ForgeDependencies {
    generators: GeneratorRegistry;
    validators: ValidatorChain;
    sources: SourceRasterLoader;
    version: string;
    logger?: Logger;
    clock?: () => Date;
}

export interface ForgeCallOptions {
    signal?: AbortSignal;
}

/**
 * Skeletonized wins over Binarized, Binarized over Raw. No forms means Binarized.
 */
export function resolveOutputForm(forms: readonly OutputForm[]): OutputForm {
    if (forms.includes("Skeletonized")) return "Skeletonized";
    if (forms.includes("Binarized") || forms.length === 0) return "Binarized";
    return "Raw";
}

export class SymbolForge {
    private readonly logger: Logger;
    private readonly clock: () => Date;

    constructor(private readonly deps: ForgeDependencies) {
        this.logger = deps.logger ?? createLogger("forge");
        this.clock = deps.clock ?? (() => new Date());
    }

    get generatedBy(): string {
        return `GlyphForge v${this.deps.version}`;
    }

    get validatorNames(): string[] {
        return this.deps.validators.names;
    }

    get registeredKinds(): SymbolKind[] {
        return this.deps.generators.kinds();
    }

    hasGenerator(kind: SymbolKind): boolean {
        return this.deps.generators.has(kind);
    }

    generate(request: SymbolRequest, options: ForgeCallOptions = {}): SymbolCapsuleSet {
        const { signal } = options;
        validateDimensions(request.dimensions);

        const built: SymbolCapsule[] = [];
        try {
            for (const dimensions of request.dimensions) {
                signal?.throwIfAborted();
                built.push(this.buildCapsule(request, dimensions, signal));
            }

            const primary = built[0];
            for (const kind of request.edgeCases ?? []) {
                signal?.throwIfAborted();
                if (primary.isFallback) {
                    this.logger.warn(`Skipping edge case ${kind} for fallback capsule`, { capsuleId: primary.capsuleId });
                    continue;
                }
                built.push(this.deriveEdgeCase(primary, kind));
            }

            this.logger.debug("Generated capsule set", {
                primary: primary.capsuleId,
                variants: built.length - 1,
            });
            return new SymbolCapsuleSet(primary, built.slice(1));
        } catch (error) {
            disposeAll(built);
            throw error;
        }
    }

    async morph(request: MorphRequest, options: ForgeCallOptions = {}): Promise<SymbolCapsule> {
        const { signal } = options;
        const factor = request.interpolationFactor;
        if (!(factor >= 0 && factor <= 1)) {
            throw new OutOfRangeError("interpolationFactor", factor);
        }
        signal?.throwIfAborted();

        const [from, to] = await this.loadSources(request, signal);
        const blended = blendSources(request, from, to, signal);

        try {
            const { kind, fromStyle, toStyle } = request;
            const base = createTemplateMetadata({
                templateName: `${kind}_morph_${fromStyle}_to_${toStyle}`,
                generatedBy: this.generatedBy,
                symbolKind: kind,
                generatedOn: this.clock(),
                morphLineage: `${kind}:${fromStyle} -> ${kind}:${toStyle}`,
                interpolationFactor: factor,
                provenance: {
                    sourceImage: `${fromStyle} + ${toStyle}`,
                    method: "Custom",
                    validationDate: this.clock().toISOString(),
                    validatedBy: this.validatorNames.join(", "),
                    notes: `Morphed interpolation (factor: ${factor}, mode: ${request.blendMode ?? "linear"})`,
                },
            });
            return this.finish(blended, base, {});
        } catch (error) {
            blended.dispose();
            throw error;
        }
    }

    private async loadSources(request: MorphRequest, signal?: AbortSignal): Promise<[Raster, Raster]> {
        const { sources } = this.deps;
        const settled = await Promise.allSettled([
            sources.load(request.kind, request.fromStyle, signal),
            sources.load(request.kind, request.toStyle, signal),
        ]);
        const [from, to] = settled;
        if (from.status === "fulfilled" && to.status === "fulfilled") {
            return [from.value, to.value];
        }
        for (const outcome of settled) {
            if (outcome.status === "fulfilled") outcome.value.dispose();
        }
        const reasons = settled.flatMap((outcome) => (outcome.status === "rejected" ? [outcome.reason] : []));
        throw reasons[0];
    }

    private buildCapsule(request: SymbolRequest, dimensions: Dimensions, signal?: AbortSignal): SymbolCapsule {
        const generator = this.deps.generators.get(request.kind);
        if (!generator) {
            return this.buildFallback(request, dimensions);
        }

        const form = resolveOutputForm(request.outputForms);
        const raw = generator.generateRaw(dimensions, request.seed);
        const output = toOutputForm(raw, form, signal);

        try {
            const base = createTemplateMetadata({
                templateName: `${request.kind}_${dimensions.width}x${dimensions.height}`,
                generatedBy: this.generatedBy,
                symbolKind: request.kind,
                generatedOn: this.clock(),
                generationSeed: request.seed,
                provenance: {
                    sourceImage: "synthetic-generation",
                    method: form,
                    validationDate: this.clock().toISOString(),
                    validatedBy: this.validatorNames.join(", "),
                    notes: `Synthetically generated ${request.kind} symbol`,
                },
            });
            return this.finish(output, base, request.overrides ?? {});
        } catch (error) {
            output.dispose();
            throw error;
        }
    }

    private finish(
        raster: Raster,
        base: TemplateMetadata,
        overrides: NonNullable<SymbolRequest["overrides"]>
    ): SymbolCapsule {
        const metrics = createMetrics(raster);
        const outcome = this.deps.validators.run({ raster }, metrics, overrides);
        return new SymbolCapsule({
            raster,
            metadata: finalizeMetadata(base, computeCanonicalHash(raster)),
            metrics,
            isValid: outcome.isValid,
            validationResults: outcome.results,
        });
    }

    private buildFallback(request: SymbolRequest, dimensions: Dimensions): SymbolCapsule {
        const reason = `Generator not found for symbol kind '${request.kind}'.`;
        this.logger.warn(reason, { width: dimensions.width, height: dimensions.height });

        const raster = Raster.filled(dimensions.width, dimensions.height, BACKGROUND);
        const base = createTemplateMetadata({
            templateName: `${request.kind}-fallback`,
            generatedBy: this.generatedBy,
            symbolKind: request.kind,
            generatedOn: this.clock(),
            generationSeed: request.seed,
            provenance: {
                sourceImage: "fallback-generation",
                method: "Raw",
                validationDate: this.clock().toISOString(),
                validatedBy: FALLBACK_VALIDATOR_NAME,
                notes: reason,
            },
        });
        return new SymbolCapsule({
            raster,
            metadata: finalizeMetadata(base, computeCanonicalHash(raster)),
            metrics: createMetrics(dimensions),
            isValid: false,
            validationResults: [validationResult(false, FALLBACK_VALIDATOR_NAME, reason)],
            isFallback: true,
        });
    }

    private deriveEdgeCase(primary: SymbolCapsule, kind: EdgeCaseKind): SymbolCapsule {
        const raster = applyEdgeCase(primary.raster, kind);
        const patched = withMetadata(primary.metadata, {
            templateName: edgeCaseTemplateName(primary.metadata.templateName, kind),
            derivedFrom: primary.capsuleId,
            provenance: { notes: `Edge case ${kind} derived from ${primary.capsuleId}` },
        });
        return new SymbolCapsule({
            raster,
            metadata: finalizeMetadata(patched, computeCanonicalHash(raster)),
            metrics: createMetrics(raster),
            isValid: primary.isValid,
            validationResults: [],
        });
    }
}

function validateDimensions(dimensions: readonly Dimensions[]): void {
    if (dimensions.length === 0) {
        throw new InvalidDimensionsError(0, 0, "at least one target size is required");
    }
    for (const { width, height } of dimensions) {
        assertDimensions(width, height);
    }
}

/**
 * Releases both sources whether or not the blend succeeds.
 */
function blendSources(request: MorphRequest, from: Raster, to: Raster, signal?: AbortSignal): Raster {
    try {
        signal?.throwIfAborted();
        return blend(request.blendMode ?? "linear", from, to, request.interpolationFactor);
    } finally {
        from.dispose();
        to.dispose();
    }
}

/**
 * Takes ownership of `raw`: it is either returned or disposed.
 */
function toOutputForm(raw: Raster, form: OutputForm, signal?: AbortSignal): Raster {
    if (form === "Raw") return raw;
    try {
        const binary = binarize(raw);
        if (form === "Binarized") return binary;
        try {
            return skeletonize(binary, { signal });
        } finally {
            binary.dispose();
        }
    } finally {
        raw.dispose();
    }
}
