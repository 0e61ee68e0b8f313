/**
 * GF-TEST-04: Forge orchestration
 */

import { describe, it, expect, vi } from 'vitest';
import { SymbolForge, resolveOutputForm } from '../forge.js';
import { SymbolCapsule } from '../capsule.js';
import { createForge } from '../createForge.js';
import {
    DimensionMismatchError,
    InvalidDimensionsError,
    OutOfRangeError,
    RasterDisposedError,
    SourceNotFoundError,
} from '../errors.js';
import { validationResult, type SymbolRequest } from '../types.js';
import { GeneratorRegistry, createDefaultRegistry } from '../../lib/glyphs/registry.js';
import type { SymbolGenerator } from '../../lib/glyphs/types.js';
import { ValidatorChain, createDefaultValidators } from '../../lib/validation/chain.js';
import type { Validator } from '../../lib/validation/types.js';
import { computeCanonicalHash } from '../../lib/hash/canonicalHash.js';
import { BACKGROUND, INK, isBinary } from '../../lib/raster/pixel.js';
import { Raster, type Dimensions } from '../../lib/raster/raster.js';
import { FIXED_CLOCK, MapSourceLoader, fakeLogger } from './helpers.js';

function createTestForge(
    overrides: { generators?: GeneratorRegistry; validators?: Validator[]; sources?: MapSourceLoader } = {}
): SymbolForge {
    return new SymbolForge({
        generators: overrides.generators ?? createDefaultRegistry(),
        validators: new ValidatorChain(overrides.validators ?? createDefaultValidators(), fakeLogger()),
        sources: overrides.sources ?? new MapSourceLoader({}),
        version: '0.0.0-test',
        logger: fakeLogger(),
        clock: FIXED_CLOCK,
    });
}

/**
 * Sharp generator that inks the first 20% of samples: fails density, passes contrast
 */
const denseGenerator: SymbolGenerator = {
    kind: 'Sharp',
    generateRaw: ({ width, height }: Dimensions) => {
        const raster = Raster.filled(width, height, BACKGROUND);
        raster.data.fill(INK, 0, Math.floor(width * height * 0.2));
        return raster;
    },
};

/**
 * Records every raster it is shown so tests can check disposal afterwards
 */
class CapturingValidator implements Validator {
    readonly name = 'Capturing Validator';
    readonly seen: Raster[] = [];

    constructor(private readonly onValidate: () => void = () => undefined) {}

    validate(capsule: { raster: Raster | null | undefined } | null | undefined) {
        if (capsule?.raster) this.seen.push(capsule.raster);
        this.onValidate();
        return validationResult(true, this.name);
    }
}

function flatRequest(extra: Partial<SymbolRequest> = {}): SymbolRequest {
    return {
        kind: 'Flat',
        dimensions: [{ width: 40, height: 60 }],
        outputForms: ['Skeletonized'],
        ...extra,
    };
}

describe('GF-TEST-04: SymbolForge.generate', () => {
    it('GF-TEST-04.1: Verifying identical requests produce identical hashes', () => {
        const forge = createTestForge();
        const request = flatRequest({ seed: 77, dimensions: [{ width: 40, height: 60 }, { width: 20, height: 30 }] });
        const a = forge.generate(request);
        const b = forge.generate(request);

        expect(a.primary.metadata.templateHash).toBe(b.primary.metadata.templateHash);
        expect(a.variants[0].metadata.templateHash).toBe(b.variants[0].metadata.templateHash);
        a.dispose();
        b.dispose();
    });

    it('GF-TEST-04.2: Verifying metadata of a generated capsule', () => {
        const forge = createTestForge();
        const set = forge.generate(flatRequest({ seed: 5 }));
        const { metadata, metrics } = set.primary;

        expect(metadata.templateName).toBe('Flat_40x60');
        expect(metadata.generatedBy).toBe('GlyphForge v0.0.0-test');
        expect(metadata.generatedOn).toBe('2026-01-01T00:00:00.000Z');
        expect(metadata.symbolKind).toBe('Flat');
        expect(metadata.generationSeed).toBe(5);
        expect(metadata.templateHash).toBe(computeCanonicalHash(set.primary.raster));
        expect(metadata.capsuleId).toBe(`Flat_40x60-${metadata.templateHash.slice(0, 8)}`);
        expect(metadata.provenance).toEqual({
            sourceImage: 'synthetic-generation',
            method: 'Skeletonized',
            validationDate: '2026-01-01T00:00:00.000Z',
            validatedBy: 'Density Validator, Contrast Validator, Structure Validator',
            notes: 'Synthetically generated Flat symbol',
        });
        expect(metrics.width).toBe(40);
        expect(metrics.height).toBe(60);
        expect(metrics.aspectRatio).toBe(1.5);
        expect(metrics.densityStatus).not.toBe('Unknown');
        expect(isBinary(set.primary.raster)).toBe(true);
        expect(set.primary.validationResults).toHaveLength(3);
        set.dispose();
    });

    it('GF-TEST-04.3: Verifying size variants follow the primary in request order', () => {
        const forge = createTestForge();
        const set = forge.generate(
            flatRequest({
                dimensions: [
                    { width: 20, height: 30 },
                    { width: 40, height: 60 },
                    { width: 12, height: 30 },
                ],
            })
        );
        expect(set.primary.metadata.templateName).toBe('Flat_20x30');
        expect(set.variants.map((v) => v.metadata.templateName)).toEqual(['Flat_40x60', 'Flat_12x30']);
        set.dispose();
    });

    it('GF-TEST-04.4: Verifying an unregistered kind yields a fallback capsule', () => {
        const forge = createTestForge();
        const set = forge.generate({
            kind: 'Bass',
            dimensions: [{ width: 20, height: 30 }],
            outputForms: ['Skeletonized'],
            edgeCases: ['Rotated'],
        });
        const capsule = set.primary;

        expect(capsule.isValid).toBe(false);
        expect(capsule.isFallback).toBe(true);
        expect(capsule.validationResults).toHaveLength(1);
        expect(capsule.validationResults[0].validatorName).toBe('FallbackHandler');
        expect(capsule.validationResults[0].failureMessage).toBe("Generator not found for symbol kind 'Bass'.");
        expect(capsule.raster.width).toBe(20);
        expect(capsule.raster.height).toBe(30);
        expect(capsule.raster.data.every((v) => v === BACKGROUND)).toBe(true);
        expect(capsule.metadata.templateName).toBe('Bass-fallback');
        expect(capsule.metadata.provenance.sourceImage).toBe('fallback-generation');
        expect(capsule.metadata.provenance.method).toBe('Raw');
        expect(capsule.capsuleId).toBe(`Bass-fallback-${capsule.metadata.templateHash.slice(0, 8)}`);
        // no edge cases from a blank raster
        expect(set.variants).toHaveLength(0);
        set.dispose();
    });

    it('GF-TEST-04.5: Verifying an override turns a density failure into an audited pass', () => {
        const forge = createTestForge({ generators: new GeneratorRegistry([denseGenerator]) });
        const request: SymbolRequest = {
            kind: 'Sharp',
            dimensions: [{ width: 100, height: 100 }],
            outputForms: ['Binarized'],
        };

        const plain = forge.generate(request);
        expect(plain.primary.isValid).toBe(false);
        expect(plain.primary.metrics.densityStatus).toBe('TooHigh');
        plain.dispose();

        const overridden = forge.generate({
            ...request,
            overrides: { 'Density Validator': { overridden: true, reason: 'test' } },
        });
        const density = overridden.primary.validationResults.find((r) => r.validatorName === 'Density Validator');
        expect(overridden.primary.isValid).toBe(true);
        expect(density?.isValid).toBe(true);
        expect(density?.failureMessage?.startsWith('Overridden:')).toBe(true);
        expect(density?.failureMessage).toBe('Overridden: test');
        overridden.dispose();
    });

    it('GF-TEST-04.6: Verifying edge-case derivatives are renamed, rehashed and not revalidated', () => {
        const forge = createTestForge();
        const set = forge.generate(flatRequest({ edgeCases: ['Rotated', 'Clipped', 'InkBleed'] }));
        const { primary } = set;
        const [rotated, clipped, bleed] = set.variants;

        expect(set.variants.map((v) => v.metadata.templateName)).toEqual([
            'Flat_40x60_edge_Rotated',
            'Flat_40x60_edge_Clipped',
            'Flat_40x60_edge_InkBleed',
        ]);
        expect(rotated.raster.width).toBe(71);
        expect(rotated.raster.height).toBe(71);
        expect(clipped.raster.width).toBe(20);
        expect(clipped.raster.height).toBe(40);
        expect(bleed.raster.width).toBe(40);

        for (const variant of set.variants) {
            expect(variant.metadata.derivedFrom).toBe(primary.capsuleId);
            expect(variant.isValid).toBe(primary.isValid);
            expect(variant.validationResults).toEqual([]);
            expect(variant.metadata.templateHash).toBe(computeCanonicalHash(variant.raster));
            expect(variant.capsuleId).toBe(
                `${variant.metadata.templateName}-${variant.metadata.templateHash.slice(0, 8)}`
            );
            expect(variant.raster).not.toBe(primary.raster);
        }
        set.dispose();
    });

    it('GF-TEST-04.7: Verifying Raw-only requests keep the generator output', () => {
        const greyGenerator: SymbolGenerator = {
            kind: 'Sharp',
            generateRaw: ({ width, height }: Dimensions) => new Raster(width, height, Uint8Array.from([64, 127, 128, 200])),
        };
        const forge = createTestForge({ generators: new GeneratorRegistry([greyGenerator]) });
        const set = forge.generate({ kind: 'Sharp', dimensions: [{ width: 2, height: 2 }], outputForms: ['Raw'] });

        expect(set.primary.metadata.provenance.method).toBe('Raw');
        expect(Array.from(set.primary.raster.data)).toEqual([64, 127, 128, 200]);
        expect(isBinary(set.primary.raster)).toBe(false);
        set.dispose();
    });

    it('GF-TEST-04.8: Verifying dispose releases every raster in the set', () => {
        const forge = createTestForge();
        const set = forge.generate(
            flatRequest({ dimensions: [{ width: 40, height: 60 }, { width: 30, height: 30 }], edgeCases: ['Rotated'] })
        );
        const rasters = set.all.map((c) => c.raster);
        set.dispose();

        expect(rasters).toHaveLength(3);
        expect(rasters.every((r) => r.isDisposed)).toBe(true);
        expect(() => set.primary.raster.data).toThrow(RasterDisposedError);
    });

    it('GF-TEST-04.9: Verifying invalid dimensions fail before anything is generated', () => {
        const generateRaw = vi.fn(denseGenerator.generateRaw);
        const forge = createTestForge({ generators: new GeneratorRegistry([{ kind: 'Sharp', generateRaw }]) });

        expect(() => forge.generate({ kind: 'Sharp', dimensions: [], outputForms: [] })).toThrow(InvalidDimensionsError);
        expect(() =>
            forge.generate({
                kind: 'Sharp',
                dimensions: [{ width: 10, height: 10 }, { width: 0, height: 10 }],
                outputForms: [],
            })
        ).toThrow(InvalidDimensionsError);
        expect(generateRaw).not.toHaveBeenCalled();
    });
});

describe('GF-TEST-05: SymbolForge cleanup', () => {
    it('GF-TEST-05.1: Verifying a failing edge case disposes capsules already built', () => {
        const capturing = new CapturingValidator();
        const forge = createTestForge({ validators: [capturing] });

        // 12x12 is too small for the 10px clip margin
        expect(() =>
            forge.generate(flatRequest({ dimensions: [{ width: 12, height: 12 }, { width: 14, height: 14 }], edgeCases: ['Clipped'] }))
        ).toThrow(InvalidDimensionsError);
        expect(capturing.seen).toHaveLength(2);
        expect(capturing.seen.every((r) => r.isDisposed)).toBe(true);
    });

    it('GF-TEST-05.2: Verifying a failing size variant disposes the primary', () => {
        const capturing = new CapturingValidator();
        const flaky: SymbolGenerator = {
            kind: 'Sharp',
            generateRaw: (dimensions) => {
                if (dimensions.width === 13) throw new Error('generator exploded');
                return denseGenerator.generateRaw(dimensions);
            },
        };
        const forge = createTestForge({ generators: new GeneratorRegistry([flaky]), validators: [capturing] });

        expect(() =>
            forge.generate({
                kind: 'Sharp',
                dimensions: [{ width: 10, height: 10 }, { width: 13, height: 10 }],
                outputForms: ['Binarized'],
            })
        ).toThrow('generator exploded');
        expect(capturing.seen).toHaveLength(1);
        expect(capturing.seen[0].isDisposed).toBe(true);
    });

    it('GF-TEST-05.3: Verifying cancellation between sizes disposes partial work', () => {
        const controller = new AbortController();
        const capturing = new CapturingValidator(() => controller.abort(new Error('cancelled')));
        const forge = createTestForge({ validators: [capturing] });

        expect(() =>
            forge.generate(flatRequest({ dimensions: [{ width: 40, height: 60 }, { width: 20, height: 30 }] }), {
                signal: controller.signal,
            })
        ).toThrow('cancelled');
        expect(capturing.seen).toHaveLength(1);
        expect(capturing.seen[0].isDisposed).toBe(true);
    });
});

describe('GF-TEST-06: SymbolForge concurrency', () => {
    it('GF-TEST-06.1: Verifying 100 concurrent generations on one forge', async () => {
        const forge = createTestForge();
        const sets = await Promise.all(
            Array.from({ length: 100 }, (_, i) =>
                Promise.resolve().then(() =>
                    forge.generate({
                        kind: 'Flat',
                        dimensions: [{ width: 12, height: 30 + i }],
                        outputForms: ['Skeletonized'],
                    })
                )
            )
        );

        const hashes = new Set(sets.map((s) => s.primary.metadata.templateHash));
        expect(hashes.size).toBe(100);
        sets.forEach((s) => s.dispose());
    });
});

describe('GF-TEST-07: SymbolForge.morph', () => {
    const solid = (value: number, width = 10, height = 10) => () => Raster.filled(width, height, value);

    it('GF-TEST-07.1: Verifying a morph blends both sources and records lineage', async () => {
        const sources = new MapSourceLoader({ 'Flat/bold': solid(INK), 'Flat/light': solid(BACKGROUND) });
        const forge = createTestForge({ sources });
        const capsule = await forge.morph({
            kind: 'Flat',
            fromStyle: 'bold',
            toStyle: 'light',
            interpolationFactor: 0.25,
        });

        // 0 * 0.75 + 255 * 0.25 = 63.75
        expect(capsule.raster.data.every((v) => v === 64)).toBe(true);
        expect(capsule.metadata.templateName).toBe('Flat_morph_bold_to_light');
        expect(capsule.metadata.morphLineage).toBe('Flat:bold -> Flat:light');
        expect(capsule.metadata.interpolationFactor).toBe(0.25);
        expect(capsule.metadata.provenance.method).toBe('Custom');
        expect(capsule.metadata.provenance.sourceImage).toBe('bold + light');
        expect(capsule.validationResults).toHaveLength(3);
        // every sample is ink: density far above the maximum
        expect(capsule.isValid).toBe(false);
        expect(sources.loaded.every((r) => r.isDisposed)).toBe(true);
        capsule.dispose();
    });

    it('GF-TEST-07.2: Verifying the blend mode is honoured', async () => {
        const sources = new MapSourceLoader({ 'Flat/a': solid(200), 'Flat/b': solid(100) });
        const forge = createTestForge({ sources });
        const capsule = await forge.morph({
            kind: 'Flat',
            fromStyle: 'a',
            toStyle: 'b',
            interpolationFactor: 0.5,
            blendMode: 'additive',
        });
        expect(capsule.raster.get(0, 0)).toBe(255);
        capsule.dispose();
    });

    it('GF-TEST-07.3: Verifying a missing source raises SourceNotFound and frees the other', async () => {
        const sources = new MapSourceLoader({ 'Flat/bold': solid(INK) });
        const forge = createTestForge({ sources });

        await expect(
            forge.morph({ kind: 'Flat', fromStyle: 'bold', toStyle: 'missing', interpolationFactor: 0.5 })
        ).rejects.toThrow(SourceNotFoundError);
        expect(sources.loaded).toHaveLength(1);
        expect(sources.loaded[0].isDisposed).toBe(true);
    });

    it('GF-TEST-07.4: Verifying an out-of-range factor fails before loading', async () => {
        const sources = new MapSourceLoader({ 'Flat/a': solid(0), 'Flat/b': solid(0) });
        const forge = createTestForge({ sources });

        await expect(
            forge.morph({ kind: 'Flat', fromStyle: 'a', toStyle: 'b', interpolationFactor: 1.5 })
        ).rejects.toThrow(OutOfRangeError);
        expect(sources.loaded).toHaveLength(0);
    });

    it('GF-TEST-07.5: Verifying mismatched sources fail and are released', async () => {
        const sources = new MapSourceLoader({ 'Flat/a': solid(0, 10, 10), 'Flat/b': solid(0, 12, 10) });
        const forge = createTestForge({ sources });

        await expect(
            forge.morph({ kind: 'Flat', fromStyle: 'a', toStyle: 'b', interpolationFactor: 0.5 })
        ).rejects.toThrow(DimensionMismatchError);
        expect(sources.loaded.every((r) => r.isDisposed)).toBe(true);
    });
});

describe('resolveOutputForm', () => {
    it('prefers Skeletonized, then Binarized, and defaults to Binarized', () => {
        expect(resolveOutputForm(['Raw', 'Skeletonized'])).toBe('Skeletonized');
        expect(resolveOutputForm(['Raw', 'Binarized'])).toBe('Binarized');
        expect(resolveOutputForm(['Raw'])).toBe('Raw');
        expect(resolveOutputForm([])).toBe('Binarized');
    });
});

describe('SymbolCapsule', () => {
    it('freezes its validation results', () => {
        const set = createTestForge().generate(flatRequest());
        const capsule = new SymbolCapsule({
            raster: Raster.filled(1, 1, BACKGROUND),
            metadata: set.primary.metadata,
            metrics: { width: 1, height: 1, aspectRatio: 1, density: 0, densityFraction: 0, densityStatus: 'Unknown' },
            isValid: true,
            validationResults: [validationResult(true, 'x')],
        });
        expect(Object.isFrozen(capsule.validationResults)).toBe(true);
        capsule.dispose();
        set.dispose();
        expect(capsule.isDisposed).toBe(true);
    });
});

describe('createForge', () => {
    it('routes override audit warnings through the injected logger', () => {
        const logger = fakeLogger();
        const forge = createForge({ logger, sources: new MapSourceLoader({}) });
        const set = forge.generate(
            flatRequest({ overrides: { 'Density Validator': { overridden: true, reason: 'hand-checked' } } })
        );

        expect(logger.warn).toHaveBeenCalledWith('Validator overridden: Density Validator', { reason: 'hand-checked' });
        set.dispose();
    });
});
