import { describe, it, expect } from 'vitest';
import { DEFAULT_GENERATORS, GeneratorRegistry, createDefaultRegistry } from '../registry.js';
import { drawGlyph, seededOffset } from '../glyph.js';
import { flatGenerator } from '../accidentals.js';
import { countInk } from '../../raster/pixel.js';
import { InvalidDimensionsError } from '../../../engine/errors.js';

describe('glyph generators', () => {
    it.each(DEFAULT_GENERATORS.map((g) => [g.kind, g] as const))(
        '%s draws both ink and background',
        (_kind, generator) => {
            const raster = generator.generateRaw({ width: 40, height: 60 });
            const ink = countInk(raster);
            expect(raster.width).toBe(40);
            expect(raster.height).toBe(60);
            expect(ink).toBeGreaterThan(0);
            expect(ink).toBeLessThan(40 * 60);
        }
    );

    it('is deterministic for the same kind, size and seed', () => {
        const a = flatGenerator.generateRaw({ width: 24, height: 48 }, 1234);
        const b = flatGenerator.generateRaw({ width: 24, height: 48 }, 1234);
        expect(Array.from(a.data)).toEqual(Array.from(b.data));
    });

    it('draws at the nominal position without a seed', () => {
        const unseeded = flatGenerator.generateRaw({ width: 24, height: 48 });
        const zeroOffset = drawGlyph([{ type: 'rect', x0: 0.4, y0: 0.1, x1: 0.5, y1: 0.9 }], { width: 10, height: 10 });
        expect(unseeded.get(10, 24)).toBe(0);
        // stem covers column 4, rows 1 through 8
        expect(zeroOffset.get(4, 1)).toBe(0);
        expect(zeroOffset.get(4, 8)).toBe(0);
        expect(zeroOffset.get(4, 9)).toBe(255);
        expect(zeroOffset.get(3, 5)).toBe(255);
        expect(zeroOffset.get(5, 5)).toBe(255);
        expect(countInk(zeroOffset)).toBe(8);
    });

    it('keeps the seeded offset within one pixel', () => {
        expect(seededOffset(undefined)).toEqual({ dx: 0, dy: 0 });
        for (let seed = 0; seed < 50; seed++) {
            const { dx, dy } = seededOffset(seed);
            expect(Math.abs(dx)).toBeLessThanOrEqual(1);
            expect(Math.abs(dy)).toBeLessThanOrEqual(1);
        }
    });

    it('rejects invalid dimensions instead of clamping', () => {
        expect(() => flatGenerator.generateRaw({ width: 0, height: 10 })).toThrow(InvalidDimensionsError);
        expect(() => flatGenerator.generateRaw({ width: 10, height: -3 })).toThrow(InvalidDimensionsError);
    });
});

describe('GeneratorRegistry', () => {
    it('registers every default kind except Bass', () => {
        const registry = createDefaultRegistry();
        expect(registry.kinds()).toEqual(['Flat', 'Sharp', 'Natural', 'DoubleSharp', 'Treble']);
        expect(registry.has('Bass')).toBe(false);
        expect(registry.get('Bass')).toBeUndefined();
        expect(registry.get('Flat')).toBe(flatGenerator);
    });

    it('replaces a generator registered under the same kind', () => {
        const registry = new GeneratorRegistry([flatGenerator]);
        const replacement = { kind: 'Flat' as const, generateRaw: flatGenerator.generateRaw };
        registry.register(replacement);
        expect(registry.get('Flat')).toBe(replacement);
        expect(registry.kinds()).toHaveLength(1);
    });
});
