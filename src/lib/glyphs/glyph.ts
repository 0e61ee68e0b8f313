/**
 * Shared glyph drawing
 *
 * A glyph is a list of filled shapes whose coordinates are fractions of the
 * raster width and height. A seed nudges the whole glyph by up to one pixel
 * per axis, so the same (kind, dimensions, seed) always redraws identically.
 */

import type { SymbolKind } from "../../engine/types.js";
import { fillEllipse, fillPolygon, fillRect } from "../raster/draw.js";
import { BACKGROUND, INK } from "../raster/pixel.js";
import { assertDimensions, Raster, type Dimensions } from "../raster/raster.js";
import { SeededRNG } from "../rng.js";
import type { SymbolGenerator } from "./types.js";

export type GlyphShape =
    | { type: "rect"; x0: number; y0: number; x1: number; y1: number; erase?: boolean }
    | { type: "ellipse"; cx: number; cy: number; rx: number; ry: number; erase?: boolean }
    | { type: "polygon"; points: Array<[number, number]>; erase?: boolean };

export function seededOffset(seed: number | undefined): { dx: number; dy: number } {
    if (seed === undefined) {
        return { dx: 0, dy: 0 };
    }
    const rng = new SeededRNG(seed);
    return { dx: rng.randomInt(-1, 2), dy: rng.randomInt(-1, 2) };
}

export function drawGlyph(shapes: readonly GlyphShape[], dimensions: Dimensions, seed?: number): Raster {
    const { width, height } = dimensions;
    assertDimensions(width, height);

    const raster = Raster.filled(width, height, BACKGROUND);
    const { dx, dy } = seededOffset(seed);
    const px = (fx: number) => fx * width + dx;
    const py = (fy: number) => fy * height + dy;

    for (const shape of shapes) {
        const value = shape.erase ? BACKGROUND : INK;
        switch (shape.type) {
            case "rect":
                fillRect(raster, px(shape.x0), py(shape.y0), px(shape.x1), py(shape.y1), value);
                break;
            case "ellipse":
                fillEllipse(raster, px(shape.cx), py(shape.cy), shape.rx * width, shape.ry * height, value);
                break;
            case "polygon":
                fillPolygon(
                    raster,
                    shape.points.map(([x, y]) => ({ x: px(x), y: py(y) })),
                    value
                );
                break;
        }
    }
    return raster;
}

export function defineGlyph(kind: SymbolKind, shapes: readonly GlyphShape[]): SymbolGenerator {
    return {
        kind,
        generateRaw: (dimensions: Dimensions, seed?: number) => drawGlyph(shapes, dimensions, seed),
    };
}
