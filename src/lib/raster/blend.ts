/**
 * Pixel blender
 *
 * Per-sample compositing of two equal-size rasters. Every function allocates
 * a new raster and leaves its inputs alone.
 */

import { DimensionMismatchError, MissingInputError, OutOfRangeError } from "../../engine/errors.js";
import { Raster } from "./raster.js";

export const BLEND_MODES = ["linear", "alpha", "additive", "multiply", "screen", "overlay"] as const;
export type BlendMode = (typeof BLEND_MODES)[number];

function clampByte(value: number): number {
    return Math.min(255, Math.max(0, value));
}

function assertUnit(name: string, value: number): void {
    if (!(value >= 0 && value <= 1)) {
        throw new OutOfRangeError(name, value);
    }
}

function combine(
    a: Raster | null | undefined,
    b: Raster | null | undefined,
    labels: [string, string],
    fn: (x: number, y: number) => number
): Raster {
    if (!a) throw new MissingInputError(labels[0]);
    if (!b) throw new MissingInputError(labels[1]);
    if (a.width !== b.width || a.height !== b.height) {
        throw new DimensionMismatchError(a, b);
    }
    const left = a.data;
    const right = b.data;
    const out = new Uint8Array(left.length);
    for (let i = 0; i < left.length; i++) {
        out[i] = fn(left[i], right[i]);
    }
    return new Raster(a.width, a.height, out);
}

export function linear(from: Raster | null | undefined, to: Raster | null | undefined, factor: number): Raster {
    assertUnit("factor", factor);
    return combine(from, to, ["from", "to"], (f, t) => clampByte(Math.round(f * (1 - factor) + t * factor)));
}

export function alpha(background: Raster | null | undefined, foreground: Raster | null | undefined, amount: number): Raster {
    assertUnit("alpha", amount);
    return combine(background, foreground, ["background", "foreground"], (bg, fg) =>
        clampByte(Math.round(fg * amount + bg * (1 - amount)))
    );
}

export function additive(base: Raster | null | undefined, add: Raster | null | undefined): Raster {
    return combine(base, add, ["base", "add"], (x, y) => Math.min(255, x + y));
}

export function multiply(base: Raster | null | undefined, factor: Raster | null | undefined): Raster {
    return combine(base, factor, ["base", "multiply"], (x, y) => Math.floor((x * y) / 255));
}

export function screen(base: Raster | null | undefined, layer: Raster | null | undefined): Raster {
    return combine(base, layer, ["base", "screen"], (x, y) => 255 - Math.floor(((255 - x) * (255 - y)) / 255));
}

export function overlay(base: Raster | null | undefined, layer: Raster | null | undefined): Raster {
    return combine(base, layer, ["base", "overlay"], (x, y) =>
        clampByte(x < 128 ? Math.floor((2 * x * y) / 255) : 255 - Math.floor((2 * (255 - x) * (255 - y)) / 255))
    );
}

/**
 * Dispatch by mode name. `factor` feeds linear and alpha; the other modes
 * ignore it but still reject values outside [0, 1].
 */
export function blend(mode: BlendMode, a: Raster | null | undefined, b: Raster | null | undefined, factor: number): Raster {
    switch (mode) {
        case "linear":
            return linear(a, b, factor);
        case "alpha":
            return alpha(a, b, factor);
        case "additive":
            assertUnit("factor", factor);
            return additive(a, b);
        case "multiply":
            assertUnit("factor", factor);
            return multiply(a, b);
        case "screen":
            assertUnit("factor", factor);
            return screen(a, b);
        case "overlay":
            assertUnit("factor", factor);
            return overlay(a, b);
    }
}
