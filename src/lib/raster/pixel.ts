/**
 * Pixel convention
 *
 * `isInk` is the only place the ink threshold lives. Stages that produce
 * binary output write `INK` or `BACKGROUND` and nothing else.
 */

import { Raster } from "./raster.js";

export const INK = 0;
export const BACKGROUND = 255;

const INK_THRESHOLD = 128;

export function isInk(value: number): boolean {
    return value < INK_THRESHOLD;
}

/**
 * New raster with every sample snapped to INK or BACKGROUND.
 */
export function binarize(raster: Raster): Raster {
    const source = raster.data;
    const out = new Uint8Array(source.length);
    for (let i = 0; i < source.length; i++) {
        out[i] = isInk(source[i]) ? INK : BACKGROUND;
    }
    return new Raster(raster.width, raster.height, out);
}

export function countInk(raster: Raster): number {
    const data = raster.data;
    let count = 0;
    for (let i = 0; i < data.length; i++) {
        if (isInk(data[i])) count++;
    }
    return count;
}

export function isBinary(raster: Raster): boolean {
    return raster.data.every((v) => v === INK || v === BACKGROUND);
}
