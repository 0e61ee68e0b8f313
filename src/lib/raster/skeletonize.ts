/**
 * Zhang-Suen thinning
 *
 * Reduces filled strokes to a one-pixel-wide centreline. Works on a clone;
 * the input is never touched. The outer one-pixel ring is never scanned.
 */

import { BACKGROUND, INK, isInk } from "./pixel.js";
import { Raster } from "./raster.js";

export interface SkeletonizeOptions {
    /** Checked between rounds; an aborted signal throws its reason. */
    signal?: AbortSignal;
}

// p2..p9, clockwise from north
const NEIGHBOUR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
    [0, -1],
    [1, -1],
    [1, 0],
    [1, 1],
    [0, 1],
    [-1, 1],
    [-1, 0],
    [-1, -1],
];

function neighbours(grid: Uint8Array, width: number, x: number, y: number): boolean[] {
    return NEIGHBOUR_OFFSETS.map(([dx, dy]) => isInk(grid[(y + dy) * width + (x + dx)]));
}

/**
 * Number of background -> ink transitions walking p2, p3, ..., p9, p2.
 */
export function transitions(ring: boolean[]): number {
    let count = 0;
    for (let i = 0; i < ring.length; i++) {
        const next = ring[(i + 1) % ring.length];
        if (!ring[i] && next) count++;
    }
    return count;
}

function subPass(grid: Uint8Array, width: number, height: number, step: 0 | 1): number[] {
    const marked: number[] = [];
    for (let y = 1; y < height - 1; y++) {
        for (let x = 1; x < width - 1; x++) {
            const index = y * width + x;
            if (!isInk(grid[index])) continue;

            const ring = neighbours(grid, width, x, y);
            const [p2, , p4, , p6, , p8] = ring;
            const b = ring.filter(Boolean).length;
            if (b < 2 || b > 6) continue;
            if (transitions(ring) !== 1) continue;

            if (step === 0) {
                if (p2 && p4 && p6) continue;
                if (p4 && p6 && p8) continue;
            } else {
                if (p2 && p4 && p8) continue;
                if (p2 && p6 && p8) continue;
            }
            marked.push(index);
        }
    }
    return marked;
}

export function skeletonize(input: Raster, options: SkeletonizeOptions = {}): Raster {
    const { width, height } = input;
    const grid = new Uint8Array(input.data.length);
    input.data.forEach((v, i) => {
        grid[i] = isInk(v) ? INK : BACKGROUND;
    });

    let changed = true;
    while (changed) {
        options.signal?.throwIfAborted();
        changed = false;
        for (const step of [0, 1] as const) {
            const marked = subPass(grid, width, height, step);
            for (const index of marked) {
                grid[index] = BACKGROUND;
            }
            if (marked.length > 0) changed = true;
        }
    }

    return new Raster(width, height, grid);
}
