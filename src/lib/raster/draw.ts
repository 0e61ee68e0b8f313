/**
 * Filled shape primitives for glyph generators. Coordinates are in pixels;
 * every shape is clipped to the raster.
 */

import { INK } from "./pixel.js";
import { Raster } from "./raster.js";

export interface Point {
    x: number;
    y: number;
}

export function fillRect(raster: Raster, x0: number, y0: number, x1: number, y1: number, value = INK): void {
    const left = Math.max(0, Math.floor(Math.min(x0, x1)));
    const right = Math.min(raster.width, Math.ceil(Math.max(x0, x1)));
    const top = Math.max(0, Math.floor(Math.min(y0, y1)));
    const bottom = Math.min(raster.height, Math.ceil(Math.max(y0, y1)));
    for (let y = top; y < bottom; y++) {
        for (let x = left; x < right; x++) {
            raster.set(x, y, value);
        }
    }
}

export function fillEllipse(raster: Raster, cx: number, cy: number, rx: number, ry: number, value = INK): void {
    if (rx <= 0 || ry <= 0) return;
    for (let y = 0; y < raster.height; y++) {
        for (let x = 0; x < raster.width; x++) {
            const nx = (x + 0.5 - cx) / rx;
            const ny = (y + 0.5 - cy) / ry;
            if (nx * nx + ny * ny <= 1) {
                raster.set(x, y, value);
            }
        }
    }
}

/**
 * Even-odd scanline fill sampled at pixel centres.
 */
export function fillPolygon(raster: Raster, points: Point[], value = INK): void {
    if (points.length < 3) return;
    for (let y = 0; y < raster.height; y++) {
        const sy = y + 0.5;
        const crossings: number[] = [];
        for (let i = 0; i < points.length; i++) {
            const a = points[i];
            const b = points[(i + 1) % points.length];
            if ((a.y <= sy && b.y > sy) || (b.y <= sy && a.y > sy)) {
                crossings.push(a.x + ((sy - a.y) / (b.y - a.y)) * (b.x - a.x));
            }
        }
        crossings.sort((p, q) => p - q);
        for (let i = 0; i + 1 < crossings.length; i += 2) {
            const start = Math.max(0, Math.ceil(crossings[i] - 0.5));
            const end = Math.min(raster.width - 1, Math.floor(crossings[i + 1] - 0.5));
            for (let x = start; x <= end; x++) {
                raster.set(x, y, value);
            }
        }
    }
}
