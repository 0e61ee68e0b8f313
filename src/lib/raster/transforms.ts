/**
 * Edge-case transforms applied to a finished glyph raster
 */

import { InvalidDimensionsError } from "../../engine/errors.js";
import { BACKGROUND } from "./pixel.js";
import { Raster } from "./raster.js";

export const DEFAULT_ROTATION_DEGREES = 45;
export const DEFAULT_CROP_MARGIN = 10;
export const DEFAULT_BLUR_SIGMA = 1.5;

/**
 * Rotate about the centre with nearest-neighbour sampling. The canvas grows
 * to hold the rotated bounds; uncovered samples are background.
 */
export function rotate(source: Raster, degrees: number = DEFAULT_ROTATION_DEGREES): Raster {
    const theta = (degrees * Math.PI) / 180;
    const cos = Math.cos(theta);
    const sin = Math.sin(theta);
    const { width, height } = source;

    const outWidth = Math.max(1, Math.ceil(Math.abs(width * cos) + Math.abs(height * sin) - 1e-9));
    const outHeight = Math.max(1, Math.ceil(Math.abs(width * sin) + Math.abs(height * cos) - 1e-9));
    const out = Raster.filled(outWidth, outHeight, BACKGROUND);

    const cx = (width - 1) / 2;
    const cy = (height - 1) / 2;
    const ocx = (outWidth - 1) / 2;
    const ocy = (outHeight - 1) / 2;

    for (let y = 0; y < outHeight; y++) {
        for (let x = 0; x < outWidth; x++) {
            // inverse mapping back into the source
            const dx = x - ocx;
            const dy = y - ocy;
            const sx = Math.round(dx * cos + dy * sin + cx);
            const sy = Math.round(-dx * sin + dy * cos + cy);
            if (source.inBounds(sx, sy)) {
                out.set(x, y, source.get(sx, sy));
            }
        }
    }
    return out;
}

/**
 * Drop `margin` pixels from every side.
 */
export function cropMargin(source: Raster, margin: number = DEFAULT_CROP_MARGIN): Raster {
    const width = source.width - 2 * margin;
    const height = source.height - 2 * margin;
    if (width <= 0 || height <= 0) {
        throw new InvalidDimensionsError(
            source.width,
            source.height,
            `too small to crop a ${margin}px margin from each side`
        );
    }
    const out = new Raster(width, height);
    for (let y = 0; y < height; y++) {
        const start = (y + margin) * source.width + margin;
        out.data.set(source.data.subarray(start, start + width), y * width);
    }
    return out;
}

function gaussianKernel(sigma: number): number[] {
    const radius = Math.ceil(3 * sigma);
    const kernel: number[] = [];
    let sum = 0;
    for (let i = -radius; i <= radius; i++) {
        const w = Math.exp(-(i * i) / (2 * sigma * sigma));
        kernel.push(w);
        sum += w;
    }
    return kernel.map((w) => w / sum);
}

/**
 * Separable Gaussian blur with edge clamping. Output keeps greyscale values;
 * the blurred halo is what the ink-bleed variant is for.
 */
export function gaussianBlur(source: Raster, sigma: number = DEFAULT_BLUR_SIGMA): Raster {
    const { width, height } = source;
    if (sigma <= 0) return source.clone();

    const kernel = gaussianKernel(sigma);
    const radius = (kernel.length - 1) / 2;
    const input = source.data;
    const horizontal = new Float64Array(input.length);

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let acc = 0;
            for (let k = -radius; k <= radius; k++) {
                const sx = Math.min(width - 1, Math.max(0, x + k));
                acc += input[y * width + sx] * kernel[k + radius];
            }
            horizontal[y * width + x] = acc;
        }
    }

    const out = new Raster(width, height);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let acc = 0;
            for (let k = -radius; k <= radius; k++) {
                const sy = Math.min(height - 1, Math.max(0, y + k));
                acc += horizontal[sy * width + x] * kernel[k + radius];
            }
            out.set(x, y, Math.min(255, Math.max(0, Math.round(acc))));
        }
    }
    return out;
}
