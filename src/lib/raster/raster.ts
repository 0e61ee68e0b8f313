/**
 * Single-channel 8-bit raster
 *
 * Samples are stored row-major in a Uint8Array; 0 is ink and 255 background.
 * A raster is owned by exactly one capsule and can be disposed, after which
 * every read or write throws.
 */

import { InvalidDimensionsError, RasterDisposedError } from "../../engine/errors.js";

export interface Dimensions {
    width: number;
    height: number;
}

export function assertDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new InvalidDimensionsError(width, height);
    }
}

export class Raster {
    readonly width: number;
    readonly height: number;
    private samples: Uint8Array | null;

    constructor(width: number, height: number, data?: Uint8Array) {
        assertDimensions(width, height);
        if (data && data.length !== width * height) {
            throw new InvalidDimensionsError(width, height, `expected ${width * height} samples, got ${data.length}`);
        }
        this.width = width;
        this.height = height;
        this.samples = data ?? new Uint8Array(width * height);
    }

    /**
     * Raster of the given size with every sample set to `value`.
     */
    static filled(width: number, height: number, value: number): Raster {
        const raster = new Raster(width, height);
        raster.data.fill(value);
        return raster;
    }

    get data(): Uint8Array {
        if (this.samples === null) {
            throw new RasterDisposedError();
        }
        return this.samples;
    }

    get isDisposed(): boolean {
        return this.samples === null;
    }

    get pixelCount(): number {
        return this.width * this.height;
    }

    get(x: number, y: number): number {
        return this.data[y * this.width + x];
    }

    set(x: number, y: number, value: number): void {
        this.data[y * this.width + x] = value;
    }

    inBounds(x: number, y: number): boolean {
        return x >= 0 && y >= 0 && x < this.width && y < this.height;
    }

    clone(): Raster {
        return new Raster(this.width, this.height, new Uint8Array(this.data));
    }

    dispose(): void {
        this.samples = null;
    }
}
