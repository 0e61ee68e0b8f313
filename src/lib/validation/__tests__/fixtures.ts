import { createMetrics, type QualityMetrics } from '../../../engine/types.js';
import { BACKGROUND, INK } from '../../raster/pixel.js';
import { Raster } from '../../raster/raster.js';

/**
 * width x height raster whose first `ink` samples (row-major) are ink
 */
export function rasterWithInk(width: number, height: number, ink: number): Raster {
    const raster = Raster.filled(width, height, BACKGROUND);
    raster.data.fill(INK, 0, ink);
    return raster;
}

export function metricsFor(raster: Raster): QualityMetrics {
    return createMetrics(raster);
}
