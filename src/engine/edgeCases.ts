import { cropMargin, gaussianBlur, rotate } from "../lib/raster/transforms.js";
import type { Raster } from "../lib/raster/raster.js";
import type { EdgeCaseKind } from "./types.js";

const EDGE_CASE_TRANSFORMS: Record<EdgeCaseKind, (source: Raster) => Raster> = {
    Rotated: (source) => rotate(source),
    Clipped: (source) => cropMargin(source),
    InkBleed: (source) => gaussianBlur(source),
};

/**
 * Apply one edge-case transform to a private clone of `source`.
 */
export function applyEdgeCase(source: Raster, kind: EdgeCaseKind): Raster {
    const working = source.clone();
    try {
        return EDGE_CASE_TRANSFORMS[kind](working);
    } finally {
        working.dispose();
    }
}

export function edgeCaseTemplateName(primaryName: string, kind: EdgeCaseKind): string {
    return `${primaryName}_edge_${kind}`;
}
