import type { SymbolKind } from "../../engine/types.js";
import type { Dimensions, Raster } from "../raster/raster.js";

/**
 * Stateless producer of a raw glyph raster for one symbol kind.
 */
export interface SymbolGenerator {
    readonly kind: SymbolKind;
    generateRaw(dimensions: Dimensions, seed?: number): Raster;
}
