/**
 * Canonical content hash
 *
 * SHA-256 over a fixed header followed by the raw row-major samples:
 *   "SL" | version (1) | pixel type (1) | width u32 LE | height u32 LE | samples
 * Rendered as lowercase hex.
 */

import { createHash } from "crypto";
import type { Raster } from "../raster/raster.js";

const MAGIC = "SL";
const FORMAT_VERSION = 1;
const PIXEL_TYPE_GRAY8 = 1;

export const HASH_PREFIX_LENGTH = 8;

export function canonicalHeader(width: number, height: number): Buffer {
    const header = Buffer.alloc(12);
    header.write(MAGIC, 0, "ascii");
    header.writeUInt8(FORMAT_VERSION, 2);
    header.writeUInt8(PIXEL_TYPE_GRAY8, 3);
    header.writeUInt32LE(width, 4);
    header.writeUInt32LE(height, 8);
    return header;
}

export function computeCanonicalHash(raster: Raster): string {
    return createHash("sha256")
        .update(canonicalHeader(raster.width, raster.height))
        .update(raster.data)
        .digest("hex");
}

/**
 * `{templateName}-{first 8 hex chars}`
 */
export function capsuleIdFor(templateName: string, hash: string): string {
    return `${templateName}-${hash.slice(0, HASH_PREFIX_LENGTH)}`;
}
