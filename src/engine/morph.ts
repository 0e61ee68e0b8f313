/**
 * Morph source loading
 *
 * Morph sources are snapshot images stored per symbol kind and style under
 * `{assetRoot}/snapshots/{kind}/{style}.png`.
 */

import { existsSync } from "fs";
import { join, resolve } from "path";
import { readRaster } from "../lib/raster/io.js";
import type { Raster } from "../lib/raster/raster.js";
import { SourceNotFoundError } from "./errors.js";
import type { SymbolKind } from "./types.js";

export interface SourceRasterLoader {
    load(kind: SymbolKind, style: string, signal?: AbortSignal): Promise<Raster>;
}

const STYLE_NAME = /^[A-Za-z0-9_-]+$/;

export function snapshotPath(assetRoot: string, kind: SymbolKind, style: string): string {
    return join(resolve(assetRoot), "snapshots", kind, `${style}.png`);
}

export class FileSourceRasterLoader implements SourceRasterLoader {
    constructor(private readonly assetRoot: string) {}

    async load(kind: SymbolKind, style: string, signal?: AbortSignal): Promise<Raster> {
        signal?.throwIfAborted();
        if (!STYLE_NAME.test(style)) {
            throw new SourceNotFoundError(`${kind}/${style}`);
        }
        const path = snapshotPath(this.assetRoot, kind, style);
        if (!existsSync(path)) {
            throw new SourceNotFoundError(path);
        }
        const raster = await readRaster(path);
        if (signal?.aborted) {
            raster.dispose();
            signal.throwIfAborted();
        }
        return raster;
    }
}
