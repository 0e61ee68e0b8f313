import { vi } from 'vitest';
import { SourceNotFoundError } from '../errors.js';
import type { SourceRasterLoader } from '../morph.js';
import type { SymbolKind } from '../types.js';
import type { Logger } from '../../lib/logger.js';
import type { Raster } from '../../lib/raster/raster.js';

export function fakeLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * In-memory snapshot store keyed by "{kind}/{style}"
 */
export class MapSourceLoader implements SourceRasterLoader {
    readonly loaded: Raster[] = [];

    constructor(private readonly snapshots: Record<string, () => Raster>) {}

    async load(kind: SymbolKind, style: string): Promise<Raster> {
        const make = this.snapshots[`${kind}/${style}`];
        if (!make) {
            throw new SourceNotFoundError(`${kind}/${style}`);
        }
        const raster = make();
        this.loaded.push(raster);
        return raster;
    }
}

export const FIXED_CLOCK = () => new Date('2026-01-01T00:00:00.000Z');
