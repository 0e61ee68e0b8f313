/**
 * Generator registry keyed by symbol kind
 */

import type { SymbolKind } from "../../engine/types.js";
import { doubleSharpGenerator, flatGenerator, naturalGenerator, sharpGenerator } from "./accidentals.js";
import { trebleGenerator } from "./clefs.js";
import type { SymbolGenerator } from "./types.js";

export class GeneratorRegistry {
    private readonly generators = new Map<SymbolKind, SymbolGenerator>();

    constructor(generators: Iterable<SymbolGenerator> = []) {
        for (const generator of generators) {
            this.register(generator);
        }
    }

    register(generator: SymbolGenerator): this {
        this.generators.set(generator.kind, generator);
        return this;
    }

    get(kind: SymbolKind): SymbolGenerator | undefined {
        return this.generators.get(kind);
    }

    has(kind: SymbolKind): boolean {
        return this.generators.has(kind);
    }

    kinds(): SymbolKind[] {
        return [...this.generators.keys()];
    }
}

export const DEFAULT_GENERATORS: readonly SymbolGenerator[] = [
    flatGenerator,
    sharpGenerator,
    naturalGenerator,
    doubleSharpGenerator,
    trebleGenerator,
];

export function createDefaultRegistry(): GeneratorRegistry {
    return new GeneratorRegistry(DEFAULT_GENERATORS);
}
