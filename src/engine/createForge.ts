/**
 * Composition root: builds the forge from configuration
 */

import type { ForgeConfig } from "../lib/config.js";
import { defaultConfig } from "../lib/config.js";
import { createDefaultRegistry, type GeneratorRegistry } from "../lib/glyphs/registry.js";
import type { Logger } from "../lib/logger.js";
import { createDefaultValidators, ValidatorChain } from "../lib/validation/chain.js";
import { getVersion } from "../lib/version.js";
import { SymbolForge } from "./forge.js";
import { FileSourceRasterLoader, type SourceRasterLoader } from "./morph.js";

export interface CreateForgeOptions {
    config?: ForgeConfig;
    generators?: GeneratorRegistry;
    sources?: SourceRasterLoader;
    logger?: Logger;
}

export function createForge(options: CreateForgeOptions = {}): SymbolForge {
    const config = options.config ?? defaultConfig();
    return new SymbolForge({
        generators: options.generators ?? createDefaultRegistry(),
        validators: new ValidatorChain(createDefaultValidators(config.validation.density), options.logger),
        sources: options.sources ?? new FileSourceRasterLoader(config.assets.rootDirectory),
        version: getVersion(),
        logger: options.logger,
    });
}
