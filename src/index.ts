#!/usr/bin/env node
import { createLogger } from "./lib/logger.js";
import { GlyphForgeServer } from "./server.js";

const logger = createLogger("main");

const server = new GlyphForgeServer();
server.run().catch((error: unknown) => {
    logger.error("Failed to start server", { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
