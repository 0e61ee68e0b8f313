/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { exportCapsuleReport } from "./export_capsule_report.js";
import { generateSymbol } from "./generate_symbol.js";
import { health } from "./health.js";
import { listSymbolKinds } from "./list_symbol_kinds.js";
import { loadCapsule } from "./load_capsule.js";
import { morphSymbols } from "./morph_symbols.js";
import { ping } from "./ping.js";
import type { RegisteredTool, ToolDefinition } from "./types.js";

export type { RegisteredTool, ToolContext, ToolDefinition } from "./types.js";

/**
 * All registered tools, in listing order
 */
export const registeredTools: readonly RegisteredTool[] = [
    ping,
    health,
    listSymbolKinds,
    generateSymbol,
    morphSymbols,
    exportCapsuleReport,
    loadCapsule,
];

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = registeredTools.map((tool) => tool.definition);

/**
 * Map of tool names to their registrations
 */
export const toolsByName: ReadonlyMap<string, RegisteredTool> = new Map(
    registeredTools.map((tool) => [tool.definition.name, tool])
);
