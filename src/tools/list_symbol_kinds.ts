import { z } from "zod";
import { SYMBOL_KINDS, type SymbolKind } from "../engine/types.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

export interface ListSymbolKindsOutput {
    ok: true;
    kinds: Array<{ kind: SymbolKind; registered: boolean }>;
}

export function listSymbolKindsHandler(context: ToolContext): ListSymbolKindsOutput {
    return {
        ok: true,
        kinds: SYMBOL_KINDS.map((kind) => ({ kind, registered: context.forge.hasGenerator(kind) })),
    };
}

export const listSymbolKindsTool: ToolDefinition = {
    name: "list_symbol_kinds",
    description: "Lists every symbol kind and whether a generator is registered for it (unregistered kinds produce fallback capsules)",
    inputSchema: {
        type: "object",
        properties: {},
    },
};

export const listSymbolKinds = defineTool(listSymbolKindsTool, z.object({}), (_input, context) =>
    listSymbolKindsHandler(context)
);
