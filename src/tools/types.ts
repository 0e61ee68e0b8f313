/**
 * Shared tool plumbing
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import type { SymbolForge } from "../engine/forge.js";
import type { ForgeConfig } from "../lib/config.js";
import type { CapsuleRegistry } from "../lib/persistence/registry.js";

/**
 * Tool definition type
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

/**
 * Services a tool handler may use
 */
export interface ToolContext {
    forge: SymbolForge;
    config: ForgeConfig;
    registry: CapsuleRegistry;
    toolCount: () => number;
}

export interface RegisteredTool {
    definition: ToolDefinition;
    /** Validates `args` against the tool's schema, then runs the handler. */
    invoke(args: unknown, context: ToolContext): Promise<unknown>;
}

export function defineTool<S extends z.ZodTypeAny>(
    definition: ToolDefinition,
    schema: S,
    handler: (input: z.output<S>, context: ToolContext) => Promise<unknown> | unknown
): RegisteredTool {
    return {
        definition,
        async invoke(args, context) {
            const parseResult = schema.safeParse(args ?? {});
            if (!parseResult.success) {
                const issue = parseResult.error.issues[0];
                throw new McpError(
                    ErrorCode.InvalidParams,
                    issue
                        ? `Invalid parameters for ${definition.name}: ${issue.path.join(".") || "(root)"} ${issue.message}`
                        : `Invalid parameters for ${definition.name}`
                );
            }
            return handler(parseResult.data, context);
        },
    };
}
