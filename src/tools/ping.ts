/**
 * Ping tool - Liveness check and echo utility
 */

import { z } from "zod";
import { defineTool, type ToolDefinition } from "./types.js";

export const pingInputSchema = z.object({
    message: z.string().max(1024).optional(),
});

export type PingInput = z.infer<typeof pingInputSchema>;

export interface PingOutput {
    ok: true;
    echo: string;
    timestamp: string;
}

/**
 * Echoes the message (default "pong") with the current time
 */
export function pingHandler(input: PingInput = {}): PingOutput {
    return {
        ok: true,
        echo: input.message || "pong",
        timestamp: new Date().toISOString(),
    };
}

export const pingTool: ToolDefinition = {
    name: "ping",
    description: "Liveness check that echoes a message with a timestamp",
    inputSchema: {
        type: "object",
        properties: {
            message: {
                type: "string",
                description: "Optional message to echo (default: 'pong')",
            },
        },
    },
};

export const ping = defineTool(pingTool, pingInputSchema, (input) => pingHandler(input));
