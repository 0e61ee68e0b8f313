/**
 * Health tool - Server status, generator and validator inventory
 */

import { z } from "zod";
import { getVersion } from "../lib/version.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    generators: string[];
    validators: string[];
}

// Track server start time
const startTime = Date.now();

export function healthHandler(context: ToolContext): HealthOutput {
    return {
        ok: true,
        version: getVersion(),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount: context.toolCount(),
        generators: context.forge.registeredKinds,
        validators: context.forge.validatorNames,
    };
}

export const healthTool: ToolDefinition = {
    name: "health",
    description: "Returns server health: version, uptime, tool count, registered generators and the validator chain",
    inputSchema: {
        type: "object",
        properties: {},
    },
};

export const health = defineTool(healthTool, z.object({}), (_input, context) => healthHandler(context));
