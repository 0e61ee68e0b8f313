/**
 * load_capsule tool - reads an exported capsule back and checks its hash
 */

import { z } from "zod";
import { loadCapsule as readCapsule } from "../lib/persistence/loader.js";
import { summarizeCapsule, type CapsuleSummary } from "./summary.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

export const loadCapsuleInputSchema = z.object({
    path: z.string().min(1).endsWith(".json"),
});

export type LoadCapsuleInput = z.output<typeof loadCapsuleInputSchema>;

export interface LoadCapsuleOutput {
    ok: true;
    capsule: CapsuleSummary;
    registered: boolean;
}

export async function loadCapsuleHandler(input: LoadCapsuleInput, context: ToolContext): Promise<LoadCapsuleOutput> {
    const capsule = await readCapsule(input.path);
    try {
        await context.registry.loaded();
        return { ok: true, capsule: summarizeCapsule(capsule), registered: context.registry.has(capsule.capsuleId) };
    } finally {
        capsule.dispose();
    }
}

export const loadCapsuleTool: ToolDefinition = {
    name: "load_capsule",
    description: "Reads an exported capsule (JSON sidecar + PNG), verifies its content hash and reports whether it is registered",
    inputSchema: {
        type: "object",
        properties: {
            path: { type: "string", description: "Path to the capsule's .json sidecar" },
        },
        required: ["path"],
    },
};

export const loadCapsule = defineTool(loadCapsuleTool, loadCapsuleInputSchema, loadCapsuleHandler);
