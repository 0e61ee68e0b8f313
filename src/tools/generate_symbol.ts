/**
 * generate_symbol tool
 *
 * Runs a symbol request through the forge and returns capsule summaries.
 * Optionally exports each capsule (PNG + JSON), records it in the registry
 * and inlines a base64 PNG preview. Capsules never outlive the call.
 */

import { z } from "zod";
import { resolveOutputForm } from "../engine/forge.js";
import { lineageOf } from "../engine/lineage.js";
import { EDGE_CASE_KINDS, OUTPUT_FORMS, SYMBOL_KINDS, type SymbolRequest } from "../engine/types.js";
import { exportCapsule, type ExportedCapsule } from "../lib/persistence/exporter.js";
import { encodePng } from "../lib/raster/io.js";
import { summarizeCapsule, type CapsuleSummary } from "./summary.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

export const MAX_SIDE = 4096;

const dimensionSchema = z.object({
    width: z.number().int().positive().max(MAX_SIDE),
    height: z.number().int().positive().max(MAX_SIDE),
});

export const symbolRequestSchema = z.object({
    kind: z.enum(SYMBOL_KINDS),
    dimensions: z.array(dimensionSchema).min(1).max(16),
    outputForms: z.array(z.enum(OUTPUT_FORMS)).default(["Binarized"]),
    seed: z.number().int().optional(),
    edgeCases: z.array(z.enum(EDGE_CASE_KINDS)).optional(),
    overrides: z
        .record(
            z.object({
                overridden: z.boolean(),
                reason: z.string().min(1),
            })
        )
        .optional(),
});

export const generateSymbolInputSchema = symbolRequestSchema.extend({
    export: z.boolean().default(false),
    includePreview: z.boolean().default(false),
    includeLineage: z.boolean().default(false),
});

export type SymbolRequestInput = z.output<typeof symbolRequestSchema>;
export type GenerateSymbolInput = z.output<typeof generateSymbolInputSchema>;

export interface GeneratedCapsule extends CapsuleSummary {
    exported?: ExportedCapsule;
    registered?: boolean;
    previewPngBase64?: string;
}

export interface GenerateSymbolOutput {
    ok: true;
    primary: GeneratedCapsule;
    variants: GeneratedCapsule[];
    /** Graphviz DOT of the set's lineage, when requested. */
    lineageDot?: string;
}

export function toSymbolRequest(input: SymbolRequestInput): SymbolRequest {
    return {
        kind: input.kind,
        dimensions: input.dimensions,
        outputForms: input.outputForms,
        seed: input.seed,
        edgeCases: input.edgeCases,
        overrides: input.overrides,
    };
}

export async function generateSymbolHandler(input: GenerateSymbolInput, context: ToolContext): Promise<GenerateSymbolOutput> {
    const set = context.forge.generate(toSymbolRequest(input));
    try {
        const form = resolveOutputForm(input.outputForms);
        const described: GeneratedCapsule[] = [];
        for (const capsule of set.all) {
            const entry: GeneratedCapsule = summarizeCapsule(capsule);
            if (input.export) {
                entry.exported = await exportCapsule(capsule, context.config.output.directory, form);
                entry.registered = await context.registry.append(capsule);
            }
            if (input.includePreview) {
                entry.previewPngBase64 = (await encodePng(capsule.raster)).toString("base64");
            }
            described.push(entry);
        }
        const [primary, ...variants] = described;
        const output: GenerateSymbolOutput = { ok: true, primary, variants };
        if (input.includeLineage) {
            output.lineageDot = lineageOf([set]).toDot();
        }
        return output;
    } finally {
        set.dispose();
    }
}

export const symbolRequestProperties = {
    kind: {
        type: "string",
        enum: [...SYMBOL_KINDS],
        description: "Symbol kind to generate",
    },
    dimensions: {
        type: "array",
        description: "Target sizes; the first is the primary, the rest are size variants",
        items: {
            type: "object",
            properties: {
                width: { type: "integer", minimum: 1, maximum: MAX_SIDE },
                height: { type: "integer", minimum: 1, maximum: MAX_SIDE },
            },
            required: ["width", "height"],
        },
        minItems: 1,
    },
    outputForms: {
        type: "array",
        items: { type: "string", enum: [...OUTPUT_FORMS] },
        description: "Requested forms; Skeletonized wins over Binarized, Binarized over Raw (default: ['Binarized'])",
    },
    seed: {
        type: "integer",
        description: "Optional generation seed for reproducible placement",
    },
    edgeCases: {
        type: "array",
        items: { type: "string", enum: [...EDGE_CASE_KINDS] },
        description: "Edge-case variants to derive from the primary capsule",
    },
    overrides: {
        type: "object",
        description: "Validator overrides keyed by validator name, e.g. {\"Density Validator\": {\"overridden\": true, \"reason\": \"...\"}}",
        additionalProperties: {
            type: "object",
            properties: {
                overridden: { type: "boolean" },
                reason: { type: "string" },
            },
            required: ["overridden", "reason"],
        },
    },
};

export const generateSymbolTool: ToolDefinition = {
    name: "generate_symbol",
    description: "Generates validated, content-hashed glyph capsules for a symbol kind at one or more sizes, with optional edge-case variants",
    inputSchema: {
        type: "object",
        properties: {
            ...symbolRequestProperties,
            export: {
                type: "boolean",
                description: "Write PNG + JSON for each capsule to the output directory and record it in the registry (default: false)",
                default: false,
            },
            includePreview: {
                type: "boolean",
                description: "Include a base64 PNG of each capsule (default: false)",
                default: false,
            },
            includeLineage: {
                type: "boolean",
                description: "Include the set's lineage graph in Graphviz DOT (default: false)",
                default: false,
            },
        },
        required: ["kind", "dimensions"],
    },
};

export const generateSymbol = defineTool(generateSymbolTool, generateSymbolInputSchema, generateSymbolHandler);
