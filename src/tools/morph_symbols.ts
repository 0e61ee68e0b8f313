/**
 * morph_symbols tool - blends two stored style snapshots of a symbol
 */

import { z } from "zod";
import { SYMBOL_KINDS } from "../engine/types.js";
import { BLEND_MODES } from "../lib/raster/blend.js";
import { encodePng } from "../lib/raster/io.js";
import { summarizeCapsule, type CapsuleSummary } from "./summary.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

const styleName = z.string().regex(/^[A-Za-z0-9_-]+$/, "style names may contain letters, digits, '_' and '-'");

export const morphSymbolsInputSchema = z.object({
    kind: z.enum(SYMBOL_KINDS),
    fromStyle: styleName,
    toStyle: styleName,
    factor: z.number().min(0).max(1),
    blendMode: z.enum(BLEND_MODES).default("linear"),
    includePreview: z.boolean().default(false),
});

export type MorphSymbolsInput = z.output<typeof morphSymbolsInputSchema>;

export interface MorphSymbolsOutput {
    ok: true;
    capsule: CapsuleSummary;
    previewPngBase64?: string;
}

export async function morphSymbolsHandler(input: MorphSymbolsInput, context: ToolContext): Promise<MorphSymbolsOutput> {
    const capsule = await context.forge.morph({
        kind: input.kind,
        fromStyle: input.fromStyle,
        toStyle: input.toStyle,
        interpolationFactor: input.factor,
        blendMode: input.blendMode,
    });
    try {
        const output: MorphSymbolsOutput = { ok: true, capsule: summarizeCapsule(capsule) };
        if (input.includePreview) {
            output.previewPngBase64 = (await encodePng(capsule.raster)).toString("base64");
        }
        return output;
    } finally {
        capsule.dispose();
    }
}

export const morphSymbolsTool: ToolDefinition = {
    name: "morph_symbols",
    description: "Blends two style snapshots of a symbol ({assetRoot}/snapshots/{kind}/{style}.png) into one validated capsule",
    inputSchema: {
        type: "object",
        properties: {
            kind: { type: "string", enum: [...SYMBOL_KINDS] },
            fromStyle: { type: "string", description: "Snapshot style to blend from" },
            toStyle: { type: "string", description: "Snapshot style to blend to" },
            factor: { type: "number", minimum: 0, maximum: 1, description: "Interpolation factor (0 = from, 1 = to)" },
            blendMode: {
                type: "string",
                enum: [...BLEND_MODES],
                description: "Blend formula (default: linear)",
                default: "linear",
            },
            includePreview: { type: "boolean", default: false },
        },
        required: ["kind", "fromStyle", "toStyle", "factor"],
    },
};

export const morphSymbols = defineTool(morphSymbolsTool, morphSymbolsInputSchema, morphSymbolsHandler);
