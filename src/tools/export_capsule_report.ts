/**
 * export_capsule_report tool - PDF contact sheet for one symbol request
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { z } from "zod";
import { renderCapsuleReport } from "../lib/report/capsuleReport.js";
import { symbolRequestProperties, symbolRequestSchema, toSymbolRequest } from "./generate_symbol.js";
import { defineTool, type ToolContext, type ToolDefinition } from "./types.js";

export const exportCapsuleReportInputSchema = symbolRequestSchema.extend({
    outputPath: z.string().min(1).refine((p) => p.toLowerCase().endsWith(".pdf"), "outputPath must end in .pdf"),
    title: z.string().max(120).optional(),
});

export type ExportCapsuleReportInput = z.output<typeof exportCapsuleReportInputSchema>;

export interface ExportCapsuleReportOutput {
    ok: true;
    path: string;
    pages: number;
    capsules: number;
}

export async function exportCapsuleReportHandler(
    input: ExportCapsuleReportInput,
    context: ToolContext
): Promise<ExportCapsuleReportOutput> {
    const set = context.forge.generate(toSymbolRequest(input));
    try {
        const capsules = set.all;
        const report = await renderCapsuleReport(capsules, { title: input.title });
        const path = resolve(input.outputPath);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, report.pdf);
        return { ok: true, path, pages: report.pages, capsules: capsules.length };
    } finally {
        set.dispose();
    }
}

export const exportCapsuleReportTool: ToolDefinition = {
    name: "export_capsule_report",
    description: "Generates a symbol request and writes a PDF contact sheet of every capsule with its validator outcomes",
    inputSchema: {
        type: "object",
        properties: {
            ...symbolRequestProperties,
            outputPath: { type: "string", description: "Destination .pdf path" },
            title: { type: "string", description: "Optional report title" },
        },
        required: ["kind", "dimensions", "outputPath"],
    },
};

export const exportCapsuleReport = defineTool(
    exportCapsuleReportTool,
    exportCapsuleReportInputSchema,
    exportCapsuleReportHandler
);
