/**
 * Capsule report - PDF contact sheet of a capsule set
 *
 * One row per capsule: the raster, its identity, validity and every validator
 * outcome. Rows flow onto new pages as needed.
 */

import PDFDocument from "pdfkit";
import type { SymbolCapsule } from "../../engine/capsule.js";
import { ExportError } from "../../engine/errors.js";
import { encodePng } from "../raster/io.js";

export interface CapsuleReportOptions {
    title?: string;
    generatedOn?: Date;
}

export interface CapsuleReport {
    pdf: Buffer;
    pages: number;
}

const PAGE_TOP = 50;
const PAGE_BOTTOM = 742;
const LEFT = 50;
const RIGHT = 562;
const THUMB = 72;
const ROW_GAP = 18;

function rowHeight(capsule: SymbolCapsule): number {
    const textLines = 3 + Math.max(1, capsule.validationResults.length);
    return Math.max(THUMB, textLines * 11) + ROW_GAP;
}

export async function renderCapsuleReport(
    capsules: readonly SymbolCapsule[],
    options: CapsuleReportOptions = {}
): Promise<CapsuleReport> {
    const disposed = capsules.find((capsule) => capsule.isDisposed);
    if (disposed) {
        throw new ExportError(`Cannot report on disposed capsule ${disposed.capsuleId}.`);
    }
    // encode up front so the document is written in one synchronous pass
    const images = await Promise.all(capsules.map((capsule) => encodePng(capsule.raster)));

    return new Promise((resolve, reject) => {
        const doc = new PDFDocument({
            size: "LETTER",
            margins: { top: 50, bottom: 50, left: 50, right: 50 },
            autoFirstPage: true,
        });
        const chunks: Buffer[] = [];
        let pages = 1;

        doc.on("data", (chunk: Buffer) => chunks.push(chunk));
        doc.on("end", () => resolve({ pdf: Buffer.concat(chunks), pages }));
        doc.on("error", (err: Error) => reject(err));

        const title = options.title ?? "GLYPH CAPSULE REPORT";
        const generatedOn = (options.generatedOn ?? new Date()).toISOString();

        doc.font("Helvetica-Bold").fontSize(16).text(title, LEFT, PAGE_TOP);
        doc.font("Helvetica").fontSize(8).text(`Generated ${generatedOn} | ${capsules.length} capsule(s)`, LEFT, PAGE_TOP + 22);
        doc.moveTo(LEFT, PAGE_TOP + 36).lineTo(RIGHT, PAGE_TOP + 36).lineWidth(1).stroke();

        let y = PAGE_TOP + 48;
        capsules.forEach((capsule, index) => {
            const height = rowHeight(capsule);
            if (y + height > PAGE_BOTTOM) {
                doc.addPage();
                pages++;
                y = PAGE_TOP;
            }

            doc.rect(LEFT, y, THUMB, THUMB).lineWidth(0.4).stroke();
            doc.image(images[index], LEFT + 2, y + 2, { fit: [THUMB - 4, THUMB - 4], align: "center", valign: "center" });

            const textX = LEFT + THUMB + 14;
            const { metadata, metrics } = capsule;
            doc.font("Helvetica-Bold").fontSize(9).text(metadata.templateName, textX, y, { lineBreak: false });
            doc.font("Helvetica").fontSize(7);
            doc.text(`ID ${metadata.capsuleId}   HASH ${metadata.templateHash.slice(0, 16)}`, textX, y + 12, { lineBreak: false });
            doc.text(
                `${metrics.width}x${metrics.height}   density ${metrics.density.toFixed(2)}% (${metrics.densityStatus})   ${metadata.provenance.method}`,
                textX,
                y + 23,
                { lineBreak: false }
            );
            doc.font("Helvetica-Bold").text(capsule.isValid ? "VALID" : "INVALID", RIGHT - 60, y, { width: 60, align: "right" });

            doc.font("Helvetica");
            const outcomes = capsule.validationResults.length > 0
                ? capsule.validationResults.map((r) => `${r.isValid ? "PASS" : "FAIL"}  ${r.validatorName}${r.failureMessage ? `: ${r.failureMessage}` : ""}`)
                : ["(not validated)"];
            outcomes.forEach((line, i) => {
                doc.text(line, textX, y + 34 + i * 11, { width: RIGHT - textX, lineBreak: false });
            });

            y += height;
        });

        doc.end();
    });
}
