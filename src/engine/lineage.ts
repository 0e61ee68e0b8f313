/**
 * Capsule lineage graph
 *
 * Nodes are capsules plus the named morph sources they were blended from.
 * Edges come from the metadata each capsule already carries: `derivedFrom`
 * for edge-case derivatives, `morphLineage` for morphs. Size variants of a
 * set hang off its primary.
 */

import type { SymbolCapsule, SymbolCapsuleSet } from "./capsule.js";
import type { SymbolKind } from "./types.js";

export type LineageTransition = "SizeVariant" | "EdgeCase" | "Morph";

export interface LineageNode {
    id: string;
    kind: SymbolKind;
    /** Template name for capsules, "{kind}:{style}" for morph sources. */
    label: string;
    isSource: boolean;
    interpolationFactor?: number;
    generatedBy?: string;
}

export interface LineageEdge {
    from: string;
    to: string;
    transition: LineageTransition;
    tag: string;
}

const MORPH_SEPARATOR = " -> ";

export class LineageGraph {
    private readonly nodeMap = new Map<string, LineageNode>();
    private readonly edgeList: LineageEdge[] = [];

    get nodes(): LineageNode[] {
        return [...this.nodeMap.values()];
    }

    get edges(): LineageEdge[] {
        return [...this.edgeList];
    }

    /**
     * Adds the capsule and links it to whatever it was derived from.
     * A capsule already in the graph is left as is.
     */
    addCapsule(capsule: SymbolCapsule): void {
        const { metadata } = capsule;
        if (this.nodeMap.has(metadata.capsuleId)) return;

        this.nodeMap.set(metadata.capsuleId, {
            id: metadata.capsuleId,
            kind: metadata.symbolKind,
            label: metadata.templateName,
            isSource: false,
            generatedBy: metadata.generatedBy,
            ...(metadata.interpolationFactor !== undefined && { interpolationFactor: metadata.interpolationFactor }),
        });

        if (metadata.derivedFrom !== undefined) {
            const edgeKind = metadata.templateName.slice(metadata.templateName.lastIndexOf("_") + 1);
            this.link(metadata.derivedFrom, metadata.capsuleId, "EdgeCase", edgeKind);
        }

        if (metadata.morphLineage !== undefined) {
            const factor = `factor ${metadata.interpolationFactor ?? 0}`;
            for (const source of metadata.morphLineage.split(MORPH_SEPARATOR)) {
                this.addSource(source, metadata.symbolKind);
                this.link(source, metadata.capsuleId, "Morph", factor);
            }
        }
    }

    /**
     * Adds every capsule of the set. Variants that are not edge cases are
     * linked to the primary as size variants.
     */
    addSet(set: SymbolCapsuleSet): void {
        this.addCapsule(set.primary);
        for (const variant of set.variants) {
            this.addCapsule(variant);
            if (variant.metadata.derivedFrom === undefined) {
                const { width, height } = variant.metrics;
                this.link(set.primary.capsuleId, variant.capsuleId, "SizeVariant", `${width}x${height}`);
            }
        }
    }

    link(from: string, to: string, transition: LineageTransition, tag: string): void {
        this.edgeList.push({ from, to, transition, tag });
    }

    toDot(): string {
        const lines = ["digraph CapsuleLineage {", "  rankdir=LR;", "  node [shape=box, style=rounded];"];
        for (const node of this.nodeMap.values()) {
            const label = [node.kind, `(${node.label})`];
            if (node.interpolationFactor !== undefined) label.push(`Factor: ${node.interpolationFactor}`);
            const shape = node.isSource ? ", shape=ellipse" : "";
            lines.push(`  ${quote(node.id)} [label=${quote(label.join("\n"))}${shape}];`);
        }
        for (const edge of this.edgeList) {
            lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} [label=${quote(`${edge.transition}\n${edge.tag}`)}];`);
        }
        lines.push("}");
        return `${lines.join("\n")}\n`;
    }

    private addSource(source: string, kind: SymbolKind): void {
        if (this.nodeMap.has(source)) return;
        this.nodeMap.set(source, { id: source, kind, label: source, isSource: true });
    }
}

/**
 * DOT string literal; newlines become the `\n` line break escape.
 */
function quote(value: string): string {
    return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

export function lineageOf(sets: Iterable<SymbolCapsuleSet>): LineageGraph {
    const graph = new LineageGraph();
    for (const set of sets) {
        graph.addSet(set);
    }
    return graph;
}
