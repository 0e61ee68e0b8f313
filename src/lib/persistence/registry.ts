/**
 * Append-only capsule registry (one JSON object per line)
 */

import { existsSync } from "fs";
import { appendFile, mkdir, readFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { SymbolCapsule } from "../../engine/capsule.js";
import { createLogger } from "../logger.js";

export const registryEntrySchema = z.object({
    capsuleId: z.string().min(1),
    templateHash: z.string().min(1),
    timestamp: z.string(),
    isValid: z.boolean(),
});

export type RegistryEntry = z.infer<typeof registryEntrySchema>;

const logger = createLogger("registry");

export class CapsuleRegistry {
    private readonly known = new Map<string, RegistryEntry>();
    private ready: Promise<void> | null = null;

    constructor(
        readonly path: string,
        private readonly clock: () => Date = () => new Date()
    ) {}

    /**
     * Read existing entries. Lines that fail to parse are skipped with a warning.
     */
    load(): Promise<void> {
        this.ready = this.readEntries();
        return this.ready;
    }

    private async readEntries(): Promise<void> {
        this.known.clear();
        if (existsSync(this.path)) {
            const text = await readFile(this.path, "utf-8");
            text.split("\n").forEach((line, index) => {
                if (line.trim() === "") return;
                const parsed = parseLine(line);
                if (!parsed) {
                    logger.warn("Skipping malformed registry line", { path: this.path, line: index + 1 });
                    return;
                }
                this.known.set(parsed.capsuleId, parsed);
            });
        }
    }

    /**
     * Resolves once entries have been read, loading them on first use.
     */
    loaded(): Promise<void> {
        return this.ready ?? this.load();
    }

    has(capsuleId: string): boolean {
        return this.known.has(capsuleId);
    }

    entries(): RegistryEntry[] {
        return [...this.known.values()];
    }

    /**
     * Append a record for the capsule. Returns false when its id is already present.
     */
    async append(capsule: SymbolCapsule): Promise<boolean> {
        await this.loaded();
        const { capsuleId, templateHash } = capsule.metadata;
        if (this.known.has(capsuleId)) {
            logger.debug("Capsule already registered", { capsuleId });
            return false;
        }
        const entry: RegistryEntry = {
            capsuleId,
            templateHash,
            timestamp: this.clock().toISOString(),
            isValid: capsule.isValid,
        };
        // reserve the id before awaiting so concurrent appends of one capsule write once
        this.known.set(capsuleId, entry);
        try {
            await mkdir(dirname(this.path), { recursive: true });
            await appendFile(this.path, `${JSON.stringify(entry)}\n`, "utf-8");
        } catch (error) {
            this.known.delete(capsuleId);
            throw error;
        }
        return true;
    }
}

function parseLine(line: string): RegistryEntry | null {
    try {
        const result = registryEntrySchema.safeParse(JSON.parse(line));
        return result.success ? result.data : null;
    } catch {
        return null;
    }
}
