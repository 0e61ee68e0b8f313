import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string().min(1) });

/**
 * Get version from environment variable or package.json
 */
export function getVersion(): string {
    // Try environment variable first
    if (process.env.VERSION) {
        return process.env.VERSION;
    }

    // Try to read from package.json
    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packagePath, "utf-8")));
        return parsed.success ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}
