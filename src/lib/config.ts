/**
 * Forge configuration
 *
 * Defaults, then an optional JSON file, then GLYPH_FORGE_* environment
 * overrides, all parsed through one zod schema.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "../engine/errors.js";
import { LOG_LEVELS } from "./logger.js";

const unitInterval = z.number().min(0).max(1);

export const configSchema = z.object({
    validation: z
        .object({
            density: z
                .object({
                    min: unitInterval.default(0.05),
                    max: unitInterval.default(0.12),
                })
                .default({})
                .refine((d) => d.min <= d.max, {
                    message: "density min must not exceed density max",
                }),
        })
        .default({}),
    assets: z
        .object({
            rootDirectory: z.string().min(1).default("assets"),
        })
        .default({}),
    output: z
        .object({
            directory: z.string().min(1).default("output"),
            registryPath: z.string().min(1).default("output/capsule-registry.jsonl"),
        })
        .default({}),
    logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type ForgeConfig = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    /** JSON file to read; falls back to GLYPH_FORGE_CONFIG. */
    configPath?: string;
}

function toIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function readConfigFile(path: string): unknown {
    const resolved = resolve(path);
    if (!existsSync(resolved)) {
        throw new ConfigError([`config file not found: ${resolved}`]);
    }
    try {
        return JSON.parse(readFileSync(resolved, "utf-8"));
    } catch (error) {
        throw new ConfigError([`config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
    }
}

const plainObject = z.record(z.unknown());

function section(value: unknown, key: string): Record<string, unknown> {
    const parsed = plainObject.safeParse(value);
    if (!parsed.success) return {};
    const inner = plainObject.safeParse(parsed.data[key]);
    return inner.success ? { ...inner.data } : {};
}

function numberFromEnv(value: string | undefined): number | string | undefined {
    if (value === undefined || value.trim() === "") return undefined;
    const parsed = Number(value);
    // leave non-numeric text in place so the schema reports it
    return Number.isNaN(parsed) ? value : parsed;
}

/**
 * Merge env overrides into the raw file contents before validation.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): Record<string, unknown> {
    const base = plainObject.safeParse(raw);
    const merged: Record<string, unknown> = base.success ? { ...base.data } : {};

    const validation = section(merged, "validation");
    const density = section(validation, "density");
    const min = numberFromEnv(env.GLYPH_FORGE_DENSITY_MIN);
    const max = numberFromEnv(env.GLYPH_FORGE_DENSITY_MAX);
    if (min !== undefined) density.min = min;
    if (max !== undefined) density.max = max;
    merged.validation = { ...validation, density };

    if (env.GLYPH_FORGE_ASSET_ROOT) {
        merged.assets = { ...section(merged, "assets"), rootDirectory: env.GLYPH_FORGE_ASSET_ROOT };
    }
    if (env.GLYPH_FORGE_OUTPUT_DIR) {
        const output = section(merged, "output");
        merged.output = {
            ...output,
            directory: env.GLYPH_FORGE_OUTPUT_DIR,
            registryPath: output.registryPath ?? `${env.GLYPH_FORGE_OUTPUT_DIR}/capsule-registry.jsonl`,
        };
    }
    if (env.GLYPH_FORGE_LOG_LEVEL) {
        merged.logLevel = env.GLYPH_FORGE_LOG_LEVEL;
    }
    return merged;
}

export function parseConfig(input: unknown): ForgeConfig {
    const result = configSchema.safeParse(input ?? {});
    if (!result.success) {
        throw new ConfigError(toIssues(result.error));
    }
    return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): ForgeConfig {
    const env = options.env ?? process.env;
    const path = options.configPath ?? env.GLYPH_FORGE_CONFIG;
    const raw = path ? readConfigFile(path) : {};
    return parseConfig(applyEnvOverrides(raw, env));
}

export function defaultConfig(): ForgeConfig {
    return parseConfig({});
}
