/**
 * Scoped stderr logger
 *
 * stdout carries the MCP stdio transport, so every line goes through
 * console.error. Output is silent under the test runner unless a level is
 * set explicitly.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === "test" || typeof process.env.VITEST !== "undefined";
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
    if (isTestEnvironment()) return "silent";
    const fromEnv = process.env.GLYPH_FORGE_LOG_LEVEL;
    return isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function formatLogLine(scope: string, level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): string {
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
    return `[glyph-forge:${scope}] ${level.toUpperCase()} ${message}${suffix}`;
}

export function createLogger(scope: string): Logger {
    const emit = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
        if (SEVERITY[level] < SEVERITY[currentLevel]) return;
        console.error(formatLogLine(scope, level, message, context));
    };
    return {
        debug: (message, context) => emit("debug", message, context),
        info: (message, context) => emit("info", message, context),
        warn: (message, context) => emit("warn", message, context),
        error: (message, context) => emit("error", message, context),
    };
}
