import { env, LogLevel } from "../config/env";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

export type LogFields = Record<string, unknown>;

// stdout carries the MCP protocol, so every level goes to stderr.
export function logEvent(
    level: Exclude<LogLevel, "silent">,
    event: string,
    fields: LogFields = {}
): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[env.logLevel]) {
        return;
    }
    console.error(JSON.stringify({ level, event, ...fields }));
}

export function describeError(error: unknown): LogFields {
    return {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined
    };
}
