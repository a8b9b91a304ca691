import type { ToolResult } from "../types/tool";

export class ToolError extends Error {
    constructor(
        message: string,
        public code: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "ToolError";
    }
}

export class DatasetError extends ToolError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, "dataset_invalid", details);
        this.name = "DatasetError";
    }
}

export function formatErrorResponse(error: unknown): ToolResult {
    const payload =
        error instanceof ToolError
            ? {
                  code: error.code,
                  message: error.message,
                  ...(error.details ? { details: error.details } : {})
              }
            : {
                  code: "internal_error",
                  message: error instanceof Error ? error.message : String(error)
              };

    return {
        isError: true,
        content: [{ type: "text", text: JSON.stringify({ error: payload }) }]
    };
}
