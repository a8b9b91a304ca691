import { z, ZodRawShape } from "zod";
import type { DefinedTool, ToolDefinition, ToolResult } from "../types/tool";
import { formatErrorResponse, ToolError } from "./error";
import { describeError, logEvent } from "./log";

export function toToolResult(payload: unknown): ToolResult {
    return {
        content: [{ type: "text", text: JSON.stringify(payload) }]
    };
}

/**
 * Builds an MCP tool from a zod input shape. The handler receives the parsed
 * input; its return value is serialized as JSON text content and any thrown
 * error becomes an `isError` result.
 */
export function defineTool<Shape extends ZodRawShape>(
    factory: (zod: typeof z) => ToolDefinition<Shape>
): DefinedTool {
    const definition = factory(z);
    const schema = z.object(definition.inputSchema);

    return {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        handler: async (rawInput) => {
            const startedAt = Date.now();
            try {
                const parsed = schema.safeParse(rawInput ?? {});
                if (!parsed.success) {
                    throw new ToolError(
                        parsed.error.issues[0]?.message ?? "Invalid input",
                        "invalid_input",
                        { issues: parsed.error.issues }
                    );
                }
                const result = await definition.handler(parsed.data);
                logEvent("debug", "tool.success", {
                    tool: definition.name,
                    duration_ms: Date.now() - startedAt
                });
                return toToolResult(result);
            } catch (error) {
                logEvent(error instanceof ToolError ? "warn" : "error", "tool.failure", {
                    tool: definition.name,
                    code: error instanceof ToolError ? error.code : "internal_error",
                    ...describeError(error)
                });
                return formatErrorResponse(error);
            }
        }
    };
}
