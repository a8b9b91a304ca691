import type { z, ZodRawShape } from "zod";

export type ToolTextContent = {
    type: "text";
    text: string;
};

export type ToolResult = {
    content: ToolTextContent[];
    isError?: boolean;
};

export type ToolInput<Shape extends ZodRawShape> = z.objectOutputType<
    Shape,
    z.ZodTypeAny
>;

export type ToolDefinition<Shape extends ZodRawShape> = {
    name: string;
    description: string;
    inputSchema: Shape;
    handler: (input: ToolInput<Shape>) => Promise<unknown>;
};

export type DefinedTool = {
    name: string;
    description: string;
    inputSchema: ZodRawShape;
    handler: (input: Record<string, unknown>) => Promise<ToolResult>;
};
