#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { env } from "./config/env";
import DashboardToolsService from "./tools";
import type { DefinedTool } from "./types/tool";
import { describeError, logEvent } from "./utils/log";

async function main(): Promise<void> {
    logEvent("info", "server.starting", { dataset_dir: env.datasetDir });

    const dashboardTools = new DashboardToolsService();
    let tools: DefinedTool[] = [];
    try {
        await dashboardTools.init();
        tools = dashboardTools.defineTools();
    } catch (error) {
        logEvent("error", "server.init_failed", describeError(error));
        process.exit(1);
    }

    const server = new McpServer(
        {
            name: "Olist Analytics MCP Server",
            version: "0.1.0"
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    tools.forEach((tool) => {
        server.tool(
            tool.name,
            tool.description,
            tool.inputSchema,
            tool.handler
        );
    });

    const transport = new StdioServerTransport();
    await server.connect(transport);

    logEvent("info", "server.ready", { tools: tools.length, transport: "stdio" });
}

main().catch((error: unknown) => {
    logEvent("error", "server.fatal", describeError(error));
    process.exit(1);
});
