import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
    type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { createForge } from "./engine/createForge.js";
import { isForgeError } from "./engine/errors.js";
import type { SymbolForge } from "./engine/forge.js";
import { loadConfig, type ForgeConfig } from "./lib/config.js";
import { createLogger, isTestEnvironment, setLogLevel } from "./lib/logger.js";
import { CapsuleRegistry } from "./lib/persistence/registry.js";
import { getVersion } from "./lib/version.js";
import { tools, toolsByName, type ToolContext } from "./tools/index.js";

const logger = createLogger("server");

export interface GlyphForgeServerOptions {
    config?: ForgeConfig;
    forge?: SymbolForge;
    registry?: CapsuleRegistry;
}

function textResult(text: string): CallToolResult {
    return {
        content: [
            {
                type: "text",
                text,
            },
        ],
    };
}

/**
 * GlyphForge MCP Server
 * Glyph synthesis and validation over stdio
 */
export class GlyphForgeServer {
    private server: Server;
    private context: ToolContext;

    constructor(options: GlyphForgeServerOptions = {}) {
        const config = options.config ?? loadConfig();
        if (!isTestEnvironment()) {
            setLogLevel(config.logLevel);
        }

        this.context = {
            config,
            forge: options.forge ?? createForge({ config }),
            registry: options.registry ?? new CapsuleRegistry(config.output.registryPath),
            toolCount: () => tools.length,
        };

        this.server = new Server(
            {
                name: "glyph-forge-mcp",
                version: getVersion(),
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => logger.error("MCP error", { error: String(error) });

        // Only set up SIGINT handler if not in test environment
        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => logger.error("Failed to close server", { error: String(error) }))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const tool = toolsByName.get(toolName);
            if (!tool) {
                throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
            }

            try {
                const result = await tool.invoke(request.params.arguments, this.context);
                return textResult(JSON.stringify(result, null, 2));
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                if (isForgeError(error)) {
                    logger.warn(`${toolName} failed`, { error: error.message });
                    return { ...textResult(error.message), isError: true };
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport) {
            logger.info("GlyphForge MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
