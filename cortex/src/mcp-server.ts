/**
 * MCP Server - Expose the memory skills via Model Context Protocol
 *
 * Lets external MCP clients store, query and forget long-term memories.
 * The server runs on stdio; all logging goes to stderr.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { getAllSkills, getSkill } from "./skills/index.js";
import {
  initMemoryManager,
  loadMemoryConfigFromEnv,
} from "./memory/index.js";
import { errorMessage } from "./memory/errors.js";
import { createLogger, setStderrOnly } from "./memory/logger.js";

const log = createLogger("MCP");

export interface MCPServerConfig {
  name: string;
  version: string;
}

const DEFAULT_CONFIG: MCPServerConfig = {
  name: "cortex-memory",
  version: "0.1.0",
};

export type ToolCallResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function textResult(text: string, isError = false): ToolCallResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

export class MemoryMCPServer {
  private server: Server;
  private config: MCPServerConfig;

  constructor(config: Partial<MCPServerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.server = new Server(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  /**
   * Available tools in MCP format
   */
  listTools(): Tool[] {
    return getAllSkills().map((skill) => ({
      name: skill.name,
      description: skill.description,
      inputSchema: {
        type: "object" as const,
        properties: skill.parameters.properties,
        required: skill.parameters.required,
      },
    }));
  }

  /**
   * Run a skill and wrap its result as MCP tool output
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const skill = getSkill(name);
    if (!skill) {
      return textResult(`Error: Unknown tool "${name}"`, true);
    }

    try {
      const result = await skill.execute(args);

      if (result.success) {
        return textResult(result.output || "(no output)");
      }
      return textResult(`Error: ${result.error}`, true);
    } catch (error) {
      return textResult(`Execution failed: ${errorMessage(error)}`, true);
    }
  }

  /**
   * Start the MCP server with stdio transport
   */
  async startStdio(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    log.info(`Memory MCP server started (${this.config.name} v${this.config.version})`);
    log.info(`Available tools: ${getAllSkills().map((s) => s.name).join(", ")}`);
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.server.close();
  }
}

/**
 * Create and start an MCP server
 */
export async function startMCPServer(config?: Partial<MCPServerConfig>): Promise<MemoryMCPServer> {
  const server = new MemoryMCPServer(config);
  await server.startStdio();
  return server;
}

/**
 * CLI entry point: load .env, open the memory store, serve on stdio
 */
export async function main(): Promise<void> {
  setStderrOnly(true);

  const dotenv = await import("dotenv");
  dotenv.config();

  const manager = initMemoryManager(loadMemoryConfigFromEnv(process.env));
  await manager.init();

  const server = await startMCPServer();

  const shutdown = (): void => {
    void server
      .stop()
      .catch((error) => log.error(`Failed to stop server: ${errorMessage(error)}`))
      .finally(() => {
        manager.shutdown();
        process.exit(0);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
