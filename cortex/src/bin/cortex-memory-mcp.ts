#!/usr/bin/env node
import { main } from "../mcp-server.js";

main().catch((error) => {
  console.error("[MCP] Fatal error:", error);
  process.exit(1);
});
