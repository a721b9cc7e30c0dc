#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main() {
  if (process.argv.includes("--help") || process.argv.includes("-h")) {
    console.error("transcript-search: MCP server for searching conversation transcripts");
    console.error("");
    console.error("Usage:");
    console.error("  transcript-search          Start the MCP server (stdio transport)");
    console.error("  transcript-search --help   Show this help message");
    console.error("");
    console.error("Environment:");
    console.error("  TRANSCRIPTS_ROOT    Directory of project folders holding .jsonl transcripts");
    console.error("  CLAUDE_CONFIG_DIR   Agent config dir; transcripts are read from <dir>/projects");
    return;
  }

  const server = await createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("transcript-search server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
