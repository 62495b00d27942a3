#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config';
import { SERVER_NAME, SERVER_VERSION, createToolHandler, tools } from './tools';

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const handleTool = createToolHandler(config);

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));
  server.setRequestHandler(CallToolRequestSchema, async request =>
    handleTool(request.params.name, request.params.arguments)
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[DOCX FILLER] Server started - v${SERVER_VERSION} - templates: ${config.templateDir}`);
}

main().catch(err => {
  console.error('[DOCX FILLER] Fatal:', err);
  process.exit(1);
});
