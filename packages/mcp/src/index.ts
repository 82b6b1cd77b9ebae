/**
 * @module mcp
 * MCP (Model Context Protocol) server for the e-paper composer.
 *
 * Speaks MCP over stdio and keeps one composition in memory for the life
 * of the process:
 *
 *   MCP client ──stdio──> This server (Node.js)
 *                              │
 *                              ↓
 *                         Composer session (layers, history, render)
 *
 * Environment:
 *   EINK_WIDTH / EINK_HEIGHT   canvas size (default 250x128)
 *   EINK_COMPOSER_DEBUG=1      log render timings to stderr
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { TOOLS, handleToolCall } from './tools.js';
import { getComposer } from './session.js';

// Resolve the canvas size before accepting requests.
getComposer();

const server = new Server(
  { name: 'eink-composer', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args ?? {});
});

const transport = new StdioServerTransport();
await server.connect(transport);
