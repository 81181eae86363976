/**
 * @module mcp
 * MCP (Model Context Protocol) server for Switchboard.
 *
 * Talks to the client over stdio and keeps one light switch session in
 * process for the lifetime of the server:
 *
 *   MCP client ──stdio──> this server ──> ActionDispatcher ──> LightSwitch
 *
 * Log lines go to stderr; stdout carries protocol frames.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { attachConsoleLogger, createSession } from '@switchboard/core';
import { readCapacity } from './config.js';
import { TOOLS, handleToolCall } from './tools.js';

const session = createSession({ capacity: readCapacity(process.env) });
attachConsoleLogger(session.bus, { verbose: true, log: (line) => console.error(line) });

const server = new Server(
  { name: 'switchboard', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(session, name, args ?? {});
});

const transport = new StdioServerTransport();
await server.connect(transport);
console.error('[MCP] switchboard server listening on stdio');
