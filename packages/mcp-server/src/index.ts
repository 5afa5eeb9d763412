#!/usr/bin/env node
/**
 * vecn MCP Server
 *
 * Wraps the vecn vector core as 15 callable tools for LLM agents.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { configure } from './registry.js';
import { registerTools } from './tools.js';

const config = loadConfig();
configure(config);

const server = new McpServer({
  name: 'vecn',
  version: '0.1.0',
});

registerTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
// stdout carries the protocol
console.error(`vecn MCP server ready on stdio (max ${config.maxVectors} vectors)`);
