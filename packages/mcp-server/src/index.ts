#!/usr/bin/env node
/**
 * voxmesh MCP Server
 *
 * Wraps the voxel meshing kernel as 13 callable tools for LLM agents.
 * Runs over stdio transport; stdout carries the protocol, so all
 * diagnostics go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { registerTools } from './tools.js';

const config = loadConfig();

const server = new McpServer({
  name: 'voxmesh',
  version: '0.1.0',
});

registerTools(server, config);

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`voxmesh MCP server ready on stdio (exports to ${config.exportDir}, max ${config.maxCells} samples per volume)`);
