#!/usr/bin/env node

// MCP over stdio: stdout carries JSON-RPC only, every diagnostic goes to stderr.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { callTool, TOOL_DEFINITIONS } from './tools.js';

const server = new Server(
    { name: 'docs2uitk', version: '1.0.0' },
    { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(request.params.name, request.params.arguments ?? {}),
);

async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    process.stderr.write('docs2uitk MCP server running on stdio\n');
}

main().catch((error: unknown) => {
    process.stderr.write(`Server error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
