#!/usr/bin/env node
/**
 * go-annotate MCP server - Entry Point
 */

import 'dotenv/config';
import { runServer } from './server.js';
import { VERSION } from './version.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
go-annotate MCP Server - GO molecular-function annotation

Usage: go-annotate-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - annotate-proteins  All (or selected) molecular functions of proteins
  - classify-proteins  Category per protein from required/forbidden GO rules
  - get-term           GO term lookup with optional ancestors
  - check-rules        Rule set diagnostics

Environment:
  QUICKGO_BASE_URL         QuickGO services URL
  GO_ANNOTATE_TIMEOUT_MS   Request timeout in milliseconds
  GO_ANNOTATE_CONCURRENCY  Proteins fetched in parallel

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`go-annotate-mcp version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

main().catch((e) => {
    console.error('Error:', e instanceof Error ? e.message : e);
    process.exit(1);
});
