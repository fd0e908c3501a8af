#!/usr/bin/env node
/**
 * graph-reasoner MCP server entry point
 */

import { runServer, VERSION } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
graph-reasoner MCP server - graph pattern queries and forward-chaining rules

Usage: graph-reasoner-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - run-query     Answer SELECT / ASK / CONSTRUCT / DESCRIBE queries, optionally after rules
  - apply-rules   Apply a rule tier and return the enriched graph as N-Triples
  - check-rules   Validate declarative rule text line by line

Environment:
  GRAPH_REASONER_NAMESPACE, GRAPH_REASONER_PREFIXES,
  GRAPH_REASONER_RECOMMENDATION, GRAPH_REASONER_VERBOSE

The server communicates via stdio using the Model Context Protocol.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`graph-reasoner version ${VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void main();
