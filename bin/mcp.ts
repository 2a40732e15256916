#!/usr/bin/env tsx
/**
 * octoeb MCP server entry point
 *
 * Usage:
 *   tsx bin/mcp.ts          # run directly
 *   octoeb mcp              # via the CLI
 */

import { startMcpServer } from '../src/mcp/server.js'

startMcpServer().catch((error: unknown) => {
  console.error('MCP server error:', error)
  process.exit(1)
})
