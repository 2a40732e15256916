/**
 * MCP server for octoeb
 *
 * Exposes the read-only side of the workflow (tickets, release branches,
 * versions, QA lists and changelogs) as MCP tools, so an MCP client can ask
 * about the state of a release without running any Gitflow step.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { z } from 'zod'
import { describe } from '../lib/errors.js'
import { branchName, releaseBaseName } from '../lib/format.js'
import * as log from '../lib/logger.js'
import { createWorkflowContext, latestReleaseBranch, type WorkflowContext } from '../workflows/context.js'
import { changelog } from '../workflows/local.js'
import { listQaTickets } from '../workflows/qa.js'
import { versions } from '../workflows/release.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type ToolResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean }

function text(value: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }],
  }
}

/** Run a query against a fresh context; failures come back as tool errors. */
async function query(load: () => WorkflowContext, fn: (ctx: WorkflowContext) => Promise<unknown>): Promise<ToolResult> {
  try {
    return text(await fn(load()))
  } catch (error) {
    return { ...text(`Error: ${describe(error)}`), isError: true }
  }
}

// ---------------------------------------------------------------------------
// Create MCP Server
// ---------------------------------------------------------------------------

export function createMcpServer(load: () => WorkflowContext = () => createWorkflowContext()): McpServer {
  const server = new McpServer({
    name: 'octoeb',
    version: '1.0.0',
  })

  // =========================================================================
  // Issue tracker
  // =========================================================================

  server.tool(
    'tracker_get_ticket',
    'Get a ticket by id (summary, type, status and which branch kinds it allows)',
    {
      id: z.string().describe('Ticket id, e.g. EB-123'),
    },
    async ({ id }) => query(load, (ctx) => ctx.tracker.getTicket(id.toUpperCase()))
  )

  server.tool(
    'tracker_my_tickets',
    'List the tickets in the configured "my tickets" filter, or another saved filter',
    {
      filter_id: z.string().optional().describe('Saved filter id (defaults to TICKET_FILTER_ID)'),
    },
    async ({ filter_id }) => query(load, (ctx) => ctx.tracker.listMyTickets(filter_id))
  )

  server.tool(
    'tracker_branch_name',
    'Name of the branch a ticket would get for a branch kind',
    {
      id: z.string().describe('Ticket id'),
      kind: z.enum(['feature', 'hotfix', 'releasefix']).describe('Branch kind'),
    },
    async ({ id, kind }) =>
      query(load, async (ctx) => branchName(kind, await ctx.tracker.getTicket(id.toUpperCase())))
  )

  // =========================================================================
  // Source host
  // =========================================================================

  server.tool(
    'host_release_branches',
    'List release branches on the mainline repository and the newest one',
    {},
    async () =>
      query(load, async (ctx) => ({
        branches: (await ctx.mainline.listBranches(`${releaseBaseName(ctx.config.release)}-`)).map((b) => b.name),
        latest: (await latestReleaseBranch(ctx))?.name ?? null,
      }))
  )

  server.tool('host_versions', 'Latest published release and pre-release tags', {}, async () =>
    query(load, async (ctx) => {
      const { release, prerelease } = await versions(ctx)
      return { release: release?.tagName ?? null, prerelease: prerelease?.tagName ?? null }
    })
  )

  // =========================================================================
  // Release state
  // =========================================================================

  server.tool(
    'qa_tickets',
    'Tickets merged into a release branch but not yet into master',
    {
      branch: z.string().optional().describe('Release branch (defaults to the newest)'),
    },
    async ({ branch }) =>
      query(load, async (ctx) => {
        const report = await listQaTickets(ctx, { branch })
        return { branch: report.branch, tickets: report.tickets }
      })
  )

  server.tool(
    'changelog',
    'Changelog of local merges since the latest release (or between two refs)',
    {
      base: z.string().optional().describe('Start of the range (defaults to the latest release tag)'),
      head: z.string().optional().describe('End of the range (defaults to HEAD)'),
    },
    async ({ base, head }) =>
      query(load, async (ctx) => {
        const result = await changelog(ctx, { base, head })
        return { base: result.base, head: result.head, ticketIds: result.ticketIds, text: result.text }
      })
  )

  return server
}

// ---------------------------------------------------------------------------
// Server metadata
// ---------------------------------------------------------------------------

export const MCP_TOOLS = [
  { name: 'tracker_get_ticket', description: 'Get a ticket by id' },
  { name: 'tracker_my_tickets', description: 'List my open tickets' },
  { name: 'tracker_branch_name', description: 'Branch name for a ticket and kind' },
  { name: 'host_release_branches', description: 'List release branches' },
  { name: 'host_versions', description: 'Latest release and pre-release' },
  { name: 'qa_tickets', description: 'Tickets waiting for QA on a release branch' },
  { name: 'changelog', description: 'Changelog of merges since the latest release' },
] as const

// ---------------------------------------------------------------------------
// Standalone entry point - run the MCP server over stdio
// ---------------------------------------------------------------------------

export async function startMcpServer(): Promise<void> {
  // stdout carries the protocol
  log.configureLogger({ stream: 'stderr' })

  log.dim('octoeb MCP server v1.0.0')
  log.dim(`  Tools registered: ${MCP_TOOLS.length}`)
  for (const t of MCP_TOOLS) {
    log.dim(`    • ${t.name} — ${t.description}`)
  }
  log.dim('  Waiting for an MCP client on stdio. Press Ctrl+C to stop.')

  const server = createMcpServer()
  const transport = new StdioServerTransport()

  const shutdown = () => {
    log.dim('Shutting down MCP server...')
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(`Error while closing: ${describe(error)}`)
        process.exit(1)
      })
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  await server.connect(transport)
  log.debug('MCP client connected')
}
