import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSyncLog } from '../db/queries.js';
import type { ToolContext } from './context.js';

export function registerSyncTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    'sync_notes',
    {
      description:
        'Run one sync cycle: refresh from the provider, pull remote changes, push local ones. ' +
        'Without `provider` the active backup provider is synced. ' +
        'Notes changed on both sides are marked conflict and left untouched; see `resolve_conflict`. ' +
        'A cycle already running for the provider makes this a no-op.',
      inputSchema: {
        provider: z.enum(['keep', 'gdrive', 'github']).optional().describe('Provider to sync (default: the active backup provider)'),
      },
    },
    async ({ provider }) => {
      try {
        const outcome = await ctx.manager.sync(provider);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ provider: provider ?? ctx.manager.getActiveProvider(), ...outcome }) }],
          isError: outcome.status === 'failed',
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error syncing notes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'sync_status',
    {
      description: 'Connection, schedule and last-sync time of every provider, and which backup provider is active.',
      inputSchema: {},
    },
    async () => {
      try {
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({ active_provider: ctx.manager.getActiveProvider(), providers: ctx.manager.status() }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error reading sync status: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'sync_log',
    {
      description: 'Recent sync log entries, newest first: pulls, pushes, conflicts, errors and cycle summaries.',
      inputSchema: {
        provider: z.string().optional().describe('Only entries for this provider'),
        limit: z.number().int().min(1).max(500).optional().describe('Maximum entries (default: 50)'),
      },
    },
    async ({ provider, limit }) => {
      try {
        const entries = getSyncLog({ provider, limit });
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ entries }) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error reading sync log: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
