import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from './context.js';

export function registerLinkTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    'unlink_note',
    {
      description:
        'Detach a note from a provider so it becomes local_only there. ' +
        'With `delete_remote: true` the remote copy is deleted first. ' +
        'A local_only note is created remotely again on the next sync.',
      inputSchema: {
        id: z.string().describe('ID of the note'),
        provider: z.enum(['keep', 'gdrive', 'github']).describe('Provider to unlink from'),
        delete_remote: z.boolean().optional().describe('Also delete the remote copy (default: false)'),
      },
    },
    async ({ id, provider, delete_remote }) => {
      try {
        const result = await ctx.manager.unlink(id, provider, delete_remote ?? false);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result) }],
          isError: !result.ok,
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error unlinking note: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'resolve_conflict',
    {
      description:
        'Clear a sync conflict on one provider. ' +
        '"keep_local" sends the local version on the next sync, overwriting the remote. ' +
        '"keep_remote" replaces the local content with the remote version seen when the conflict was flagged.',
      inputSchema: {
        id: z.string().describe('ID of the conflicted note'),
        provider: z.enum(['keep', 'gdrive', 'github']).describe('Provider the conflict is with'),
        keep: z.enum(['keep_local', 'keep_remote']).describe('Which version wins'),
      },
    },
    async ({ id, provider, keep }) => {
      try {
        const result = ctx.manager.resolveConflict(id, provider, keep);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result) }],
          isError: !result.ok,
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error resolving conflict: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
