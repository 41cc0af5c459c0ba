import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { listNotes, listNotesByLabel, searchNotes } from '../db/queries.js';
import { noteSummary } from './format.js';

export function registerListTools(server: McpServer): void {
  server.registerTool(
    'list_notes',
    {
      description:
        'List notes, pinned first, then most recently updated. ' +
        'Trashed and archived notes are left out unless requested. ' +
        'Filter by `label` to list the (non-trashed) notes carrying it.',
      inputSchema: {
        label: z.string().optional().describe('Only notes with this label'),
        include_archived: z.boolean().optional().describe('Include archived notes (default: false)'),
        include_trashed: z.boolean().optional().describe('Include trashed notes (default: false)'),
        limit: z.number().int().min(1).max(500).optional().describe('Maximum notes to return (default: 50)'),
      },
    },
    async ({ label, include_archived, include_trashed, limit }) => {
      try {
        const notes = label
          ? listNotesByLabel(label)
          : listNotes({ includeArchived: include_archived, includeTrashed: include_trashed });
        const max = limit ?? 50;
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({
                total: notes.length,
                notes: notes.slice(0, max).map(noteSummary),
              }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error listing notes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'search_notes',
    {
      description: 'Case-insensitive substring search over note titles and bodies. Trashed notes are excluded.',
      inputSchema: {
        query: z.string().min(1).describe('Text to look for'),
      },
    },
    async ({ query }) => {
      try {
        const notes = searchNotes(query);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ total: notes.length, notes: notes.map(noteSummary) }) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error searching notes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
