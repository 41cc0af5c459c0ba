import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getNote } from '../db/queries.js';
import { noteDetail } from './format.js';

export function registerGetTool(server: McpServer): void {
  server.registerTool(
    'get_note',
    {
      description:
        'Retrieve a note in full by ID, including its checklist and its sync state on every provider it is linked to.',
      inputSchema: {
        id: z.string().describe('ID of the note'),
      },
    },
    async ({ id }) => {
      try {
        const note = getNote(id);
        if (!note) {
          return {
            content: [{ type: 'text' as const, text: `Note not found: ${id}` }],
            isError: true,
          };
        }
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(noteDetail(note)) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error retrieving note: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
