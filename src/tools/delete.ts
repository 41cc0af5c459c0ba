import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { deleteNote, getNote, restoreNote } from '../db/queries.js';

export function registerDeleteTools(server: McpServer): void {
  server.registerTool(
    'delete_note',
    {
      description:
        'Move a note to the trash, or delete it for good with `permanent: true`. ' +
        'Trashed notes are not pushed, so remote copies stay as they are; restoring the note queues it for the next sync. ' +
        'Permanent deletion only removes the local copy; use `unlink_note` with delete_remote to remove a remote copy.',
      inputSchema: {
        id: z.string().describe('ID of the note'),
        permanent: z.boolean().optional().describe('Delete irrevocably instead of trashing (default: false)'),
      },
    },
    async ({ id, permanent }) => {
      try {
        const note = getNote(id);
        if (!note) {
          return {
            content: [{ type: 'text' as const, text: `Note not found: ${id}` }],
            isError: true,
          };
        }
        if (!deleteNote(id, permanent ?? false)) {
          return {
            content: [{ type: 'text' as const, text: `Failed to delete note ${id}` }],
            isError: true,
          };
        }
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({ id, title: note.title, deleted: permanent ? 'permanently' : 'trashed' }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error deleting note: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'restore_note',
    {
      description: 'Take a note out of the trash.',
      inputSchema: {
        id: z.string().describe('ID of the trashed note'),
      },
    },
    async ({ id }) => {
      try {
        if (!restoreNote(id)) {
          return {
            content: [{ type: 'text' as const, text: `Note not found: ${id}` }],
            isError: true,
          };
        }
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ id, restored: true }) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error restoring note: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
