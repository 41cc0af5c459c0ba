import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createNote, getNote, saveNote } from '../db/queries.js';
import { applyEdit } from '../notes/note.js';
import { NOTE_TYPES } from '../types.js';
import { noteDetail } from './format.js';

export function registerSaveTool(server: McpServer): void {
  server.registerTool(
    'save_note',
    {
      description:
        'Create a note, or update one when `id` is given. ' +
        'Only the fields you pass are changed on update. ' +
        'Pass `checklist_items` to make a checklist; its text lives in the items and `content` is ignored. ' +
        'Editing a synced note marks it pending_push so the next sync sends it.',
      inputSchema: {
        id: z.string().optional().describe('ID of the note to update. Omit to create a new note'),
        title: z.string().optional().describe('Note title'),
        content: z.string().optional().describe('Body text (plain notes)'),
        note_type: z.enum(NOTE_TYPES).optional().describe('note or checklist (inferred from checklist_items when omitted)'),
        checklist_items: z
          .array(z.object({ text: z.string(), checked: z.boolean().optional() }))
          .optional()
          .describe('Ordered checklist items; replaces the existing list on update'),
        labels: z.array(z.string()).optional().describe('Label names; replaces the existing labels on update'),
        pinned: z.boolean().optional(),
        archived: z.boolean().optional(),
        color: z.string().optional().describe('Color tag, e.g. "red" ("" for none)'),
      },
    },
    async ({ id, ...fields }) => {
      try {
        if (!id) {
          const note = createNote(fields);
          return {
            content: [{ type: 'text' as const, text: JSON.stringify({ created: true, note: noteDetail(note) }) }],
          };
        }

        const existing = getNote(id);
        if (!existing) {
          return {
            content: [{ type: 'text' as const, text: `Note not found: ${id}` }],
            isError: true,
          };
        }

        const saved = saveNote(applyEdit(existing, fields));
        if (!saved) {
          return {
            content: [{ type: 'text' as const, text: `Failed to save note ${id}` }],
            isError: true,
          };
        }
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ created: false, note: noteDetail(saved) }) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error saving note: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
