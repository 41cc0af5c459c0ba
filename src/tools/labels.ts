import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { deleteLabel, getLabelByName, listLabels, saveLabel } from '../db/queries.js';

export function registerLabelsTool(server: McpServer): void {
  server.registerTool(
    'manage_labels',
    {
      description:
        'List, create, recolor or delete labels. ' +
        'Deleting a label only removes it from the label list; notes keep the name until edited.',
      inputSchema: {
        action: z.enum(['list', 'create', 'update', 'delete']).describe('What to do'),
        name: z.string().optional().describe('Label name (required for create, update and delete)'),
        color: z.string().optional().describe('Label color tag'),
      },
    },
    async ({ action, name, color }) => {
      try {
        if (action === 'list') {
          return {
            content: [{ type: 'text' as const, text: JSON.stringify({ labels: listLabels() }) }],
          };
        }

        const labelName = name?.trim();
        if (!labelName) {
          return {
            content: [{ type: 'text' as const, text: `A label name is required for ${action}` }],
            isError: true,
          };
        }

        const existing = getLabelByName(labelName);
        if (action === 'create' && existing) {
          return {
            content: [{ type: 'text' as const, text: `Label already exists: ${labelName}` }],
            isError: true,
          };
        }
        if (action !== 'create' && !existing) {
          return {
            content: [{ type: 'text' as const, text: `Label not found: ${labelName}` }],
            isError: true,
          };
        }

        if (action === 'delete' && existing) {
          deleteLabel(existing.id);
          return {
            content: [{ type: 'text' as const, text: JSON.stringify({ deleted: labelName }) }],
          };
        }

        const label = existing
          ? { ...existing, color: color ?? existing.color }
          : { id: randomUUID(), name: labelName, color: color ?? '', remote_id: null };
        if (!saveLabel(label)) {
          return {
            content: [{ type: 'text' as const, text: `Failed to save label ${labelName}` }],
            isError: true,
          };
        }
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ label }) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error managing labels: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
