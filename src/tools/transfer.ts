import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { exportDocument, importDocument } from '../notes/transfer.js';

export function registerTransferTools(server: McpServer): void {
  server.registerTool(
    'export_notes',
    {
      description:
        'Export every note and label as a JSON document ({ version, exported_at, notes, labels }). ' +
        'With `path` the document is written to that file; otherwise it is returned.',
      inputSchema: {
        path: z.string().optional().describe('File to write the export to'),
      },
    },
    async ({ path }) => {
      try {
        const doc = exportDocument();
        const json = JSON.stringify(doc, null, 2);
        if (path) {
          const target = resolve(path);
          writeFileSync(target, json, 'utf-8');
          return {
            content: [{ type: 'text' as const, text: JSON.stringify({ path: target, notes: doc.notes.length, labels: doc.labels.length }) }],
          };
        }
        return {
          content: [{ type: 'text' as const, text: json }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error exporting notes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'import_notes',
    {
      description:
        'Import notes from an export document or from Google Takeout Keep JSON (one note object or an array). ' +
        'Imported notes get new IDs and start out local_only. Give either `path` or `json`.',
      inputSchema: {
        path: z.string().optional().describe('File to read'),
        json: z.string().optional().describe('Document text'),
      },
    },
    async ({ path, json }) => {
      try {
        let text: string;
        if (path) {
          const source = resolve(path);
          if (!existsSync(source)) {
            return {
              content: [{ type: 'text' as const, text: `File not found: ${source}` }],
              isError: true,
            };
          }
          text = readFileSync(source, 'utf-8');
        } else if (json) {
          text = json;
        } else {
          return {
            content: [{ type: 'text' as const, text: 'Give either `path` or `json`' }],
            isError: true,
          };
        }

        const result = importDocument(JSON.parse(text));
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error importing notes: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
