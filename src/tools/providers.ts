import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ProviderCredentials } from '../providers/provider.js';
import type { ToolContext } from './context.js';

export interface ConnectInput {
  provider: 'keep' | 'gdrive' | 'github';
  email?: string;
  token?: string;
  access_token?: string;
  folder_name?: string;
  folder_path?: string;
  repo?: string;
  remote_url?: string;
  clone_path?: string;
}

/**
 * Build provider credentials from tool input, falling back to the
 * environment secrets. Returns an error message when something required
 * is missing.
 */
export function credentialsFor(input: ConnectInput, secrets: ToolContext['secrets']): ProviderCredentials | string {
  switch (input.provider) {
    case 'keep': {
      const email = input.email ?? secrets.keepEmail;
      const token = input.token ?? secrets.keepToken;
      if (!email || !token) return 'Keep needs `email` and `token` (or KEEP_EMAIL / KEEP_TOKEN)';
      return { kind: 'keep', email, token };
    }
    case 'gdrive': {
      if (input.folder_path) return { kind: 'folder', path: input.folder_path };
      const accessToken = input.access_token ?? secrets.gdriveAccessToken;
      if (!accessToken) return 'Google Drive needs `access_token` (or GDRIVE_ACCESS_TOKEN), or a local `folder_path`';
      return { kind: 'gdrive', accessToken, folderName: input.folder_name };
    }
    case 'github': {
      const token = input.token ?? secrets.githubToken ?? '';
      if (!input.repo) return 'GitHub needs `repo` as owner/name';
      if (!token && !input.remote_url) return 'GitHub needs `token` (or GITHUB_TOKEN)';
      return { kind: 'github', repo: input.repo, token, remoteUrl: input.remote_url, clonePath: input.clone_path };
    }
  }
}

export function registerProviderTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    'connect_provider',
    {
      description:
        'Connect a sync provider. ' +
        '"keep" is the primary notes service (account email + token). ' +
        '"gdrive" keeps a single notes_backup.json in a Google Drive folder (OAuth access token), ' +
        'or in a local folder when `folder_path` is given. ' +
        '"github" keeps one Markdown file per note in a repository (owner/name + token). ' +
        'Connecting a backup provider makes it the target of `sync_notes` without a provider.',
      inputSchema: {
        provider: z.enum(['keep', 'gdrive', 'github']).describe('Which provider to connect'),
        email: z.string().optional().describe('keep: account email'),
        token: z.string().optional().describe('keep: account token; github: access token'),
        access_token: z.string().optional().describe('gdrive: OAuth access token with drive.file scope'),
        folder_name: z.string().optional().describe('gdrive: backup folder name (default: KeepSync Notes Backup)'),
        folder_path: z.string().optional().describe('gdrive: use a local (desktop-synced) folder instead of the API'),
        repo: z.string().optional().describe('github: repository as owner/name'),
        remote_url: z.string().optional().describe('github: explicit git remote URL'),
        clone_path: z.string().optional().describe('github: where to keep the working clone'),
      },
    },
    async (input) => {
      try {
        const credentials = credentialsFor(input, ctx.secrets);
        if (typeof credentials === 'string') {
          return {
            content: [{ type: 'text' as const, text: credentials }],
            isError: true,
          };
        }

        const result = await ctx.manager.connect(input.provider, credentials);
        if (!result.ok) {
          return {
            content: [{ type: 'text' as const, text: result.message }],
            isError: true,
          };
        }

        let autoSync = false;
        if (ctx.autoSync && ctx.manager.autoSyncEnabled(input.provider)) {
          ctx.manager.startAutoSync(input.provider);
          autoSync = true;
        }
        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify({
                connected: input.provider,
                message: result.message,
                auto_sync: autoSync,
                interval_minutes: autoSync ? ctx.manager.intervalFor(input.provider) : null,
              }),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error connecting provider: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );

  server.registerTool(
    'disconnect_provider',
    {
      description: 'Disconnect a provider, stop its schedule and forget its saved connection settings. Note links are kept.',
      inputSchema: {
        provider: z.enum(['keep', 'gdrive', 'github']).describe('Which provider to disconnect'),
      },
    },
    async ({ provider }) => {
      try {
        const result = await ctx.manager.disconnect(provider);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result) }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error disconnecting provider: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
