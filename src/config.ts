/**
 * Startup configuration: CLI flags, an optional JSON config file and
 * environment variables, in that order of precedence.
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ProviderCredentials } from './providers/provider.js';
import type { RestoreSecrets } from './sync/manager.js';

const Interval = z.number().positive();

const ConfigFileSchema = z.object({
  dbPath: z.string().optional(),
  autoSync: z.boolean().optional(),
  syncInterval: Interval.optional(),
  backupInterval: Interval.optional(),
  providers: z
    .object({
      keep: z.object({ email: z.string().min(1), token: z.string().min(1) }).optional(),
      gdrive: z.object({ accessToken: z.string().min(1), folderName: z.string().optional() }).optional(),
      folder: z.object({ path: z.string().min(1) }).optional(),
      github: z
        .object({
          repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'repo must look like owner/name'),
          token: z.string().default(''),
          remoteUrl: z.string().optional(),
          clonePath: z.string().optional(),
        })
        .optional(),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AppConfig {
  dbPath: string | undefined;
  autoSync: boolean;
  syncInterval: number | undefined;
  backupInterval: number | undefined;
  /** Connections to open at startup, primary provider first. */
  connections: Array<{ provider: string; credentials: ProviderCredentials }>;
  secrets: RestoreSecrets;
}

export interface CliArgs {
  dbPath?: string;
  configPath?: string;
  syncInterval?: number;
  backupInterval?: number;
  noAutoSync: boolean;
  help: boolean;
}

export const USAGE = `
keepsync-notes: local-first notes with Keep, Drive and GitHub sync (MCP server)

Usage:
  keepsync-notes [options]

Options:
  --db-path <path>              Path to SQLite database (default: ~/.keepsync-notes/notes.db)
  --config <path>               JSON config file with intervals and provider credentials
  --sync-interval <minutes>     Keep sync interval in minutes (default: 5)
  --backup-interval <minutes>   Backup provider sync interval in minutes (default: 15)
  --no-auto-sync                Do not start the periodic sync schedules
  --help                        Show this help message

Environment:
  KEEPSYNC_DB_PATH, KEEP_EMAIL, KEEP_TOKEN, GITHUB_TOKEN, GDRIVE_ACCESS_TOKEN
`;

function parseMinutes(flag: string, value: string | undefined): number {
  const minutes = Number(value);
  if (value === undefined || !Number.isFinite(minutes) || minutes <= 0) {
    throw new Error(`${flag} expects a positive number of minutes, got "${value ?? ''}"`);
  }
  return minutes;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { noAutoSync: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--db-path' && argv[i + 1]) {
      args.dbPath = argv[++i];
    } else if (arg === '--config' && argv[i + 1]) {
      args.configPath = argv[++i];
    } else if (arg === '--sync-interval') {
      args.syncInterval = parseMinutes(arg, argv[++i]);
    } else if (arg === '--backup-interval') {
      args.backupInterval = parseMinutes(arg, argv[++i]);
    } else if (arg === '--no-auto-sync') {
      args.noAutoSync = true;
    } else if (arg === '--help') {
      args.help = true;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }
  return args;
}

export function loadConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }
  try {
    return ConfigFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (error) {
    throw new Error(`Invalid config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file: ConfigFile = args.configPath ? loadConfigFile(args.configPath) : ConfigFileSchema.parse({});
  const providers = file.providers;

  const connections: AppConfig['connections'] = [];
  if (providers.keep) {
    connections.push({ provider: 'keep', credentials: { kind: 'keep', ...providers.keep } });
  }
  // One backup provider is active at a time; the first configured one wins
  if (providers.github) {
    connections.push({ provider: 'github', credentials: { kind: 'github', ...providers.github } });
  } else if (providers.folder) {
    connections.push({ provider: 'gdrive', credentials: { kind: 'folder', ...providers.folder } });
  } else if (providers.gdrive) {
    connections.push({ provider: 'gdrive', credentials: { kind: 'gdrive', ...providers.gdrive } });
  }

  return {
    dbPath: args.dbPath ?? file.dbPath ?? env.KEEPSYNC_DB_PATH,
    autoSync: args.noAutoSync ? false : (file.autoSync ?? true),
    syncInterval: args.syncInterval ?? file.syncInterval,
    backupInterval: args.backupInterval ?? file.backupInterval,
    connections,
    secrets: {
      keepEmail: env.KEEP_EMAIL,
      keepToken: env.KEEP_TOKEN,
      githubToken: env.GITHUB_TOKEN ?? providers.github?.token,
      gdriveAccessToken: env.GDRIVE_ACCESS_TOKEN ?? providers.gdrive?.accessToken,
    },
  };
}
