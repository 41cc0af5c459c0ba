/**
 * Git CLI wrappers for the git-hosted provider's working clone.
 *
 * Local operations are synchronous. Network operations (clone, pull, push)
 * are async so remote I/O does not block the event loop. Failures throw with
 * git's stderr in the message; the provider turns them into results.
 *
 * SECURITY: every command goes through execFile/execFileSync, never a shell,
 * so note titles and remote URLs are never interpreted.
 */

import { execFile, execFileSync } from 'node:child_process';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const DEFAULT_IDENTITY = { name: 'keepsync-notes', email: 'keepsync-notes@localhost' };

/** Strip credentials embedded in an https remote before it reaches a message. */
export function redactRemote(text: string): string {
  return text.replace(/(https?:\/\/)[^@/\s]+@/g, '$1***@');
}

function failure(action: string, error: unknown): Error {
  const stderr =
    typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
  const message = stderr || (error instanceof Error ? error.message : String(error));
  return new Error(`git ${action}: ${redactRemote(message)}`);
}

/** Run a git command for its exit status only. */
function succeeds(args: string[], cwd?: string): boolean {
  try {
    execFileSync('git', args, { cwd, stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

export function isGitAvailable(): boolean {
  return succeeds(['--version']);
}

export function isGitRepo(path: string): boolean {
  return existsSync(path) && succeeds(['rev-parse', '--is-inside-work-tree'], path);
}

export async function gitClone(remote: string, path: string): Promise<void> {
  const parent = dirname(path);
  if (!existsSync(parent)) {
    mkdirSync(parent, { recursive: true });
  }
  try {
    await execFileAsync('git', ['clone', remote, path]);
  } catch (error) {
    throw failure('clone', error);
  }
}

export function getRemoteUrl(path: string, remote = 'origin'): string | null {
  try {
    return execFileSync('git', ['remote', 'get-url', remote], { cwd: path, encoding: 'utf-8' }).trim();
  } catch {
    return null;
  }
}

/** Point `remote` at `url`, adding it when missing. */
export function gitSetRemote(path: string, url: string, remote = 'origin'): void {
  const current = getRemoteUrl(path, remote);
  if (current === url) return;
  try {
    const args = current === null ? ['remote', 'add', remote, url] : ['remote', 'set-url', remote, url];
    execFileSync('git', args, { cwd: path, stdio: 'pipe' });
  } catch (error) {
    throw failure('remote', error);
  }
}

/** Give the clone a committer identity when neither it nor the user config has one. */
export function ensureIdentity(path: string): void {
  for (const [key, value] of [
    ['user.name', DEFAULT_IDENTITY.name],
    ['user.email', DEFAULT_IDENTITY.email],
  ] as const) {
    if (!succeeds(['config', key], path)) {
      execFileSync('git', ['config', key, value], { cwd: path, stdio: 'ignore' });
    }
  }
}

function hasCommits(path: string): boolean {
  return succeeds(['rev-parse', 'HEAD'], path);
}

/**
 * Stage and commit everything in the clone.
 * Returns false when the tree was already clean.
 */
export function gitCommitAll(path: string, message: string): boolean {
  try {
    execFileSync('git', ['add', '-A'], { cwd: path, stdio: 'pipe' });
    // --quiet exits 0 when nothing is staged
    if (succeeds(['diff', '--cached', '--quiet'], path)) return false;
    execFileSync('git', ['commit', '-m', message], { cwd: path, stdio: 'pipe' });
    return true;
  } catch (error) {
    throw failure('commit', error);
  }
}

/**
 * Bring the clone up to date with its remote.
 * Returns 'empty' when the remote has no branch yet.
 */
export async function gitPull(path: string, remote = 'origin'): Promise<'pulled' | 'empty'> {
  try {
    await execFileAsync('git', ['fetch', remote], { cwd: path });
  } catch (error) {
    throw failure('fetch', error);
  }

  const { stdout } = await execFileAsync('git', ['ls-remote', '--heads', remote], { cwd: path, encoding: 'utf-8' });
  const match = stdout.trim().match(/refs\/heads\/(\S+)/);
  if (!match) return 'empty';
  const branch = match[1];

  try {
    if (!hasCommits(path)) {
      await execFileAsync('git', ['checkout', '-B', branch, `${remote}/${branch}`], { cwd: path });
    } else {
      // Remote wins at the file level; note-level conflicts are detected
      // afterwards by comparing timestamps against the local store.
      await execFileAsync(
        'git',
        ['pull', '--no-rebase', '--allow-unrelated-histories', '-X', 'theirs', remote, branch],
        { cwd: path },
      );
    }
  } catch (error) {
    // Fails harmlessly when no merge is in progress
    succeeds(['merge', '--abort'], path);
    throw failure('pull', error);
  }
  return 'pulled';
}

/** Push the current branch, setting its upstream on first push. No-op before the first commit. */
export async function gitPush(path: string, remote = 'origin'): Promise<void> {
  if (!hasCommits(path)) return;
  try {
    const { stdout } = await execFileAsync('git', ['branch', '--show-current'], { cwd: path, encoding: 'utf-8' });
    const branch = stdout.trim();
    if (!branch) {
      throw new Error('could not determine current branch');
    }
    await execFileAsync('git', ['push', '-u', remote, branch], { cwd: path });
  } catch (error) {
    throw failure('push', error);
  }
}
