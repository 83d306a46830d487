import { basename } from 'path';
import { GwtError } from './errors';
import type { VcsBackend } from './providers/vcs-backend';

/** ghq-style project key: where a repository's worktrees live under the root. */
export interface ProjectIdentity {
  host: string;
  owner: string;
  name: string;
}

// user@host:owner/name[.git]
const SCP_REMOTE = /^[^@/\s]+@([^:/\s]+):([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/;

// scheme://[user@]host[:port]/owner/name[.git]
const URL_REMOTE =
  /^(?:https?|ssh|git):\/\/(?:[^@/\s]+@)?([^:/\s]+)(?::\d+)?\/([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/;

export function localIdentity(dirName: string): ProjectIdentity {
  return { host: 'local', owner: '', name: dirName };
}

/**
 * Parse a remote URL into a project identity, or undefined when the URL is
 * not one of the recognised hosting shapes.
 */
export function parseRemoteUrl(remoteUrl: string): ProjectIdentity | undefined {
  const url = remoteUrl.trim();
  const match = SCP_REMOTE.exec(url) ?? URL_REMOTE.exec(url);
  if (!match) {
    return undefined;
  }
  const [, host, owner, name] = match;
  if (!host || !owner || !name) {
    return undefined;
  }
  return { host, owner, name };
}

export function resolveIdentity(
  remoteUrl: string | undefined,
  fallbackDirName: string,
): ProjectIdentity {
  return (remoteUrl && parseRemoteUrl(remoteUrl)) || localIdentity(fallbackDirName);
}

export function formatIdentity(identity: ProjectIdentity): string {
  return [identity.host, identity.owner, identity.name].filter(Boolean).join('/');
}

/**
 * Resolve the identity of the repository the backend points at.
 *
 * Always reads from the main worktree: the remote configuration is shared by
 * every worktree, and the fallback name must not depend on which linked
 * worktree the caller happens to be in.
 */
export async function resolveProjectIdentity(vcs: VcsBackend): Promise<{
  identity: ProjectIdentity;
  mainWorktree: string;
}> {
  const worktrees = await vcs.listWorktrees();
  const main = worktrees.find((wt) => wt.isMain);
  if (!main) {
    throw new GwtError('NotAGitRepository', 'could not determine the main worktree');
  }
  const remoteUrl = await vcs.getRemoteUrl(main.path);
  return {
    identity: resolveIdentity(remoteUrl, basename(main.path)),
    mainWorktree: main.path,
  };
}
