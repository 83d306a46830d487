import { existsSync, realpathSync } from 'fs';
import { homedir } from 'os';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { GwtError } from './errors';
import type { ProjectIdentity } from './identity';

export const MISSING_ROOT_MESSAGE =
  'GWT_ROOT_DIR is not set. Please set it to your desired root directory: export GWT_ROOT_DIR=<path>';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, 'opencode-gwt');
}

/** Expand a leading `~` (alone or followed by `/`) to the home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

export function basePath(root: string, identity: ProjectIdentity): string {
  if (!root.trim()) {
    throw new GwtError('ConfigError', MISSING_ROOT_MESSAGE);
  }
  // join() drops the empty owner segment of local identities
  return resolve(join(expandHome(root), identity.host, identity.owner, identity.name));
}

export function worktreePath(root: string, identity: ProjectIdentity, branch: string): string {
  return join(basePath(root, identity), branch);
}

/**
 * Absolute path with symlinks resolved, the form git records for worktrees.
 * Segments that do not exist yet are appended to their nearest existing ancestor.
 */
export function canonicalPath(path: string): string {
  const absolute = resolve(path);
  if (existsSync(absolute)) {
    return realpathSync(absolute);
  }
  const parent = dirname(absolute);
  return parent === absolute ? absolute : join(canonicalPath(parent), basename(absolute));
}

/** True when `child` is `parent` itself or lies beneath it. */
export function isWithin(child: string, parent: string): boolean {
  const rel = relative(canonicalPath(parent), canonicalPath(child));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

export function samePath(a: string, b: string): boolean {
  return canonicalPath(a) === canonicalPath(b);
}
