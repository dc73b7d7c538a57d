/**
 * Path Normalization
 *
 * The single source of truth for path equality. Every path the router stores
 * or looks up goes through `normalizePath`.
 */

/**
 * Canonical form: starts with `/`, no trailing `/` unless the whole path is
 * `/`. Total and idempotent.
 */
export function normalizePath(path: string): string {
  const rooted = path.startsWith('/') ? path : `/${path}`;
  const trimmed = rooted.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

/**
 * Prefix `path` with `prefix`. A root prefix contributes nothing.
 */
export function joinPaths(prefix: string, path: string): string {
  const head = normalizePath(prefix);
  if (head === '/') {
    return normalizePath(path);
  }
  return normalizePath(head + normalizePath(path));
}

/**
 * Whether `path` falls under the mount `prefix`: equal to it, or below it
 * on a segment boundary.
 */
export function matchesPrefix(path: string, prefix: string): boolean {
  if (prefix === '/') {
    return path.startsWith('/');
  }
  return path === prefix || path.startsWith(`${prefix}/`);
}

/**
 * The part of `path` after `prefix`; `/` when nothing is left.
 */
export function pathAfterPrefix(path: string, prefix: string): string {
  if (prefix === '/' || !path.startsWith(prefix)) {
    return path;
  }
  if (path.length === prefix.length) {
    return '/';
  }
  return path.slice(prefix.length);
}
