/**
 * Static File Resolution
 *
 * Maps a request path under a mount prefix onto a file below the mount's
 * filesystem root, refusing anything that canonicalizes outside that root.
 */

import { promises as fsp } from 'node:fs';
import path from 'node:path';

import type { Handler } from '../http/types.ts';
import { guessMimeType } from '../http/mime.ts';
import { toError, type Logger } from '../telemetry/logger.ts';
import { matchesPrefix, pathAfterPrefix } from './path.ts';

/**
 * A URL prefix served from a filesystem root
 */
export interface StaticMount {
  prefix: string;
  root: string;
}

/**
 * The filesystem operations static serving relies on
 */
export interface StaticFileSystem {
  /** Canonical absolute path; rejects when the target does not exist */
  realpath(target: string): Promise<string>;
  /** True only for an existing regular file */
  isFile(target: string): Promise<boolean>;
  readFile(target: string): Promise<Buffer>;
}

export const nodeFileSystem: StaticFileSystem = {
  realpath: (target) => fsp.realpath(target),
  isFile: async (target) => {
    try {
      return (await fsp.stat(target)).isFile();
    } catch {
      return false;
    }
  },
  readFile: (target) => fsp.readFile(target),
};

export const INDEX_FILE = '/index.html';

/**
 * Outcome of checking one mount against a request path
 */
export type StaticResolution =
  | { kind: 'file'; filePath: string }
  | { kind: 'forbidden'; filePath: string }
  | { kind: 'miss' };

/**
 * Resolve `requestPath` against a single mount.
 *
 * A path outside the prefix, or one naming no regular file, is a miss. A
 * path that climbs out of the root, lexically or once symlinks are
 * resolved, is forbidden. When canonicalization itself fails (usually
 * because the file does not exist) the existence check decides.
 */
export async function resolveStatic(
  mount: StaticMount,
  requestPath: string,
  fs: StaticFileSystem,
  logger: Logger
): Promise<StaticResolution> {
  if (!matchesPrefix(requestPath, mount.prefix)) {
    logger.debug('Request path does not match static prefix', {
      path: requestPath,
      prefix: mount.prefix,
    });
    return { kind: 'miss' };
  }

  let subPath = pathAfterPrefix(requestPath, mount.prefix);
  if (subPath === '' || subPath === '/') {
    subPath = INDEX_FILE;
  }

  const rootPath = path.resolve(mount.root);
  const filePath = path.join(rootPath, subPath.replace(/^\//, ''));
  logger.debug('Attempting to serve file', { path: requestPath, file: filePath });

  // `..` leaving the root is refused before any filesystem lookup, so a
  // missing target answers 400 here, not 404
  if (!isWithin(rootPath, filePath)) {
    logger.warn('Attempted directory traversal', { path: requestPath, root: mount.root });
    return { kind: 'forbidden', filePath };
  }

  try {
    const canonicalRoot = await fs.realpath(rootPath);
    const canonicalFile = await fs.realpath(filePath);
    if (!isWithin(canonicalRoot, canonicalFile)) {
      logger.warn('Attempted directory traversal', { path: requestPath, root: mount.root });
      return { kind: 'forbidden', filePath };
    }
  } catch (error) {
    logger.debug('Canonical path check failed', {
      path: requestPath,
      reason: toError(error).message,
    });
  }

  if (await fs.isFile(filePath)) {
    return { kind: 'file', filePath };
  }

  logger.debug('Static file not found or not a regular file', { file: filePath });
  return { kind: 'miss' };
}

/**
 * Whether `target` is `root` itself or lies below it
 */
export function isWithin(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Handler that answers with the file's bytes, or 500 if it cannot be read
 */
export function createFileHandler(filePath: string, fs: StaticFileSystem, logger: Logger): Handler {
  return async (_req, res) => {
    try {
      const content = await fs.readFile(filePath);
      res.status(200).send(content, guessMimeType(filePath));
      logger.info('Serving static file', { file: filePath });
    } catch (error) {
      logger.error('Error reading static file', toError(error), { file: filePath });
      res.reset().status(500).text('Internal Server Error');
    }
  };
}

/**
 * Handler for a path that escaped its mount root
 */
export const invalidPathHandler: Handler = (_req, res) => {
  res.status(400).text('Invalid path.');
};
