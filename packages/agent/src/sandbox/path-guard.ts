import { lstat, readlink } from 'node:fs/promises';
import { dirname, extname, isAbsolute, join, parse, relative, resolve, sep } from 'node:path';
import picomatch from 'picomatch';
import { ToolError } from '../types/error.js';
import type { PathPolicy } from '../types/config.js';
import { expandPath } from './expand.js';
import type { EnvLookup } from './expand.js';
import { errnoCode, toToolError } from './fs-error.js';

export type PathOperation = 'read' | 'write' | 'delete' | 'list';

export type ResolvedPath = {
  /** Canonical absolute path: symlinks resolved, no `.` or `..` segments. */
  readonly path: string;
  /** The canonical allowed base that contains it. */
  readonly base: string;
  /** `path` relative to `base`; empty when `path` is the base itself. */
  readonly relative: string;
};

export type PathGuard = {
  readonly validate: (rawPath: string, operation: PathOperation) => Promise<ResolvedPath>;
  /** Canonical form of a path with no policy applied. */
  readonly canonicalize: (rawPath: string) => Promise<string>;
  readonly bases: () => Promise<ReadonlyArray<string>>;
  /** True when a single path segment matches a blocked pattern. */
  readonly isBlockedName: (name: string) => boolean;
};

export type PathGuardOptions = {
  readonly env?: EnvLookup;
};

const MAX_PATH_LENGTH = 4096;
const MAX_LINK_HOPS = 40;
const SHOWN_BASES = 3;

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * Resolves `target` one segment at a time the way the kernel walks a path:
 * a symlink is replaced by its target before any later `..` applies, so
 * `link/..` means the parent of where `link` points. Segments that do not
 * exist yet are appended as written, with `..` among them applied textually.
 */
async function resolvePhysically(target: string): Promise<string> {
  const pending = target.split(sep);
  let current = parse(target).root;
  let missingDepth = 0;
  let hops = 0;

  while (pending.length > 0) {
    const segment = pending.shift();
    if (segment === undefined || segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      current = dirname(current);
      missingDepth = Math.max(missingDepth - 1, 0);
      continue;
    }

    const next = join(current, segment);
    if (missingDepth > 0) {
      current = next;
      missingDepth += 1;
      continue;
    }

    let link: string | null;
    try {
      link = (await lstat(next)).isSymbolicLink() ? await readlink(next) : null;
    } catch (error) {
      if (!isMissing(error)) {
        throw toToolError(error, target);
      }
      current = next;
      missingDepth = 1;
      continue;
    }
    if (link === null) {
      current = next;
      continue;
    }

    hops += 1;
    if (hops > MAX_LINK_HOPS) {
      throw new ToolError('Malformed', `Too many levels of symbolic links: ${target}`, {
        details: { path: target },
      });
    }
    if (isAbsolute(link)) {
      current = parse(link).root;
    }
    pending.unshift(...link.split(sep));
  }
  return current;
}

function relativeInside(base: string, candidate: string): string | null {
  const rel = relative(base, candidate);
  if (rel === '') {
    return '';
  }
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return rel;
}

function describeBases(bases: ReadonlyArray<string>): string {
  const shown = bases.slice(0, SHOWN_BASES).join(', ');
  return bases.length > SHOWN_BASES ? `${shown}, ...` : shown;
}

function assertWellFormed(rawPath: string): void {
  if (rawPath.trim() === '') {
    throw new ToolError('Malformed', 'Path is empty');
  }
  if (rawPath.includes('\0')) {
    throw new ToolError('Malformed', 'Path contains a NUL byte');
  }
  if (rawPath.length > MAX_PATH_LENGTH) {
    throw new ToolError('Malformed', `Path is longer than ${MAX_PATH_LENGTH} characters`);
  }
}

export function createPathGuard(policy: PathPolicy, options: PathGuardOptions = {}): PathGuard {
  const env = options.env ?? process.env;
  const configured = policy.allowedPaths.map((path) => resolve(path));
  const anchor = configured[0] ?? process.cwd();

  const segmentMatchers: Array<(segment: string) => boolean> = [];
  const pathMatchers: Array<(path: string) => boolean> = [];
  for (const pattern of policy.blockedPatterns) {
    if (pattern.includes('/')) {
      pathMatchers.push(picomatch(pattern, { dot: true }));
    } else {
      segmentMatchers.push(picomatch(pattern, { dot: true }));
    }
  }

  let canonicalBases: Promise<ReadonlyArray<string>> | null = null;
  function bases(): Promise<ReadonlyArray<string>> {
    canonicalBases ??= Promise.all(configured.map((path) => resolvePhysically(path)));
    return canonicalBases;
  }

  async function canonicalize(rawPath: string): Promise<string> {
    assertWellFormed(rawPath);
    const expanded = expandPath(rawPath, env);
    // Joined without normalizing: `..` is applied during the walk.
    return resolvePhysically(isAbsolute(expanded) ? expanded : `${anchor}${sep}${expanded}`);
  }

  function findBase(allowed: ReadonlyArray<string>, candidate: string): { base: string; relative: string } | null {
    for (const base of allowed) {
      const rel = relativeInside(base, candidate);
      if (rel !== null) {
        return { base, relative: rel };
      }
    }
    return null;
  }

  function isBlockedName(name: string): boolean {
    return segmentMatchers.some((matches) => matches(name));
  }

  function assertNotBlocked(rawPath: string, resolved: ResolvedPath, operation: PathOperation): void {
    const segments = resolved.relative === '' ? [] : resolved.relative.split(sep);
    const blockedSegment = segments.find(isBlockedName);
    if (blockedSegment !== undefined || pathMatchers.some((matches) => matches(resolved.path))) {
      throw new ToolError('Denied', `Access denied: ${rawPath} matches a blocked pattern`, {
        details: { path: resolved.path, segment: blockedSegment ?? null },
      });
    }

    if (operation !== 'read' && operation !== 'write') {
      return;
    }
    const extension = extname(resolved.path).toLowerCase();
    if (extension !== '' && policy.blockedExtensions.includes(extension)) {
      throw new ToolError('Denied', `Access denied: files with extension ${extension} are blocked`, {
        details: { path: resolved.path, extension },
      });
    }
    if (policy.allowedExtensions.length > 0 && !policy.allowedExtensions.includes(extension)) {
      throw new ToolError(
        'Denied',
        `Access denied: extension ${extension || '(none)'} is not in the allowed list (${policy.allowedExtensions.join(', ')})`,
        { details: { path: resolved.path, extension } },
      );
    }
  }

  async function validate(rawPath: string, operation: PathOperation): Promise<ResolvedPath> {
    const allowed = await bases();
    const canonical = await canonicalize(rawPath);

    const match = findBase(allowed, canonical);
    if (match === null) {
      throw new ToolError(
        'NotAllowed',
        `Access denied: ${rawPath} is outside the allowed directories (${describeBases(allowed)})`,
        { details: { path: canonical, allowedDirectories: allowed.slice(0, SHOWN_BASES) } },
      );
    }

    const resolved: ResolvedPath = { path: canonical, base: match.base, relative: match.relative };

    if (operation === 'delete' && resolved.relative === '') {
      throw new ToolError('Denied', `Access denied: cannot delete the allowed directory ${canonical}`, {
        details: { path: canonical },
      });
    }

    assertNotBlocked(rawPath, resolved, operation);

    if (operation === 'write' && findBase(allowed, dirname(canonical)) === null) {
      throw new ToolError(
        'NotAllowed',
        `Access denied: the parent directory of ${rawPath} is outside the allowed directories`,
        { details: { path: canonical } },
      );
    }

    return resolved;
  }

  return { validate, canonicalize, bases, isBlockedName };
}
