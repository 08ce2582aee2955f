/**
 * Path utilities: validation, joining and namespace prefixing
 */

import { InvalidPathError } from './errors.js';

export const PATH_SEPARATOR = '/';

/**
 * Validate a node path, returning it unchanged
 *
 * @throws InvalidPathError
 */
export function validatePath(path: string): string {
  if (path.length === 0) {
    throw new InvalidPathError('path must not be empty', path);
  }
  if (!path.startsWith(PATH_SEPARATOR)) {
    throw new InvalidPathError('path must start with /', path);
  }
  if (path === PATH_SEPARATOR) {
    return path;
  }
  if (path.endsWith(PATH_SEPARATOR)) {
    throw new InvalidPathError('path must not end with /', path);
  }
  for (const segment of path.slice(1).split(PATH_SEPARATOR)) {
    if (segment.length === 0) {
      throw new InvalidPathError('empty node name', path);
    }
    if (segment === '.' || segment === '..') {
      throw new InvalidPathError('relative paths are not allowed', path);
    }
    if (segment.includes('\u0000')) {
      throw new InvalidPathError('null character not allowed', path);
    }
  }
  return path;
}

/**
 * Validate a namespace: a single path fragment without leading or trailing slash
 */
export function validateNamespace(namespace: string): string {
  validatePath(PATH_SEPARATOR + namespace);
  return namespace;
}

/**
 * Join a parent path and a child node name
 */
export function makePath(parent: string, child: string): string {
  const trimmedChild = child.replace(/^\/+/, '');
  if (parent === '' || parent === PATH_SEPARATOR) {
    return PATH_SEPARATOR + trimmedChild;
  }
  const trimmedParent = parent.replace(/\/+$/, '');
  return trimmedChild.length === 0 ? trimmedParent : `${trimmedParent}/${trimmedChild}`;
}

/**
 * Prefix `path` with the namespace, if any
 */
export function fixForNamespace(namespace: string | undefined, path: string): string {
  validatePath(path);
  if (!namespace) {
    return path;
  }
  return makePath(PATH_SEPARATOR + namespace, path);
}

/**
 * Strip the namespace prefix from a path reported by the service
 */
export function unfixForNamespace(namespace: string | undefined, path: string): string {
  if (!namespace) {
    return path;
  }
  const prefix = PATH_SEPARATOR + namespace;
  if (path === prefix) {
    return PATH_SEPARATOR;
  }
  if (path.startsWith(prefix + PATH_SEPARATOR)) {
    return path.slice(prefix.length);
  }
  return path;
}

/**
 * Parent of a path; the root is its own parent
 */
export function parentPath(path: string): string {
  const index = path.lastIndexOf(PATH_SEPARATOR);
  return index <= 0 ? PATH_SEPARATOR : path.slice(0, index);
}

/**
 * Every ancestor of `path` from the top down, optionally including `path` itself
 *
 * @example
 * ```typescript
 * pathPrefixes('/a/b/c', false); // ['/a', '/a/b']
 * ```
 */
export function pathPrefixes(path: string, includeLast: boolean): string[] {
  validatePath(path);
  if (path === PATH_SEPARATOR) {
    return [];
  }
  const segments = path.slice(1).split(PATH_SEPARATOR);
  const count = includeLast ? segments.length : segments.length - 1;
  const prefixes: string[] = [];
  for (let i = 1; i <= count; i++) {
    prefixes.push(PATH_SEPARATOR + segments.slice(0, i).join(PATH_SEPARATOR));
  }
  return prefixes;
}
