/**
 * Pure path helpers shared by the config layer and the sandbox.
 * None of these touch the file system.
 */

import * as path from 'node:path';

/**
 * Expand a leading `~` (alone or followed by a separator) to the home directory.
 * `~user` forms are left untouched.
 */
export function expandHome(inputPath: string, homeDir: string): string {
  if (inputPath === '~') {
    return homeDir;
  }
  if (inputPath.startsWith('~/') || inputPath.startsWith('~\\')) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

/**
 * Split a path into its components on either separator.
 */
export function splitSegments(inputPath: string): string[] {
  return inputPath.split(/[/\\]/);
}

/**
 * Check whether any component of the path is `.` or `..`.
 */
export function hasDotSegment(inputPath: string): boolean {
  return splitSegments(inputPath).some((segment) => segment === '.' || segment === '..');
}

/**
 * Check if a path is within another path (child of or equal to).
 * Compares components via path.relative(), never string prefixes, so
 * `/allowed-evil` is not within `/allowed`.
 */
export function isPathWithin(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === '') {
    return true;
  }
  if (path.isAbsolute(relative)) {
    return false;
  }
  const [first] = splitSegments(relative);
  return first !== '..';
}

/**
 * Join path components with forward slashes regardless of platform.
 */
export function toPosixRelative(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}
