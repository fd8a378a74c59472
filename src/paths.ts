import { basename, dirname, resolve, sep } from 'path';
import type { ResolvedRoot } from './types.js';

export const WORKTREE_ROOT_SUFFIX = '.worktrees';

/**
 * Name of the directory that holds every worktree of a project.
 */
export function worktreeRootName(projectRoot: string): string {
  return `${basename(resolve(projectRoot))}${WORKTREE_ROOT_SUFFIX}`;
}

function isWorktreeRootSegment(segment: string): boolean {
  return segment.length > WORKTREE_ROOT_SUFFIX.length && segment.endsWith(WORKTREE_ROOT_SUFFIX);
}

function isInside(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent.endsWith(sep) ? parent : parent + sep);
}

/**
 * Finds the directory that should hold a new worktree.
 *
 * Invoked from inside an existing worktree root (or one of its branch
 * directories), the existing root is reused so repeated runs share one root
 * instead of nesting. Anywhere else the root is a sibling of the project:
 *
 * ```
 * /d/radial                    -> /d/radial.worktrees
 * /d/radial.worktrees          -> /d/radial.worktrees
 * /d/radial.worktrees/fix/x    -> /d/radial.worktrees
 * ```
 *
 * Matching is done on whole path segments, so `/d/my.worktrees-notes` is not
 * mistaken for a root.
 */
export function resolveWorktreeRoot(currentLocation: string, projectRoot: string): ResolvedRoot {
  const location = resolve(currentLocation);
  const project = resolve(projectRoot);

  if (!isInside(location, project)) {
    const segments = location.split(sep);

    // Outermost match wins so a root is never placed inside another root.
    // A directory holding the project itself is not a worktree root.
    for (let index = 1; index < segments.length; index++) {
      if (!isWorktreeRootSegment(segments[index])) {
        continue;
      }
      const candidate = segments.slice(0, index + 1).join(sep);
      if (isInside(project, candidate)) {
        continue;
      }
      return {
        worktreeRootDir: candidate,
        locationKind: index === segments.length - 1 ? 'worktree-root' : 'branch-subdirectory'
      };
    }
  }

  return {
    worktreeRootDir: resolve(dirname(project), worktreeRootName(project)),
    locationKind: 'project'
  };
}
