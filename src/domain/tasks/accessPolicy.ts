import { CallerContext } from '../auth/caller.js';

export type AccessOperation = 'read' | 'write';

/**
 * The set of tasks a caller may see before any filter is applied.
 */
export type TaskScope = { kind: 'all' } | { kind: 'owner'; ownerId: string };

/**
 * Owner-or-admin. Read and write follow the same rule: without ownership or
 * the admin role there is no access at all.
 */
export function canAccess(
  caller: CallerContext,
  resourceOwnerId: string,
  _operation: AccessOperation
): boolean {
  return inScope(visibleScope(caller), resourceOwnerId);
}

export function visibleScope(caller: CallerContext): TaskScope {
  return caller.role === 'admin' ? { kind: 'all' } : { kind: 'owner', ownerId: caller.userId };
}

export function inScope(scope: TaskScope, ownerId: string): boolean {
  return scope.kind === 'all' || scope.ownerId === ownerId;
}
