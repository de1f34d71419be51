import { Role } from './user.js';

/**
 * Resolved identity of an authenticated request. Passed explicitly to every
 * use case and query; never kept in ambient state.
 */
export interface CallerContext {
  readonly userId: string;
  readonly role: Role;
}
