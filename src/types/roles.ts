// =============================================================================
// CASE EVALUATION — Role Definitions
//
// Two fixed roles. The Role Directory (profiles table) is the single
// source of truth; token claims are never trusted for role.
// =============================================================================

/** All roles in the system */
export type Role = 'admin' | 'navigator';

export const ROLES: readonly Role[] = ['admin', 'navigator'];
