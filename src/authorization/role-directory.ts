// =============================================================================
// CASE EVALUATION — Role Directory
//
// Maps a caller identity to its role via the profiles record set.
// Single source of truth for role. Nothing here caches: every call
// reads the store, so a role change applies to the very next request.
// =============================================================================

import { notFound } from '../errors';
import { Role } from '../types/roles';
import { IEvaluationStore } from '../types/store';

export class RoleDirectory {
  constructor(private readonly store: Pick<IEvaluationStore, 'getProfile'>) {}

  /** Role for the caller, or null when no profile exists. */
  async findRole(callerId: string): Promise<Role | null> {
    const profile = await this.store.getProfile(callerId);
    return profile ? profile.role : null;
  }

  /** Role for the caller; NOT_FOUND when no profile exists. */
  async resolveRole(callerId: string): Promise<Role> {
    const role = await this.findRole(callerId);
    if (role === null) {
      throw notFound(`No profile for caller ${callerId}`);
    }
    return role;
  }
}
