// =============================================================================
// CASE EVALUATION — Profile Service
//
// Role Directory operations. A caller may create only their own
// profile, once; every other mutation is admin-only. Admin profiles
// can be self-provisioned only by identities on the bootstrap list.
// =============================================================================

import { timingSafeEqual } from 'crypto';
import { forbidden, notFound } from '../errors';
import { IAccessPolicy } from '../types/authorization';
import { Profile } from '../types/evaluation';
import { Role } from '../types/roles';
import { IEvaluationStore } from '../types/store';
import { AuditTrail } from './audit';
import { newProfileSchema, parseInput, pinSchema, profilePatchSchema } from './validation';

export interface CreateProfileInput {
  id: string;
  role: string;
  fullName: string;
  pin?: string | null;
}

export interface UpdateProfileInput {
  role?: string;
  fullName?: string;
  pin?: string | null;
}

export class ProfileService {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy,
    private readonly audit: AuditTrail,
    private readonly bootstrapAdminIds: readonly string[]
  ) {}

  /**
   * Provision a profile. Fails with ALREADY_EXISTS if one exists for
   * the id, INVALID_ARGUMENT on a malformed role, name or PIN.
   */
  async createProfile(callerId: string, input: CreateProfileInput): Promise<Profile> {
    const parsed = parseInput(newProfileSchema, input, 'profile');

    const decision = await this.policy.enforce(callerId, 'insert', { type: 'profile', id: parsed.id });
    if (
      parsed.role === 'admin' &&
      decision.rule !== 'admin_override' &&
      !this.bootstrapAdminIds.includes(callerId)
    ) {
      throw forbidden('Only administrators may create admin profiles');
    }

    const profile = await this.store.insertProfile({
      id: parsed.id,
      role: parsed.role,
      fullName: parsed.fullName,
      pin: parsed.pin ?? null,
    });

    await this.audit.record({
      eventType: 'profile.created',
      description: `Profile created for ${profile.fullName} (${profile.role})`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'profile',
      targetId: profile.id,
      metadata: { role: profile.role },
    });

    return profile;
  }

  async getProfile(callerId: string, id: string): Promise<Profile> {
    await this.policy.enforce(callerId, 'select', { type: 'profile', id });
    const profile = await this.store.getProfile(id);
    if (!profile) {
      throw notFound(`Profile ${id} not found`);
    }
    return profile;
  }

  /**
   * Admins see every profile; anyone else sees at most their own.
   */
  async listProfiles(callerId: string, filter: { role?: Role } = {}): Promise<Profile[]> {
    if (await this.policy.isAdmin(callerId)) {
      return this.store.listProfiles(filter);
    }
    const own = await this.store.getProfile(callerId);
    return own && (!filter.role || own.role === filter.role) ? [own] : [];
  }

  async updateProfile(callerId: string, id: string, patch: UpdateProfileInput): Promise<Profile> {
    const decision = await this.policy.enforce(callerId, 'update', { type: 'profile', id });
    const parsed = parseInput(profilePatchSchema, patch, 'profile update');

    const updated = await this.store.updateProfile(id, parsed);
    if (!updated) {
      throw notFound(`Profile ${id} not found`);
    }

    await this.audit.record({
      eventType: 'profile.updated',
      description: `Profile ${id} updated`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'profile',
      targetId: id,
      metadata: { fields: Object.keys(parsed) },
    });

    return updated;
  }

  /** Cascades to the profile's sessions and their ratings. */
  async deleteProfile(callerId: string, id: string): Promise<void> {
    const decision = await this.policy.enforce(callerId, 'delete', { type: 'profile', id });
    if (!(await this.store.deleteProfile(id))) {
      throw notFound(`Profile ${id} not found`);
    }

    await this.audit.record({
      eventType: 'profile.deleted',
      description: `Profile ${id} deleted`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'profile',
      targetId: id,
    });
  }

  /**
   * Secondary verification of the caller's own PIN. Not authentication:
   * the caller is already identified. False when no PIN is set.
   */
  async verifyPin(callerId: string, pin: string): Promise<boolean> {
    await this.policy.enforce(callerId, 'select', { type: 'profile', id: callerId });
    const candidate = parseInput(pinSchema, pin, 'PIN');

    const profile = await this.store.getProfile(callerId);
    if (!profile) {
      throw notFound(`Profile ${callerId} not found`);
    }
    if (profile.pin === null || profile.pin.length !== candidate.length) {
      return false;
    }
    return timingSafeEqual(Buffer.from(profile.pin), Buffer.from(candidate));
  }
}
