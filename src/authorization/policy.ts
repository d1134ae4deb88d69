// =============================================================================
// CASE EVALUATION — Access Policy Engine
//
// Evaluates (caller, action, resource) in order:
//
//   1. Admin override         role(caller) = admin → allow
//   2. Ownership predicate    per resource type:
//        profile              insert/select iff caller.id = resource.id
//        synthetic_case       select iff role(caller) = navigator
//        evaluation_session   any action iff navigatorId = caller.id
//        rating               any action iff owning session's
//                             navigatorId = caller.id
//   3. Default deny
//
// Role is recomputed from the Role Directory on every evaluation.
// Denials are FORBIDDEN whether or not the target exists.
// =============================================================================

import { forbidden } from '../errors';
import {
  DenialReason,
  IAccessPolicy,
  PolicyAction,
  PolicyDecision,
  PolicyResource,
  PolicyRule,
} from '../types/authorization';
import { IEvaluationStore } from '../types/store';
import { RoleDirectory } from './role-directory';

export class AccessPolicyEngine implements IAccessPolicy {
  constructor(
    private readonly roles: RoleDirectory,
    private readonly sessions: Pick<IEvaluationStore, 'getSession'>
  ) {}

  async evaluate(
    callerId: string,
    action: PolicyAction,
    resource: PolicyResource
  ): Promise<PolicyDecision> {
    const decidedAt = new Date();
    const callerRole = await this.roles.findRole(callerId);

    const allow = (rule: PolicyRule): PolicyDecision => ({
      allowed: true,
      rule,
      callerRole,
      decidedAt,
    });
    const deny = (denialReason: DenialReason): PolicyDecision => ({
      allowed: false,
      rule: 'default_deny',
      callerRole,
      denialReason,
      decidedAt,
    });

    if (callerRole === 'admin') {
      return allow('admin_override');
    }

    switch (resource.type) {
      case 'profile':
        if (action !== 'insert' && action !== 'select') return deny('action_not_permitted');
        return resource.id === callerId ? allow('profile_self') : deny('not_owner');

      case 'synthetic_case':
        if (action !== 'select') return deny('action_not_permitted');
        if (callerRole === null) return deny('no_profile');
        return callerRole === 'navigator' ? allow('case_navigator_read') : deny('role_not_permitted');

      case 'evaluation_session':
        return resource.navigatorId === callerId ? allow('session_owner') : deny('not_owner');

      case 'rating': {
        // Ownership is transitive through the session, never stored on the rating.
        const session = await this.sessions.getSession(resource.sessionId);
        if (!session) return deny('session_missing');
        return session.navigatorId === callerId ? allow('rating_session_owner') : deny('not_owner');
      }

      case 'audit_event':
        return deny(callerRole === null ? 'no_profile' : 'role_not_permitted');
    }
  }

  async enforce(
    callerId: string,
    action: PolicyAction,
    resource: PolicyResource
  ): Promise<PolicyDecision> {
    const decision = await this.evaluate(callerId, action, resource);
    if (!decision.allowed) {
      throw forbidden();
    }
    return decision;
  }

  /** Rule 1 on its own: pure role check, recomputed per call. */
  async isAdmin(callerId: string): Promise<boolean> {
    return (await this.roles.findRole(callerId)) === 'admin';
  }
}
