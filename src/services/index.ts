// =============================================================================
// CASE EVALUATION — Service Wiring
// =============================================================================

import { AccessPolicyEngine } from '../authorization/policy';
import { RoleDirectory } from '../authorization/role-directory';
import { config } from '../config';
import { IEvaluationStore } from '../types/store';
import { AuditTrail } from './audit';
import { CaseCatalog } from './cases';
import { ProfileService } from './profiles';
import { ProgressViews } from './progress';
import { RatingScorer } from './ratings';
import { SessionManager } from './sessions';

export interface ServiceOptions {
  bootstrapAdminIds?: readonly string[];
  now?: () => Date;
}

export interface Services {
  store: IEvaluationStore;
  roles: RoleDirectory;
  policy: AccessPolicyEngine;
  audit: AuditTrail;
  profiles: ProfileService;
  cases: CaseCatalog;
  sessions: SessionManager;
  ratings: RatingScorer;
  progress: ProgressViews;
}

export function createServices(store: IEvaluationStore, options: ServiceOptions = {}): Services {
  const now = options.now ?? (() => new Date());
  const roles = new RoleDirectory(store);
  const policy = new AccessPolicyEngine(roles, store);
  const audit = new AuditTrail(store, policy, now);

  return {
    store,
    roles,
    policy,
    audit,
    profiles: new ProfileService(store, policy, audit, options.bootstrapAdminIds ?? config.auth.bootstrapAdminIds),
    cases: new CaseCatalog(store, policy, audit),
    sessions: new SessionManager(store, policy, audit, now),
    ratings: new RatingScorer(store, policy),
    progress: new ProgressViews(store, policy),
  };
}

export { AuditTrail, CaseCatalog, ProfileService, ProgressViews, RatingScorer, SessionManager };
