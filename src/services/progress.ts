// =============================================================================
// CASE EVALUATION — Progress Views
//
// Read-only dashboards over the session and case record sets.
// =============================================================================

import { forbidden } from '../errors';
import { IAccessPolicy } from '../types/authorization';
import { EvaluationSession, SyntheticCase } from '../types/evaluation';
import { IEvaluationStore } from '../types/store';
import { compareByLabel } from './cases';

export interface NavigatorProgress {
  navigatorId: string;
  fullName: string;
  completed: number;
  inProgress: number;
  /** Cases with no session for this navigator */
  remaining: number;
}

export interface NavigatorQueue {
  inProgress: EvaluationSession[];
  pending: SyntheticCase[];
  completed: EvaluationSession[];
}

const bySessionLabel = (a: EvaluationSession, b: EvaluationSession) => compareByLabel(a.caseLabel, b.caseLabel);

export class ProgressViews {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy
  ) {}

  /** Per-navigator session counts. Admin only. */
  async navigatorProgress(callerId: string): Promise<NavigatorProgress[]> {
    if (!(await this.policy.isAdmin(callerId))) {
      throw forbidden();
    }

    const [navigators, sessions, totalCases] = await Promise.all([
      this.store.listProfiles({ role: 'navigator' }),
      this.store.listSessions(),
      this.store.countCases(),
    ]);

    return navigators
      .map((navigator): NavigatorProgress => {
        const own = sessions.filter((s) => s.navigatorId === navigator.id);
        const completed = own.filter((s) => s.status === 'completed').length;
        const inProgress = own.length - completed;
        return {
          navigatorId: navigator.id,
          fullName: navigator.fullName,
          completed,
          inProgress,
          remaining: Math.max(totalCases - completed - inProgress, 0),
        };
      })
      .sort((a, b) => a.fullName.localeCompare(b.fullName));
  }

  /** The caller's work queue, each list ordered by case label number. */
  async myQueue(callerId: string): Promise<NavigatorQueue> {
    await this.policy.enforce(callerId, 'select', { type: 'synthetic_case' });

    const [sessions, cases] = await Promise.all([
      this.store.listSessions({ navigatorId: callerId }),
      this.store.listCases(),
    ]);
    const started = new Set(sessions.map((s) => s.caseId));

    return {
      inProgress: sessions.filter((s) => s.status === 'in_progress').sort(bySessionLabel),
      pending: cases.filter((c) => !started.has(c.id)).sort((a, b) => compareByLabel(a.label, b.label)),
      completed: sessions.filter((s) => s.status === 'completed').sort(bySessionLabel),
    };
  }
}
