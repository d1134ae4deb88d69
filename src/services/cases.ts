// =============================================================================
// CASE EVALUATION — Case Catalog
//
// Synthetic cases are authored content: navigators read them, only
// admins create, import, edit or delete them. Payloads are opaque JSON
// trees, stored and returned as given. Deleting a case cascades to its
// sessions and their ratings.
// =============================================================================

import { z } from 'zod';
import { notFound } from '../errors';
import { IAccessPolicy } from '../types/authorization';
import { NewSyntheticCase, SyntheticCase } from '../types/evaluation';
import { CaseFilter, IEvaluationStore } from '../types/store';
import { AuditTrail } from './audit';
import { caseImportSchema, casePatchSchema, newCaseSchema, parseInput } from './validation';

/** Number embedded in a label such as "Case_12"; 0 when there is none. */
export function labelNumber(label: string | null): number {
  const match = /(\d+)/.exec(label || '');
  return match ? parseInt(match[1], 10) : 0;
}

/** Orders Case_2 before Case_10. */
export function compareByLabel(a: string | null, b: string | null): number {
  return labelNumber(a) - labelNumber(b) || (a || '').localeCompare(b || '');
}

function toNewCase(parsed: z.infer<typeof newCaseSchema>): NewSyntheticCase {
  return {
    batchId: parsed.batchId ?? null,
    label: parsed.label ?? null,
    narrativeSummary: parsed.narrativeSummary ?? null,
    format1StateLog: parsed.format1StateLog ?? null,
    format2Triples: parsed.format2Triples ?? null,
    format3RlScenario: parsed.format3RlScenario ?? null,
  };
}

export class CaseCatalog {
  constructor(
    private readonly store: IEvaluationStore,
    private readonly policy: IAccessPolicy,
    private readonly audit: AuditTrail
  ) {}

  /** All cases, ordered by label number. Admins and navigators only. */
  async listCases(callerId: string, filter: CaseFilter = {}): Promise<SyntheticCase[]> {
    await this.policy.enforce(callerId, 'select', { type: 'synthetic_case' });
    const cases = await this.store.listCases(filter);
    return cases.sort((a, b) => compareByLabel(a.label, b.label));
  }

  async getCase(callerId: string, id: string): Promise<SyntheticCase> {
    await this.policy.enforce(callerId, 'select', { type: 'synthetic_case', id });
    const found = await this.store.getCase(id);
    if (!found) {
      throw notFound(`Case ${id} not found`);
    }
    return found;
  }

  async createCase(callerId: string, input: unknown): Promise<SyntheticCase> {
    const decision = await this.policy.enforce(callerId, 'insert', { type: 'synthetic_case' });
    const parsed = parseInput(newCaseSchema, input, 'case');

    const [created] = await this.store.insertCases([toNewCase(parsed)]);

    await this.audit.record({
      eventType: 'case.created',
      description: `Case "${created.label ?? created.id}" created`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'synthetic_case',
      targetId: created.id,
      metadata: { batchId: created.batchId },
    });

    return created;
  }

  /**
   * Import a batch in one all-or-nothing write. Cases without a label
   * are numbered Case_<n>, continuing from the current catalog size.
   */
  async importCases(callerId: string, input: unknown): Promise<SyntheticCase[]> {
    const decision = await this.policy.enforce(callerId, 'insert', { type: 'synthetic_case' });
    const parsed = parseInput(caseImportSchema, input, 'case import');

    const existing = await this.store.countCases();
    const rows = parsed.cases.map((c, i): NewSyntheticCase => ({
      ...toNewCase(c),
      batchId: c.batchId ?? parsed.batchId,
      label: c.label ?? `Case_${existing + i + 1}`,
    }));

    const created = await this.store.insertCases(rows);
    console.log(`[Cases] Imported ${created.length} case(s) into batch ${parsed.batchId}`);

    await this.audit.record({
      eventType: 'case.imported',
      description: `Imported ${created.length} case(s) into batch ${parsed.batchId}`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'synthetic_case',
      targetId: parsed.batchId,
      metadata: { caseIds: created.map((c) => c.id) },
    });

    return created;
  }

  async updateCase(callerId: string, id: string, patch: unknown): Promise<SyntheticCase> {
    const decision = await this.policy.enforce(callerId, 'update', { type: 'synthetic_case', id });
    const parsed = parseInput(casePatchSchema, patch, 'case update');

    const updated = await this.store.updateCase(id, parsed);
    if (!updated) {
      throw notFound(`Case ${id} not found`);
    }

    await this.audit.record({
      eventType: 'case.updated',
      description: `Case "${updated.label ?? id}" updated`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'synthetic_case',
      targetId: id,
      metadata: { fields: Object.keys(parsed) },
    });

    return updated;
  }

  /** Cascades to every session on the case and their ratings. */
  async deleteCase(callerId: string, id: string): Promise<void> {
    const decision = await this.policy.enforce(callerId, 'delete', { type: 'synthetic_case', id });
    if (!(await this.store.deleteCase(id))) {
      throw notFound(`Case ${id} not found`);
    }

    await this.audit.record({
      eventType: 'case.deleted',
      description: `Case ${id} deleted`,
      actorId: callerId,
      actorRole: decision.callerRole,
      targetType: 'synthetic_case',
      targetId: id,
    });
  }
}
