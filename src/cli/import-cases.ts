// =============================================================================
// CASE EVALUATION — Case Import Tool
//
// Loads every *.json file in a directory as one synthetic case and
// imports them through the Case Catalog as a single batch. Files are
// taken in name order, so labels follow file order.
//
// Usage:
//   npm run import-cases -- <dir> <batchId> <adminId>
// =============================================================================

import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { createStore } from '../db';
import { createServices } from '../services';
import { jsonValueSchema } from '../services/validation';

/** On-disk case layout written by the case generation tooling. */
const caseFileSchema = z.object({
  label: z.string().optional(),
  narrative_summary: z.string().optional(),
  format_1_state_log: jsonValueSchema.optional(),
  format_2_triples: jsonValueSchema.optional(),
  format_3_rl_scenario: jsonValueSchema.optional(),
});

export interface CaseFileInput {
  label?: string;
  narrativeSummary: string;
  format1StateLog: z.infer<typeof jsonValueSchema>;
  format2Triples: z.infer<typeof jsonValueSchema>;
  format3RlScenario: z.infer<typeof jsonValueSchema>;
}

/** Map one parsed case file to catalog input. Missing payloads become []. */
export function caseFromFile(data: unknown, fileName: string): CaseFileInput {
  const result = caseFileSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`${fileName}: ${result.error.errors[0]?.message ?? 'not a case file'}`);
  }
  const file = result.data;
  return {
    label: file.label,
    narrativeSummary: file.narrative_summary ?? '',
    format1StateLog: file.format_1_state_log ?? [],
    format2Triples: file.format_2_triples ?? [],
    format3RlScenario: file.format_3_rl_scenario ?? [],
  };
}

export function loadCaseDirectory(dir: string): CaseFileInput[] {
  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort();

  return files.map((fileName) => {
    const raw = readFileSync(path.join(dir, fileName), 'utf-8');
    return caseFromFile(JSON.parse(raw), fileName);
  });
}

async function main(argv: string[]): Promise<void> {
  const [dir, batchId, adminId] = argv;
  if (!dir || !batchId || !adminId) {
    console.error('Usage: npm run import-cases -- <dir> <batchId> <adminId>');
    process.exit(2);
  }

  const cases = loadCaseDirectory(path.resolve(dir));
  console.log(`[Import] Found ${cases.length} JSON file(s) in ${dir}`);

  const store = createStore();
  try {
    const services = createServices(store);
    const created = await services.cases.importCases(adminId, { batchId, cases });
    console.log(`[Import] Inserted ${created.length} case(s) into batch ${batchId}`);
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    console.error('[Import] Failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
