// =============================================================================
// CASE EVALUATION — Test Helpers
//
// Builds the full service graph over the in-memory store and, for the
// HTTP suites, serves it on an ephemeral port in this process.
// Tokens are signed with the configured development secret.
// =============================================================================

import { Server } from 'http';
import { AddressInfo } from 'net';
import { createApp } from '../src/app';
import { MemoryEvaluationStore } from '../src/db/memory-store';
import { signAccessToken } from '../src/middleware/authenticate';
import { createServices, Services } from '../src/services';
import { JsonValue, Profile, SyntheticCase } from '../src/types/evaluation';
import { Role } from '../src/types/roles';
import { IEvaluationStore } from '../src/types/store';

export const ADMIN = 'admin-1';
export const NAV1 = 'nav-1';
export const NAV2 = 'nav-2';
export const STRANGER = 'no-profile';

/** Fixed clock for completedAt assertions */
export const FIXED_NOW = new Date('2026-03-02T10:00:00.000Z');

export function buildServices(
  options: { bootstrapAdminIds?: string[]; store?: IEvaluationStore } = {}
): Services {
  const store = options.store ?? new MemoryEvaluationStore();
  return createServices(store, {
    bootstrapAdminIds: options.bootstrapAdminIds ?? [],
    now: () => FIXED_NOW,
  });
}

export async function seedProfile(
  services: Services,
  id: string,
  role: Role,
  fullName: string = id,
  pin: string | null = null
): Promise<Profile> {
  return services.store.insertProfile({ id, role, fullName, pin });
}

/** Admin, two navigators, and `caseCount` cases labelled Case_1..n. */
export async function seedWorld(
  services: Services,
  caseCount = 3
): Promise<SyntheticCase[]> {
  await seedProfile(services, ADMIN, 'admin', 'Ada Admin');
  await seedProfile(services, NAV1, 'navigator', 'Nora Navigator', '1234');
  await seedProfile(services, NAV2, 'navigator', 'Ned Navigator');
  return services.store.insertCases(
    Array.from({ length: caseCount }, (_, i) => sampleCase(`Case_${i + 1}`))
  );
}

export function sampleCase(label: string | null, batchId = 'batch-test') {
  const stateLog: JsonValue = [
    { t: 0, event: 'referral received', state: { barrier: 'transport' } },
    { t: 1, event: 'ride booked' },
  ];
  return {
    batchId,
    label,
    narrativeSummary: `Narrative for ${label ?? 'unlabelled case'}`,
    format1StateLog: stateLog,
    format2Triples: [{ intent: 'reduce delay', tactic: 'call clinic', outcome: 'slot found' }],
    format3RlScenario: { options: ['escalate', 'wait'] },
  };
}

export const TIMELINE_FIELDS = {
  clinicalImpact: 'moderate',
  environmentalImpact: 'low',
  homeServiceAdoptionImpact: 'none',
  eddDelta: '+1 day',
  bottleneckRealism: true,
};

// ── HTTP ───────────────────────────────────────────────────────────────

export interface TestServer {
  services: Services;
  baseUrl: string;
  close(): Promise<void>;
}

export async function startTestServer(services: Services = buildServices()): Promise<TestServer> {
  const app = createApp(services, { rateLimitMax: 10000 });
  const server: Server = await new Promise((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    services,
    baseUrl: `http://127.0.0.1:${port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function token(callerId: string): string {
  return signAccessToken(callerId);
}

/**
 * Make an API request, authenticated as `callerId` when given.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
  callerId?: string
): Promise<Response> {
  const headers: Record<string, string> = {};
  if (callerId) {
    headers['Authorization'] = `Bearer ${token(callerId)}`;
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response): Promise<any> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}
