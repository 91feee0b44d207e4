/**
 * Drift Analyzer
 *
 * Compares a stored knowledge graph against live-traffic observations.
 *
 *   shadow       observed and answered, but matches no declared template
 *   missing      declared, but no call confirmed it
 *   unresolved   declared, but the evidence is inconclusive (access denied,
 *                or every call failed at transport level)
 *   schemaDrift  observed bodies that disagree with the declared response
 *
 * Observations are sorted and grouped before anything is compared, so the
 * report does not depend on the order they arrived in.
 */

import { z } from 'zod';
import {
  compareStrings,
  createKey,
  endpointIdentity,
  findMatchingTemplate,
  formatKey,
  parseKey,
  stripBasePath,
} from '../core/endpoint-key';
import { InvalidParametersError } from '../core/errors';
import { compareRecords, createChange, diffSchemas, toChangeRecord } from '../core/differ';
import { inferSchema, mergeSchemas } from '../core/normalizer';
import { ChangeRecord, EndpointDescriptor, LiveObservation, SchemaNode } from '../core/types';
import { parseJson } from '../formats';
import { KnowledgeGraph } from '../graph/knowledge-graph';
import { classifyStatus, compareObservations, decodeObservedBody } from '../ingest/observations';
import { createLogger } from '../utils/logger';
import { BaseAnalyzer } from './analyzer';
import {
  AnalyzerContext,
  loadSnapshot,
  readInputFile,
  snapshotLabel,
  snapshotNameSchema,
  versionSchema,
} from './context';

const logger = createLogger('drift');

// ─── Report Types ───────────────────────────────────────────────────────────

export interface ShadowEndpoint {
  /** Method + observed path (or the collector's template) */
  endpoint: string;
  observations: number;
  statuses: number[];
}

export type MissingReason = 'not_observed' | 'not_implemented';

export interface MissingEndpoint {
  endpoint: string;
  reason: MissingReason;

  /** Statuses seen for the endpoint (404/405/501 for not_implemented) */
  statuses: number[];
}

export type UnresolvedReason = 'access_denied' | 'unreachable';

/**
 * Insufficient evidence: reported, never folded into missing.
 */
export interface UnresolvedEndpoint {
  endpoint: string;
  reason: UnresolvedReason;
  statuses: number[];

  /** Transport errors reported by the collector */
  errors: string[];
}

export interface DriftCounts {
  observations: number;
  endpoints: number;
  confirmed: number;
  shadow: number;
  missing: number;
  unresolved: number;
  schemaDrift: number;
  breaking: number;
  minor: number;
  info: number;
}

export interface DriftReport {
  type: 'drift';
  snapshot: string;
  counts: DriftCounts;
  shadow: ShadowEndpoint[];
  missing: MissingEndpoint[];
  unresolved: UnresolvedEndpoint[];
  schemaDrift: ChangeRecord[];
  summary: string;
}

export interface DriftOptions {
  /** Label of the graph in the report */
  snapshot?: string;

  /** Prefix stripped from observed paths ('/v1') */
  basePath?: string;

  /** Restrict missing/unresolved/schema verdicts to these endpoints */
  endpoints?: string[];

  includeInformational?: boolean;

  maxDepth?: number;
}

// ─── Evidence ───────────────────────────────────────────────────────────────

export { classifyStatus };

interface EndpointEvidence {
  descriptor: EndpointDescriptor;
  confirmed: LiveObservation[];
  statuses: Set<number>;
  errors: Set<string>;
  denied: number;
  notImplemented: number;
  unreachable: number;
}

function sortedNumbers(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}

/**
 * Declared response for a status: the exact code, then its class ('2XX'),
 * then 'default'.
 */
export function declaredResponse(
  responses: Record<string, SchemaNode>,
  status: number
): { key: string; schema: SchemaNode } | null {
  const code = String(status);
  const candidates = [code, `${code[0]}XX`, `${code[0]}xx`, 'default'];
  for (const key of candidates) {
    const schema = responses[key];
    if (schema !== undefined) return { key, schema };
  }
  return null;
}

// ─── Analysis ───────────────────────────────────────────────────────────────

/**
 * Classify a set of observations against a graph.
 */
export function analyzeDrift(
  graph: KnowledgeGraph,
  observations: readonly LiveObservation[],
  options: DriftOptions = {}
): DriftReport {
  const evidence = new Map<string, EndpointEvidence>();
  for (const descriptor of graph.endpoints()) {
    evidence.set(endpointIdentity(descriptor.key), {
      descriptor,
      confirmed: [],
      statuses: new Set(),
      errors: new Set(),
      denied: 0,
      notImplemented: 0,
      unreachable: 0,
    });
  }

  const shadows = new Map<string, ShadowEndpoint>();

  for (const observation of [...observations].sort(compareObservations)) {
    const method = observation.method.toUpperCase();
    const concrete = stripBasePath(observation.path, options.basePath);
    const kind = classifyStatus(observation.status);

    let template: string | null = null;
    if (observation.template !== undefined && graph.has(createKey(method, observation.template))) {
      template = createKey(method, observation.template).path;
    } else {
      template = findMatchingTemplate(graph.templates(method), concrete);
    }

    if (template === null) {
      // Only an answered call proves an undeclared endpoint exists
      if (kind !== 'confirmed' || observation.status === null) continue;
      const display = formatKey(createKey(method, observation.template ?? concrete));
      const shadow = shadows.get(display) ?? { endpoint: display, observations: 0, statuses: [] };
      shadow.observations++;
      if (!shadow.statuses.includes(observation.status)) shadow.statuses.push(observation.status);
      shadows.set(display, shadow);
      continue;
    }

    const entry = evidence.get(endpointIdentity(createKey(method, template)));
    if (!entry) continue;

    if (observation.status !== null) entry.statuses.add(observation.status);
    if (observation.error) entry.errors.add(observation.error);

    switch (kind) {
      case 'confirmed':
        entry.confirmed.push(observation);
        break;
      case 'denied':
        entry.denied++;
        break;
      case 'not_implemented':
        entry.notImplemented++;
        break;
      default:
        entry.unreachable++;
    }
  }

  const scope = verdictScope(options.endpoints);
  const missing: MissingEndpoint[] = [];
  const unresolved: UnresolvedEndpoint[] = [];
  const schemaDrift: ChangeRecord[] = [];
  let confirmed = 0;
  let evaluated = 0;

  for (const [identity, entry] of evidence) {
    if (scope && !scope.has(identity)) continue;
    evaluated++;
    const endpoint = formatKey(entry.descriptor.key);
    const statuses = sortedNumbers(entry.statuses);

    if (entry.confirmed.length > 0) {
      confirmed++;
      schemaDrift.push(...compareBodies(entry.descriptor, entry.confirmed, options));
    } else if (entry.denied > 0) {
      unresolved.push({ endpoint, reason: 'access_denied', statuses, errors: [] });
    } else if (entry.notImplemented > 0) {
      missing.push({ endpoint, reason: 'not_implemented', statuses });
    } else if (entry.unreachable > 0) {
      unresolved.push({ endpoint, reason: 'unreachable', statuses, errors: Array.from(entry.errors).sort() });
    } else {
      missing.push({ endpoint, reason: 'not_observed', statuses });
    }
  }

  const byEndpoint = (a: { endpoint: string }, b: { endpoint: string }) => compareStrings(a.endpoint, b.endpoint);
  const shadow = Array.from(shadows.values())
    .map((s) => ({ ...s, statuses: sortedNumbers(s.statuses) }))
    .sort(byEndpoint);
  missing.sort(byEndpoint);
  unresolved.sort(byEndpoint);
  schemaDrift.sort((a, b) => compareStrings(a.endpoint, b.endpoint) || compareRecords(a, b));

  const counts: DriftCounts = {
    observations: observations.length,
    endpoints: evaluated,
    confirmed,
    shadow: shadow.length,
    missing: missing.length,
    unresolved: unresolved.length,
    schemaDrift: schemaDrift.length,
    breaking: schemaDrift.filter((r) => r.severity === 'breaking').length,
    minor: schemaDrift.filter((r) => r.severity === 'minor').length,
    info: schemaDrift.filter((r) => r.severity === 'info').length,
  };

  return {
    type: 'drift',
    snapshot: options.snapshot ?? 'graph',
    counts,
    shadow,
    missing,
    unresolved,
    schemaDrift,
    summary: summarize(counts),
  };
}

/**
 * Identities the verdicts are restricted to, or null for the whole graph.
 */
function verdictScope(endpoints?: string[]): Set<string> | null {
  if (!endpoints || endpoints.length === 0) return null;
  const scope = new Set<string>();
  for (const display of endpoints) {
    const key = parseKey(display);
    if (key) scope.add(endpointIdentity(key));
  }
  return scope;
}

function compareBodies(
  descriptor: EndpointDescriptor,
  samples: LiveObservation[],
  options: DriftOptions
): ChangeRecord[] {
  const endpoint = formatKey(descriptor.key);
  const records: ChangeRecord[] = [];
  const observedByStatus = new Map<number, SchemaNode | null>();

  for (const sample of samples) {
    if (sample.status === null) continue;
    const status = sample.status;

    if (sample.expectedStatus !== undefined && sample.expectedStatus !== status) {
      records.push(
        toChangeRecord(
          'modified',
          endpoint,
          createChange(
            'status_mismatch',
            `responses.${status}`,
            `Expected status ${sample.expectedStatus} but received ${status}`,
            String(sample.expectedStatus),
            String(status)
          )
        )
      );
    }

    const previous = observedByStatus.get(status) ?? null;
    if (sample.body === undefined) {
      observedByStatus.set(status, previous);
      continue;
    }
    const inferred = inferSchema(decodeObservedBody(sample.body), options.maxDepth);
    observedByStatus.set(status, previous ? mergeSchemas(previous, inferred) : inferred);
  }

  for (const status of sortedNumbers(observedByStatus.keys())) {
    const path = `responses.${status}`;
    const declared = declaredResponse(descriptor.responses, status);

    if (!declared) {
      records.push(
        toChangeRecord(
          'modified',
          endpoint,
          createChange(
            'response_undeclared',
            path,
            `Status ${status} was returned but is not declared`,
            undefined,
            String(status)
          )
        )
      );
      continue;
    }

    const observed = observedByStatus.get(status);
    if (!observed) continue;

    for (const change of diffSchemas(declared.schema, observed, path, { mode: 'observation' })) {
      if (change.severity === 'info' && !options.includeInformational) continue;
      records.push(toChangeRecord('modified', endpoint, change));
    }
  }

  return dedupe(records);
}

// Repeated expected-status mismatches collapse to one record
function dedupe(records: ChangeRecord[]): ChangeRecord[] {
  const seen = new Set<string>();
  return records.filter((r) => {
    const id = `${r.type}|${r.path ?? ''}|${r.description}`;
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

function summarize(counts: DriftCounts): string {
  const coverage = `${counts.confirmed} of ${counts.endpoints} endpoint(s) confirmed by ${counts.observations} observation(s)`;
  if (counts.shadow + counts.missing + counts.unresolved + counts.schemaDrift === 0) {
    return `No drift: ${coverage}.`;
  }
  return (
    `Drift detected: ${counts.shadow} shadow, ${counts.missing} missing, ${counts.unresolved} unresolved, ` +
    `${counts.schemaDrift} schema drift record(s) (${counts.breaking} breaking, ${counts.minor} minor); ${coverage}.`
  );
}

// ─── Tool ───────────────────────────────────────────────────────────────────

export const observationSchema = z.object({
  method: z.string().min(1),
  path: z.string().min(1),
  template: z.string().min(1).optional(),
  status: z.number().int().min(100).max(599).nullable(),
  expectedStatus: z.number().int().min(100).max(599).optional(),
  body: z.unknown().optional(),
  error: z.string().optional(),
});

const endpointKeySchema = z
  .string()
  .refine((value) => parseKey(value) !== null, { message: 'Expected an endpoint key such as "GET /users/{id}"' });

const parametersSchema = z
  .object({
    snapshot: snapshotNameSchema.optional(),
    version: versionSchema.optional(),
    observations: z.array(observationSchema).optional(),
    observationsPath: z.string().min(1).optional(),
    basePath: z.string().optional(),
    endpoints: z.array(endpointKeySchema).optional(),
    includeInformational: z.boolean().default(false),
  })
  .refine((p) => p.observations !== undefined || p.observationsPath !== undefined, {
    message: 'Either "observations" or "observationsPath" is required',
    path: ['observations'],
  });

export type DriftParameters = z.infer<typeof parametersSchema>;

const observationFileSchema = z.union([
  z.array(observationSchema),
  z.object({ observations: z.array(observationSchema) }).transform((file) => file.observations),
]);

export class DriftAnalyzer extends BaseAnalyzer<DriftParameters, DriftReport> {
  readonly name = 'analyze_drift';
  readonly description =
    'Compare a stored API graph against live-traffic observations and report shadow, missing and unresolved endpoints and response schema drift.';
  readonly parameters = parametersSchema;
  readonly example = {
    snapshot: 'users-api',
    observations: [{ method: 'GET', path: '/users/42', status: 200, body: { id: '42', name: 'Ada' } }],
  };

  constructor(private readonly context: AnalyzerContext) {
    super();
  }

  protected async execute(params: DriftParameters): Promise<DriftReport> {
    const snapshot = await loadSnapshot(
      this.context.store,
      params.snapshot ?? this.context.defaultSnapshot,
      params.version,
      'graph'
    );
    const observations = [...(params.observations ?? []), ...this.readObservations(params.observationsPath)];

    const report = analyzeDrift(snapshot.graph, observations, {
      snapshot: snapshotLabel(snapshot),
      basePath: params.basePath,
      endpoints: params.endpoints,
      includeInformational: params.includeInformational,
      maxDepth: this.context.maxDepth,
    });

    logger.info({ snapshot: report.snapshot, ...report.counts }, 'Drift analysis complete');
    return report;
  }

  private readObservations(observationsPath?: string): LiveObservation[] {
    if (observationsPath === undefined) return [];
    const data = parseJson(readInputFile(observationsPath, 'observations', this.context.cwd));
    const parsed = observationFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new InvalidParametersError(
        this.name,
        parsed.error.issues.map((issue) => ({
          path: ['observationsPath', ...issue.path].join('.'),
          message: issue.message,
        }))
      );
    }
    return parsed.data;
  }
}
