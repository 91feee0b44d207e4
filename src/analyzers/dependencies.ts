/**
 * Dependency Mapper
 *
 * Infers producer/consumer edges from declared shapes alone: an endpoint
 * that creates a resource (POST by default) and returns an identifier-like
 * field provides it to every other endpoint whose path takes a placeholder
 * of the same name.
 *
 * Name reconciliation, first match wins:
 *   1. exact          `id`      ↔ `{id}` (case-insensitive)
 *   2. plural         `userIds` ↔ `{userId}`
 *   3. case-fold      `user_id` ↔ `{userId}`
 *   4. qualified      `id` on POST /users ↔ `{userId}`
 *
 * The result is a heuristic. Edges carry the rule that matched and a
 * confidence level instead of pretending to be certain.
 */

import { z } from 'zod';
import { compareStrings, endpointIdentity, formatKey, pathPlaceholders } from '../core/endpoint-key';
import { Confidence, EndpointDescriptor, MatchRule, ResourceEdge, SchemaNode } from '../core/types';
import { KnowledgeGraph } from '../graph/knowledge-graph';
import { createLogger } from '../utils/logger';
import { BaseAnalyzer } from './analyzer';
import { AnalyzerContext, loadSnapshot, snapshotLabel, snapshotNameSchema, versionSchema } from './context';

const logger = createLogger('dependencies');

export const DEFAULT_CREATION_VERBS = ['POST'];

const RULE_ORDER: MatchRule[] = ['exact', 'plural', 'case-fold', 'resource-qualified'];

export const HEURISTIC_NOTICE =
  'Edges are inferred from field and path-parameter names only; expect false positives and missed dependencies.';

export interface DependencyCounts {
  endpoints: number;
  producers: number;
  consumers: number;
  edges: number;
  high: number;
  medium: number;
  low: number;
}

export interface DependencyReport {
  type: 'dependencies';
  snapshot: string;
  counts: DependencyCounts;

  /** provides_identifier edges, producer → consumer */
  edges: ResourceEdge[];

  /** Reciprocal requires_resource entries, consumer → producer */
  requirements: ResourceEdge[];

  /** Version written when the edges were persisted */
  persistedVersion?: number;
  summary: string;
}

export interface DependencyOptions {
  snapshot?: string;

  /** HTTP methods treated as resource creation */
  creationVerbs?: string[];
}

// ─── Name Reconciliation ────────────────────────────────────────────────────

export function singularize(word: string): string {
  if (word.length > 1 && word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/**
 * camelCase / snake_case / kebab-case insensitive form.
 */
export function foldName(name: string): string {
  return name.replace(/[_\-\s]/g, '').toLowerCase();
}

/**
 * Rule under which a response field satisfies a path placeholder, if any.
 *
 * @param resource - Singular resource name of the producer ('user')
 */
export function matchIdentifier(field: string, placeholder: string, resource?: string): MatchRule | null {
  const f = field.toLowerCase();
  const p = placeholder.toLowerCase();
  if (f === p) return 'exact';
  if (singularize(f) === singularize(p)) return 'plural';

  const ff = foldName(field);
  const fp = foldName(placeholder);
  if (ff === fp || singularize(ff) === singularize(fp)) return 'case-fold';

  if (resource) {
    const qualified = `${foldName(resource)}id`;
    if ((ff === 'id' && fp === qualified) || (fp === 'id' && ff === qualified)) return 'resource-qualified';
  }
  return null;
}

/**
 * Singular name of the last literal path segment ('/orgs/{id}/members' → 'member').
 */
export function resourceName(path: string): string | undefined {
  const literals = path.split('/').filter((s) => s.length > 0 && !s.startsWith('{'));
  const last = literals[literals.length - 1];
  return last === undefined ? undefined : singularize(last);
}

function isSuccessStatus(status: string): boolean {
  return /^2(\d\d|xx)$/i.test(status);
}

/**
 * Identifier candidates: top-level fields, fields one wrapper level down
 * ({ data: { id } }) and fields of array items.
 */
export function identifierFields(descriptor: EndpointDescriptor): string[] {
  const fields = new Set<string>();

  const collect = (schema: SchemaNode, depth: number): void => {
    if (schema.kind === 'array') {
      collect(schema.items, depth);
      return;
    }
    if (schema.kind !== 'object') return;
    for (const [name, child] of Object.entries(schema.properties)) {
      fields.add(name);
      if (depth === 0) collect(child, 1);
    }
  };

  for (const [status, schema] of Object.entries(descriptor.responses)) {
    if (isSuccessStatus(status)) collect(schema, 0);
  }
  return Array.from(fields).sort(compareStrings);
}

// ─── Mapping ────────────────────────────────────────────────────────────────

interface Match {
  field: string;
  rule: MatchRule;
}

function bestMatch(fields: string[], placeholder: string, resource?: string): Match | null {
  let best: Match | null = null;
  for (const field of fields) {
    const rule = matchIdentifier(field, placeholder, resource);
    if (rule === null) continue;
    if (best === null || RULE_ORDER.indexOf(rule) < RULE_ORDER.indexOf(best.rule)) best = { field, rule };
  }
  return best;
}

function confidenceOf(producer: EndpointDescriptor, consumer: EndpointDescriptor, rule: MatchRule): Confidence {
  if (consumer.key.path.startsWith(`${producer.key.path}/`)) return 'high';
  return rule === 'resource-qualified' ? 'medium' : 'low';
}

function compareEdges(a: ResourceEdge, b: ResourceEdge): number {
  return compareStrings(a.from, b.from) || compareStrings(a.to, b.to) || compareStrings(a.resource, b.resource);
}

/**
 * Infer resource edges for a graph.
 */
export function mapDependencies(graph: KnowledgeGraph, options: DependencyOptions = {}): DependencyReport {
  const verbs = new Set((options.creationVerbs ?? DEFAULT_CREATION_VERBS).map((v) => v.toUpperCase()));
  const endpoints = graph.endpoints();
  const edges = new Map<string, ResourceEdge>();

  for (const producer of endpoints) {
    if (!verbs.has(producer.key.method)) continue;

    // A producer echoing its own path input does not provide it
    const inputs = new Set(pathPlaceholders(producer.key.path).map(foldName));
    const fields = identifierFields(producer).filter((f) => !inputs.has(foldName(f)));
    if (fields.length === 0) continue;

    const resource = resourceName(producer.key.path);
    const from = formatKey(producer.key);

    for (const consumer of endpoints) {
      if (endpointIdentity(consumer.key) === endpointIdentity(producer.key)) continue;
      const to = formatKey(consumer.key);

      for (const placeholder of new Set(pathPlaceholders(consumer.key.path))) {
        if (inputs.has(foldName(placeholder))) continue;
        const match = bestMatch(fields, placeholder, resource);
        if (!match) continue;

        const edge: ResourceEdge = {
          from,
          to,
          resource: placeholder,
          type: 'provides_identifier',
          rule: match.rule,
          confidence: confidenceOf(producer, consumer, match.rule),
        };
        edges.set(`${from}|${to}|${placeholder}`, edge);
      }
    }
  }

  const provided = Array.from(edges.values()).sort(compareEdges);
  const requirements = provided
    .map((edge): ResourceEdge => ({ ...edge, from: edge.to, to: edge.from, type: 'requires_resource' }))
    .sort(compareEdges);

  const counts: DependencyCounts = {
    endpoints: graph.size,
    producers: new Set(provided.map((e) => e.from)).size,
    consumers: new Set(provided.map((e) => e.to)).size,
    edges: provided.length,
    high: provided.filter((e) => e.confidence === 'high').length,
    medium: provided.filter((e) => e.confidence === 'medium').length,
    low: provided.filter((e) => e.confidence === 'low').length,
  };

  return {
    type: 'dependencies',
    snapshot: options.snapshot ?? 'graph',
    counts,
    edges: provided,
    requirements,
    summary: summarize(counts),
  };
}

function summarize(counts: DependencyCounts): string {
  if (counts.edges === 0) {
    return `No dependency edges inferred among ${counts.endpoints} endpoint(s). ${HEURISTIC_NOTICE}`;
  }
  return (
    `Inferred ${counts.edges} dependency edge(s) from ${counts.producers} producer(s) to ${counts.consumers} ` +
    `consumer(s) (${counts.high} high, ${counts.medium} medium, ${counts.low} low confidence). ${HEURISTIC_NOTICE}`
  );
}

// ─── Tool ───────────────────────────────────────────────────────────────────

const parametersSchema = z.object({
  snapshot: snapshotNameSchema.optional(),
  version: versionSchema.optional(),
  persist: z.boolean().default(false),
});

export type DependencyParameters = z.infer<typeof parametersSchema>;

export class DependencyAnalyzer extends BaseAnalyzer<DependencyParameters, DependencyReport> {
  readonly name = 'map_dependencies';
  readonly description =
    'Infer which endpoints provide resource identifiers consumed by other endpoints. Heuristic; every edge carries its match rule and confidence.';
  readonly parameters = parametersSchema;
  readonly example = { snapshot: 'users-api', persist: true };

  constructor(
    private readonly context: AnalyzerContext,
    private readonly creationVerbs: string[] = DEFAULT_CREATION_VERBS
  ) {
    super();
  }

  protected async execute(params: DependencyParameters): Promise<DependencyReport> {
    const name = params.snapshot ?? this.context.defaultSnapshot;
    const snapshot = await loadSnapshot(this.context.store, name, params.version, 'graph');

    const report = mapDependencies(snapshot.graph, {
      snapshot: snapshotLabel(snapshot),
      creationVerbs: this.creationVerbs,
    });

    if (params.persist) {
      const saved = await this.context.store.save(
        name,
        snapshot.graph.withEdges([...report.edges, ...report.requirements]),
        { source: `map_dependencies (${snapshotLabel(snapshot)})` }
      );
      report.persistedVersion = saved.version;
    }

    logger.info({ snapshot: report.snapshot, ...report.counts }, 'Dependency mapping complete');
    return report;
  }
}
