/**
 * Graph construction from live-traffic observations.
 *
 * Samples are grouped by method + path template (the explicit template when
 * the collector knows it, the concrete path otherwise). Only groups with at
 * least one confirmed call become endpoints; a path that only ever answered
 * 401/403/404/405/501, or never answered at all, is skipped with a warning.
 * Response bodies seen for the same status are merged (multi-sample learning).
 */

import {
  compareStrings,
  createKey,
  endpointIdentity,
  formatKey,
  pathPlaceholders,
  stripBasePath,
} from '../core/endpoint-key';
import { ParseError } from '../core/errors';
import { inferSchema, mergeSchemas, scalarNode, unknownNode } from '../core/normalizer';
import { EndpointDescriptor, EndpointKey, LiveObservation, ParameterDescriptor, SchemaNode } from '../core/types';
import { parseBody } from '../formats';
import { GraphBuilder } from '../graph/knowledge-graph';
import { IngestionResult } from './types';

export interface ObservationGraphOptions {
  maxDepth?: number;

  /** Prefix stripped from concrete paths ('/v1') */
  basePath?: string;

  title?: string;
}

export type ObservationEvidence = 'confirmed' | 'denied' | 'not_implemented' | 'unreachable';

/**
 * What a received status says about an endpoint's existence.
 */
export function classifyStatus(status: number | null): ObservationEvidence {
  if (status === null) return 'unreachable';
  if (status === 401 || status === 403) return 'denied';
  if (status === 404 || status === 405 || status === 501) return 'not_implemented';
  return 'confirmed';
}

/**
 * Decode an observed body: strings holding JSON or XML are parsed, any other
 * text stays a string.
 */
export function decodeObservedBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  try {
    return parseBody(body);
  } catch (error) {
    if (error instanceof ParseError) return body;
    throw error;
  }
}

/**
 * Query parameter names of a concrete request path.
 */
export function queryNames(path: string): string[] {
  const start = path.indexOf('?');
  if (start < 0) return [];
  return path
    .slice(start + 1)
    .split('#')[0]
    .split('&')
    .map((pair) => decodeComponent(pair.split('=')[0]))
    .filter((name) => name.length > 0);
}

function decodeComponent(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch (error) {
    if (error instanceof URIError) return text;
    throw error;
  }
}

/**
 * Stable order for samples, so merged schemas do not depend on arrival order.
 */
export function compareObservations(a: LiveObservation, b: LiveObservation): number {
  return (
    compareStrings(a.method.toUpperCase(), b.method.toUpperCase()) ||
    compareStrings(a.path, b.path) ||
    (a.status ?? -1) - (b.status ?? -1) ||
    compareStrings(JSON.stringify(a.body ?? null), JSON.stringify(b.body ?? null))
  );
}

interface SampleGroup {
  key: EndpointKey;
  samples: LiveObservation[];
}

export function buildGraphFromObservations(
  observations: readonly LiveObservation[],
  options: ObservationGraphOptions = {}
): IngestionResult {
  const groups = new Map<string, SampleGroup>();

  for (const observation of [...observations].sort(compareObservations)) {
    const key = createKey(
      observation.method,
      observation.template ?? stripBasePath(observation.path, options.basePath)
    );
    const identity = endpointIdentity(key);
    const group = groups.get(identity);
    if (!group) {
      groups.set(identity, { key, samples: [observation] });
      continue;
    }
    group.samples.push(observation);
    // Lowest display key wins when templates name placeholders differently
    if (compareStrings(formatKey(key), formatKey(group.key)) < 0) group.key = key;
  }

  const builder = new GraphBuilder();
  const warnings: string[] = [];

  for (const group of groups.values()) {
    const reached = group.samples.filter((s) => s.status !== null);
    if (reached.length === 0) {
      warnings.push(`Skipped ${formatKey(group.key)}: every call failed at transport level`);
      continue;
    }
    if (!reached.some((s) => classifyStatus(s.status) === 'confirmed')) {
      const statuses = Array.from(new Set(reached.map((s) => s.status))).sort((a, b) => (a ?? 0) - (b ?? 0));
      warnings.push(
        `Skipped ${formatKey(group.key)}: no call confirmed the endpoint (status ${statuses.join(', ')})`
      );
      continue;
    }
    builder.add(describeGroup(group.key, reached, options.maxDepth));
  }

  const graph = builder.build({
    ...(options.title ? { title: options.title } : {}),
    format: 'observations',
  });

  return { graph, format: 'observations', specVersion: 'live', warnings };
}

function describeGroup(key: EndpointKey, samples: LiveObservation[], maxDepth?: number): EndpointDescriptor {
  const parameters: ParameterDescriptor[] = [];
  const names = new Set<string>();

  for (const name of pathPlaceholders(key.path)) {
    if (names.has(name)) continue;
    names.add(name);
    parameters.push({ name, location: 'path', schema: scalarNode('string'), required: true });
  }

  const query = new Set<string>();
  for (const sample of samples) queryNames(sample.path).forEach((name) => query.add(name));
  for (const name of Array.from(query).sort()) {
    if (names.has(name)) continue;
    names.add(name);
    parameters.push({ name, location: 'query', schema: scalarNode('string'), required: false });
  }

  const responses: Record<string, SchemaNode> = {};
  for (const sample of samples) {
    if (sample.status === null) continue;
    const status = String(sample.status);
    const schema =
      sample.body === undefined ? unknownNode('absent') : inferSchema(decodeObservedBody(sample.body), maxDepth);
    responses[status] = status in responses ? mergeSchemas(responses[status], schema) : schema;
  }

  return { key, parameters, responses };
}
