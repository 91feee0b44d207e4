/**
 * Knowledge Graph
 *
 * Immutable collection of endpoint descriptors keyed by endpoint identity,
 * plus the resource edges inferred between them. Analyzers only read graphs;
 * every "change" produces a new instance.
 */

import { compareStrings, endpointIdentity, formatKey, parseKey } from '../core/endpoint-key';
import { ErrorCode, ParseError } from '../core/errors';
import { EndpointDescriptor, EndpointKey, GraphInfo, ResourceEdge } from '../core/types';
import { deepFreeze } from '../utils/object';

export class KnowledgeGraph {
  private readonly byIdentity: ReadonlyMap<string, EndpointDescriptor>;
  readonly edges: readonly ResourceEdge[];
  readonly info: Readonly<GraphInfo>;

  constructor(
    endpoints: Iterable<EndpointDescriptor> = [],
    edges: readonly ResourceEdge[] = [],
    info: GraphInfo = {}
  ) {
    const map = new Map<string, EndpointDescriptor>();
    for (const endpoint of endpoints) {
      map.set(endpointIdentity(endpoint.key), deepFreeze(structuredClone(endpoint)));
    }
    this.byIdentity = map;
    this.edges = deepFreeze(structuredClone([...edges]));
    this.info = deepFreeze({ ...info });
  }

  get size(): number {
    return this.byIdentity.size;
  }

  /**
   * All endpoints, ordered by display key.
   */
  endpoints(): EndpointDescriptor[] {
    return Array.from(this.byIdentity.values()).sort((a, b) =>
      compareStrings(formatKey(a.key), formatKey(b.key))
    );
  }

  /**
   * Display keys ('GET /users/{id}'), sorted.
   */
  keys(): string[] {
    return this.endpoints().map((e) => formatKey(e.key));
  }

  get(key: EndpointKey | string): EndpointDescriptor | undefined {
    const parsed = typeof key === 'string' ? parseKey(key) : key;
    if (!parsed) return undefined;
    return this.byIdentity.get(endpointIdentity(parsed));
  }

  has(key: EndpointKey | string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Path templates declared for a method.
   */
  templates(method: string): string[] {
    const upper = method.toUpperCase();
    return this.endpoints()
      .filter((e) => e.key.method === upper)
      .map((e) => e.key.path);
  }

  withEdges(edges: readonly ResourceEdge[]): KnowledgeGraph {
    return new KnowledgeGraph(this.byIdentity.values(), edges, this.info);
  }
}

/**
 * Collects descriptors for one ingestion pass, rejecting duplicate keys and
 * duplicate parameter names.
 */
export class GraphBuilder {
  private readonly endpoints = new Map<string, EndpointDescriptor>();

  add(descriptor: EndpointDescriptor, source?: string): this {
    const identity = endpointIdentity(descriptor.key);
    const existing = this.endpoints.get(identity);
    if (existing) {
      throw new ParseError(
        `Duplicate endpoint "${formatKey(descriptor.key)}" (already declared as "${formatKey(existing.key)}")`,
        ErrorCode.PARSE_DUPLICATE_KEY,
        { path: source }
      );
    }

    const names = new Set<string>();
    for (const param of descriptor.parameters) {
      if (names.has(param.name)) {
        throw new ParseError(
          `Duplicate parameter "${param.name}" on "${formatKey(descriptor.key)}"`,
          ErrorCode.PARSE_DUPLICATE_KEY,
          { path: source }
        );
      }
      names.add(param.name);
    }

    this.endpoints.set(identity, descriptor);
    return this;
  }

  build(info: GraphInfo = {}, edges: readonly ResourceEdge[] = []): KnowledgeGraph {
    return new KnowledgeGraph(this.endpoints.values(), edges, info);
  }
}

/**
 * Merge a newer ingestion pass into an existing graph. Descriptors with the
 * same identity are replaced by the incoming ones (last write wins); edges
 * touching a replaced or new endpoint are dropped since they may be stale.
 */
export function mergeGraphs(base: KnowledgeGraph, incoming: KnowledgeGraph): KnowledgeGraph {
  const merged = new Map<string, EndpointDescriptor>();
  for (const endpoint of base.endpoints()) {
    merged.set(endpointIdentity(endpoint.key), endpoint);
  }

  const touched = new Set<string>();
  for (const endpoint of incoming.endpoints()) {
    const identity = endpointIdentity(endpoint.key);
    const previous = merged.get(identity);
    if (previous) touched.add(formatKey(previous.key));
    touched.add(formatKey(endpoint.key));
    merged.set(identity, endpoint);
  }

  const edges = [
    ...base.edges.filter((e) => !touched.has(e.from) && !touched.has(e.to)),
    ...incoming.edges,
  ];

  return new KnowledgeGraph(merged.values(), edges, { ...base.info, ...incoming.info });
}
