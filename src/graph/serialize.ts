/**
 * Persisted graph format.
 *
 * {
 *   "endpoints": { "GET /users/{id}": { "parameters": [...], "requestBody": {...}, "responses": { "200": {...} } } },
 *   "edges": [ { "from": "...", "to": "...", "resource": "...", "type": "..." } ]
 * }
 *
 * Schema nodes carry a `kind` discriminator. Documents are validated on load.
 */

import { z } from 'zod';
import { formatKey, parseKey } from '../core/endpoint-key';
import {
  EndpointDescriptor,
  GraphInfo,
  ParameterDescriptor,
  ResourceEdge,
  SchemaNode,
} from '../core/types';
import { KnowledgeGraph } from './knowledge-graph';

// ─── Wire Types ─────────────────────────────────────────────────────────────

export interface EndpointDocument {
  parameters: ParameterDescriptor[];
  requestBody?: SchemaNode;
  responses: Record<string, SchemaNode>;
  summary?: string;
}

export interface GraphDocument {
  info?: GraphInfo;
  endpoints: Record<string, EndpointDocument>;
  edges: ResourceEdge[];
}

// ─── Validation Schemas ─────────────────────────────────────────────────────

const scalarValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const schemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.literal('scalar'),
      type: z.enum(['string', 'number', 'boolean', 'null']),
      enum: z.array(scalarValueSchema).optional(),
      format: z.string().optional(),
      nullable: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal('array'),
      items: schemaNodeSchema,
      nullable: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal('object'),
      properties: z.record(schemaNodeSchema),
      required: z.array(z.string()),
      nullable: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal('unknown'),
      reason: z.enum(['untyped', 'depth-limit', 'union', 'absent']).optional(),
      ref: z.string().optional(),
      variants: z.array(schemaNodeSchema).optional(),
    }),
  ])
);

const parameterSchema = z.object({
  name: z.string().min(1),
  location: z.enum(['path', 'query', 'header', 'cookie', 'body']),
  schema: schemaNodeSchema,
  required: z.boolean(),
  description: z.string().optional(),
});

const endpointSchema = z.object({
  parameters: z.array(parameterSchema).default([]),
  requestBody: schemaNodeSchema.optional(),
  responses: z.record(schemaNodeSchema).default({}),
  summary: z.string().optional(),
});

const edgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  resource: z.string(),
  type: z.enum(['provides_identifier', 'requires_resource']),
  rule: z.enum(['exact', 'plural', 'case-fold', 'resource-qualified']).optional(),
  confidence: z.enum(['high', 'medium', 'low']).optional(),
});

export const graphDocumentSchema = z.object({
  info: z
    .object({
      title: z.string().optional(),
      version: z.string().optional(),
      format: z.enum(['openapi3', 'swagger2', 'postman2', 'observations']).optional(),
    })
    .optional(),
  endpoints: z.record(endpointSchema),
  edges: z.array(edgeSchema).default([]),
});

// ─── Conversion ─────────────────────────────────────────────────────────────

export function graphToDocument(graph: KnowledgeGraph): GraphDocument {
  const endpoints: Record<string, EndpointDocument> = {};

  for (const endpoint of graph.endpoints()) {
    const doc: EndpointDocument = {
      parameters: endpoint.parameters,
      responses: endpoint.responses,
    };
    if (endpoint.requestBody) doc.requestBody = endpoint.requestBody;
    if (endpoint.summary !== undefined) doc.summary = endpoint.summary;
    endpoints[formatKey(endpoint.key)] = doc;
  }

  const document: GraphDocument = { endpoints, edges: [...graph.edges] };
  if (Object.keys(graph.info).length > 0) document.info = { ...graph.info };
  return document;
}

/**
 * Build a graph from a validated document. Throws the first validation issue.
 */
export function documentToGraph(data: unknown): KnowledgeGraph {
  const result = graphDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new TypeError(`Invalid graph document: ${issues.join('; ')}`);
  }

  const document = result.data;
  const endpoints: EndpointDescriptor[] = [];

  for (const [display, doc] of Object.entries(document.endpoints)) {
    const key = parseKey(display);
    if (!key) throw new TypeError(`Invalid graph document: invalid endpoint key "${display}"`);
    const descriptor: EndpointDescriptor = {
      key,
      parameters: doc.parameters,
      responses: doc.responses,
    };
    if (doc.requestBody) descriptor.requestBody = doc.requestBody;
    if (doc.summary !== undefined) descriptor.summary = doc.summary;
    endpoints.push(descriptor);
  }

  return new KnowledgeGraph(endpoints, document.edges, document.info ?? {});
}

export function serializeGraph(graph: KnowledgeGraph): string {
  return JSON.stringify(graphToDocument(graph), null, 2);
}

export function deserializeGraph(json: string): KnowledgeGraph {
  return documentToGraph(JSON.parse(json));
}
