/**
 * Canonical type definitions for api-surface-graph.
 * These types represent the internal model shared by ingestion, the graph
 * store, the diff engine and the analyzers.
 */

// ─── Schema Nodes ───────────────────────────────────────────────────────────

export type ScalarType = 'string' | 'number' | 'boolean' | 'null';

export type ScalarValue = string | number | boolean | null;

export type UnknownReason = 'untyped' | 'depth-limit' | 'union' | 'absent';

export interface ScalarNode {
  kind: 'scalar';
  type: ScalarType;

  /** Allowed literal values, when the declaration restricts them */
  enum?: ScalarValue[];

  /** Format hint (e.g. 'date-time', 'uuid'); metadata only */
  format?: string;

  nullable?: boolean;
}

export interface ArrayNode {
  kind: 'array';
  items: SchemaNode;
  nullable?: boolean;
}

export interface ObjectNode {
  kind: 'object';
  properties: Record<string, SchemaNode>;

  /** Names of required properties, sorted */
  required: string[];

  nullable?: boolean;
}

export interface UnknownNode {
  kind: 'unknown';

  /** Why the node could not be typed */
  reason?: UnknownReason;

  /** Reference id substituted when a definition was truncated */
  ref?: string;

  /** Conflicting shapes seen across samples, one per kind or scalar type */
  variants?: SchemaNode[];
}

export type SchemaNode = ScalarNode | ArrayNode | ObjectNode | UnknownNode;

export type SchemaKind = SchemaNode['kind'];

// ─── Endpoints ──────────────────────────────────────────────────────────────

export type HttpMethod =
  | 'GET'
  | 'PUT'
  | 'POST'
  | 'DELETE'
  | 'OPTIONS'
  | 'HEAD'
  | 'PATCH'
  | 'TRACE';

export interface EndpointKey {
  /** Upper-cased HTTP method */
  method: string;

  /** Path template with `{param}` placeholders */
  path: string;
}

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie' | 'body';

export interface ParameterDescriptor {
  name: string;
  location: ParameterLocation;
  schema: SchemaNode;
  required: boolean;
  description?: string;
}

export interface EndpointDescriptor {
  key: EndpointKey;
  parameters: ParameterDescriptor[];
  requestBody?: SchemaNode;

  /** Status code ('200', '2XX', 'default') → response body schema */
  responses: Record<string, SchemaNode>;

  summary?: string;
}

// ─── Knowledge Graph ────────────────────────────────────────────────────────

export type ResourceEdgeType = 'provides_identifier' | 'requires_resource';

export type MatchRule = 'exact' | 'plural' | 'case-fold' | 'resource-qualified';

export type Confidence = 'high' | 'medium' | 'low';

export interface ResourceEdge {
  /** Display key of the source endpoint (e.g. 'POST /users') */
  from: string;
  to: string;

  /** Identifier name carried along the edge */
  resource: string;
  type: ResourceEdgeType;
  rule?: MatchRule;
  confidence?: Confidence;
}

export type SpecFormat = 'openapi3' | 'swagger2' | 'postman2' | 'observations';

export interface GraphInfo {
  title?: string;
  version?: string;
  format?: SpecFormat;
}

// ─── Changes ────────────────────────────────────────────────────────────────

export type ChangeKind = 'added' | 'removed' | 'modified';

/** Ordered breaking > minor > patch > info */
export type Severity = 'breaking' | 'minor' | 'patch' | 'info';

export type ChangeType =
  | 'endpoint_added'
  | 'endpoint_removed'
  | 'parameter_added_required'
  | 'parameter_added_optional'
  | 'parameter_removed'
  | 'parameter_became_required'
  | 'parameter_became_optional'
  | 'parameter_location_changed'
  | 'parameter_renamed'
  | 'request_body_added'
  | 'request_body_removed'
  | 'response_added'
  | 'response_removed'
  | 'response_undeclared'
  | 'status_mismatch'
  | 'type_changed'
  | 'field_added'
  | 'field_removed'
  | 'field_became_required'
  | 'field_became_optional'
  | 'enum_narrowed'
  | 'enum_widened'
  | 'nullable_added'
  | 'nullable_removed'
  | 'format_changed'
  | 'summary_changed'
  | 'not_comparable';

export interface ChangeRecord {
  kind: ChangeKind;

  /** What changed; the severity is derived from it */
  type: ChangeType;

  /** Display key of the endpoint (e.g. 'GET /users/{id}') */
  endpoint: string;

  /** Field path inside the endpoint (e.g. 'responses.200.total') */
  path?: string;

  description: string;
  severity: Severity;

  /** Previous value/state (for context) */
  before?: string;

  /** New value/state (for context) */
  after?: string;
}

export interface ChangeCounts {
  added: number;
  removed: number;
  modified: number;
  breaking: number;
  minor: number;
  patch: number;
  info: number;
  total: number;
}

export interface EndpointSeverity {
  endpoint: string;
  kind: ChangeKind;

  /** Highest severity among the endpoint's records */
  severity: Severity;
  changes: number;
}

// ─── Live Observations ──────────────────────────────────────────────────────

export interface LiveObservation {
  method: string;

  /** Concrete request path (e.g. '/users/42'), query string allowed */
  path: string;

  /** Path template, when the collector already knows it */
  template?: string;

  /** Actual status code; null when the call failed at transport level */
  status: number | null;

  /** Status the caller expected, if declared */
  expectedStatus?: number;

  /** Parsed response body, or the raw text */
  body?: unknown;

  /** Transport error message */
  error?: string;
}

// ─── Report Format ──────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'json' | 'markdown';
