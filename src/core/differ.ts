/**
 * Structural Diff Engine
 *
 * Compares two endpoint sets (or two schemas) and produces an ordered list of
 * ChangeRecords. Severity is always looked up from the change type, and the
 * output order is fixed: removed endpoints, modified endpoints, added
 * endpoints, each group by key, records within an endpoint by field path.
 */

import {
  ChangeCounts,
  ChangeKind,
  ChangeRecord,
  ChangeType,
  EndpointDescriptor,
  EndpointSeverity,
  ParameterDescriptor,
  ScalarNode,
  ScalarValue,
  SchemaNode,
  Severity,
} from './types';
import { compareStrings, endpointIdentity, formatKey, pathPlaceholders } from './endpoint-key';
import { describeSchema } from './normalizer';
import type { KnowledgeGraph } from '../graph/knowledge-graph';

// ─── Severity Mapping ───────────────────────────────────────────────────────

const SEVERITY_MAP: Record<ChangeType, Severity> = {
  endpoint_added: 'minor',
  endpoint_removed: 'breaking',
  parameter_added_required: 'breaking',
  parameter_added_optional: 'minor',
  parameter_removed: 'breaking',
  parameter_became_required: 'breaking',
  parameter_became_optional: 'minor',
  parameter_location_changed: 'breaking',
  parameter_renamed: 'patch',
  request_body_added: 'minor',
  request_body_removed: 'breaking',
  response_added: 'minor',
  response_removed: 'breaking',
  response_undeclared: 'minor',
  status_mismatch: 'minor',
  type_changed: 'breaking',
  field_added: 'minor',
  field_removed: 'breaking',
  field_became_required: 'breaking',
  field_became_optional: 'minor',
  enum_narrowed: 'breaking',
  enum_widened: 'minor',
  nullable_added: 'breaking',
  nullable_removed: 'minor',
  format_changed: 'patch',
  summary_changed: 'patch',
  not_comparable: 'info',
};

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  patch: 1,
  minor: 2,
  breaking: 3,
};

export function severityOf(type: ChangeType): Severity {
  return SEVERITY_MAP[type];
}

export function maxSeverity(severities: Iterable<Severity>): Severity | null {
  let max: Severity | null = null;
  for (const s of severities) {
    if (max === null || SEVERITY_RANK[s] > SEVERITY_RANK[max]) max = s;
  }
  return max;
}

export function meetsSeverity(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}

// ─── Schema Diff ────────────────────────────────────────────────────────────

/**
 * 'revision' compares two declarations; 'observation' compares a declaration
 * (before) against a schema inferred from live samples (after), where absence
 * of data is not evidence of a change.
 */
export type DiffMode = 'revision' | 'observation';

export interface DiffOptions {
  mode?: DiffMode;
}

export interface SchemaChange {
  type: ChangeType;
  severity: Severity;
  path: string;
  description: string;
  before?: string;
  after?: string;
}

export function createChange(
  type: ChangeType,
  path: string,
  description: string,
  before?: string,
  after?: string
): SchemaChange {
  const result: SchemaChange = { type, severity: SEVERITY_MAP[type], path, description };
  if (before !== undefined) result.before = before;
  if (after !== undefined) result.after = after;
  return result;
}

function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function enumKey(value: ScalarValue): string {
  return JSON.stringify(value);
}

function formatEnum(values: ScalarValue[]): string {
  return values.map((v) => JSON.stringify(v)).join(', ');
}

function isNullScalar(node: SchemaNode): boolean {
  return node.kind === 'scalar' && node.type === 'null';
}

/**
 * Compare two schemas and return every structural change between them.
 *
 * @param before - The baseline (declared) schema
 * @param after  - The new or observed schema
 * @param path   - Field path of this node (used for recursion)
 */
export function diffSchemas(
  before: SchemaNode,
  after: SchemaNode,
  path: string = '',
  options: DiffOptions = {}
): SchemaChange[] {
  const mode = options.mode ?? 'revision';
  const where = path || '(root)';

  // Samples disagreed: every observed shape is checked against the declaration
  if (mode === 'observation' && before.kind !== 'unknown' && after.kind === 'unknown' && after.variants) {
    const seen = new Set<string>();
    return after.variants
      .flatMap((variant) => diffSchemas(before, variant, path, options))
      .filter((change) => {
        const id = `${change.type}|${change.path}|${change.description}`;
        if (seen.has(id)) return false;
        seen.add(id);
        return true;
      });
  }

  if (before.kind === 'unknown' || after.kind === 'unknown') {
    if (before.kind === 'unknown' && after.kind === 'unknown') return [];
    return [
      createChange(
        'not_comparable',
        where,
        `Cannot compare "${where}" (${describeSchema(before)} → ${describeSchema(after)})`,
        describeSchema(before),
        describeSchema(after)
      ),
    ];
  }

  if (mode === 'observation' && isNullScalar(after) && !isNullScalar(before)) {
    if (before.nullable) return [];
    return [
      createChange(
        'nullable_added',
        where,
        `"${where}" was null but is declared as non-null ${describeSchema(before)}`,
        describeSchema(before),
        'null'
      ),
    ];
  }

  const kindChanged = before.kind !== after.kind;
  const scalarChanged = before.kind === 'scalar' && after.kind === 'scalar' && before.type !== after.type;
  if (kindChanged || scalarChanged) {
    return [
      createChange(
        'type_changed',
        where,
        `Type changed at "${where}" (${describeSchema(before)} → ${describeSchema(after)})`,
        describeSchema(before),
        describeSchema(after)
      ),
    ];
  }

  const changes: SchemaChange[] = [];

  if (!before.nullable && after.nullable) {
    changes.push(createChange('nullable_added', where, `"${where}" became nullable`, 'non-null', 'nullable'));
  } else if (before.nullable && !after.nullable && mode === 'revision') {
    changes.push(createChange('nullable_removed', where, `"${where}" is no longer nullable`, 'nullable', 'non-null'));
  }

  if (before.kind === 'scalar' && after.kind === 'scalar') {
    if (mode === 'revision') changes.push(...diffScalars(before, after, where));
  } else if (before.kind === 'array' && after.kind === 'array') {
    changes.push(...diffSchemas(before.items, after.items, `${path}[]`, options));
  } else if (before.kind === 'object' && after.kind === 'object') {
    const beforeRequired = new Set(before.required);
    const afterRequired = new Set(after.required);

    for (const [key, schema] of Object.entries(before.properties)) {
      const fieldPath = childPath(path, key);
      const next = after.properties[key];

      if (next === undefined) {
        if (mode === 'revision') {
          changes.push(
            createChange(
              'field_removed',
              fieldPath,
              `Field removed: "${fieldPath}" (was: ${describeSchema(schema)})`,
              describeSchema(schema)
            )
          );
        } else if (beforeRequired.has(key)) {
          changes.push(
            createChange(
              'field_removed',
              fieldPath,
              `Required field "${fieldPath}" was not returned`,
              describeSchema(schema)
            )
          );
        }
        continue;
      }

      if (beforeRequired.has(key) && !afterRequired.has(key)) {
        changes.push(
          createChange(
            'field_became_optional',
            fieldPath,
            `Field "${fieldPath}" changed from required to optional`,
            'required',
            'optional'
          )
        );
      } else if (!beforeRequired.has(key) && afterRequired.has(key) && mode === 'revision') {
        changes.push(
          createChange(
            'field_became_required',
            fieldPath,
            `Field "${fieldPath}" changed from optional to required`,
            'optional',
            'required'
          )
        );
      }

      changes.push(...diffSchemas(schema, next, fieldPath, options));
    }

    for (const [key, schema] of Object.entries(after.properties)) {
      if (key in before.properties) continue;
      const fieldPath = childPath(path, key);
      changes.push(
        createChange(
          'field_added',
          fieldPath,
          `Field added: "${fieldPath}" (${describeSchema(schema)})`,
          undefined,
          describeSchema(schema)
        )
      );
    }
  }

  return changes;
}

function diffScalars(before: ScalarNode, after: ScalarNode, where: string): SchemaChange[] {
  const changes: SchemaChange[] = [];

  if ((before.format ?? '') !== (after.format ?? '')) {
    changes.push(
      createChange(
        'format_changed',
        where,
        `Format changed at "${where}" (${before.format ?? 'none'} → ${after.format ?? 'none'})`,
        before.format ?? 'none',
        after.format ?? 'none'
      )
    );
  }

  if (!before.enum && after.enum) {
    changes.push(
      createChange(
        'enum_narrowed',
        where,
        `"${where}" is now restricted to ${formatEnum(after.enum)}`,
        'any',
        formatEnum(after.enum)
      )
    );
  } else if (before.enum && !after.enum) {
    changes.push(
      createChange(
        'enum_widened',
        where,
        `"${where}" is no longer restricted to ${formatEnum(before.enum)}`,
        formatEnum(before.enum),
        'any'
      )
    );
  } else if (before.enum && after.enum) {
    const afterKeys = new Set(after.enum.map(enumKey));
    const beforeKeys = new Set(before.enum.map(enumKey));
    const dropped = before.enum.filter((v) => !afterKeys.has(enumKey(v)));
    const added = after.enum.filter((v) => !beforeKeys.has(enumKey(v)));

    if (dropped.length > 0) {
      changes.push(
        createChange(
          'enum_narrowed',
          where,
          `"${where}" no longer allows ${formatEnum(dropped)}`,
          formatEnum(before.enum),
          formatEnum(after.enum)
        )
      );
    } else if (added.length > 0) {
      changes.push(
        createChange(
          'enum_widened',
          where,
          `"${where}" now also allows ${formatEnum(added)}`,
          formatEnum(before.enum),
          formatEnum(after.enum)
        )
      );
    }
  }

  return changes;
}

// ─── Endpoint Diff ──────────────────────────────────────────────────────────

export function toChangeRecord(kind: ChangeKind, endpoint: string, c: SchemaChange): ChangeRecord {
  const result: ChangeRecord = {
    kind,
    type: c.type,
    endpoint,
    path: c.path,
    description: c.description,
    severity: c.severity,
  };
  if (c.before !== undefined) result.before = c.before;
  if (c.after !== undefined) result.after = c.after;
  return result;
}

export function compareRecords(a: ChangeRecord, b: ChangeRecord): number {
  return compareStrings(a.path ?? '', b.path ?? '') || compareStrings(a.description, b.description);
}

/**
 * Path placeholders renamed between two revisions of the same endpoint
 * (matched by position), old name → new name.
 */
function placeholderRenames(before: EndpointDescriptor, after: EndpointDescriptor): Map<string, string> {
  const renames = new Map<string, string>();
  const oldNames = pathPlaceholders(before.key.path);
  const newNames = pathPlaceholders(after.key.path);
  oldNames.forEach((name, i) => {
    if (newNames[i] !== undefined && newNames[i] !== name) renames.set(name, newNames[i]);
  });
  return renames;
}

function diffParameters(before: EndpointDescriptor, after: EndpointDescriptor): SchemaChange[] {
  const changes: SchemaChange[] = [];
  const renames = placeholderRenames(before, after);

  for (const [from, to] of renames) {
    changes.push(
      createChange('parameter_renamed', `parameters.${to}`, `Path parameter renamed: "{${from}}" → "{${to}}"`, from, to)
    );
  }

  const oldParams = new Map<string, ParameterDescriptor>();
  for (const param of before.parameters) {
    const renamed = param.location === 'path' ? renames.get(param.name) : undefined;
    oldParams.set(renamed ?? param.name, param);
  }
  const newParams = new Map(after.parameters.map((p) => [p.name, p] as const));

  for (const [name, param] of oldParams) {
    const path = `parameters.${name}`;
    const next = newParams.get(name);

    if (!next) {
      changes.push(
        createChange(
          'parameter_removed',
          path,
          `Parameter removed: "${name}" (${param.location})`,
          param.location
        )
      );
      continue;
    }

    if (param.location !== next.location) {
      changes.push(
        createChange(
          'parameter_location_changed',
          path,
          `Parameter "${name}" moved from ${param.location} to ${next.location}`,
          param.location,
          next.location
        )
      );
    }

    if (!param.required && next.required) {
      changes.push(
        createChange(
          'parameter_became_required',
          path,
          `Parameter "${name}" changed from optional to required`,
          'optional',
          'required'
        )
      );
    } else if (param.required && !next.required) {
      changes.push(
        createChange(
          'parameter_became_optional',
          path,
          `Parameter "${name}" changed from required to optional`,
          'required',
          'optional'
        )
      );
    }

    changes.push(...diffSchemas(param.schema, next.schema, path));
  }

  for (const [name, param] of newParams) {
    if (oldParams.has(name)) continue;
    const path = `parameters.${name}`;
    if (param.required) {
      changes.push(
        createChange(
          'parameter_added_required',
          path,
          `Required parameter added: "${name}" (${param.location})`,
          undefined,
          param.location
        )
      );
    } else {
      changes.push(
        createChange(
          'parameter_added_optional',
          path,
          `Optional parameter added: "${name}" (${param.location})`,
          undefined,
          param.location
        )
      );
    }
  }

  return changes;
}

function diffResponses(
  before: Record<string, SchemaNode>,
  after: Record<string, SchemaNode>
): SchemaChange[] {
  const changes: SchemaChange[] = [];

  for (const [status, schema] of Object.entries(before)) {
    const path = `responses.${status}`;
    const next = after[status];
    if (next === undefined) {
      changes.push(createChange('response_removed', path, `Response ${status} removed`, describeSchema(schema)));
    } else {
      changes.push(...diffSchemas(schema, next, path));
    }
  }

  for (const [status, schema] of Object.entries(after)) {
    if (status in before) continue;
    changes.push(
      createChange(
        'response_added',
        `responses.${status}`,
        `Response ${status} added`,
        undefined,
        describeSchema(schema)
      )
    );
  }

  return changes;
}

/**
 * Compare two descriptors of the same endpoint.
 */
export function diffEndpoints(before: EndpointDescriptor, after: EndpointDescriptor): ChangeRecord[] {
  const changes: SchemaChange[] = [...diffParameters(before, after)];

  if (before.requestBody && after.requestBody) {
    changes.push(...diffSchemas(before.requestBody, after.requestBody, 'requestBody'));
  } else if (before.requestBody) {
    changes.push(
      createChange(
        'request_body_removed',
        'requestBody',
        'Request body removed',
        describeSchema(before.requestBody)
      )
    );
  } else if (after.requestBody) {
    changes.push(
      createChange(
        'request_body_added',
        'requestBody',
        'Request body added',
        undefined,
        describeSchema(after.requestBody)
      )
    );
  }

  changes.push(...diffResponses(before.responses, after.responses));

  if ((before.summary ?? '') !== (after.summary ?? '')) {
    changes.push(createChange('summary_changed', 'summary', 'Summary changed', before.summary ?? '', after.summary ?? ''));
  }

  const endpoint = formatKey(after.key);
  return changes.map((c) => toChangeRecord('modified', endpoint, c)).sort(compareRecords);
}

/**
 * Compare two endpoint sets.
 *
 * @param before - The previous/baseline endpoints
 * @param after  - The current/new endpoints
 */
export function diffEndpointSets(
  before: Iterable<EndpointDescriptor>,
  after: Iterable<EndpointDescriptor>
): ChangeRecord[] {
  const oldByIdentity = new Map<string, EndpointDescriptor>();
  for (const e of before) oldByIdentity.set(endpointIdentity(e.key), e);
  const newByIdentity = new Map<string, EndpointDescriptor>();
  for (const e of after) newByIdentity.set(endpointIdentity(e.key), e);

  const removed: ChangeRecord[] = [];
  const modified: Array<{ endpoint: string; records: ChangeRecord[] }> = [];
  const added: ChangeRecord[] = [];

  for (const [identity, descriptor] of oldByIdentity) {
    const next = newByIdentity.get(identity);
    if (!next) {
      removed.push({
        kind: 'removed',
        type: 'endpoint_removed',
        endpoint: formatKey(descriptor.key),
        description: `Endpoint removed: ${formatKey(descriptor.key)}`,
        severity: SEVERITY_MAP.endpoint_removed,
      });
      continue;
    }
    const records = diffEndpoints(descriptor, next);
    if (records.length > 0) modified.push({ endpoint: formatKey(next.key), records });
  }

  for (const [identity, descriptor] of newByIdentity) {
    if (oldByIdentity.has(identity)) continue;
    added.push({
      kind: 'added',
      type: 'endpoint_added',
      endpoint: formatKey(descriptor.key),
      description: `Endpoint added: ${formatKey(descriptor.key)}`,
      severity: SEVERITY_MAP.endpoint_added,
    });
  }

  const byEndpoint = (a: { endpoint: string }, b: { endpoint: string }) => compareStrings(a.endpoint, b.endpoint);

  return [
    ...removed.sort(byEndpoint),
    ...modified.sort(byEndpoint).flatMap((m) => m.records),
    ...added.sort(byEndpoint),
  ];
}

/**
 * Compare two knowledge graphs.
 */
export function diffGraphs(before: KnowledgeGraph, after: KnowledgeGraph): ChangeRecord[] {
  return diffEndpointSets(before.endpoints(), after.endpoints());
}

// ─── Summaries ──────────────────────────────────────────────────────────────

export function countChanges(records: ChangeRecord[]): ChangeCounts {
  const counts: ChangeCounts = {
    added: 0,
    removed: 0,
    modified: 0,
    breaking: 0,
    minor: 0,
    patch: 0,
    info: 0,
    total: records.length,
  };
  const modifiedEndpoints = new Set<string>();

  for (const r of records) {
    counts[r.severity]++;
    if (r.kind === 'added') counts.added++;
    else if (r.kind === 'removed') counts.removed++;
    else modifiedEndpoints.add(r.endpoint);
  }

  counts.modified = modifiedEndpoints.size;
  return counts;
}

/**
 * Per-endpoint maximum severity, in record order.
 */
export function endpointSeverities(records: ChangeRecord[]): EndpointSeverity[] {
  const result: EndpointSeverity[] = [];
  const index = new Map<string, EndpointSeverity>();

  for (const r of records) {
    const existing = index.get(r.endpoint);
    if (existing) {
      existing.changes++;
      if (SEVERITY_RANK[r.severity] > SEVERITY_RANK[existing.severity]) existing.severity = r.severity;
      continue;
    }
    const entry: EndpointSeverity = { endpoint: r.endpoint, kind: r.kind, severity: r.severity, changes: 1 };
    index.set(r.endpoint, entry);
    result.push(entry);
  }

  return result;
}
