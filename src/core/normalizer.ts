/**
 * Schema Normalizer
 *
 * Converts declared types (OpenAPI/Swagger/JSON Schema fragments) and sampled
 * JSON values into canonical SchemaNode trees. Also merges schemas inferred
 * from several samples of the same response (multi-sample learning).
 */

import { ErrorCode, ParseError } from './errors';
import {
  ArrayNode,
  ObjectNode,
  ScalarNode,
  ScalarType,
  ScalarValue,
  SchemaNode,
  UnknownNode,
  UnknownReason,
} from './types';
import { escapePointer, getArray, getString, isRecord, unescapePointer } from '../utils/object';

export const DEFAULT_MAX_DEPTH = 10;

// ─── Node Constructors ──────────────────────────────────────────────────────

export function unknownNode(reason?: UnknownReason, ref?: string): UnknownNode {
  const node: UnknownNode = { kind: 'unknown' };
  if (reason) node.reason = reason;
  if (ref) node.ref = ref;
  return node;
}

export function scalarNode(type: ScalarType, extra: Omit<ScalarNode, 'kind' | 'type'> = {}): ScalarNode {
  const node: ScalarNode = { kind: 'scalar', type };
  if (extra.enum && extra.enum.length > 0) node.enum = extra.enum;
  if (extra.format) node.format = extra.format;
  if (extra.nullable) node.nullable = true;
  return node;
}

export function arrayNode(items: SchemaNode, nullable?: boolean): ArrayNode {
  const node: ArrayNode = { kind: 'array', items };
  if (nullable) node.nullable = true;
  return node;
}

export function objectNode(
  properties: Record<string, SchemaNode>,
  required: Iterable<string>,
  nullable?: boolean
): ObjectNode {
  const names = new Set(Object.keys(properties));
  const node: ObjectNode = {
    kind: 'object',
    properties,
    required: Array.from(new Set(required))
      .filter((name) => names.has(name))
      .sort(),
  };
  if (nullable) node.nullable = true;
  return node;
}

function withNullable(node: SchemaNode): SchemaNode {
  if (node.kind === 'unknown' || node.nullable) return node;
  return { ...node, nullable: true };
}

function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function scalarTypeOf(value: ScalarValue): ScalarType {
  if (value === null) return 'null';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  return 'boolean';
}

// ─── Declared Schemas ───────────────────────────────────────────────────────

export interface NormalizeOptions {
  /** Whole document, used to resolve local `$ref` pointers */
  document?: unknown;

  /** Nesting bound beyond which definitions collapse to `unknown` */
  maxDepth?: number;

  /** Collects truncation notices; ingestion reports them */
  warnings?: string[];
}

interface WalkContext {
  document: unknown;
  maxDepth: number;
  warnings: string[];
}

/**
 * Normalize a declared schema into a SchemaNode.
 *
 * @param raw     - The schema object as found in the document
 * @param pointer - JSON pointer of `raw`, used in error messages
 */
export function normalizeSchema(
  raw: unknown,
  options: NormalizeOptions = {},
  pointer: string = '#'
): SchemaNode {
  const context: WalkContext = {
    document: options.document,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    warnings: options.warnings ?? [],
  };
  return walk(raw, 0, pointer, context, new Set());
}

/**
 * Resolve a local reference ('#/components/schemas/User').
 */
export function resolveRef(document: unknown, ref: string, pointer: string): unknown {
  if (!ref.startsWith('#')) {
    throw new ParseError(`External reference "${ref}" is not supported`, ErrorCode.PARSE_UNRESOLVED_REF, {
      path: pointer,
      ref,
    });
  }

  let current: unknown = document;
  const segments = ref.slice(1).split('/').filter((s) => s.length > 0).map(unescapePointer);

  for (const segment of segments) {
    if (isRecord(current) && segment in current) {
      current = current[segment];
    } else if (Array.isArray(current) && /^\d+$/.test(segment) && Number(segment) < current.length) {
      current = current[Number(segment)];
    } else {
      throw new ParseError(`Unresolvable reference "${ref}"`, ErrorCode.PARSE_UNRESOLVED_REF, {
        path: pointer,
        ref,
      });
    }
  }

  return current;
}

function truncate(context: WalkContext, pointer: string, ref?: string): UnknownNode {
  const notice = ref
    ? `Schema truncated at depth ${context.maxDepth}: "${ref}" is nested too deeply (${pointer})`
    : `Schema truncated at depth ${context.maxDepth} (${pointer})`;
  if (!context.warnings.includes(notice)) {
    context.warnings.push(notice);
  }
  return unknownNode('depth-limit', ref);
}

// A reference re-entered on its own expansion path is replaced by its id
function breakCycle(context: WalkContext, pointer: string, ref: string): UnknownNode {
  const notice = `Recursive reference "${ref}" replaced by its id (${pointer})`;
  if (!context.warnings.includes(notice)) {
    context.warnings.push(notice);
  }
  return unknownNode('depth-limit', ref);
}

/**
 * @param expanding - References being expanded on the path from the root
 */
function walk(
  raw: unknown,
  depth: number,
  pointer: string,
  context: WalkContext,
  expanding: ReadonlySet<string>
): SchemaNode {
  if (raw === true || raw === undefined) return unknownNode('untyped');
  if (!isRecord(raw)) {
    throw new ParseError('Schema must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, { path: pointer });
  }

  const ref = getString(raw, '$ref');
  if (ref !== undefined) {
    if (expanding.has(ref)) return breakCycle(context, pointer, ref);
    if (depth > context.maxDepth) return truncate(context, pointer, ref);
    const target = resolveRef(context.document, ref, pointer);
    return walk(target, depth, ref, context, new Set(expanding).add(ref));
  }

  if (depth > context.maxDepth) return truncate(context, pointer);

  const nullable = raw.nullable === true || raw['x-nullable'] === true;

  const allOf = getArray(raw, 'allOf');
  if (allOf && allOf.length > 0) {
    const branches = allOf.map((branch, i) => walk(branch, depth, `${pointer}/allOf/${i}`, context, expanding));
    const merged = combineAllOf(branches);
    return nullable ? withNullable(merged) : merged;
  }

  const alternatives = getArray(raw, 'oneOf') ?? getArray(raw, 'anyOf');
  if (alternatives && alternatives.length > 0) {
    const keyword = getArray(raw, 'oneOf') ? 'oneOf' : 'anyOf';
    const branches = alternatives.map((branch, i) =>
      walk(branch, depth, `${pointer}/${keyword}/${i}`, context, expanding)
    );
    const nonNull = branches.filter((b) => !(b.kind === 'scalar' && b.type === 'null'));
    const hasNull = nonNull.length !== branches.length;
    if (nonNull.length === 1) {
      return nullable || hasNull ? withNullable(nonNull[0]) : nonNull[0];
    }
    return unknownNode('union');
  }

  let type: string | undefined;
  let typeNullable = false;
  if (Array.isArray(raw.type)) {
    const names = raw.type.filter((t): t is string => typeof t === 'string');
    const nonNull = names.filter((t) => t !== 'null');
    typeNullable = nonNull.length !== names.length;
    if (nonNull.length > 1) return unknownNode('union');
    type = nonNull[0] ?? (typeNullable ? 'null' : undefined);
  } else if (typeof raw.type === 'string') {
    type = raw.type;
  }

  const enumValues = declaredEnum(raw);
  if (type === undefined) {
    if (isRecord(raw.properties) || isRecord(raw.additionalProperties)) type = 'object';
    else if (raw.items !== undefined) type = 'array';
    else if (enumValues && enumValues.length > 0) type = scalarTypeOf(enumValues[0]);
    else return unknownNode('untyped');
  }

  const isNullable = nullable || typeNullable;

  switch (type) {
    case 'object': {
      const properties: Record<string, SchemaNode> = {};
      const declared = isRecord(raw.properties) ? raw.properties : {};
      for (const [name, child] of Object.entries(declared)) {
        properties[name] = walk(
          child,
          depth + 1,
          `${pointer}/properties/${escapePointer(name)}`,
          context,
          expanding
        );
      }
      const required = (getArray(raw, 'required') ?? []).filter((r): r is string => typeof r === 'string');
      return objectNode(properties, required, isNullable);
    }

    case 'array': {
      const items =
        raw.items === undefined
          ? unknownNode('untyped')
          : walk(raw.items, depth + 1, `${pointer}/items`, context, expanding);
      return arrayNode(items, isNullable);
    }

    case 'string':
    case 'number':
    case 'integer':
    case 'boolean':
    case 'null':
      return scalarNode(type === 'integer' ? 'number' : type, {
        enum: enumValues,
        format: getString(raw, 'format'),
        nullable: isNullable,
      });

    default:
      throw new ParseError(`Unknown schema type "${type}"`, ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: pointer,
      });
  }
}

function declaredEnum(raw: Record<string, unknown>): ScalarValue[] | undefined {
  if ('const' in raw && isScalarValue(raw.const)) return [raw.const];
  const values = getArray(raw, 'enum');
  if (!values) return undefined;
  return values.filter(isScalarValue);
}

function combineAllOf(branches: SchemaNode[]): SchemaNode {
  const typed = branches.filter((b) => b.kind !== 'unknown');
  if (typed.length === 0) return branches[0] ?? unknownNode('untyped');
  if (typed.length === 1) return typed[0];

  if (typed.every((b): b is ObjectNode => b.kind === 'object')) {
    const properties: Record<string, SchemaNode> = {};
    const required = new Set<string>();
    for (const branch of typed) {
      Object.assign(properties, branch.properties);
      branch.required.forEach((r) => required.add(r));
    }
    return objectNode(properties, required, typed.every((b) => b.nullable));
  }

  return unknownNode('union');
}

// ─── Sampled Values ─────────────────────────────────────────────────────────

/**
 * Infer the narrowest SchemaNode consistent with a sampled JSON value.
 * Integral numbers stay 'number' so representation alone never reads as drift.
 */
export function inferSchema(value: unknown, maxDepth: number = DEFAULT_MAX_DEPTH, depth: number = 0): SchemaNode {
  if (value === undefined) return unknownNode('untyped');
  if (depth > maxDepth) return unknownNode('depth-limit');
  if (isScalarValue(value)) return scalarNode(scalarTypeOf(value));

  if (Array.isArray(value)) {
    if (value.length === 0) return arrayNode(unknownNode('absent'));
    const items = value
      .map((item) => inferSchema(item, maxDepth, depth + 1))
      .reduce((merged, schema) => mergeSchemas(merged, schema));
    return arrayNode(items);
  }

  if (isRecord(value)) {
    const properties: Record<string, SchemaNode> = {};
    for (const [key, child] of Object.entries(value)) {
      properties[key] = inferSchema(child, maxDepth, depth + 1);
    }
    // On a single sample, every present key is "required"
    return objectNode(properties, Object.keys(value));
  }

  return unknownNode('untyped');
}

/**
 * Merge two schemas learned from different samples of the same response.
 * Keys missing from either side become optional; null samples make the
 * other side nullable; conflicting kinds become a union that keeps one
 * variant per kind (per type for scalars).
 */
export function mergeSchemas(a: SchemaNode, b: SchemaNode): SchemaNode {
  if (a.kind === 'unknown' && a.variants) return unionOf([...a.variants, b]);
  if (b.kind === 'unknown' && b.variants) return unionOf([a, ...b.variants]);

  if (a.kind === 'unknown') return b.kind === 'unknown' ? a : b;
  if (b.kind === 'unknown') return a;

  const aNull = a.kind === 'scalar' && a.type === 'null';
  const bNull = b.kind === 'scalar' && b.type === 'null';
  if (aNull && bNull) return a;
  if (aNull) return withNullable(b);
  if (bNull) return withNullable(a);

  const nullable = Boolean(a.nullable || b.nullable);

  if (a.kind === 'scalar' && b.kind === 'scalar') {
    if (a.type !== b.type) return unionOf([a, b]);
    const enumValues =
      a.enum && b.enum ? Array.from(new Set([...a.enum, ...b.enum])) : undefined;
    return scalarNode(a.type, {
      enum: enumValues,
      format: a.format === b.format ? a.format : undefined,
      nullable,
    });
  }

  if (a.kind === 'array' && b.kind === 'array') {
    return arrayNode(mergeSchemas(a.items, b.items), nullable);
  }

  if (a.kind === 'object' && b.kind === 'object') {
    const properties: Record<string, SchemaNode> = {};
    const keys = new Set([...Object.keys(a.properties), ...Object.keys(b.properties)]);
    const aRequired = new Set(a.required);
    const bRequired = new Set(b.required);
    const required: string[] = [];

    for (const key of keys) {
      const left = a.properties[key];
      const right = b.properties[key];
      if (left && right) {
        properties[key] = mergeSchemas(left, right);
        // Required only if required in both
        if (aRequired.has(key) && bRequired.has(key)) required.push(key);
      } else {
        properties[key] = left ?? right;
      }
    }

    return objectNode(properties, required, nullable);
  }

  return unionOf([a, b]);
}

function shapeOf(node: SchemaNode): string {
  return node.kind === 'scalar' ? node.type : node.kind;
}

/**
 * Union of sampled shapes. Shapes of the same kind merge; a null sample makes
 * every other variant nullable. Variants are ordered by shape name.
 */
function unionOf(nodes: SchemaNode[]): SchemaNode {
  const byShape = new Map<string, SchemaNode>();
  let sawNull = false;

  for (const node of nodes) {
    if (node.kind === 'unknown') continue;
    if (node.kind === 'scalar' && node.type === 'null') {
      sawNull = true;
      continue;
    }
    const shape = shapeOf(node);
    const existing = byShape.get(shape);
    byShape.set(shape, existing ? mergeSchemas(existing, node) : node);
  }

  const variants = Array.from(byShape.entries())
    .sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0))
    .map(([, node]) => (sawNull ? withNullable(node) : node));

  if (variants.length === 0) return sawNull ? scalarNode('null') : unknownNode('union');
  if (variants.length === 1) return variants[0];
  return { kind: 'unknown', reason: 'union', variants };
}

// ─── Labels ─────────────────────────────────────────────────────────────────

/**
 * Short label for descriptions: 'string', 'array<number>', 'object'.
 */
export function describeSchema(node: SchemaNode): string {
  let label: string;
  switch (node.kind) {
    case 'scalar':
      label = node.type;
      if (node.format) label += `<${node.format}>`;
      if (node.enum) label += '(enum)';
      break;
    case 'array':
      label = `array<${describeSchema(node.items)}>`;
      break;
    case 'object':
      label = 'object';
      break;
    default:
      return 'unknown';
  }
  return node.nullable ? `${label}|null` : label;
}

/**
 * Pretty-print a schema for debugging and the CLI.
 */
export function schemaToString(schema: SchemaNode, indent: number = 0): string {
  const pad = '  '.repeat(indent);

  if (schema.kind === 'object') {
    const req = new Set(schema.required);
    const lines = [`${pad}object${schema.nullable ? ' (nullable)' : ''} {`];
    for (const [key, value] of Object.entries(schema.properties)) {
      const optMark = req.has(key) ? '' : '?';
      lines.push(`${pad}  "${key}"${optMark}: ${schemaToString(value, indent + 1).trimStart()}`);
    }
    lines.push(`${pad}}`);
    return lines.join('\n');
  }

  if (schema.kind === 'array') {
    return `${pad}array${schema.nullable ? ' (nullable)' : ''}[${schemaToString(schema.items, indent).trimStart()}]`;
  }

  if (schema.kind === 'unknown') {
    return `${pad}unknown${schema.reason ? ` (${schema.reason}${schema.ref ? `: ${schema.ref}` : ''})` : ''}`;
  }

  let result = `${pad}${schema.type}`;
  if (schema.format) result += `<${schema.format}>`;
  if (schema.enum) result += ` enum(${schema.enum.map((v) => JSON.stringify(v)).join(', ')})`;
  if (schema.nullable) result += ' (nullable)';
  return result;
}
