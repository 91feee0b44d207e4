/**
 * OpenAPI 3.x and Swagger 2.0 ingestion.
 *
 * One descriptor per (method, path template). Path-level parameters are
 * inherited by every operation unless the operation redeclares the name.
 */

import { createKey } from '../core/endpoint-key';
import { ErrorCode, ParseError } from '../core/errors';
import { NormalizeOptions, normalizeSchema, resolveRef, scalarNode, unknownNode } from '../core/normalizer';
import {
  EndpointDescriptor,
  ParameterDescriptor,
  ParameterLocation,
  SchemaNode,
  SpecFormat,
} from '../core/types';
import { GraphBuilder } from '../graph/knowledge-graph';
import { escapePointer, getRecord, getString, isRecord } from '../utils/object';
import { IngestionResult, IngestOptions } from './types';

export const OPERATION_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

type OpenApiFlavor = Extract<SpecFormat, 'openapi3' | 'swagger2'>;

interface ParseContext {
  document: Record<string, unknown>;
  flavor: OpenApiFlavor;
  normalize: NormalizeOptions;
}

interface ParsedParameters {
  parameters: ParameterDescriptor[];

  /** Swagger 2 `in: body` parameter */
  body?: SchemaNode;
}

// ─── Entry Point ────────────────────────────────────────────────────────────

export function parseOpenApi(
  document: Record<string, unknown>,
  flavor: OpenApiFlavor,
  specVersion: string,
  options: IngestOptions = {}
): IngestionResult {
  const warnings: string[] = [];
  const context: ParseContext = {
    document,
    flavor,
    normalize: { document, maxDepth: options.maxDepth, warnings },
  };

  const paths = document.paths ?? {};
  if (!isRecord(paths)) {
    throw new ParseError('"paths" must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, { path: '#/paths' });
  }

  const builder = new GraphBuilder();

  for (const [template, rawItem] of Object.entries(paths)) {
    const itemPointer = `#/paths/${escapePointer(template)}`;
    const item = deref(context, rawItem, itemPointer);
    if (!isRecord(item)) {
      throw new ParseError(`Path item "${template}" must be an object`, ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: itemPointer,
      });
    }

    const shared = parseParameterList(context, item.parameters, `${itemPointer}/parameters`);

    for (const method of OPERATION_METHODS) {
      const operation = item[method];
      if (operation === undefined) continue;

      const opPointer = `${itemPointer}/${method}`;
      if (!isRecord(operation)) {
        throw new ParseError(
          `Operation ${method.toUpperCase()} ${template} must be an object`,
          ErrorCode.PARSE_INVALID_STRUCTURE,
          { path: opPointer }
        );
      }

      builder.add(parseOperation(context, method, template, operation, shared, opPointer), opPointer);
    }
  }

  const info = getRecord(document, 'info') ?? {};
  const graph = builder.build({
    title: getString(info, 'title'),
    version: getString(info, 'version'),
    format: flavor,
  });

  return { graph, format: flavor, specVersion, warnings };
}

// ─── Operations ─────────────────────────────────────────────────────────────

function parseOperation(
  context: ParseContext,
  method: string,
  template: string,
  operation: Record<string, unknown>,
  shared: ParsedParameters,
  pointer: string
): EndpointDescriptor {
  const own = parseParameterList(context, operation.parameters, `${pointer}/parameters`);

  // Operation-level declarations replace path-level ones of the same name
  const byName = new Map<string, ParameterDescriptor>();
  for (const param of shared.parameters) byName.set(param.name, param);
  for (const param of own.parameters) byName.set(param.name, param);

  const descriptor: EndpointDescriptor = {
    key: createKey(method, template),
    parameters: Array.from(byName.values()),
    responses: parseResponses(context, operation.responses, `${pointer}/responses`),
  };

  const requestBody =
    context.flavor === 'openapi3'
      ? parseRequestBody(context, operation.requestBody, `${pointer}/requestBody`)
      : own.body ?? shared.body;
  if (requestBody) descriptor.requestBody = requestBody;

  const summary = getString(operation, 'summary');
  if (summary !== undefined) descriptor.summary = summary;

  return descriptor;
}

function parseRequestBody(context: ParseContext, raw: unknown, pointer: string): SchemaNode | undefined {
  if (raw === undefined) return undefined;
  const body = deref(context, raw, pointer);
  if (!isRecord(body)) {
    throw new ParseError('Request body must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, { path: pointer });
  }
  return contentSchema(context, body, pointer) ?? unknownNode('absent');
}

function parseResponses(context: ParseContext, raw: unknown, pointer: string): Record<string, SchemaNode> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new ParseError('"responses" must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, { path: pointer });
  }

  const responses: Record<string, SchemaNode> = {};
  for (const [status, rawResponse] of Object.entries(raw)) {
    const responsePointer = `${pointer}/${escapePointer(status)}`;
    const response = deref(context, rawResponse, responsePointer);
    if (!isRecord(response)) {
      throw new ParseError(`Response "${status}" must be an object`, ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: responsePointer,
      });
    }

    let schema: SchemaNode | undefined;
    if (context.flavor === 'openapi3') {
      schema = contentSchema(context, response, responsePointer);
    } else if (response.schema !== undefined) {
      schema = normalizeSchema(response.schema, context.normalize, `${responsePointer}/schema`);
    }
    responses[status] = schema ?? unknownNode('absent');
  }
  return responses;
}

/**
 * Schema of the first JSON-like media type in `content`, else of the first one.
 */
function contentSchema(
  context: ParseContext,
  holder: Record<string, unknown>,
  pointer: string
): SchemaNode | undefined {
  const content = getRecord(holder, 'content');
  if (!content) return undefined;

  const mediaTypes = Object.keys(content);
  const chosen = mediaTypes.find((m) => /json/i.test(m)) ?? mediaTypes[0];
  if (chosen === undefined) return undefined;

  const media = content[chosen];
  const mediaPointer = `${pointer}/content/${escapePointer(chosen)}`;
  if (!isRecord(media)) {
    throw new ParseError(`Media type "${chosen}" must be an object`, ErrorCode.PARSE_INVALID_STRUCTURE, {
      path: mediaPointer,
    });
  }
  if (media.schema === undefined) return unknownNode('untyped');
  return normalizeSchema(media.schema, context.normalize, `${mediaPointer}/schema`);
}

// ─── Parameters ─────────────────────────────────────────────────────────────

const LOCATIONS = new Map<string, ParameterLocation>([
  ['path', 'path'],
  ['query', 'query'],
  ['header', 'header'],
  ['cookie', 'cookie'],
  ['formData', 'body'],
]);

function parseParameterList(context: ParseContext, raw: unknown, pointer: string): ParsedParameters {
  const result: ParsedParameters = { parameters: [] };
  if (raw === undefined) return result;
  if (!Array.isArray(raw)) {
    throw new ParseError('"parameters" must be an array', ErrorCode.PARSE_INVALID_STRUCTURE, { path: pointer });
  }

  const seen = new Set<string>();

  raw.forEach((entry, index) => {
    const paramPointer = `${pointer}/${index}`;
    const param = deref(context, entry, paramPointer);
    if (!isRecord(param)) {
      throw new ParseError('Parameter must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, { path: paramPointer });
    }

    const name = getString(param, 'name');
    const location = getString(param, 'in');
    if (!name || !location) {
      throw new ParseError('Parameter requires "name" and "in"', ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: paramPointer,
      });
    }

    if (location === 'body' && context.flavor === 'swagger2') {
      result.body = normalizeSchema(param.schema, context.normalize, `${paramPointer}/schema`);
      return;
    }

    const mapped = LOCATIONS.get(location);
    if (!mapped || (location === 'formData' && context.flavor !== 'swagger2')) {
      throw new ParseError(`Unsupported parameter location "${location}"`, ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: `${paramPointer}/in`,
      });
    }

    if (seen.has(name)) {
      throw new ParseError(`Duplicate parameter "${name}"`, ErrorCode.PARSE_DUPLICATE_KEY, { path: paramPointer });
    }
    seen.add(name);

    const descriptor: ParameterDescriptor = {
      name,
      location: mapped,
      schema: parameterSchema(context, param, paramPointer),
      required: param.required === true || mapped === 'path',
    };
    const description = getString(param, 'description');
    if (description !== undefined) descriptor.description = description;

    result.parameters.push(descriptor);
  });

  return result;
}

function parameterSchema(context: ParseContext, param: Record<string, unknown>, pointer: string): SchemaNode {
  if (context.flavor === 'swagger2') {
    // Swagger 2 declares the type inline on the parameter
    if (param.type === 'file') return scalarNode('string', { format: 'binary' });
    return normalizeSchema(param, context.normalize, pointer);
  }
  if (param.schema !== undefined) {
    return normalizeSchema(param.schema, context.normalize, `${pointer}/schema`);
  }
  return contentSchema(context, param, pointer) ?? unknownNode('untyped');
}

// ─── References ─────────────────────────────────────────────────────────────

/**
 * Follow `$ref` on non-schema objects (path items, parameters, responses).
 */
function deref(context: ParseContext, raw: unknown, pointer: string): unknown {
  let current = raw;
  for (let hops = 0; isRecord(current); hops++) {
    const ref = getString(current, '$ref');
    if (ref === undefined) return current;
    if (hops >= 32) {
      throw new ParseError(`Reference cycle through "${ref}"`, ErrorCode.PARSE_UNRESOLVED_REF, { path: pointer, ref });
    }
    current = resolveRef(context.document, ref, pointer);
  }
  return current;
}

