/**
 * Postman Collection v2.0 / v2.1 ingestion.
 *
 * Folders recurse. Query parameters and headers are optional, path variables
 * required. Raw JSON bodies and saved example responses are typed by
 * sampling. Repeated requests for the same endpoint are folded together.
 */

import { createKey, endpointIdentity, pathPlaceholders } from '../core/endpoint-key';
import { ErrorCode, ParseError } from '../core/errors';
import { inferSchema, mergeSchemas, scalarNode, unknownNode } from '../core/normalizer';
import { EndpointDescriptor, ParameterDescriptor, ParameterLocation, SchemaNode } from '../core/types';
import { parseBody } from '../formats';
import { GraphBuilder } from '../graph/knowledge-graph';
import { getArray, getRecord, getString, isRecord } from '../utils/object';
import { IngestionResult, IngestOptions } from './types';

interface CollectContext {
  maxDepth?: number;
  warnings: string[];
  endpoints: Map<string, EndpointDescriptor>;
}

export function parsePostman(
  collection: Record<string, unknown>,
  specVersion: string,
  options: IngestOptions = {}
): IngestionResult {
  const context: CollectContext = {
    maxDepth: options.maxDepth,
    warnings: [],
    endpoints: new Map(),
  };

  collectItems(context, collection.item, '#/item');

  const builder = new GraphBuilder();
  for (const descriptor of context.endpoints.values()) {
    builder.add(descriptor);
  }

  const info = getRecord(collection, 'info') ?? {};
  const graph = builder.build({
    title: getString(info, 'name'),
    version: getString(info, 'version'),
    format: 'postman2',
  });

  return { graph, format: 'postman2', specVersion, warnings: context.warnings };
}

// ─── Items ──────────────────────────────────────────────────────────────────

function collectItems(context: CollectContext, raw: unknown, pointer: string): void {
  if (raw === undefined) return;
  if (!Array.isArray(raw)) {
    throw new ParseError('"item" must be an array', ErrorCode.PARSE_INVALID_STRUCTURE, { path: pointer });
  }

  raw.forEach((entry, index) => {
    const itemPointer = `${pointer}/${index}`;
    if (!isRecord(entry)) {
      throw new ParseError('Collection item must be an object', ErrorCode.PARSE_INVALID_STRUCTURE, {
        path: itemPointer,
      });
    }

    if (entry.item !== undefined) {
      collectItems(context, entry.item, `${itemPointer}/item`);
      return;
    }
    if (entry.request === undefined) return;

    const descriptor = parseRequestItem(context, entry, itemPointer);
    const identity = endpointIdentity(descriptor.key);
    const existing = context.endpoints.get(identity);
    context.endpoints.set(identity, existing ? foldDescriptors(existing, descriptor) : descriptor);
  });
}

function parseRequestItem(
  context: CollectContext,
  item: Record<string, unknown>,
  pointer: string
): EndpointDescriptor {
  const requestPointer = `${pointer}/request`;
  // A bare string request is a GET of that URL
  const request = typeof item.request === 'string' ? { method: 'GET', url: item.request } : item.request;
  if (!isRecord(request)) {
    throw new ParseError('Request must be an object or a URL string', ErrorCode.PARSE_INVALID_STRUCTURE, {
      path: requestPointer,
    });
  }

  const method = getString(request, 'method') ?? 'GET';
  const url = parseUrl(request.url, `${requestPointer}/url`);
  const key = createKey(method, url.path);

  const params = new ParameterList();
  for (const name of pathPlaceholders(key.path)) {
    params.add(name, 'path', true, url.variables.get(name));
  }
  for (const [name, description] of url.query) {
    params.add(name, 'query', false, description);
  }
  for (const header of getArray(request, 'header') ?? []) {
    if (isRecord(header) && typeof header.key === 'string') {
      params.add(header.key, 'header', false, getString(header, 'description'));
    }
  }

  const descriptor: EndpointDescriptor = {
    key,
    parameters: params.list,
    responses: parseExamples(context, item.response, `${pointer}/response`),
  };

  const body = getRecord(request, 'body');
  if (body) {
    const mode = getString(body, 'mode');
    if (mode === 'raw') {
      const raw = getString(body, 'raw') ?? '';
      if (raw.trim().length > 0) {
        descriptor.requestBody = sampleText(context, raw, `${requestPointer}/body/raw`);
      }
    } else if (mode === 'urlencoded' || mode === 'formdata') {
      for (const field of getArray(body, mode) ?? []) {
        if (isRecord(field) && typeof field.key === 'string') {
          params.add(field.key, 'body', false, getString(field, 'description'));
        }
      }
    } else if (mode !== undefined) {
      descriptor.requestBody = unknownNode('untyped');
    }
  }

  const name = getString(item, 'name');
  if (name !== undefined) descriptor.summary = name;

  return descriptor;
}

// ─── URLs ───────────────────────────────────────────────────────────────────

interface ParsedUrl {
  path: string;
  query: Map<string, string | undefined>;
  variables: Map<string, string | undefined>;
}

function parseUrl(raw: unknown, pointer: string): ParsedUrl {
  const result: ParsedUrl = { path: '/', query: new Map(), variables: new Map() };

  if (typeof raw === 'string') {
    result.path = raw;
    queryFromRaw(raw, result.query);
    return result;
  }

  if (!isRecord(raw)) {
    throw new ParseError('Request URL must be a string or an object', ErrorCode.PARSE_INVALID_STRUCTURE, {
      path: pointer,
    });
  }

  const segments = getArray(raw, 'path');
  const rawUrl = getString(raw, 'raw');
  if (segments) {
    result.path = segments
      .map((segment) => (typeof segment === 'string' ? segment : isRecord(segment) ? getString(segment, 'value') : ''))
      .join('/');
  } else if (rawUrl !== undefined) {
    result.path = rawUrl;
  }

  const query = getArray(raw, 'query');
  if (query) {
    for (const entry of query) {
      if (isRecord(entry) && typeof entry.key === 'string' && !result.query.has(entry.key)) {
        result.query.set(entry.key, getString(entry, 'description'));
      }
    }
  } else if (rawUrl !== undefined) {
    queryFromRaw(rawUrl, result.query);
  }

  for (const variable of getArray(raw, 'variable') ?? []) {
    if (isRecord(variable) && typeof variable.key === 'string') {
      result.variables.set(variable.key, getString(variable, 'description'));
    }
  }

  return result;
}

function queryFromRaw(rawUrl: string, into: Map<string, string | undefined>): void {
  const queryStart = rawUrl.indexOf('?');
  if (queryStart < 0) return;
  for (const pair of rawUrl.slice(queryStart + 1).split('#')[0].split('&')) {
    const name = pair.split('=')[0];
    if (name && !into.has(name)) into.set(name, undefined);
  }
}

// ─── Bodies ─────────────────────────────────────────────────────────────────

function parseExamples(context: CollectContext, raw: unknown, pointer: string): Record<string, SchemaNode> {
  const responses: Record<string, SchemaNode> = {};

  (Array.isArray(raw) ? raw : []).forEach((example, index) => {
    if (!isRecord(example)) return;
    const status = typeof example.code === 'number' ? String(example.code) : 'default';
    const text = getString(example, 'body');
    const schema =
      text === undefined || text.trim().length === 0
        ? unknownNode('absent')
        : sampleText(context, text, `${pointer}/${index}/body`);
    responses[status] = status in responses ? mergeSchemas(responses[status], schema) : schema;
  });

  return responses;
}

/**
 * Type a recorded body. Templated bodies (`{{var}}` inside JSON) cannot be
 * decoded and stay untyped, with a warning.
 */
function sampleText(context: CollectContext, text: string, pointer: string): SchemaNode {
  let value: unknown;
  try {
    value = parseBody(text);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    context.warnings.push(`Body at ${pointer} is not valid JSON and was left untyped: ${error.message}`);
    return unknownNode('untyped');
  }
  return inferSchema(value, context.maxDepth);
}

// ─── Parameters ─────────────────────────────────────────────────────────────

/**
 * Ordered parameters, first declaration of a name wins.
 */
class ParameterList {
  readonly list: ParameterDescriptor[] = [];
  private readonly names = new Set<string>();

  add(name: string, location: ParameterLocation, required: boolean, description?: string): void {
    if (this.names.has(name)) return;
    this.names.add(name);
    const param: ParameterDescriptor = { name, location, schema: scalarNode('string'), required };
    if (description) param.description = description;
    this.list.push(param);
  }
}

function foldDescriptors(existing: EndpointDescriptor, incoming: EndpointDescriptor): EndpointDescriptor {
  const params = new ParameterList();
  for (const param of [...existing.parameters, ...incoming.parameters]) {
    params.add(param.name, param.location, param.required, param.description);
  }

  const responses: Record<string, SchemaNode> = { ...existing.responses };
  for (const [status, schema] of Object.entries(incoming.responses)) {
    responses[status] = status in responses ? mergeSchemas(responses[status], schema) : schema;
  }

  const folded: EndpointDescriptor = { ...existing, parameters: params.list, responses };
  if (incoming.requestBody) {
    folded.requestBody = existing.requestBody
      ? mergeSchemas(existing.requestBody, incoming.requestBody)
      : incoming.requestBody;
  }
  return folded;
}
