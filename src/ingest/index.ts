/**
 * Endpoint Descriptor Builder
 *
 * Entry point for specification documents: decodes the text, detects the
 * format and dispatches to the matching parser. Ingestion is all-or-nothing;
 * any failure throws before a graph exists.
 */

import { ErrorCode, ParseError, UnsupportedFormatError } from '../core/errors';
import { SpecFormat } from '../core/types';
import { parseDocumentText } from '../formats';
import { getRecord, getString, isRecord } from '../utils/object';
import { createLogger } from '../utils/logger';
import { parseOpenApi } from './openapi';
import { parsePostman } from './postman';
import { IngestionResult, IngestOptions } from './types';

export { buildGraphFromObservations, decodeObservedBody } from './observations';
export type { ObservationGraphOptions } from './observations';
export type { IngestionResult, IngestOptions } from './types';

const logger = createLogger('ingest');

export interface DetectedFormat {
  format: Exclude<SpecFormat, 'observations'>;
  specVersion: string;
}

const POSTMAN_SCHEMA = /collection\/v(2\.[01]\.\d+)/;

// Unquoted YAML versions ('swagger: 2.0') arrive as numbers
function versionTag(value: unknown): string {
  if (typeof value === 'number' && Number.isInteger(value)) return value.toFixed(1);
  return String(value);
}

/**
 * Identify the format of a decoded document. Version tags outside the
 * supported range are rejected, never guessed.
 */
export function detectFormat(document: Record<string, unknown>): DetectedFormat {
  if (document.openapi !== undefined) {
    const version = versionTag(document.openapi);
    if (/^3\.[01](\.\d+)?$/.test(version)) return { format: 'openapi3', specVersion: version };
    throw new UnsupportedFormatError(`Unsupported OpenAPI version "${version}"`, { detected: `openapi ${version}` });
  }

  if (document.swagger !== undefined) {
    const version = versionTag(document.swagger);
    if (version === '2.0') return { format: 'swagger2', specVersion: version };
    throw new UnsupportedFormatError(`Unsupported Swagger version "${version}"`, { detected: `swagger ${version}` });
  }

  const info = getRecord(document, 'info');
  if (info) {
    const schema = getString(info, 'schema');
    if (schema !== undefined) {
      const match = schema.match(POSTMAN_SCHEMA);
      if (match) return { format: 'postman2', specVersion: match[1] };
      if (schema.includes('getpostman.com')) {
        throw new UnsupportedFormatError(`Unsupported Postman collection schema "${schema}"`, {
          detected: schema,
        });
      }
    }
    if (getString(info, '_postman_id') !== undefined) return { format: 'postman2', specVersion: '2.1.0' };
  }

  throw new UnsupportedFormatError(
    'Unrecognised document: expected OpenAPI 3.x, Swagger 2.0 or a Postman collection',
    { detected: 'unknown' }
  );
}

/**
 * Parse a specification document (JSON or YAML text) into a knowledge graph.
 */
export function parseSpecDocument(content: string, options: IngestOptions = {}): IngestionResult {
  if (content.trim().length === 0) {
    throw new ParseError('Document is empty', ErrorCode.PARSE_SYNTAX_ERROR, { line: 1, column: 1 });
  }

  const document = parseDocumentText(content);
  if (!isRecord(document)) {
    throw new UnsupportedFormatError('Document is not an object', {
      detected: Array.isArray(document) ? 'array' : typeof document,
    });
  }
  const { format, specVersion } = detectFormat(document);

  const result =
    format === 'postman2'
      ? parsePostman(document, specVersion, options)
      : parseOpenApi(document, format, specVersion, options);

  logger.debug(
    { format, specVersion, endpoints: result.graph.size, warnings: result.warnings.length },
    'Specification ingested'
  );
  for (const warning of result.warnings) {
    logger.warn(warning);
  }

  return result;
}
