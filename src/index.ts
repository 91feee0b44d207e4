/**
 * api-surface-graph
 *
 * Know how your API surface changes, drifts and depends on itself.
 *
 * @example
 * ```typescript
 * import { ApiInspector } from 'api-surface-graph';
 *
 * const inspector = new ApiInspector({ store: './.api-surface' });
 *
 * await inspector.index('./openapi.v1.yaml', { snapshot: 'users-api' });
 * const report = await inspector.detectBreakingChanges(
 *   { snapshot: 'users-api' },
 *   { specPath: './openapi.v2.yaml' }
 * );
 *
 * if (report.counts.breaking > 0) {
 *   console.log(inspector.format(report, 'console'));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { ApiInspector } from './inspector';
export type { ApiInspectorOptions, DriftInput, IndexOptions } from './inspector';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { InspectorConfig, LoadConfigOptions } from './config';

// ─── Core Types ─────────────────────────────────────────────────────────────
export type {
  SchemaNode,
  ScalarNode,
  ArrayNode,
  ObjectNode,
  UnknownNode,
  EndpointKey,
  EndpointDescriptor,
  ParameterDescriptor,
  ParameterLocation,
  ResourceEdge,
  ChangeRecord,
  ChangeType,
  ChangeKind,
  ChangeCounts,
  Severity,
  LiveObservation,
  ReportFormat,
  SpecFormat,
} from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ApiGraphError,
  ParseError,
  UnsupportedFormatError,
  MissingInputError,
  StorageError,
  InvalidParametersError,
  AnalyzerNotFoundError,
  ConfigurationError,
  ErrorCode,
  isApiGraphError,
} from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { normalizeSchema, inferSchema, mergeSchemas, schemaToString } from './core/normalizer';
export { createKey, formatKey, parseKey, normalizePath, findMatchingTemplate } from './core/endpoint-key';
export { diffSchemas, diffEndpoints, diffGraphs, countChanges, endpointSeverities, severityOf } from './core/differ';
export { formatReport } from './core/reporter';
export type { AnalysisReport } from './core/reporter';
export { parseSpecDocument, detectFormat, buildGraphFromObservations } from './ingest';

// ─── Graph & Store ──────────────────────────────────────────────────────────
export { KnowledgeGraph, GraphBuilder, mergeGraphs } from './graph/knowledge-graph';
export { serializeGraph, deserializeGraph } from './graph/serialize';
export { FileGraphStore } from './store/file-store';
export { MemoryGraphStore } from './store/memory-store';
export type { GraphStore, GraphSnapshot } from './store/store.interface';

// ─── Analyzers ──────────────────────────────────────────────────────────────
export { AnalyzerRegistry, createBuiltinAnalyzers, createDefaultRegistry } from './analyzers/registry';
export { BaseAnalyzer } from './analyzers/analyzer';
export type { Analyzer } from './analyzers/analyzer';
export { detectBreakingChanges } from './analyzers/breaking-changes';
export type { BreakingChangeReport } from './analyzers/breaking-changes';
export { analyzeDrift } from './analyzers/drift';
export type { DriftReport } from './analyzers/drift';
export { mapDependencies } from './analyzers/dependencies';
export type { DependencyReport } from './analyzers/dependencies';
export type { IngestReport } from './analyzers/ingest';
export type { GraphSource } from './analyzers/context';

// ─── Format Parsers ─────────────────────────────────────────────────────────
export { parseJson, parseYaml, parseXml, parseBody } from './formats';
