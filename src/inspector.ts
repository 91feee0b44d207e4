/**
 * ApiInspector: main API
 *
 * The primary entry point for api-surface-graph. Wires one graph store into
 * the four tools and provides a simple API for:
 * - Indexing specifications into versioned snapshots
 * - Detecting breaking changes between revisions
 * - Analyzing drift against live-traffic observations
 * - Mapping resource dependencies
 * - Formatting reports
 */

import { BreakingChangeReport, detectBreakingChanges } from './analyzers/breaking-changes';
import { GraphSource } from './analyzers/context';
import { DependencyReport } from './analyzers/dependencies';
import { DriftReport } from './analyzers/drift';
import { IndexReport, StatusReport } from './analyzers/ingest';
import { AnalyzerRegistry, BuiltinAnalyzers, createBuiltinAnalyzers, registryOf } from './analyzers/registry';
import { InspectorConfig } from './config';
import { AnalysisReport, formatReport } from './core/reporter';
import { LiveObservation, ReportFormat } from './core/types';
import { parseSpecDocument } from './ingest';
import { FileGraphStore } from './store/file-store';
import { GraphSnapshot, GraphStore } from './store/store.interface';

export interface ApiInspectorOptions {
  /** Store directory, or a store instance (default: '.api-surface') */
  store?: string | GraphStore;

  /** Snapshot used when a call names none (default: 'default') */
  defaultSnapshot?: string;

  /** Schema nesting bound during ingestion (default: 10) */
  maxDepth?: number;

  /** Methods treated as resource creation by the dependency mapper */
  creationVerbs?: string[];

  /** Base directory for relative file paths */
  cwd?: string;
}

export interface IndexOptions {
  snapshot?: string;

  /** Merge into the latest version (last write wins) instead of replacing it */
  merge?: boolean;
}

export interface DriftInput {
  snapshot?: string;
  version?: number;
  observations?: LiveObservation[];
  observationsPath?: string;
  basePath?: string;
  endpoints?: string[];
  includeInformational?: boolean;
}

// ─── ApiInspector Class ─────────────────────────────────────────────────────

export class ApiInspector {
  private readonly store: GraphStore;
  private readonly maxDepth?: number;
  private readonly tools: BuiltinAnalyzers;
  readonly registry: AnalyzerRegistry;

  constructor(options: ApiInspectorOptions = {}) {
    // Initialize store
    if (options.store === undefined || typeof options.store === 'string') {
      this.store = new FileGraphStore(options.store ?? '.api-surface');
    } else {
      this.store = options.store;
    }

    this.maxDepth = options.maxDepth;
    this.tools = createBuiltinAnalyzers({
      store: this.store,
      defaultSnapshot: options.defaultSnapshot,
      maxDepth: options.maxDepth,
      creationVerbs: options.creationVerbs,
      cwd: options.cwd,
    });
    this.registry = registryOf(this.tools);
  }

  static fromConfig(config: InspectorConfig, cwd?: string): ApiInspector {
    return new ApiInspector({
      store: config.storeDir,
      defaultSnapshot: config.defaultSnapshot,
      maxDepth: config.maxDepth,
      creationVerbs: config.creationVerbs,
      cwd,
    });
  }

  /**
   * Index a specification file into a new snapshot version.
   */
  async index(specPath: string, options: IndexOptions = {}): Promise<IndexReport> {
    const report = await this.tools.ingest.run({ action: 'index', source: specPath, ...options });
    if (report.action !== 'index') throw new TypeError('ingest_spec returned a status report for "index"');
    return report;
  }

  /**
   * Index specification text (JSON or YAML) into a new snapshot version.
   */
  async indexContent(content: string, options: IndexOptions = {}): Promise<IndexReport> {
    const report = await this.tools.ingest.run({ action: 'index', content, ...options });
    if (report.action !== 'index') throw new TypeError('ingest_spec returned a status report for "index"');
    return report;
  }

  async status(snapshot?: string): Promise<StatusReport> {
    const report = await this.tools.ingest.run({ action: 'status', snapshot });
    if (report.action !== 'status') throw new TypeError('ingest_spec returned an index report for "status"');
    return report;
  }

  /**
   * Compare two revisions, each a stored snapshot or a specification.
   */
  async detectBreakingChanges(
    oldSource: GraphSource,
    newSource: GraphSource,
    includeInformational: boolean = false
  ): Promise<BreakingChangeReport> {
    return this.tools.breaking.run({ old: oldSource, new: newSource, includeInformational });
  }

  /**
   * Compare two specification texts directly (without store).
   */
  compareSpecs(before: string, after: string, includeInformational: boolean = false): BreakingChangeReport {
    const oldResult = parseSpecDocument(before, { maxDepth: this.maxDepth });
    const newResult = parseSpecDocument(after, { maxDepth: this.maxDepth });
    const report = detectBreakingChanges(oldResult.graph, newResult.graph, {
      oldLabel: '(before)',
      newLabel: '(after)',
      includeInformational,
    });
    report.warnings = [...oldResult.warnings, ...newResult.warnings];
    return report;
  }

  async analyzeDrift(input: DriftInput): Promise<DriftReport> {
    return this.tools.drift.run(input);
  }

  async mapDependencies(snapshot?: string, persist: boolean = false): Promise<DependencyReport> {
    return this.tools.dependencies.run({ snapshot, persist });
  }

  /**
   * Run any registered tool by name with a JSON parameter object.
   */
  async run(tool: string, params: unknown): Promise<unknown> {
    return this.registry.run(tool, params);
  }

  /**
   * Format a report.
   */
  format(report: AnalysisReport, format: ReportFormat = 'console'): string {
    return formatReport(report, format);
  }

  /**
   * Get the graph store instance.
   */
  getStore(): GraphStore {
    return this.store;
  }

  async listSnapshots(): Promise<string[]> {
    return this.store.listNames();
  }

  async listVersions(snapshot: string): Promise<GraphSnapshot[]> {
    return this.store.listVersions(snapshot);
  }
}
