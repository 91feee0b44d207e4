/**
 * Spec ingestion tool: index a specification into the graph store, or
 * report what the store currently holds.
 */

import { z } from 'zod';
import { SpecFormat } from '../core/types';
import { mergeGraphs } from '../graph/knowledge-graph';
import { parseSpecDocument } from '../ingest';
import { createLogger } from '../utils/logger';
import { BaseAnalyzer } from './analyzer';
import { AnalyzerContext, readInputFile, snapshotNameSchema } from './context';

const logger = createLogger('ingest-tool');

export interface IndexReport {
  type: 'ingest';
  action: 'index';
  snapshot: string;
  version: number;
  format: SpecFormat;
  specVersion: string;
  endpoints: number;

  /** Endpoints carried over from the previous version by a merge */
  merged: boolean;
  warnings: string[];
  summary: string;
}

export interface StatusReport {
  type: 'ingest';
  action: 'status';
  snapshot: string;
  version: number | null;
  endpoints: number;
  edges: number;
  timestamp?: string;
  source?: string;
  summary: string;
}

export type IngestReport = IndexReport | StatusReport;

const parametersSchema = z
  .object({
    action: z.enum(['index', 'status']),
    source: z.string().min(1).optional(),
    content: z.string().min(1).optional(),
    snapshot: snapshotNameSchema.optional(),
    merge: z.boolean().default(false),
  })
  .refine((p) => p.action !== 'index' || p.source !== undefined || p.content !== undefined, {
    message: 'The "index" action requires "source" or "content"',
    path: ['source'],
  });

export type IngestParameters = z.infer<typeof parametersSchema>;

export class IngestAnalyzer extends BaseAnalyzer<IngestParameters, IngestReport> {
  readonly name = 'ingest_spec';
  readonly description =
    'Index an OpenAPI 3.x, Swagger 2.0 or Postman 2.x document into the knowledge graph store, or report the stored graph status.';
  readonly parameters = parametersSchema;
  readonly example = { action: 'index', source: './openapi.yaml', snapshot: 'users-api' };

  constructor(private readonly context: AnalyzerContext) {
    super();
  }

  protected async execute(params: IngestParameters): Promise<IngestReport> {
    const snapshot = params.snapshot ?? this.context.defaultSnapshot;
    return params.action === 'index' ? this.index(snapshot, params) : this.status(snapshot);
  }

  private async index(snapshot: string, params: IngestParameters): Promise<IndexReport> {
    const content =
      params.content ?? (params.source !== undefined ? readInputFile(params.source, 'spec', this.context.cwd) : '');

    // Parse fully before touching the store
    const result = parseSpecDocument(content, { maxDepth: this.context.maxDepth });

    let graph = result.graph;
    let merged = false;
    if (params.merge) {
      const latest = await this.context.store.load(snapshot);
      if (latest) {
        graph = mergeGraphs(latest.graph, result.graph);
        merged = true;
      }
    }

    const saved = await this.context.store.save(snapshot, graph, { source: params.source ?? '(inline)' });
    logger.info({ snapshot, version: saved.version, endpoints: graph.size, format: result.format }, 'Specification indexed');

    const warningNote = result.warnings.length > 0 ? ` ${result.warnings.length} warning(s).` : '';
    return {
      type: 'ingest',
      action: 'index',
      snapshot,
      version: saved.version,
      format: result.format,
      specVersion: result.specVersion,
      endpoints: graph.size,
      merged,
      warnings: result.warnings,
      summary:
        `Indexed ${graph.size} endpoint(s) from ${result.format} ${result.specVersion} ` +
        `into "${snapshot}" v${saved.version}${merged ? ' (merged)' : ''}.${warningNote}`,
    };
  }

  private async status(snapshot: string): Promise<StatusReport> {
    const latest = await this.context.store.load(snapshot);
    if (!latest) {
      return {
        type: 'ingest',
        action: 'status',
        snapshot,
        version: null,
        endpoints: 0,
        edges: 0,
        summary: `No snapshot named "${snapshot}" has been indexed.`,
      };
    }

    const report: StatusReport = {
      type: 'ingest',
      action: 'status',
      snapshot,
      version: latest.version,
      endpoints: latest.graph.size,
      edges: latest.graph.edges.length,
      timestamp: latest.timestamp,
      summary: `Snapshot "${snapshot}" v${latest.version}: ${latest.graph.size} endpoint(s), ${latest.graph.edges.length} edge(s).`,
    };
    if (latest.source) report.source = latest.source;
    return report;
  }
}
