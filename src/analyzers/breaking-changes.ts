/**
 * Breaking-Change Detector
 *
 * Resolves two graphs (stored snapshots or freshly ingested specifications),
 * diffs them and buckets the records by severity.
 */

import { z } from 'zod';
import { countChanges, endpointSeverities, diffGraphs } from '../core/differ';
import { ChangeCounts, ChangeRecord, EndpointSeverity } from '../core/types';
import { KnowledgeGraph } from '../graph/knowledge-graph';
import { createLogger } from '../utils/logger';
import { BaseAnalyzer } from './analyzer';
import { AnalyzerContext, graphSourceSchema, resolveGraph } from './context';

const logger = createLogger('breaking-changes');

export interface BreakingChangeReport {
  type: 'breaking_changes';
  old: string;
  new: string;
  counts: ChangeCounts;

  /** All records in diff order */
  changes: ChangeRecord[];
  breaking: ChangeRecord[];
  minor: ChangeRecord[];
  patch: ChangeRecord[];
  info: ChangeRecord[];

  /** Per-endpoint maximum severity, in diff order */
  endpoints: EndpointSeverity[];
  summary: string;

  /** Ingestion warnings of either side */
  warnings: string[];
}

export interface DetectOptions {
  oldLabel?: string;
  newLabel?: string;

  /** Keep records for shapes that could not be compared */
  includeInformational?: boolean;
}

function summarize(counts: ChangeCounts, oldLabel: string, newLabel: string): string {
  if (counts.total === 0) {
    return `No changes between ${oldLabel} and ${newLabel}.`;
  }

  const verdict = counts.breaking > 0 ? 'Breaking changes detected' : 'No breaking changes';
  return (
    `${verdict} between ${oldLabel} and ${newLabel}: ${counts.total} change(s) ` +
    `(${counts.breaking} breaking, ${counts.minor} minor, ${counts.patch} patch, ${counts.info} info); ` +
    `${counts.removed} endpoint(s) removed, ${counts.added} added, ${counts.modified} modified.`
  );
}

/**
 * Compare two graphs and classify every change.
 */
export function detectBreakingChanges(
  oldGraph: KnowledgeGraph,
  newGraph: KnowledgeGraph,
  options: DetectOptions = {}
): BreakingChangeReport {
  const oldLabel = options.oldLabel ?? 'old';
  const newLabel = options.newLabel ?? 'new';

  const changes = diffGraphs(oldGraph, newGraph).filter(
    (c) => options.includeInformational || c.severity !== 'info'
  );
  const counts = countChanges(changes);

  return {
    type: 'breaking_changes',
    old: oldLabel,
    new: newLabel,
    counts,
    changes,
    breaking: changes.filter((c) => c.severity === 'breaking'),
    minor: changes.filter((c) => c.severity === 'minor'),
    patch: changes.filter((c) => c.severity === 'patch'),
    info: changes.filter((c) => c.severity === 'info'),
    endpoints: endpointSeverities(changes),
    summary: summarize(counts, oldLabel, newLabel),
    warnings: [],
  };
}

// ─── Tool ───────────────────────────────────────────────────────────────────

const parametersSchema = z.object({
  old: graphSourceSchema,
  new: graphSourceSchema,
  includeInformational: z.boolean().default(false),
});

export type BreakingChangeParameters = z.infer<typeof parametersSchema>;

export class BreakingChangeAnalyzer extends BaseAnalyzer<BreakingChangeParameters, BreakingChangeReport> {
  readonly name = 'detect_breaking_changes';
  readonly description =
    'Compare two API revisions (stored snapshots or specification documents) and classify every change as breaking, minor, patch or info.';
  readonly parameters = parametersSchema;
  readonly example = {
    old: { snapshot: 'users-api', version: 1 },
    new: { specPath: './openapi.yaml' },
  };

  constructor(private readonly context: AnalyzerContext) {
    super();
  }

  protected async execute(params: BreakingChangeParameters): Promise<BreakingChangeReport> {
    const before = await resolveGraph(params.old, 'old', this.context);
    const after = await resolveGraph(params.new, 'new', this.context);

    const report = detectBreakingChanges(before.graph, after.graph, {
      oldLabel: before.label,
      newLabel: after.label,
      includeInformational: params.includeInformational,
    });
    report.warnings = [...before.warnings, ...after.warnings];

    logger.info(
      { old: report.old, new: report.new, breaking: report.counts.breaking, total: report.counts.total },
      'Breaking-change detection complete'
    );
    return report;
  }
}
