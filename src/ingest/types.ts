import { KnowledgeGraph } from '../graph/knowledge-graph';
import { SpecFormat } from '../core/types';

export interface IngestOptions {
  /** Nesting bound for self-referential schemas (default 10) */
  maxDepth?: number;
}

export interface IngestionResult {
  graph: KnowledgeGraph;
  format: SpecFormat;

  /** Version tag of the source format ('3.0.3', '2.0', '2.1.0') */
  specVersion: string;

  /** Non-fatal notices, such as schemas truncated at the depth bound */
  warnings: string[];
}
