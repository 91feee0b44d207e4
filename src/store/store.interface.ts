/**
 * Graph store contract. Custom stores (databases, object storage) implement
 * this interface; `FileGraphStore` and `MemoryGraphStore` ship with the package.
 */

import { KnowledgeGraph } from '../graph/knowledge-graph';

export interface GraphSnapshot {
  /** Snapshot name (e.g. 'payments-api') */
  name: string;

  /** Version number, incremented on each save */
  version: number;

  /** ISO timestamp of the save */
  timestamp: string;

  graph: KnowledgeGraph;

  /** Where the graph came from (spec path, collector name) */
  source?: string;
}

export interface SaveOptions {
  source?: string;
}

export interface GraphStore {
  /** Save a graph as the next version of a snapshot */
  save(name: string, graph: KnowledgeGraph, options?: SaveOptions): Promise<GraphSnapshot>;

  /** Load the latest version of a snapshot */
  load(name: string): Promise<GraphSnapshot | null>;

  /** Load a specific version */
  loadVersion(name: string, version: number): Promise<GraphSnapshot | null>;

  /** List all versions of a snapshot, ascending */
  listVersions(name: string): Promise<GraphSnapshot[]>;

  /** List all snapshot names */
  listNames(): Promise<string[]>;

  /** Delete a snapshot and all its versions */
  delete(name: string): Promise<void>;
}
