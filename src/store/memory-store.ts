/**
 * In-memory Graph Store, for tests and embedding.
 */

import { KnowledgeGraph } from '../graph/knowledge-graph';
import { GraphSnapshot, GraphStore, SaveOptions } from './store.interface';

export class MemoryGraphStore implements GraphStore {
  private readonly snapshots = new Map<string, GraphSnapshot[]>();

  async save(name: string, graph: KnowledgeGraph, options: SaveOptions = {}): Promise<GraphSnapshot> {
    const versions = this.snapshots.get(name) ?? [];
    const snapshot: GraphSnapshot = {
      name,
      version: versions.length > 0 ? versions[versions.length - 1].version + 1 : 1,
      timestamp: new Date().toISOString(),
      graph,
    };
    if (options.source) snapshot.source = options.source;
    this.snapshots.set(name, [...versions, snapshot]);
    return snapshot;
  }

  async load(name: string): Promise<GraphSnapshot | null> {
    const versions = this.snapshots.get(name);
    return versions && versions.length > 0 ? versions[versions.length - 1] : null;
  }

  async loadVersion(name: string, version: number): Promise<GraphSnapshot | null> {
    return this.snapshots.get(name)?.find((s) => s.version === version) ?? null;
  }

  async listVersions(name: string): Promise<GraphSnapshot[]> {
    return [...(this.snapshots.get(name) ?? [])];
  }

  async listNames(): Promise<string[]> {
    return Array.from(this.snapshots.keys()).sort();
  }

  async delete(name: string): Promise<void> {
    this.snapshots.delete(name);
  }
}
