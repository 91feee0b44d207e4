/**
 * Shared analyzer inputs: the graph store every tool reads from, and the
 * resolution of graph sources (stored snapshots or fresh specifications).
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { MissingInputError, errorMessage } from '../core/errors';
import { KnowledgeGraph } from '../graph/knowledge-graph';
import { parseSpecDocument } from '../ingest';
import { GraphSnapshot, GraphStore } from '../store/store.interface';

export interface AnalyzerContext {
  store: GraphStore;

  /** Snapshot used when a call names none */
  defaultSnapshot: string;

  maxDepth?: number;

  /** Base directory for relative file paths (defaults to process.cwd()) */
  cwd?: string;
}

export const snapshotNameSchema = z.string().min(1);
export const versionSchema = z.number().int().positive();

export const graphSourceSchema = z.union([
  z.object({ snapshot: snapshotNameSchema, version: versionSchema.optional() }).strict(),
  z.object({ specPath: z.string().min(1) }).strict(),
  z.object({ specContent: z.string().min(1) }).strict(),
]);

export type GraphSource = z.infer<typeof graphSourceSchema>;

export interface ResolvedGraph {
  graph: KnowledgeGraph;

  /** 'users-api@v3', a file path or '(inline)' */
  label: string;
  warnings: string[];
}

/**
 * Read a file named in tool parameters. A missing or unreadable file means
 * the input could not be resolved.
 */
export function readInputFile(filePath: string, side: string, cwd?: string): string {
  const resolved = path.resolve(cwd ?? process.cwd(), filePath);
  try {
    return fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new MissingInputError(`Cannot read ${side} input "${filePath}": ${errorMessage(error)}`, {
      side,
      filePath: resolved,
    });
  }
}

export async function loadSnapshot(
  store: GraphStore,
  name: string,
  version: number | undefined,
  side: string
): Promise<GraphSnapshot> {
  const snapshot = version === undefined ? await store.load(name) : await store.loadVersion(name, version);
  if (!snapshot) {
    const which = version === undefined ? `snapshot "${name}"` : `version ${version} of snapshot "${name}"`;
    throw new MissingInputError(`No ${which} found for the ${side} side`, { side, snapshot: name, version });
  }
  return snapshot;
}

export function snapshotLabel(snapshot: GraphSnapshot): string {
  return `${snapshot.name}@v${snapshot.version}`;
}

/**
 * Resolve one side of a comparison. Parse failures propagate as ParseError;
 * they are never read as an empty graph.
 */
export async function resolveGraph(
  source: GraphSource,
  side: string,
  context: AnalyzerContext
): Promise<ResolvedGraph> {
  if ('snapshot' in source) {
    const snapshot = await loadSnapshot(context.store, source.snapshot, source.version, side);
    return { graph: snapshot.graph, label: snapshotLabel(snapshot), warnings: [] };
  }

  if ('specPath' in source) {
    const content = readInputFile(source.specPath, side, context.cwd);
    const result = parseSpecDocument(content, { maxDepth: context.maxDepth });
    return { graph: result.graph, label: source.specPath, warnings: result.warnings };
  }

  const result = parseSpecDocument(source.specContent, { maxDepth: context.maxDepth });
  return { graph: result.graph, label: '(inline)', warnings: result.warnings };
}
