/**
 * File-based Graph Store
 *
 * Stores knowledge graph snapshots as JSON files on the local filesystem.
 * No database required. Git-friendly format for version control.
 *
 * Directory structure:
 *   <storeDir>/
 *     <sanitized-name>/
 *       latest.json        → copy of the latest version
 *       v1.json
 *       v2.json
 *       ...
 *
 * Files are written to a temporary sibling and renamed into place, so a
 * failed write never leaves a partial document behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ErrorCode, StorageError, errorMessage } from '../core/errors';
import { KnowledgeGraph } from '../graph/knowledge-graph';
import { documentToGraph, graphToDocument } from '../graph/serialize';
import { createLogger } from '../utils/logger';
import { GraphSnapshot, GraphStore, SaveOptions } from './store.interface';

const logger = createLogger('file-store');

const envelopeSchema = z.object({
  name: z.string(),
  version: z.number().int().positive(),
  timestamp: z.string(),
  source: z.string().optional(),
});

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Sanitize a snapshot name to be a valid directory name.
 */
function sanitizeName(name: string): string {
  return name
    .replace(/[^a-zA-Z0-9_\-.]/g, '_')
    .replace(/_+/g, '_')
    .substring(0, 200);
}

function writeAtomic(filePath: string, data: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmpPath, data, 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw new StorageError(`Failed to write ${filePath}: ${errorMessage(error)}`, ErrorCode.STORAGE_WRITE_FAILED, {
      filePath,
    });
  }
}

// ─── File Store Implementation ──────────────────────────────────────────────

export class FileGraphStore implements GraphStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  private snapshotDir(name: string): string {
    return path.join(this.baseDir, sanitizeName(name));
  }

  private versionPath(name: string, version: number): string {
    return path.join(this.snapshotDir(name), `v${version}.json`);
  }

  private latestPath(name: string): string {
    return path.join(this.snapshotDir(name), 'latest.json');
  }

  /**
   * Save a graph as the next version. Writes both the versioned file and latest.json.
   */
  async save(name: string, graph: KnowledgeGraph, options: SaveOptions = {}): Promise<GraphSnapshot> {
    const dir = this.snapshotDir(name);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create ${dir}: ${errorMessage(error)}`, ErrorCode.STORAGE_WRITE_FAILED, {
        filePath: dir,
      });
    }

    const version = this.latestVersionNumber(name) + 1;
    const snapshot: GraphSnapshot = {
      name,
      version,
      timestamp: new Date().toISOString(),
      graph,
    };
    if (options.source) snapshot.source = options.source;

    const data = JSON.stringify(
      {
        name,
        version,
        timestamp: snapshot.timestamp,
        ...(options.source ? { source: options.source } : {}),
        ...graphToDocument(graph),
      },
      null,
      2
    );

    writeAtomic(this.versionPath(name, version), data);
    writeAtomic(this.latestPath(name), data);

    logger.debug({ name, version, endpoints: graph.size }, 'Graph snapshot saved');
    return snapshot;
  }

  async load(name: string): Promise<GraphSnapshot | null> {
    return this.readSnapshot(this.latestPath(name));
  }

  async loadVersion(name: string, version: number): Promise<GraphSnapshot | null> {
    return this.readSnapshot(this.versionPath(name, version));
  }

  /**
   * List all versions of a snapshot, sorted by version number ascending.
   */
  async listVersions(name: string): Promise<GraphSnapshot[]> {
    const snapshots: GraphSnapshot[] = [];

    for (const version of this.versionNumbers(name)) {
      const snapshot = this.readSnapshot(this.versionPath(name, version));
      if (snapshot) snapshots.push(snapshot);
    }

    return snapshots;
  }

  /**
   * List all snapshot names (directories holding a latest.json).
   */
  async listNames(): Promise<string[]> {
    if (!fs.existsSync(this.baseDir)) return [];

    const names: string[] = [];
    for (const entry of fs.readdirSync(this.baseDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const latestFile = path.join(this.baseDir, entry.name, 'latest.json');
      const snapshot = this.readSnapshot(latestFile);
      if (snapshot) names.push(snapshot.name);
    }

    return names.sort();
  }

  async delete(name: string): Promise<void> {
    const dir = this.snapshotDir(name);
    try {
      fs.rmSync(dir, { recursive: true, force: true });
    } catch (error) {
      throw new StorageError(`Failed to delete ${dir}: ${errorMessage(error)}`, ErrorCode.STORAGE_WRITE_FAILED, {
        filePath: dir,
      });
    }
  }

  // ─── Private Helpers ────────────────────────────────────────────────────

  private versionNumbers(name: string): number[] {
    const dir = this.snapshotDir(name);
    if (!fs.existsSync(dir)) return [];

    return fs
      .readdirSync(dir)
      .map((file) => file.match(/^v(\d+)\.json$/))
      .filter((match): match is RegExpMatchArray => match !== null)
      .map((match) => parseInt(match[1], 10))
      .sort((a, b) => a - b);
  }

  private latestVersionNumber(name: string): number {
    const versions = this.versionNumbers(name);
    return versions.length > 0 ? versions[versions.length - 1] : 0;
  }

  private readSnapshot(filePath: string): GraphSnapshot | null {
    if (!fs.existsSync(filePath)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new StorageError(`Failed to read ${filePath}: ${errorMessage(error)}`, ErrorCode.STORAGE_READ_FAILED, {
        filePath,
      });
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new StorageError(`Invalid snapshot envelope in ${filePath}`, ErrorCode.STORAGE_INVALID_DOCUMENT, {
        filePath,
      });
    }

    let graph: KnowledgeGraph;
    try {
      graph = documentToGraph(raw);
    } catch (error) {
      throw new StorageError(`${errorMessage(error)} (${filePath})`, ErrorCode.STORAGE_INVALID_DOCUMENT, {
        filePath,
      });
    }

    const snapshot: GraphSnapshot = {
      name: envelope.data.name,
      version: envelope.data.version,
      timestamp: envelope.data.timestamp,
      graph,
    };
    if (envelope.data.source) snapshot.source = envelope.data.source;
    return snapshot;
  }
}
