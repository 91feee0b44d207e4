/**
 * Analyzer registry. Analyzers are registered explicitly by whoever wires
 * the application together; there is no process-wide instance.
 */

import { AnalyzerNotFoundError, ConfigurationError } from '../core/errors';
import { GraphStore } from '../store/store.interface';
import { Analyzer } from './analyzer';
import { BreakingChangeAnalyzer } from './breaking-changes';
import { DependencyAnalyzer } from './dependencies';
import { DriftAnalyzer } from './drift';
import { IngestAnalyzer } from './ingest';

export class AnalyzerRegistry {
  private readonly analyzers = new Map<string, Analyzer>();

  register(analyzer: Analyzer): this {
    if (this.analyzers.has(analyzer.name)) {
      throw new ConfigurationError(`Analyzer "${analyzer.name}" is already registered`, { name: analyzer.name });
    }
    this.analyzers.set(analyzer.name, analyzer);
    return this;
  }

  has(name: string): boolean {
    return this.analyzers.has(name);
  }

  get(name: string): Analyzer {
    const analyzer = this.analyzers.get(name);
    if (!analyzer) throw new AnalyzerNotFoundError(name, this.names());
    return analyzer;
  }

  names(): string[] {
    return Array.from(this.analyzers.keys()).sort();
  }

  list(): Analyzer[] {
    return this.names().map((name) => this.get(name));
  }

  /**
   * Run an analyzer by name with a JSON parameter object.
   */
  async run(name: string, params: unknown): Promise<unknown> {
    return this.get(name).run(params);
  }
}

export interface RegistryOptions {
  store: GraphStore;
  defaultSnapshot?: string;
  maxDepth?: number;
  creationVerbs?: string[];
  cwd?: string;
}

export interface BuiltinAnalyzers {
  ingest: IngestAnalyzer;
  breaking: BreakingChangeAnalyzer;
  drift: DriftAnalyzer;
  dependencies: DependencyAnalyzer;
}

/**
 * The four built-in tools, all reading the same store.
 */
export function createBuiltinAnalyzers(options: RegistryOptions): BuiltinAnalyzers {
  const context = {
    store: options.store,
    defaultSnapshot: options.defaultSnapshot ?? 'default',
    maxDepth: options.maxDepth,
    cwd: options.cwd,
  };

  return {
    ingest: new IngestAnalyzer(context),
    breaking: new BreakingChangeAnalyzer(context),
    drift: new DriftAnalyzer(context),
    dependencies: new DependencyAnalyzer(context, options.creationVerbs),
  };
}

export function registryOf(analyzers: BuiltinAnalyzers): AnalyzerRegistry {
  return new AnalyzerRegistry()
    .register(analyzers.ingest)
    .register(analyzers.breaking)
    .register(analyzers.drift)
    .register(analyzers.dependencies);
}

export function createDefaultRegistry(options: RegistryOptions): AnalyzerRegistry {
  return registryOf(createBuiltinAnalyzers(options));
}
