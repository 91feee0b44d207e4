#!/usr/bin/env node

/**
 * api-surface CLI
 *
 * Commands:
 *   ingest    - Index a specification into a graph snapshot
 *   status    - Show the latest version of a snapshot
 *   breaking  - Compare two revisions and classify every change
 *   drift     - Compare a snapshot against recorded live traffic
 *   deps      - Infer resource dependencies between endpoints
 *   show      - Print the endpoints and edges of a snapshot
 *   list      - List stored snapshots
 *   tools     - List the analyzers and their parameters
 *   run       - Run an analyzer with a JSON parameter object
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { GraphSource } from './analyzers/context';
import { InspectorConfig, loadConfig } from './config';
import { meetsSeverity } from './core/differ';
import { ConfigurationError, errorMessage, isApiGraphError } from './core/errors';
import { schemaToString } from './core/normalizer';
import { AnalysisReport } from './core/reporter';
import { ReportFormat, Severity } from './core/types';
import { parseJson } from './formats';
import { ApiInspector } from './inspector';

const program = new Command();

program
  .name('api-surface')
  .description('Know how your API surface changes, drifts and depends on itself.')
  .version('1.0.0');

// ─── Common Options ─────────────────────────────────────────────────────────

interface CommonOptions {
  store?: string;
  format?: string;
  output?: string;
}

const REPORT_FORMATS: ReportFormat[] = ['console', 'json', 'markdown'];
const FAIL_LEVELS: Array<Severity | 'none'> = ['breaking', 'minor', 'patch', 'info', 'none'];

function toFormat(value: string | undefined): ReportFormat | undefined {
  if (value === undefined) return undefined;
  const format = REPORT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new ConfigurationError(`Unknown report format "${value}" (expected ${REPORT_FORMATS.join(', ')})`);
  }
  return format;
}

function toFailLevel(value: string): Severity | 'none' {
  const level = FAIL_LEVELS.find((l) => l === value);
  if (!level) {
    throw new ConfigurationError(`Unknown severity "${value}" (expected ${FAIL_LEVELS.join(', ')})`);
  }
  return level;
}

function setup(opts: CommonOptions): { config: InspectorConfig; inspector: ApiInspector } {
  const config = loadConfig({ overrides: { storeDir: opts.store, format: toFormat(opts.format) } });
  return { config, inspector: ApiInspector.fromConfig(config, process.cwd()) };
}

/**
 * A comparison side: an existing file is a specification, 'name@v3' a stored
 * version, anything else a snapshot name.
 */
function parseSource(value: string): GraphSource {
  if (fs.existsSync(path.resolve(value))) return { specPath: value };
  const versioned = value.match(/^(.+)@v(\d+)$/);
  if (versioned) return { snapshot: versioned[1], version: parseInt(versioned[2], 10) };
  return { snapshot: value };
}

function emit(inspector: ApiInspector, report: AnalysisReport, config: InspectorConfig, output?: string): void {
  const formatted = inspector.format(report, config.format);

  if (output) {
    fs.writeFileSync(output, formatted, 'utf-8');
    console.log(`📄 Report written to ${output}`);
  } else {
    console.log(formatted);
  }
}

function fail(error: unknown): never {
  if (isApiGraphError(error)) {
    console.error(`❌ ${error.toString()}`);
  } else {
    console.error(`❌ Error: ${errorMessage(error)}`);
  }
  process.exit(1);
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-s, --store <dir>', 'Graph store directory')
    .option('-f, --format <format>', 'Report format: console, json, markdown')
    .option('-o, --output <file>', 'Write report to file instead of stdout');
}

// ─── ingest Command ─────────────────────────────────────────────────────────

interface IngestCommandOptions extends CommonOptions {
  name?: string;
  merge?: boolean;
}

withCommonOptions(
  program
    .command('ingest')
    .description('Index an OpenAPI 3.x, Swagger 2.0 or Postman 2.x document into a snapshot')
    .argument('<spec>', 'Specification file (JSON or YAML)')
    .option('-n, --name <snapshot>', 'Snapshot name')
    .option('--merge', 'Merge into the latest version instead of replacing it')
).action(async (spec: string, opts: IngestCommandOptions) => {
  try {
    const { config, inspector } = setup(opts);
    const report = await inspector.index(spec, { snapshot: opts.name, merge: opts.merge === true });
    emit(inspector, report, config, opts.output);
  } catch (error) {
    fail(error);
  }
});

// ─── status Command ─────────────────────────────────────────────────────────

interface SnapshotCommandOptions extends CommonOptions {
  name?: string;
}

withCommonOptions(
  program
    .command('status')
    .description('Show the latest version of a snapshot')
    .option('-n, --name <snapshot>', 'Snapshot name')
).action(async (opts: SnapshotCommandOptions) => {
  try {
    const { config, inspector } = setup(opts);
    emit(inspector, await inspector.status(opts.name), config, opts.output);
  } catch (error) {
    fail(error);
  }
});

// ─── breaking Command ───────────────────────────────────────────────────────

interface BreakingCommandOptions extends CommonOptions {
  old: string;
  new: string;
  failOn: string;
  includeInfo?: boolean;
}

withCommonOptions(
  program
    .command('breaking')
    .description('Compare two revisions (spec files, "snapshot" or "snapshot@vN") and classify every change')
    .requiredOption('--old <source>', 'Baseline revision')
    .requiredOption('--new <source>', 'Candidate revision')
    .option('--fail-on <severity>', 'Exit with code 1 at or above: breaking, minor, patch, info, none', 'breaking')
    .option('--include-info', 'Keep records for shapes that could not be compared')
).action(async (opts: BreakingCommandOptions) => {
  try {
    const failOn = toFailLevel(opts.failOn);
    const { config, inspector } = setup(opts);
    const report = await inspector.detectBreakingChanges(
      parseSource(opts.old),
      parseSource(opts.new),
      opts.includeInfo === true
    );
    emit(inspector, report, config, opts.output);

    if (failOn !== 'none' && report.changes.some((c) => meetsSeverity(c.severity, failOn))) {
      process.exit(1);
    }
  } catch (error) {
    fail(error);
  }
});

// ─── drift Command ──────────────────────────────────────────────────────────

interface DriftCommandOptions extends CommonOptions {
  name?: string;
  observations: string;
  basePath?: string;
  endpoint?: string[];
  failOn: string;
  includeInfo?: boolean;
}

withCommonOptions(
  program
    .command('drift')
    .description('Compare a snapshot against recorded live-traffic observations')
    .option('-n, --name <snapshot>', 'Snapshot name')
    .requiredOption('--observations <file>', 'JSON file with an array of observations')
    .option('--base-path <prefix>', 'Prefix stripped from observed paths (e.g. "/v1")')
    .option('-e, --endpoint <keys...>', 'Only judge these endpoints (e.g. "GET /users/{id}")')
    .option('--fail-on <severity>', 'Exit with code 1 at or above: breaking, minor, patch, info, none', 'none')
    .option('--include-info', 'Keep records for shapes that could not be compared')
).action(async (opts: DriftCommandOptions) => {
  try {
    const failOn = toFailLevel(opts.failOn);
    const { config, inspector } = setup(opts);
    const report = await inspector.analyzeDrift({
      snapshot: opts.name,
      observationsPath: opts.observations,
      basePath: opts.basePath,
      endpoints: opts.endpoint,
      includeInformational: opts.includeInfo === true,
    });
    emit(inspector, report, config, opts.output);

    // Shadow and missing endpoints weigh as breaking
    const endpointFindings = report.shadow.length + report.missing.length > 0;
    if (
      failOn !== 'none' &&
      (endpointFindings || report.schemaDrift.some((c) => meetsSeverity(c.severity, failOn)))
    ) {
      process.exit(1);
    }
  } catch (error) {
    fail(error);
  }
});

// ─── deps Command ───────────────────────────────────────────────────────────

interface DepsCommandOptions extends CommonOptions {
  name?: string;
  persist?: boolean;
}

withCommonOptions(
  program
    .command('deps')
    .description('Infer which endpoints provide identifiers consumed by other endpoints')
    .option('-n, --name <snapshot>', 'Snapshot name')
    .option('--persist', 'Store the inferred edges as a new snapshot version')
).action(async (opts: DepsCommandOptions) => {
  try {
    const { config, inspector } = setup(opts);
    const report = await inspector.mapDependencies(opts.name, opts.persist === true);
    emit(inspector, report, config, opts.output);
  } catch (error) {
    fail(error);
  }
});

// ─── show Command ───────────────────────────────────────────────────────────

interface ShowCommandOptions {
  store?: string;
  name?: string;
  version?: number;
  schemas?: boolean;
}

program
  .command('show')
  .description('Print the endpoints and edges of a snapshot')
  .option('-n, --name <snapshot>', 'Snapshot name')
  .option('--version <n>', 'Version number (default: latest)', (value) => parseInt(value, 10))
  .option('--schemas', 'Include response schemas')
  .option('-s, --store <dir>', 'Graph store directory')
  .action(async (opts: ShowCommandOptions) => {
    try {
      const { config, inspector } = setup(opts);
      const name = opts.name ?? config.defaultSnapshot;
      const store = inspector.getStore();
      const snapshot = opts.version === undefined ? await store.load(name) : await store.loadVersion(name, opts.version);

      if (!snapshot) {
        console.log(`📭 No snapshot "${name}"${opts.version === undefined ? '' : ` v${opts.version}`} found`);
        return;
      }

      console.log(`📋 ${snapshot.name} v${snapshot.version} (${snapshot.timestamp})`);
      if (snapshot.source) console.log(`   Source: ${snapshot.source}`);
      console.log('');

      for (const endpoint of snapshot.graph.endpoints()) {
        console.log(`  • ${endpoint.key.method} ${endpoint.key.path}${endpoint.summary ? ` — ${endpoint.summary}` : ''}`);
        for (const param of endpoint.parameters) {
          console.log(`      ${param.location} ${param.name}${param.required ? '' : '?'}`);
        }
        if (opts.schemas) {
          for (const [status, schema] of Object.entries(endpoint.responses)) {
            console.log(`      ${status}: ${schemaToString(schema, 3).trimStart()}`);
          }
        }
      }

      if (snapshot.graph.edges.length > 0) {
        console.log('');
        for (const edge of snapshot.graph.edges) {
          console.log(`  ${edge.from} → ${edge.to} [${edge.type}: ${edge.resource}]`);
        }
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── list Command ───────────────────────────────────────────────────────────

program
  .command('list')
  .description('List stored snapshots')
  .option('-s, --store <dir>', 'Graph store directory')
  .action(async (opts: { store?: string }) => {
    try {
      const { inspector } = setup(opts);
      const names = await inspector.listSnapshots();

      if (names.length === 0) {
        console.log('📭 No snapshots stored yet.');
        return;
      }

      console.log(`📋 Snapshots (${names.length}):\n`);
      for (const name of names) {
        const versions = await inspector.listVersions(name);
        const latest = versions[versions.length - 1];
        console.log(`  • ${name}`);
        for (const v of versions) {
          console.log(`    v${v.version} — ${v.timestamp} (${v.graph.size} endpoints)${v.source ? ` from ${v.source}` : ''}`);
        }
        if (latest) console.log(`    Latest: v${latest.version}`);
        console.log('');
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── tools Command ──────────────────────────────────────────────────────────

program
  .command('tools')
  .description('List the analyzers that can be run by name')
  .action(() => {
    try {
      const { inspector } = setup({});
      for (const analyzer of inspector.registry.list()) {
        console.log(`  • ${analyzer.name}`);
        console.log(`    ${analyzer.description}`);
        console.log(`    Example: ${JSON.stringify(analyzer.example)}`);
        console.log('');
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── run Command ────────────────────────────────────────────────────────────

program
  .command('run')
  .description('Run an analyzer with a JSON parameter object and print the JSON result')
  .argument('<tool>', 'Analyzer name (see "tools")')
  .argument('[params]', 'JSON parameter object', '{}')
  .option('-s, --store <dir>', 'Graph store directory')
  .action(async (tool: string, params: string, opts: { store?: string }) => {
    try {
      const { inspector } = setup(opts);
      const result = await inspector.run(tool, parseJson(params));
      console.log(JSON.stringify(result, null, 2));
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parseAsync().catch(fail);
