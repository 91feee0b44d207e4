/**
 * Tests for the Report Generator
 */

import chalk from 'chalk';
import { detectBreakingChanges } from '../src/analyzers/breaking-changes';
import { DependencyReport, HEURISTIC_NOTICE } from '../src/analyzers/dependencies';
import { DriftReport } from '../src/analyzers/drift';
import { IndexReport } from '../src/analyzers/ingest';
import { createKey } from '../src/core/endpoint-key';
import { formatReport } from '../src/core/reporter';
import { KnowledgeGraph } from '../src/graph/knowledge-graph';

const BAR = '━'.repeat(50);

beforeAll(() => {
  chalk.level = 0;
});

const breakingReport = detectBreakingChanges(
  new KnowledgeGraph([
    { key: createKey('GET', '/a'), parameters: [], responses: { '200': { kind: 'scalar', type: 'string' } } },
    {
      key: createKey('GET', '/b'),
      parameters: [],
      responses: {
        '200': { kind: 'object', properties: { id: { kind: 'scalar', type: 'number' } }, required: ['id'] },
      },
    },
  ]),
  new KnowledgeGraph([
    { key: createKey('GET', '/b'), parameters: [], responses: { '200': { kind: 'object', properties: {}, required: [] } } },
    { key: createKey('GET', '/c'), parameters: [], responses: {} },
  ]),
  { oldLabel: 'v1', newLabel: 'v2' }
);

const BREAKING_SUMMARY =
  'Breaking changes detected between v1 and v2: 3 change(s) (2 breaking, 1 minor, 0 patch, 0 info); ' +
  '1 endpoint(s) removed, 1 added, 1 modified.';

const driftReport: DriftReport = {
  type: 'drift',
  snapshot: 'users-api@v2',
  counts: {
    observations: 6,
    endpoints: 3,
    confirmed: 1,
    shadow: 1,
    missing: 1,
    unresolved: 1,
    schemaDrift: 1,
    breaking: 0,
    minor: 1,
    info: 0,
  },
  shadow: [{ endpoint: 'GET /debug', observations: 2, statuses: [200, 500] }],
  missing: [{ endpoint: 'GET /legacy', reason: 'not_observed', statuses: [] }],
  unresolved: [{ endpoint: 'GET /admin', reason: 'access_denied', statuses: [403], errors: [] }],
  schemaDrift: [
    {
      kind: 'modified',
      type: 'response_undeclared',
      endpoint: 'GET /users/{id}',
      path: 'responses.500',
      description: 'Status 500 was returned but is not declared',
      severity: 'minor',
      after: '500',
    },
  ],
  summary: 'Drift detected: 1 shadow, 1 missing, 1 unresolved, 1 schema drift record(s) (0 breaking, 1 minor).',
};

const dependencyReport: DependencyReport = {
  type: 'dependencies',
  snapshot: 'users-api@v1',
  counts: { endpoints: 2, producers: 1, consumers: 1, edges: 1, high: 1, medium: 0, low: 0 },
  edges: [
    {
      from: 'POST /users',
      to: 'GET /users/{id}',
      resource: 'id',
      type: 'provides_identifier',
      rule: 'exact',
      confidence: 'high',
    },
  ],
  requirements: [],
  summary: `Inferred 1 dependency edge(s). ${HEURISTIC_NOTICE}`,
};

describe('Report Generator', () => {
  // ─── JSON Format ──────────────────────────────────────────────────────

  describe('JSON format', () => {
    test('serializes the report unchanged', () => {
      const output = formatReport(breakingReport, 'json');
      expect(output).toBe(JSON.stringify(breakingReport, null, 2));
      expect(JSON.parse(output)).toEqual(breakingReport);
    });
  });

  // ─── Console Format ───────────────────────────────────────────────────

  describe('Console format', () => {
    test('lists breaking-change records with severity labels', () => {
      expect(formatReport(breakingReport, 'console').split('\n')).toEqual([
        '',
        '🔍 Breaking Change Report: v1 → v2',
        BAR,
        '🔴 BREAKING GET /a: Endpoint removed: GET /a',
        '🔴 BREAKING GET /b responses.200.id: Field removed: "responses.200.id" (was: number)',
        '🟡 MINOR    GET /c: Endpoint added: GET /c',
        BAR,
        'Summary: 2 breaking | 1 minor | 0 patch | 0 info',
        BREAKING_SUMMARY,
        '',
      ]);
    });

    test('groups drift findings', () => {
      expect(formatReport(driftReport, 'console').split('\n')).toEqual([
        '',
        '🔍 Drift Report: users-api@v2',
        BAR,
        '👻 SHADOW   GET /debug (2 call(s), status 200, 500)',
        '❌ MISSING  GET /legacy (not observed)',
        '❔ UNRESOLVED GET /admin (access denied)',
        '🟡 MINOR    GET /users/{id} responses.500: Status 500 was returned but is not declared',
        BAR,
        driftReport.summary,
        '',
      ]);
    });

    test('shows a clean drift report', () => {
      const clean: DriftReport = { ...driftReport, shadow: [], missing: [], unresolved: [], schemaDrift: [] };
      expect(formatReport(clean, 'console')).toContain('  ✅ No drift detected');
    });

    test('lists dependency edges with rule and confidence', () => {
      expect(formatReport(dependencyReport, 'console')).toContain(
        '  • POST /users → GET /users/{id} (via id, exact, high)'
      );
    });
  });

  // ─── Markdown Format ──────────────────────────────────────────────────

  describe('Markdown format', () => {
    test('renders a breaking-change report', () => {
      expect(formatReport(breakingReport, 'markdown')).toBe(
        [
          '# 🔍 Breaking Change Report: v1 → v2',
          '',
          `**Summary:** ${BREAKING_SUMMARY}`,
          '',
          '| Breaking | Minor | Patch | Info |',
          '|---|---|---|---|',
          '| 2 | 1 | 0 | 0 |',
          '',
          '## 🔴 Breaking Changes',
          '',
          '- `GET /a`: Endpoint removed: GET /a',
          '- `GET /b` **responses.200.id**: Field removed: "responses.200.id" (was: number)',
          '  - Before: `number` → After: `N/A`',
          '',
          '## 🟡 Minor Changes',
          '',
          '- `GET /c`: Endpoint added: GET /c',
          '',
        ].join('\n')
      );
    });

    test('renders a drift report', () => {
      expect(formatReport(driftReport, 'markdown')).toBe(
        [
          '# 🔍 Drift Report: users-api@v2',
          '',
          `**Summary:** ${driftReport.summary}`,
          '',
          '## 👻 Shadow Endpoints',
          '',
          '- `GET /debug` (status 200, 500)',
          '',
          '## ❌ Missing Endpoints',
          '',
          '- `GET /legacy` (not_observed)',
          '',
          '## ❔ Unresolved (insufficient evidence)',
          '',
          '- `GET /admin` (access_denied)',
          '',
          '## 🟡 Minor Changes',
          '',
          '- `GET /users/{id}` **responses.500**: Status 500 was returned but is not declared',
          '  - Before: `N/A` → After: `500`',
          '',
        ].join('\n')
      );
    });

    test('renders a dependency table', () => {
      const output = formatReport(dependencyReport, 'markdown');
      expect(output.split('\n').slice(4, 7)).toEqual([
        '| From | To | Resource | Rule | Confidence |',
        '|---|---|---|---|---|',
        '| `POST /users` | `GET /users/{id}` | id | exact | high |',
      ]);
    });

    test('lists ingestion warnings', () => {
      const report: IndexReport = {
        type: 'ingest',
        action: 'index',
        snapshot: 'users-api',
        version: 1,
        format: 'openapi3',
        specVersion: '3.0.3',
        endpoints: 4,
        merged: false,
        warnings: ['Schema truncated at #/components/schemas/Node'],
        summary: 'Indexed 4 endpoint(s) from openapi3 3.0.3 into "users-api" v1. 1 warning(s).',
      };
      expect(formatReport(report, 'markdown')).toBe(
        [
          '# 📥 Specification Indexed',
          '',
          'Indexed 4 endpoint(s) from openapi3 3.0.3 into "users-api" v1. 1 warning(s).',
          '',
          '- ⚠️ Schema truncated at #/components/schemas/Node',
          '',
        ].join('\n')
      );
    });
  });
});
