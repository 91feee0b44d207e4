/**
 * Tests for the Breaking-Change Detector
 */

import { BreakingChangeAnalyzer, detectBreakingChanges } from '../src/analyzers/breaking-changes';
import { createKey } from '../src/core/endpoint-key';
import { ErrorCode, MissingInputError, ParseError } from '../src/core/errors';
import { KnowledgeGraph } from '../src/graph/knowledge-graph';
import { parseSpecDocument } from '../src/ingest';
import { MemoryGraphStore } from '../src/store/memory-store';

const V1 = `
openapi: 3.0.3
info:
  title: Users
  version: '1'
paths:
  /users/{id}:
    get:
      parameters:
        - name: id
          in: path
          required: true
          schema:
            type: string
      responses:
        '200':
          description: ok
          content:
            application/json:
              schema:
                type: object
                properties:
                  id:
                    type: string
                  email:
                    type: string
                required: [id, email]
  /health:
    get:
      responses:
        '200':
          description: ok
`;

const V2 = `
openapi: 3.0.3
info:
  title: Users
  version: '2'
paths:
  /users/{userId}:
    get:
      parameters:
        - name: userId
          in: path
          required: true
          schema:
            type: string
      responses:
        '200':
          description: ok
          content:
            application/json:
              schema:
                type: object
                properties:
                  id:
                    type: string
                  email:
                    type: string
                  name:
                    type: string
                required: [id]
  /status:
    get:
      responses:
        '200':
          description: ok
`;

describe('Breaking-Change Detector', () => {
  describe('detectBreakingChanges', () => {
    test('classifies and buckets every change', () => {
      const report = detectBreakingChanges(parseSpecDocument(V1).graph, parseSpecDocument(V2).graph, {
        oldLabel: 'v1',
        newLabel: 'v2',
      });

      expect(report.changes.map((c) => `${c.severity} ${c.type} ${c.endpoint} ${c.path ?? ''}`.trim())).toEqual([
        'breaking endpoint_removed GET /health',
        'patch parameter_renamed GET /users/{userId} parameters.userId',
        'minor field_became_optional GET /users/{userId} responses.200.email',
        'minor field_added GET /users/{userId} responses.200.name',
        'minor endpoint_added GET /status',
      ]);
      expect(report.breaking).toHaveLength(1);
      expect(report.minor).toHaveLength(3);
      expect(report.patch).toEqual([
        {
          kind: 'modified',
          type: 'parameter_renamed',
          endpoint: 'GET /users/{userId}',
          path: 'parameters.userId',
          description: 'Path parameter renamed: "{id}" → "{userId}"',
          severity: 'patch',
          before: 'id',
          after: 'userId',
        },
      ]);
      expect(report.counts).toEqual({
        added: 1,
        removed: 1,
        modified: 1,
        breaking: 1,
        minor: 3,
        patch: 1,
        info: 0,
        total: 5,
      });
      expect(report.endpoints).toEqual([
        { endpoint: 'GET /health', kind: 'removed', severity: 'breaking', changes: 1 },
        { endpoint: 'GET /users/{userId}', kind: 'modified', severity: 'minor', changes: 3 },
        { endpoint: 'GET /status', kind: 'added', severity: 'minor', changes: 1 },
      ]);
      expect(report.summary).toBe(
        'Breaking changes detected between v1 and v2: 5 change(s) (1 breaking, 3 minor, 1 patch, 0 info); ' +
          '1 endpoint(s) removed, 1 added, 1 modified.'
      );
    });

    test('reports identical graphs as unchanged', () => {
      const graph = parseSpecDocument(V1).graph;
      const report = detectBreakingChanges(graph, graph);
      expect(report.changes).toEqual([]);
      expect(report.summary).toBe('No changes between old and new.');
    });

    test('drops informational records unless asked', () => {
      const before = new KnowledgeGraph([
        { key: createKey('GET', '/feed'), parameters: [], responses: { '200': { kind: 'scalar', type: 'string' } } },
      ]);
      const after = new KnowledgeGraph([
        { key: createKey('GET', '/feed'), parameters: [], responses: { '200': { kind: 'unknown', reason: 'union' } } },
      ]);

      const quiet = detectBreakingChanges(before, after);
      expect(quiet.changes).toEqual([]);
      expect(quiet.summary).toBe('No changes between old and new.');

      const verbose = detectBreakingChanges(before, after, { includeInformational: true });
      expect(verbose.info).toMatchObject([
        { type: 'not_comparable', path: 'responses.200', description: 'Cannot compare "responses.200" (string → unknown)' },
      ]);
      expect(verbose.summary).toBe(
        'No breaking changes between old and new: 1 change(s) (0 breaking, 0 minor, 0 patch, 1 info); ' +
          '0 endpoint(s) removed, 0 added, 1 modified.'
      );
    });
  });

  // ─── Tool ─────────────────────────────────────────────────────────────

  describe('BreakingChangeAnalyzer', () => {
    async function createAnalyzer(): Promise<BreakingChangeAnalyzer> {
      const store = new MemoryGraphStore();
      await store.save('users-api', parseSpecDocument(V1).graph);
      return new BreakingChangeAnalyzer({ store, defaultSnapshot: 'users-api' });
    }

    test('compares a stored snapshot with an inline document', async () => {
      const analyzer = await createAnalyzer();
      const report = await analyzer.run({ old: { snapshot: 'users-api' }, new: { specContent: V2 } });

      expect(report.old).toBe('users-api@v1');
      expect(report.new).toBe('(inline)');
      expect(report.counts.breaking).toBe(1);
      expect(report.warnings).toEqual([]);
    });

    test('rejects unparseable documents instead of treating them as empty', async () => {
      const analyzer = await createAnalyzer();
      await expect(
        analyzer.run({ old: { snapshot: 'users-api' }, new: { specContent: '{"openapi": "3.0.0", "paths": {' } })
      ).rejects.toBeInstanceOf(ParseError);
    });

    test('fails when an input cannot be read', async () => {
      const analyzer = await createAnalyzer();
      await expect(
        analyzer.run({ old: { snapshot: 'users-api', version: 3 }, new: { specContent: V2 } })
      ).rejects.toThrow(new MissingInputError('No version 3 of snapshot "users-api" found for the old side'));
      await expect(
        analyzer.run({ old: { snapshot: 'users-api' }, new: { specPath: 'does-not-exist.yaml' } })
      ).rejects.toMatchObject({ code: ErrorCode.MISSING_INPUT });
    });

    test('validates the source objects', async () => {
      const analyzer = await createAnalyzer();
      await expect(analyzer.run({ old: { snapshot: 'users-api' } })).rejects.toMatchObject({
        code: ErrorCode.INVALID_PARAMETERS,
        issues: [{ path: 'new' }],
      });
    });
  });
});
