/**
 * Tests for the Drift Analyzer
 */

import * as fs from 'fs';
import * as path from 'path';
import { analyzeDrift, classifyStatus, declaredResponse, DriftAnalyzer } from '../src/analyzers/drift';
import { createKey } from '../src/core/endpoint-key';
import { ErrorCode, InvalidParametersError, MissingInputError } from '../src/core/errors';
import { normalizeSchema } from '../src/core/normalizer';
import { EndpointDescriptor, LiveObservation, SchemaNode } from '../src/core/types';
import { KnowledgeGraph } from '../src/graph/knowledge-graph';
import { MemoryGraphStore } from '../src/store/memory-store';

const TEST_DIR = path.join(__dirname, '.test-drift');

afterAll(() => {
  fs.rmSync(TEST_DIR, { recursive: true, force: true });
});

const userSchema = normalizeSchema({
  type: 'object',
  properties: { id: { type: 'string' }, name: { type: 'string' }, email: { type: 'string' } },
  required: ['id', 'name'],
});

const createdSchema = normalizeSchema({ type: 'object', properties: { id: { type: 'string' } }, required: ['id'] });

function endpoint(method: string, path: string, responses: Record<string, SchemaNode> = {}): EndpointDescriptor {
  return { key: createKey(method, path), parameters: [], responses };
}

const cleanGraph = new KnowledgeGraph([
  endpoint('GET', '/users/{id}', { '200': userSchema, '404': { kind: 'unknown', reason: 'absent' } }),
  endpoint('POST', '/users', { '201': createdSchema }),
]);

const fullGraph = new KnowledgeGraph([
  endpoint('GET', '/users/{id}', { '200': userSchema, '404': { kind: 'unknown', reason: 'absent' } }),
  endpoint('POST', '/users', { '201': createdSchema }),
  endpoint('DELETE', '/users/{id}', { '204': { kind: 'unknown', reason: 'absent' } }),
  endpoint('GET', '/admin/stats', { '200': normalizeSchema({ type: 'object' }) }),
  endpoint('GET', '/reports', { '200': normalizeSchema({ type: 'array', items: { type: 'string' } }) }),
  endpoint('GET', '/legacy', { '200': normalizeSchema({ type: 'string' }) }),
]);

const traffic: LiveObservation[] = [
  { method: 'GET', path: '/users/7', status: 200, body: { id: '7', name: null } },
  { method: 'GET', path: '/users/8', status: 500, body: { error: 'boom' } },
  { method: 'POST', path: '/users', status: 201, expectedStatus: 201, body: { id: '1' } },
  { method: 'DELETE', path: '/users/7', status: 405 },
  { method: 'GET', path: '/admin/stats', status: 403 },
  { method: 'GET', path: '/reports', status: null, error: 'ETIMEDOUT' },
  { method: 'GET', path: '/internal/debug', status: 200, body: 'ok' },
  { method: 'GET', path: '/ghost', status: 404 },
];

describe('Drift Analyzer', () => {
  // ─── Evidence ─────────────────────────────────────────────────────────

  describe('Evidence policy', () => {
    test('classifies statuses', () => {
      expect(classifyStatus(200)).toBe('confirmed');
      expect(classifyStatus(500)).toBe('confirmed');
      expect(classifyStatus(401)).toBe('denied');
      expect(classifyStatus(403)).toBe('denied');
      expect(classifyStatus(404)).toBe('not_implemented');
      expect(classifyStatus(405)).toBe('not_implemented');
      expect(classifyStatus(501)).toBe('not_implemented');
      expect(classifyStatus(null)).toBe('unreachable');
    });

    test('looks up declared responses by code, class, then default', () => {
      const responses: Record<string, SchemaNode> = {
        '200': { kind: 'scalar', type: 'string' },
        '4XX': { kind: 'scalar', type: 'number' },
        default: { kind: 'unknown' },
      };
      expect(declaredResponse(responses, 200)?.key).toBe('200');
      expect(declaredResponse(responses, 422)?.key).toBe('4XX');
      expect(declaredResponse(responses, 503)?.key).toBe('default');
      expect(declaredResponse({}, 200)).toBeNull();
    });
  });

  // ─── Analysis ─────────────────────────────────────────────────────────

  describe('analyzeDrift', () => {
    test('observations that match the graph produce no findings', () => {
      const report = analyzeDrift(cleanGraph, [
        { method: 'GET', path: '/users/1', status: 200, body: { id: '1', name: 'Ada' } },
        { method: 'POST', path: '/users', status: 201, body: { id: '2' } },
      ]);

      expect(report.shadow).toEqual([]);
      expect(report.missing).toEqual([]);
      expect(report.unresolved).toEqual([]);
      expect(report.schemaDrift).toEqual([]);
      expect(report.summary).toBe('No drift: 2 of 2 endpoint(s) confirmed by 2 observation(s).');
    });

    test('classifies every kind of finding', () => {
      const report = analyzeDrift(fullGraph, traffic, { snapshot: 'users-api@v1' });

      expect(report.snapshot).toBe('users-api@v1');
      expect(report.shadow).toEqual([{ endpoint: 'GET /internal/debug', observations: 1, statuses: [200] }]);
      expect(report.missing).toEqual([
        { endpoint: 'DELETE /users/{id}', reason: 'not_implemented', statuses: [405] },
        { endpoint: 'GET /legacy', reason: 'not_observed', statuses: [] },
      ]);
      expect(report.unresolved).toEqual([
        { endpoint: 'GET /admin/stats', reason: 'access_denied', statuses: [403], errors: [] },
        { endpoint: 'GET /reports', reason: 'unreachable', statuses: [], errors: ['ETIMEDOUT'] },
      ]);
      expect(report.schemaDrift).toEqual([
        {
          kind: 'modified',
          type: 'nullable_added',
          endpoint: 'GET /users/{id}',
          path: 'responses.200.name',
          description: '"responses.200.name" was null but is declared as non-null string',
          severity: 'breaking',
          before: 'string',
          after: 'null',
        },
        {
          kind: 'modified',
          type: 'response_undeclared',
          endpoint: 'GET /users/{id}',
          path: 'responses.500',
          description: 'Status 500 was returned but is not declared',
          severity: 'minor',
          after: '500',
        },
      ]);
      expect(report.counts).toEqual({
        observations: 8,
        endpoints: 6,
        confirmed: 2,
        shadow: 1,
        missing: 2,
        unresolved: 2,
        schemaDrift: 2,
        breaking: 1,
        minor: 1,
        info: 0,
      });
      expect(report.summary).toBe(
        'Drift detected: 1 shadow, 2 missing, 2 unresolved, 2 schema drift record(s) (1 breaking, 1 minor); ' +
          '2 of 6 endpoint(s) confirmed by 8 observation(s).'
      );
    });

    test('does not depend on observation order', () => {
      const forward = analyzeDrift(fullGraph, traffic);
      const backward = analyzeDrift(fullGraph, [...traffic].reverse());
      expect(JSON.stringify(backward)).toBe(JSON.stringify(forward));
    });

    test('a confirmed call outweighs denied and failed calls', () => {
      const report = analyzeDrift(cleanGraph, [
        { method: 'GET', path: '/users/1', status: 401 },
        { method: 'GET', path: '/users/1', status: null, error: 'ECONNRESET' },
        { method: 'GET', path: '/users/1', status: 200, body: { id: '1', name: 'Ada' } },
      ]);
      expect(report.counts.confirmed).toBe(1);
      expect(report.unresolved).toEqual([]);
      expect(report.missing).toEqual([{ endpoint: 'POST /users', reason: 'not_observed', statuses: [] }]);
    });

    test('access denied wins over not implemented', () => {
      const report = analyzeDrift(cleanGraph, [
        { method: 'POST', path: '/users', status: 404 },
        { method: 'POST', path: '/users', status: 403 },
      ]);
      expect(report.unresolved).toEqual([
        { endpoint: 'POST /users', reason: 'access_denied', statuses: [403, 404], errors: [] },
      ]);
    });

    test('strips the base path and honours collector templates', () => {
      const report = analyzeDrift(
        cleanGraph,
        [
          { method: 'get', path: '/api/users/1', status: 200, body: { id: '1', name: 'Ada' } },
          { method: 'POST', path: '/somewhere/else', template: '/users', status: 201, body: { id: '2' } },
        ],
        { basePath: '/api' }
      );
      expect(report.counts.confirmed).toBe(2);
      expect(report.shadow).toEqual([]);
    });

    test('restricts verdicts to the requested endpoints', () => {
      const report = analyzeDrift(fullGraph, traffic, { endpoints: ['DELETE /users/{id}'] });
      expect(report.counts.endpoints).toBe(1);
      expect(report.missing).toEqual([{ endpoint: 'DELETE /users/{id}', reason: 'not_implemented', statuses: [405] }]);
      expect(report.unresolved).toEqual([]);
      expect(report.schemaDrift).toEqual([]);
      expect(report.shadow).toHaveLength(1);
    });

    test('reports an unexpected status once', () => {
      const report = analyzeDrift(cleanGraph, [
        { method: 'POST', path: '/users', status: 201, expectedStatus: 200, body: { id: '1' } },
        { method: 'POST', path: '/users', status: 201, expectedStatus: 200, body: { id: '2' } },
      ]);
      expect(report.schemaDrift).toEqual([
        {
          kind: 'modified',
          type: 'status_mismatch',
          endpoint: 'POST /users',
          path: 'responses.201',
          description: 'Expected status 200 but received 201',
          severity: 'minor',
          before: '200',
          after: '201',
        },
      ]);
    });

    test('keeps informational records only on request', () => {
      const graph = new KnowledgeGraph([endpoint('GET', '/mixed', { '200': { kind: 'unknown', reason: 'union' } })]);
      const observations: LiveObservation[] = [{ method: 'GET', path: '/mixed', status: 200, body: { a: 1 } }];

      expect(analyzeDrift(graph, observations).schemaDrift).toEqual([]);
      expect(analyzeDrift(graph, observations, { includeInformational: true }).schemaDrift).toMatchObject([
        { type: 'not_comparable', severity: 'info', description: 'Cannot compare "responses.200" (unknown → object)' },
      ]);
    });

    test('reports a field whose type varies across samples', () => {
      const graph = new KnowledgeGraph([
        endpoint('GET', '/things/{id}', {
          '200': normalizeSchema({
            type: 'object',
            properties: { id: { type: 'string' }, tags: { type: 'array', items: { type: 'string' } } },
            required: ['id', 'tags'],
          }),
        }),
      ]);
      const report = analyzeDrift(graph, [
        { method: 'GET', path: '/things/1', status: 200, body: { id: '1', tags: ['a'] } },
        { method: 'GET', path: '/things/2', status: 200, body: { id: 2, tags: ['b', 3] } },
      ]);

      expect(report.schemaDrift).toEqual([
        {
          kind: 'modified',
          type: 'type_changed',
          endpoint: 'GET /things/{id}',
          path: 'responses.200.id',
          description: 'Type changed at "responses.200.id" (string → number)',
          severity: 'breaking',
          before: 'string',
          after: 'number',
        },
        {
          kind: 'modified',
          type: 'type_changed',
          endpoint: 'GET /things/{id}',
          path: 'responses.200.tags[]',
          description: 'Type changed at "responses.200.tags[]" (string → number)',
          severity: 'breaking',
          before: 'string',
          after: 'number',
        },
      ]);
      expect(report.summary).toBe(
        'Drift detected: 0 shadow, 0 missing, 0 unresolved, 2 schema drift record(s) (2 breaking, 0 minor); ' +
          '1 of 1 endpoint(s) confirmed by 2 observation(s).'
      );
    });

    test('reports mixed array items within a single sample', () => {
      const graph = new KnowledgeGraph([
        endpoint('GET', '/tags', { '200': normalizeSchema({ type: 'array', items: { type: 'string' } }) }),
      ]);
      const report = analyzeDrift(graph, [{ method: 'GET', path: '/tags', status: 200, body: ['b', 3, true] }]);

      expect(report.schemaDrift.map((r) => `${r.severity} ${r.path} ${r.after}`)).toEqual([
        'breaking responses.200[] boolean',
        'breaking responses.200[] number',
      ]);
    });

    test('decodes recorded text bodies before comparing', () => {
      const report = analyzeDrift(cleanGraph, [
        { method: 'GET', path: '/users/1', status: 200, body: '{"id": 1, "name": "Ada"}' },
      ]);
      expect(report.schemaDrift).toMatchObject([
        { type: 'type_changed', path: 'responses.200.id', description: 'Type changed at "responses.200.id" (string → number)' },
      ]);
    });
  });

  // ─── Tool ─────────────────────────────────────────────────────────────

  describe('DriftAnalyzer', () => {
    async function createAnalyzer(): Promise<DriftAnalyzer> {
      const store = new MemoryGraphStore();
      await store.save('users-api', cleanGraph);
      return new DriftAnalyzer({ store, defaultSnapshot: 'users-api', cwd: TEST_DIR });
    }

    test('analyzes inline observations against the stored graph', async () => {
      const analyzer = await createAnalyzer();
      const report = await analyzer.run({
        observations: [{ method: 'GET', path: '/users/1', status: 200, body: { id: '1', name: 'Ada' } }],
      });
      expect(report.snapshot).toBe('users-api@v1');
      expect(report.counts.confirmed).toBe(1);
    });

    test('reads observations from a file', async () => {
      fs.mkdirSync(TEST_DIR, { recursive: true });
      fs.writeFileSync(
        path.join(TEST_DIR, 'traffic.json'),
        JSON.stringify({ observations: [{ method: 'POST', path: '/users', status: 201, body: { id: '3' } }] }),
        'utf-8'
      );

      const analyzer = await createAnalyzer();
      const report = await analyzer.run({ observationsPath: 'traffic.json' });
      expect(report.counts.observations).toBe(1);
      expect(report.missing).toEqual([{ endpoint: 'GET /users/{id}', reason: 'not_observed', statuses: [] }]);
    });

    test('requires observations', async () => {
      const analyzer = await createAnalyzer();
      await expect(analyzer.run({})).rejects.toMatchObject({
        code: ErrorCode.INVALID_PARAMETERS,
        issues: [{ path: 'observations', message: 'Either "observations" or "observationsPath" is required' }],
      });
    });

    test('rejects malformed observations', async () => {
      const analyzer = await createAnalyzer();
      await expect(analyzer.run({ observations: [{ method: 'GET', status: 200 }] })).rejects.toBeInstanceOf(
        InvalidParametersError
      );
    });

    test('fails when the snapshot does not exist', async () => {
      const analyzer = await createAnalyzer();
      await expect(analyzer.run({ snapshot: 'nope', observations: [] })).rejects.toThrow(
        new MissingInputError('No snapshot "nope" found for the graph side')
      );
    });
  });
});
