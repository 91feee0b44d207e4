/**
 * Tests for the Structural Diff Engine
 */

import {
  countChanges,
  diffEndpointSets,
  diffEndpoints,
  diffSchemas,
  endpointSeverities,
  maxSeverity,
  meetsSeverity,
} from '../src/core/differ';
import { createKey } from '../src/core/endpoint-key';
import { inferSchema, normalizeSchema } from '../src/core/normalizer';
import { EndpointDescriptor, ParameterDescriptor } from '../src/core/types';

function endpoint(
  method: string,
  path: string,
  overrides: Partial<Omit<EndpointDescriptor, 'key'>> = {}
): EndpointDescriptor {
  return { key: createKey(method, path), parameters: [], responses: {}, ...overrides };
}

function param(name: string, location: ParameterDescriptor['location'], required: boolean): ParameterDescriptor {
  return { name, location, required, schema: { kind: 'scalar', type: 'string' } };
}

const userSchema = normalizeSchema({
  type: 'object',
  properties: { id: { type: 'string' }, email: { type: 'string' } },
  required: ['id', 'email'],
});

describe('Structural Diff Engine', () => {
  // ─── Endpoint Sets ────────────────────────────────────────────────────

  describe('Endpoint sets', () => {
    test('reports nothing for identical sets', () => {
      const endpoints = [
        endpoint('GET', '/users/{id}', { parameters: [param('id', 'path', true)], responses: { '200': userSchema } }),
        endpoint('POST', '/users', { requestBody: userSchema, responses: { '201': userSchema } }),
      ];
      expect(diffEndpointSets(endpoints, endpoints)).toEqual([]);
    });

    test('removing a required parameter is one breaking modification', () => {
      const before = endpoint('GET', '/users/{id}', { parameters: [param('id', 'path', true)] });
      const after = endpoint('GET', '/users/{id}');

      expect(diffEndpointSets([before], [after])).toEqual([
        {
          kind: 'modified',
          type: 'parameter_removed',
          endpoint: 'GET /users/{id}',
          path: 'parameters.id',
          description: 'Parameter removed: "id" (path)',
          severity: 'breaking',
          before: 'path',
        },
      ]);
    });

    test('adding an optional query parameter is one minor modification', () => {
      const before = endpoint('GET', '/users');
      const after = endpoint('GET', '/users', { parameters: [param('page', 'query', false)] });

      const records = diffEndpointSets([before], [after]);
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        kind: 'modified',
        type: 'parameter_added_optional',
        severity: 'minor',
        path: 'parameters.page',
      });
    });

    test('adding a required parameter is breaking', () => {
      const before = endpoint('GET', '/users');
      const after = endpoint('GET', '/users', { parameters: [param('X-Tenant', 'header', true)] });

      expect(diffEndpointSets([before], [after])).toMatchObject([
        { type: 'parameter_added_required', severity: 'breaking', description: 'Required parameter added: "X-Tenant" (header)' },
      ]);
    });

    test('parameter requirement flips are classified by direction', () => {
      const optional = endpoint('GET', '/users', { parameters: [param('q', 'query', false)] });
      const required = endpoint('GET', '/users', { parameters: [param('q', 'query', true)] });

      expect(diffEndpointSets([optional], [required]).map((r) => r.severity)).toEqual(['breaking']);
      expect(diffEndpointSets([required], [optional]).map((r) => r.severity)).toEqual(['minor']);
    });

    test('removing an endpoint yields one removed record and nothing else for that key', () => {
      const kept = endpoint('GET', '/health');
      const removed = endpoint('DELETE', '/users/{id}', { parameters: [param('id', 'path', true)] });

      expect(diffEndpointSets([kept, removed], [kept])).toEqual([
        {
          kind: 'removed',
          type: 'endpoint_removed',
          endpoint: 'DELETE /users/{id}',
          description: 'Endpoint removed: DELETE /users/{id}',
          severity: 'breaking',
        },
      ]);
    });

    test('adding an endpoint is minor', () => {
      expect(diffEndpointSets([], [endpoint('GET', '/health')])).toEqual([
        {
          kind: 'added',
          type: 'endpoint_added',
          endpoint: 'GET /health',
          description: 'Endpoint added: GET /health',
          severity: 'minor',
        },
      ]);
    });

    test('orders removed, then modified, then added records by key', () => {
      const before = [
        endpoint('GET', '/b'),
        endpoint('GET', '/a'),
        endpoint('GET', '/m', { responses: { '200': inferSchema({ x: 1 }) } }),
        endpoint('GET', '/z'),
      ];
      const after = [
        endpoint('GET', '/m', { responses: { '200': inferSchema({ x: 1, y: 2 }) } }),
        endpoint('GET', '/d'),
        endpoint('GET', '/c'),
      ];

      expect(diffEndpointSets(before, after).map((r) => `${r.kind} ${r.endpoint}`)).toEqual([
        'removed GET /a',
        'removed GET /b',
        'removed GET /z',
        'modified GET /m',
        'added GET /c',
        'added GET /d',
      ]);
    });

    test('placeholder names do not change endpoint identity', () => {
      const before = endpoint('GET', '/users/{id}', { parameters: [param('id', 'path', true)] });
      const after = endpoint('GET', '/users/{userId}', { parameters: [param('userId', 'path', true)] });

      expect(diffEndpointSets([before], [after])).toEqual([
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
    });

    test('is deterministic across input order', () => {
      const before = [endpoint('GET', '/a'), endpoint('GET', '/b'), endpoint('POST', '/a')];
      const after = [endpoint('GET', '/c')];
      const first = JSON.stringify(diffEndpointSets(before, after));
      const second = JSON.stringify(diffEndpointSets([...before].reverse(), after));
      expect(second).toBe(first);
    });
  });

  // ─── Responses ────────────────────────────────────────────────────────

  describe('Responses', () => {
    test('a field added to a response is one minor record at its path', () => {
      const before = endpoint('GET', '/orders', {
        responses: { '200': normalizeSchema({ type: 'object', properties: { status: { type: 'string' } } }) },
      });
      const after = endpoint('GET', '/orders', {
        responses: {
          '200': normalizeSchema({
            type: 'object',
            properties: { status: { type: 'string' }, total: { type: 'number' } },
          }),
        },
      });

      expect(diffEndpoints(before, after)).toEqual([
        {
          kind: 'modified',
          type: 'field_added',
          endpoint: 'GET /orders',
          path: 'responses.200.total',
          description: 'Field added: "responses.200.total" (number)',
          severity: 'minor',
          after: 'number',
        },
      ]);
    });

    test('response status codes added and removed', () => {
      const before = endpoint('GET', '/users', { responses: { '200': userSchema } });
      const after = endpoint('GET', '/users', { responses: { '206': userSchema } });

      expect(diffEndpoints(before, after).map((r) => [r.type, r.severity])).toEqual([
        ['response_removed', 'breaking'],
        ['response_added', 'minor'],
      ]);
    });

    test('request body and summary changes', () => {
      const before = endpoint('POST', '/users', { requestBody: userSchema, summary: 'Create user' });
      const after = endpoint('POST', '/users', { summary: 'Create a user' });

      expect(diffEndpoints(before, after).map((r) => [r.path, r.type, r.severity])).toEqual([
        ['requestBody', 'request_body_removed', 'breaking'],
        ['summary', 'summary_changed', 'patch'],
      ]);
    });
  });

  // ─── Schemas ──────────────────────────────────────────────────────────

  describe('Schemas', () => {
    const required = normalizeSchema({
      type: 'object',
      properties: { email: { type: 'string' } },
      required: ['email'],
    });
    const optional = normalizeSchema({ type: 'object', properties: { email: { type: 'string' } } });

    test('required to optional is minor, the inverse is breaking', () => {
      expect(diffSchemas(required, optional)).toEqual([
        {
          type: 'field_became_optional',
          severity: 'minor',
          path: 'email',
          description: 'Field "email" changed from required to optional',
          before: 'required',
          after: 'optional',
        },
      ]);
      expect(diffSchemas(optional, required).map((c) => c.severity)).toEqual(['breaking']);
    });

    test('field removal is breaking', () => {
      const changes = diffSchemas(userSchema, optional);
      expect(changes.map((c) => [c.type, c.path])).toEqual([
        ['field_removed', 'id'],
        ['field_became_optional', 'email'],
      ]);
    });

    test('type changes stop the descent', () => {
      const before = inferSchema({ price: { amount: 1 } });
      const after = inferSchema({ price: '1.00' });
      expect(diffSchemas(before, after)).toEqual([
        {
          type: 'type_changed',
          severity: 'breaking',
          path: 'price',
          description: 'Type changed at "price" (object → string)',
          before: 'object',
          after: 'string',
        },
      ]);
    });

    test('array items are compared under a [] path', () => {
      const changes = diffSchemas(inferSchema({ tags: ['a'] }), inferSchema({ tags: [1] }));
      expect(changes.map((c) => c.path)).toEqual(['tags[]']);
    });

    test('enum narrowing is breaking and widening is minor', () => {
      const two = normalizeSchema({ type: 'string', enum: ['a', 'b'] });
      const three = normalizeSchema({ type: 'string', enum: ['a', 'b', 'c'] });

      expect(diffSchemas(three, two)).toMatchObject([
        { type: 'enum_narrowed', severity: 'breaking', description: '"(root)" no longer allows "c"' },
      ]);
      expect(diffSchemas(two, three)).toMatchObject([
        { type: 'enum_widened', severity: 'minor', description: '"(root)" now also allows "c"' },
      ]);
    });

    test('nullability and format changes', () => {
      const plain = normalizeSchema({ type: 'string', format: 'date' });
      const nullable = normalizeSchema({ type: 'string', format: 'date-time', nullable: true });

      expect(diffSchemas(plain, nullable, 'at').map((c) => [c.type, c.severity])).toEqual([
        ['nullable_added', 'breaking'],
        ['format_changed', 'patch'],
      ]);
    });

    test('unknown on one side is informational only', () => {
      expect(diffSchemas({ kind: 'unknown', reason: 'union' }, userSchema)).toMatchObject([
        { type: 'not_comparable', severity: 'info' },
      ]);
      expect(diffSchemas({ kind: 'unknown' }, { kind: 'unknown', reason: 'absent' })).toEqual([]);
    });

    test('observation mode ignores absent optional fields and unseen enum values', () => {
      const declared = normalizeSchema({
        type: 'object',
        properties: { id: { type: 'string' }, note: { type: 'string' }, state: { type: 'string', enum: ['a', 'b'] } },
        required: ['id', 'state'],
      });
      const observed = inferSchema({ id: 'x', state: 'a' });

      expect(diffSchemas(declared, observed, '', { mode: 'observation' })).toEqual([]);
    });

    test('observation mode flags a missing required field and an unexpected null', () => {
      const declared = normalizeSchema({
        type: 'object',
        properties: { id: { type: 'string' }, name: { type: 'string' } },
        required: ['id', 'name'],
      });
      const observed = inferSchema({ name: null });

      expect(diffSchemas(declared, observed, 'responses.200', { mode: 'observation' })).toEqual([
        {
          type: 'field_removed',
          severity: 'breaking',
          path: 'responses.200.id',
          description: 'Required field "responses.200.id" was not returned',
          before: 'string',
        },
        {
          type: 'nullable_added',
          severity: 'breaking',
          path: 'responses.200.name',
          description: '"responses.200.name" was null but is declared as non-null string',
          before: 'string',
          after: 'null',
        },
      ]);
    });
  });

  // ─── Summaries ────────────────────────────────────────────────────────

  describe('Summaries', () => {
    const records = diffEndpointSets(
      [endpoint('GET', '/a'), endpoint('GET', '/m', { parameters: [param('q', 'query', false)] })],
      [
        endpoint('GET', '/m', { parameters: [param('q', 'query', true), param('p', 'query', false)] }),
        endpoint('GET', '/z'),
      ]
    );

    test('counts records by kind and severity', () => {
      expect(countChanges(records)).toEqual({
        added: 1,
        removed: 1,
        modified: 1,
        breaking: 2,
        minor: 2,
        patch: 0,
        info: 0,
        total: 4,
      });
    });

    test('keeps the highest severity per endpoint', () => {
      expect(endpointSeverities(records)).toEqual([
        { endpoint: 'GET /a', kind: 'removed', severity: 'breaking', changes: 1 },
        { endpoint: 'GET /m', kind: 'modified', severity: 'breaking', changes: 2 },
        { endpoint: 'GET /z', kind: 'added', severity: 'minor', changes: 1 },
      ]);
    });

    test('severity helpers', () => {
      expect(maxSeverity(['patch', 'minor', 'info'])).toBe('minor');
      expect(maxSeverity([])).toBeNull();
      expect(meetsSeverity('breaking', 'minor')).toBe(true);
      expect(meetsSeverity('patch', 'minor')).toBe(false);
    });
  });
});
