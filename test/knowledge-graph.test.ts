/**
 * Tests for the Knowledge Graph and its persisted form
 */

import { createKey } from '../src/core/endpoint-key';
import { ParseError } from '../src/core/errors';
import { EndpointDescriptor, ResourceEdge } from '../src/core/types';
import { GraphBuilder, KnowledgeGraph, mergeGraphs } from '../src/graph/knowledge-graph';
import { deserializeGraph, documentToGraph, graphToDocument, serializeGraph } from '../src/graph/serialize';

function endpoint(method: string, path: string, summary?: string): EndpointDescriptor {
  const descriptor: EndpointDescriptor = {
    key: createKey(method, path),
    parameters: [],
    responses: { '200': { kind: 'scalar', type: 'string' } },
  };
  if (summary) descriptor.summary = summary;
  return descriptor;
}

const edge: ResourceEdge = {
  from: 'POST /users',
  to: 'GET /users/{id}',
  resource: 'id',
  type: 'provides_identifier',
  rule: 'exact',
  confidence: 'high',
};

describe('Knowledge Graph', () => {
  test('looks endpoints up by identity', () => {
    const graph = new KnowledgeGraph([endpoint('GET', '/users/{id}'), endpoint('POST', '/users')]);

    expect(graph.size).toBe(2);
    expect(graph.keys()).toEqual(['GET /users/{id}', 'POST /users']);
    expect(graph.has('GET /users/{userId}')).toBe(true);
    expect(graph.get(createKey('get', '/users/{x}'))?.key.path).toBe('/users/{id}');
    expect(graph.get('not a key')).toBeUndefined();
    expect(graph.templates('get')).toEqual(['/users/{id}']);
  });

  test('is immutable', () => {
    const source = endpoint('GET', '/a');
    const graph = new KnowledgeGraph([source]);
    source.summary = 'changed afterwards';

    expect(graph.get('GET /a')?.summary).toBeUndefined();
    expect(Object.isFrozen(graph.get('GET /a'))).toBe(true);
    expect(graph.withEdges([edge]).edges).toEqual([edge]);
    expect(graph.edges).toEqual([]);
  });

  test('builder rejects duplicate identities', () => {
    const builder = new GraphBuilder().add(endpoint('GET', '/a/{id}'));
    expect(() => builder.add(endpoint('GET', '/a/{other}'), '#/paths/x')).toThrow(ParseError);
  });

  test('builder rejects duplicate parameter names', () => {
    const descriptor = endpoint('GET', '/a');
    descriptor.parameters = [
      { name: 'q', location: 'query', required: false, schema: { kind: 'unknown' } },
      { name: 'q', location: 'header', required: false, schema: { kind: 'unknown' } },
    ];
    expect(() => new GraphBuilder().add(descriptor)).toThrow('Duplicate parameter "q" on "GET /a"');
  });

  test('merging replaces matching endpoints and drops their edges', () => {
    const base = new KnowledgeGraph(
      [endpoint('POST', '/users'), endpoint('GET', '/users/{id}', 'old'), endpoint('GET', '/health')],
      [edge],
      { title: 'Base', version: '1' }
    );
    const incoming = new KnowledgeGraph([endpoint('GET', '/users/{id}', 'new')], [], { version: '2' });

    const merged = mergeGraphs(base, incoming);
    expect(merged.keys()).toEqual(['GET /health', 'GET /users/{id}', 'POST /users']);
    expect(merged.get('GET /users/{id}')?.summary).toBe('new');
    expect(merged.edges).toEqual([]);
    expect(merged.info).toEqual({ title: 'Base', version: '2' });
  });

  // ─── Serialization ────────────────────────────────────────────────────

  describe('Serialization', () => {
    test('round-trips endpoints, edges and info', () => {
      const graph = new KnowledgeGraph([endpoint('GET', '/users/{id}', 'Fetch'), endpoint('POST', '/users')], [edge], {
        title: 'Users',
        format: 'openapi3',
      });

      const restored = deserializeGraph(serializeGraph(graph));
      expect(restored.endpoints()).toEqual(graph.endpoints());
      expect(restored.edges).toEqual(graph.edges);
      expect(restored.info).toEqual(graph.info);
    });

    test('writes endpoints keyed by display key', () => {
      const document = graphToDocument(new KnowledgeGraph([endpoint('GET', '/a', 'A')]));
      expect(document).toEqual({
        endpoints: {
          'GET /a': { parameters: [], responses: { '200': { kind: 'scalar', type: 'string' } }, summary: 'A' },
        },
        edges: [],
      });
    });

    test('rejects invalid documents', () => {
      expect(() => documentToGraph({ endpoints: { 'GET /a': { responses: { '200': { kind: 'tuple' } } } } })).toThrow(
        TypeError
      );
      expect(() => documentToGraph({ endpoints: { nonsense: {} } })).toThrow(
        'Invalid graph document: invalid endpoint key "nonsense"'
      );
    });
  });
});
