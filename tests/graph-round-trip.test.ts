/**
 * End-to-end save and load of object graphs
 * 对象图的端到端保存与加载
 */

import { describe, test, expect, afterEach, vi } from 'vitest';
import { decodeEnvelope } from '../src/archive/Codec';
import { ArchiveFormat } from '../src/archive/Types';
import type { Archive, Serializable } from '../src/archive/Types';
import { field } from '../src/archive/Values';
import { rawPtr } from '../src/graph/Adapters';
import { GraphIdentityError } from '../src/graph/GraphIdentityError';
import { loadGraph, saveGraph } from '../src/graph/Scope';
import { DeferredPool, Graph, Marker, Pair, Plain, Vertex, buildCycle, captureError } from './graph-fixtures';

/**
 * Same layout as Pair, but its reference must point at a Marker
 * 与 Pair 布局相同，但其引用必须指向 Marker
 */
class MarkerPair implements Serializable {
  value = 0;
  target: Marker | null = null;

  serialize(archive: Archive): void {
    archive.visit(field(this, 'value'), rawPtr(this, 'target', Marker));
  }
}

describe('Graph Round Trip', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test.each([ArchiveFormat.JSON, ArchiveFormat.Binary])('should restore a cycle with an outside reference as %s', (format) => {
    const saved = saveGraph([buildCycle()], { format });
    expect(saved.tokenCount).toBe(12);
    expect(saved.format).toBe(format);

    const loaded = new Graph();
    loadGraph(saved.data, [loaded]);

    const [a, b, c] = loaded.vertices;
    expect(loaded.vertices.map(v => v.label)).toEqual(['A', 'B', 'C']);
    expect(loaded.vertices.map(v => v.weight)).toEqual([1, 2, 3]);
    expect(a.next).toBe(b);
    expect(b.next).toBe(c);
    expect(c.next).toBe(a);
    expect(loaded.entry).toBe(b);
  });

  test('should end the stream with the identity map', () => {
    const { data } = saveGraph([buildCycle()], { format: ArchiveFormat.JSON });

    expect(decodeEnvelope(data, { strict: true }).tokens.slice(-5)).toEqual([4, 6, 10, 2, 6]);
  });

  test('should restore a self reference', () => {
    const vertex = new Vertex('self', 7);
    vertex.next = vertex;

    const loaded = new Vertex();
    loadGraph(saveGraph([vertex]).data, [loaded]);

    expect(loaded.label).toBe('self');
    expect(loaded.next).toBe(loaded);
  });

  test('should restore many references to one object', () => {
    const graph = new Graph();
    const hub = new Vertex('hub');
    const x = new Vertex('x');
    const y = new Vertex('y');
    x.next = hub;
    y.next = hub;
    graph.vertices = [hub, x, y];
    graph.entry = hub;

    const loaded = new Graph();
    loadGraph(saveGraph([graph]).data, [loaded]);

    const [loadedHub, loadedX, loadedY] = loaded.vertices;
    expect(loadedHub.next).toBeNull();
    expect(loadedX.next).toBe(loadedHub);
    expect(loadedY.next).toBe(loadedHub);
    expect(loaded.entry).toBe(loadedHub);
  });

  test('should restore references across roots', () => {
    const graph = buildCycle();
    const pair = new Pair();
    pair.value = 3;
    pair.target = graph.vertices[2];

    const loadedGraph = new Graph();
    const loadedPair = new Pair();
    loadGraph(saveGraph([graph, pair]).data, [loadedGraph, loadedPair]);

    expect(loadedPair.value).toBe(3);
    expect(loadedPair.target).toBe(loadedGraph.vertices[2]);
  });

  test('should restore references into deferred data', () => {
    const pool = new DeferredPool();
    pool.pool = [new Vertex('p', 1), new Vertex('q', 2)];
    pool.head = pool.pool[1];

    const loaded = new DeferredPool();
    loadGraph(saveGraph([pool], { format: ArchiveFormat.JSON }).data, [loaded]);

    expect(loaded.pool.map(v => v.label)).toEqual(['p', 'q']);
    expect(loaded.head).toBe(loaded.pool[1]);
  });

  test('should log both identity map summaries when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const saved = saveGraph([buildCycle()], { verbose: true });
    loadGraph(saved.data, [new Graph()], { verbose: true });

    expect(log.mock.calls).toEqual([
      ['[GraphArchive] GraphOutputArchive completed on dispose'],
      ['[GraphArchive] Saved identity map: 4 pointer(s) over 14 unit(s)'],
      ['[GraphArchive] GraphInputArchive completed on dispose'],
      ['[GraphArchive] Resolved identity map: 4 pointer(s) over 14 unit(s)']
    ]);
  });

  describe('Mismatched Layouts', () => {
    test('should fail when the loaded graph has fewer pointers', () => {
      const { data } = saveGraph([new Pair()]);

      const error = captureError(() => loadGraph(data, [new Plain()]));

      expect(error).toBeInstanceOf(GraphIdentityError);
      expect(error).toMatchObject({
        reason: 'size-mismatch',
        message: 'Identity map holds 1 pointer(s) but the traversal produced 0'
      });
    });

    test('should fail when a pointer resolves to another type', () => {
      const vertex = new Vertex('v');
      const pair = new Pair();
      pair.target = vertex;
      const { data } = saveGraph([vertex, pair]);

      const error = captureError(() => loadGraph(data, [new Vertex(), new MarkerPair()]));

      expect(error).toMatchObject({
        reason: 'target-type-mismatch',
        message: 'Pointer 1 expects Marker but resolves to an instance of Vertex',
        details: { pointerIndex: 1 }
      });
    });
  });
});
