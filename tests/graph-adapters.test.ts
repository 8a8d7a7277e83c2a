/**
 * Tests for identity adapters and capability dispatch
 * 身份适配器与能力分派测试
 */

import { describe, test, expect } from 'vitest';
import { OutputArchive } from '../src/archive/OutputArchive';
import { decodeEnvelope } from '../src/archive/Codec';
import { isArchiveNode, isEncodingVisitor, isTrackingVisitor } from '../src/archive/Dispatch';
import type { Archive, Serializable } from '../src/archive/Types';
import { ArchiveFormat } from '../src/archive/Types';
import { field } from '../src/archive/Values';
import { RawPtr, rawPtr, thisRef } from '../src/graph/Adapters';
import { OutputTracker } from '../src/graph/OutputTracker';
import { loadGraph, saveGraph } from '../src/graph/Scope';
import { Pair, Vertex } from './graph-fixtures';

class VertexRef extends RawPtr<Vertex> {
  constructor() {
    super(Vertex);
  }
}

class Edge implements Serializable {
  to = new VertexRef();

  serialize(archive: Archive): void {
    archive.visit(this.to);
  }
}

/**
 * Points at another object's reference container rather than at a vertex
 * 指向另一个对象的引用容器而非顶点
 */
class Watcher implements Serializable {
  watched: VertexRef | null = null;

  serialize(archive: Archive): void {
    archive.visit(rawPtr(this, 'watched', VertexRef));
  }
}

/**
 * Composite whose own method happens to be called `accept`
 * 自身恰好拥有名为 `accept` 方法的复合类型
 */
class Invitation implements Serializable {
  guest = '';
  accepted = false;

  accept(): void {
    this.accepted = true;
  }

  serialize(archive: Archive): void {
    archive.visit(field(this, 'guest'), thisRef(this));
  }
}

describe('Identity Adapters', () => {
  describe('RawPtr', () => {
    test('should hold and replace a reference', () => {
      const ptr = new RawPtr(Vertex);
      const vertex = new Vertex('A');

      expect(ptr.isNull()).toBe(true);
      ptr.set(vertex);
      expect(ptr.get()).toBe(vertex);
      expect(ptr.deref()).toBe(vertex);
      expect(ptr.isNull()).toBe(false);
    });

    test('should refuse to dereference null', () => {
      expect(() => new RawPtr(Vertex).deref()).toThrow('Dereferenced a null RawPtr<Vertex>');
    });

    test('should restore its target through an archive', () => {
      const vertex = new Vertex('A', 1);
      const edge = new Edge();
      edge.to.set(vertex);

      const saved = saveGraph([vertex, edge], { format: ArchiveFormat.JSON });
      expect(saved.tokenCount).toBe(5);

      const loadedVertex = new Vertex();
      const loadedEdge = new Edge();
      loadGraph(saved.data, [loadedVertex, loadedEdge]);

      expect(loadedVertex.label).toBe('A');
      expect(loadedEdge.to.get()).toBe(loadedVertex);
    });

    test('should be a target for another pointer', () => {
      const vertex = new Vertex('v');
      const edge = new Edge();
      edge.to.set(vertex);
      const watcher = new Watcher();
      watcher.watched = edge.to;

      const { data } = saveGraph([vertex, edge, watcher], { format: ArchiveFormat.JSON });
      expect(decodeEnvelope(data, { strict: true }).tokens).toEqual(['v', 0, 3, 0, 1, 5]);

      const loadedVertex = new Vertex();
      const loadedEdge = new Edge();
      const loadedWatcher = new Watcher();
      loadGraph(data, [loadedVertex, loadedEdge, loadedWatcher]);

      expect(loadedWatcher.watched).toBe(loadedEdge.to);
      expect(loadedEdge.to.get()).toBe(loadedVertex);
    });
  });

  describe('Tracking Only', () => {
    test('should contribute nothing to the token stream', () => {
      const pair = new Pair();
      const archive = new OutputArchive().visit(thisRef(pair), rawPtr(pair, 'target', Vertex), new RawPtr(Vertex));

      expect(archive.tokenCount).toBe(0);
    });

    test('should occupy object-ids in the tracker', () => {
      const vertex = new Vertex();
      const ptr = new RawPtr(Vertex, vertex);
      const tracker = new OutputTracker().visit(ptr, thisRef(vertex));

      expect(tracker.idOf(ptr)).toBe(1);
      expect(tracker.idOf(vertex)).toBe(2);
      expect(tracker.stats).toEqual({ units: 2, pointers: 1 });
    });
  });

  describe('Dispatch', () => {
    test('should tell wrapper values from composites', () => {
      expect(isArchiveNode(thisRef(new Vertex()))).toBe(true);
      expect(isArchiveNode(new Vertex())).toBe(false);
      expect(isArchiveNode(new Invitation())).toBe(false);
    });

    test('should serialize a composite that has its own accept method', () => {
      const invitation = new Invitation();
      invitation.guest = 'ann';

      const saved = saveGraph([invitation], { format: ArchiveFormat.JSON });
      expect(saved.tokenCount).toBe(2);
      expect(invitation.accepted).toBe(false);

      const loaded = new Invitation();
      loadGraph(saved.data, [loaded]);

      expect(loaded.guest).toBe('ann');
      expect(loaded.accepted).toBe(false);
    });

    test('should tell the recipient variants apart', () => {
      const archive = new OutputArchive();
      const tracker = new OutputTracker();

      expect(isEncodingVisitor(archive)).toBe(true);
      expect(isTrackingVisitor(archive)).toBe(false);
      expect(isTrackingVisitor(tracker)).toBe(true);
      expect(isEncodingVisitor(tracker)).toBe(false);
    });
  });
});
