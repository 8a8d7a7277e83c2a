/**
 * Tests for the save and load identity trackers
 * 保存端与加载端身份跟踪器测试
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { OutputArchive } from '../src/archive/OutputArchive';
import { InputArchive } from '../src/archive/InputArchive';
import { ArchiveFormat } from '../src/archive/Types';
import { thisRef } from '../src/graph/Adapters';
import { GraphIdentityError } from '../src/graph/GraphIdentityError';
import { IdentityMap } from '../src/graph/IdentityMap';
import { InputTracker } from '../src/graph/InputTracker';
import { OutputTracker } from '../src/graph/OutputTracker';
import { Marker, Pair, Vertex, buildCycle, captureError } from './graph-fixtures';

/**
 * Archive positioned at an identity map holding the given ids
 * 定位在包含给定ID的身份映射处的存档
 */
function identityMapArchive(ids: number[]): InputArchive {
  const output = new OutputArchive({ format: ArchiveFormat.JSON }).visit(new IdentityMap(ids));
  return new InputArchive(output.finish().data);
}

describe('Identity Trackers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('OutputTracker', () => {
    let tracker: OutputTracker;

    beforeEach(() => {
      tracker = new OutputTracker();
    });

    test('should assign object-ids in traversal order', () => {
      const graph = buildCycle();
      const [a, b, c] = graph.vertices;

      tracker.visit(graph);

      // size tag 1, then four units per vertex
      expect(tracker.idOf(a)).toBe(2);
      expect(tracker.idOf(b)).toBe(6);
      expect(tracker.idOf(c)).toBe(10);
      expect(tracker.idOf(graph)).toBeUndefined();
      expect(tracker.stats).toEqual({ units: 14, pointers: 4 });
    });

    test('should keep the last object-id of a repeat visit', () => {
      const marker = new Marker();

      tracker.visit(marker, new Pair(), marker);

      expect(tracker.idOf(marker)).toBe(4);
    });

    test('should append the identity map on finalize', () => {
      const archive = new OutputArchive();
      tracker.visit(buildCycle());

      tracker.finalize(archive);

      expect(tracker.finalized).toBe(true);
      expect(archive.getTokens()).toEqual([4, 6, 10, 2, 6]);
    });

    test('should finalize only once', () => {
      const archive = new OutputArchive();
      tracker.visit(buildCycle());

      tracker.finalize(archive);
      tracker.finalize(archive);

      expect(archive.tokenCount).toBe(5);
    });

    test('should write object-id 0 for a null pointer', () => {
      const archive = new OutputArchive();
      tracker.visit(new Pair());

      tracker.finalize(archive);

      expect(archive.getTokens()).toEqual([1, 0]);
    });

    test('should reject a pointer to an object outside the traversal', () => {
      const pair = new Pair();
      pair.target = new Vertex('lost');
      tracker.visit(pair);

      const error = captureError(() => tracker.finalize(new OutputArchive()));

      expect(error).toBeInstanceOf(GraphIdentityError);
      expect(error).toMatchObject({
        reason: 'target-not-tracked',
        message: 'Pointer 0 targets an instance of Vertex not found in the serialization traversal',
        details: { pointerIndex: 0 }
      });
    });

    test('should log a summary when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const verbose = new OutputTracker({ verbose: true });
      verbose.visit(buildCycle());

      verbose.finalize(new OutputArchive());

      expect(log).toHaveBeenCalledWith('[GraphArchive] Saved identity map: 4 pointer(s) over 14 unit(s)');
    });
  });

  describe('InputTracker', () => {
    let tracker: InputTracker;

    beforeEach(() => {
      tracker = new InputTracker();
    });

    test('should resolve pointers to the units at their object-ids', () => {
      const vertex = new Vertex();
      const pair = new Pair();
      vertex.next = new Vertex('stale');
      tracker.visit(vertex, pair);

      tracker.finalize(identityMapArchive([0, 1]));

      expect(vertex.next).toBeNull();
      expect(pair.target).toBe(vertex);
      expect(tracker.stats).toEqual({ units: 6, pointers: 2 });
    });

    test('should reject an identity map of the wrong length', () => {
      const error = captureError(() => tracker.finalize(identityMapArchive([0])));

      expect(error).toMatchObject({
        reason: 'size-mismatch',
        message: 'Identity map holds 1 pointer(s) but the traversal produced 0'
      });
    });

    test.each([99, -1, 1.5])('should reject object-id %s as out of range', (objectId) => {
      tracker.visit(new Pair());

      const error = captureError(() => tracker.finalize(identityMapArchive([objectId])));

      expect(error).toMatchObject({
        reason: 'id-out-of-range',
        message: `Pointer 0 has object-id ${objectId} exceeding the object traversal count 3`,
        details: { pointerIndex: 0, objectId }
      });
    });

    test('should reject an object-id naming an anonymous unit', () => {
      tracker.visit(new Pair());

      const error = captureError(() => tracker.finalize(identityMapArchive([1])));

      expect(error).toMatchObject({
        reason: 'unaddressable-target',
        message: 'Pointer 0 has object-id 1, which names a unit that cannot be referenced'
      });
    });

    test('should reject a target of the wrong type', () => {
      const pair = new Pair();
      tracker.visit(new Marker(), pair);

      const error = captureError(() => tracker.finalize(identityMapArchive([1])));

      expect(error).toMatchObject({
        reason: 'target-type-mismatch',
        message: 'Pointer 0 expects Vertex but resolves to an instance of Marker'
      });
      expect(pair.target).toBeNull();
    });

    test('should read the identity map only once', () => {
      const archive = identityMapArchive([]);

      tracker.finalize(archive);
      tracker.finalize(archive);

      expect(archive.remaining).toBe(0);
    });
  });
});
