import type { Archive, Serializable } from '../archive/Types';
import { values } from '../archive/Values';
import type { ObjectId } from './Types';
import { NULL_OBJECT_ID } from './Types';

/**
 * Trailing section of a graph archive: one object-id per pointer, in
 * traversal order, written with the engine's own sequence convention.
 * 图存档的尾部段：按遍历顺序每个指针一个对象ID。
 */
export class IdentityMap implements Serializable {
  constructor(public ids: ObjectId[] = []) {}

  serialize(archive: Archive): void {
    archive.visit(values(this, 'ids', NULL_OBJECT_ID));
  }
}
