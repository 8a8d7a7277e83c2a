/**
 * Capability dispatch
 * 能力分派
 *
 * User composites are written once against `Archive`; wrapper values switch
 * on the recipient variant themselves. This module routes a visited value to
 * whichever of the two applies.
 * 用户复合类型只针对 `Archive` 编写一次；包装值自行根据接收者类型切换行为。
 */

import { ArchiveNode } from './ArchiveNode';
import type {
  Archive,
  EncodingVisitor,
  TrackingVisitor,
  Visitable,
  Visitor
} from './Types';

export function isArchiveNode(value: Visitable): value is ArchiveNode {
  return value instanceof ArchiveNode;
}

export function isTrackingVisitor(archive: Archive): archive is TrackingVisitor {
  return archive.kind === 'tracking';
}

export function isEncodingVisitor(archive: Archive): archive is EncodingVisitor {
  return archive.kind === 'encoding';
}

/**
 * Route a visited value to its recipient
 * 将访问的值分派给接收者
 */
export function dispatch(visitor: Visitor, value: Visitable): void {
  if (isArchiveNode(value)) {
    value.accept(visitor);
  } else {
    value.serialize(visitor);
  }
}
