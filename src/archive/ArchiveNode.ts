import type { Visitor } from './Types';

/**
 * Base of every wrapper value that behaves differently per recipient variant.
 * Dispatch tests for this class, so a user composite that happens to own an
 * `accept` method is still serialized through `serialize`.
 * 所有根据接收者类型表现不同行为的包装值的基类
 */
export abstract class ArchiveNode {
  abstract accept(visitor: Visitor): void;
}
