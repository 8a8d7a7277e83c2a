/**
 * Archive value wrappers
 * 存档值包装器
 *
 * Wrappers that user traversal code passes to `Archive.visit`. Each one knows
 * how it looks to the encoding engine and how it looks to an identity tracker.
 * 用户遍历代码传递给 `Archive.visit` 的包装器。
 */

import { ArchiveNode } from './ArchiveNode';
import type { Scalar, Slot, Visitable, Visitor } from './Types';

/**
 * Check whether a value is a scalar token
 * 检查值是否为标量令牌
 */
export function isScalar(value: unknown): value is Scalar {
  return value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint';
}

function matchesKind(sample: Scalar, value: unknown): boolean {
  if (sample === null) {
    return isScalar(value);
  }
  return typeof value === typeof sample;
}

/**
 * Scalar stored in a field
 * 存储在字段中的标量
 */
export class ScalarField<T extends Scalar> extends ArchiveNode {
  constructor(
    readonly slot: Slot<T>,
    /** Load-side check for the token read back 加载时对读取令牌的检查 */
    readonly accepts: (value: unknown) => value is T
  ) {
    super();
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'encoding') {
      visitor.scalar(this);
    } else {
      visitor.trackIdentity(undefined);
    }
  }
}

/**
 * Length prefix of a sequence
 * 序列的长度前缀
 */
export class SizeTag extends ArchiveNode {
  constructor(readonly slot: Slot<number>) {
    super();
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'encoding') {
      visitor.size(this);
    } else {
      visitor.trackIdentity(undefined);
    }
  }
}

/**
 * Value labelled with a name. Both recipients unwrap it.
 * 带名称标签的值，两种接收者都会透明解包
 */
export class NameValuePair extends ArchiveNode {
  constructor(readonly name: string, readonly value: Visitable) {
    super();
  }

  accept(visitor: Visitor): void {
    visitor.visit(this.value);
  }
}

/**
 * Opaque byte buffer. Identity of binary data is not tracked.
 * 不透明字节缓冲区，不跟踪其身份
 */
export class BinaryData extends ArchiveNode {
  constructor(readonly slot: Slot<Uint8Array>) {
    super();
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'encoding') {
      visitor.binary(this);
    }
  }
}

/**
 * Value processed when the archive flushes its deferments
 * 在存档处理延迟项时才处理的值
 */
export class DeferredData extends ArchiveNode {
  constructor(readonly value: Visitable) {
    super();
  }

  accept(visitor: Visitor): void {
    visitor.defer(this.value);
  }
}

/**
 * Array of composite elements, prefixed by its size. Loading refills the
 * existing array in place.
 * 带大小前缀的复合元素数组，加载时原地重新填充
 */
export class ListField extends ArchiveNode {
  constructor(readonly items: () => Visitable[], readonly create: () => Visitable) {
    super();
  }

  accept(visitor: Visitor): void {
    const { items, create } = this;
    visitor.visit(new SizeTag({
      get: () => items().length,
      set: (length) => {
        const current = items();
        current.length = 0;
        for (let i = 0; i < length; i++) {
          current.push(create());
        }
      }
    }));
    visitor.visit(...items());
  }
}

/**
 * Array of scalars, prefixed by its size. Loading refills the existing array
 * in place with `fill`.
 * 带大小前缀的标量数组，加载时用 `fill` 原地重新填充
 */
export class ScalarArray extends ArchiveNode {
  constructor(readonly items: () => Scalar[], readonly fill: Scalar) {
    super();
  }

  accept(visitor: Visitor): void {
    const { items, fill } = this;
    visitor.visit(new SizeTag({
      get: () => items().length,
      set: (length) => {
        const current = items();
        current.length = 0;
        for (let i = 0; i < length; i++) {
          current.push(fill);
        }
      }
    }));
    const current = items();
    visitor.visit(...current.map((_, index) => field(current, index)));
  }
}

/**
 * Wrap a scalar field. On load the token must have the same kind as the
 * field's current value; a `null` field accepts any scalar.
 * 包装标量字段。加载时令牌必须与字段当前值类型相同。
 */
export function field<K extends PropertyKey, O extends Record<K, Scalar>>(owner: O, key: K): ScalarField<O[K]> {
  const sample: Scalar = owner[key];
  return new ScalarField<O[K]>(
    {
      get: () => owner[key],
      set: (value) => {
        owner[key] = value;
      }
    },
    (value: unknown): value is O[K] => matchesKind(sample, value)
  );
}

export function sizeTag(slot: Slot<number>): SizeTag {
  return new SizeTag(slot);
}

export function named(name: string, value: Visitable): NameValuePair {
  return new NameValuePair(name, value);
}

export function binary<K extends PropertyKey>(owner: Record<K, Uint8Array>, key: K): BinaryData {
  return new BinaryData({
    get: () => owner[key],
    set: (value) => {
      owner[key] = value;
    }
  });
}

export function defer(value: Visitable): DeferredData {
  return new DeferredData(value);
}

/**
 * Wrap an array of composites; `create` builds each element on load
 * 包装复合元素数组；加载时由 `create` 构建每个元素
 */
export function list<K extends PropertyKey, E extends Visitable, O extends Record<K, E[]>>(
  owner: O,
  key: K,
  create: () => E
): ListField {
  return new ListField(() => owner[key], create);
}

/**
 * Wrap an array of scalars; `fill` is the placeholder used on load, and its
 * kind is the kind every loaded element must have
 * 包装标量数组；`fill` 为加载时使用的占位值
 */
export function values<K extends PropertyKey, O extends Record<K, Scalar[]>>(
  owner: O,
  key: K,
  fill: Scalar
): ScalarArray {
  return new ScalarArray(() => owner[key], fill);
}
