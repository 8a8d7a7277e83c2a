/**
 * Identity adapters
 * 身份适配器
 *
 * Wrappers that make object identity visible to an identity tracker while
 * contributing nothing to the encoded stream. References carry no portable
 * value of their own; only the trailing identity map gives them meaning.
 * 使对象身份对身份跟踪器可见、但不向编码流贡献任何内容的包装器。
 */

import { ArchiveNode } from '../archive/ArchiveNode';
import type { Constructor, PointerSlot, Slot, Visitor } from '../archive/Types';

/**
 * Reference to the composite currently being traversed
 * 对当前正在遍历的复合对象的引用
 *
 * Recursing into a composite's members never exposes the composite itself,
 * so a type whose instances can be pointed at must visit `thisRef(this)`.
 */
export class ThisRef<T extends object> extends ArchiveNode {
  constructor(readonly target: T) {
    super();
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'tracking') {
      visitor.trackIdentity(this.target);
    }
  }
}

/**
 * Mutable slot holding a reference to another traversed object. When the slot
 * belongs to a `holder` object, that object is tracked in the slot's position
 * and other pointers may target it.
 * 保存指向另一个被遍历对象引用的可变槽位
 */
export class RawPointerRef<T extends object> extends ArchiveNode implements PointerSlot<T> {
  constructor(
    readonly slot: Slot<T | null>,
    readonly target: Constructor<T>,
    readonly holder?: object
  ) {
    super();
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'tracking') {
      visitor.trackPointer(this);
    }
  }
}

/**
 * Reference container that traverses as a raw pointer without wrapping.
 * The container is addressable, so another pointer may target it.
 * 无需手动包装即可作为原始指针遍历的引用容器
 *
 * @example
 * ```typescript
 * class Edge implements Serializable {
 *   to = new RawPtr(Vertex);
 *   serialize(archive: Archive): void {
 *     archive.visit(this.to);
 *   }
 * }
 * ```
 */
export class RawPtr<T extends object> extends ArchiveNode {
  constructor(
    readonly target: Constructor<T>,
    public ptr: T | null = null
  ) {
    super();
  }

  get(): T | null {
    return this.ptr;
  }

  set(value: T | null): void {
    this.ptr = value;
  }

  isNull(): boolean {
    return this.ptr === null;
  }

  /**
   * Get the referenced object, failing on null
   * 获取引用的对象，为空时抛出错误
   */
  deref(): T {
    if (this.ptr === null) {
      throw new Error(`Dereferenced a null RawPtr<${this.target.name}>`);
    }
    return this.ptr;
  }

  accept(visitor: Visitor): void {
    if (visitor.kind === 'tracking') {
      visitor.visit(new RawPointerRef<T>(
        {
          get: () => this.ptr,
          set: (value) => {
            this.ptr = value;
          }
        },
        this.target,
        this
      ));
    }
  }
}

/**
 * Make a composite's own identity trackable
 * 使复合对象自身的身份可被跟踪
 */
export function thisRef<T extends object>(target: T): ThisRef<T> {
  return new ThisRef(target);
}

/**
 * Wrap a reference field so its target survives save and load. The field has
 * no object of its own, so nothing can point at it; hold a `RawPtr` instead
 * where that is needed.
 * 包装引用字段，使其目标在保存和加载后保持一致
 */
export function rawPtr<K extends PropertyKey, T extends object>(
  owner: Record<K, NoInfer<T> | null>,
  key: K,
  target: Constructor<T>
): RawPointerRef<T> {
  return new RawPointerRef<T>(
    {
      get: () => owner[key],
      set: (value) => {
        owner[key] = value;
      }
    },
    target
  );
}
