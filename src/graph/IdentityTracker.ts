import { dispatch } from '../archive/Dispatch';
import type {
  ArchiveDirection,
  EncodingVisitor,
  PointerSlot,
  TrackingVisitor,
  Visitable
} from '../archive/Types';
import type { GraphArchiveOptions, TraversalStats } from './Types';
import { DEFAULT_GRAPH_ARCHIVE_OPTIONS } from './Types';

/**
 * Base class of the shadow recipients
 * 影子接收者的基类
 *
 * A tracker is dispatched through the same visit protocol as a real archive
 * but never reads or writes tokens itself. It only assigns object-ids in
 * traversal order and remembers pointers, then exchanges the identity map
 * with the real archive once, in `finalize`.
 * 跟踪器与真实存档使用相同的访问协议，但自身从不读写令牌。
 */
export abstract class IdentityTracker<A extends EncodingVisitor> implements TrackingVisitor {
  readonly kind = 'tracking';
  abstract readonly direction: ArchiveDirection;

  protected readonly options: Required<GraphArchiveOptions>;

  private readonly _deferred: Visitable[] = [];
  private _finalized = false;

  constructor(options: GraphArchiveOptions = {}) {
    this.options = { ...DEFAULT_GRAPH_ARCHIVE_OPTIONS, ...options };
  }

  /**
   * Whether the identity map has been exchanged
   * 身份映射是否已交换
   */
  get finalized(): boolean {
    return this._finalized;
  }

  abstract get stats(): TraversalStats;

  visit(...values: Visitable[]): this {
    for (const value of values) {
      dispatch(this, value);
    }
    return this;
  }

  defer(value: Visitable): void {
    this._deferred.push(value);
  }

  /**
   * Walk deferred values in the order the archive writes them
   * 按存档写入的顺序遍历延迟的值
   */
  serializeDeferments(): void {
    let value = this._deferred.shift();
    while (value !== undefined) {
      dispatch(this, value);
      value = this._deferred.shift();
    }
  }

  /**
   * Exchange the identity map with the real archive. Runs at most once.
   * 与真实存档交换身份映射，最多执行一次。
   */
  finalize(archive: A): void {
    if (this._finalized) {
      return;
    }
    this._finalized = true;
    this.exchange(archive);
  }

  abstract trackIdentity(unit: object | undefined): void;

  abstract trackPointer<T extends object>(pointer: PointerSlot<T>): void;

  protected abstract exchange(archive: A): void;
}

/**
 * Describe an object for error messages
 * 为错误消息描述对象
 */
export function describeObject(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? `an instance of ${ctor.name}` : 'an object';
}
