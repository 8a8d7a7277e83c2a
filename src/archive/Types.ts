/**
 * Archive type definitions
 * 存档类型定义
 *
 * The archive capability is what user types see during a traversal. It is
 * bound either to an encoding recipient (the real engine, which reads or
 * writes tokens) or to a tracking recipient (which only observes identity).
 * 存档能力是用户类型在遍历过程中看到的接口，它绑定到编码接收者或跟踪接收者。
 */

import type { ArchiveNode } from './ArchiveNode';
import type { BinaryData, ScalarField, SizeTag } from './Values';

/**
 * Values an archive can read or write as a single token
 * 存档可以作为单个令牌读写的标量值
 */
export type Scalar = number | string | boolean | bigint | null;

/**
 * Single entry of an archive token stream
 * 存档令牌流中的单个条目
 */
export type ArchiveToken = Scalar | Uint8Array;

export type ArchiveDirection = 'save' | 'load';

/**
 * Archive capability handed to user traversal code
 * 传递给用户遍历代码的存档能力
 */
export interface Archive {
  /** Recipient variant 接收者类型 */
  readonly kind: 'encoding' | 'tracking';
  /** Whether the traversal saves or loads 遍历是保存还是加载 */
  readonly direction: ArchiveDirection;
  /** Visit a sequence of values in order 按顺序访问一系列值 */
  visit(...values: Visitable[]): this;
}

/**
 * Composite type that supplies its own traversal
 * 提供自身遍历逻辑的复合类型
 *
 * @example
 * ```typescript
 * class Point implements Serializable {
 *   x = 0;
 *   y = 0;
 *   serialize(archive: Archive): void {
 *     archive.visit(field(this, 'x'), field(this, 'y'), thisRef(this));
 *   }
 * }
 * ```
 */
export interface Serializable {
  serialize(archive: Archive): void;
}

export type Visitable = Serializable | ArchiveNode;

/**
 * Mutable storage location
 * 可变存储位置
 */
export interface Slot<T> {
  get(): T;
  set(value: T): void;
}

export type Constructor<T> = new (...args: never[]) => T;

/**
 * Reference-holding slot together with the type its target must have
 * 保存引用的槽位及其目标必须具有的类型
 */
export interface PointerSlot<T extends object> {
  readonly slot: Slot<T | null>;
  readonly target: Constructor<T>;
  /** Object that owns the slot, when it can itself be pointed at 拥有该槽位且自身可被指向的对象 */
  readonly holder?: object;
}

/**
 * Real engine recipient: reads or writes tokens
 * 真实引擎接收者：读写令牌
 */
export interface EncodingVisitor extends Archive {
  readonly kind: 'encoding';
  scalar<T extends Scalar>(field: ScalarField<T>): void;
  size(tag: SizeTag): void;
  binary(data: BinaryData): void;
  defer(value: Visitable): void;
  /** Process every value queued with defer() 处理所有延迟的值 */
  serializeDeferments(): void;
}

/**
 * Shadow recipient: records identities, performs no I/O
 * 影子接收者：记录身份，不执行I/O
 */
export interface TrackingVisitor extends Archive {
  readonly kind: 'tracking';
  /**
   * Assign the next object-id to a unit. `undefined` marks an anonymous unit
   * (scalar field, size tag, pointer slot) that consumes an id but cannot be
   * the target of a reference.
   */
  trackIdentity(unit: object | undefined): void;
  trackPointer<T extends object>(pointer: PointerSlot<T>): void;
  defer(value: Visitable): void;
}

export type Visitor = EncodingVisitor | TrackingVisitor;

export type SavingArchive = EncodingVisitor & { readonly direction: 'save' };
export type LoadingArchive = EncodingVisitor & { readonly direction: 'load' };

/**
 * Archive storage format
 * 存档存储格式
 */
export enum ArchiveFormat {
  /** Superjson text, human-readable 便于阅读的Superjson文本 */
  JSON = 'json',
  /** Superjson payload packed with MessagePack MessagePack打包的二进制 */
  Binary = 'binary'
}

/**
 * Archive envelope version
 * 存档信封版本
 */
export interface ArchiveVersion {
  major: number;
  minor: number;
  patch: number;
}

export const CURRENT_ARCHIVE_VERSION: ArchiveVersion = {
  major: 1,
  minor: 0,
  patch: 0
};

/**
 * Decoded archive envelope
 * 解码后的存档信封
 */
export interface ArchiveEnvelope {
  version: ArchiveVersion;
  timestamp: number;
  tokens: ArchiveToken[];
}

/**
 * Output archive options
 * 输出存档选项
 */
export interface OutputArchiveOptions {
  /** Storage format 存储格式 */
  format?: ArchiveFormat;
  /** Pretty print JSON output 格式化JSON输出 */
  prettyPrint?: boolean;
}

/**
 * Input archive options
 * 输入存档选项
 */
export interface InputArchiveOptions {
  /** Fail on incompatible envelope versions instead of warning 版本不兼容时失败 */
  strict?: boolean;
}

export const DEFAULT_OUTPUT_ARCHIVE_OPTIONS: Required<OutputArchiveOptions> = {
  format: ArchiveFormat.Binary,
  prettyPrint: false
};

export const DEFAULT_INPUT_ARCHIVE_OPTIONS: Required<InputArchiveOptions> = {
  strict: false
};

/**
 * Finished output archive
 * 完成的输出存档
 */
export interface SerializedArchive {
  /** Encoded envelope 编码后的信封 */
  data: string | Uint8Array;
  format: ArchiveFormat;
  /** Encoded size in bytes 编码大小（字节） */
  size: number;
  tokenCount: number;
}
