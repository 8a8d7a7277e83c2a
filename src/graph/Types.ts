/**
 * Graph archive type definitions
 * 图存档类型定义
 */

import type { InputArchiveOptions, OutputArchiveOptions } from '../archive/Types';

/**
 * Traversal-order sequence number of a unit; 0 denotes null
 * 单元的遍历顺序编号；0 表示空
 */
export type ObjectId = number;

export const NULL_OBJECT_ID: ObjectId = 0;

/**
 * Graph archive options
 * 图存档选项
 */
export interface GraphArchiveOptions {
  /** Log a summary when the identity map is written or resolved 输出身份映射摘要日志 */
  verbose?: boolean;
}

export const DEFAULT_GRAPH_ARCHIVE_OPTIONS: Required<GraphArchiveOptions> = {
  verbose: false
};

export type SaveGraphOptions = OutputArchiveOptions & GraphArchiveOptions;
export type LoadGraphOptions = InputArchiveOptions & GraphArchiveOptions;

/**
 * Counters of one traversal
 * 单次遍历的计数
 */
export interface TraversalStats {
  /** Units that received an object-id, null excluded 获得对象ID的单元数（不含空） */
  units: number;
  /** Pointer occurrences or slots 指针出现次数或槽位数 */
  pointers: number;
}
