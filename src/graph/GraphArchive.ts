import type {
  ArchiveDirection,
  EncodingVisitor,
  LoadingArchive,
  SavingArchive,
  Visitable
} from '../archive/Types';
import { GraphIdentityError } from './GraphIdentityError';
import type { IdentityTracker } from './IdentityTracker';
import { InputTracker } from './InputTracker';
import { OutputTracker } from './OutputTracker';
import type { GraphArchiveOptions, TraversalStats } from './Types';

/**
 * Identity-preserving wrapper around a real archive
 * 真实存档的身份保持包装器
 *
 * Every visit is forwarded to the real archive first and to the tracker
 * second, so the archive alone decides what is read or written and the
 * tracker only observes. `complete()` exchanges the identity map; afterwards
 * the wrapper refuses further visits.
 * 每次访问先转发给真实存档，再转发给跟踪器。
 */
export abstract class GraphArchive<A extends EncodingVisitor, T extends IdentityTracker<A>> {
  private _completed = false;

  protected constructor(
    protected readonly archive: A,
    protected readonly tracker: T,
    expected: ArchiveDirection,
    protected readonly options: GraphArchiveOptions
  ) {
    if (archive.direction !== expected) {
      throw new TypeError(
        `${this.constructor.name} cannot wrap an archive that is ${archive.direction === 'save' ? 'saving' : 'loading'}`
      );
    }
  }

  /**
   * Whether complete() has run
   * complete() 是否已执行
   */
  get completed(): boolean {
    return this._completed;
  }

  get stats(): TraversalStats {
    return this.tracker.stats;
  }

  /**
   * Forward values to the real archive and to the tracker
   * 将值转发给真实存档和跟踪器
   *
   * @throws GraphIdentityError `use-after-complete` once complete() has run
   */
  visit(...values: Visitable[]): this {
    if (this._completed) {
      throw new GraphIdentityError('use-after-complete', 'Attempted serialization after complete() was called');
    }
    this.archive.visit(...values);
    this.tracker.visit(...values);
    return this;
  }

  /**
   * Flush deferred values and exchange the identity map. Runs at most once.
   * 处理延迟的值并交换身份映射，最多执行一次。
   *
   * @throws GraphIdentityError if the identity map cannot be written or resolved
   */
  complete(): void {
    if (this._completed) {
      return;
    }
    this._completed = true;

    this.archive.serializeDeferments();
    this.tracker.serializeDeferments();
    this.tracker.finalize(this.archive);
  }

  /**
   * End of the wrapper's scope: completes if not completed yet
   * 包装器作用域结束：如尚未完成则执行完成
   */
  dispose(): void {
    if (!this._completed && this.options.verbose) {
      console.log(`[GraphArchive] ${this.constructor.name} completed on dispose`);
    }
    this.complete();
  }
}

/**
 * Save-side wrapper: appends the identity map after the payload
 * 保存端包装器：在负载之后追加身份映射
 */
export class GraphOutputArchive extends GraphArchive<SavingArchive, OutputTracker> {
  constructor(archive: SavingArchive, options: GraphArchiveOptions = {}) {
    super(archive, new OutputTracker(options), 'save', options);
  }
}

/**
 * Load-side wrapper: reads the identity map and restores pointers
 * 加载端包装器：读取身份映射并恢复指针
 */
export class GraphInputArchive extends GraphArchive<LoadingArchive, InputTracker> {
  constructor(archive: LoadingArchive, options: GraphArchiveOptions = {}) {
    super(archive, new InputTracker(options), 'load', options);
  }
}
