import { encodeEnvelope } from './Codec';
import { dispatch } from './Dispatch';
import type {
  ArchiveToken,
  EncodingVisitor,
  OutputArchiveOptions,
  Scalar,
  SerializedArchive,
  Visitable
} from './Types';
import { DEFAULT_OUTPUT_ARCHIVE_OPTIONS } from './Types';
import type { BinaryData, ScalarField, SizeTag } from './Values';

/**
 * Output archive: writes visited values to a flat token stream
 * 输出存档：将访问的值写入扁平令牌流
 *
 * @example
 * ```typescript
 * const archive = new OutputArchive({ format: ArchiveFormat.JSON });
 * archive.visit(scene);
 * const { data } = archive.finish();
 * ```
 */
export class OutputArchive implements EncodingVisitor {
  readonly kind = 'encoding';
  readonly direction = 'save';

  private readonly _options: Required<OutputArchiveOptions>;
  private readonly _tokens: ArchiveToken[] = [];
  private readonly _deferred: Visitable[] = [];

  constructor(options: OutputArchiveOptions = {}) {
    this._options = { ...DEFAULT_OUTPUT_ARCHIVE_OPTIONS, ...options };
  }

  /**
   * Number of tokens written so far
   * 已写入的令牌数量
   */
  get tokenCount(): number {
    return this._tokens.length;
  }

  visit(...values: Visitable[]): this {
    for (const value of values) {
      dispatch(this, value);
    }
    return this;
  }

  scalar<T extends Scalar>(field: ScalarField<T>): void {
    this._tokens.push(field.slot.get());
  }

  size(tag: SizeTag): void {
    this._tokens.push(tag.slot.get());
  }

  binary(data: BinaryData): void {
    this._tokens.push(data.slot.get().slice());
  }

  defer(value: Visitable): void {
    this._deferred.push(value);
  }

  /**
   * Write deferred values, including those deferred while flushing
   * 写入延迟的值，包括处理过程中新延迟的值
   */
  serializeDeferments(): void {
    let value = this._deferred.shift();
    while (value !== undefined) {
      dispatch(this, value);
      value = this._deferred.shift();
    }
  }

  /**
   * Encode the token stream into an envelope
   * 将令牌流编码为信封
   */
  finish(): SerializedArchive {
    const { data, size } = encodeEnvelope(this._tokens, this._options);
    return {
      data,
      format: this._options.format,
      size,
      tokenCount: this._tokens.length
    };
  }

  /**
   * Copy of the raw token stream
   * 原始令牌流的副本
   */
  getTokens(): ArchiveToken[] {
    return this._tokens.slice();
  }
}
