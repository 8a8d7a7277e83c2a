import { ArchiveError, describeToken } from './ArchiveError';
import { decodeEnvelope } from './Codec';
import { dispatch } from './Dispatch';
import type {
  ArchiveToken,
  ArchiveVersion,
  EncodingVisitor,
  InputArchiveOptions,
  Scalar,
  Visitable
} from './Types';
import { DEFAULT_INPUT_ARCHIVE_OPTIONS } from './Types';
import type { BinaryData, ScalarField, SizeTag } from './Values';

/**
 * Input archive: reads visited values back from a token stream
 * 输入存档：从令牌流中读回访问的值
 */
export class InputArchive implements EncodingVisitor {
  readonly kind = 'encoding';
  readonly direction = 'load';

  readonly version: ArchiveVersion;
  readonly timestamp: number;

  private readonly _tokens: ArchiveToken[];
  private readonly _deferred: Visitable[] = [];
  private _cursor = 0;

  constructor(data: string | Uint8Array, options: InputArchiveOptions = {}) {
    const envelope = decodeEnvelope(data, { ...DEFAULT_INPUT_ARCHIVE_OPTIONS, ...options });
    this.version = envelope.version;
    this.timestamp = envelope.timestamp;
    this._tokens = envelope.tokens;
  }

  /**
   * Number of tokens not read yet
   * 尚未读取的令牌数量
   */
  get remaining(): number {
    return this._tokens.length - this._cursor;
  }

  visit(...values: Visitable[]): this {
    for (const value of values) {
      dispatch(this, value);
    }
    return this;
  }

  scalar<T extends Scalar>(field: ScalarField<T>): void {
    const token = this._next('scalar');
    if (!field.accepts(token)) {
      throw this._mismatch('scalar of the field type', token);
    }
    field.slot.set(token);
  }

  size(tag: SizeTag): void {
    const token = this._next('size');
    if (typeof token !== 'number' || !Number.isInteger(token) || token < 0) {
      throw this._mismatch('non-negative integer size', token);
    }
    tag.slot.set(token);
  }

  binary(data: BinaryData): void {
    const token = this._next('binary data');
    if (!(token instanceof Uint8Array)) {
      throw this._mismatch('binary data', token);
    }
    data.slot.set(token);
  }

  defer(value: Visitable): void {
    this._deferred.push(value);
  }

  /**
   * Read deferred values, including those deferred while flushing
   * 读取延迟的值，包括处理过程中新延迟的值
   */
  serializeDeferments(): void {
    let value = this._deferred.shift();
    while (value !== undefined) {
      dispatch(this, value);
      value = this._deferred.shift();
    }
  }

  private _next(expected: string): ArchiveToken {
    if (this._cursor >= this._tokens.length) {
      throw new ArchiveError(
        'unexpected-end',
        `Archive ended while reading ${expected} at token ${this._cursor}`
      );
    }
    return this._tokens[this._cursor++];
  }

  private _mismatch(expected: string, token: ArchiveToken): ArchiveError {
    return new ArchiveError(
      'type-mismatch',
      `Expected ${expected} at token ${this._cursor - 1}, found ${describeToken(token)}`
    );
  }
}
