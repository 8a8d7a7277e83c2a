/**
 * Archive engine errors
 * 存档引擎错误
 */

export type ArchiveErrorReason =
  | 'malformed'
  | 'unexpected-end'
  | 'type-mismatch'
  | 'incompatible-version';

export class ArchiveError extends Error {
  constructor(
    public readonly reason: ArchiveErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ArchiveError';
  }
}

/**
 * Describe a token for error messages
 * 为错误消息描述令牌
 */
export function describeToken(token: unknown): string {
  if (token instanceof Uint8Array) {
    return `binary(${token.length})`;
  }
  if (typeof token === 'string') {
    return JSON.stringify(token);
  }
  if (typeof token === 'bigint') {
    return `${token}n`;
  }
  return String(token);
}
