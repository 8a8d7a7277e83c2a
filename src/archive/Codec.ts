import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { ArchiveError } from './ArchiveError';
import { isScalar } from './Values';
import type {
  ArchiveEnvelope,
  ArchiveToken,
  ArchiveVersion,
  InputArchiveOptions,
  OutputArchiveOptions
} from './Types';
import { ArchiveFormat, CURRENT_ARCHIVE_VERSION } from './Types';

/**
 * Envelope codec using Superjson and MessagePack
 * 使用Superjson和MessagePack的信封编解码器
 *
 * An envelope carries the archive version, a timestamp and the flat token
 * stream written by an output archive.
 * 信封包含存档版本、时间戳以及输出存档写入的扁平令牌流。
 */

type SuperjsonPayload = Parameters<typeof superjson.deserialize>[0];

let _superjsonReady = false;

/**
 * Setup Superjson with custom transformers
 * 设置Superjson的自定义转换器
 */
function setupSuperjson(): void {
  if (_superjsonReady) {
    return;
  }
  _superjsonReady = true;

  // Binary tokens travel as plain byte arrays inside the JSON tree
  superjson.registerCustom<Uint8Array, number[]>(
    {
      isApplicable: (value): value is Uint8Array => value instanceof Uint8Array,
      serialize: (value) => Array.from(value),
      deserialize: (value) => Uint8Array.from(value)
    },
    'Uint8Array'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSuperjsonPayload(value: unknown): value is SuperjsonPayload {
  return isRecord(value) && 'json' in value;
}

function isArchiveVersion(value: unknown): value is ArchiveVersion {
  return isRecord(value) &&
    typeof value.major === 'number' &&
    typeof value.minor === 'number' &&
    typeof value.patch === 'number';
}

export function isArchiveToken(value: unknown): value is ArchiveToken {
  return isScalar(value) || value instanceof Uint8Array;
}

function isArchiveEnvelope(value: unknown): value is ArchiveEnvelope {
  return isRecord(value) &&
    isArchiveVersion(value.version) &&
    typeof value.timestamp === 'number' &&
    Array.isArray(value.tokens) &&
    value.tokens.every(isArchiveToken);
}

export function formatVersion(version: ArchiveVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Check if an envelope version can be read by this build
 * 检查信封版本是否可被当前构建读取
 */
export function isVersionCompatible(sourceVersion: ArchiveVersion): boolean {
  const current = CURRENT_ARCHIVE_VERSION;

  // Major version must match
  if (sourceVersion.major !== current.major) {
    return false;
  }

  // Source version should not be newer than current
  if (sourceVersion.minor > current.minor) {
    return false;
  }

  if (sourceVersion.minor === current.minor && sourceVersion.patch > current.patch) {
    return false;
  }

  return true;
}

/**
 * Encode a token stream into an envelope
 * 将令牌流编码为信封
 */
export function encodeEnvelope(
  tokens: ArchiveToken[],
  options: Required<OutputArchiveOptions>,
  timestamp = Date.now()
): { data: string | Uint8Array; size: number } {
  setupSuperjson();

  const envelope: ArchiveEnvelope = {
    version: CURRENT_ARCHIVE_VERSION,
    timestamp,
    tokens
  };

  try {
    switch (options.format) {
      case ArchiveFormat.JSON: {
        const jsonString = superjson.stringify(envelope);
        const data = options.prettyPrint ? JSON.stringify(JSON.parse(jsonString), null, 2) : jsonString;
        return { data, size: new TextEncoder().encode(data).length };
      }

      case ArchiveFormat.Binary: {
        // Use superjson to handle bigint and binary tokens, then encode with MessagePack
        const data = msgpackEncode(superjson.serialize(envelope));
        return { data, size: data.length };
      }

      default:
        throw new Error(`Unsupported archive format: ${String(options.format)}`);
    }
  } catch (error) {
    throw new ArchiveError(
      'malformed',
      `Serialization failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Decode an envelope. Strings are read as JSON, byte arrays as MessagePack.
 * 解码信封。字符串按JSON读取，字节数组按MessagePack读取。
 */
export function decodeEnvelope(
  data: string | Uint8Array,
  options: Required<InputArchiveOptions>
): ArchiveEnvelope {
  setupSuperjson();

  let decoded: unknown;
  try {
    if (typeof data === 'string') {
      decoded = superjson.parse<unknown>(data);
    } else {
      const packed = msgpackDecode(data);
      if (!isSuperjsonPayload(packed)) {
        throw new ArchiveError('malformed', 'Binary archive does not hold a superjson payload');
      }
      decoded = superjson.deserialize<unknown>(packed);
    }
  } catch (error) {
    if (error instanceof ArchiveError) {
      throw error;
    }
    throw new ArchiveError(
      'malformed',
      `Deserialization failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!isArchiveEnvelope(decoded)) {
    throw new ArchiveError('malformed', 'Archive envelope is missing its version, timestamp or token stream');
  }

  // Version compatibility check
  if (!isVersionCompatible(decoded.version)) {
    const message =
      `Incompatible archive version. Source: ${formatVersion(decoded.version)}, ` +
      `Current: ${formatVersion(CURRENT_ARCHIVE_VERSION)}`;
    if (options.strict) {
      throw new ArchiveError('incompatible-version', message);
    }
    console.warn(`[Archive] ${message}`);
  }

  return decoded;
}
