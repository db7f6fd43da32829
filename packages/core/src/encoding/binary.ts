/**
 * Binary encoding primitives for custom attribute blobs
 *
 * Little-endian fixed-width integers, the two length-prefixed string forms
 * used in attribute blobs, and hex rendering for IL byte arrays.
 */

import { SemanticError } from '../errors/ApimetaError.js';

/** Longest string a one-byte ("Pascal") length prefix can describe */
export const MAX_PASCAL_LENGTH = 0x7F;

/** Longest string the compressed length prefix can describe */
export const MAX_SER_STRING_LENGTH = 0x1FFFFFFF;

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return Buffer.concat(parts);
}

/**
 * Encode an unsigned integer into exactly `byteCount` bytes, least significant first.
 */
export function encodeUIntLE(value: number | bigint, byteCount: number): Uint8Array {
  if (!Number.isInteger(byteCount) || byteCount < 1) {
    throw new RangeError(`byte count must be a positive integer, got ${byteCount}`);
  }
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new SemanticError(`${value} is not an integer`, 'ERR_VALUE_OUT_OF_RANGE');
  }

  let remaining = BigInt(value);
  const limit = 1n << BigInt(byteCount * 8);
  if (remaining < 0n || remaining >= limit) {
    throw new SemanticError(
      `${value} does not fit in ${byteCount} unsigned byte(s)`,
      'ERR_VALUE_OUT_OF_RANGE'
    );
  }

  const bytes = new Uint8Array(byteCount);
  for (let i = 0; i < byteCount; i++) {
    bytes[i] = Number(remaining & 0xFFn);
    remaining >>= 8n;
  }
  return bytes;
}

/**
 * Inverse of {@link encodeUIntLE}.
 */
export function decodeUIntLE(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

/**
 * UTF-8 text behind a single length byte. Used for named-argument names.
 */
export function encodePascalString(text: string): Uint8Array {
  const encoded = Buffer.from(text, 'utf-8');
  if (encoded.length > MAX_PASCAL_LENGTH) {
    throw new SemanticError(
      `"${text}" is ${encoded.length} bytes long, a length byte holds at most ${MAX_PASCAL_LENGTH}`,
      'ERR_STRING_TOO_LONG'
    );
  }
  return concatBytes(Uint8Array.of(encoded.length), encoded);
}

/**
 * Compressed length prefix of ECMA-335 SerString:
 *
 *   length <= 0x7F        0xxxxxxx
 *   length <= 0x3FFF      10xxxxxx xxxxxxxx
 *   length <= 0x1FFFFFFF  110xxxxx xxxxxxxx xxxxxxxx xxxxxxxx
 */
export function encodeCompressedLength(length: number): Uint8Array {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`length must be a non-negative integer, got ${length}`);
  }
  if (length <= 0x7F) {
    return Uint8Array.of(length);
  }
  if (length <= 0x3FFF) {
    return Uint8Array.of(((length >> 8) & 0x3F) | 0x80, length & 0xFF);
  }
  if (length <= MAX_SER_STRING_LENGTH) {
    return Uint8Array.of(
      ((length >>> 24) & 0x1F) | 0xC0,
      (length >>> 16) & 0xFF,
      (length >>> 8) & 0xFF,
      length & 0xFF
    );
  }
  throw new SemanticError(
    `length ${length} exceeds the compressed length limit ${MAX_SER_STRING_LENGTH}`,
    'ERR_STRING_TOO_LONG'
  );
}

/**
 * UTF-8 text behind a compressed length prefix (a SerString).
 */
export function encodeSerString(text: string): Uint8Array {
  const encoded = Buffer.from(text, 'utf-8');
  return concatBytes(encodeCompressedLength(encoded.length), encoded);
}

/**
 * "01 00 5A FF" - the byte array notation of IL
 */
export function hexBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ');
}
