/**
 * GUID parsing and attribute-blob byte order
 */

import { SemanticError, type ErrorContext } from '../errors/ApimetaError.js';
import { concatBytes, hexBytes } from './binary.js';

const GUID_PATTERN = /^\{?([0-9A-Fa-f]{8})-([0-9A-Fa-f]{4})-([0-9A-Fa-f]{4})-([0-9A-Fa-f]{4})-([0-9A-Fa-f]{12})\}?$/;

/** Custom attribute blob prolog */
export const BLOB_PROLOG = Uint8Array.of(0x01, 0x00);

/**
 * Parse `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx` (braces optional) into 16 bytes
 * in textual order.
 */
export function parseGuid(text: string, context: ErrorContext = {}): Uint8Array {
  const match = GUID_PATTERN.exec(text.trim());
  if (!match) {
    throw new SemanticError(`"${text}" is not a GUID`, 'ERR_INVALID_GUID', context);
  }
  return Uint8Array.from(Buffer.from(match.slice(1).join(''), 'hex'));
}

/**
 * Canonical upper-case text form of 16 bytes in textual order.
 */
export function formatGuid(bytes: Uint8Array): string {
  if (bytes.length !== 16) {
    throw new RangeError(`a GUID has 16 bytes, got ${bytes.length}`);
  }
  const hex = hexBytes(bytes).replace(/ /g, '');
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

/**
 * Textual order to in-memory order: the uint32 and both uint16 fields become
 * little-endian, the trailing 8 bytes stay as they are.
 *
 *   gghhiijj-kkll-mmnn-oopp-qqrrssttuuvv -> jj ii hh gg ll kk nn mm oo pp qq rr ss tt uu vv
 */
export function reorderGuid(bytes: Uint8Array): Uint8Array {
  if (bytes.length !== 16) {
    throw new RangeError(`a GUID has 16 bytes, got ${bytes.length}`);
  }
  return Uint8Array.of(
    bytes[3], bytes[2], bytes[1], bytes[0],
    bytes[5], bytes[4],
    bytes[7], bytes[6],
    ...bytes.subarray(8)
  );
}

/**
 * Prolog followed by the reordered GUID: the fixed arguments of
 * GuidAttribute(uint32, uint16, uint16, uint8 x 8).
 */
export function encodeGuidBlob(bytes: Uint8Array): Uint8Array {
  return concatBytes(BLOB_PROLOG, reorderGuid(bytes));
}

/** Byte offsets (textual order) replaced by an interface's group and value */
export const INTERFACE_GROUP_OFFSET = 11;
export const INTERFACE_VALUE_OFFSET = 13;

/**
 * Interface identifier: the template with the group and value bytes substituted.
 */
export function interfaceGuid(template: Uint8Array, group: number, value: number): Uint8Array {
  for (const [label, byte] of [['group', group], ['value', value]] as const) {
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xFF) {
      throw new SemanticError(`interface ${label} ${byte} is outside 0..255`, 'ERR_BYTE_RANGE');
    }
  }
  const bytes = Uint8Array.from(template);
  bytes[INTERFACE_GROUP_OFFSET] = group;
  bytes[INTERFACE_VALUE_OFFSET] = value;
  return bytes;
}
