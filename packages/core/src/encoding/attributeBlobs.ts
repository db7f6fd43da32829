/**
 * Custom attribute blobs emitted by the renderer
 *
 * Every blob starts with the 01 00 prolog, then the fixed constructor
 * arguments, then a uint16 count of named arguments and the named arguments.
 */

import { concatBytes, encodePascalString, encodeSerString, encodeUIntLE } from './binary.js';
import { BLOB_PROLOG, encodeGuidBlob } from './guid.js';

/** Named argument is a field */
const NAMED_FIELD = 0x53;
const ELEMENT_TYPE_I2 = 0x06;
const ELEMENT_TYPE_I4 = 0x08;

const NO_NAMED_ARGUMENTS = encodeUIntLE(0, 2);

/**
 * Blob of a parameterless attribute with no named arguments: 01 00 00 00.
 * Used for ConstAttribute, ComOutPtrAttribute and FlagsAttribute.
 */
export function markerBlob(): Uint8Array {
  return concatBytes(BLOB_PROLOG, NO_NAMED_ARGUMENTS);
}

function namedFieldBlob(elementType: number, name: string, value: Uint8Array): Uint8Array {
  return concatBytes(
    BLOB_PROLOG,
    encodeUIntLE(1, 2),
    Uint8Array.of(NAMED_FIELD, elementType),
    encodePascalString(name),
    value
  );
}

/**
 * NativeArrayInfoAttribute { CountParamIndex = index } (int16 field)
 */
export function countParamBlob(index: number): Uint8Array {
  return namedFieldBlob(ELEMENT_TYPE_I2, 'CountParamIndex', encodeUIntLE(index, 2));
}

/**
 * NativeArrayInfoAttribute { CountConst = count } (int32 field)
 */
export function countConstBlob(count: number): Uint8Array {
  return namedFieldBlob(ELEMENT_TYPE_I4, 'CountConst', encodeUIntLE(count, 4));
}

/**
 * AssociatedEnumAttribute(string enumName)
 */
export function associatedEnumBlob(enumName: string): Uint8Array {
  return concatBytes(BLOB_PROLOG, encodeSerString(enumName), NO_NAMED_ARGUMENTS);
}

/**
 * UnmanagedFunctionPointerAttribute(CallingConvention code)
 */
export function callingConventionBlob(code: number): Uint8Array {
  return concatBytes(BLOB_PROLOG, encodeUIntLE(code, 4), NO_NAMED_ARGUMENTS);
}

/**
 * GuidAttribute(uint32, uint16, uint16, uint8 x 8)
 */
export function guidAttributeBlob(guid: Uint8Array): Uint8Array {
  return concatBytes(encodeGuidBlob(guid), NO_NAMED_ARGUMENTS);
}
