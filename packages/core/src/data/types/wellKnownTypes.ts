/**
 * Well-known type names of the definition language
 *
 * Native and Win32 spellings mapped to their IL representation. Names not
 * listed here fall through to the structural rules of resolveIlType().
 */

/**
 * How a well-known name is written in IL
 * - primitive: an IL keyword type (`uint32`, `native uint`)
 * - netstandard: a type from the netstandard reference assembly
 * - win32: a type from the Win32 metadata reference assembly
 */
export type WellKnownType =
  | { kind: 'primitive'; il: string }
  | { kind: 'netstandard'; typeName: string; valueType: boolean }
  | { kind: 'win32'; typeName: string; valueType: boolean };

const primitive = (il: string): WellKnownType => ({ kind: 'primitive', il });
const win32Value = (typeName: string): WellKnownType => ({ kind: 'win32', typeName, valueType: true });

export const WELL_KNOWN_TYPES: ReadonlyMap<string, WellKnownType> = new Map<string, WellKnownType>([
  // Fixed-width integers
  ['INT8', primitive('int8')],
  ['UINT8', primitive('uint8')],
  ['INT16', primitive('int16')],
  ['UINT16', primitive('uint16')],
  ['INT32', primitive('int32')],
  ['UINT32', primitive('uint32')],
  ['INT64', primitive('int64')],
  ['UINT64', primitive('uint64')],

  // Win32 integer aliases
  ['BYTE', primitive('uint8')],
  ['BOOLEAN', primitive('uint8')],
  ['CHAR', primitive('int8')],
  ['SHORT', primitive('int16')],
  ['USHORT', primitive('uint16')],
  ['WORD', primitive('uint16')],
  ['INT', primitive('int32')],
  ['UINT', primitive('uint32')],
  ['LONG', primitive('int32')],
  ['ULONG', primitive('uint32')],
  ['DWORD', primitive('uint32')],
  ['LONGLONG', primitive('int64')],
  ['ULONGLONG', primitive('uint64')],
  ['DWORD64', primitive('uint64')],
  ['PROPID', primitive('uint32')],
  ['VARTYPE', primitive('uint16')],

  // Pointer-sized integers
  ['size_t', primitive('native uint')],
  ['SIZE_T', primitive('native uint')],
  ['INT_PTR', primitive('native int')],
  ['UINT_PTR', primitive('native uint')],
  ['LONG_PTR', primitive('native int')],
  ['ULONG_PTR', primitive('native uint')],

  // Other primitives
  ['void', primitive('void')],
  ['WCHAR', primitive('char')],
  ['FLOAT', primitive('float32')],
  ['DOUBLE', primitive('float64')],

  // Framework and Win32 metadata types
  ['GUID', { kind: 'netstandard', typeName: 'System.Guid', valueType: true }],
  ['BOOL', win32Value('Windows.Win32.Foundation.BOOL')],
  ['BSTR', win32Value('Windows.Win32.Foundation.BSTR')],
  ['FILETIME', win32Value('Windows.Win32.Foundation.FILETIME')],
  ['HANDLE', win32Value('Windows.Win32.Foundation.HANDLE')],
  ['HRESULT', win32Value('Windows.Win32.Foundation.HRESULT')],
  ['PSTR', win32Value('Windows.Win32.Foundation.PSTR')],
  ['PCSTR', win32Value('Windows.Win32.Foundation.PCSTR')],
  ['PWSTR', win32Value('Windows.Win32.Foundation.PWSTR')],
  ['PCWSTR', win32Value('Windows.Win32.Foundation.PCWSTR')],
  ['PROPVARIANT', win32Value('Windows.Win32.System.Com.StructuredStorage.PROPVARIANT')],
  ['IUnknown', { kind: 'win32', typeName: 'Windows.Win32.System.Com.IUnknown', valueType: false }],
]);

/**
 * IL integer types an enumeration may be based on, with their value ranges.
 */
export const ENUM_BASE_RANGES: ReadonlyMap<string, { min: bigint; max: bigint }> = new Map([
  ['int8', { min: -(2n ** 7n), max: 2n ** 7n - 1n }],
  ['uint8', { min: 0n, max: 2n ** 8n - 1n }],
  ['int16', { min: -(2n ** 15n), max: 2n ** 15n - 1n }],
  ['uint16', { min: 0n, max: 2n ** 16n - 1n }],
  ['int32', { min: -(2n ** 31n), max: 2n ** 31n - 1n }],
  ['uint32', { min: 0n, max: 2n ** 32n - 1n }],
  ['int64', { min: -(2n ** 63n), max: 2n ** 63n - 1n }],
  ['uint64', { min: 0n, max: 2n ** 64n - 1n }],
]);
