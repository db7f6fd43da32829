/**
 * Declaration Types - entities produced by the definition language
 */

import type { TypeReference } from './typeReference.js';

// === ARGUMENTS ===

export const ARGUMENT_DIRECTIONS = ['in', 'out', 'inout'] as const;

export type ArgumentDirection = typeof ARGUMENT_DIRECTIONS[number];

/**
 * Flags that each emit a fixed marker attribute on a parameter
 */
export type ArgumentAttribute = 'const' | 'comOut';

/**
 * Native array size of a pointer argument.
 *
 * `countParam` names the (zero-based) argument holding the element count,
 * `countConst` is a fixed element count.
 */
export type ArraySize =
  | { kind: 'none' }
  | { kind: 'countParam'; index: number }
  | { kind: 'countConst'; count: number };

export interface Argument {
  name: string;
  type: TypeReference;
  direction: ArgumentDirection;
  optional: boolean;
  attributes: ReadonlySet<ArgumentAttribute>;
  arraySize: ArraySize;
}

// === FUNCTION-LIKE ENTITIES ===

export const CALLING_CONVENTIONS = ['winapi', 'cdecl', 'stdcall', 'thiscall', 'fastcall'] as const;

export type CallingConvention = typeof CALLING_CONVENTIONS[number];

/**
 * System.Runtime.InteropServices.CallingConvention values
 */
export const CALLING_CONVENTION_CODES: Record<CallingConvention, number> = {
  winapi: 1,
  cdecl: 2,
  stdcall: 3,
  thiscall: 4,
  fastcall: 5,
};

interface FunctionLikeBase {
  name: string;
  returnType: TypeReference;
  /** Parameter order is declaration order */
  args: Argument[];
}

/** Entry point exported by a DLL */
export interface FreeFunction extends FunctionLikeBase {
  kind: 'function';
  dll: string;
  callingConvention: CallingConvention;
}

/** Delegate type describing a native callback */
export interface FunctionPointerType extends FunctionLikeBase {
  kind: 'functionPointer';
  callingConventionCode: number;
}

export interface InterfaceMethod extends FunctionLikeBase {
  kind: 'method';
}

export type FunctionLike = FreeFunction | FunctionPointerType | InterfaceMethod;

export type FunctionLikeKind = FunctionLike['kind'];

// === INTERFACES ===

export interface Interface {
  name: string;
  /** Byte substituted at offset 11 of the interface GUID template */
  group: number;
  /** Byte substituted at offset 13 of the interface GUID template */
  value: number;
  baseType: TypeReference;
  methods: InterfaceMethod[];
}

// === ENUMERATIONS ===

export interface EnumVariant {
  name: string;
  value: bigint;
}

export interface Enumeration {
  name: string;
  baseType: TypeReference;
  isFlags: boolean;
  /** Keyed by variant name, in declaration order */
  variants: Map<string, EnumVariant>;
}

// === STRUCTS ===

export interface StructField {
  name: string;
  type: TypeReference;
}

export interface Struct {
  name: string;
  fields: StructField[];
}

// === GUID CONSTANTS ===

export interface GuidConstant {
  name: string;
  /** 16 bytes in canonical (textual) order */
  bytes: Uint8Array;
  /** Canonical display form, e.g. 23170F69-40C1-278A-0000-000000000000 */
  text: string;
}
