/**
 * Metadata Model - the complete declaration graph of one compilation
 */

import type {
  Enumeration,
  FreeFunction,
  FunctionPointerType,
  GuidConstant,
  Interface,
  Struct,
} from './declarations.js';

export interface MetadataHeader {
  name: string;
  version: string;
}

/**
 * Everything declared by one definition file and its includes.
 *
 * Built up by the declaration collector, then handed to the renderer which
 * only reads it (see {@link ReadonlyMetadataModel}).
 */
export interface MetadataModel {
  header: MetadataHeader;
  functions: FreeFunction[];
  functionPointers: FunctionPointerType[];
  interfaces: Interface[];
  /** Keyed by enumeration name, in declaration order */
  enums: Map<string, Enumeration>;
  structs: Struct[];
  guidConstants: GuidConstant[];
  /** Lower-cased names of all DLLs entry points are imported from */
  dlls: Set<string>;
}

export interface ReadonlyMetadataModel {
  readonly header: Readonly<MetadataHeader>;
  readonly functions: readonly FreeFunction[];
  readonly functionPointers: readonly FunctionPointerType[];
  readonly interfaces: readonly Interface[];
  readonly enums: ReadonlyMap<string, Enumeration>;
  readonly structs: readonly Struct[];
  readonly guidConstants: readonly GuidConstant[];
  readonly dlls: ReadonlySet<string>;
}
