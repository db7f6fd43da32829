/**
 * IL type resolution
 *
 * Turns a TypeReference into the type syntax ilasm expects, e.g.
 *   { name: 'UINT32', depth: 1 }  -> uint32*
 *   { name: 'IInArchive', depth: 2 } -> class SevenZip.IInArchive**
 */

import type { MetadataModel, TypeReference } from '@apimeta/types';
import { WELL_KNOWN_TYPES, type WellKnownType } from '../data/types/wellKnownTypes.js';

export const DEFAULT_WIN32_ASSEMBLY = 'Windows.Win32.winmd';

export interface TypeResolutionOptions {
  /** Reference assembly holding the Win32 metadata types */
  win32Assembly: string;
}

/**
 * The parts of the model type resolution looks at
 */
export type TypeScope = {
  readonly header: Readonly<MetadataModel['header']>;
  readonly functionPointers: readonly { name: string }[];
};

/**
 * Names shaped like COM interfaces: `I`, an upper-case letter, a lower-case letter.
 */
export function isComInterfaceName(name: string): boolean {
  return /^I[A-Z][a-z]/.test(name);
}

function formatWellKnown(type: WellKnownType, options: TypeResolutionOptions): string {
  switch (type.kind) {
    case 'primitive':
      return type.il;
    case 'netstandard':
      return `${type.valueType ? 'valuetype' : 'class'} [netstandard]${type.typeName}`;
    case 'win32':
      return `${type.valueType ? 'valuetype' : 'class'} [${options.win32Assembly}]${type.typeName}`;
  }
}

/**
 * IL type of a bare name, ignoring pointer depth.
 */
export function resolveBaseIlType(name: string, scope: TypeScope, options: TypeResolutionOptions): string {
  const wellKnown = WELL_KNOWN_TYPES.get(name);
  if (wellKnown) {
    return formatWellKnown(wellKnown, options);
  }

  if (isComInterfaceName(name)) {
    return `class ${scope.header.name}.${name}`;
  }

  if (scope.functionPointers.some((fptr) => fptr.name === name)) {
    return `class ${scope.header.name}.${name}`;
  }

  return name;
}

export function resolveIlType(ref: TypeReference, scope: TypeScope, options: TypeResolutionOptions): string {
  return resolveBaseIlType(ref.name, scope, options) + '*'.repeat(ref.depth);
}
