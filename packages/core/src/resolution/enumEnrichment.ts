/**
 * Enum enrichment - links type references to previously declared enumerations
 *
 * A depth-0 reference whose IL type names a declared enumeration is rewritten
 * to the enumeration's integer base type, and remembers the enumeration in
 * `baseEnum` so the renderer can emit AssociatedEnumAttribute.
 *
 * Runs once per reference, when the reference is created. Only enumerations
 * declared earlier in file order (includes already expanded) are visible;
 * a reference to an enumeration declared later stays unresolved.
 */

import type { Enumeration, TypeReference } from '@apimeta/types';
import { resolveIlType, type TypeResolutionOptions, type TypeScope } from './ilTypes.js';

export interface EnrichmentScope extends TypeScope {
  readonly enums: ReadonlyMap<string, Enumeration>;
}

/**
 * Enrich `ref` in place.
 *
 * @returns the linked enumeration, or undefined when the reference was left alone
 */
export function enrichTypeReference(
  ref: TypeReference,
  scope: EnrichmentScope,
  options: TypeResolutionOptions
): Enumeration | undefined {
  if (ref.depth !== 0) {
    return undefined;
  }

  const enumeration = scope.enums.get(resolveIlType(ref, scope, options));
  if (!enumeration) {
    return undefined;
  }

  ref.name = enumeration.baseType.name;
  ref.depth = enumeration.baseType.depth;
  ref.baseEnum = enumeration.name;
  return enumeration;
}
